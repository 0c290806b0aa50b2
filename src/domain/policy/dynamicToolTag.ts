import { createHash } from "crypto";
import type { LoadFailureReason } from "../tools/errors";
import { err, ok, type Result } from "../../shared/result";

const TAG_PREFIX = "// @dynamic-tool ";
const TAG_PATTERN = /^\/\/ @dynamic-tool (\S+) sha256=([0-9a-f]{64})$/;

function digest(body: string): string {
  return createHash("sha256").update(body, "utf8").digest("hex");
}

/** Prefixes the body with the tag line that marks it as validated. */
export function attachTag(name: string, body: string): string {
  return `${TAG_PREFIX}${name} sha256=${digest(body)}\n${body}`;
}

/**
 * Checks the tag line of persisted content and returns the tagged body.
 * Any byte changed after tagging, or a tag naming another tool, is a mismatch.
 */
export function verifyTag(
  name: string,
  content: string
): Result<string, { reason: LoadFailureReason; detail: string }> {
  const newline = content.indexOf("\n");
  const firstLine = newline === -1 ? content : content.slice(0, newline);
  const match = TAG_PATTERN.exec(firstLine);
  if (!match) {
    return err({ reason: "MissingTag", detail: "artifact does not start with a dynamic-tool tag" });
  }

  const body = newline === -1 ? "" : content.slice(newline + 1);
  if (match[1] !== name) {
    return err({ reason: "TagMismatch", detail: `tag names "${match[1]}"` });
  }
  if (match[2] !== digest(body)) {
    return err({ reason: "TagMismatch", detail: "content changed after validation" });
  }
  return ok(body);
}
