import { promises as fs } from "fs";
import path from "path";
import { randomUUID } from "crypto";
import type { ArtifactStorePort } from "../../ports/storage/ArtifactStorePort";
import type { LoggerPort } from "../../ports/sys/LoggerPort";
import type { TimePort } from "../../ports/sys/TimePort";
import type { IoError } from "../../domain/tools/errors";
import type { ToolArtifact } from "../../domain/tools/types";
import { NodeTime } from "../sys/NodeTime";
import { describeError, err, errnoCode, ok, type Result } from "../../shared/result";

export const TOOL_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;
export const MAX_TOOL_NAME_LENGTH = 64;

const FILE_PATTERN = /^tool_([A-Za-z_][A-Za-z0-9_]*)\.js$/;
const HEADER_PATTERN = /^\/\* artifact (\S+) created=(\S+) updated=(\S+) \*\/$/;

export function artifactFileName(name: string): string {
  return `tool_${name}.js`;
}

export function isValidToolName(name: string): boolean {
  return name.length <= MAX_TOOL_NAME_LENGTH && TOOL_NAME_PATTERN.test(name);
}

export interface FileArtifactStoreOptions {
  dir: string;
  reservedNames?: readonly string[];
  time?: TimePort;
  logger?: LoggerPort;
}

/**
 * One `tool_<name>.js` per tool. The first line is a store header holding the
 * timestamps; everything after it is the validated source, byte for byte.
 */
export class FileArtifactStore implements ArtifactStorePort {
  private readonly dir: string;
  private readonly reserved: ReadonlySet<string>;
  private readonly time: TimePort;

  constructor(private readonly options: FileArtifactStoreOptions) {
    this.dir = path.resolve(options.dir);
    this.reserved = new Set(options.reservedNames ?? []);
    this.time = options.time ?? new NodeTime();
  }

  async save(name: string, canonicalSource: string): Promise<Result<ToolArtifact, IoError>> {
    const nameError = this.checkName(name);
    if (nameError) return err(nameError);

    let existing: ToolArtifact | null;
    try {
      existing = await this.read(name);
    } catch (error) {
      return err(this.ioError(name, error));
    }

    let nowMs = this.time.now();
    if (existing) {
      // updatedAt must advance on every save, even within the same millisecond.
      const previous = Date.parse(existing.updatedAt);
      if (Number.isFinite(previous) && nowMs <= previous) nowMs = previous + 1;
    }
    const updatedAt = this.time.toIsoString(nowMs);
    const artifact: ToolArtifact = {
      name,
      content: canonicalSource,
      createdAt: existing?.createdAt ?? updatedAt,
      updatedAt,
    };

    const target = this.pathFor(name);
    const temp = `${target}.${randomUUID()}.tmp`;
    try {
      await fs.mkdir(this.dir, { recursive: true });
      await fs.writeFile(temp, serialize(artifact), "utf8");
      await fs.rename(temp, target);
    } catch (error) {
      await fs.rm(temp, { force: true }).catch((cleanupError: unknown) => {
        this.options.logger?.warn("Failed to remove temporary artifact", {
          path: temp,
          error: describeError(cleanupError),
        });
      });
      return err(this.ioError(name, error));
    }

    return ok(artifact);
  }

  async read(name: string): Promise<ToolArtifact | null> {
    if (!isValidToolName(name)) return null;
    const file = this.pathFor(name);
    let raw: string;
    try {
      raw = await fs.readFile(file, "utf8");
    } catch (error) {
      if (errnoCode(error) === "ENOENT") return null;
      throw error;
    }

    const newline = raw.indexOf("\n");
    const header = HEADER_PATTERN.exec(newline === -1 ? raw : raw.slice(0, newline));
    if (header && header[1] === name) {
      return {
        name,
        content: newline === -1 ? "" : raw.slice(newline + 1),
        createdAt: header[2],
        updatedAt: header[3],
      };
    }

    // Placed without going through the store: no header, whole file is content.
    const stat = await fs.stat(file);
    return {
      name,
      content: raw,
      createdAt: stat.birthtime.toISOString(),
      updatedAt: stat.mtime.toISOString(),
    };
  }

  async remove(name: string): Promise<Result<boolean, IoError>> {
    if (!isValidToolName(name)) {
      return err({ code: "IoError", kind: "InvalidName", name, detail: `"${name}" is not a valid tool name` });
    }
    try {
      await fs.unlink(this.pathFor(name));
      return ok(true);
    } catch (error) {
      if (errnoCode(error) === "ENOENT") return ok(false);
      return err(this.ioError(name, error));
    }
  }

  async list(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.dir);
    } catch (error) {
      if (errnoCode(error) === "ENOENT") return [];
      throw error;
    }
    const names: string[] = [];
    for (const entry of entries) {
      const match = FILE_PATTERN.exec(entry);
      if (match && isValidToolName(match[1])) names.push(match[1]);
    }
    return names.sort();
  }

  private pathFor(name: string): string {
    return path.join(this.dir, artifactFileName(name));
  }

  private checkName(name: string): IoError | null {
    if (!isValidToolName(name)) {
      return {
        code: "IoError",
        kind: "InvalidName",
        name,
        detail: `"${name}" must match ${TOOL_NAME_PATTERN} and be at most ${MAX_TOOL_NAME_LENGTH} characters`,
      };
    }
    if (this.reserved.has(name)) {
      return { code: "IoError", kind: "ReservedName", name, detail: `"${name}" is reserved` };
    }
    return null;
  }

  private ioError(name: string, error: unknown): IoError {
    const code = errnoCode(error);
    return {
      code: "IoError",
      kind: code === "ENOSPC" || code === "EDQUOT" ? "NoSpace" : "WriteFailed",
      name,
      detail: describeError(error),
    };
  }
}

function serialize(artifact: ToolArtifact): string {
  return `/* artifact ${artifact.name} created=${artifact.createdAt} updated=${artifact.updatedAt} */\n${artifact.content}`;
}
