import { promises as fs } from "fs";
import path from "path";
import { randomUUID } from "crypto";
import type { MetadataStorePort } from "../../ports/storage/MetadataStorePort";
import type { LoggerPort } from "../../ports/sys/LoggerPort";
import type { ToolMetadataRecord } from "../../domain/tools/types";
import { MetadataDocumentError } from "../../domain/tools/errors";
import { compileSchema, formatSchemaErrors } from "../../shared/schema";
import { describeError, errnoCode } from "../../shared/result";

export const DEFAULT_METADATA_FILE = "tools_meta.json";

// Keyed by tool name. A Map, so names such as `__proto__` or `toString` are plain keys.
type MetadataDocument = Map<string, ToolMetadataRecord>;

const RECORD_SCHEMA = {
  type: "object",
  required: [
    "name",
    "description",
    "parameterSchema",
    "version",
    "enabled",
    "createdAt",
    "updatedAt",
    "signature",
    "origin",
    "uses",
    "successes",
  ],
  properties: {
    name: { type: "string" },
    description: { type: "string" },
    parameterSchema: {
      type: "object",
      required: ["type", "properties"],
      properties: {
        type: { const: "object" },
        properties: { type: "object" },
      },
    },
    version: { type: "integer", minimum: 1 },
    enabled: { type: "boolean" },
    createdAt: { type: "string" },
    updatedAt: { type: "string" },
    signature: { type: "string" },
    origin: { const: "dynamic" },
    uses: { type: "integer", minimum: 0 },
    successes: { type: "integer", minimum: 0 },
  },
} as const;

const validateDocument = (() => {
  const compiled = compileSchema<Record<string, ToolMetadataRecord>>({
    type: "object",
    additionalProperties: RECORD_SCHEMA,
  });
  if (!compiled.ok) throw new Error(`Metadata document schema failed to compile: ${compiled.error}`);
  return compiled.value;
})();

/**
 * Whole-document store: every query reads the file, every change rewrites it.
 * Changes are serialized through a single in-process lock.
 */
export class JsonMetadataStore implements MetadataStorePort {
  readonly documentPath: string;
  private lock: Promise<void> = Promise.resolve();

  constructor(
    dir: string,
    fileName: string = DEFAULT_METADATA_FILE,
    private readonly logger?: LoggerPort
  ) {
    this.documentPath = path.resolve(dir, fileName);
  }

  async upsert(record: ToolMetadataRecord): Promise<void> {
    await this.mutate((doc) => {
      doc.set(record.name, { ...record });
      return true;
    });
  }

  async remove(name: string): Promise<boolean> {
    let removed = false;
    await this.mutate((doc) => {
      removed = doc.delete(name);
      return removed;
    });
    return removed;
  }

  async list(): Promise<ToolMetadataRecord[]> {
    const doc = await this.readDocument();
    return Array.from(doc.values()).sort((a, b) => a.name.localeCompare(b.name));
  }

  async get(name: string): Promise<ToolMetadataRecord | null> {
    const doc = await this.readDocument();
    return doc.get(name) ?? null;
  }

  async recordUse(name: string, ok: boolean): Promise<void> {
    await this.mutate((doc) => {
      const record = doc.get(name);
      if (!record) return false;
      doc.set(name, {
        ...record,
        uses: record.uses + 1,
        successes: record.successes + (ok ? 1 : 0),
      });
      return true;
    });
  }

  private mutate(change: (doc: MetadataDocument) => boolean): Promise<void> {
    const run = this.lock.then(async () => {
      const doc = await this.readDocument();
      if (change(doc)) await this.writeDocument(doc);
    });
    // The next writer waits for this one whether it succeeded or not.
    this.lock = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async readDocument(): Promise<MetadataDocument> {
    let raw: string;
    try {
      raw = await fs.readFile(this.documentPath, "utf8");
    } catch (error) {
      if (errnoCode(error) === "ENOENT") return new Map();
      throw new MetadataDocumentError(this.documentPath, describeError(error));
    }
    if (!raw.trim()) return new Map();

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new MetadataDocumentError(this.documentPath, describeError(error));
    }
    if (!validateDocument(parsed)) {
      throw new MetadataDocumentError(this.documentPath, formatSchemaErrors(validateDocument.errors));
    }
    const doc: MetadataDocument = new Map();
    for (const [key, record] of Object.entries(parsed)) {
      if (record.name !== key) {
        throw new MetadataDocumentError(this.documentPath, `entry "${key}" holds record "${record.name}"`);
      }
      doc.set(key, record);
    }
    return doc;
  }

  private async writeDocument(doc: MetadataDocument): Promise<void> {
    // fromEntries defines own keys, so `__proto__` is written like any other name.
    const sorted = Object.fromEntries(Array.from(doc.entries()).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));

    await fs.mkdir(path.dirname(this.documentPath), { recursive: true });
    const temp = `${this.documentPath}.${randomUUID()}.tmp`;
    try {
      await fs.writeFile(temp, `${JSON.stringify(sorted, null, 2)}\n`, "utf8");
      await fs.rename(temp, this.documentPath);
    } catch (error) {
      await fs.rm(temp, { force: true }).catch((cleanupError: unknown) => {
        this.logger?.warn("Failed to remove temporary metadata document", {
          path: temp,
          error: describeError(cleanupError),
        });
      });
      throw error;
    }
  }
}
