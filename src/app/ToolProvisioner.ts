import type { ArtifactStorePort } from "../ports/storage/ArtifactStorePort";
import type { MetadataStorePort } from "../ports/storage/MetadataStorePort";
import type { LoggerPort } from "../ports/sys/LoggerPort";
import type { TimePort } from "../ports/sys/TimePort";
import { Topics, type EventBus } from "../domain/events/EventBus";
import type { IoError, ProvisionError } from "../domain/tools/errors";
import type {
  JSONSchema,
  ToolArtifact,
  ToolMetadataRecord,
  ToolParameter,
  ToolProposal,
} from "../domain/tools/types";
import { PolicyValidator } from "../domain/policy/PolicyValidator";
import { ConsoleLogger } from "../adapters/sys/ConsoleLogger";
import { NodeTime } from "../adapters/sys/NodeTime";
import { compileParameterSchema } from "../shared/schema";
import { describeError, err, ok, type Result } from "../shared/result";

export interface ToolProvisionerOptions {
  artifacts: ArtifactStorePort;
  metadata: MetadataStorePort;
  validator?: PolicyValidator;
  time?: TimePort;
  logger?: LoggerPort;
  bus?: EventBus;
}

export interface RetireOutcome {
  name: string;
  metadataRemoved: boolean;
  artifactRemoved: boolean;
}

export function formatSignature(params: readonly ToolParameter[]): string {
  const parts = params.map((param) => {
    if (param.rest) return `...${param.name}`;
    return param.optional ? `${param.name}?` : param.name;
  });
  return `(${parts.join(", ")})`;
}

export function deriveParameterSchema(params: readonly ToolParameter[]): JSONSchema {
  // fromEntries so a parameter named `__proto__` becomes a property, not a prototype.
  const properties: Record<string, Record<string, unknown>> = Object.fromEntries(
    params.map((param): [string, Record<string, unknown>] => [param.name, param.rest ? { type: "array" } : {}])
  );
  return {
    type: "object",
    properties,
    required: params.filter((param) => !param.optional).map((param) => param.name),
    additionalProperties: false,
  };
}

function checkParameterSchema(schema: JSONSchema, params: readonly ToolParameter[]): string | null {
  if (schema.type !== "object" || typeof schema.properties !== "object" || schema.properties === null) {
    return 'schema must be an object schema with "properties"';
  }
  const names = new Set(params.map((param) => param.name));
  for (const property of Object.keys(schema.properties)) {
    if (!names.has(property)) return `property "${property}" is not a parameter of the function`;
  }
  const compiled = compileParameterSchema(schema);
  return compiled.ok ? null : compiled.error;
}

/**
 * Proposal lifecycle: validate, persist the artifact, then record metadata.
 * Both writes succeed or the artifact is put back the way it was.
 */
export class ToolProvisioner {
  private readonly validator: PolicyValidator;
  private readonly time: TimePort;
  private readonly logger: LoggerPort;

  constructor(private readonly options: ToolProvisionerOptions) {
    this.validator = options.validator ?? new PolicyValidator();
    this.time = options.time ?? new NodeTime();
    this.logger = options.logger ?? new ConsoleLogger({ scope: "provision" });
  }

  async propose(proposal: ToolProposal): Promise<Result<ToolMetadataRecord, ProvisionError>> {
    const name = proposal.declaredName;
    const verdict = this.validator.validate(proposal.source, name);
    if (verdict.status === "rejected") {
      return this.rejected(name, verdict.rejection);
    }

    let parameterSchema: JSONSchema;
    if (proposal.parameterSchema) {
      const problem = checkParameterSchema(proposal.parameterSchema, verdict.params);
      if (problem) {
        return this.rejected(name, { code: "InvalidParameterSchema", name, detail: problem });
      }
      parameterSchema = proposal.parameterSchema;
    } else {
      parameterSchema = deriveParameterSchema(verdict.params);
    }

    let previousArtifact: ToolArtifact | null;
    try {
      previousArtifact = await this.options.artifacts.read(name);
    } catch (error) {
      return this.rejected(name, { code: "IoError", kind: "WriteFailed", name, detail: describeError(error) });
    }
    const previous = await this.options.metadata.get(name);

    const saved = await this.options.artifacts.save(name, verdict.canonicalSource);
    if (!saved.ok) {
      return this.rejected(name, saved.error);
    }

    const record: ToolMetadataRecord = {
      name,
      description: proposal.description ?? previous?.description ?? "",
      parameterSchema,
      version: (previous?.version ?? 0) + 1,
      enabled: true,
      createdAt: previous?.createdAt ?? saved.value.createdAt,
      updatedAt: saved.value.updatedAt,
      signature: formatSignature(verdict.params),
      origin: "dynamic",
      uses: previous?.uses ?? 0,
      successes: previous?.successes ?? 0,
    };

    try {
      await this.options.metadata.upsert(record);
    } catch (error) {
      await this.rollback(name, previousArtifact);
      return this.rejected(name, {
        code: "IoError",
        kind: "WriteFailed",
        name,
        detail: `metadata update failed: ${describeError(error)}`,
      });
    }

    this.logger.info("Tool accepted", { name, version: record.version });
    this.options.bus?.publish(Topics.ToolAccepted, { name, version: record.version });
    return ok(record);
  }

  /**
   * Removes metadata and artifact. When the artifact delete fails the metadata
   * is already gone; the consistency scan reports the leftover artifact.
   */
  async retire(name: string): Promise<Result<RetireOutcome, IoError>> {
    const metadataRemoved = await this.options.metadata.remove(name);
    const artifact = await this.options.artifacts.remove(name);
    if (!artifact.ok) {
      this.logger.error("Artifact removal failed", { name, detail: artifact.error.detail });
      return artifact;
    }

    const outcome: RetireOutcome = { name, metadataRemoved, artifactRemoved: artifact.value };
    this.logger.info("Tool retired", { ...outcome });
    this.options.bus?.publish(Topics.ToolRetired, outcome);
    return ok(outcome);
  }

  /** Edits visibility only; the artifact is untouched. */
  async setEnabled(name: string, enabled: boolean): Promise<ToolMetadataRecord | null> {
    const record = await this.options.metadata.get(name);
    if (!record) return null;
    const updated: ToolMetadataRecord = {
      ...record,
      enabled,
      updatedAt: this.time.toIsoString(this.time.now()),
    };
    await this.options.metadata.upsert(updated);
    return updated;
  }

  private rejected(name: string, error: ProvisionError): Result<never, ProvisionError> {
    this.logger.info("Tool rejected", { name, code: error.code, detail: error.detail });
    this.options.bus?.publish(Topics.ToolRejected, { name, error });
    return err(error);
  }

  private async rollback(name: string, previous: ToolArtifact | null): Promise<void> {
    const restored = previous
      ? await this.options.artifacts.save(name, previous.content)
      : await this.options.artifacts.remove(name);
    if (!restored.ok) {
      this.logger.error("Artifact rollback failed", { name, detail: restored.error.detail });
    }
  }
}
