import type { ArtifactStorePort } from "../../ports/storage/ArtifactStorePort";
import type { MetadataStorePort } from "../../ports/storage/MetadataStorePort";
import type { LoggerPort } from "../../ports/sys/LoggerPort";
import type { TimePort } from "../../ports/sys/TimePort";
import type { EventBus } from "../../domain/events/EventBus";
import { Topics } from "../../domain/events/EventBus";
import type { InvokeError, LoadFailure } from "../../domain/tools/errors";
import type { LoadReport, RegistryEntry, ToolMetadataRecord } from "../../domain/tools/types";
import { PolicyValidator } from "../../domain/policy/PolicyValidator";
import { verifyTag } from "../../domain/policy/dynamicToolTag";
import { compileTool, nodeModuleResolver, type ModuleResolver } from "./ToolSandbox";
import { ConsoleLogger } from "../sys/ConsoleLogger";
import { NodeTime } from "../sys/NodeTime";
import { describeError, err, ok, type Result } from "../../shared/result";

export interface DynamicToolRegistryOptions {
  artifacts: ArtifactStorePort;
  metadata: MetadataStorePort;
  validator?: PolicyValidator;
  resolveModule?: ModuleResolver;
  time?: TimePort;
  logger?: LoggerPort;
  bus?: EventBus;
}

export interface InvokeOptions {
  timeoutMs?: number;
}

/**
 * In-memory set of callable dynamic tools. Built only by `loadAll`, which
 * replaces the whole set; retiring a tool on disk leaves its entry in place
 * until the next load.
 */
export class DynamicToolRegistry {
  private entries: ReadonlyMap<string, RegistryEntry> = new Map();
  private inflight: Promise<LoadReport> | null = null;
  private followUp: Promise<LoadReport> | null = null;
  private snapshotTaken = false;
  private readonly validator: PolicyValidator;
  private readonly resolveModule: ModuleResolver;
  private readonly time: TimePort;
  private readonly logger: LoggerPort;

  constructor(private readonly options: DynamicToolRegistryOptions) {
    this.validator = options.validator ?? new PolicyValidator();
    this.resolveModule = options.resolveModule ?? nodeModuleResolver;
    this.time = options.time ?? new NodeTime();
    this.logger = options.logger ?? new ConsoleLogger({ scope: "registry" });
  }

  /**
   * Callers in the same turn share one rebuild. A caller arriving once that
   * rebuild has begun reading the stores waits for a single follow-up rebuild,
   * so changes made before the call are always picked up.
   */
  loadAll(): Promise<LoadReport> {
    if (!this.inflight) return this.startRebuild();
    if (!this.snapshotTaken) return this.inflight;

    if (!this.followUp) {
      const settled = this.inflight.then(
        () => undefined,
        () => undefined
      );
      this.followUp = settled.then(() => {
        this.followUp = null;
        return this.loadAll();
      });
    }
    return this.followUp;
  }

  lookup(name: string): RegistryEntry | undefined {
    return this.entries.get(name);
  }

  list(): RegistryEntry[] {
    return Array.from(this.entries.values());
  }

  invoke(name: string, args: readonly unknown[], options: InvokeOptions = {}): Result<unknown, InvokeError> {
    const entry = this.entries.get(name);
    if (!entry) {
      return err({ code: "UnknownTool", name });
    }
    try {
      return ok(entry.callable([...args], options));
    } catch (error) {
      return err({ code: "InvocationError", name, cause: describeError(error) });
    }
  }

  private startRebuild(): Promise<LoadReport> {
    this.snapshotTaken = false;
    const run = Promise.resolve()
      .then(() => {
        this.snapshotTaken = true;
        return this.rebuild();
      })
      .finally(() => {
        this.inflight = null;
      });
    this.inflight = run;
    return run;
  }

  private async rebuild(): Promise<LoadReport> {
    const records = await this.options.metadata.list();
    const artifactNames = new Set(await this.options.artifacts.list());
    const loadedAt = this.time.toIsoString(this.time.now());

    const next = new Map<string, RegistryEntry>();
    const disabled: string[] = [];
    const failures: LoadFailure[] = [];

    for (const record of records) {
      if (!artifactNames.has(record.name)) {
        this.logger.debug("Metadata without artifact; not loading", { name: record.name });
        continue;
      }
      if (!record.enabled) {
        disabled.push(record.name);
        continue;
      }

      const loaded = await this.loadOne(record, loadedAt);
      if (loaded.ok) {
        next.set(record.name, loaded.value);
      } else {
        failures.push(loaded.error);
        this.logger.warn("Skipping dynamic tool", { ...loaded.error });
      }
    }

    this.entries = next;
    const report: LoadReport = {
      loadedAt,
      loaded: Array.from(next.keys()),
      disabled,
      failures,
    };
    this.logger.info("Dynamic tools loaded", {
      loaded: report.loaded.length,
      disabled: disabled.length,
      failed: failures.length,
    });
    this.options.bus?.publish(Topics.RegistryReloaded, report);
    return report;
  }

  private async loadOne(record: ToolMetadataRecord, loadedAt: string): Promise<Result<RegistryEntry, LoadFailure>> {
    const { name } = record;
    let content: string;
    try {
      const artifact = await this.options.artifacts.read(name);
      if (!artifact) {
        return err({ name, reason: "ImportFailed", detail: "artifact disappeared during load" });
      }
      content = artifact.content;
    } catch (error) {
      return err({ name, reason: "ImportFailed", detail: describeError(error) });
    }

    const tagged = verifyTag(name, content);
    if (!tagged.ok) {
      return err({ name, ...tagged.error });
    }

    // The policy may have tightened since the tool was accepted.
    const inspection = this.validator.inspect(tagged.value, name);
    if (!inspection.ok) {
      return err({
        name,
        reason: "PolicyViolation",
        detail: `${inspection.rejection.code}: ${inspection.rejection.detail}`,
      });
    }

    try {
      const callable = compileTool(name, inspection.tool, this.resolveModule);
      return ok({
        name,
        callable,
        isDynamic: true,
        loadedAt,
        params: inspection.tool.params,
        metadata: record,
      });
    } catch (error) {
      return err({ name, reason: "ImportFailed", detail: describeError(error) });
    }
  }
}
