import { loadConfig, resolveConfig, type ConfigOverrides, type ResolvedConfig } from "../config";
import { CONFIG_PATH, LOG_LEVEL, TOOLS_DIR } from "../env";
import { SimpleEventBus } from "../adapters/sys/SimpleEventBus";
import { NodeTime } from "../adapters/sys/NodeTime";
import { ConsoleLogger } from "../adapters/sys/ConsoleLogger";
import { FileArtifactStore } from "../adapters/storage/FileArtifactStore";
import { JsonMetadataStore } from "../adapters/storage/JsonMetadataStore";
import { DynamicToolRegistry } from "../adapters/tools/DynamicToolRegistry";
import type { ModuleResolver } from "../adapters/tools/ToolSandbox";
import { PolicyValidator } from "../domain/policy/PolicyValidator";
import { Topics, type EventBus } from "../domain/events/EventBus";
import type { LoadReport } from "../domain/tools/types";
import type { TimePort } from "../ports/sys/TimePort";
import { InvocationAdapter } from "../app/InvocationAdapter";
import { ToolProvisioner } from "../app/ToolProvisioner";
import { ConsistencyChecker, type ConsistencyReport } from "../app/ConsistencyChecker";
import { ToolCatalog } from "../app/ToolCatalog";
import { describeError } from "../shared/result";

export interface ApplicationOptions {
  /** Skips the config file lookup when given. */
  config?: ResolvedConfig;
  configPath?: string;
  overrides?: ConfigOverrides;
  resolveModule?: ModuleResolver;
  time?: TimePort;
}

export interface StartupReport {
  consistency: ConsistencyReport;
  load: LoadReport;
}

export interface ApplicationInstance {
  readonly config: ResolvedConfig;
  readonly bus: EventBus;
  readonly registry: DynamicToolRegistry;
  readonly provisioner: ToolProvisioner;
  readonly invocation: InvocationAdapter;
  readonly catalog: ToolCatalog;
  readonly consistency: ConsistencyChecker;
  start(): Promise<StartupReport>;
  shutdown(): Promise<void>;
}

export async function buildApplication(options: ApplicationOptions = {}): Promise<ApplicationInstance> {
  const config = options.config ?? readConfig(options);
  const logger = new ConsoleLogger({ level: config.logLevel });
  const bus = new SimpleEventBus(logger.child("events"));
  const time = options.time ?? new NodeTime();
  const validator = new PolicyValidator(config.policy);

  const artifacts = new FileArtifactStore({
    dir: config.toolsDir,
    reservedNames: config.reservedNames,
    time,
    logger: logger.child("artifacts"),
  });
  const metadata = new JsonMetadataStore(config.toolsDir, config.metadataFile, logger.child("metadata"));

  const registry = new DynamicToolRegistry({
    artifacts,
    metadata,
    validator,
    resolveModule: options.resolveModule,
    time,
    logger: logger.child("registry"),
    bus,
  });
  const invocation = new InvocationAdapter(registry, {
    metadata,
    defaultTimeoutMs: config.invokeTimeoutMs,
    logger: logger.child("invoke"),
  });
  const provisioner = new ToolProvisioner({
    artifacts,
    metadata,
    validator,
    time,
    logger: logger.child("provision"),
    bus,
  });
  const consistency = new ConsistencyChecker(artifacts, metadata, logger.child("consistency"));
  const catalog = new ToolCatalog(metadata, registry);

  const reloadSubscription = bus.subscribe(Topics.ReloadRequested, ({ reason }) => {
    logger.info("Reloading dynamic tools", { reason });
    registry.loadAll().catch((error: unknown) => {
      logger.error("Dynamic tool reload failed", { error: describeError(error) });
    });
  });

  return {
    config,
    bus,
    registry,
    provisioner,
    invocation,
    catalog,
    consistency,
    start: async () => {
      const consistencyReport = await consistency.scan();
      const load = await registry.loadAll();
      logger.info(`Tool host ready (${load.loaded.length} tools from ${config.toolsDir}).`);
      return { consistency: consistencyReport, load };
    },
    shutdown: async () => {
      reloadSubscription.unsubscribe();
    },
  };
}

function readConfig(options: ApplicationOptions): ResolvedConfig {
  const bootLogger = new ConsoleLogger({ level: LOG_LEVEL ?? "info" });
  const { config: appConfig, path: configPath } = loadConfig(options.configPath ?? CONFIG_PATH, bootLogger);
  if (configPath) {
    bootLogger.info(`Loaded config from ${configPath}`);
  }
  return resolveConfig(appConfig, {
    toolsDir: options.overrides?.toolsDir ?? TOOLS_DIR,
    logLevel: options.overrides?.logLevel ?? LOG_LEVEL,
  });
}
