export { buildApplication } from "./composition/container";
export type { ApplicationInstance, ApplicationOptions, StartupReport } from "./composition/container";
export { loadConfig, resolveConfig, DEFAULT_TOOLS_DIR, DEFAULT_RESERVED_NAMES } from "./config";
export type { AppConfig, ResolvedConfig, ConfigOverrides } from "./config";

export { PolicyValidator, parseSource } from "./domain/policy/PolicyValidator";
export type { ValidationVerdict, ParsedTool, Inspection } from "./domain/policy/PolicyValidator";
export {
  DEFAULT_POLICY,
  DEFAULT_ALLOWED_IMPORTS,
  FORBIDDEN_GLOBALS,
  FORBIDDEN_MEMBER_CALLS,
  SANDBOX_ARGS_SLOT,
  isAllowedImport,
  moduleRoot,
} from "./domain/policy/ExtensionPolicy";
export type { ExtensionPolicy } from "./domain/policy/ExtensionPolicy";
export { attachTag, verifyTag } from "./domain/policy/dynamicToolTag";
export { Topics } from "./domain/events/EventBus";
export type { EventBus, Topic, TopicPayloads, Subscription } from "./domain/events/EventBus";
export * from "./domain/tools/types";
export * from "./domain/tools/errors";

export { FileArtifactStore, artifactFileName, isValidToolName } from "./adapters/storage/FileArtifactStore";
export { JsonMetadataStore, DEFAULT_METADATA_FILE } from "./adapters/storage/JsonMetadataStore";
export { DynamicToolRegistry } from "./adapters/tools/DynamicToolRegistry";
export { compileTool, nodeModuleResolver } from "./adapters/tools/ToolSandbox";
export type { ModuleResolver } from "./adapters/tools/ToolSandbox";
export { ConsoleLogger } from "./adapters/sys/ConsoleLogger";
export { SimpleEventBus } from "./adapters/sys/SimpleEventBus";
export { NodeTime } from "./adapters/sys/NodeTime";

export { InvocationAdapter } from "./app/InvocationAdapter";
export type { ToolArguments, CallOptions } from "./app/InvocationAdapter";
export { ToolProvisioner, formatSignature, deriveParameterSchema } from "./app/ToolProvisioner";
export type { RetireOutcome } from "./app/ToolProvisioner";
export { ConsistencyChecker } from "./app/ConsistencyChecker";
export type { ConsistencyReport } from "./app/ConsistencyChecker";
export { ToolCatalog, EMPTY_CATALOG_TEXT } from "./app/ToolCatalog";

export { parseToolAction, toProposal, TOOL_ACTION_JSON_SCHEMA } from "./shared/contracts";
export type { ToolAction } from "./shared/contracts";
export type { Result } from "./shared/result";
export type { ArtifactStorePort } from "./ports/storage/ArtifactStorePort";
export type { MetadataStorePort } from "./ports/storage/MetadataStorePort";
export type { LoggerPort, LogLevel } from "./ports/sys/LoggerPort";
export type { TimePort } from "./ports/sys/TimePort";
export type { ToolRegistryPort, ToolDefinition, ToolExecutionResult } from "./ports/tools/ToolRegistryPort";
