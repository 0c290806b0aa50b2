import fs from "fs";
import path from "path";
import type { LoggerPort, LogLevel } from "./ports/sys/LoggerPort";
import { DEFAULT_POLICY, type ExtensionPolicy } from "./domain/policy/ExtensionPolicy";
import { DEFAULT_METADATA_FILE } from "./adapters/storage/JsonMetadataStore";
import { ConsoleLogger, isLogLevel } from "./adapters/sys/ConsoleLogger";

export interface AppConfig {
  toolsDir?: string;
  metadataFile?: string;
  allowedImports?: string[];
  reservedNames?: string[];
  maxSourceChars?: number;
  maxSourceLines?: number;
  invokeTimeoutMs?: number;
  logLevel?: LogLevel;
}

export interface ResolvedConfig {
  toolsDir: string;
  metadataFile: string;
  policy: ExtensionPolicy;
  reservedNames: string[];
  invokeTimeoutMs?: number;
  logLevel: LogLevel;
}

export interface ConfigOverrides {
  toolsDir?: string;
  logLevel?: LogLevel;
}

const DEFAULT_CONFIG_FILENAMES = ["dynamic-tools.config.json"];
export const DEFAULT_TOOLS_DIR = "dynamic_tools";
export const DEFAULT_RESERVED_NAMES = ["propose_tool", "use_tool", "list_tools"];

export interface LoadedConfig {
  config: AppConfig;
  path?: string;
}

export function loadConfig(configPath?: string, logger: LoggerPort = new ConsoleLogger()): LoadedConfig {
  const searchPaths = configPath
    ? [configPath]
    : DEFAULT_CONFIG_FILENAMES.map((name) => path.resolve(process.cwd(), name));

  for (const candidate of searchPaths) {
    try {
      const resolved = path.resolve(candidate);
      if (!fs.existsSync(resolved)) continue;
      const raw = fs.readFileSync(resolved, "utf8");
      const parsed: unknown = JSON.parse(raw);
      return { config: normalizeConfig(parsed, logger), path: resolved };
    } catch (err) {
      logger.warn(`Failed to load config from ${candidate}`, {
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  return { config: {} };
}

export function resolveConfig(
  config: AppConfig,
  overrides: ConfigOverrides = {},
  baseDir: string = process.cwd()
): ResolvedConfig {
  return {
    toolsDir: path.resolve(baseDir, overrides.toolsDir ?? config.toolsDir ?? DEFAULT_TOOLS_DIR),
    metadataFile: config.metadataFile ?? DEFAULT_METADATA_FILE,
    policy: {
      allowedImports: config.allowedImports ?? DEFAULT_POLICY.allowedImports,
      maxSourceChars: config.maxSourceChars ?? DEFAULT_POLICY.maxSourceChars,
      maxSourceLines: config.maxSourceLines ?? DEFAULT_POLICY.maxSourceLines,
    },
    reservedNames: config.reservedNames ?? DEFAULT_RESERVED_NAMES,
    invokeTimeoutMs: config.invokeTimeoutMs,
    logLevel: overrides.logLevel ?? config.logLevel ?? "info",
  };
}

function stringList(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  return value
    .map((item) => (typeof item === "string" ? item.trim() : ""))
    .filter((item) => item.length > 0);
}

function positiveInteger(value: unknown): number | undefined {
  return typeof value === "number" && Number.isInteger(value) && value > 0 ? value : undefined;
}

function normalizeConfig(input: unknown, logger: LoggerPort): AppConfig {
  if (typeof input !== "object" || input === null || Array.isArray(input)) {
    logger.warn("Config root must be a JSON object; using defaults.");
    return {};
  }

  const raw = new Map<string, unknown>(Object.entries(input));
  const out: AppConfig = {};
  const toolsDir = raw.get("toolsDir");
  if (typeof toolsDir === "string" && toolsDir.trim()) out.toolsDir = toolsDir.trim();
  const metadataFile = raw.get("metadataFile");
  if (typeof metadataFile === "string" && metadataFile.trim()) out.metadataFile = metadataFile.trim();

  const allowedImports = stringList(raw.get("allowedImports"));
  if (allowedImports) out.allowedImports = allowedImports;
  const reservedNames = stringList(raw.get("reservedNames"));
  if (reservedNames) out.reservedNames = reservedNames;
  const maxSourceChars = positiveInteger(raw.get("maxSourceChars"));
  if (maxSourceChars) out.maxSourceChars = maxSourceChars;
  const maxSourceLines = positiveInteger(raw.get("maxSourceLines"));
  if (maxSourceLines) out.maxSourceLines = maxSourceLines;
  const invokeTimeoutMs = positiveInteger(raw.get("invokeTimeoutMs"));
  if (invokeTimeoutMs) out.invokeTimeoutMs = invokeTimeoutMs;

  const logLevel = raw.get("logLevel");
  if (logLevel !== undefined) {
    if (isLogLevel(logLevel)) {
      out.logLevel = logLevel;
    } else {
      logger.warn(`Invalid logLevel ${JSON.stringify(logLevel)}; expected debug, info, warn or error.`);
    }
  }

  return out;
}
