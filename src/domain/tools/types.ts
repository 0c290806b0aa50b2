import type { LoadFailure } from "./errors";

export type JSONSchema = {
  type: "object";
  properties: Record<string, Record<string, unknown>>;
  required?: string[];
  additionalProperties?: boolean;
  description?: string;
};

/** Candidate tool as produced by the generating model. Consumed once. */
export interface ToolProposal {
  declaredName: string;
  source: string;
  description?: string;
  parameterSchema?: JSONSchema;
}

/** Persisted source unit for one tool. */
export interface ToolArtifact {
  name: string;
  content: string;
  createdAt: string;
  updatedAt: string;
}

export interface ToolMetadataRecord {
  name: string;
  description: string;
  parameterSchema: JSONSchema;
  version: number;
  enabled: boolean;
  createdAt: string;
  updatedAt: string;
  /** Parameter list as written in the source, e.g. `(a, b)`. */
  signature: string;
  origin: "dynamic";
  uses: number;
  successes: number;
}

export interface ToolParameter {
  name: string;
  optional: boolean;
  /** `...name`: collects the remaining positional arguments. */
  rest: boolean;
}

export type ToolCallable = (args: unknown[], options?: { timeoutMs?: number }) => unknown;

export interface RegistryEntry {
  readonly name: string;
  readonly callable: ToolCallable;
  readonly isDynamic: true;
  readonly loadedAt: string;
  readonly params: readonly ToolParameter[];
  readonly metadata: ToolMetadataRecord;
}

export interface LoadReport {
  loadedAt: string;
  loaded: string[];
  /** Names with an artifact whose metadata record is disabled. */
  disabled: string[];
  failures: LoadFailure[];
}
