import type { JSONSchema } from "../../domain/tools/types";

export interface ToolExecutionResult {
  ok: boolean;
  message?: string;
  data?: unknown;
}

export interface ToolDefinition {
  name: string;
  description: string;
  schema: JSONSchema;
}

/** What the orchestration layer sees of the tool subsystem. */
export interface ToolRegistryPort {
  list(): ToolDefinition[];
  exec(name: string, args: unknown): Promise<ToolExecutionResult>;
}
