import type { JSONSchema, ToolProposal } from "../domain/tools/types";
import { compileSchema } from "./schema";

/** What the generating model answers with when it wants tool work done. */
export type ToolAction =
  | {
      action: "propose_tool";
      name: string;
      code: string;
      desc?: string;
      parameters?: JSONSchema;
    }
  | {
      action: "use_tool";
      name: string;
      params?: Record<string, unknown> | unknown[];
    };

const OBJECT_SCHEMA = {
  type: "object",
  required: ["type", "properties"],
  properties: {
    type: { const: "object" },
    properties: {
      type: "object",
      additionalProperties: { type: "object" },
    },
    required: { type: "array", items: { type: "string" } },
    additionalProperties: { type: "boolean" },
    description: { type: "string" },
  },
} as const;

export const TOOL_ACTION_JSON_SCHEMA = {
  name: "tool_action",
  schema: {
    oneOf: [
      {
        type: "object",
        required: ["action", "name", "code"],
        properties: {
          action: { const: "propose_tool" },
          name: {
            type: "string",
            description: "Identifier of the new tool; must equal the function name in code.",
          },
          code: {
            type: "string",
            description: "JavaScript source: imports plus exactly one function declaration.",
          },
          desc: { type: "string", description: "One-line description shown to the model." },
          parameters: OBJECT_SCHEMA,
        },
      },
      {
        type: "object",
        required: ["action", "name"],
        properties: {
          action: { const: "use_tool" },
          name: { type: "string", description: "Tool name from the registered tool list." },
          params: {
            type: ["object", "array"],
            description: "Named arguments object, or positional arguments array.",
          },
        },
      },
    ],
  },
} as const;

const validateAction = (() => {
  const compiled = compileSchema<ToolAction>(TOOL_ACTION_JSON_SCHEMA.schema);
  if (!compiled.ok) throw new Error(`Tool action schema failed to compile: ${compiled.error}`);
  return compiled.value;
})();

/**
 * Pulls the first `{ ... }` block out of model output and checks it against
 * the action contract. Returns null when there is no valid action.
 */
export function parseToolAction(text: string): ToolAction | null {
  if (!text) return null;
  let candidate = text.trim();
  if (!candidate.startsWith("{")) {
    const start = candidate.indexOf("{");
    const end = candidate.lastIndexOf("}");
    if (start < 0 || end <= start) return null;
    candidate = candidate.slice(start, end + 1);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(candidate);
  } catch {
    return null;
  }
  return validateAction(parsed) ? parsed : null;
}

export function toProposal(action: Extract<ToolAction, { action: "propose_tool" }>): ToolProposal {
  return {
    declaredName: action.name,
    source: action.code,
    description: action.desc,
    parameterSchema: action.parameters,
  };
}
