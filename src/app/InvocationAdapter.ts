import type { ValidateFunction } from "ajv";
import type {
  ToolDefinition,
  ToolExecutionResult,
  ToolRegistryPort,
} from "../ports/tools/ToolRegistryPort";
import type { MetadataStorePort } from "../ports/storage/MetadataStorePort";
import type { LoggerPort } from "../ports/sys/LoggerPort";
import type { DynamicToolRegistry } from "../adapters/tools/DynamicToolRegistry";
import type { RegistryEntry, ToolParameter } from "../domain/tools/types";
import { formatInvokeError, type InvokeError } from "../domain/tools/errors";
import { ConsoleLogger } from "../adapters/sys/ConsoleLogger";
import { compileParameterSchema, formatSchemaErrors } from "../shared/schema";
import { describeError, err, ok, type Result } from "../shared/result";

/** Positional arguments, or named arguments keyed by parameter name. */
export type ToolArguments = readonly unknown[] | Record<string, unknown>;

export interface CallOptions {
  timeoutMs?: number;
}

export interface InvocationAdapterOptions {
  /** Receives use statistics for every call that reached a tool body. */
  metadata?: MetadataStorePort;
  defaultTimeoutMs?: number;
  logger?: LoggerPort;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function isThenable(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === "object" || typeof value === "function") &&
    value !== null &&
    "then" in value &&
    typeof value.then === "function"
  );
}

function toNamed(params: readonly ToolParameter[], args: unknown): Result<Record<string, unknown>, string> {
  if (isPlainObject(args)) return ok({ ...args });
  if (!Array.isArray(args)) return err("arguments must be an array or an object");

  const fixed = params.filter((param) => !param.rest);
  const rest = params.find((param) => param.rest);
  if (args.length > fixed.length && !rest) {
    return err(`expected at most ${fixed.length} arguments, got ${args.length}`);
  }

  const entries: Array<[string, unknown]> = [];
  fixed.forEach((param, index) => {
    if (index < args.length && args[index] !== undefined) entries.push([param.name, args[index]]);
  });
  if (rest && args.length > fixed.length) entries.push([rest.name, args.slice(fixed.length)]);
  return ok(Object.fromEntries(entries));
}

function toPositional(params: readonly ToolParameter[], named: Record<string, unknown>): Result<unknown[], string> {
  const positional: unknown[] = [];
  for (const param of params) {
    // Own keys only: a parameter may be called `toString`.
    const value = Object.hasOwn(named, param.name) ? named[param.name] : undefined;
    if (!param.rest) {
      positional.push(value);
      continue;
    }
    if (value === undefined) break;
    if (!Array.isArray(value)) return err(`${param.name}: rest parameter expects an array`);
    positional.push(...value);
  }
  while (positional.length > 0 && positional[positional.length - 1] === undefined) positional.pop();
  return ok(positional);
}

/**
 * Uniform call surface for the orchestration layer: shapes arguments to the
 * tool's parameters, checks them against its schema, then delegates to the
 * registry.
 */
export class InvocationAdapter implements ToolRegistryPort {
  private readonly validators = new WeakMap<RegistryEntry, ValidateFunction>();
  private readonly logger: LoggerPort;

  constructor(
    private readonly registry: DynamicToolRegistry,
    private readonly options: InvocationAdapterOptions = {}
  ) {
    this.logger = options.logger ?? new ConsoleLogger({ scope: "invoke" });
  }

  async call(name: string, args: ToolArguments, options: CallOptions = {}): Promise<Result<unknown, InvokeError>> {
    const entry = this.registry.lookup(name);
    if (!entry) return err({ code: "UnknownTool", name });

    const shaped = this.shape(entry, args);
    if (!shaped.ok) {
      return err({ code: "ArgumentShapeMismatch", name, detail: shaped.error });
    }

    const timeoutMs = options.timeoutMs ?? this.options.defaultTimeoutMs;
    let outcome = this.registry.invoke(name, shaped.value, { timeoutMs });
    if (outcome.ok && isThenable(outcome.value)) {
      try {
        outcome = ok(await outcome.value);
      } catch (error) {
        outcome = err({ code: "InvocationError", name, cause: describeError(error) });
      }
    }

    await this.recordUse(name, outcome.ok);
    if (!outcome.ok) {
      this.logger.warn("Tool call failed", { name, error: formatInvokeError(outcome.error) });
    }
    return outcome;
  }

  list(): ToolDefinition[] {
    return this.registry.list().map((entry) => ({
      name: entry.name,
      description: entry.metadata.description,
      schema: entry.metadata.parameterSchema,
    }));
  }

  async exec(name: string, args: unknown): Promise<ToolExecutionResult> {
    const normalized: ToolArguments = Array.isArray(args) || isPlainObject(args) ? args : {};
    const outcome = await this.call(name, normalized);
    if (!outcome.ok) {
      return { ok: false, message: formatInvokeError(outcome.error) };
    }
    return { ok: true, data: outcome.value };
  }

  private shape(entry: RegistryEntry, args: ToolArguments): Result<unknown[], string> {
    const named = toNamed(entry.params, args);
    if (!named.ok) return named;

    const validate = this.validatorFor(entry);
    if (!validate.ok) return validate;
    if (!validate.value(named.value)) {
      return err(formatSchemaErrors(validate.value.errors));
    }
    return toPositional(entry.params, named.value);
  }

  private validatorFor(entry: RegistryEntry): Result<ValidateFunction, string> {
    const cached = this.validators.get(entry);
    if (cached) return ok(cached);
    const compiled = compileParameterSchema(entry.metadata.parameterSchema);
    if (!compiled.ok) return err(`parameter schema does not compile: ${compiled.error}`);
    this.validators.set(entry, compiled.value);
    return compiled;
  }

  private async recordUse(name: string, succeeded: boolean): Promise<void> {
    if (!this.options.metadata) return;
    try {
      await this.options.metadata.recordUse(name, succeeded);
    } catch (error) {
      this.logger.warn("Failed to record tool use", { name, error: describeError(error) });
    }
  }
}
