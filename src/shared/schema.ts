import Ajv, { type AnySchema, type ErrorObject, type ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import { describeError, err, ok, type Result } from "./result";

// Single instance so compiled validators share one schema cache.
const ajv = new Ajv({
  allErrors: true,
  strict: false,
});
addFormats(ajv);

export function compileSchema<T = unknown>(schema: AnySchema): Result<ValidateFunction<T>, string> {
  try {
    return ok(ajv.compile<T>(schema));
  } catch (error) {
    return err(describeError(error));
  }
}

// Tool parameter schemas come from proposals. They get their own instance that
// registers no `$id` and keeps nothing in its cache once compiled.
const parameterAjv = new Ajv({
  allErrors: true,
  strict: false,
  addUsedSchema: false,
});
addFormats(parameterAjv);

export function compileParameterSchema(schema: AnySchema): Result<ValidateFunction, string> {
  try {
    return ok(parameterAjv.compile(schema));
  } catch (error) {
    return err(describeError(error));
  } finally {
    parameterAjv.removeSchema(schema);
  }
}

export function formatSchemaErrors(errors: ErrorObject[] | null | undefined): string {
  if (!errors || errors.length === 0) return "unknown validation error";
  return errors
    .map((error) => {
      const missing = error.params["missingProperty"];
      const location = error.instancePath
        ? error.instancePath.substring(1)
        : typeof missing === "string"
          ? missing
          : "root";
      return `${location}: ${error.message ?? "invalid"}`;
    })
    .join("; ");
}
