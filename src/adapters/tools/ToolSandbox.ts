import vm from "vm";
import generate from "@babel/generator";
import * as t from "@babel/types";
import type { ParsedTool } from "../../domain/policy/PolicyValidator";
import { SANDBOX_ARGS_SLOT } from "../../domain/policy/ExtensionPolicy";
import type { ToolCallable } from "../../domain/tools/types";

/** Supplies the value of an allow-listed import. Throws when unavailable. */
export type ModuleResolver = (specifier: string) => unknown;

export const nodeModuleResolver: ModuleResolver = (specifier) => require(specifier);

function interopDefault(mod: unknown): unknown {
  if (typeof mod === "object" && mod !== null && "__esModule" in mod && "default" in mod) {
    return mod.default;
  }
  return mod;
}

function readExport(mod: unknown, exported: string): unknown {
  if (exported === "default") return interopDefault(mod);
  if ((typeof mod === "object" && mod !== null) || typeof mod === "function") {
    const value: unknown = Reflect.get(mod, exported);
    return value;
  }
  return undefined;
}

function bindImports(
  sandbox: Record<string, unknown>,
  imports: readonly t.ImportDeclaration[],
  resolve: ModuleResolver
): void {
  for (const declaration of imports) {
    const mod = resolve(declaration.source.value);
    for (const specifier of declaration.specifiers) {
      if (t.isImportDefaultSpecifier(specifier)) {
        sandbox[specifier.local.name] = interopDefault(mod);
      } else if (t.isImportNamespaceSpecifier(specifier)) {
        sandbox[specifier.local.name] = mod;
      } else {
        const exported = t.isIdentifier(specifier.imported)
          ? specifier.imported.name
          : specifier.imported.value;
        sandbox[specifier.local.name] = readExport(mod, exported);
      }
    }
  }
}

/**
 * Compiles a validated tool into its own `vm` context. Imports become context
 * globals resolved by the host; string code generation is disabled inside.
 */
export function compileTool(name: string, tool: ParsedTool, resolve: ModuleResolver): ToolCallable {
  const sandbox: Record<string, unknown> = {};
  bindImports(sandbox, tool.imports, resolve);

  const context = vm.createContext(sandbox, {
    name: `tool:${name}`,
    codeGeneration: { strings: false, wasm: false },
  });
  new vm.Script(generate(tool.definition).code, { filename: `tool_${name}.js` }).runInContext(context);
  if (typeof sandbox[name] !== "function") {
    throw new Error(`"${name}" did not evaluate to a function`);
  }

  const call = new vm.Script(`${name}.apply(undefined, ${SANDBOX_ARGS_SLOT})`, {
    filename: `tool_${name}.call.js`,
  });

  return (args, options) => {
    sandbox[SANDBOX_ARGS_SLOT] = [...args];
    try {
      const result: unknown = call.runInContext(context, { timeout: options?.timeoutMs });
      return result;
    } finally {
      delete sandbox[SANDBOX_ARGS_SLOT];
    }
  };
}
