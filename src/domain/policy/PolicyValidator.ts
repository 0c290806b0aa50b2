import { parse, type ParseResult } from "@babel/parser";
import traverse, { type NodePath } from "@babel/traverse";
import generate from "@babel/generator";
import * as t from "@babel/types";
import type { Rejection } from "../tools/errors";
import type { ToolParameter } from "../tools/types";
import {
  DEFAULT_POLICY,
  FORBIDDEN_GLOBALS,
  FORBIDDEN_MEMBER_CALLS,
  SANDBOX_ARGS_SLOT,
  isAllowedImport,
  type ExtensionPolicy,
} from "./ExtensionPolicy";
import { attachTag } from "./dynamicToolTag";
import { describeError } from "../../shared/result";

export type ValidationVerdict =
  | {
      status: "accepted";
      declaredName: string;
      /** Tagged source ready to persist. */
      canonicalSource: string;
      params: ToolParameter[];
    }
  | { status: "rejected"; rejection: Rejection };

export interface ParsedTool {
  imports: t.ImportDeclaration[];
  definition: t.FunctionDeclaration;
  params: ToolParameter[];
}

export type Inspection = { ok: true; tool: ParsedTool } | { ok: false; rejection: Rejection };

const reject = (rejection: Rejection): Inspection => ({ ok: false, rejection });

export function parseSource(source: string): ParseResult<t.File> {
  return parse(source, {
    sourceType: "module",
    // Sloppy mode so `with` parses and is reported as a construct, not a syntax error.
    strictMode: false,
    plugins: ["explicitResourceManagement"],
  });
}

/**
 * Structural allow-list gate for generated tool source. Never executes the
 * source: every rule is checked on the parsed tree.
 */
export class PolicyValidator {
  constructor(private readonly policy: ExtensionPolicy = DEFAULT_POLICY) {}

  validate(source: string, declaredName: string): ValidationVerdict {
    const inspection = this.inspect(source, declaredName);
    if (!inspection.ok) {
      return { status: "rejected", rejection: inspection.rejection };
    }

    const { imports, definition, params } = inspection.tool;
    const program = t.program([...imports, definition]);
    const body = `${generate(program).code}\n`;
    return {
      status: "accepted",
      declaredName,
      canonicalSource: attachTag(declaredName, body),
      params,
    };
  }

  /** Runs every rule and hands back the parsed pieces of an acceptable tool. */
  inspect(source: string, declaredName: string): Inspection {
    const normalized = source.replace(/\r\n/g, "\n");
    if (normalized.length > this.policy.maxSourceChars) {
      return reject({
        code: "SourceTooLarge",
        detail: `${normalized.length} characters exceeds ${this.policy.maxSourceChars}`,
      });
    }
    const lineCount = normalized.split("\n").length;
    if (lineCount > this.policy.maxSourceLines) {
      return reject({
        code: "SourceTooLarge",
        detail: `${lineCount} lines exceeds ${this.policy.maxSourceLines}`,
      });
    }

    let ast: ParseResult<t.File>;
    try {
      ast = parseSource(normalized);
    } catch (error) {
      return reject({ code: "SyntaxInvalid", detail: describeError(error) });
    }

    const imports: t.ImportDeclaration[] = [];
    const definitions: t.FunctionDeclaration[] = [];
    const strays: t.Statement[] = [];
    for (const statement of ast.program.body) {
      const definition = topLevelFunction(statement);
      if (definition) {
        definitions.push(definition);
      } else if (t.isImportDeclaration(statement)) {
        imports.push(statement);
      } else if (!t.isEmptyStatement(statement)) {
        strays.push(statement);
      }
    }

    if (definitions.length !== 1) {
      return reject({
        code: "MultipleOrZeroDefinitions",
        detail: `expected exactly one top-level function, found ${definitions.length}`,
      });
    }
    if (strays.length > 0) {
      return reject({
        code: "UnexpectedTopLevelStatement",
        detail: `only imports and the tool function may appear at top level; found ${strays[0].type}`,
      });
    }

    const definition = definitions[0];
    const definedName = definition.id?.name ?? "";
    if (definedName !== declaredName) {
      return reject({
        code: "NameMismatch",
        detail: `declared "${declaredName}" but source defines "${definedName}"`,
      });
    }

    const construct = findForbiddenConstruct(ast);
    if (construct) {
      return reject({
        code: "ForbiddenConstruct",
        construct,
        detail: `"${construct}" is not permitted in a tool`,
      });
    }

    for (const declaration of imports) {
      const specifier = declaration.source.value;
      if (!isAllowedImport(this.policy, specifier)) {
        return reject({
          code: "DisallowedImport",
          module: specifier,
          detail: `"${specifier}" is not in the import allow-list (${this.policy.allowedImports.join(", ")})`,
        });
      }
    }

    return { ok: true, tool: { imports, definition: unexported(definition), params: readParams(definition) } };
  }
}

function topLevelFunction(statement: t.Statement): t.FunctionDeclaration | null {
  if (t.isFunctionDeclaration(statement)) return statement;
  if (t.isExportNamedDeclaration(statement) && t.isFunctionDeclaration(statement.declaration)) {
    return statement.declaration;
  }
  if (t.isExportDefaultDeclaration(statement) && t.isFunctionDeclaration(statement.declaration)) {
    return statement.declaration;
  }
  return null;
}

// Artifacts are scripts, not modules: the loader binds the function by name.
function unexported(definition: t.FunctionDeclaration): t.FunctionDeclaration {
  const plain = t.functionDeclaration(definition.id, definition.params, definition.body);
  t.inheritsComments(plain, definition);
  return plain;
}

function readParams(definition: t.FunctionDeclaration): ToolParameter[] {
  return definition.params.map((param, index) => {
    if (t.isIdentifier(param)) {
      return { name: param.name, optional: Boolean(param.optional), rest: false };
    }
    if (t.isAssignmentPattern(param) && t.isIdentifier(param.left)) {
      return { name: param.left.name, optional: true, rest: false };
    }
    if (t.isRestElement(param) && t.isIdentifier(param.argument)) {
      return { name: param.argument.name, optional: true, rest: true };
    }
    return { name: `arg${index}`, optional: t.isAssignmentPattern(param), rest: t.isRestElement(param) };
  });
}

function memberName(node: t.Expression | t.PrivateName, computed: boolean): string | null {
  if (!computed && t.isIdentifier(node)) return node.name;
  if (t.isStringLiteral(node)) return node.value;
  return null;
}

function findForbiddenConstruct(ast: ParseResult<t.File>): string | null {
  let found: string | null = null;
  const flag = (path: Pick<NodePath, "stop">, construct: string) => {
    if (found === null) found = construct;
    path.stop();
  };

  traverse(ast, {
    "ClassDeclaration|ClassExpression"(path) {
      flag(path, "class");
    },
    WithStatement(path) {
      flag(path, "with");
    },
    TryStatement(path) {
      flag(path, "try");
    },
    VariableDeclaration(path) {
      if (path.node.kind === "using" || path.node.kind === "await using") {
        flag(path, "using");
      }
    },
    Function(path) {
      if (path.node.async) flag(path, "async");
      else if (path.node.generator) flag(path, "generator");
    },
    MetaProperty(path) {
      if (path.node.meta.name === "import") flag(path, "import.meta");
    },
    Identifier(path) {
      const { name } = path.node;
      if (name === SANDBOX_ARGS_SLOT) {
        flag(path, name);
        return;
      }
      if (FORBIDDEN_GLOBALS.has(name) && path.isReferencedIdentifier() && !path.scope.getBinding(name)) {
        flag(path, name);
      }
    },
    CallExpression(path) {
      const { callee } = path.node;
      if (t.isImport(callee)) {
        flag(path, "import()");
        return;
      }
      if (t.isMemberExpression(callee) || t.isOptionalMemberExpression(callee)) {
        const method = memberName(callee.property, callee.computed);
        if (method && FORBIDDEN_MEMBER_CALLS.has(method)) flag(path, method);
      }
    },
  });

  return found;
}
