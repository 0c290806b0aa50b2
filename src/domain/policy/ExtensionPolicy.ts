export interface ExtensionPolicy {
  /** Module roots a tool may import from. */
  allowedImports: readonly string[];
  maxSourceChars: number;
  maxSourceLines: number;
}

export const DEFAULT_ALLOWED_IMPORTS = ["lodash", "date-fns"] as const;

export const DEFAULT_POLICY: ExtensionPolicy = {
  allowedImports: DEFAULT_ALLOWED_IMPORTS,
  maxSourceChars: 8000,
  maxSourceLines: 300,
};

/** Context global the loader uses to pass call arguments; no tool may bind or read it. */
export const SANDBOX_ARGS_SLOT = "__toolArgs__";

// Globals that evaluate code, load modules, open external resources or reach the host.
export const FORBIDDEN_GLOBALS: ReadonlySet<string> = new Set([
  "eval",
  "Function",
  "require",
  "module",
  "exports",
  "process",
  "globalThis",
  "open",
  "fetch",
  "WebSocket",
  "XMLHttpRequest",
  "Worker",
]);

// Method names that open files, sockets or processes, whatever the receiver.
export const FORBIDDEN_MEMBER_CALLS: ReadonlySet<string> = new Set([
  "open",
  "openSync",
  "readFile",
  "readFileSync",
  "writeFile",
  "writeFileSync",
  "appendFile",
  "appendFileSync",
  "createReadStream",
  "createWriteStream",
  "spawn",
  "spawnSync",
  "exec",
  "execSync",
  "execFile",
  "fork",
  "connect",
  "createConnection",
]);

/**
 * Root of a module specifier: `lodash/fp` -> `lodash`, `@scope/pkg/x` -> `@scope/pkg`.
 * Relative and absolute paths have no root.
 */
export function moduleRoot(specifier: string): string | null {
  if (!specifier || specifier.startsWith(".") || specifier.startsWith("/")) return null;
  const segments = specifier.split("/");
  if (specifier.startsWith("@")) {
    return segments.length >= 2 && segments[1] ? `${segments[0]}/${segments[1]}` : null;
  }
  return segments[0];
}

export function isAllowedImport(policy: ExtensionPolicy, specifier: string): boolean {
  const root = moduleRoot(specifier);
  return root !== null && policy.allowedImports.includes(root);
}
