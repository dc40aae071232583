import builtinModules from "./data/builtinModules.json";

// ===========================================================================
// Import rules
//
// Per-language recognition of import statements, comment lines and import
// grouping, keyed by file extension or VS Code language id.
// ===========================================================================

export type ImportLanguage =
  | "javascript"
  | "python"
  | "lua"
  | "go"
  | "rust"
  | "c"
  | "java"
  | "ruby"
  | "php";

export type ImportCategory = "builtin" | "third_party" | "local";

interface ImportPattern {
  readonly pattern: RegExp;
  readonly multiLine: boolean;
}

const IMPORT_PATTERNS: Readonly<Record<ImportLanguage, readonly ImportPattern[]>> = {
  javascript: [
    { pattern: /^\s*import\s+.+\s+from\s+['"]/, multiLine: true },
    { pattern: /^\s*import\s+['"]/, multiLine: false },
    { pattern: /^\s*import\s*\{/, multiLine: true },
    { pattern: /^\s*import\s*\*/, multiLine: true },
    { pattern: /^\s*export\s+\{.+\}\s+from\s+['"]/, multiLine: true },
    { pattern: /^\s*(?:const|let|var)\s+\w+\s*=\s*require\(['"]/, multiLine: false },
  ],
  python: [
    { pattern: /^\s*import\s+\w/, multiLine: false },
    { pattern: /^\s*from\s+[\w.]+\s+import\s+/, multiLine: true },
  ],
  lua: [
    { pattern: /^\s*local\s+\w+\s*=\s*require\s*\(?['"]/, multiLine: false },
    { pattern: /^\s*require\s*\(?['"]/, multiLine: false },
  ],
  go: [{ pattern: /^\s*import\s+\(?/, multiLine: true }],
  rust: [
    { pattern: /^\s*use\s+/, multiLine: true },
    { pattern: /^\s*extern\s+crate\s+/, multiLine: false },
  ],
  c: [{ pattern: /^\s*#include\s*[<"]/, multiLine: false }],
  java: [{ pattern: /^\s*import\s+/, multiLine: false }],
  ruby: [
    { pattern: /^\s*require\s+['"]/, multiLine: false },
    { pattern: /^\s*require_relative\s+['"]/, multiLine: false },
  ],
  php: [
    { pattern: /^\s*use\s+/, multiLine: false },
    { pattern: /^\s*(?:require|require_once|include|include_once)\s+['"]/, multiLine: false },
  ],
};

const COMMENT_PATTERNS: Readonly<Record<ImportLanguage, readonly RegExp[]>> = {
  javascript: [/^\/\//, /^\/\*/, /^\*/],
  python: [/^#/],
  lua: [/^--/],
  go: [/^\/\//, /^\/\*/, /^\*/],
  rust: [/^\/\//, /^\/\*/, /^\*/],
  c: [/^\/\//, /^\/\*/, /^\*/, /^#(?!include)/],
  java: [/^\/\//, /^\/\*/, /^\*/],
  ruby: [/^#/],
  php: [/^\/\//, /^\/\*/, /^\*/, /^#/],
};

const LANGUAGE_ALIASES: Readonly<Record<string, ImportLanguage>> = {
  javascript: "javascript",
  javascriptreact: "javascript",
  typescript: "javascript",
  typescriptreact: "javascript",
  js: "javascript",
  jsx: "javascript",
  ts: "javascript",
  tsx: "javascript",
  mjs: "javascript",
  cjs: "javascript",
  mts: "javascript",
  cts: "javascript",
  python: "python",
  py: "python",
  lua: "lua",
  go: "go",
  rust: "rust",
  rs: "rust",
  c: "c",
  h: "c",
  cpp: "c",
  hpp: "c",
  java: "java",
  kotlin: "java",
  kt: "java",
  ruby: "ruby",
  rb: "ruby",
  php: "php",
};

const BUILTINS: Readonly<Record<string, ReadonlySet<string>>> = Object.fromEntries(
  Object.entries(builtinModules).map(([language, names]) => [language, new Set(names)])
);

/** Unknown file types use the JavaScript rules. */
export function resolveImportLanguage(filetype: string): ImportLanguage {
  return LANGUAGE_ALIASES[filetype.toLowerCase()] ?? "javascript";
}

export function matchImport(
  line: string,
  language: ImportLanguage
): { isImport: boolean; multiLine: boolean } {
  for (const p of IMPORT_PATTERNS[language]) {
    if (p.pattern.test(line)) return { isImport: true, multiLine: p.multiLine };
  }
  return { isImport: false, multiLine: false };
}

/**
 * Whether `line` closes an import statement. `opening` is true for the line
 * the statement starts on.
 */
export function endsImport(line: string, language: ImportLanguage, opening: boolean): boolean {
  switch (language) {
    case "javascript":
      return /['"]\s*\)?\s*;?\s*$/.test(line);
    case "python":
    case "go":
      return opening ? !line.includes("(") || line.includes(")") : line.includes(")");
    case "rust":
      return line.trimEnd().endsWith(";");
    default:
      return true;
  }
}

export function isEmptyOrComment(line: string, language: ImportLanguage): boolean {
  const trimmed = line.trim();
  if (trimmed === "") return true;
  return COMMENT_PATTERNS[language].some((p) => p.test(trimmed));
}

function moduleSpecifier(statement: string, language: ImportLanguage): string {
  switch (language) {
    case "python": {
      const m = /^\s*(?:from|import)\s+([\w.]+)/.exec(statement);
      return m?.[1] ?? "";
    }
    case "rust": {
      const m = /^\s*(?:use|extern\s+crate)\s+([\w:]+)/.exec(statement);
      return m?.[1] ?? "";
    }
    case "c":
      return statement.includes("<") ? "<" : "\"";
    default: {
      const m = /['"]([^'"]+)['"]/.exec(statement);
      return m?.[1] ?? "";
    }
  }
}

function isBuiltin(language: ImportLanguage, name: string): boolean {
  return BUILTINS[language]?.has(name) ?? false;
}

/** Group an import statement for sorting: builtin, third-party or local. */
export function classifyImport(statement: string, language: ImportLanguage): ImportCategory {
  const spec = moduleSpecifier(statement, language);

  switch (language) {
    case "javascript":
      if (spec.startsWith(".") || spec.startsWith("/") || spec.startsWith("@/") || spec.startsWith("~/")) {
        return "local";
      }
      if (spec.startsWith("node:") || isBuiltin("javascript", spec)) return "builtin";
      return "third_party";
    case "python": {
      if (spec.startsWith(".")) return "local";
      return isBuiltin("python", spec.split(".")[0] ?? "") ? "builtin" : "third_party";
    }
    case "go":
      return spec.split("/")[0]?.includes(".") ? "third_party" : "builtin";
    case "rust": {
      const root = spec.split("::")[0] ?? "";
      if (root === "crate" || root === "self" || root === "super") return "local";
      return isBuiltin("rust", root) ? "builtin" : "third_party";
    }
    case "c":
      return spec === "<" ? "builtin" : "local";
    case "lua":
    case "ruby":
      if (spec.startsWith(".") || /require_relative/.test(statement)) return "local";
      return isBuiltin(language, spec) ? "builtin" : "third_party";
    default:
      return "third_party";
  }
}
