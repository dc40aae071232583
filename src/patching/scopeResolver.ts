import type { IScopeResolver, ITextBuffer, ScopeInfo, ScopeType } from "./types";

// ===========================================================================
// Heuristic scope resolver
//
// Finds the function or class enclosing a line by walking up to the nearest
// header and then scanning down for its end: brace balancing for C-like
// languages, `end` keywords for Lua, indentation for Python.
// ===========================================================================

type EndRule = "braces" | "lua_end" | "indentation";

interface HeaderPattern {
  readonly pattern: RegExp;
  readonly type: ScopeType;
}

interface LanguageRules {
  readonly headers: readonly HeaderPattern[];
  readonly end: EndRule;
}

const CONTROL_KEYWORDS = new Set(["if", "for", "while", "switch", "catch", "with", "return"]);

const JS_RULES: LanguageRules = {
  headers: [
    { pattern: /^\s*(?:export\s+)?(?:default\s+)?(?:abstract\s+)?class\s+(\w+)/, type: "class" },
    { pattern: /^\s*(?:export\s+)?(?:default\s+)?(?:async\s+)?function\s*\*?\s*(\w+)/, type: "function" },
    {
      pattern:
        /^\s*(?:export\s+)?(?:const|let|var)\s+(\w+)\s*(?::[^=]+)?=\s*(?:async\s+)?(?:function\b|\([^)]*\)\s*(?::[^=]+)?=>|\w+\s*=>)/,
      type: "function",
    },
    {
      pattern:
        /^\s*(?:(?:public|private|protected|static|async|override|readonly)\s+)*\*?\s*(\w+)\s*(?:<[^>]*>)?\s*\([^)]*\)\s*(?::\s*[^{]+)?\{\s*$/,
      type: "function",
    },
  ],
  end: "braces",
};

const RULES: Readonly<Record<string, LanguageRules>> = {
  javascript: JS_RULES,
  javascriptreact: JS_RULES,
  typescript: JS_RULES,
  typescriptreact: JS_RULES,
  python: {
    headers: [
      { pattern: /^\s*class\s+(\w+)/, type: "class" },
      { pattern: /^\s*(?:async\s+)?def\s+(\w+)/, type: "function" },
    ],
    end: "indentation",
  },
  lua: {
    headers: [
      { pattern: /^\s*local\s+function\s+([\w.:]+)/, type: "function" },
      { pattern: /^\s*function\s+([\w.:]+)/, type: "function" },
    ],
    end: "lua_end",
  },
};

function matchHeader(line: string, rules: LanguageRules): { type: ScopeType; name: string } | null {
  for (const header of rules.headers) {
    const m = header.pattern.exec(line);
    const name = m?.[1];
    if (name === undefined || CONTROL_KEYWORDS.has(name)) continue;
    return { type: header.type, name };
  }
  return null;
}

function indentWidth(line: string): number {
  return /^\s*/.exec(line)?.[0].length ?? 0;
}

function findEnd(lines: readonly string[], start: number, rule: EndRule): number {
  const last = lines.length;

  if (rule === "indentation") {
    const base = indentWidth(lines[start - 1] ?? "");
    for (let i = start + 1; i <= last; i++) {
      const line = lines[i - 1] ?? "";
      if (/^\s*$/.test(line)) continue;
      if (indentWidth(line) <= base) return i - 1;
    }
    return last;
  }

  let depth = 0;
  for (let i = start; i <= last; i++) {
    const line = lines[i - 1] ?? "";
    if (rule === "lua_end") {
      if (/\b(?:function|if|for|while)\b/.test(line)) depth++;
      if (/^\s*end\b/.test(line) && --depth <= 0) return i;
    } else {
      let opened = false;
      for (const ch of line) {
        if (ch === "{") {
          depth++;
          opened = true;
        } else if (ch === "}") {
          depth--;
        }
      }
      if (depth <= 0 && (i > start || opened)) return i;
    }
  }
  return last;
}

export class HeuristicScopeResolver implements IScopeResolver {
  resolve(buffer: ITextBuffer, approximateLine: number): ScopeInfo | null {
    const rules = RULES[buffer.languageId];
    if (!rules || !buffer.isValid()) return null;

    const lines = buffer.getLines();
    const from = Math.min(approximateLine, lines.length);

    for (let i = from; i >= 1; i--) {
      const header = matchHeader(lines[i - 1] ?? "", rules);
      if (!header) continue;

      const endLine = findEnd(lines, i, rules.end);
      if (endLine >= approximateLine) {
        return { type: header.type, name: header.name, startLine: i, endLine };
      }
    }

    return null;
  }
}
