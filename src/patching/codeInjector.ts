import {
  classifyImport,
  endsImport,
  isEmptyOrComment,
  matchImport,
  resolveImportLanguage,
  type ImportLanguage,
} from "./importRules";
import type { ICodeInjector, InjectOptions, InjectResult, ITextBuffer, LineRange } from "./types";

// ===========================================================================
// Code injector
//
// Writes generated code into a buffer. Import statements in the code are
// merged into the target's import section; the remaining body lands at the
// requested range.
// ===========================================================================

export interface ParsedCode {
  /** Complete statements; multi-line imports are newline-joined. */
  readonly imports: string[];
  readonly body: string[];
}

/** Blank or comment lines tolerated between imports of one section. */
const MAX_IMPORT_GAP = 3;

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

export function parseCode(code: string | readonly string[], filetype: string): ParsedCode {
  const lines = typeof code === "string" ? code.split("\n") : code;
  const language = resolveImportLanguage(filetype);

  const imports: string[] = [];
  const body: string[] = [];
  let pending: string[] | null = null;

  for (const line of lines) {
    if (pending) {
      pending.push(line);
      if (endsImport(line, language, false)) {
        imports.push(pending.join("\n"));
        pending = null;
      }
      continue;
    }

    const { isImport, multiLine } = matchImport(line, language);
    if (!isImport) {
      body.push(line);
    } else if (multiLine && !endsImport(line, language, true)) {
      pending = [line];
    } else {
      imports.push(line);
    }
  }

  if (pending) imports.push(pending.join("\n"));

  return { imports, body };
}

/** The import section of a document, or `null` when it has none. */
export function findImportSection(lines: readonly string[], filetype: string): LineRange | null {
  const language = resolveImportLanguage(filetype);

  let first: number | null = null;
  let last: number | null = null;
  let inMultiLine = false;
  let gap = 0;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i] ?? "";
    const lineNumber = i + 1;

    if (inMultiLine) {
      last = lineNumber;
      gap = 0;
      if (endsImport(line, language, false)) inMultiLine = false;
      continue;
    }

    const { isImport, multiLine } = matchImport(line, language);
    if (isImport) {
      first ??= lineNumber;
      last = lineNumber;
      gap = 0;
      if (multiLine && !endsImport(line, language, true)) inMultiLine = true;
    } else if (isEmptyOrComment(line, language)) {
      if (first !== null && ++gap > MAX_IMPORT_GAP) break;
    } else if (first !== null) {
      break;
    }
  }

  if (first === null || last === null) return null;
  return { startLine: first, endLine: last };
}

// ---------------------------------------------------------------------------
// Merging and sorting
// ---------------------------------------------------------------------------

function normalizeImport(statement: string): string {
  return statement
    .replace(/;\s*$/, "")
    .replace(/\s*\{\s*/g, "{")
    .replace(/\s*\}\s*/g, "}")
    .replace(/\s*,\s*/g, ",")
    .replace(/\s*:\s*/g, ":")
    .replace(/\s+/g, " ")
    .trim();
}

/** Existing imports first, then new ones; duplicates compared on a normalized key. */
export function mergeImports(existing: readonly string[], incoming: readonly string[]): string[] {
  const seen = new Set<string>();
  const merged: string[] = [];
  for (const statement of [...existing, ...incoming]) {
    const key = normalizeImport(statement);
    if (seen.has(key)) continue;
    seen.add(key);
    merged.push(statement);
  }
  return merged;
}

/** Builtin, third-party and local groups, each sorted, separated by a blank line. */
export function sortImports(imports: readonly string[], filetype: string): string[] {
  const language: ImportLanguage = resolveImportLanguage(filetype);
  const groups: Record<"builtin" | "third_party" | "local", string[]> = {
    builtin: [],
    third_party: [],
    local: [],
  };

  for (const statement of imports) {
    groups[classifyImport(statement, language)].push(statement);
  }

  const result: string[] = [];
  for (const group of [groups.builtin, groups.third_party, groups.local]) {
    if (group.length === 0) continue;
    if (result.length > 0) result.push("");
    result.push(...[...group].sort());
  }
  return result;
}

function toLines(statements: readonly string[]): string[] {
  return statements.flatMap((s) => s.split("\n"));
}

// ---------------------------------------------------------------------------
// Injection
// ---------------------------------------------------------------------------

/** First line after any shebang, docstring opener or leading comments. */
function headerInsertionPoint(lines: readonly string[], language: ImportLanguage): number {
  let insertAt = 0;
  for (let i = 0; i < lines.length; i++) {
    const trimmed = (lines[i] ?? "").trim();
    if (
      trimmed !== "" &&
      !trimmed.startsWith("#!") &&
      !/^['"]/.test(trimmed) &&
      !isEmptyOrComment(trimmed, language)
    ) {
      return i;
    }
    insertAt = i + 1;
  }
  return insertAt;
}

function shiftRange(range: LineRange | undefined, below: number, delta: number): LineRange | undefined {
  if (!range || delta === 0 || range.startLine <= below) return range;
  return { startLine: range.startLine + delta, endLine: range.endLine + delta };
}

export class SmartCodeInjector implements ICodeInjector {
  inject(buffer: ITextBuffer, code: string, options: InjectOptions): InjectResult {
    if (!buffer.isValid()) {
      return { importsAdded: 0, importsMerged: false, bodyLines: 0 };
    }

    const { filetype } = options;
    const language = resolveImportLanguage(filetype);
    const parsed = parseCode(code, filetype);

    let range = options.range;
    let importsAdded = 0;
    let importsMerged = false;

    if (parsed.imports.length > 0) {
      const lines = buffer.getLines();
      const section = findImportSection(lines, filetype);

      if (section) {
        const existing = parseCode(lines.slice(section.startLine - 1, section.endLine), filetype).imports;
        let merged = mergeImports(existing, parsed.imports);
        importsAdded = merged.length - existing.length;
        importsMerged = true;
        if (options.sortImports) merged = sortImports(merged, filetype);

        const importLines = toLines(merged);
        buffer.replaceLines(section.startLine, section.endLine, importLines);
        const delta = importLines.length - (section.endLine - section.startLine + 1);
        range = shiftRange(range, section.endLine, delta);
      } else {
        const insertAt = headerInsertionPoint(lines, language);
        const importLines = [...toLines(parsed.imports), ""];
        buffer.replaceLines(insertAt + 1, insertAt, importLines);
        importsAdded = parsed.imports.length;
        range = shiftRange(range, insertAt, importLines.length);
      }
    }

    const body = [...parsed.body];
    while (body.length > 0 && /^\s*$/.test(body[0] ?? "")) body.shift();
    while (body.length > 0 && /^\s*$/.test(body[body.length - 1] ?? "")) body.pop();

    if (body.length === 0) {
      return { importsAdded, importsMerged, bodyLines: 0 };
    }

    const lineCount = buffer.getLineCount();

    if (options.strategy === "replace" && range) {
      const start = Math.min(lineCount, Math.max(1, range.startLine));
      const end = Math.max(start, Math.min(lineCount, range.endLine));
      buffer.replaceLines(start, end, body);
    } else if (options.strategy === "insert" && range) {
      const before = Math.max(0, Math.min(lineCount, range.startLine - 1));
      buffer.replaceLines(before + 1, before, body);
    } else {
      const lastLine = buffer.getLines(lineCount, lineCount)[0] ?? "";
      if (/\S/.test(lastLine)) body.unshift("");
      buffer.replaceLines(lineCount + 1, lineCount, body);
    }

    return { importsAdded, importsMerged, bodyLines: body.length };
  }
}
