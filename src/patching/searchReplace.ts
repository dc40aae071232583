import levenshtein from "fast-levenshtein";
import type { ITextBuffer } from "./types";

// ===========================================================================
// SEARCH/REPLACE blocks
//
// Parses fine-grained edit instructions out of a generation response and
// locates each SEARCH section in the document with progressively looser
// matching strategies.
// ===========================================================================

export interface SearchReplaceBlock {
  readonly search: string;
  readonly replace: string;
}

export type MatchStrategy =
  | "exact"
  | "line_trimmed"
  | "indentation_flexible"
  | "block_anchor"
  | "whitespace_normalized";

export interface MatchResult {
  readonly startLine: number;
  readonly endLine: number;
  readonly strategy: MatchStrategy;
  readonly confidence: number;
}

export type BlockApplication =
  | { readonly success: true; readonly content: string; readonly match: MatchResult }
  | { readonly success: false; readonly error: string };

export interface BlockResult {
  readonly success: boolean;
  readonly match?: MatchResult;
  readonly error?: string;
}

export type ApplyBlocksResult =
  | { readonly success: true; readonly matches: readonly MatchResult[] }
  | { readonly success: false; readonly error: string; readonly failedBlocks: readonly number[] };

/** Where a block lands in a document and the re-indented lines that replace it. */
export interface LocatedBlock {
  readonly match: MatchResult;
  readonly replacement: string[];
}

const NOT_FOUND = "Could not find search text in file";

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

const BLOCK_PATTERNS: readonly RegExp[] = [
  // ------- SEARCH / ======= / +++++++ REPLACE
  /-{6,7}\s*SEARCH\s*\n([\s\S]*?)\n=======\s*\n([\s\S]*?)\n\+\+\+\+\+\+\+?\s*REPLACE/g,
  // <<<<<<< SEARCH / ======= / >>>>>>> REPLACE
  /<<<<<<<\s*SEARCH\s*\n([\s\S]*?)\n=======\s*\n([\s\S]*?)\n>>>>>>>\s*REPLACE/g,
  // [SEARCH] / [REPLACE] / [END]
  /\[SEARCH\]\s*\n([\s\S]*?)\n\[REPLACE\]\s*\n([\s\S]*?)\n\[END\]/g,
];

const DIFF_FENCE = /```diff\n([\s\S]*?)\n```/;

function parseDiffFence(response: string): SearchReplaceBlock | null {
  const fence = DIFF_FENCE.exec(response);
  if (!fence) return null;

  const oldLines: string[] = [];
  const newLines: string[] = [];
  for (const line of (fence[1] ?? "").split("\n")) {
    if (line === "") continue;
    if (/^-[^-]/.test(line)) {
      oldLines.push(line.slice(1));
    } else if (/^\+[^+]/.test(line)) {
      newLines.push(line.slice(1));
    } else if (/^\s/.test(line) || /^[^-+@]/.test(line)) {
      const context = line.replace(/^\s/, "");
      oldLines.push(context);
      newLines.push(context);
    }
  }

  if (oldLines.length === 0 && newLines.length === 0) return null;
  return { search: oldLines.join("\n"), replace: newLines.join("\n") };
}

/** The first format that yields any block wins. */
export function parseBlocks(response: string): SearchReplaceBlock[] {
  for (const pattern of BLOCK_PATTERNS) {
    const blocks: SearchReplaceBlock[] = [];
    for (const m of response.matchAll(pattern)) {
      blocks.push({ search: m[1] ?? "", replace: m[2] ?? "" });
    }
    if (blocks.length > 0) return blocks;
  }

  const diff = parseDiffFence(response);
  return diff ? [diff] : [];
}

export function hasBlocks(response: string): boolean {
  return parseBlocks(response).length > 0;
}

/** REPLACE halves joined by newlines, skipping empty ones. */
export function replacementText(blocks: readonly SearchReplaceBlock[]): string {
  return blocks
    .map((b) => b.replace)
    .filter((r) => r !== "")
    .join("\n");
}

// ---------------------------------------------------------------------------
// Similarity helpers
// ---------------------------------------------------------------------------

function indentationOf(line: string): string {
  return /^\s*/.exec(line)?.[0] ?? "";
}

function trimEnd(line: string): string {
  return line.replace(/\s+$/, "");
}

function normalizeWhitespace(line: string): string {
  return line.replace(/\s+/g, " ").trim();
}

/** Similarity ratio in [0, 1]. */
export function similarity(a: string, b: string): number {
  if (a === b) return 1;
  const maxLength = Math.max(a.length, b.length);
  if (maxLength === 0) return 1;
  return 1 - levenshtein.get(a, b) / maxLength;
}

// ---------------------------------------------------------------------------
// Matching strategies
// ---------------------------------------------------------------------------

type Strategy = (content: readonly string[], search: readonly string[]) => MatchResult | null;

function lineAt(lines: readonly string[], index: number): string {
  return lines[index] ?? "";
}

function matchBy(
  strategy: MatchStrategy,
  confidence: number,
  equals: (contentLine: string, searchIndex: number, windowStart: number) => boolean
): Strategy {
  return (content, search) => {
    for (let i = 0; i + search.length <= content.length; i++) {
      let matched = true;
      for (let j = 0; j < search.length; j++) {
        if (!equals(lineAt(content, i + j), j, i)) {
          matched = false;
          break;
        }
      }
      if (matched) {
        return { startLine: i + 1, endLine: i + search.length, strategy, confidence };
      }
    }
    return null;
  };
}

const exactMatch: Strategy = (content, search) =>
  matchBy("exact", 1.0, (line, j) => line === lineAt(search, j))(content, search);

const lineTrimmedMatch: Strategy = (content, search) => {
  const trimmed = search.map(trimEnd);
  return matchBy("line_trimmed", 0.95, (line, j) => trimEnd(line) === trimmed[j])(content, search);
};

const indentationFlexibleMatch: Strategy = (content, search) => {
  const searchIndent = indentationOf(search.find((l) => /\S/.test(l)) ?? "");
  const stripped = search.map((l) => (l.startsWith(searchIndent) ? l.slice(searchIndent.length) : l));

  const windowIndent = (start: number): string => {
    for (let j = 0; j < search.length; j++) {
      const line = lineAt(content, start + j);
      if (/\S/.test(line)) return indentationOf(line);
    }
    return "";
  };

  let cachedStart = -1;
  let cachedIndent = "";
  return matchBy("indentation_flexible", 0.9, (line, j, start) => {
    if (start !== cachedStart) {
      cachedStart = start;
      cachedIndent = windowIndent(start);
    }
    return trimEnd(line) === trimEnd(cachedIndent + (stripped[j] ?? ""));
  })(content, search);
};

const blockAnchorMatch: Strategy = (content, search) => {
  if (search.length < 2) return null;

  const first = trimEnd(lineAt(search, 0));
  const last = trimEnd(lineAt(search, search.length - 1));

  let best: { start: number; similarity: number } | null = null;
  for (let i = 0; i + search.length <= content.length; i++) {
    if (similarity(trimEnd(lineAt(content, i)), first) <= 0.8) continue;
    if (similarity(trimEnd(lineAt(content, i + search.length - 1)), last) <= 0.8) continue;

    let total = 0;
    for (let j = 0; j < search.length; j++) {
      total += similarity(trimEnd(lineAt(content, i + j)), trimEnd(lineAt(search, j)));
    }
    const average = total / search.length;
    if (average > 0.7 && (best === null || average > best.similarity)) {
      best = { start: i, similarity: average };
    }
  }

  if (best === null) return null;
  return {
    startLine: best.start + 1,
    endLine: best.start + search.length,
    strategy: "block_anchor",
    confidence: best.similarity * 0.85,
  };
};

const whitespaceNormalizedMatch: Strategy = (content, search) => {
  const normalized = search.map(normalizeWhitespace);
  return matchBy(
    "whitespace_normalized",
    0.8,
    (line, j) => normalizeWhitespace(line) === normalized[j]
  )(content, search);
};

const STRATEGIES: readonly Strategy[] = [
  exactMatch,
  lineTrimmedMatch,
  indentationFlexibleMatch,
  blockAnchorMatch,
  whitespaceNormalizedMatch,
];

function findMatchInLines(contentLines: readonly string[], searchText: string): MatchResult | null {
  const searchLines = searchText.split("\n");
  while (searchLines.length > 0 && /^\s*$/.test(searchLines[searchLines.length - 1] ?? "")) {
    searchLines.pop();
  }
  if (searchLines.length === 0) return null;

  for (const strategy of STRATEGIES) {
    const result = strategy(contentLines, searchLines);
    if (result) return result;
  }
  return null;
}

/** Locate `searchText` in `documentText`, strictest strategy first. */
export function findMatch(documentText: string, searchText: string): MatchResult | null {
  return findMatchInLines(documentText.split("\n"), searchText);
}

// ---------------------------------------------------------------------------
// Application
// ---------------------------------------------------------------------------

/** Re-indent `replace` so its first non-blank line sits at `targetIndent`. */
function reindent(replace: string, targetIndent: string): string[] {
  const lines = replace.split("\n");
  const replaceIndent = indentationOf(lines.find((l) => /\S/.test(l)) ?? "");

  return lines.map((line) => {
    if (/^\s*$/.test(line)) return "";
    if (line.startsWith(replaceIndent)) return targetIndent + line.slice(replaceIndent.length);
    return targetIndent + line;
  });
}

export function locateBlock(
  contentLines: readonly string[],
  block: SearchReplaceBlock
): LocatedBlock | null {
  const match = findMatchInLines(contentLines, block.search);
  if (!match) return null;
  const targetIndent = indentationOf(lineAt(contentLines, match.startLine - 1));
  return { match, replacement: reindent(block.replace, targetIndent) };
}

export function applyBlock(content: string, block: SearchReplaceBlock): BlockApplication {
  const lines = content.split("\n");
  const located = locateBlock(lines, block);
  if (!located) return { success: false, error: NOT_FOUND };

  const { match, replacement } = located;
  lines.splice(match.startLine - 1, match.endLine - match.startLine + 1, ...replacement);
  return { success: true, content: lines.join("\n"), match };
}

/** Apply blocks in order; a failed block leaves the content as it was before it. */
export function applyBlocks(
  content: string,
  blocks: readonly SearchReplaceBlock[]
): { content: string; results: BlockResult[] } {
  let current = content;
  const results: BlockResult[] = [];

  for (const block of blocks) {
    const applied = applyBlock(current, block);
    if (applied.success) {
      current = applied.content;
      results.push({ success: true, match: applied.match });
    } else {
      results.push({ success: false, error: applied.error });
    }
  }

  return { content: current, results };
}

/**
 * All-or-nothing: blocks are first applied to a copy of the text, and the
 * buffer is only touched when every block matched.
 */
export function applyToBuffer(
  buffer: ITextBuffer,
  blocks: readonly SearchReplaceBlock[]
): ApplyBlocksResult {
  if (!buffer.isValid()) {
    return { success: false, error: "Invalid buffer", failedBlocks: [] };
  }

  const { results } = applyBlocks(buffer.getText(), blocks);
  const failures: string[] = [];
  const failedBlocks: number[] = [];
  results.forEach((result, index) => {
    if (!result.success) {
      failures.push(`Block ${index + 1}: ${result.error ?? "unknown error"}`);
      failedBlocks.push(index + 1);
    }
  });

  if (failures.length > 0) {
    return { success: false, error: failures.join("; "), failedBlocks };
  }

  const matches: MatchResult[] = [];
  for (const block of blocks) {
    const located = locateBlock(buffer.getLines(), block);
    if (!located) {
      return { success: false, error: NOT_FOUND, failedBlocks: [] };
    }
    buffer.replaceLines(located.match.startLine, located.match.endLine, located.replacement);
    matches.push(located.match);
  }

  return { success: true, matches };
}
