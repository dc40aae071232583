import type { ITextBuffer, PromptRange } from "./types";

// ===========================================================================
// Prompt tags
//
// Finds `/@ ... @/` prompts in document text and removes them once their
// generated code has landed. Tags may span several lines.
// ===========================================================================

export interface TagDelimiters {
  readonly openTag: string;
  readonly closeTag: string;
}

export const DEFAULT_TAG_DELIMITERS: TagDelimiters = { openTag: "/@", closeTag: "@/" };

export interface PromptTag {
  /** Raw text between the delimiters, newline-joined for multi-line tags. */
  readonly content: string;
  /** Columns are 0-based; endCol is exclusive. */
  readonly range: PromptRange & { readonly startCol: number; readonly endCol: number };
}

/** Replacement of lines `startLine..endLine` computed by the remover. */
interface TagEdit {
  readonly startLine: number;
  readonly endLine: number;
  readonly replacement: string[];
}

// ---------------------------------------------------------------------------
// Finding
// ---------------------------------------------------------------------------

/** Unterminated open tags are skipped. */
export function findPromptTags(
  lines: readonly string[],
  delimiters: TagDelimiters = DEFAULT_TAG_DELIMITERS
): PromptTag[] {
  const { openTag, closeTag } = delimiters;
  const tags: PromptTag[] = [];

  let open: { line: number; col: number; parts: string[] } | null = null;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i] ?? "";
    const lineNumber = i + 1;

    if (open === null) {
      const openCol = line.indexOf(openTag);
      if (openCol === -1) continue;

      const afterOpen = openCol + openTag.length;
      const closeCol = line.indexOf(closeTag, afterOpen);
      if (closeCol !== -1) {
        tags.push({
          content: line.slice(afterOpen, closeCol),
          range: {
            startLine: lineNumber,
            endLine: lineNumber,
            startCol: openCol,
            endCol: closeCol + closeTag.length,
          },
        });
      } else {
        open = { line: lineNumber, col: openCol, parts: [line.slice(afterOpen)] };
      }
      continue;
    }

    const closeCol = line.indexOf(closeTag);
    if (closeCol === -1) {
      open.parts.push(line);
      continue;
    }

    open.parts.push(line.slice(0, closeCol));
    tags.push({
      content: open.parts.join("\n"),
      range: {
        startLine: open.line,
        endLine: lineNumber,
        startCol: open.col,
        endCol: closeCol + closeTag.length,
      },
    });
    open = null;
  }

  return tags;
}

// ---------------------------------------------------------------------------
// Removal
// ---------------------------------------------------------------------------

/** Remove every closed tag within one line, repeatedly. */
function stripSingleLineTags(line: string, delimiters: TagDelimiters): { text: string; count: number } {
  const { openTag, closeTag } = delimiters;
  let text = line;
  let count = 0;

  for (;;) {
    const openCol = text.indexOf(openTag);
    if (openCol === -1) break;
    const closeCol = text.indexOf(closeTag, openCol + openTag.length);
    if (closeCol === -1) break;
    text = text.slice(0, openCol) + text.slice(closeCol + closeTag.length);
    count++;
  }

  return { text, count };
}

function computeTagEdits(lines: readonly string[], delimiters: TagDelimiters): TagEdit[] {
  const { openTag, closeTag } = delimiters;
  const edits: TagEdit[] = [];

  let i = 0;
  while (i < lines.length) {
    const line = lines[i] ?? "";
    const openCol = line.indexOf(openTag);
    if (openCol === -1) {
      i++;
      continue;
    }

    const single = stripSingleLineTags(line, delimiters);
    if (single.count > 0 && single.text.indexOf(openTag) === -1) {
      edits.push({
        startLine: i + 1,
        endLine: i + 1,
        replacement: single.text.trim() === "" ? [] : [single.text],
      });
      i++;
      continue;
    }

    // Multi-line: the first unclosed open tag on this line runs to a later line.
    const remainder = single.text;
    const multiOpen = remainder.indexOf(openTag);
    let closeIndex = -1;
    for (let j = i + 1; j < lines.length; j++) {
      if ((lines[j] ?? "").includes(closeTag)) {
        closeIndex = j;
        break;
      }
    }
    if (closeIndex === -1) {
      i++;
      continue;
    }

    const closeLine = lines[closeIndex] ?? "";
    const before = remainder.slice(0, multiOpen);
    const after = closeLine.slice(closeLine.indexOf(closeTag) + closeTag.length);
    const kept = (before + after).trim();

    edits.push({
      startLine: i + 1,
      endLine: closeIndex + 1,
      replacement: kept === "" ? [] : [kept],
    });
    i = closeIndex + 1;
  }

  return edits;
}

/**
 * Single-line tags collapse to the text around them (a line left blank is
 * deleted). Multi-line tags delete every line from open to close and splice
 * the trimmed text around them back as one line when non-empty.
 */
export function removePromptTags(
  lines: readonly string[],
  delimiters: TagDelimiters = DEFAULT_TAG_DELIMITERS
): { lines: string[]; removed: number } {
  const edits = computeTagEdits(lines, delimiters);
  const result = [...lines];
  for (let k = edits.length - 1; k >= 0; k--) {
    const edit = edits[k];
    if (!edit) continue;
    result.splice(edit.startLine - 1, edit.endLine - edit.startLine + 1, ...edit.replacement);
  }
  return { lines: result, removed: edits.length };
}

/** Apply tag removal to a live buffer, bottom-up so earlier edits keep their lines. */
export function removeTagsFromBuffer(
  buffer: ITextBuffer,
  delimiters: TagDelimiters = DEFAULT_TAG_DELIMITERS
): number {
  if (!buffer.isValid()) return 0;

  const edits = computeTagEdits(buffer.getLines(), delimiters);
  for (let k = edits.length - 1; k >= 0; k--) {
    const edit = edits[k];
    if (!edit) continue;
    buffer.replaceLines(edit.startLine, edit.endLine, edit.replacement);
  }
  return edits.length;
}
