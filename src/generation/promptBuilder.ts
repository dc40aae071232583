import { getPromptModifier } from "../intelligence/intentClassifier";
import type { Intent } from "../intelligence/types";
import { hasBlocks } from "../patching/searchReplace";
import type { PromptEvent } from "../patching/types";
import type { GenerationContext } from "./types";

// ===========================================================================
// Prompt builder
//
// Turns a prompt event into the instruction sent to the language model, and
// cleans the model's reply back into injectable code.
// ===========================================================================

/**
 * - `inline`: the tag sits in the target file and its lines are replaced.
 * - `companion`: the tag sits in a companion file; the reply edits the
 *   target with SEARCH/REPLACE blocks.
 */
export type PromptMode = "inline" | "companion";

const MAX_FILE_CHARS = 8000;

const SEARCH_REPLACE_INSTRUCTIONS = `Respond ONLY with SEARCH/REPLACE blocks:

<<<<<<< SEARCH
[exact lines from the file, including indentation]
=======
[lines that replace them]
>>>>>>> REPLACE

Rules:
1. SEARCH must copy existing lines exactly.
2. Include 2-3 lines of context so the location is unique.
3. Use one block per separate change.
4. Keep the file's indentation style.`;

function fence(language: string, body: string): string {
  return "```" + language + "\n" + body + "\n```";
}

function truncate(text: string): string {
  return text.length > MAX_FILE_CHARS ? text.slice(0, MAX_FILE_CHARS) : text;
}

/** File content with the lines to replace wrapped in region markers. */
export function markRegion(lines: readonly string[], startLine: number, endLine: number, request: string): string {
  const out: string[] = [];
  lines.forEach((line, index) => {
    const lineNumber = index + 1;
    if (lineNumber === startLine) {
      out.push(`>>> REPLACE THIS REGION (lines ${startLine}-${endLine}) <<<`);
      out.push(`--- User request: ${request.replace(/\n/g, " ").slice(0, 100)} ---`);
    }
    out.push(line);
    if (lineNumber === endLine) out.push(">>> END OF REGION TO REPLACE <<<");
  });
  return out.join("\n");
}

export function buildGenerationPrompt(
  event: PromptEvent,
  intent: Intent,
  context: GenerationContext,
  mode: PromptMode
): string {
  const sections: string[] = [getPromptModifier(intent)];
  const lines = context.fileContent.split("\n");
  const language = context.language;

  if (mode === "companion") {
    sections.push(
      `You are editing ${context.filePath}.`,
      `TASK: ${event.prompt}`,
      `FULL FILE CONTENT:\n${fence(language, truncate(context.fileContent))}`,
      SEARCH_REPLACE_INSTRUCTIONS
    );
    return sections.join("\n\n");
  }

  const target = event.injectionRange ?? event.range;

  if (event.intentOverride?.action === "insert") {
    sections.push(
      `File: ${context.filePath}`,
      fence(language, truncate(context.fileContent)),
      `User request: ${event.prompt}`,
      `Output only the code to insert at line ${target.startLine}. Do not repeat existing code.`
    );
    return sections.join("\n\n");
  }

  if (event.scope && event.scopeRange) {
    const scopeText = lines.slice(event.scopeRange.startLine - 1, event.scopeRange.endLine).join("\n");
    sections.push(`Context: this code is inside the ${event.scope.type} "${event.scope.name}":\n${fence(language, scopeText)}`);
  }

  sections.push(
    `File: ${context.filePath}`,
    fence(language, truncate(markRegion(lines, target.startLine, target.endLine, event.prompt))),
    `User request: ${event.prompt}`,
    `Return ONLY the code that replaces lines ${target.startLine}-${target.endLine}. No explanations.`
  );
  return sections.join("\n\n");
}

// ---------------------------------------------------------------------------
// Response cleanup
// ---------------------------------------------------------------------------

const SPECIAL_TOKENS = /<\|im_start\|>|<\|im_end\|>|<\|endoftext\|>|<s>|<\/s>/g;
const ECHOED_TAGS = /\/@[\s\S]*?@\//g;
const FENCED_BLOCK = /```[\w+-]*[ \t]*\n([\s\S]*?)\n?```/;
const PREAMBLE = /^(?:here is|here's|sure|certainly|ok|okay|based on)[^\n]*:\s*\n/i;

function trimBlankLines(text: string): string {
  return text.replace(/^(?:[ \t]*\r?\n)+/, "").trimEnd();
}

/**
 * Code from a model reply: drops special tokens and echoed prompt tags, then
 * takes the first fenced block when there is one. SEARCH/REPLACE replies
 * are kept whole.
 */
export function extractCode(response: string): string {
  const cleaned = response.replace(SPECIAL_TOKENS, "").replace(ECHOED_TAGS, "");

  if (hasBlocks(cleaned)) return cleaned.trim();

  const fenced = FENCED_BLOCK.exec(cleaned);
  if (fenced?.[1] !== undefined) return trimBlankLines(fenced[1]);

  return trimBlankLines(cleaned.replace(PREAMBLE, ""));
}
