import uncertaintyPhrases from "./data/uncertaintyPhrases.json";

// ===========================================================================
// Response confidence
//
// Weighted heuristics over a generation reply. The score travels with the
// patch and gates replies below the configured minimum.
// ===========================================================================

export const CONFIDENCE_WEIGHTS = {
  length: 0.15,
  uncertainty: 0.3,
  syntax: 0.25,
  repetition: 0.15,
  truncation: 0.15,
} as const;

export type ConfidenceFactor = keyof typeof CONFIDENCE_WEIGHTS;

const FACTORS: readonly ConfidenceFactor[] = ["length", "uncertainty", "syntax", "repetition", "truncation"];

export type ConfidenceBreakdown = Readonly<Record<ConfidenceFactor, number>>;

export interface ConfidenceScore {
  readonly score: number;
  readonly breakdown: ConfidenceBreakdown;
}

export type ConfidenceLevel = "excellent" | "good" | "acceptable" | "uncertain" | "poor";

// ---------------------------------------------------------------------------
// Factors
// ---------------------------------------------------------------------------

function scoreLength(response: string, prompt: string): number {
  if (prompt.length > 50 && response.length < 20) return 0.2;

  const ratio = response.length / Math.max(prompt.length, 1);
  if (ratio < 0.5) return 0.3;
  if (ratio < 1) return 0.6;
  if (ratio < 2) return 0.8;
  return 1;
}

function scoreUncertainty(response: string): number {
  const lower = response.toLowerCase();
  const found = uncertaintyPhrases.filter((phrase) => lower.includes(phrase)).length;

  if (found === 0) return 1;
  if (found === 1) return 0.7;
  if (found === 2) return 0.5;
  return 0.2;
}

const CLOSERS: Readonly<Record<string, string>> = { ")": "(", "]": "[", "}": "{" };

export function bracketsBalanced(text: string): boolean {
  const stack: string[] = [];
  for (const ch of text) {
    if (ch === "(" || ch === "[" || ch === "{") {
      stack.push(ch);
    } else {
      const opener = CLOSERS[ch];
      if (opener !== undefined && stack.pop() !== opener) return false;
    }
  }
  return stack.length === 0;
}

function countOf(text: string, pattern: RegExp): number {
  return text.match(pattern)?.length ?? 0;
}

function scoreSyntax(response: string): number {
  let score = 1;
  if (!bracketsBalanced(response)) score -= 0.4;

  const functions = countOf(response, /\bfunction\s*\w*\s*\(/g);
  const ends = countOf(response, /\bend\b/g);
  const braces = countOf(response, /\{/g);
  if (functions > ends + braces + 2) score -= 0.2;

  if (countOf(response, /`/g) % 2 !== 0) score -= 0.2;
  if (countOf(response, /"/g) % 2 !== 0 && !response.includes('\\"')) score -= 0.1;
  if (countOf(response, /'/g) % 2 !== 0 && !response.includes("\\'")) score -= 0.1;

  return Math.max(0, score);
}

function scoreRepetition(response: string): number {
  const lines = response.split("\n");
  if (lines.length < 3) return 1;

  const seen = new Set<string>();
  let duplicates = 0;
  for (const line of lines) {
    const trimmed = line.trim();
    // Short lines like "}" repeat legitimately
    if (trimmed.length <= 10) continue;
    if (seen.has(trimmed)) duplicates++;
    seen.add(trimmed);
  }

  const ratio = duplicates / lines.length;
  if (ratio < 0.1) return 1;
  if (ratio < 0.2) return 0.8;
  if (ratio < 0.3) return 0.5;
  return 0.2;
}

function scoreTruncation(response: string): number {
  let score = 1;
  const trimmed = response.trim();

  if (trimmed.endsWith("...")) score -= 0.5;
  if (/\/\*[^*/]*$/.test(response)) score -= 0.4;
  if (/<!--[^>]*$/.test(response)) score -= 0.4;
  if (/[=,(]$/.test(trimmed)) score -= 0.3;

  const lines = response.split("\n");
  if (lines.length > 5) {
    const last = (lines[lines.length - 1] ?? "").trim();
    if (last.length < 5 && !/^[}\]);]|^end/.test(last)) score -= 0.2;
  }

  return Math.max(0, score);
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function scoreConfidence(response: string, prompt: string): ConfidenceScore {
  if (response.length === 0) {
    return {
      score: 0,
      breakdown: { length: 0, uncertainty: 0, syntax: 0, repetition: 0, truncation: 0 },
    };
  }

  const breakdown: ConfidenceBreakdown = {
    length: scoreLength(response, prompt),
    uncertainty: scoreUncertainty(response),
    syntax: scoreSyntax(response),
    repetition: scoreRepetition(response),
    truncation: scoreTruncation(response),
  };

  let score = 0;
  for (const factor of FACTORS) {
    score += breakdown[factor] * CONFIDENCE_WEIGHTS[factor];
  }

  return { score, breakdown };
}

export function confidenceLevel(score: number): ConfidenceLevel {
  if (score >= 0.9) return "excellent";
  if (score >= 0.8) return "good";
  if (score >= 0.7) return "acceptable";
  if (score >= 0.5) return "uncertain";
  return "poor";
}

/** e.g. `len:1.00 unc:0.70 syn:1.00 rep:1.00 tru:1.00 = 0.91` */
export function formatBreakdown({ score, breakdown }: ConfidenceScore): string {
  return (
    `len:${breakdown.length.toFixed(2)} unc:${breakdown.uncertainty.toFixed(2)} ` +
    `syn:${breakdown.syntax.toFixed(2)} rep:${breakdown.repetition.toFixed(2)} ` +
    `tru:${breakdown.truncation.toFixed(2)} = ${score.toFixed(2)}`
  );
}
