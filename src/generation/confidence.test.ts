import { describe, it, expect } from "vitest";
import { bracketsBalanced, confidenceLevel, formatBreakdown, scoreConfidence } from "./confidence";

const CLEAN = "function add(a, b) {\n  return a + b;\n}";

describe("scoreConfidence", () => {
  it("scores a clean reply at the maximum", () => {
    const result = scoreConfidence(CLEAN, "add numbers");
    expect(result.breakdown).toEqual({ length: 1, uncertainty: 1, syntax: 1, repetition: 1, truncation: 1 });
    expect(result.score).toBeCloseTo(1, 5);
  });

  it("scores an empty reply at zero", () => {
    expect(scoreConfidence("", "anything")).toEqual({
      score: 0,
      breakdown: { length: 0, uncertainty: 0, syntax: 0, repetition: 0, truncation: 0 },
    });
  });

  it("penalizes a very short reply to a long prompt", () => {
    const prompt = "please write a function that validates email addresses properly";
    expect(scoreConfidence("x = 1", prompt).breakdown.length).toBe(0.2);
  });

  it("penalizes uncertainty phrases", () => {
    expect(scoreConfidence("perhaps x = 1", "x").breakdown.uncertainty).toBe(0.7);
    expect(scoreConfidence("maybe x = 1, i think, possibly", "x").breakdown.uncertainty).toBe(0.2);
  });

  it("penalizes unbalanced brackets and a dangling opener", () => {
    const { breakdown } = scoreConfidence("call(", "x");
    expect(breakdown.syntax).toBeCloseTo(0.6, 5);
    expect(breakdown.truncation).toBeCloseTo(0.7, 5);
  });

  it("penalizes repeated lines", () => {
    const repeated = Array.from({ length: 4 }, () => "const value = compute();").join("\n");
    expect(scoreConfidence(repeated, "x").breakdown.repetition).toBe(0.2);
  });

  it("penalizes a trailing ellipsis", () => {
    expect(scoreConfidence("return items...", "x").breakdown.truncation).toBe(0.5);
  });
});

describe("bracketsBalanced", () => {
  it("accepts nested pairs", () => {
    expect(bracketsBalanced("f([{}])")).toBe(true);
  });

  it("rejects mismatched or unclosed brackets", () => {
    expect(bracketsBalanced("(]")).toBe(false);
    expect(bracketsBalanced("((")).toBe(false);
    expect(bracketsBalanced(")")).toBe(false);
  });
});

describe("confidenceLevel", () => {
  it("maps scores to levels", () => {
    expect(confidenceLevel(0.95)).toBe("excellent");
    expect(confidenceLevel(0.85)).toBe("good");
    expect(confidenceLevel(0.7)).toBe("acceptable");
    expect(confidenceLevel(0.5)).toBe("uncertain");
    expect(confidenceLevel(0.49)).toBe("poor");
  });
});

describe("formatBreakdown", () => {
  it("prints each factor and the total", () => {
    expect(formatBreakdown(scoreConfidence(CLEAN, "add numbers"))).toBe(
      "len:1.00 unc:1.00 syn:1.00 rep:1.00 tru:1.00 = 1.00"
    );
  });
});
