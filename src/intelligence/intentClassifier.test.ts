import { describe, it, expect } from "vitest";
import {
  detectIntent,
  formatIntent,
  getPromptModifier,
  isInsertion,
  isReplacement,
  modifiesCode,
} from "./intentClassifier";

describe("detectIntent", () => {
  it("classifies a fix with every matched trigger", () => {
    const intent = detectIntent("Fix the bug in this function");
    expect(intent).toEqual({
      type: "fix",
      scopeHint: "function",
      action: "replace",
      confidence: 0.8,
      keywords: ["fix", "bug"],
    });
  });

  it("defaults to add with no keywords", () => {
    expect(detectIntent("")).toEqual({
      type: "add",
      scopeHint: undefined,
      action: "insert",
      confidence: 0.5,
      keywords: [],
    });
  });

  it("lets a stronger category win regardless of word order", () => {
    const intent = detectIntent("simplify this and then fix it");
    expect(intent.type).toBe("fix");
    expect(intent.keywords).toEqual(["fix"]);
  });

  it("keeps the first category among equal priorities", () => {
    // "write" (add) and "test" share a priority; add comes first in the table
    expect(detectIntent("write unit tests").type).toBe("add");
  });

  it("classifies tests as file-scoped appends", () => {
    const intent = detectIntent("test coverage for the parser");
    expect(intent.type).toBe("test");
    expect(intent.action).toBe("append");
    expect(intent.scopeHint).toBe("file");
    expect(intent.keywords).toEqual(["test", "coverage"]);
  });

  it("overrides the scope with an explicit phrase", () => {
    expect(detectIntent("refactor this class").scopeHint).toBe("class");
    expect(detectIntent("document the selected code").scopeHint).toBe("selection");
  });

  it("caps confidence at 1", () => {
    expect(detectIntent("implement and complete the todo stub, finish it").confidence).toBe(1);
  });

  it("recognizes explanations as non-modifying", () => {
    const intent = detectIntent("explain what does this do");
    expect(intent.type).toBe("explain");
    expect(intent.action).toBe("none");
    expect(modifiesCode(intent)).toBe(false);
  });
});

describe("intent predicates", () => {
  it("distinguishes replacements from insertions", () => {
    const fix = detectIntent("fix it");
    const add = detectIntent("add a helper");
    const test = detectIntent("test it");
    expect(isReplacement(fix)).toBe(true);
    expect(isInsertion(fix)).toBe(false);
    expect(isInsertion(add)).toBe(true);
    expect(isInsertion(test)).toBe(true);
    expect(modifiesCode(add)).toBe(true);
  });
});

describe("getPromptModifier", () => {
  it("returns the instruction block for the category", () => {
    expect(getPromptModifier(detectIntent("fix it")).split("\n")[0]).toBe("You are fixing a bug in the code.");
  });
});

describe("formatIntent", () => {
  it("formats type, scope, action and confidence", () => {
    expect(formatIntent(detectIntent("Fix the bug in this function"))).toBe(
      "fix (scope: function, action: replace, confidence: 0.80)"
    );
  });

  it("shows auto when there is no scope", () => {
    expect(formatIntent(detectIntent("add a helper"))).toBe(
      "add (scope: auto, action: insert, confidence: 0.65)"
    );
  });
});
