import { describe, it, expect } from "vitest";
import { conflictEngineConfig, modelSelectors, patchManagerConfig, promptProcessorConfig } from "./componentConfig";
import { SettingsService } from "./settingsService";

const service = new SettingsService();

describe("component configuration", () => {
  it("maps patch settings and the tag delimiters", () => {
    const { settings } = service.resolve({
      "patch.useConflictMode": true,
      "prompt.openTag": "<<ai",
      "prompt.closeTag": "ai>>",
    });
    expect(patchManagerConfig(settings)).toEqual({
      useConflictMode: true,
      sortImports: true,
      treatAnySelectionAsUnsafe: true,
      companionMarker: ".coder.",
      tags: { openTag: "<<ai", closeTag: "ai>>" },
    });
  });

  it("keeps only the engine's conflict settings", () => {
    const { settings } = service.resolve({});
    expect(conflictEngineConfig(settings)).toEqual({
      lintAfterAccept: true,
      autoFixLintErrors: false,
      autoShowMenu: true,
      autoShowNextConflict: true,
      incomingLabel: "INCOMING",
    });
  });

  it("maps the confidence floor", () => {
    const { settings } = service.resolve({ "generation.minConfidence": 0.4 });
    expect(promptProcessorConfig(settings).minConfidence).toBe(0.4);
  });
});

describe("modelSelectors", () => {
  it("puts the configured family first and drops duplicates", () => {
    expect(
      modelSelectors({
        vendor: "copilot",
        modelFamily: "gpt-4o",
        additionalModelFamilies: ["claude-sonnet", "gpt-4o"],
        minConfidence: 0,
      })
    ).toEqual([
      { vendor: "copilot", family: "gpt-4o" },
      { vendor: "copilot", family: "claude-sonnet" },
    ]);
  });
});
