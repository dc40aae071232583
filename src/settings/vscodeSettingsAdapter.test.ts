import { describe, it, expect, beforeEach, vi } from "vitest";
import { workspace, setConfigValue, resetVsCodeMocks } from "../test/mocks/vscode";
import { VsCodeSettingsAdapter } from "./vscodeSettingsAdapter";
import { DEFAULT_SETTINGS } from "./settingsService";

describe("VsCodeSettingsAdapter", () => {
  beforeEach(() => {
    resetVsCodeMocks();
  });

  it("returns the defaults when nothing is configured", () => {
    expect(new VsCodeSettingsAdapter().getSettings()).toEqual(DEFAULT_SETTINGS);
    expect(workspace.getConfiguration).toHaveBeenCalledWith("promptpatch");
  });

  it("reads configured values by their dotted keys", () => {
    setConfigValue("patch.flushIntervalMs", 1000);
    setConfigValue("prompt.openTag", "<<");
    setConfigValue("generation.additionalModelFamilies", ["claude-sonnet"]);

    const settings = new VsCodeSettingsAdapter().getSettings();
    expect(settings.patch.flushIntervalMs).toBe(1000);
    expect(settings.prompt.openTag).toBe("<<");
    expect(settings.generation.additionalModelFamilies).toEqual(["claude-sonnet"]);
  });

  it("reports invalid values under the full setting name and keeps the default", () => {
    const onInvalid = vi.fn();
    setConfigValue("patch.flushIntervalMs", 5);

    const settings = new VsCodeSettingsAdapter(onInvalid).getSettings();
    expect(settings.patch.flushIntervalMs).toBe(500);
    expect(onInvalid).toHaveBeenCalledTimes(1);
    expect(onInvalid).toHaveBeenCalledWith("promptpatch.patch.flushIntervalMs", expect.any(String));
  });

  it("writes a setting through the configuration API", async () => {
    const adapter = new VsCodeSettingsAdapter();
    await adapter.updateSetting("patch.useConflictMode", true);
    expect(adapter.getSettings().patch.useConflictMode).toBe(true);
  });
});
