import * as vscode from "vscode";
import type { CommandDeps } from "./index";
import { activeBuffer, handleCommandError } from "./commandHelpers";
import { formatStatsReport, formatStatsSummary } from "../ui/statsReport";

// ===========================================================================
// Patch Commands
//
// Prompt submission, selection transforms and patch queue housekeeping.
// ===========================================================================

export function registerPatchCommands(
  context: vscode.ExtensionContext,
  deps: CommandDeps
): void {
  context.subscriptions.push(
    vscode.commands.registerCommand("promptpatch.processPrompts", () =>
      processPrompts(deps)
    ),
    vscode.commands.registerCommand("promptpatch.transformSelection", () =>
      transform(deps, "replace")
    ),
    vscode.commands.registerCommand("promptpatch.insertAtCursor", () =>
      transform(deps, "insert")
    ),
    vscode.commands.registerCommand("promptpatch.flushPending", () =>
      flushPending(deps)
    ),
    vscode.commands.registerCommand("promptpatch.cancelPending", () =>
      cancelPending(deps)
    ),
    vscode.commands.registerCommand("promptpatch.showStats", () =>
      showStats(deps)
    ),
    vscode.commands.registerCommand("promptpatch.toggleConflictMode", () =>
      toggleConflictMode(deps)
    )
  );
}

// ---------------------------------------------------------------------------
// Prompt submission
// ---------------------------------------------------------------------------

async function processPrompts(deps: CommandDeps): Promise<void> {
  const buffer = activeBuffer(deps);
  if (!buffer) return;

  try {
    const created = await vscode.window.withProgress(
      { location: vscode.ProgressLocation.Window, title: "PromptPatch: generating" },
      () => deps.processor.processBuffer(buffer)
    );
    deps.logger.info(`${created.length} patch(es) created from ${buffer.path}`);
    if (created.length === 0) {
      void vscode.window.showInformationMessage("PromptPatch: No code was generated.");
    }
  } catch (err) {
    handleCommandError("processPrompts", err, deps);
  }
}

async function transform(deps: CommandDeps, action: "replace" | "insert"): Promise<void> {
  const editor = vscode.window.activeTextEditor;
  const buffer = activeBuffer(deps);
  if (!editor || !buffer) return;

  const selection = editor.selection;
  if (action === "replace" && selection.isEmpty) {
    void vscode.window.showWarningMessage("PromptPatch: Select the code to transform first.");
    return;
  }

  try {
    const prompt = await vscode.window.showInputBox({
      title: action === "replace" ? "PromptPatch: Transform Selection" : "PromptPatch: Insert at Cursor",
      prompt: action === "replace" ? "What should happen to the selected code?" : "What should be inserted here?",
    });
    if (!prompt) return;

    // A selection ending at column 0 does not include that line
    const endLine =
      selection.end.character === 0 && selection.end.line > selection.start.line
        ? selection.end.line
        : selection.end.line + 1;
    const range =
      action === "replace"
        ? { startLine: selection.start.line + 1, endLine }
        : { startLine: selection.active.line + 1, endLine: selection.active.line + 1 };

    // Drop the selection so the safety gate lets the patch through
    const caret = selection.active;
    editor.selection = new vscode.Selection(caret, caret);

    const patch = await vscode.window.withProgress(
      { location: vscode.ProgressLocation.Window, title: "PromptPatch: generating" },
      () => deps.processor.transformSelection(buffer, range, prompt, action)
    );
    if (!patch) {
      void vscode.window.showInformationMessage("PromptPatch: No code was generated.");
    }
  } catch (err) {
    handleCommandError("transform", err, deps);
  }
}

// ---------------------------------------------------------------------------
// Queue housekeeping
// ---------------------------------------------------------------------------

function flushPending(deps: CommandDeps): void {
  try {
    const { applied, stale, deferred } = deps.patches.flushPending();
    const message = `Applied ${applied}, stale ${stale}, deferred ${deferred}`;
    deps.logger.info(message);
    void vscode.window.showInformationMessage(`PromptPatch: ${message}`);
  } catch (err) {
    handleCommandError("flushPending", err, deps);
  }
}

function cancelPending(deps: CommandDeps): void {
  const buffer = activeBuffer(deps);
  if (!buffer) return;

  const requests = deps.processor.cancelForBuffer(buffer.id);
  const patches = deps.patches.cancelForBuffer(buffer.id);
  deps.logger.info(`Cancelled ${requests} request(s) and ${patches} patch(es) for ${buffer.path}`);
  void vscode.window.showInformationMessage(
    `PromptPatch: Cancelled ${patches} pending patch(es).`
  );
}

function showStats(deps: CommandDeps): void {
  const stats = deps.patches.stats();
  const report = formatStatsReport({
    patches: stats,
    conflictMode: deps.patches.isConflictMode(),
    inFlight: deps.processor.inFlightCount,
    outcomes: deps.outcomes.getFrequencies(),
    providers: deps.accuracy.summary(),
  });

  for (const line of report) deps.logger.info(line);
  deps.logger.show(true);
  void vscode.window.showInformationMessage(`PromptPatch: ${formatStatsSummary(stats)}`);
}

async function toggleConflictMode(deps: CommandDeps): Promise<void> {
  try {
    const enabled = !deps.patches.isConflictMode();
    await deps.settingsAdapter.updateSetting("patch.useConflictMode", enabled);
    deps.patches.configure({ useConflictMode: enabled });
    deps.logger.info(`Conflict mode ${enabled ? "enabled" : "disabled"}`);
    void vscode.window.showInformationMessage(
      `PromptPatch: Conflict mode ${enabled ? "on" : "off"}.`
    );
  } catch (err) {
    handleCommandError("toggleConflictMode", err, deps);
  }
}
