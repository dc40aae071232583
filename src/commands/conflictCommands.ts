import * as vscode from "vscode";
import type { CommandDeps } from "./index";
import { activeBuffer, handleCommandError } from "./commandHelpers";
import { RESOLVE_AT_COMMAND } from "../ui/conflictView";
import type { ResolutionChoice, ResolutionResult } from "../patching/types";

// ===========================================================================
// Conflict Commands
//
// Accepting, navigating and bulk-resolving staged conflict regions in the
// active editor.
// ===========================================================================

const CHOICES: readonly ResolutionChoice[] = ["current", "incoming", "both", "none"];

function isChoice(value: unknown): value is ResolutionChoice {
  return CHOICES.some((c) => c === value);
}

export function registerConflictCommands(
  context: vscode.ExtensionContext,
  deps: CommandDeps
): void {
  context.subscriptions.push(
    vscode.commands.registerCommand("promptpatch.acceptCurrent", () =>
      accept(deps, "current")
    ),
    vscode.commands.registerCommand("promptpatch.acceptIncoming", () =>
      accept(deps, "incoming")
    ),
    vscode.commands.registerCommand("promptpatch.acceptBoth", () =>
      accept(deps, "both")
    ),
    vscode.commands.registerCommand("promptpatch.acceptNone", () =>
      accept(deps, "none")
    ),
    vscode.commands.registerCommand("promptpatch.nextConflict", () =>
      navigate(deps, "next")
    ),
    vscode.commands.registerCommand("promptpatch.prevConflict", () =>
      navigate(deps, "prev")
    ),
    vscode.commands.registerCommand("promptpatch.resolveConflict", () =>
      resolveWithMenu(deps)
    ),
    vscode.commands.registerCommand("promptpatch.resolveAllConflicts", () =>
      resolveAll(deps)
    ),
    vscode.commands.registerCommand(RESOLVE_AT_COMMAND, (uri: unknown, line: unknown, choice: unknown) =>
      resolveAt(deps, uri, line, choice)
    )
  );
}

// ---------------------------------------------------------------------------
// Accept
// ---------------------------------------------------------------------------

function accept(deps: CommandDeps, choice: ResolutionChoice): void {
  const buffer = activeBuffer(deps);
  if (!buffer) return;

  try {
    report(deps.conflicts.acceptAtCursor(buffer, choice));
  } catch (err) {
    handleCommandError(`accept-${choice}`, err, deps);
  }
}

function resolveAt(deps: CommandDeps, uri: unknown, line: unknown, choice: unknown): void {
  if (typeof uri !== "string" || typeof line !== "number" || !isChoice(choice)) {
    deps.logger.warn(`${RESOLVE_AT_COMMAND}: invalid arguments`);
    return;
  }
  const buffer = deps.registry.get(uri);
  if (!buffer?.isValid()) return;

  try {
    report(deps.conflicts.acceptAt(buffer, line, choice));
  } catch (err) {
    handleCommandError("resolveConflictAt", err, deps);
  }
}

function report(result: ResolutionResult | null): void {
  if (!result) {
    void vscode.window.showWarningMessage("PromptPatch: No conflict at the cursor.");
    return;
  }
  if (result.remaining === 0) {
    void vscode.window.showInformationMessage("PromptPatch: All conflicts resolved.");
  }
}

// ---------------------------------------------------------------------------
// Navigation
// ---------------------------------------------------------------------------

function navigate(deps: CommandDeps, direction: "next" | "prev"): void {
  const buffer = activeBuffer(deps);
  if (!buffer) return;

  const found =
    direction === "next" ? deps.conflicts.gotoNext(buffer) : deps.conflicts.gotoPrev(buffer);
  if (!found) {
    void vscode.window.showInformationMessage("PromptPatch: No conflicts in this file.");
  }
}

// ---------------------------------------------------------------------------
// Menus
// ---------------------------------------------------------------------------

async function resolveWithMenu(deps: CommandDeps): Promise<void> {
  const buffer = activeBuffer(deps);
  if (!buffer) return;

  try {
    const cursor = vscode.window.activeTextEditor?.selection.active.line;
    const conflict =
      cursor === undefined ? undefined : deps.conflicts.getConflictAt(buffer, cursor + 1);
    if (!conflict) {
      void vscode.window.showWarningMessage("PromptPatch: No conflict at the cursor.");
      return;
    }

    const items = deps.conflicts.buildMenu(buffer, conflict);
    const picked = await vscode.window.showQuickPick(items, {
      title: `PromptPatch: Resolve conflict at line ${conflict.startLine}`,
      placeHolder: "Choose which version to keep",
    });
    if (!picked) return;

    report(deps.conflicts.acceptAt(buffer, conflict.startLine, picked.choice));
  } catch (err) {
    handleCommandError("resolveConflict", err, deps);
  }
}

async function resolveAll(deps: CommandDeps): Promise<void> {
  const buffer = activeBuffer(deps);
  if (!buffer) return;

  try {
    const count = deps.conflicts.countConflicts(buffer);
    if (count === 0) {
      void vscode.window.showInformationMessage("PromptPatch: No conflicts in this file.");
      return;
    }

    const picked = await vscode.window.showQuickPick(
      [
        { label: "Accept all CURRENT", choice: "current" as const },
        { label: "Accept all INCOMING", choice: "incoming" as const },
        { label: "Accept all BOTH", choice: "both" as const },
        { label: "Delete all (accept NONE)", choice: "none" as const },
      ],
      { title: `PromptPatch: Resolve ${count} conflict(s)` }
    );
    if (!picked) return;

    const resolved = deps.conflicts.resolveAll(buffer, picked.choice);
    void vscode.window.showInformationMessage(`PromptPatch: Resolved ${resolved} conflict(s).`);
  } catch (err) {
    handleCommandError("resolveAllConflicts", err, deps);
  }
}
