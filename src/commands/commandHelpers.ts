import * as vscode from "vscode";
import type { CommandDeps } from "./index";
import type { VsCodeTextBuffer } from "../patching/vscodeAdapters";
import { normalizeError, getUserMessage } from "../utils";

/** The buffer behind the active editor, or a warning when there is none. */
export function activeBuffer(deps: CommandDeps): VsCodeTextBuffer | undefined {
  const editor = vscode.window.activeTextEditor;
  if (!editor) {
    void vscode.window.showWarningMessage("PromptPatch: No active editor.");
    return undefined;
  }
  return deps.registry.track(editor.document);
}

export function handleCommandError(
  command: string,
  err: unknown,
  deps: CommandDeps
): void {
  const normalized = normalizeError(err);
  deps.logger.error(`[${command}] ${normalized.code}: ${normalized.message}`);
  void vscode.window.showErrorMessage(getUserMessage(err));
}
