import * as vscode from "vscode";
import type { ConflictMergeEngine } from "../patching/conflictMergeEngine";
import type { VsCodeBufferRegistry } from "../patching/vscodeAdapters";
import type { ConflictRegion, ConflictsChange, LineRange } from "../patching/types";
import { RESOLVE_AT_COMMAND, conflictDecorationRanges, conflictLenses } from "./conflictView";

// ===========================================================================
// ConflictDecorations
//
// Colors staged conflict regions and offers accept actions as code lenses.
// Driven entirely by ConflictMergeEngine.onDidChangeConflicts; regions for
// documents the engine has not reported on yet are scanned on demand.
// ===========================================================================

export class ConflictDecorations implements vscode.CodeLensProvider, vscode.Disposable {
  private readonly markerType = vscode.window.createTextEditorDecorationType({
    isWholeLine: true,
    backgroundColor: new vscode.ThemeColor("merge.border"),
    fontWeight: "bold",
  });
  private readonly currentType = vscode.window.createTextEditorDecorationType({
    isWholeLine: true,
    backgroundColor: new vscode.ThemeColor("merge.currentContentBackground"),
  });
  private readonly incomingType = vscode.window.createTextEditorDecorationType({
    isWholeLine: true,
    backgroundColor: new vscode.ThemeColor("merge.incomingContentBackground"),
  });

  private readonly conflicts = new Map<string, readonly ConflictRegion[]>();
  private readonly lensChanged = new vscode.EventEmitter<void>();
  private readonly disposables: vscode.Disposable[] = [];

  readonly onDidChangeCodeLenses = this.lensChanged.event;

  constructor(
    private readonly engine: ConflictMergeEngine,
    private readonly registry: VsCodeBufferRegistry
  ) {
    this.disposables.push(
      engine.onDidChangeConflicts.event((change) => this.update(change)),
      vscode.window.onDidChangeVisibleTextEditors((editors) => {
        for (const editor of editors) this.decorate(editor);
      }),
      vscode.workspace.onDidCloseTextDocument((document) => {
        this.conflicts.delete(document.uri.toString());
      })
    );
  }

  provideCodeLenses(document: vscode.TextDocument): vscode.CodeLens[] {
    const uri = document.uri.toString();
    return conflictLenses(this.conflictsFor(document)).map((lens) => {
      const range = new vscode.Range(lens.line - 1, 0, lens.line - 1, 0);
      return new vscode.CodeLens(range, {
        title: lens.title,
        command: RESOLVE_AT_COMMAND,
        arguments: [uri, lens.line, lens.choice],
      });
    });
  }

  dispose(): void {
    for (const d of this.disposables) d.dispose();
    this.disposables.length = 0;
    this.markerType.dispose();
    this.currentType.dispose();
    this.incomingType.dispose();
    this.lensChanged.dispose();
  }

  private update(change: ConflictsChange): void {
    this.conflicts.set(change.bufferId, change.conflicts);
    for (const editor of vscode.window.visibleTextEditors) {
      if (editor.document.uri.toString() === change.bufferId) this.decorate(editor);
    }
    this.lensChanged.fire();
  }

  private conflictsFor(document: vscode.TextDocument): readonly ConflictRegion[] {
    const uri = document.uri.toString();
    const known = this.conflicts.get(uri);
    if (known) return known;

    const scanned = this.engine.detectConflicts(this.registry.track(document));
    this.conflicts.set(uri, scanned);
    return scanned;
  }

  private decorate(editor: vscode.TextEditor): void {
    const ranges = conflictDecorationRanges(this.conflictsFor(editor.document));
    editor.setDecorations(this.markerType, ranges.markers.map(toRange));
    editor.setDecorations(this.currentType, ranges.current.map(toRange));
    editor.setDecorations(this.incomingType, ranges.incoming.map(toRange));
  }
}

function toRange({ startLine, endLine }: LineRange): vscode.Range {
  return new vscode.Range(startLine - 1, 0, endLine - 1, 0);
}
