import { describe, it, expect, vi } from "vitest";
import { PatchManager, USER_TYPING, BUFFER_NOT_FOUND, type PatchManagerConfig } from "./patchManager";
import { ConflictMergeEngine } from "./conflictMergeEngine";
import { SmartCodeInjector } from "./codeInjector";
import { HeuristicScopeResolver } from "./scopeResolver";
import { hashRegion } from "./snapshot";
import {
  FakeEditorState,
  InMemoryBufferRegistry,
  makeBuffer,
  makeEvent,
  makeMockEmitterFactory,
  makeMockLogger,
  type InMemoryTextBuffer,
} from "../test/fixtures";
import { OutcomeFrequencyTracker, type IApplicationRecorder } from "../utils/telemetry";
import type { ICodeInjector, PatchStatusChange } from "./types";

interface Harness {
  manager: PatchManager;
  registry: InMemoryBufferRegistry;
  editor: FakeEditorState;
  recorder: OutcomeFrequencyTracker;
  clock: { now: number };
}

function setup(
  buffers: InMemoryTextBuffer[],
  config: Partial<PatchManagerConfig> = {},
  overrides: { injector?: ICodeInjector; recorder?: IApplicationRecorder } = {}
): Harness {
  const registry = new InMemoryBufferRegistry(...buffers);
  const editor = new FakeEditorState();
  const emitterFactory = makeMockEmitterFactory();
  const recorder = new OutcomeFrequencyTracker(() => 0);
  const clock = { now: 5000 };
  const manager = new PatchManager(
    { sortImports: false, ...config },
    {
      buffers: registry,
      editor,
      injector: overrides.injector ?? new SmartCodeInjector(),
      conflicts: new ConflictMergeEngine({}, { editor, emitterFactory }),
      emitterFactory,
      scopeResolver: new HeuristicScopeResolver(),
      recorder: overrides.recorder ?? recorder,
      logger: makeMockLogger(),
      now: () => clock.now,
    }
  );
  return { manager, registry, editor, recorder, clock };
}

const INLINE_TEXT = "a\n/@ add a helper @/\nc";

describe("PatchManager.create", () => {
  it("replaces the tag range for an inline prompt", () => {
    const buffer = makeBuffer(INLINE_TEXT);
    const { manager } = setup([buffer]);
    const patch = manager.create(makeEvent(), "const generated = 1;", 0.9);

    expect(patch.id).toBe("patch_5000_1");
    expect(patch.isInlinePrompt).toBe(true);
    expect(patch.injectionStrategy).toBe("replace");
    expect(patch.injectionRange).toEqual({ startLine: 2, endLine: 2 });
    expect(patch.targetBufferId).toBe(buffer.id);
    expect(manager.getPending()).toEqual([patch]);
  });

  it("prefers SEARCH/REPLACE when the response has blocks", () => {
    const { manager } = setup([makeBuffer(INLINE_TEXT)]);
    const patch = manager.create(makeEvent(), "<<<<<<< SEARCH\na\n=======\nb\n>>>>>>> REPLACE", 0.9);
    expect(patch.injectionStrategy).toBe("search_replace");
    expect(patch.searchReplaceBlocks).toEqual([{ search: "a", replace: "b" }]);
  });

  it("uses the override range for selection transforms", () => {
    const { manager } = setup([makeBuffer("a\nb\nc")]);
    const patch = manager.create(
      makeEvent({ intentOverride: { action: "insert" }, injectionRange: { startLine: 3, endLine: 3 } }),
      "x",
      0.9
    );
    expect(patch.injectionStrategy).toBe("insert");
    expect(patch.injectionRange).toEqual({ startLine: 3, endLine: 3 });
  });

  it("appends for a companion prompt with no intent", () => {
    const companion = makeBuffer("/@ add a helper @/", { path: "/work/src/app.coder.ts" });
    const { manager } = setup([companion, makeBuffer("const a = 1;")]);
    const patch = manager.create(makeEvent({ sourceBufferId: companion.id }), "x", 0.9);
    expect(patch.isInlinePrompt).toBe(false);
    expect(patch.injectionStrategy).toBe("append");
  });

  it("notifies listeners of new patches", () => {
    const { manager } = setup([makeBuffer(INLINE_TEXT)]);
    const changes: PatchStatusChange[] = [];
    manager.onDidChangePatch.event((c) => changes.push(c));
    const patch = manager.create(makeEvent(), "x", 0.9);
    expect(changes).toEqual([{ patch, previous: null }]);
  });
});

describe("PatchManager.apply", () => {
  it("writes the code over the inline tag", () => {
    const buffer = makeBuffer(INLINE_TEXT);
    const { manager, recorder } = setup([buffer]);
    const patch = manager.create(makeEvent(), "const generated = 1;", 0.9);

    expect(manager.apply(patch)).toEqual({ success: true });
    expect(buffer.getText()).toBe("a\nconst generated = 1;\nc");
    expect(patch.status).toBe("applied");
    expect(patch.resolvedAt).toBe(5000);
    expect(recorder.getEntry("applied")?.count).toBe(1);
  });

  it("defers while the user is typing", () => {
    const buffer = makeBuffer(INLINE_TEXT);
    const { manager, editor, recorder } = setup([buffer]);
    const patch = manager.create(makeEvent(), "x", 0.9);
    editor.insertMode = true;

    expect(manager.apply(patch)).toEqual({ success: false, error: USER_TYPING });
    expect(patch.status).toBe("pending");
    expect(recorder.getEntry("deferred:user_typing")?.count).toBe(1);
    expect(buffer.getText()).toBe(INLINE_TEXT);
  });

  it("treats any selection as unsafe by default", () => {
    const { manager, editor } = setup([makeBuffer(INLINE_TEXT)]);
    const patch = manager.create(makeEvent(), "x", 0.9);
    editor.selections.add("/work/other.ts");
    expect(manager.apply(patch)).toEqual({ success: false, error: USER_TYPING });
  });

  it("ignores selections in other documents when configured", () => {
    const { manager, editor } = setup([makeBuffer(INLINE_TEXT)], { treatAnySelectionAsUnsafe: false });
    const patch = manager.create(makeEvent(), "x", 0.9);
    editor.selections.add("/work/other.ts");
    expect(manager.apply(patch)).toEqual({ success: true });
  });

  it("marks a patch stale when the snapshotted region changed", () => {
    const buffer = makeBuffer(INLINE_TEXT);
    const { manager, recorder } = setup([buffer]);
    const patch = manager.create(makeEvent(), "x", 0.9);
    buffer.replaceLines(2, 2, ["edited by hand"]);

    expect(manager.apply(patch)).toEqual({ success: false, error: "patch_stale: content_changed" });
    expect(patch.status).toBe("stale");
    expect(patch.statusReason).toBe("content_changed");
    expect(recorder.getEntry("stale:content_changed")?.count).toBe(1);
    expect(buffer.getText()).toBe("a\nedited by hand\nc");
  });

  it("applies after edits outside the snapshotted region", () => {
    const buffer = makeBuffer(INLINE_TEXT);
    const { manager } = setup([buffer]);
    const patch = manager.create(makeEvent(), "const generated = 1;", 0.9);
    buffer.replaceLines(3, 3, ["z"]);
    buffer.touch();

    expect(manager.apply(patch)).toEqual({ success: true });
    expect(buffer.getText()).toBe("a\nconst generated = 1;\nz");
  });

  it("refuses patches that are no longer pending", () => {
    const { manager } = setup([makeBuffer(INLINE_TEXT)]);
    const patch = manager.create(makeEvent(), "x", 0.9);
    manager.apply(patch);
    expect(manager.apply(patch)).toEqual({ success: false, error: "patch_not_pending: applied" });
  });

  it("removes companion tags and appends to the target", () => {
    const companion = makeBuffer("/@ add a helper @/", { path: "/work/src/app.coder.ts" });
    const target = makeBuffer("const a = 1;");
    const { manager } = setup([companion, target]);
    const patch = manager.create(makeEvent({ sourceBufferId: companion.id }), "const generated = 1;", 0.9);

    expect(manager.apply(patch)).toEqual({ success: true });
    expect(companion.getText()).toBe("");
    expect(target.getText()).toBe("const a = 1;\n\nconst generated = 1;");
  });

  it("applies SEARCH/REPLACE blocks", () => {
    const buffer = makeBuffer("function f() {\n  return 1;\n}");
    const { manager } = setup([buffer]);
    const patch = manager.create(
      makeEvent({ range: { startLine: 1, endLine: 1 } }),
      "<<<<<<< SEARCH\n  return 1;\n=======\n  return 2;\n>>>>>>> REPLACE",
      0.9
    );

    expect(manager.apply(patch)).toEqual({ success: true });
    expect(buffer.getText()).toBe("function f() {\n  return 2;\n}");
  });

  it("falls back to the REPLACE text when no block matches", () => {
    const buffer = makeBuffer("function f() {\n  return 1;\n}");
    const { manager, recorder } = setup([buffer]);
    const patch = manager.create(
      makeEvent({ range: { startLine: 1, endLine: 1 } }),
      "<<<<<<< SEARCH\nmissing();\n=======\n  return 2;\n>>>>>>> REPLACE",
      0.9
    );

    expect(manager.apply(patch)).toEqual({ success: true });
    expect(buffer.getText()).toBe("function f() {\n  return 1;\n}\n\n  return 2;");
    expect(recorder.getEntry("applied:search_replace_failed")?.count).toBe(1);
  });

  it("injects every REPLACE half when only some blocks match", () => {
    const buffer = makeBuffer("function f() {\n    return 1;\n}");
    const { manager, recorder } = setup([buffer]);
    const reply = [
      "<<<<<<< SEARCH",
      "  return 1;",
      "=======",
      "  return 2;",
      ">>>>>>> REPLACE",
      "<<<<<<< SEARCH",
      "missing();",
      "=======",
      "done();",
      ">>>>>>> REPLACE",
    ].join("\n");
    const patch = manager.create(makeEvent({ range: { startLine: 1, endLine: 1 } }), reply, 0.9);

    expect(patch.searchReplaceBlocks).toHaveLength(2);
    expect(manager.apply(patch)).toEqual({ success: true });
    expect(buffer.getText()).toBe("function f() {\n    return 1;\n}\n\n  return 2;\ndone();");
    expect(buffer.getText()).not.toMatch(/^(<<<<<<<|=======|>>>>>>>)/m);
    expect(recorder.getEntry("applied:search_replace_failed")?.count).toBe(1);
  });

  it("follows anchors when lines move above the range", () => {
    const buffer = makeBuffer("a\nb\nc\nd");
    const { manager } = setup([buffer]);
    const anchors = { start: buffer.anchors.create(2), end: buffer.anchors.create(3) };
    const patch = manager.create(
      makeEvent({
        range: { startLine: 2, endLine: 3 },
        intentOverride: { action: "replace" },
        injectionRange: { startLine: 2, endLine: 3 },
        injectionAnchors: anchors,
      }),
      "const generated = 1;",
      0.9
    );
    buffer.replaceLines(1, 0, ["top"]);

    expect(manager.apply(patch)).toEqual({ success: true });
    expect(buffer.getText()).toBe("top\na\nconst generated = 1;\nd");
    expect(buffer.anchors.size).toBe(0);
  });

  it("rejects when the target cannot be found", () => {
    const companion = makeBuffer("/@ add a helper @/", { path: "/work/src/app.coder.ts" });
    const { manager } = setup([companion]);
    const patch = manager.create(
      makeEvent({ sourceBufferId: companion.id, targetPath: "/work/src/missing.ts" }),
      "x",
      0.9
    );

    expect(manager.apply(patch)).toEqual({ success: false, error: BUFFER_NOT_FOUND });
    expect(patch.status).toBe("rejected");
  });

  it("reloads a target that was not open", () => {
    const companion = makeBuffer("/@ add a helper @/", { path: "/work/src/app.coder.ts" });
    const { manager, registry } = setup([companion]);
    const patch = manager.create(
      makeEvent({ sourceBufferId: companion.id, targetPath: "/work/src/later.ts" }),
      "const generated = 1;",
      0.9
    );
    const later = makeBuffer("start();", { path: "/work/src/later.ts" });
    registry.onDisk.set("/work/src/later.ts", later);

    expect(manager.apply(patch)).toEqual({ success: true });
    expect(patch.targetBufferId).toBe("/work/src/later.ts");
    expect(later.getText()).toBe("start();\n\nconst generated = 1;");
  });

  it("turns injector failures into rejected patches", () => {
    const injector: ICodeInjector = {
      inject: () => {
        throw new Error("boom");
      },
    };
    const { manager, recorder } = setup([makeBuffer(INLINE_TEXT)], {}, { injector });
    const patch = manager.create(makeEvent(), "x", 0.9);

    expect(manager.apply(patch)).toEqual({ success: false, error: "boom" });
    expect(patch.status).toBe("rejected");
    expect(patch.statusReason).toBe("boom");
    expect(recorder.getEntry("rejected:injection_failed")?.count).toBe(1);
  });

  it("ignores recorder failures", () => {
    const recorder: IApplicationRecorder = {
      recordApplication: vi.fn(() => {
        throw new Error("nope");
      }),
    };
    const { manager } = setup([makeBuffer(INLINE_TEXT)], {}, { recorder });
    expect(manager.apply(manager.create(makeEvent(), "x", 0.9))).toEqual({ success: true });
  });
});

describe("PatchManager conflict mode", () => {
  it("stages an inline patch as a conflict without the tag", () => {
    const buffer = makeBuffer(INLINE_TEXT);
    const { manager, editor, recorder } = setup([buffer], { useConflictMode: true });
    const patch = manager.create(makeEvent(), "const generated = 1;", 0.9);

    expect(manager.smartApply(patch)).toEqual({ success: true });
    expect(buffer.getLines()).toEqual([
      "a",
      "<<<<<<< CURRENT",
      "=======",
      "const generated = 1;",
      ">>>>>>> INCOMING",
      "c",
    ]);
    expect(editor.revealed).toEqual([{ bufferId: buffer.id, line: 2 }]);
    expect(recorder.getEntry("conflict")?.count).toBe(1);
  });

  it("stages each matched SEARCH/REPLACE block", () => {
    const buffer = makeBuffer("function f() {\n  return 1;\n}");
    const { manager } = setup([buffer], { useConflictMode: true });
    const patch = manager.create(
      makeEvent({ range: { startLine: 1, endLine: 1 } }),
      "<<<<<<< SEARCH\n  return 1;\n=======\n  return 2;\n>>>>>>> REPLACE",
      0.9
    );

    expect(manager.smartApply(patch)).toEqual({ success: true });
    expect(buffer.getLines()).toEqual([
      "function f() {",
      "<<<<<<< CURRENT",
      "  return 1;",
      "=======",
      "  return 2;",
      ">>>>>>> INCOMING",
      "}",
    ]);
  });

  it("applies directly when there is no range", () => {
    const companion = makeBuffer("/@ add a helper @/", { path: "/work/src/app.coder.ts" });
    const target = makeBuffer("const a = 1;");
    const { manager } = setup([companion, target], { useConflictMode: true });
    const patch = manager.create(makeEvent({ sourceBufferId: companion.id }), "const generated = 1;", 0.9);

    expect(manager.smartApply(patch)).toEqual({ success: true });
    expect(target.getText()).toBe("const a = 1;\n\nconst generated = 1;");
  });
});

describe("PatchManager housekeeping", () => {
  it("flushes pending patches and counts deferrals", () => {
    const buffer = makeBuffer(INLINE_TEXT);
    const { manager, editor } = setup([buffer]);
    manager.create(makeEvent(), "const generated = 1;", 0.9);

    editor.completionVisible = true;
    expect(manager.flushPending()).toEqual({ applied: 0, stale: 0, deferred: 1 });

    editor.completionVisible = false;
    expect(manager.flushPending()).toEqual({ applied: 1, stale: 0, deferred: 0 });
    expect(manager.getPending()).toEqual([]);
  });

  it("counts stale patches during a flush", () => {
    const buffer = makeBuffer(INLINE_TEXT);
    const { manager } = setup([buffer]);
    manager.create(makeEvent(), "x", 0.9);
    buffer.replaceLines(2, 2, ["changed"]);
    expect(manager.flushPending()).toEqual({ applied: 0, stale: 1, deferred: 0 });
  });

  it("cancels pending patches for a closed buffer", () => {
    const buffer = makeBuffer(INLINE_TEXT);
    const { manager } = setup([buffer]);
    const patch = manager.create(makeEvent(), "x", 0.9);
    const changes: PatchStatusChange[] = [];
    manager.onDidChangePatch.event((c) => changes.push(c));

    expect(manager.cancelForBuffer(buffer.id)).toBe(1);
    expect(manager.cancelForBuffer(buffer.id)).toBe(0);
    expect(patch.status).toBe("cancelled");
    expect(patch.statusReason).toBe("buffer_closed");
    expect(changes).toEqual([{ patch, previous: "pending" }]);
    expect(buffer.getText()).toBe(INLINE_TEXT);
  });

  it("drops old terminal patches but keeps pending ones", () => {
    const buffer = makeBuffer(INLINE_TEXT);
    const { manager, clock } = setup([buffer]);
    manager.apply(manager.create(makeEvent(), "x", 0.9));
    manager.create(makeEvent({ id: "evt-2" }), "y", 0.9);

    clock.now = 5000 + 3_600_001;
    expect(manager.cleanup()).toBe(1);
    expect(manager.stats()).toEqual({ total: 1, pending: 1, applied: 0, stale: 0, rejected: 0, cancelled: 0 });
    expect(manager.getForEvent("evt-2")?.generatedCode).toBe("y");
  });

  it("never leaves a terminal state", () => {
    const { manager } = setup([makeBuffer(INLINE_TEXT)]);
    const patch = manager.create(makeEvent(), "x", 0.9);

    expect(manager.markApplied(patch.id)).toBe(true);
    expect(manager.markRejected(patch.id, "late")).toBe(false);
    expect(manager.markStale("unknown")).toBe(false);
    expect(manager.get(patch.id)?.status).toBe("applied");
  });
});

describe("prompt ranges that move during generation", () => {
  const TEXT = "const a = 1;\n/@ add a logger @/\nconst b = 2;";

  it("injects at the tag's current line", () => {
    const buffer = makeBuffer(TEXT);
    const { manager } = setup([buffer]);
    const event = makeEvent({ rangeAnchors: buffer.anchors.createPair({ startLine: 2, endLine: 2 }) });
    buffer.replaceLines(1, 0, ["// user typed this"]);

    const patch = manager.create(event, "const log = console.log;", 0.9);

    expect(patch.injectionRange).toEqual({ startLine: 3, endLine: 3 });
    expect(patch.promptTagRange).toEqual({ startLine: 3, endLine: 3 });
    expect(manager.apply(patch)).toEqual({ success: true });
    expect(buffer.getText()).toBe("// user typed this\nconst a = 1;\nconst log = console.log;\nconst b = 2;");
    expect(buffer.anchors.size).toBe(0);
  });

  it("queues the patch stale when the tag was edited", () => {
    const buffer = makeBuffer(TEXT);
    const { manager, recorder } = setup([buffer]);
    const range = { startLine: 2, endLine: 2 };
    const event = makeEvent({
      range,
      rangeAnchors: buffer.anchors.createPair(range),
      regionHash: hashRegion(buffer, range),
    });
    buffer.replaceLines(2, 2, ["// never mind"]);

    const patch = manager.create(event, "const log = console.log;", 0.9);

    expect(patch.status).toBe("stale");
    expect(patch.statusReason).toBe("content_changed");
    expect(recorder.getEntry("stale:content_changed")?.count).toBe(1);
    expect(manager.apply(patch)).toEqual({ success: false, error: "patch_not_pending: stale" });
    expect(buffer.getText()).toBe("const a = 1;\n// never mind\nconst b = 2;");
    expect(buffer.anchors.size).toBe(0);
  });

  it("queues the patch stale when the tag line was deleted", () => {
    const buffer = makeBuffer(TEXT);
    const { manager } = setup([buffer]);
    const event = makeEvent({ rangeAnchors: buffer.anchors.createPair({ startLine: 2, endLine: 2 }) });
    buffer.replaceLines(2, 2, []);

    expect(manager.create(event, "x", 0.9).status).toBe("stale");
    expect(buffer.getText()).toBe("const a = 1;\nconst b = 2;");
  });

  it("keeps a later pending patch on its own tag after an earlier one grows the buffer", () => {
    const buffer = makeBuffer("a\n/@ add one @/\nb\n/@ add two @/\nc");
    const { manager } = setup([buffer]);
    const first = manager.create(makeEvent({ id: "evt-1", range: { startLine: 2, endLine: 2 } }), "x1\nx2\nx3", 0.9);
    const second = manager.create(makeEvent({ id: "evt-2", range: { startLine: 4, endLine: 4 } }), "y", 0.9);

    expect(manager.flushPending()).toEqual({ applied: 2, stale: 0, deferred: 0 });
    expect(first.status).toBe("applied");
    expect(second.status).toBe("applied");
    expect(buffer.getText()).toBe("a\nx1\nx2\nx3\nb\ny\nc");
    expect(buffer.anchors.size).toBe(0);
  });

  it("stales a pending patch whose tag was edited after creation", () => {
    const buffer = makeBuffer("a\n/@ add one @/\nb\n/@ add two @/\nc");
    const { manager } = setup([buffer]);
    const patch = manager.create(makeEvent({ range: { startLine: 4, endLine: 4 } }), "y", 0.9);
    buffer.replaceLines(1, 0, ["top"]);
    buffer.replaceLines(5, 5, ["/@ add three @/"]);

    expect(manager.apply(patch)).toEqual({ success: false, error: "patch_stale: content_changed" });
    expect(buffer.getText()).toBe("top\na\n/@ add one @/\nb\n/@ add three @/\nc");
  });
});
