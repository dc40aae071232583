import { describe, it, expect, vi } from "vitest";
import { CONFLICT_MARKERS, ConflictMergeEngine, type ConflictEngineConfig, type ConflictResolved } from "./conflictMergeEngine";
import {
  FakeEditorState,
  FakeLintValidator,
  makeBuffer,
  makeLintResult,
  makeMockEmitterFactory,
  makeMockLogger,
} from "../test/fixtures";
import type { ConflictsChange } from "./types";

function setup(config: Partial<ConflictEngineConfig> = {}) {
  const editor = new FakeEditorState();
  const lint = new FakeLintValidator();
  const logger = makeMockLogger();
  const engine = new ConflictMergeEngine(config, {
    editor,
    emitterFactory: makeMockEmitterFactory(),
    lintValidator: lint,
    logger,
  });
  return { engine, editor, lint, logger };
}

const STAGED = [
  "top",
  "<<<<<<< CURRENT",
  "old();",
  "=======",
  "next();",
  "again();",
  ">>>>>>> INCOMING",
  "bottom",
].join("\n");

describe("insertConflict", () => {
  it("wraps the replaced lines and returns the region", () => {
    const { engine } = setup();
    const buffer = makeBuffer("top\nold();\nbottom");
    const region = engine.insertConflict(buffer, { startLine: 2, endLine: 2 }, ["next();", "again();"]);

    expect(buffer.getText()).toBe(STAGED);
    expect(region).toEqual({
      startLine: 2,
      currentStart: 3,
      currentEnd: 3,
      separatorLine: 4,
      incomingStart: 5,
      incomingEnd: 6,
      endLine: 7,
    });
  });

  it("stages a pure insertion with an empty CURRENT body", () => {
    const { engine } = setup();
    const buffer = makeBuffer("a\nb");
    const region = engine.insertConflict(buffer, { startLine: 2, endLine: 1 }, ["x"], "SUGGESTION");

    expect(buffer.getLines()).toEqual(["a", CONFLICT_MARKERS.currentStart, "=======", "x", ">>>>>>> SUGGESTION", "b"]);
    expect(region?.currentEnd).toBe(2);
    expect(region?.currentStart).toBe(3);
  });

  it("uses the configured incoming label", () => {
    const { engine } = setup({ incomingLabel: "AI" });
    const buffer = makeBuffer("a");
    engine.insertConflict(buffer, { startLine: 1, endLine: 1 }, ["b"]);
    expect(buffer.getLines()[4]).toBe(">>>>>>> AI");
  });

  it("returns null for a closed buffer", () => {
    const { engine } = setup();
    const buffer = makeBuffer("a");
    buffer.close();
    expect(engine.insertConflict(buffer, { startLine: 1, endLine: 1 }, ["b"])).toBeNull();
  });
});

describe("detectConflicts", () => {
  it("finds regions written by insertConflict", () => {
    const { engine } = setup();
    expect(engine.detectConflicts(makeBuffer(STAGED))).toEqual([
      { startLine: 2, currentStart: 3, currentEnd: 3, separatorLine: 4, incomingStart: 5, incomingEnd: 6, endLine: 7 },
    ]);
  });

  it("drops a region with no separator and restarts on a new start marker", () => {
    const { engine } = setup();
    const buffer = makeBuffer(
      ["<<<<<<< A", "x", ">>>>>>> A", "<<<<<<< B", "<<<<<<< C", "c", "=======", "d", ">>>>>>> C"].join("\n")
    );
    const conflicts = engine.detectConflicts(buffer);
    expect(conflicts).toHaveLength(1);
    expect(conflicts[0]?.startLine).toBe(5);
  });

  it("finds the region containing a line", () => {
    const { engine } = setup();
    const buffer = makeBuffer(STAGED);
    expect(engine.getConflictAt(buffer, 7)?.startLine).toBe(2);
    expect(engine.getConflictAt(buffer, 8)).toBeUndefined();
    expect(engine.countConflicts(buffer)).toBe(1);
  });
});

describe("resolution", () => {
  it.each([
    ["current", "top\nold();\nbottom"],
    ["incoming", "top\nnext();\nagain();\nbottom"],
    ["both", "top\nold();\nnext();\nagain();\nbottom"],
    ["none", "top\nbottom"],
  ] as const)("accepts %s", (choice, expected) => {
    const { engine } = setup({ lintAfterAccept: false });
    const buffer = makeBuffer(STAGED);
    const conflict = engine.detectConflicts(buffer)[0];
    if (!conflict) throw new Error("expected a conflict");

    engine.resolve(buffer, conflict, choice);
    expect(buffer.getText()).toBe(expected);
  });

  it("reports the kept lines and fires an event", () => {
    const { engine } = setup();
    const buffer = makeBuffer(STAGED);
    const resolved: ConflictResolved[] = [];
    engine.onDidResolveConflict.event((e) => resolved.push(e));

    const result = engine.acceptAt(buffer, 4, "incoming");
    expect(result).toEqual({ choice: "incoming", startLine: 2, lineCount: 2, remaining: 0 });
    expect(resolved).toEqual([{ bufferId: buffer.id, result }]);
  });

  it("resolves the conflict under the cursor", () => {
    const { engine, editor } = setup();
    const buffer = makeBuffer(STAGED);
    editor.cursors.set(buffer.id, 3);
    expect(engine.acceptCurrent(buffer)?.choice).toBe("current");
    expect(buffer.getText()).toBe("top\nold();\nbottom");
  });

  it("returns null without a cursor or conflict", () => {
    const { engine, editor, logger } = setup();
    const buffer = makeBuffer(STAGED);
    expect(engine.acceptIncoming(buffer)).toBeNull();
    editor.cursors.set(buffer.id, 1);
    expect(engine.acceptBoth(buffer)).toBeNull();
    expect(logger.warn).toHaveBeenLastCalledWith("No conflict at line 1");
  });

  it("focuses the next conflict after a resolution", () => {
    const { engine, editor } = setup();
    const buffer = makeBuffer([STAGED, STAGED].join("\n"));
    engine.acceptAt(buffer, 2, "none");
    // the second region moved up to line 4
    expect(editor.revealed).toEqual([{ bufferId: buffer.id, line: 4 }]);
  });

  it("resolves every conflict bottom-up", () => {
    const { engine } = setup({ lintAfterAccept: false });
    const buffer = makeBuffer([STAGED, STAGED].join("\n"));
    const changes: ConflictsChange[] = [];
    engine.onDidChangeConflicts.event((c) => changes.push(c));

    expect(engine.resolveAll(buffer, "current")).toBe(2);
    expect(buffer.getText()).toBe("top\nold();\nbottom\ntop\nold();\nbottom");
    expect(changes).toEqual([{ bufferId: buffer.id, conflicts: [] }]);
  });

  it("validates accepted incoming code", async () => {
    const { engine, lint } = setup();
    const buffer = makeBuffer(STAGED);
    engine.acceptAt(buffer, 2, "incoming");
    await Promise.resolve();
    expect(lint.validated).toEqual([{ bufferId: buffer.id, startLine: 2, endLine: 3 }]);
  });

  it("skips validation for kept current code", async () => {
    const { engine, lint } = setup();
    const buffer = makeBuffer(STAGED);
    engine.acceptAt(buffer, 2, "current");
    await Promise.resolve();
    expect(lint.validated).toEqual([]);
  });

  it("requests a fix for lint errors when enabled", async () => {
    const { engine, lint, logger } = setup({ autoFixLintErrors: true });
    lint.result = makeLintResult();
    const buffer = makeBuffer(STAGED);
    engine.acceptAt(buffer, 2, "both");

    await vi.waitFor(() => expect(lint.fixRequests).toHaveLength(1));
    expect(logger.warn).toHaveBeenCalledWith("Lint: 1 error(s) in lines 2-4 of /work/src/app.ts");
  });
});

describe("navigation", () => {
  it("moves forward and wraps", () => {
    const { engine, editor } = setup();
    const buffer = makeBuffer([STAGED, STAGED].join("\n"));
    editor.cursors.set(buffer.id, 3);

    expect(engine.gotoNext(buffer)?.startLine).toBe(10);
    expect(engine.gotoNext(buffer)?.startLine).toBe(2);
  });

  it("moves backward and wraps", () => {
    const { engine, editor } = setup();
    const buffer = makeBuffer([STAGED, STAGED].join("\n"));
    editor.cursors.set(buffer.id, 12);

    expect(engine.gotoPrev(buffer)?.startLine).toBe(10);
    expect(engine.gotoPrev(buffer)?.startLine).toBe(2);
    expect(engine.gotoPrev(buffer)?.startLine).toBe(10);
  });

  it("returns null when there are no conflicts", () => {
    const { engine } = setup();
    expect(engine.gotoNext(makeBuffer("a"))).toBeNull();
  });

  it("focuses the first conflict when presenting", () => {
    const { engine, editor } = setup();
    const buffer = makeBuffer(STAGED);
    expect(engine.presentConflicts(buffer)).toBe(1);
    expect(editor.revealed).toEqual([{ bufferId: buffer.id, line: 2 }]);
  });

  it("does not move the cursor when autoShowMenu is off", () => {
    const { engine, editor } = setup({ autoShowMenu: false });
    engine.presentConflicts(makeBuffer(STAGED));
    expect(editor.revealed).toEqual([]);
  });
});

describe("buildMenu", () => {
  it("labels each choice with line counts", () => {
    const { engine } = setup();
    const buffer = makeBuffer(STAGED);
    const conflict = engine.detectConflicts(buffer)[0];
    if (!conflict) throw new Error("expected a conflict");

    expect(engine.buildMenu(buffer, conflict)).toEqual([
      { choice: "current", label: "Accept CURRENT (original) - 1 lines", description: "old();" },
      { choice: "incoming", label: "Accept INCOMING (AI suggestion) - 2 lines", description: "next(); ⏎ again();" },
      { choice: "both", label: "Accept BOTH versions - 3 lines total", description: "" },
      { choice: "none", label: "Delete conflict (accept NONE)", description: "" },
    ]);
  });
});
