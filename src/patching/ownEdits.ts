// ===========================================================================
// Own edit ledger
//
// Edits a buffer has sent to its document and not yet seen come back as
// document change events. Any change the ledger cannot claim was made by
// someone else.
// ===========================================================================

export interface EditPosition {
  readonly line: number;
  readonly character: number;
}

/** Structurally a document content change. */
export interface DocumentEdit {
  readonly range: { readonly start: EditPosition; readonly end: EditPosition };
  readonly text: string;
}

export class OwnEditLedger {
  private readonly expected: DocumentEdit[] = [];

  get size(): number {
    return this.expected.length;
  }

  expect(edit: DocumentEdit): void {
    this.expected.push(edit);
  }

  /** Remove and report the first expected edit equal to `change`. */
  claim(change: DocumentEdit): boolean {
    const index = this.expected.findIndex((edit) => sameEdit(edit, change));
    if (index === -1) return false;
    this.expected.splice(index, 1);
    return true;
  }

  /** Split `changes` into those this buffer made and the rest. */
  partition<T extends DocumentEdit>(changes: readonly T[]): { own: T[]; foreign: T[] } {
    const own: T[] = [];
    const foreign: T[] = [];
    for (const change of changes) {
      (this.claim(change) ? own : foreign).push(change);
    }
    return { own, foreign };
  }

  clear(): void {
    this.expected.length = 0;
  }
}

function sameEdit(a: DocumentEdit, b: DocumentEdit): boolean {
  return (
    samePosition(a.range.start, b.range.start) &&
    samePosition(a.range.end, b.range.end) &&
    withoutCarriageReturns(a.text) === withoutCarriageReturns(b.text)
  );
}

function samePosition(a: EditPosition, b: EditPosition): boolean {
  return a.line === b.line && a.character === b.character;
}

function withoutCarriageReturns(text: string): string {
  return text.replace(/\r\n/g, "\n");
}
