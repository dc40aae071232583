import type { BufferSnapshot, ITextBuffer, LineRange, StalenessResult } from "./types";

// ===========================================================================
// Buffer snapshots
//
// Content fingerprints of a buffer region, taken when a generation response
// arrives and compared again just before the buffer is mutated.
// ===========================================================================

const HASH_MODULUS = 2147483647;

/** Polynomial rolling hash, hex-encoded. */
export function hashText(text: string): string {
  let hash = 0;
  for (let i = 0; i < text.length; i++) {
    hash = (hash * 31 + text.charCodeAt(i)) % HASH_MODULUS;
  }
  return hash.toString(16);
}

/** Hash of `range`, or of the whole buffer. */
export function hashRegion(buffer: ITextBuffer, range?: LineRange): string {
  const lines = range
    ? buffer.getLines(range.startLine, range.endLine)
    : buffer.getLines();
  return hashText(lines.join("\n"));
}

export function snapshotBuffer(buffer: ITextBuffer, range?: LineRange): BufferSnapshot {
  return {
    bufferId: buffer.id,
    changeCounter: buffer.getChangeCounter(),
    contentHash: hashRegion(buffer, range),
    range,
  };
}

/**
 * The change counter is only a hint: counters that move without a content
 * change are settled by re-hashing the snapshotted region, or `range` when
 * the region has moved since.
 */
export function isSnapshotStale(
  snapshot: BufferSnapshot,
  buffer: ITextBuffer,
  range: LineRange | undefined = snapshot.range
): StalenessResult {
  if (!buffer.isValid() || buffer.id !== snapshot.bufferId) {
    return { stale: true, reason: "buffer_invalid" };
  }

  if (buffer.getChangeCounter() === snapshot.changeCounter) {
    return { stale: false };
  }

  if (hashRegion(buffer, range) !== snapshot.contentHash) {
    return { stale: true, reason: "content_changed" };
  }

  return { stale: false };
}
