// Sequence alignment - minimal edit scripts with a longest-run tie-break

import { diffArrays } from 'diff';

export type SequenceOp =
  | { kind: 'equal'; a: number; b: number }
  | { kind: 'delete'; a: number }
  | { kind: 'insert'; b: number };

// Above this many (A, B) position pairs the tie-break tables are skipped
const MAX_TIE_BREAK_CELLS = 250_000;

interface Segment {
  startA: number;
  endA: number;
  startB: number;
  endB: number;
}

/**
 * Minimal (longest common subsequence) edit script between two sequences.
 * Among all minimal scripts, the one whose longest equal run is longest wins;
 * equal lengths go to the run starting earliest in A, then in B. The same
 * rule applies recursively on both sides of the chosen run.
 *
 * Inputs with more than MAX_TIE_BREAK_CELLS position pairs fall back to
 * jsdiff's Myers script, which is minimal but may break ties differently.
 */
export function alignSequences<T>(seqA: T[], seqB: T[]): SequenceOp[] {
  if (seqA.length * seqB.length > MAX_TIE_BREAK_CELLS) {
    return myersOps(seqA, seqB);
  }

  const ops: SequenceOp[] = [];
  alignSegment(seqA, seqB, { startA: 0, endA: seqA.length, startB: 0, endB: seqB.length }, ops);
  return ops;
}

function alignSegment<T>(seqA: T[], seqB: T[], segment: Segment, ops: SequenceOp[]): void {
  const { startA, endA, startB, endB } = segment;
  const n = endA - startA;
  const m = endB - startB;
  const width = m + 1;
  const at = (x: number, y: number) => x * width + y;
  const same = (x: number, y: number) => seqA[startA + x] === seqB[startB + y];

  // prefix[x,y]: LCS of the first x and y items; suffix/run: from (x, y) onwards
  const prefix = new Int32Array((n + 1) * width);
  const suffix = new Int32Array((n + 1) * width);
  const run = new Int32Array((n + 1) * width);

  for (let x = 1; x <= n; x++) {
    for (let y = 1; y <= m; y++) {
      prefix[at(x, y)] = same(x - 1, y - 1)
        ? prefix[at(x - 1, y - 1)] + 1
        : Math.max(prefix[at(x - 1, y)], prefix[at(x, y - 1)]);
    }
  }
  for (let x = n - 1; x >= 0; x--) {
    for (let y = m - 1; y >= 0; y--) {
      if (same(x, y)) {
        suffix[at(x, y)] = suffix[at(x + 1, y + 1)] + 1;
        run[at(x, y)] = run[at(x + 1, y + 1)] + 1;
      } else {
        suffix[at(x, y)] = Math.max(suffix[at(x + 1, y)], suffix[at(x, y + 1)]);
      }
    }
  }

  const total = prefix[at(n, m)];
  if (total === 0) {
    for (let x = startA; x < endA; x++) ops.push({ kind: 'delete', a: x });
    for (let y = startB; y < endB; y++) ops.push({ kind: 'insert', b: y });
    return;
  }

  // Longest run that still fits a minimal script, earliest on ties
  let bestX = 0;
  let bestY = 0;
  let bestLength = 0;
  for (let x = 0; x < n; x++) {
    for (let y = 0; y < m; y++) {
      for (let length = run[at(x, y)]; length > bestLength; length--) {
        if (prefix[at(x, y)] + length + suffix[at(x + length, y + length)] === total) {
          bestX = x;
          bestY = y;
          bestLength = length;
          break;
        }
      }
    }
  }

  alignSegment(seqA, seqB, { startA, endA: startA + bestX, startB, endB: startB + bestY }, ops);
  for (let k = 0; k < bestLength; k++) {
    ops.push({ kind: 'equal', a: startA + bestX + k, b: startB + bestY + k });
  }
  alignSegment(seqA, seqB, {
    startA: startA + bestX + bestLength,
    endA,
    startB: startB + bestY + bestLength,
    endB
  }, ops);
}

function myersOps<T>(seqA: T[], seqB: T[]): SequenceOp[] {
  const ops: SequenceOp[] = [];
  let a = 0;
  let b = 0;

  for (const change of diffArrays(seqA, seqB)) {
    const count = change.count ?? change.value.length;
    for (let k = 0; k < count; k++) {
      if (change.removed) {
        ops.push({ kind: 'delete', a: a++ });
      } else if (change.added) {
        ops.push({ kind: 'insert', b: b++ });
      } else {
        ops.push({ kind: 'equal', a: a++, b: b++ });
      }
    }
  }

  return ops;
}
