// Text Aligner - token-level edit scripts, grouped into runs and hunks

import { diffArrays } from 'diff';
import type { EditRun, Hunk, TextAlignment, TokenRange } from '../types/diff.types';
import { alignSequences, type SequenceOp } from './sequence-alignment';

// Configuration for coalescing delete/insert runs into replace runs
const GROUPING_CONFIG = {
  MAX_UNCHANGED_GAP: 1,       // Max equal tokens absorbed between two change runs
  MIN_LENGTH_RATIO: 0.5,      // Shorter side must be at least half the longer one
};

export interface AlignOptions {
  contextSize: number;
}

export function align(tokensA: string[], tokensB: string[], options: AlignOptions): TextAlignment {
  const ops = alignSequences(tokensA, tokensB);
  const equalCount = ops.filter(op => op.kind === 'equal').length;
  const longer = Math.max(tokensA.length, tokensB.length);
  const similarity = longer === 0 ? 1 : equalCount / longer;

  if (equalCount === 0 && tokensA.length > 0 && tokensB.length > 0) {
    const runs: EditRun[] = [{
      op: 'replace',
      tokensA: [...tokensA],
      tokensB: [...tokensB],
      rangeA: [0, tokensA.length],
      rangeB: [0, tokensB.length],
      similarity: 0
    }];
    return { runs, hunks: [{ rangeA: [0, tokensA.length], rangeB: [0, tokensB.length], runs }], similarity: 0, degraded: true };
  }

  const runs = coalesceReplaceRuns(buildRuns(ops, tokensA, tokensB));
  return {
    runs,
    hunks: buildHunks(runs, options.contextSize),
    similarity,
    degraded: false
  };
}

/**
 * Share of tokens the two sequences have in common (LCS length over the
 * longer length). Symmetric; 1 for two empty sequences.
 */
export function lcsSimilarity(tokensA: string[], tokensB: string[]): number {
  const longer = Math.max(tokensA.length, tokensB.length);
  if (longer === 0) return 1;

  let common = 0;
  for (const change of diffArrays(tokensA, tokensB)) {
    if (!change.added && !change.removed) {
      common += change.count ?? change.value.length;
    }
  }
  return common / longer;
}

function buildRuns(ops: SequenceOp[], tokensA: string[], tokensB: string[]): EditRun[] {
  const runs: EditRun[] = [];
  let a = 0;
  let b = 0;
  let i = 0;

  while (i < ops.length) {
    if (ops[i].kind === 'equal') {
      const start = i;
      while (i < ops.length && ops[i].kind === 'equal') i++;
      const count = i - start;
      runs.push(makeRun('equal', tokensA, tokensB, [a, a + count], [b, b + count]));
      a += count;
      b += count;
      continue;
    }

    // A gap between equal runs: deletions first, then insertions
    let deleted = 0;
    let inserted = 0;
    while (i < ops.length && ops[i].kind !== 'equal') {
      if (ops[i].kind === 'delete') deleted++;
      else inserted++;
      i++;
    }
    if (deleted > 0) {
      runs.push(makeRun('delete', tokensA, tokensB, [a, a + deleted], [b, b]));
      a += deleted;
    }
    if (inserted > 0) {
      runs.push(makeRun('insert', tokensA, tokensB, [a, a], [b, b + inserted]));
      b += inserted;
    }
  }

  return runs;
}

function makeRun(op: EditRun['op'], tokensA: string[], tokensB: string[], rangeA: TokenRange, rangeB: TokenRange): EditRun {
  return {
    op,
    tokensA: tokensA.slice(rangeA[0], rangeA[1]),
    tokensB: tokensB.slice(rangeB[0], rangeB[1]),
    rangeA,
    rangeB
  };
}

/**
 * Groups neighbouring delete and insert runs of comparable length into a
 * single replace run. Short equal gaps inside the span count as matched tokens.
 */
function coalesceReplaceRuns(runs: EditRun[]): EditRun[] {
  const result: EditRun[] = [];
  let i = 0;

  while (i < runs.length) {
    if (runs[i].op === 'equal') {
      result.push(runs[i]);
      i++;
      continue;
    }

    const end = findChangeSpanEnd(runs, i);
    const span = runs.slice(i, end);
    let deleted = 0;
    let inserted = 0;
    let matched = 0;
    for (const run of span) {
      if (run.op === 'delete') deleted += run.tokensA.length;
      else if (run.op === 'insert') inserted += run.tokensB.length;
      else matched += run.tokensA.length;
    }

    const comparable = deleted > 0 && inserted > 0 &&
      Math.min(deleted, inserted) / Math.max(deleted, inserted) >= GROUPING_CONFIG.MIN_LENGTH_RATIO;

    if (comparable) {
      const first = span[0];
      const last = span[span.length - 1];
      const lengthA = deleted + matched;
      const lengthB = inserted + matched;
      result.push({
        op: 'replace',
        tokensA: span.flatMap(run => run.tokensA),
        tokensB: span.flatMap(run => run.tokensB),
        rangeA: [first.rangeA[0], last.rangeA[1]],
        rangeB: [first.rangeB[0], last.rangeB[1]],
        similarity: matched / Math.max(lengthA, lengthB)
      });
    } else {
      result.push(...span);
    }

    i = end;
  }

  return result;
}

function findChangeSpanEnd(runs: EditRun[], start: number): number {
  let end = start;
  while (end < runs.length) {
    const run = runs[end];
    if (run.op !== 'equal') {
      end++;
      continue;
    }
    const next = runs[end + 1];
    if (run.tokensA.length <= GROUPING_CONFIG.MAX_UNCHANGED_GAP && next !== undefined && next.op !== 'equal') {
      end++;
      continue;
    }
    break;
  }
  // A span never ends on an equal run
  while (end > start && runs[end - 1].op === 'equal') end--;
  return end;
}

function buildHunks(runs: EditRun[], contextSize: number): Hunk[] {
  const groups: Array<[number, number]> = [];

  runs.forEach((run, index) => {
    if (run.op === 'equal') return;
    const last = groups[groups.length - 1];
    if (last) {
      const between = runs.slice(last[1] + 1, index);
      const gap = between.reduce((sum, r) => sum + r.tokensA.length, 0);
      if (gap <= 2 * contextSize) {
        last[1] = index;
        return;
      }
    }
    groups.push([index, index]);
  });

  return groups.map(([first, last]) => {
    const hunkRuns: EditRun[] = [];

    const leading = runs[first - 1];
    if (leading && contextSize > 0) {
      const len = leading.tokensA.length;
      hunkRuns.push(sliceEqualRun(leading, Math.max(0, len - contextSize), len));
    }
    hunkRuns.push(...runs.slice(first, last + 1));
    const trailing = runs[last + 1];
    if (trailing && contextSize > 0) {
      hunkRuns.push(sliceEqualRun(trailing, 0, Math.min(contextSize, trailing.tokensA.length)));
    }

    const head = hunkRuns[0];
    const tail = hunkRuns[hunkRuns.length - 1];
    return {
      rangeA: [head.rangeA[0], tail.rangeA[1]],
      rangeB: [head.rangeB[0], tail.rangeB[1]],
      runs: hunkRuns
    };
  });
}

function sliceEqualRun(run: EditRun, from: number, to: number): EditRun {
  return {
    op: 'equal',
    tokensA: run.tokensA.slice(from, to),
    tokensB: run.tokensB.slice(from, to),
    rangeA: [run.rangeA[0] + from, run.rangeA[0] + to],
    rangeB: [run.rangeB[0] + from, run.rangeB[0] + to]
  };
}
