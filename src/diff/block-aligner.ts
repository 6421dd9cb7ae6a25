// Unit alignment - pairs text blocks or table rows between two sequences

import { lcsSimilarity } from './text-aligner';
import { alignSequences } from './sequence-alignment';

export interface AlignableUnit {
  tokens: string[];
  signature: string;
}

export type UnitPairing =
  | { type: 'exact'; a: number; b: number; similarity: 1 }
  | { type: 'fuzzy'; a: number; b: number; similarity: number }
  | { type: 'delete'; a: number; bestSimilarity?: number }
  | { type: 'insert'; b: number };

/**
 * Align two unit sequences by LCS over their signatures. Inside every
 * unmatched gap the k-th deleted unit is paired with the k-th inserted unit
 * when their token similarity reaches the threshold (inclusive).
 */
export function alignUnits(unitsA: AlignableUnit[], unitsB: AlignableUnit[], threshold: number): UnitPairing[] {
  const ops = alignSequences(
    unitsA.map(u => u.signature),
    unitsB.map(u => u.signature)
  );

  const pairings: UnitPairing[] = [];
  let deleted: number[] = [];
  let inserted: number[] = [];

  const flushGap = () => {
    const span = Math.max(deleted.length, inserted.length);
    for (let k = 0; k < span; k++) {
      const ia = deleted[k];
      const ib = inserted[k];
      if (ia !== undefined && ib !== undefined) {
        const similarity = lcsSimilarity(unitsA[ia].tokens, unitsB[ib].tokens);
        if (similarity >= threshold) {
          pairings.push({ type: 'fuzzy', a: ia, b: ib, similarity });
        } else {
          pairings.push({ type: 'delete', a: ia, bestSimilarity: similarity });
          pairings.push({ type: 'insert', b: ib });
        }
      } else if (ia !== undefined) {
        pairings.push({ type: 'delete', a: ia });
      } else if (ib !== undefined) {
        pairings.push({ type: 'insert', b: ib });
      }
    }
    deleted = [];
    inserted = [];
  };

  for (const op of ops) {
    if (op.kind === 'delete') {
      deleted.push(op.a);
    } else if (op.kind === 'insert') {
      inserted.push(op.b);
    } else {
      flushGap();
      pairings.push({ type: 'exact', a: op.a, b: op.b, similarity: 1 });
    }
  }
  flushGap();

  return pairings;
}
