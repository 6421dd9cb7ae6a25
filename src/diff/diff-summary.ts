// Overview figures for a diff result

import type { ChangeKind, DiffResult, Operation } from '../types/diff.types';
import type { DiffSummary } from '../types/debug.types';

const emptyCounts = (): Record<Operation, number> => ({ equal: 0, insert: 0, delete: 0, replace: 0 });

export function summarizeDiff(result: DiffResult): DiffSummary {
  const byKind: Record<ChangeKind, Record<Operation, number>> = {
    text: emptyCounts(),
    table: emptyCounts(),
    image: emptyCounts()
  };
  const changedPages = new Set<number>();
  let imagesMatched = 0;
  let imagesUnmatchedA = 0;
  let imagesUnmatchedB = 0;
  let changedCells = 0;

  for (const record of result.records) {
    byKind[record.kind][record.operation]++;
    if (record.operation !== 'equal') {
      changedPages.add(record.pageIndex);
    }

    if (record.kind === 'image') {
      if (record.imageA !== undefined && record.imageB !== undefined) imagesMatched++;
      else if (record.imageA !== undefined) imagesUnmatchedA++;
      else imagesUnmatchedB++;
    } else if (record.kind === 'table' && record.operation !== 'equal') {
      // A replaced cell counts once, not once per side
      changedCells += Math.max(record.cellsA.length, record.cellsB.length);
    }
  }

  return {
    pagesCompared: Math.max(result.pageCount.a, result.pageCount.b),
    pageCountMismatch: result.pageCount.a !== result.pageCount.b,
    totalRecords: result.records.length,
    totalChanges: result.totalChanges,
    byKind,
    changedPages: [...changedPages].sort((x, y) => x - y),
    imagesMatched,
    imagesUnmatchedA,
    imagesUnmatchedB,
    changedCells
  };
}
