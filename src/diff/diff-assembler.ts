// Diff Assembler - merges per-page streams into one ordered DiffResult

import type { Document } from '../types/document.types';
import type { ChangeKind, ChangeRecord, DiffResult, PageDiff } from '../types/diff.types';

const KIND_PRIORITY: Record<ChangeKind, number> = {
  text: 0,
  table: 1,
  image: 2
};

/**
 * Order records by (page, top edge, kind). Array.prototype.sort is stable,
 * so records with equal keys keep their per-page emission order.
 */
export function assemble(...pageDiffs: PageDiff[]): DiffResult {
  const records: ChangeRecord[] = pageDiffs
    .flatMap(page => [...page.text, ...page.tables, ...page.images])
    .map(record => ({ ...record }));

  records.sort((x, y) =>
    x.pageIndex - y.pageIndex ||
    topEdge(x) - topEdge(y) ||
    KIND_PRIORITY[x.kind] - KIND_PRIORITY[y.kind]
  );

  let changeId = 0;
  for (const record of records) {
    if (record.operation !== 'equal') {
      record.changeId = `change-${changeId++}`;
    }
  }

  return {
    records,
    totalChanges: changeId,
    pageCount: {
      a: pageDiffs.filter(page => page.present.a).length,
      b: pageDiffs.filter(page => page.present.b).length
    }
  };
}

function topEdge(record: ChangeRecord): number {
  return (record.a ?? record.b)?.bbox.y ?? 0;
}

type Side = 'a' | 'b';

/** Every element a record references, as `side:page:element` keys */
export function referencedElements(record: ChangeRecord): string[] {
  const page = record.pageIndex;
  switch (record.kind) {
    case 'text': {
      const keys: string[] = [];
      if (record.blockA !== undefined) keys.push(`a:${page}:text:${record.blockA}`);
      if (record.blockB !== undefined) keys.push(`b:${page}:text:${record.blockB}`);
      return keys;
    }
    case 'table':
      return [
        ...record.cellsA.map(c => `a:${page}:cell:${record.tableA}:${c.row}:${c.column}`),
        ...record.cellsB.map(c => `b:${page}:cell:${record.tableB}:${c.row}:${c.column}`)
      ];
    case 'image': {
      const keys: string[] = [];
      if (record.imageA !== undefined) keys.push(`a:${page}:image:${record.imageA}`);
      if (record.imageB !== undefined) keys.push(`b:${page}:image:${record.imageB}`);
      return keys;
    }
    default: {
      const unreachable: never = record;
      return unreachable;
    }
  }
}

function documentElements(doc: Document, side: Side): string[] {
  return doc.pages.flatMap(page => [
    ...page.textBlocks.map((_, i) => `${side}:${page.index}:text:${i}`),
    ...page.tables.flatMap((table, t) =>
      table.rows.flatMap((row, r) => row.map((_, c) => `${side}:${page.index}:cell:${t}:${r}:${c}`))
    ),
    ...page.images.map((_, i) => `${side}:${page.index}:image:${i}`)
  ]);
}

/**
 * Check that every text block, cell and image of both documents is
 * referenced by exactly one record. Returns human-readable violations.
 */
export function checkCoverage(docA: Document, docB: Document, result: DiffResult): string[] {
  const expected = new Set([...documentElements(docA, 'a'), ...documentElements(docB, 'b')]);
  const seen = new Map<string, number>();

  for (const record of result.records) {
    for (const key of referencedElements(record)) {
      seen.set(key, (seen.get(key) ?? 0) + 1);
    }
  }

  const violations: string[] = [];
  for (const key of expected) {
    const count = seen.get(key) ?? 0;
    if (count === 0) violations.push(`missing ${key}`);
    else if (count > 1) violations.push(`duplicated ${key} (${count} records)`);
  }
  for (const key of seen.keys()) {
    if (!expected.has(key)) violations.push(`unknown ${key}`);
  }
  return violations;
}
