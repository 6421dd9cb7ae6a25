// Diff type definitions

import type { BoundingBox } from './document.types';

export type Operation = 'equal' | 'insert' | 'delete' | 'replace';

export type ChangeKind = 'text' | 'table' | 'image';

/** Half-open token range `[start, end)` */
export type TokenRange = [number, number];

export interface EditRun {
  op: Operation;
  tokensA: string[];
  tokensB: string[];
  rangeA: TokenRange;
  rangeB: TokenRange;
  /** Only on replace runs: matched tokens inside the run / longer side */
  similarity?: number;
}

/**
 * A window of the edit script around one or more non-equal runs, padded with
 * up to `contextSize` equal tokens on each side.
 */
export interface Hunk {
  rangeA: TokenRange;
  rangeB: TokenRange;
  runs: EditRun[];
}

export interface TextAlignment {
  runs: EditRun[];
  hunks: Hunk[];
  similarity: number;
  /** True when the sequences shared no token and the script fell back to one replace */
  degraded: boolean;
}

export interface SourceLocation {
  pageIndex: number;
  bbox: BoundingBox;
}

interface ChangeBase {
  operation: Operation;
  pageIndex: number;
  /** Location in document A; absent for inserts */
  a?: SourceLocation;
  /** Location in document B; absent for deletes */
  b?: SourceLocation;
  /** 1 for equal records, [0, 1) for replace records */
  similarity?: number;
  changeId?: string;
}

export interface TextChange extends ChangeBase {
  kind: 'text';
  blockA?: number;
  blockB?: number;
  edits?: TextAlignment;
}

export interface CellRef {
  row: number;
  column: number;
}

export type TableScope = 'table' | 'row' | 'column' | 'cell';

export interface TableChange extends ChangeBase {
  kind: 'table';
  scope: TableScope;
  tableA?: number;
  tableB?: number;
  cellsA: CellRef[];
  cellsB: CellRef[];
  edits?: TextAlignment;
}

export interface ImageChange extends ChangeBase {
  kind: 'image';
  imageA?: number;
  imageB?: number;
  /** Hamming distance between the paired fingerprints */
  distance?: number;
}

export type ChangeRecord = TextChange | TableChange | ImageChange;

export interface PageDiff {
  pageIndex: number;
  /** Whether each document has a page at this index */
  present: { a: boolean; b: boolean };
  text: TextChange[];
  tables: TableChange[];
  images: ImageChange[];
}

export interface DiffResult {
  records: ChangeRecord[];
  totalChanges: number;
  pageCount: { a: number; b: number };
}

export interface MatchedPair {
  a: number;
  b: number;
  distance: number;
}

export interface MatchAssignment {
  pageIndex: number;
  bitWidth: number;
  pairs: MatchedPair[];
  unmatchedA: number[];
  unmatchedB: number[];
}
