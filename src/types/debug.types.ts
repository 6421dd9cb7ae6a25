// Debug type definitions for diff engine diagnostics

import type { ChangeKind, DiffResult, Operation } from './diff.types';
import type { ComparisonStage } from '../errors';

export type UnitKind = 'text-block' | 'table-row';

export interface AlignmentDecision {
  pageIndex: number;
  unit: UnitKind;
  /** Table position on the page, for table-row decisions */
  tableIndex?: number;
  originalIndex: number | null;
  currentIndex: number | null;
  matchType: 'exact' | 'fuzzy' | 'delete' | 'insert';
  similarityScore?: number;
  reason: string;
  originalPreview?: string;
  currentPreview?: string;
}

export type QualitySignalKind = 'disjoint-text' | 'table-shape' | 'greedy-assignment';

/** Degraded-but-valid alignment; never fails a comparison */
export interface QualitySignal {
  pageIndex: number;
  stage: ComparisonStage;
  kind: QualitySignalKind;
  message: string;
}

export interface ComparisonReport {
  result: DiffResult;
  alignmentDecisions: AlignmentDecision[];
  qualitySignals: QualitySignal[];
}

export interface DocumentInventory {
  label: string;
  pageCount: number;
  textBlocks: number;
  tables: number;
  cells: number;
  images: number;
}

export interface AlignmentDebug {
  exactMatches: number;
  fuzzyMatches: number;
  deletions: number;
  insertions: number;
  decisions: AlignmentDecision[];
}

export interface DiffSummary {
  pagesCompared: number;
  pageCountMismatch: boolean;
  totalRecords: number;
  totalChanges: number;
  byKind: Record<ChangeKind, Record<Operation, number>>;
  changedPages: number[];
  imagesMatched: number;
  imagesUnmatchedA: number;
  imagesUnmatchedB: number;
  changedCells: number;
}

export interface DebugReport {
  timestamp: string;
  documents: { a: DocumentInventory; b: DocumentInventory };
  alignment: AlignmentDebug;
  qualitySignals: QualitySignal[];
  summary: DiffSummary;
}
