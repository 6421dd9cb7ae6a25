/**
 * Comparison Error Classes
 *
 * Every failure surfaced by the engine is a ComparisonError carrying the
 * category and the pipeline stage it came from. Degraded alignments are not
 * errors; they are reported as quality signals.
 */

export type ComparisonErrorCategory =
  | 'STRUCTURAL_MISMATCH'
  | 'PARTIAL_RESULT'
  | 'PAGE_STAGE_FAILED'
  | 'FINGERPRINT_ERROR'
  | 'COVERAGE_VIOLATION'
  | 'CONFIG_INVALID';

export type ComparisonStage =
  | 'validation'
  | 'tokenize'
  | 'text-alignment'
  | 'table-diff'
  | 'image-matching'
  | 'assembly'
  | 'scheduling'
  | 'page-merge';

export class ComparisonError extends Error {
  constructor(
    message: string,
    public readonly category: ComparisonErrorCategory,
    public readonly stage: ComparisonStage
  ) {
    super(message);
    this.name = 'ComparisonError';
  }
}

export class StructuralMismatchError extends ComparisonError {
  constructor(
    message: string,
    public readonly documentLabel: string
  ) {
    super(message, 'STRUCTURAL_MISMATCH', 'validation');
    this.name = 'StructuralMismatchError';
  }
}

export class PageStageError extends ComparisonError {
  constructor(
    message: string,
    stage: ComparisonStage,
    public readonly pageIndex: number,
    public readonly originalError?: unknown
  ) {
    super(message, 'PAGE_STAGE_FAILED', stage);
    this.name = 'PageStageError';
  }
}

export interface PageFailure {
  pageIndex: number;
  stage: ComparisonStage;
  message: string;
}

export class PartialResultError extends ComparisonError {
  public readonly affectedPages: number[];

  constructor(
    message: string,
    public readonly failures: PageFailure[],
    public readonly cancelled: boolean
  ) {
    super(message, 'PARTIAL_RESULT', 'scheduling');
    this.name = 'PartialResultError';
    this.affectedPages = failures.map(f => f.pageIndex).sort((x, y) => x - y);
  }
}

export class FingerprintError extends ComparisonError {
  constructor(message: string) {
    super(message, 'FINGERPRINT_ERROR', 'image-matching');
    this.name = 'FingerprintError';
  }
}

export class CoverageError extends ComparisonError {
  constructor(
    message: string,
    public readonly violations: string[]
  ) {
    super(message, 'COVERAGE_VIOLATION', 'assembly');
    this.name = 'CoverageError';
  }
}

export interface ConfigIssue {
  path: string;
  message: string;
}

export class ConfigError extends ComparisonError {
  constructor(
    message: string,
    public readonly issues: ConfigIssue[]
  ) {
    super(message, 'CONFIG_INVALID', 'validation');
    this.name = 'ConfigError';
  }
}

/**
 * Wrap anything thrown inside a page stage so the caller learns which stage
 * and page failed. ComparisonErrors keep their own stage.
 */
export function toPageFailure(error: unknown, pageIndex: number, fallbackStage: ComparisonStage): PageFailure {
  if (error instanceof ComparisonError) {
    return { pageIndex, stage: error.stage, message: error.message };
  }
  const message = error instanceof Error ? error.message : String(error);
  return { pageIndex, stage: fallbackStage, message };
}
