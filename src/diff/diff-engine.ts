// Diff Engine - per-page text, table and image diffs joined into one result

import type { Document, Page } from '../types/document.types';
import type { DiffResult, PageDiff } from '../types/diff.types';
import type { AlignmentDecision, ComparisonReport, QualitySignal } from '../types/debug.types';
import { resolveConfig, type ComparisonConfig, type ComparisonConfigInput } from '../config/comparison-config';
import {
  ComparisonError,
  CoverageError,
  PageStageError,
  StructuralMismatchError,
  type ComparisonStage
} from '../errors';
import { diffTextBlocks } from './text-differ';
import { diffTables } from './table-differ';
import { diffImages } from './image-matcher';
import { assemble, checkCoverage } from './diff-assembler';
import { runPageTasks } from './page-scheduler';
import { mergePages } from '../renderer/page-merger';
import type { MergedPage } from '../types/merge.types';

export interface CompareOptions {
  /** Aborting before every page finished fails the comparison with PartialResultError */
  signal?: AbortSignal;
}

interface PageOutcome {
  diff: PageDiff;
  decisions: AlignmentDecision[];
  signals: QualitySignal[];
}

export class DiffEngine {
  private debugMode: boolean = false;
  private readonly config: ComparisonConfig;

  constructor(config: ComparisonConfigInput = {}) {
    this.config = resolveConfig(config);
  }

  /**
   * Enable or disable debug mode
   */
  setDebugMode(enabled: boolean): void {
    this.debugMode = enabled;
  }

  /**
   * Check if debug mode is enabled
   */
  isDebugMode(): boolean {
    return this.debugMode;
  }

  getConfig(): ComparisonConfig {
    return this.config;
  }

  async compare(docA: Document, docB: Document, options: CompareOptions = {}): Promise<DiffResult> {
    const report = await this.compareWithDebug(docA, docB, options);
    return report.result;
  }

  async compareWithDebug(docA: Document, docB: Document, options: CompareOptions = {}): Promise<ComparisonReport> {
    validateDocument(docA);
    validateDocument(docB);

    const pageCount = Math.max(docA.pages.length, docB.pages.length);
    if (this.debugMode) {
      console.log(`[DiffEngine] Comparing "${docA.label}" (${docA.pages.length} pages) with "${docB.label}" (${docB.pages.length} pages)`);
    }

    const outcomes = await runPageTasks(
      pageCount,
      pageIndex => this.diffPageWithDebug(docA.pages[pageIndex], docB.pages[pageIndex], pageIndex),
      { limit: this.config.parallelism, signal: options.signal }
    );

    const result = assemble(...outcomes.map(outcome => outcome.diff));
    const violations = checkCoverage(docA, docB, result);
    if (violations.length > 0) {
      throw new CoverageError(
        `Diff result does not cover every element exactly once (${violations.length} violation(s))`,
        violations
      );
    }

    const qualitySignals = outcomes.flatMap(outcome => outcome.signals);
    for (const signal of qualitySignals) {
      console.warn(`[DiffEngine] Page ${signal.pageIndex} ${signal.kind}: ${signal.message}`);
    }

    if (this.debugMode) {
      console.log(`[DiffEngine] ${result.records.length} records, ${result.totalChanges} changes`);
    }

    return {
      result,
      alignmentDecisions: outcomes.flatMap(outcome => outcome.decisions),
      qualitySignals
    };
  }

  /**
   * Side-by-side geometry for the renderer; highlights follow `highlightEnabled`.
   */
  mergePages(docA: Document, docB: Document, result?: DiffResult, maxPages?: number): MergedPage[] {
    return mergePages(docA, docB, result, {
      highlightEnabled: this.config.highlightEnabled,
      gutter: this.config.gutter,
      maxPages
    });
  }

  /**
   * Diff one page index. A page missing on one side diffs against an empty page.
   */
  diffPage(pageA: Page | undefined, pageB: Page | undefined, pageIndex: number): PageDiff {
    return this.diffPageWithDebug(pageA, pageB, pageIndex).diff;
  }

  private diffPageWithDebug(pageA: Page | undefined, pageB: Page | undefined, pageIndex: number): PageOutcome {
    const { normalization, contextSize } = this.config;

    const text = runStage('text-alignment', pageIndex, () => diffTextBlocks(
      pageIndex,
      pageA?.textBlocks ?? [],
      pageB?.textBlocks ?? [],
      { policy: normalization, textSimilarityThreshold: this.config.textSimilarityThreshold, contextSize }
    ));

    const tables = runStage('table-diff', pageIndex, () => diffTables(
      pageIndex,
      pageA?.tables ?? [],
      pageB?.tables ?? [],
      { policy: normalization, rowSimilarityThreshold: this.config.rowSimilarityThreshold, contextSize }
    ));

    const images = runStage('image-matching', pageIndex, () => diffImages(
      pageIndex,
      pageA?.images ?? [],
      pageB?.images ?? [],
      {
        imageDistanceThreshold: this.config.imageDistanceThreshold,
        greedyWarningThreshold: this.config.greedyWarningThreshold
      }
    ));

    return {
      diff: {
        pageIndex,
        present: { a: pageA !== undefined, b: pageB !== undefined },
        text: text.changes,
        tables: tables.changes,
        images: images.changes
      },
      decisions: [...text.decisions, ...tables.decisions],
      signals: [...text.signals, ...tables.signals, ...images.signals]
    };
  }
}

function runStage<T>(stage: ComparisonStage, pageIndex: number, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (error instanceof ComparisonError) throw error;
    const message = error instanceof Error ? error.message : String(error);
    throw new PageStageError(`Page ${pageIndex} failed during ${stage}: ${message}`, stage, pageIndex, error);
  }
}

function validateDocument(doc: Document): void {
  if (doc.pages.length === 0) {
    throw new StructuralMismatchError(`Document "${doc.label}" has no pages; nothing to compare`, doc.label);
  }
  doc.pages.forEach((page, position) => {
    if (page.index !== position) {
      throw new StructuralMismatchError(
        `Document "${doc.label}" has page index ${page.index} at position ${position}`,
        doc.label
      );
    }
  });
}
