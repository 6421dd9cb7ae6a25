// Debug Export - Generate JSON debug reports for a comparison

import type { Document } from '../types/document.types';
import type {
  AlignmentDebug,
  AlignmentDecision,
  ComparisonReport,
  DebugReport,
  DocumentInventory
} from '../types/debug.types';
import { summarizeDiff } from '../diff/diff-summary';

export class DebugExporter {
  /**
   * Generate a debug report from the comparison report
   */
  generateReport(
    docA: Document,
    docB: Document,
    report: ComparisonReport,
    timestamp: string = new Date().toISOString()
  ): DebugReport {
    return {
      timestamp,
      documents: {
        a: this.inventory(docA),
        b: this.inventory(docB)
      },
      alignment: this.generateAlignmentDebug(report.alignmentDecisions),
      qualitySignals: report.qualitySignals,
      summary: summarizeDiff(report.result)
    };
  }

  /**
   * Count the elements extracted for a document
   */
  private inventory(doc: Document): DocumentInventory {
    let textBlocks = 0;
    let tables = 0;
    let cells = 0;
    let images = 0;

    for (const page of doc.pages) {
      textBlocks += page.textBlocks.length;
      tables += page.tables.length;
      images += page.images.length;
      for (const table of page.tables) {
        cells += table.rows.reduce((sum, row) => sum + row.length, 0);
      }
    }

    return { label: doc.label, pageCount: doc.pages.length, textBlocks, tables, cells, images };
  }

  /**
   * Generate alignment debug info from decisions
   */
  private generateAlignmentDebug(decisions: AlignmentDecision[]): AlignmentDebug {
    let exactMatches = 0;
    let fuzzyMatches = 0;
    let deletions = 0;
    let insertions = 0;

    for (const decision of decisions) {
      switch (decision.matchType) {
        case 'exact':
          exactMatches++;
          break;
        case 'fuzzy':
          fuzzyMatches++;
          break;
        case 'delete':
          deletions++;
          break;
        case 'insert':
          insertions++;
          break;
      }
    }

    return {
      exactMatches,
      fuzzyMatches,
      deletions,
      insertions,
      decisions
    };
  }

  /**
   * Serialize a debug report as pretty-printed JSON
   */
  toJson(report: DebugReport): string {
    return JSON.stringify(report, null, 2);
  }
}
