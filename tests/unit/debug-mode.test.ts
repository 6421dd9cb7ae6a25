// Unit tests for Debug Mode functionality

import { describe, it, expect, beforeEach } from 'vitest';
import { DiffEngine } from '../../src/diff/diff-engine';
import { DebugExporter } from '../../src/export/debug-export';
import { createMixedDocument, createTextDocument } from '../helpers/document-factory';
import type { DebugReport } from '../../src/types/debug.types';

const TIMESTAMP = '2026-01-01T00:00:00.000Z';

describe('DiffEngine Debug Mode', () => {
  let diffEngine: DiffEngine;

  beforeEach(() => {
    diffEngine = new DiffEngine();
  });

  it('should toggle debug mode', () => {
    expect(diffEngine.isDebugMode()).toBe(false);
    diffEngine.setDebugMode(true);
    expect(diffEngine.isDebugMode()).toBe(true);
  });

  it('should always return alignment decisions regardless of debug mode', async () => {
    const doc1 = createTextDocument('a.pdf', ['Hello world']);
    const doc2 = createTextDocument('b.pdf', ['Hello beautiful world']);

    const report = await diffEngine.compareWithDebug(doc1, doc2);

    expect(report.alignmentDecisions).toHaveLength(1);
    expect(report.alignmentDecisions[0]).toMatchObject({
      pageIndex: 0,
      unit: 'text-block',
      originalIndex: 0,
      currentIndex: 0,
      matchType: 'fuzzy',
      originalPreview: 'Hello world',
      currentPreview: 'Hello beautiful world'
    });
    expect(report.alignmentDecisions[0].similarityScore).toBeCloseTo(2 / 3);
  });

  it('should log progress only in debug mode', async () => {
    const doc = createTextDocument('a.pdf', ['Same']);

    await diffEngine.compare(doc, doc);
    expect(console.log).not.toHaveBeenCalled();

    diffEngine.setDebugMode(true);
    await diffEngine.compare(doc, doc);
    expect(console.log).toHaveBeenCalledWith('[DiffEngine] Comparing "a.pdf" (1 pages) with "a.pdf" (1 pages)');
    expect(console.log).toHaveBeenCalledWith('[DiffEngine] 1 records, 0 changes');
  });

  it('should always warn about quality signals', async () => {
    const engine = new DiffEngine({ textSimilarityThreshold: 0 });

    const report = await engine.compareWithDebug(
      createTextDocument('a.pdf', ['alpha beta']),
      createTextDocument('b.pdf', ['gamma delta'])
    );

    expect(report.qualitySignals).toHaveLength(1);
    expect(console.warn).toHaveBeenCalledWith(
      '[DiffEngine] Page 0 disjoint-text: Blocks 0/0 share no token; reported as a single replace'
    );
  });

  it('should truncate long previews to 100 characters', async () => {
    const longText = 'word '.repeat(40).trim();
    const report = await diffEngine.compareWithDebug(
      createTextDocument('a.pdf', [longText]),
      createTextDocument('b.pdf', [longText])
    );

    expect(report.alignmentDecisions[0].originalPreview).toHaveLength(100);
  });
});

describe('DebugExporter', () => {
  const exporter = new DebugExporter();

  async function buildReport(): Promise<DebugReport> {
    const docA = createMixedDocument('original.pdf', 'original');
    const docB = createMixedDocument('revised.pdf', 'revised');
    const report = await new DiffEngine().compareWithDebug(docA, docB);
    return exporter.generateReport(docA, docB, report, TIMESTAMP);
  }

  it('should inventory both documents', async () => {
    const report = await buildReport();

    expect(report.timestamp).toBe(TIMESTAMP);
    expect(report.documents.a).toEqual({
      label: 'original.pdf',
      pageCount: 2,
      textBlocks: 6,
      tables: 1,
      cells: 6,
      images: 1
    });
    expect(report.documents.b).toEqual({
      label: 'revised.pdf',
      pageCount: 2,
      textBlocks: 5,
      tables: 1,
      cells: 6,
      images: 2
    });
  });

  it('should count alignment decisions by type', async () => {
    const { alignment } = await buildReport();

    expect(alignment.exactMatches).toBe(5);
    expect(alignment.fuzzyMatches).toBe(2);
    expect(alignment.deletions).toBe(2);
    expect(alignment.insertions).toBe(1);
    expect(alignment.decisions).toHaveLength(10);
  });

  it('should serialize to parseable JSON', async () => {
    const report = await buildReport();

    expect(JSON.parse(exporter.toJson(report))).toEqual(report);
  });
});
