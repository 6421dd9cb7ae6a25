// Table Differ - row alignment followed by positional cell diff

import type { BoundingBox, Cell, Table } from '../types/document.types';
import type { CellRef, SourceLocation, TableChange } from '../types/diff.types';
import type { AlignmentDecision, QualitySignal } from '../types/debug.types';
import type { NormalizationPolicy } from '../config/comparison-config';
import { tokenize, rowSignature, signature } from './tokenizer';
import { align } from './text-aligner';
import { alignUnits, type AlignableUnit } from './block-aligner';

export interface TableDiffOptions {
  policy: NormalizationPolicy;
  rowSimilarityThreshold: number;
  contextSize: number;
}

export interface TableDiffOutput {
  changes: TableChange[];
  decisions: AlignmentDecision[];
  signals: QualitySignal[];
}

interface TokenizedRow extends AlignableUnit {
  cells: string[][];
}

/**
 * Diff the tables of one page. Tables pair by position; surplus tables on
 * either side become whole-table inserts or deletes.
 */
export function diffTables(
  pageIndex: number,
  tablesA: Table[],
  tablesB: Table[],
  options: TableDiffOptions
): TableDiffOutput {
  const output: TableDiffOutput = { changes: [], decisions: [], signals: [] };
  const count = Math.max(tablesA.length, tablesB.length);

  for (let t = 0; t < count; t++) {
    const tableA = tablesA[t];
    const tableB = tablesB[t];

    if (tableA && tableB) {
      diffTablePair(pageIndex, t, tableA, tableB, options, output);
    } else if (tableA) {
      output.changes.push({
        kind: 'table',
        scope: 'table',
        operation: 'delete',
        pageIndex,
        a: { pageIndex, bbox: tableA.bbox },
        tableA: t,
        cellsA: allCells(tableA),
        cellsB: []
      });
    } else if (tableB) {
      output.changes.push({
        kind: 'table',
        scope: 'table',
        operation: 'insert',
        pageIndex,
        b: { pageIndex, bbox: tableB.bbox },
        tableB: t,
        cellsA: [],
        cellsB: allCells(tableB)
      });
    }
  }

  return output;
}

function diffTablePair(
  pageIndex: number,
  tableIndex: number,
  tableA: Table,
  tableB: Table,
  options: TableDiffOptions,
  output: TableDiffOutput
): void {
  const base = { kind: 'table' as const, pageIndex, tableA: tableIndex, tableB: tableIndex };
  const locA: SourceLocation = { pageIndex, bbox: tableA.bbox };
  const locB: SourceLocation = { pageIndex, bbox: tableB.bbox };

  // Zero rows on either side: the whole table is one record
  if (tableA.rows.length === 0 || tableB.rows.length === 0) {
    if (tableA.rows.length === 0 && tableB.rows.length === 0) {
      output.changes.push({ ...base, scope: 'table', operation: 'equal', a: locA, b: locB, similarity: 1, cellsA: [], cellsB: [] });
    } else if (tableA.rows.length === 0) {
      output.changes.push({ ...base, scope: 'table', operation: 'insert', b: locB, cellsA: [], cellsB: allCells(tableB) });
    } else {
      output.changes.push({ ...base, scope: 'table', operation: 'delete', a: locA, cellsA: allCells(tableA), cellsB: [] });
    }
    return;
  }

  const rowsA = tableA.rows.map(row => tokenizeRow(row, options.policy));
  const rowsB = tableB.rows.map(row => tokenizeRow(row, options.policy));
  const pairings = alignUnits(rowsA, rowsB, options.rowSimilarityThreshold);

  for (const pairing of pairings) {
    switch (pairing.type) {
      case 'exact':
      case 'fuzzy':
        output.decisions.push({
          pageIndex,
          unit: 'table-row',
          tableIndex,
          originalIndex: pairing.a,
          currentIndex: pairing.b,
          matchType: pairing.type,
          similarityScore: pairing.similarity,
          reason: pairing.type === 'exact'
            ? 'Identical row content after normalization'
            : `Row match: ${(pairing.similarity * 100).toFixed(1)}% token overlap (threshold: ${options.rowSimilarityThreshold * 100}%)`,
          originalPreview: rowPreview(tableA.rows[pairing.a]),
          currentPreview: rowPreview(tableB.rows[pairing.b])
        });
        diffRowCells(pageIndex, tableIndex, tableA, tableB, pairing.a, pairing.b, rowsA[pairing.a], rowsB[pairing.b], options, output);
        break;
      case 'delete':
        output.decisions.push({
          pageIndex,
          unit: 'table-row',
          tableIndex,
          originalIndex: pairing.a,
          currentIndex: null,
          matchType: 'delete',
          similarityScore: pairing.bestSimilarity,
          reason: pairing.bestSimilarity !== undefined
            ? `Aligned row only ${(pairing.bestSimilarity * 100).toFixed(1)}% similar (below ${options.rowSimilarityThreshold * 100}% threshold)`
            : 'No counterpart row in the current table',
          originalPreview: rowPreview(tableA.rows[pairing.a])
        });
        output.changes.push({
          ...base,
          scope: 'row',
          operation: 'delete',
          a: { pageIndex, bbox: rowBox(tableA, pairing.a) },
          cellsA: rowCells(tableA, pairing.a),
          cellsB: []
        });
        break;
      case 'insert':
        output.decisions.push({
          pageIndex,
          unit: 'table-row',
          tableIndex,
          originalIndex: null,
          currentIndex: pairing.b,
          matchType: 'insert',
          reason: 'No matching row in the original table',
          currentPreview: rowPreview(tableB.rows[pairing.b])
        });
        output.changes.push({
          ...base,
          scope: 'row',
          operation: 'insert',
          b: { pageIndex, bbox: rowBox(tableB, pairing.b) },
          cellsA: [],
          cellsB: rowCells(tableB, pairing.b)
        });
        break;
    }
  }
}

function diffRowCells(
  pageIndex: number,
  tableIndex: number,
  tableA: Table,
  tableB: Table,
  rowA: number,
  rowB: number,
  tokensA: TokenizedRow,
  tokensB: TokenizedRow,
  options: TableDiffOptions,
  output: TableDiffOutput
): void {
  const base = { kind: 'table' as const, pageIndex, tableA: tableIndex, tableB: tableIndex };
  const widthA = tokensA.cells.length;
  const widthB = tokensB.cells.length;

  if (widthA !== widthB) {
    output.signals.push({
      pageIndex,
      stage: 'table-diff',
      kind: 'table-shape',
      message: `Table ${tableIndex} row ${rowA}/${rowB} has ${widthA} vs ${widthB} columns; trailing cells reported as column changes`
    });
  }

  for (let column = 0; column < Math.max(widthA, widthB); column++) {
    if (column < widthA && column < widthB) {
      const cellA = tokensA.cells[column];
      const cellB = tokensB.cells[column];
      const a = { pageIndex, bbox: cellBox(tableA, rowA, column) };
      const b = { pageIndex, bbox: cellBox(tableB, rowB, column) };
      const cellsA = [{ row: rowA, column }];
      const cellsB = [{ row: rowB, column }];

      if (signature(cellA) === signature(cellB)) {
        output.changes.push({ ...base, scope: 'cell', operation: 'equal', a, b, similarity: 1, cellsA, cellsB });
      } else {
        const edits = align(cellA, cellB, { contextSize: options.contextSize });
        output.changes.push({ ...base, scope: 'cell', operation: 'replace', a, b, similarity: edits.similarity, cellsA, cellsB, edits });
      }
    } else if (column < widthA) {
      output.changes.push({
        ...base,
        scope: 'column',
        operation: 'delete',
        a: { pageIndex, bbox: cellBox(tableA, rowA, column) },
        cellsA: [{ row: rowA, column }],
        cellsB: []
      });
    } else {
      output.changes.push({
        ...base,
        scope: 'column',
        operation: 'insert',
        b: { pageIndex, bbox: cellBox(tableB, rowB, column) },
        cellsA: [],
        cellsB: [{ row: rowB, column }]
      });
    }
  }
}

function tokenizeRow(row: Cell[], policy: NormalizationPolicy): TokenizedRow {
  const cells = row.map(cell => tokenize(cell.text, policy));
  return {
    cells,
    tokens: cells.flat(),
    signature: rowSignature(cells)
  };
}

export function allCells(table: Table): CellRef[] {
  return table.rows.flatMap((row, r) => row.map((_, column) => ({ row: r, column })));
}

function rowCells(table: Table, row: number): CellRef[] {
  return table.rows[row].map((_, column) => ({ row, column }));
}

/**
 * Box of a cell: the extracted one when present, otherwise the table box
 * split evenly into rows and into the columns of that row.
 */
export function cellBox(table: Table, row: number, column: number): BoundingBox {
  const cell = table.rows[row][column];
  if (cell.bbox) return cell.bbox;

  const rowHeight = table.bbox.height / table.rows.length;
  const colWidth = table.bbox.width / table.rows[row].length;
  return {
    x: table.bbox.x + column * colWidth,
    y: table.bbox.y + row * rowHeight,
    width: colWidth,
    height: rowHeight
  };
}

function rowBox(table: Table, row: number): BoundingBox {
  const cells = table.rows[row];
  if (cells.length === 0) {
    const rowHeight = table.bbox.height / table.rows.length;
    return { x: table.bbox.x, y: table.bbox.y + row * rowHeight, width: table.bbox.width, height: rowHeight };
  }

  const boxes = cells.map((_, column) => cellBox(table, row, column));
  const left = Math.min(...boxes.map(b => b.x));
  const top = Math.min(...boxes.map(b => b.y));
  const right = Math.max(...boxes.map(b => b.x + b.width));
  const bottom = Math.max(...boxes.map(b => b.y + b.height));
  return { x: left, y: top, width: right - left, height: bottom - top };
}

function rowPreview(row: Cell[]): string {
  return row.map(cell => cell.text).join(' | ').substring(0, 100);
}
