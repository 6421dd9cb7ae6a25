// Page Merger - side-by-side page geometry with projected change highlights

import type { BoundingBox, Document, Page } from '../types/document.types';
import type { DiffResult } from '../types/diff.types';
import type { HighlightRect, MergedPage, PagePlacement, Side } from '../types/merge.types';
import type { ComparisonConfig } from '../config/comparison-config';
import { StructuralMismatchError } from '../errors';

export interface MergeOptions extends Pick<ComparisonConfig, 'highlightEnabled' | 'gutter'> {
  /** Stop after this many merged pages */
  maxPages?: number;
}

interface PageSize {
  width: number;
  height: number;
}

/**
 * Place page i of A and page i of B next to each other, both scaled to the
 * taller page's height. The shorter document is padded with blank pages the
 * size of their counterpart.
 */
export function mergePages(
  docA: Document,
  docB: Document,
  result: DiffResult | undefined,
  options: MergeOptions
): MergedPage[] {
  let count = Math.max(docA.pages.length, docB.pages.length);
  if (options.maxPages !== undefined) {
    count = Math.min(count, Math.max(0, options.maxPages));
  }

  const merged: MergedPage[] = [];
  for (let index = 0; index < count; index++) {
    const pageA = docA.pages[index];
    const pageB = docB.pages[index];
    const sizeA = pageSize(pageA ?? pageB, docA.label);
    const sizeB = pageSize(pageB ?? pageA, docB.label);

    const height = Math.max(sizeA.height, sizeB.height);
    const left = place('a', pageA, sizeA, 0, height);
    const right = place('b', pageB, sizeB, left.width + options.gutter, height);

    merged.push({
      index,
      width: right.x + right.width,
      height,
      left,
      right,
      highlights: []
    });
  }

  if (options.highlightEnabled && result) {
    for (const record of result.records) {
      const { operation } = record;
      if (operation === 'equal') continue;
      const page = merged[record.pageIndex];
      if (!page) continue;

      if (record.a && page.left.pageIndex !== null) {
        page.highlights.push({
          ...project(record.a.bbox, page.left),
          side: 'a',
          kind: record.kind,
          operation,
          changeId: record.changeId
        });
      }
      if (record.b && page.right.pageIndex !== null) {
        page.highlights.push({
          ...project(record.b.bbox, page.right),
          side: 'b',
          kind: record.kind,
          operation,
          changeId: record.changeId
        });
      }
    }
  }

  return merged;
}

/** Map a box in source page coordinates onto its placement */
export function project(bbox: BoundingBox, placement: PagePlacement): Pick<HighlightRect, 'x' | 'y' | 'width' | 'height'> {
  return {
    x: placement.x + bbox.x * placement.scale,
    y: placement.y + bbox.y * placement.scale,
    width: bbox.width * placement.scale,
    height: bbox.height * placement.scale
  };
}

function pageSize(page: Page | undefined, label: string): PageSize {
  if (!page || !(page.width > 0) || !(page.height > 0)) {
    throw new StructuralMismatchError(`Document "${label}" has a page without a positive size`, label);
  }
  return { width: page.width, height: page.height };
}

function place(side: Side, page: Page | undefined, size: PageSize, x: number, height: number): PagePlacement {
  const scale = height / size.height;
  return {
    side,
    pageIndex: page ? page.index : null,
    x,
    y: 0,
    width: size.width * scale,
    height,
    scale
  };
}
