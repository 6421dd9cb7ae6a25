// Side-by-side page geometry handed to the renderer

import type { ChangeKind, Operation } from './diff.types';

export type Side = 'a' | 'b';

export interface PagePlacement {
  side: Side;
  /** Source page index, or null for a blank padding page */
  pageIndex: number | null;
  x: number;
  y: number;
  width: number;
  height: number;
  /** Factor applied to source page coordinates */
  scale: number;
}

export interface HighlightRect {
  side: Side;
  x: number;
  y: number;
  width: number;
  height: number;
  kind: ChangeKind;
  operation: Exclude<Operation, 'equal'>;
  changeId?: string;
}

export interface MergedPage {
  index: number;
  width: number;
  height: number;
  left: PagePlacement;
  right: PagePlacement;
  highlights: HighlightRect[];
}
