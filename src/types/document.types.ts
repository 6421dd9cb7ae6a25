// Document model produced by the extractor and consumed read-only by the engine

import type { ImageElement } from '../model/image-element';

/** Axis-aligned box in points, origin at the top-left corner of the page. */
export interface BoundingBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface TextBlock {
  text: string;
  bbox: BoundingBox;
}

export interface Cell {
  text: string;
  /** Set when the extractor found this cell spanning several grid positions */
  merged?: boolean;
  bbox?: BoundingBox;
}

export interface Table {
  bbox: BoundingBox;
  /** Row-major grid; rows may have different lengths */
  rows: Cell[][];
}

export interface Page {
  /** 0-based, equal to the page's position in the document */
  index: number;
  width: number;
  height: number;
  textBlocks: TextBlock[];
  tables: Table[];
  images: ImageElement[];
}

export interface Document {
  /** Source path or label, used as the document's identity */
  label: string;
  pages: Page[];
}

/** Raw pixels, row-major, `channels` bytes per pixel (1 = gray, 3 = RGB, 4 = RGBA). */
export interface PixelBuffer {
  width: number;
  height: number;
  channels: 1 | 3 | 4;
  data: Uint8Array;
}

/** Fixed-width bit vector, most significant bit of `bits[0]` first. */
export interface Fingerprint {
  bitWidth: number;
  bits: Uint8Array;
}
