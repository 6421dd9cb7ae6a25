// Image entity with a fingerprint memoized on the instance

import type { BoundingBox, Fingerprint, PixelBuffer } from '../types/document.types';
import {
  computeFingerprint,
  parseFingerprint,
  validateFingerprint,
  validateFingerprintSize,
  DEFAULT_FINGERPRINT_SIZE
} from '../diff/fingerprint';
import { FingerprintError } from '../errors';

export interface ImageInit {
  bbox: BoundingBox;
  label?: string;
  /** Precomputed by the extractor, as a bit vector or hex string */
  fingerprint?: Fingerprint | string;
  /** Used to compute the fingerprint on first access when none was given */
  pixels?: PixelBuffer;
  /** Hash size for lazy computation (bits = size²) */
  fingerprintSize?: number;
}

export class ImageElement {
  readonly bbox: BoundingBox;
  readonly label?: string;
  readonly pixels?: PixelBuffer;
  private readonly fingerprintSize: number;
  private cachedFingerprint?: Fingerprint;

  constructor(init: ImageInit) {
    this.bbox = init.bbox;
    this.label = init.label;
    this.pixels = init.pixels;
    this.fingerprintSize = init.fingerprintSize ?? DEFAULT_FINGERPRINT_SIZE;
    validateFingerprintSize(this.fingerprintSize);

    if (typeof init.fingerprint === 'string') {
      this.cachedFingerprint = parseFingerprint(init.fingerprint);
    } else if (init.fingerprint) {
      validateFingerprint(init.fingerprint);
      this.cachedFingerprint = { bitWidth: init.fingerprint.bitWidth, bits: Uint8Array.from(init.fingerprint.bits) };
    }
  }

  /** Computed once from the pixels, then returned unchanged */
  get fingerprint(): Fingerprint {
    if (!this.cachedFingerprint) {
      if (!this.pixels) {
        throw new FingerprintError(`Image ${this.label ?? '(unlabelled)'} has neither a fingerprint nor pixels`);
      }
      this.cachedFingerprint = computeFingerprint(this.pixels, this.fingerprintSize);
    }
    return this.cachedFingerprint;
  }

  hasFingerprint(): boolean {
    return this.cachedFingerprint !== undefined;
  }
}
