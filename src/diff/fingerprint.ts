// Perceptual image fingerprints (DCT hash) and Hamming distance

import type { Fingerprint, PixelBuffer } from '../types/document.types';
import { FingerprintError } from '../errors';

export const DEFAULT_FINGERPRINT_SIZE = 8;

/**
 * Perceptual hash of a pixel buffer: grayscale, area-resample to 4·size
 * square, 2-D DCT-II, keep the size×size low-frequency block and set each bit
 * where the coefficient is above the block's median. Width is size² bits.
 */
export function computeFingerprint(pixels: PixelBuffer, size: number = DEFAULT_FINGERPRINT_SIZE): Fingerprint {
  validateFingerprintSize(size);
  validatePixels(pixels);

  const n = size * 4;
  const gray = resampleGray(pixels, n);
  const coefficients = dct2d(gray, n);

  const low: number[] = [];
  for (let row = 0; row < size; row++) {
    for (let col = 0; col < size; col++) {
      low.push(coefficients[row * n + col]);
    }
  }

  const med = median(low);
  const fingerprint = emptyFingerprint(size * size);
  low.forEach((value, i) => {
    if (value > med) setBit(fingerprint, i);
  });
  return fingerprint;
}

export function hammingDistance(first: Fingerprint, second: Fingerprint): number {
  if (first.bitWidth !== second.bitWidth) {
    throw new FingerprintError(
      `Cannot compare fingerprints of different widths (${first.bitWidth} vs ${second.bitWidth} bits)`
    );
  }

  let distance = 0;
  for (let i = 0; i < first.bits.length; i++) {
    let x = first.bits[i] ^ second.bits[i];
    while (x !== 0) {
      x &= x - 1;
      distance++;
    }
  }
  return distance;
}

/** Parse a hex fingerprint; width is four bits per hex digit */
export function parseFingerprint(hex: string): Fingerprint {
  const digits = hex.trim().toLowerCase();
  if (digits.length === 0 || !/^[0-9a-f]+$/.test(digits)) {
    throw new FingerprintError(`Malformed fingerprint "${hex}": expected hex digits`);
  }

  const fingerprint = emptyFingerprint(digits.length * 4);
  for (let d = 0; d < digits.length; d++) {
    const nibble = parseInt(digits[d], 16);
    for (let bit = 0; bit < 4; bit++) {
      if (nibble & (0b1000 >> bit)) setBit(fingerprint, d * 4 + bit);
    }
  }
  return fingerprint;
}

export function formatFingerprint(fingerprint: Fingerprint): string {
  const digits: string[] = [];
  for (let d = 0; d < Math.ceil(fingerprint.bitWidth / 4); d++) {
    let nibble = 0;
    for (let bit = 0; bit < 4; bit++) {
      const index = d * 4 + bit;
      if (index < fingerprint.bitWidth && getBit(fingerprint, index)) nibble |= 0b1000 >> bit;
    }
    digits.push(nibble.toString(16));
  }
  return digits.join('');
}

/** Check that a bit vector holds exactly `bitWidth` bits, at least one */
export function validateFingerprint(fingerprint: Fingerprint): void {
  const { bitWidth, bits } = fingerprint;
  if (!Number.isInteger(bitWidth) || bitWidth < 1) {
    throw new FingerprintError(`Invalid fingerprint width ${bitWidth}: expected a positive integer`);
  }
  if (bits.length !== Math.ceil(bitWidth / 8)) {
    throw new FingerprintError(
      `Fingerprint of ${bitWidth} bits needs ${Math.ceil(bitWidth / 8)} bytes, got ${bits.length}`
    );
  }
}

export function validateFingerprintSize(size: number): void {
  if (!Number.isInteger(size) || size < 1) {
    throw new FingerprintError(`Invalid fingerprint size ${size}: expected a positive integer`);
  }
}

function emptyFingerprint(bitWidth: number): Fingerprint {
  return { bitWidth, bits: new Uint8Array(Math.ceil(bitWidth / 8)) };
}

function setBit(fingerprint: Fingerprint, index: number): void {
  fingerprint.bits[index >> 3] |= 0x80 >> (index & 7);
}

function getBit(fingerprint: Fingerprint, index: number): boolean {
  return (fingerprint.bits[index >> 3] & (0x80 >> (index & 7))) !== 0;
}

function validatePixels(pixels: PixelBuffer): void {
  const { width, height, channels, data } = pixels;
  if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
    throw new FingerprintError(`Invalid pixel buffer size ${width}x${height}`);
  }
  if (data.length < width * height * channels) {
    throw new FingerprintError(
      `Pixel buffer too short: ${data.length} bytes for ${width}x${height}x${channels}`
    );
  }
}

function luminance(pixels: PixelBuffer, x: number, y: number): number {
  const offset = (y * pixels.width + x) * pixels.channels;
  if (pixels.channels === 1) return pixels.data[offset];
  // ITU-R 601-2 luma
  return (pixels.data[offset] * 299 + pixels.data[offset + 1] * 587 + pixels.data[offset + 2] * 114) / 1000;
}

/** Area-average the luminance into an n×n grid (row-major) */
function resampleGray(pixels: PixelBuffer, n: number): Float64Array {
  const out = new Float64Array(n * n);
  for (let ty = 0; ty < n; ty++) {
    const y0 = Math.floor((ty * pixels.height) / n);
    const y1 = Math.max(y0 + 1, Math.floor(((ty + 1) * pixels.height) / n));
    for (let tx = 0; tx < n; tx++) {
      const x0 = Math.floor((tx * pixels.width) / n);
      const x1 = Math.max(x0 + 1, Math.floor(((tx + 1) * pixels.width) / n));
      let sum = 0;
      for (let y = y0; y < y1; y++) {
        for (let x = x0; x < x1; x++) {
          sum += luminance(pixels, x, y);
        }
      }
      out[ty * n + tx] = sum / ((y1 - y0) * (x1 - x0));
    }
  }
  return out;
}

/** Unnormalized separable DCT-II over rows, then columns */
function dct2d(input: Float64Array, n: number): Float64Array {
  const cos = new Float64Array(n * n);
  for (let k = 0; k < n; k++) {
    for (let i = 0; i < n; i++) {
      cos[k * n + i] = Math.cos((Math.PI * k * (2 * i + 1)) / (2 * n));
    }
  }

  const rows = new Float64Array(n * n);
  for (let y = 0; y < n; y++) {
    for (let k = 0; k < n; k++) {
      let sum = 0;
      for (let x = 0; x < n; x++) sum += input[y * n + x] * cos[k * n + x];
      rows[y * n + k] = 2 * sum;
    }
  }

  const out = new Float64Array(n * n);
  for (let x = 0; x < n; x++) {
    for (let k = 0; k < n; k++) {
      let sum = 0;
      for (let y = 0; y < n; y++) sum += rows[y * n + x] * cos[k * n + y];
      out[k * n + x] = 2 * sum;
    }
  }
  return out;
}

function median(values: number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  const mid = sorted.length >> 1;
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}
