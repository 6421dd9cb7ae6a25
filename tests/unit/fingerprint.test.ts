// Unit tests for perceptual fingerprints

import { describe, it, expect } from 'vitest';
import {
  computeFingerprint,
  formatFingerprint,
  hammingDistance,
  parseFingerprint
} from '../../src/diff/fingerprint';
import { ImageElement } from '../../src/model/image-element';
import { FingerprintError } from '../../src/errors';
import { createGradient } from '../helpers/document-factory';

describe('parseFingerprint', () => {
  it('should read four bits per hex digit, most significant first', () => {
    const fingerprint = parseFingerprint('f0');

    expect(fingerprint.bitWidth).toBe(8);
    expect(Array.from(fingerprint.bits)).toEqual([0xf0]);
  });

  it('should format back to the same hex string', () => {
    expect(formatFingerprint(parseFingerprint('0A3f'))).toBe('0a3f');
    expect(formatFingerprint(parseFingerprint('8'))).toBe('8');
  });

  it('should reject malformed input', () => {
    expect(() => parseFingerprint('xyz')).toThrow(FingerprintError);
    expect(() => parseFingerprint('')).toThrow('Malformed fingerprint');
  });
});

describe('hammingDistance', () => {
  it('should count differing bits', () => {
    expect(hammingDistance(parseFingerprint('ff'), parseFingerprint('00'))).toBe(8);
    expect(hammingDistance(parseFingerprint('0f0f'), parseFingerprint('0f0e'))).toBe(1);
    expect(hammingDistance(parseFingerprint('abcd'), parseFingerprint('abcd'))).toBe(0);
  });

  it('should be symmetric', () => {
    const x = parseFingerprint('00000000ffffffff');
    const y = parseFingerprint('0123456789abcdef');

    expect(hammingDistance(x, y)).toBe(hammingDistance(y, x));
  });

  it('should refuse fingerprints of different widths', () => {
    expect(() => hammingDistance(parseFingerprint('ff'), parseFingerprint('ffff')))
      .toThrow('Cannot compare fingerprints of different widths (8 vs 16 bits)');
  });
});

describe('computeFingerprint', () => {
  it('should produce size squared bits', () => {
    expect(computeFingerprint(createGradient(40, 40)).bitWidth).toBe(64);
    expect(computeFingerprint(createGradient(40, 40), 4).bitWidth).toBe(16);
  });

  it('should be deterministic', () => {
    const first = computeFingerprint(createGradient(50, 30));
    const second = computeFingerprint(createGradient(50, 30));

    expect(hammingDistance(first, second)).toBe(0);
  });

  it('should hash gray and RGB copies of the same picture alike', () => {
    const gray = computeFingerprint(createGradient(48, 48, 1));
    const rgb = computeFingerprint(createGradient(48, 48, 3));

    expect(formatFingerprint(rgb)).toBe(formatFingerprint(gray));
  });

  it('should reject a hash size that is not a positive integer', () => {
    expect(() => computeFingerprint(createGradient(8, 8), 0))
      .toThrow('Invalid fingerprint size 0: expected a positive integer');
    expect(() => computeFingerprint(createGradient(8, 8), 2.5)).toThrow(FingerprintError);
  });

  it('should reject an empty or truncated buffer', () => {
    expect(() => computeFingerprint({ width: 0, height: 4, channels: 1, data: new Uint8Array(0) }))
      .toThrow('Invalid pixel buffer size 0x4');
    expect(() => computeFingerprint({ width: 4, height: 4, channels: 3, data: new Uint8Array(16) }))
      .toThrow('Pixel buffer too short: 16 bytes for 4x4x3');
  });
});

describe('ImageElement', () => {
  const bbox = { x: 0, y: 0, width: 10, height: 10 };

  it('should compute the fingerprint once and keep it', () => {
    const image = new ImageElement({ bbox, pixels: createGradient(32, 32) });

    expect(image.hasFingerprint()).toBe(false);
    const first = image.fingerprint;
    expect(image.hasFingerprint()).toBe(true);
    expect(image.fingerprint).toBe(first);
  });

  it('should honour the requested hash size', () => {
    const image = new ImageElement({ bbox, pixels: createGradient(32, 32), fingerprintSize: 16 });

    expect(image.fingerprint.bitWidth).toBe(256);
  });

  it('should reject an invalid hash size at construction', () => {
    expect(() => new ImageElement({ bbox, pixels: createGradient(32, 32), fingerprintSize: 0 }))
      .toThrow('Invalid fingerprint size 0: expected a positive integer');
    expect(() => new ImageElement({ bbox, pixels: createGradient(32, 32), fingerprintSize: -4 }))
      .toThrow(FingerprintError);
  });

  it('should reject a bit vector whose length does not match its width', () => {
    expect(() => new ImageElement({ bbox, fingerprint: { bitWidth: 64, bits: new Uint8Array(4) } }))
      .toThrow('Fingerprint of 64 bits needs 8 bytes, got 4');
    expect(() => new ImageElement({ bbox, fingerprint: { bitWidth: 0, bits: new Uint8Array(0) } }))
      .toThrow('Invalid fingerprint width 0: expected a positive integer');
  });

  it('should accept a precomputed hex fingerprint', () => {
    const image = new ImageElement({ bbox, fingerprint: 'ff00' });

    expect(image.hasFingerprint()).toBe(true);
    expect(formatFingerprint(image.fingerprint)).toBe('ff00');
  });

  it('should copy a precomputed bit vector', () => {
    const source = parseFingerprint('ff');
    const image = new ImageElement({ bbox, fingerprint: source });
    source.bits[0] = 0;

    expect(formatFingerprint(image.fingerprint)).toBe('ff');
  });

  it('should fail without pixels or fingerprint', () => {
    const image = new ImageElement({ bbox, label: 'logo' });

    expect(() => image.fingerprint).toThrow('Image logo has neither a fingerprint nor pixels');
  });
});
