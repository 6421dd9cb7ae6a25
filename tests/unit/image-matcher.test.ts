// Unit tests for image matching

import { describe, it, expect } from 'vitest';
import { diffImages, matchImages, type ImageMatchOptions } from '../../src/diff/image-matcher';
import { FingerprintError } from '../../src/errors';
import { BLANK_HASH, FAR_HASH, NEAR_HASH, createImage } from '../helpers/document-factory';

const options = (overrides: Partial<ImageMatchOptions> = {}): ImageMatchOptions => ({
  imageDistanceThreshold: 0.1,
  greedyWarningThreshold: 8,
  ...overrides
});

const images = (hashes: string[]) => hashes.map((hash, i) => createImage(hash, 100 + i * 100));

describe('matchImages', () => {
  it('should pair images within the distance threshold', () => {
    const assignment = matchImages(0, images([BLANK_HASH]), images([NEAR_HASH]), options());

    expect(assignment).toEqual({
      pageIndex: 0,
      bitWidth: 64,
      pairs: [{ a: 0, b: 0, distance: 4 }],
      unmatchedA: [],
      unmatchedB: []
    });
  });

  it('should never pair images above the threshold', () => {
    const assignment = matchImages(0, images([BLANK_HASH]), images([FAR_HASH]), options());

    expect(assignment.pairs).toEqual([]);
    expect(assignment.unmatchedA).toEqual([0]);
    expect(assignment.unmatchedB).toEqual([0]);
  });

  it('should accept the cheapest pairs first', () => {
    // distances: a0-b0 1, a0-b1 4, a1-b0 1, a1-b1 2
    const assignment = matchImages(
      0,
      images(['0000000000000000', '0000000000000003']),
      images(['0000000000000001', '000000000000000f']),
      options()
    );

    expect(assignment.pairs).toEqual([
      { a: 0, b: 0, distance: 1 },
      { a: 1, b: 1, distance: 2 }
    ]);
  });

  it('should break ties towards the lower index', () => {
    const assignment = matchImages(0, images([BLANK_HASH, BLANK_HASH]), images([BLANK_HASH]), options());

    expect(assignment.pairs).toEqual([{ a: 0, b: 0, distance: 0 }]);
    expect(assignment.unmatchedA).toEqual([1]);
  });

  it('should give the same pairs with sides swapped', () => {
    const left = images(['0000000000000000', '00000000000000ff', '0000000000000003']);
    const right = images(['00000000000000fe', '0000000000000001']);

    const forward = matchImages(0, left, right, options({ imageDistanceThreshold: 0.5 }));
    const backward = matchImages(0, right, left, options({ imageDistanceThreshold: 0.5 }));

    const swapped = backward.pairs
      .map(pair => ({ a: pair.b, b: pair.a, distance: pair.distance }))
      .sort((x, y) => x.a - y.a);
    expect(swapped).toEqual(forward.pairs);
    expect(backward.unmatchedB).toEqual(forward.unmatchedA);
  });

  it('should handle pages without images', () => {
    const assignment = matchImages(3, [], [], options());

    expect(assignment).toEqual({ pageIndex: 3, bitWidth: 0, pairs: [], unmatchedA: [], unmatchedB: [] });
  });

  it('should refuse mixed fingerprint widths', () => {
    expect(() => matchImages(0, images(['ff']), images(['ffff']), options())).toThrow(FingerprintError);
  });
});

describe('diffImages', () => {
  it('should emit equal, replace, delete and insert records', () => {
    const { changes } = diffImages(
      0,
      images([BLANK_HASH, NEAR_HASH, FAR_HASH]),
      images([BLANK_HASH, '00000000000000ff', 'ffffffffffffffff']),
      options()
    );

    expect(changes.map(c => [c.operation, c.imageA, c.imageB, c.distance])).toEqual([
      ['equal', 0, 0, 0],
      ['replace', 1, 1, 4],
      ['delete', 2, undefined, undefined],
      ['insert', undefined, 2, undefined]
    ]);
    expect(changes[1].similarity).toBeCloseTo(1 - 4 / 64);
  });

  it('should flag pages where greedy assignment may be suboptimal', () => {
    const { signals } = diffImages(
      4,
      images([BLANK_HASH, BLANK_HASH]),
      images([BLANK_HASH, BLANK_HASH]),
      options({ greedyWarningThreshold: 1 })
    );

    expect(signals).toEqual([{
      pageIndex: 4,
      stage: 'image-matching',
      kind: 'greedy-assignment',
      message: '2 vs 2 images; greedy assignment may differ from the optimal one'
    }]);
  });

  it('should only lose pairs when the threshold tightens', () => {
    const a = images([BLANK_HASH, '0000000000000003']);
    const b = images([NEAR_HASH, '0000000000000001']);

    const loose = diffImages(0, a, b, options({ imageDistanceThreshold: 0.1 })).changes;
    const strict = diffImages(0, a, b, options({ imageDistanceThreshold: 0.02 })).changes;

    expect(loose.filter(c => c.operation === 'replace')).toHaveLength(2);
    expect(strict.map(c => c.operation)).toEqual(['replace', 'delete', 'insert']);
  });
});
