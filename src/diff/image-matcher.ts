// Image Matcher - greedy minimum-cost assignment of same-page images

import type { ImageElement } from '../model/image-element';
import type { ImageChange, MatchAssignment, MatchedPair } from '../types/diff.types';
import type { QualitySignal } from '../types/debug.types';
import { hammingDistance } from './fingerprint';
import { FingerprintError } from '../errors';

export interface ImageMatchOptions {
  /** Max accepted distance as a fraction of fingerprint width */
  imageDistanceThreshold: number;
  greedyWarningThreshold: number;
}

export interface ImageMatchOutput {
  assignment: MatchAssignment;
  changes: ImageChange[];
  signals: QualitySignal[];
}

/**
 * Pair images of one page by ascending Hamming distance. Candidates above
 * the threshold are never paired; ties go to the lower A index, then the
 * lower B index. Greedy, so not guaranteed optimal when many images compete.
 */
export function matchImages(
  pageIndex: number,
  imagesA: ImageElement[],
  imagesB: ImageElement[],
  options: Pick<ImageMatchOptions, 'imageDistanceThreshold'>
): MatchAssignment {
  const fingerprintsA = imagesA.map(image => image.fingerprint);
  const fingerprintsB = imagesB.map(image => image.fingerprint);
  const widths = new Set([...fingerprintsA, ...fingerprintsB].map(f => f.bitWidth));
  if (widths.size > 1) {
    throw new FingerprintError(`Page ${pageIndex} mixes fingerprint widths: ${[...widths].join(', ')} bits`);
  }

  const bitWidth = widths.size === 1 ? [...widths][0] : 0;
  const maxDistance = options.imageDistanceThreshold * bitWidth;

  const candidates: MatchedPair[] = [];
  fingerprintsA.forEach((fa, a) => {
    fingerprintsB.forEach((fb, b) => {
      const distance = hammingDistance(fa, fb);
      if (distance <= maxDistance) {
        candidates.push({ a, b, distance });
      }
    });
  });

  candidates.sort((x, y) => x.distance - y.distance || x.a - y.a || x.b - y.b);

  const usedA = new Set<number>();
  const usedB = new Set<number>();
  const pairs: MatchedPair[] = [];
  for (const candidate of candidates) {
    if (usedA.has(candidate.a) || usedB.has(candidate.b)) continue;
    usedA.add(candidate.a);
    usedB.add(candidate.b);
    pairs.push(candidate);
  }

  pairs.sort((x, y) => x.a - y.a);

  return {
    pageIndex,
    bitWidth,
    pairs,
    unmatchedA: imagesA.map((_, i) => i).filter(i => !usedA.has(i)),
    unmatchedB: imagesB.map((_, i) => i).filter(i => !usedB.has(i))
  };
}

export function diffImages(
  pageIndex: number,
  imagesA: ImageElement[],
  imagesB: ImageElement[],
  options: ImageMatchOptions
): ImageMatchOutput {
  const assignment = matchImages(pageIndex, imagesA, imagesB, options);
  const changes: ImageChange[] = [];
  const signals: QualitySignal[] = [];

  if (Math.min(imagesA.length, imagesB.length) > options.greedyWarningThreshold) {
    signals.push({
      pageIndex,
      stage: 'image-matching',
      kind: 'greedy-assignment',
      message: `${imagesA.length} vs ${imagesB.length} images; greedy assignment may differ from the optimal one`
    });
  }

  for (const pair of assignment.pairs) {
    const a = { pageIndex, bbox: imagesA[pair.a].bbox };
    const b = { pageIndex, bbox: imagesB[pair.b].bbox };
    changes.push(pair.distance === 0
      ? { kind: 'image', operation: 'equal', pageIndex, a, b, similarity: 1, imageA: pair.a, imageB: pair.b, distance: 0 }
      : {
        kind: 'image',
        operation: 'replace',
        pageIndex,
        a,
        b,
        similarity: 1 - pair.distance / assignment.bitWidth,
        imageA: pair.a,
        imageB: pair.b,
        distance: pair.distance
      });
  }

  for (const index of assignment.unmatchedA) {
    changes.push({ kind: 'image', operation: 'delete', pageIndex, a: { pageIndex, bbox: imagesA[index].bbox }, imageA: index });
  }
  for (const index of assignment.unmatchedB) {
    changes.push({ kind: 'image', operation: 'insert', pageIndex, b: { pageIndex, bbox: imagesB[index].bbox }, imageB: index });
  }

  return { assignment, changes, signals };
}
