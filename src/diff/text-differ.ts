// Text Differ - block-level pairing, token-level edits for paired blocks

import type { TextBlock } from '../types/document.types';
import type { TextChange } from '../types/diff.types';
import type { AlignmentDecision, QualitySignal } from '../types/debug.types';
import type { NormalizationPolicy } from '../config/comparison-config';
import { tokenize, signature } from './tokenizer';
import { align } from './text-aligner';
import { alignUnits, type AlignableUnit } from './block-aligner';

export interface TextDiffOptions {
  policy: NormalizationPolicy;
  textSimilarityThreshold: number;
  contextSize: number;
}

export interface TextDiffOutput {
  changes: TextChange[];
  decisions: AlignmentDecision[];
  signals: QualitySignal[];
}

const textPreview = (text: string) => text.substring(0, 100);

export function diffTextBlocks(
  pageIndex: number,
  blocksA: TextBlock[],
  blocksB: TextBlock[],
  options: TextDiffOptions
): TextDiffOutput {
  const output: TextDiffOutput = { changes: [], decisions: [], signals: [] };
  const unitsA = blocksA.map(block => toUnit(block, options.policy));
  const unitsB = blocksB.map(block => toUnit(block, options.policy));

  for (const pairing of alignUnits(unitsA, unitsB, options.textSimilarityThreshold)) {
    switch (pairing.type) {
      case 'exact': {
        const blockA = blocksA[pairing.a];
        const blockB = blocksB[pairing.b];
        output.decisions.push({
          pageIndex,
          unit: 'text-block',
          originalIndex: pairing.a,
          currentIndex: pairing.b,
          matchType: 'exact',
          similarityScore: 1,
          reason: 'Exact text match after normalization',
          originalPreview: textPreview(blockA.text),
          currentPreview: textPreview(blockB.text)
        });
        output.changes.push({
          kind: 'text',
          operation: 'equal',
          pageIndex,
          a: { pageIndex, bbox: blockA.bbox },
          b: { pageIndex, bbox: blockB.bbox },
          similarity: 1,
          blockA: pairing.a,
          blockB: pairing.b
        });
        break;
      }
      case 'fuzzy': {
        const blockA = blocksA[pairing.a];
        const blockB = blocksB[pairing.b];
        const edits = align(unitsA[pairing.a].tokens, unitsB[pairing.b].tokens, { contextSize: options.contextSize });
        if (edits.degraded) {
          output.signals.push({
            pageIndex,
            stage: 'text-alignment',
            kind: 'disjoint-text',
            message: `Blocks ${pairing.a}/${pairing.b} share no token; reported as a single replace`
          });
        }
        output.decisions.push({
          pageIndex,
          unit: 'text-block',
          originalIndex: pairing.a,
          currentIndex: pairing.b,
          matchType: 'fuzzy',
          similarityScore: pairing.similarity,
          reason: `Fuzzy match: ${(pairing.similarity * 100).toFixed(1)}% token overlap (threshold: ${options.textSimilarityThreshold * 100}%)`,
          originalPreview: textPreview(blockA.text),
          currentPreview: textPreview(blockB.text)
        });
        output.changes.push({
          kind: 'text',
          operation: 'replace',
          pageIndex,
          a: { pageIndex, bbox: blockA.bbox },
          b: { pageIndex, bbox: blockB.bbox },
          similarity: edits.similarity,
          blockA: pairing.a,
          blockB: pairing.b,
          edits
        });
        break;
      }
      case 'delete': {
        const blockA = blocksA[pairing.a];
        output.decisions.push({
          pageIndex,
          unit: 'text-block',
          originalIndex: pairing.a,
          currentIndex: null,
          matchType: 'delete',
          similarityScore: pairing.bestSimilarity,
          reason: pairing.bestSimilarity !== undefined
            ? `Aligned block only ${(pairing.bestSimilarity * 100).toFixed(1)}% similar (below ${options.textSimilarityThreshold * 100}% threshold)`
            : 'No counterpart block in the current page',
          originalPreview: textPreview(blockA.text)
        });
        output.changes.push({
          kind: 'text',
          operation: 'delete',
          pageIndex,
          a: { pageIndex, bbox: blockA.bbox },
          blockA: pairing.a
        });
        break;
      }
      case 'insert': {
        const blockB = blocksB[pairing.b];
        output.decisions.push({
          pageIndex,
          unit: 'text-block',
          originalIndex: null,
          currentIndex: pairing.b,
          matchType: 'insert',
          reason: 'No matching block in the original page',
          currentPreview: textPreview(blockB.text)
        });
        output.changes.push({
          kind: 'text',
          operation: 'insert',
          pageIndex,
          b: { pageIndex, bbox: blockB.bbox },
          blockB: pairing.b
        });
        break;
      }
    }
  }

  return output;
}

function toUnit(block: TextBlock, policy: NormalizationPolicy): AlignableUnit {
  const tokens = tokenize(block.text, policy);
  return { tokens, signature: signature(tokens) };
}
