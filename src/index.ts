export { DiffEngine, type CompareOptions } from './diff/diff-engine';
export { tokenize, normalizeText, signature } from './diff/tokenizer';
export { align, lcsSimilarity, type AlignOptions } from './diff/text-aligner';
export { alignSequences, type SequenceOp } from './diff/sequence-alignment';
export { alignUnits, type AlignableUnit, type UnitPairing } from './diff/block-aligner';
export { diffTextBlocks } from './diff/text-differ';
export { diffTables, cellBox } from './diff/table-differ';
export { matchImages, diffImages } from './diff/image-matcher';
export {
  computeFingerprint,
  hammingDistance,
  parseFingerprint,
  formatFingerprint,
  validateFingerprint,
  validateFingerprintSize
} from './diff/fingerprint';
export { assemble, checkCoverage } from './diff/diff-assembler';
export { runPageTasks } from './diff/page-scheduler';
export { summarizeDiff } from './diff/diff-summary';
export { mergePages, project, type MergeOptions } from './renderer/page-merger';
export { ChangeNavigator } from './renderer/change-navigator';
export { DebugExporter } from './export/debug-export';
export { ImageElement, type ImageInit } from './model/image-element';
export {
  ComparisonConfigSchema,
  DEFAULT_CONFIG,
  resolveConfig,
  type ComparisonConfig,
  type ComparisonConfigInput,
  type NormalizationPolicy
} from './config/comparison-config';
export * from './errors';
export type * from './types/document.types';
export type * from './types/diff.types';
export type * from './types/debug.types';
export type * from './types/merge.types';
