/**
 * Comparison Configuration
 *
 * Thresholds are tunable defaults, not calibrated constants.
 */

import { z } from 'zod';
import { ConfigError } from '../errors';

export const NormalizationPolicySchema = z.object({
  caseFold: z.boolean().default(false),
  collapseWhitespace: z.boolean().default(true),
  stripPunctuation: z.boolean().default(false),
});

export type NormalizationPolicy = z.infer<typeof NormalizationPolicySchema>;

export const ComparisonConfigSchema = z.object({
  normalization: NormalizationPolicySchema.default({}),

  // Equal tokens kept on each side of a change when building hunks
  contextSize: z.number().int().min(0).default(3),

  // Minimum token similarity for two text blocks to pair as a replace
  textSimilarityThreshold: z.number().min(0).max(1).default(0.5),

  // Minimum token similarity for two table rows to pair as matched-but-modified
  rowSimilarityThreshold: z.number().min(0).max(1).default(0.6),

  // Maximum Hamming distance for an image pair, as a fraction of fingerprint width
  imageDistanceThreshold: z.number().min(0).max(1).default(0.1),

  // Max concurrent page workers
  parallelism: z.number().int().min(1).max(64).default(4),

  highlightEnabled: z.boolean().default(false),

  // Above this many images on both sides of a page, flag the greedy matching
  greedyWarningThreshold: z.number().int().min(1).default(8),

  // Horizontal gap between the two pages of a merged page, in points
  gutter: z.number().min(0).default(0),
});

export type ComparisonConfig = z.infer<typeof ComparisonConfigSchema>;
export type ComparisonConfigInput = z.input<typeof ComparisonConfigSchema>;

export const DEFAULT_CONFIG: ComparisonConfig = ComparisonConfigSchema.parse({});

/**
 * Validate user configuration and fill defaults.
 * @throws ConfigError listing every invalid option
 */
export function resolveConfig(input: ComparisonConfigInput = {}): ComparisonConfig {
  const parsed = ComparisonConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ConfigError(
      `Invalid comparison config: ${issues.map(i => `${i.path}: ${i.message}`).join('; ')}`,
      issues
    );
  }
  return parsed.data;
}
