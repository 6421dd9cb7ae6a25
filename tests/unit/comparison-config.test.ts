// Unit tests for configuration resolution

import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, resolveConfig } from '../../src/config/comparison-config';
import { ConfigError } from '../../src/errors';

describe('resolveConfig', () => {
  it('should fill every default', () => {
    expect(resolveConfig()).toEqual({
      normalization: { caseFold: false, collapseWhitespace: true, stripPunctuation: false },
      contextSize: 3,
      textSimilarityThreshold: 0.5,
      rowSimilarityThreshold: 0.6,
      imageDistanceThreshold: 0.1,
      parallelism: 4,
      highlightEnabled: false,
      greedyWarningThreshold: 8,
      gutter: 0
    });
    expect(DEFAULT_CONFIG).toEqual(resolveConfig({}));
  });

  it('should merge partial normalization settings with defaults', () => {
    const config = resolveConfig({ normalization: { caseFold: true }, parallelism: 1 });

    expect(config.normalization).toEqual({ caseFold: true, collapseWhitespace: true, stripPunctuation: false });
    expect(config.parallelism).toBe(1);
  });

  it('should list every invalid option', () => {
    let caught: unknown;
    try {
      resolveConfig({ rowSimilarityThreshold: 1.5, parallelism: 0 });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (!(caught instanceof ConfigError)) return;
    expect(caught.issues.map(issue => issue.path)).toEqual(['rowSimilarityThreshold', 'parallelism']);
    expect(caught.category).toBe('CONFIG_INVALID');
    expect(caught.message).toMatch(/^Invalid comparison config: rowSimilarityThreshold: /);
  });
});
