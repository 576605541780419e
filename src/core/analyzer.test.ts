import { describe, expect, it } from 'vitest';
import { WarningLevel, type AnalyzerSettings } from '../types/analyzer.js';
import {
  analyzeDiffComplexity,
  estimateTokensAndCost,
  extractFileDiff,
  formatCostForHumans,
  getCostContext,
} from './analyzer.js';

const settings = (overrides: Partial<AnalyzerSettings> = {}): AnalyzerSettings => ({
  model: 'gemini-2.0-flash-lite',
  tokenLimit: 100,
  maxFilesThreshold: 2,
  costWarningThreshold: 0.05,
  ...overrides,
});

describe('estimateTokensAndCost', () => {
  it('estimates four characters per token priced at the model input rate', () => {
    const estimate = estimateTokensAndCost('a'.repeat(4000), 'gemini-2.5-pro');

    expect(estimate.tokens).toBe(1000);
    expect(estimate.cost).toBeCloseTo(0.00125, 10);
  });

  it('prices unknown models like the default model', () => {
    expect(estimateTokensAndCost('a'.repeat(4000), 'not-a-model').cost).toBeCloseTo(
      estimateTokensAndCost('a'.repeat(4000), 'gemini-2.0-flash-lite').cost,
      12
    );
  });
});

describe('extractFileDiff', () => {
  const diff = 'diff --git a/src/a.ts b/src/a.ts\n+one\ndiff --git a/src/b.ts b/src/b.ts\n+two\n';

  it('returns the section for one file', () => {
    expect(extractFileDiff(diff, 'src/a.ts')).toBe('\n+one\n');
    expect(extractFileDiff(diff, 'src/b.ts')).toBe('\n+two\n');
  });

  it('returns undefined for files not in the diff', () => {
    expect(extractFileDiff(diff, 'src/c.ts')).toBeUndefined();
  });
});

describe('analyzeDiffComplexity', () => {
  it('reports nothing for a small change', () => {
    const analysis = analyzeDiffComplexity('diff --git a/a.ts b/a.ts\n+x\n', [{ path: 'a.ts' }], settings());

    expect(analysis.warnings).toEqual([]);
    expect(analysis.isComplex).toBe(false);
    expect(analysis.numFiles).toBe(1);
  });

  it('warns when the diff reaches the token limit', () => {
    const analysis = analyzeDiffComplexity('x'.repeat(400), [{ path: 'a.ts' }], settings());

    expect(analysis.estimatedTokens).toBe(100);
    expect(analysis.warnings).toEqual([
      {
        level: WarningLevel.HIGH,
        message: 'The diff exceeds token limit (100 tokens). Recommended limit is 100 tokens.',
      },
    ]);
    expect(analysis.isComplex).toBe(true);
  });

  it('warns about expensive commits', () => {
    const analysis = analyzeDiffComplexity(
      'x'.repeat(400_000),
      [{ path: 'a.ts' }],
      settings({ model: 'gemini-2.5-pro', tokenLimit: 200_000 })
    );

    expect(analysis.warnings).toEqual([
      {
        level: WarningLevel.HIGH,
        message: 'This commit could be expensive ($0.1250). Consider splitting it into smaller commits.',
      },
    ]);
  });

  it('warns about moderate cost above the configured threshold', () => {
    const analysis = analyzeDiffComplexity(
      'x'.repeat(1600),
      [{ path: 'a.ts' }],
      settings({ model: 'gemini-2.5-pro', tokenLimit: 1000, costWarningThreshold: 0.0001 })
    );

    expect(analysis.warnings).toEqual([
      {
        level: WarningLevel.MEDIUM,
        message: 'This commit has a moderate cost ($0.0005). Consider if it can be optimized.',
      },
    ]);
    expect(analysis.isComplex).toBe(false);
  });

  it('warns when too many files change at once', () => {
    const analysis = analyzeDiffComplexity(
      '',
      [{ path: 'a.ts' }, { path: 'b.ts' }, { path: 'c.ts' }],
      settings()
    );

    expect(analysis.warnings.map((warning) => warning.message)).toEqual([
      "You're modifying 3 files. For atomic commits, consider limiting to 2 files per commit.",
    ]);
  });

  it('flags a single oversized file', () => {
    const diff = `diff --git a/big.ts b/big.ts${'y'.repeat(220)}`;
    const analysis = analyzeDiffComplexity(diff, [{ path: 'big.ts' }], settings());

    expect(analysis.estimatedTokens).toBe(62);
    expect(analysis.warnings).toEqual([
      {
        level: WarningLevel.HIGH,
        message: 'File big.ts is too large (55 tokens). Consider splitting these changes across multiple commits.',
      },
    ]);
  });
});

describe('cost formatting', () => {
  it.each([
    [1.5, '$1.50'],
    [0.0125, '1.25¢'],
    [0.005, '0.50¢'],
    [0.0001, '<0.10¢'],
    [0, '<0.10¢'],
  ])('formats %f as %s', (cost, expected) => {
    expect(formatCostForHumans(cost)).toBe(expected);
  });

  it.each([
    [0.2, 'very expensive'],
    [0.07, 'expensive'],
    [0.02, 'moderate'],
    [0.002, 'cheap'],
    [0.0001, 'very cheap'],
  ])('describes %f as %s', (cost, expected) => {
    expect(getCostContext(cost)).toBe(expected);
  });
});
