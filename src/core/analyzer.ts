import { match, P } from 'ts-pattern';
import type { ChangedFile } from '../types/common.js';
import {
  WarningLevel,
  type AnalyzerSettings,
  type CommitAnalysis,
  type CommitWarning,
} from '../types/analyzer.js';
import { TOKEN_ESTIMATION_RATIO, getModelCosts } from '../constants/ai.js';

export const HIGH_COST_THRESHOLD = 0.1;
export const FILE_COST_THRESHOLD = 0.05;

const formatCost = (cost: number): string => `$${cost.toFixed(4)}`;
const formatCount = (count: number): string => count.toLocaleString('en-US');

export const estimateTokensAndCost = (
  text: string,
  model: string
): { tokens: number; cost: number } => {
  const tokens = Math.floor(text.length / TOKEN_ESTIMATION_RATIO);
  const cost = (tokens * getModelCosts(model).input) / 1_000_000;
  return { tokens, cost };
};

/** The slice of a combined diff that belongs to one file, if it is present. */
export const extractFileDiff = (diff: string, filePath: string): string | undefined => {
  const header = `diff --git a/${filePath} b/${filePath}`;
  const start = diff.indexOf(header);
  if (start === -1) {
    return undefined;
  }

  const rest = diff.slice(start + header.length);
  const next = rest.indexOf('diff --git');
  return next === -1 ? rest : rest.slice(0, next);
};

export const analyzeDiffComplexity = (
  diff: string,
  files: readonly ChangedFile[],
  settings: AnalyzerSettings
): CommitAnalysis => {
  const warnings: CommitWarning[] = [];
  const { tokens, cost } = estimateTokensAndCost(diff, settings.model);

  if (tokens >= settings.tokenLimit) {
    warnings.push({
      level: WarningLevel.HIGH,
      message:
        `The diff exceeds token limit (${formatCount(tokens)} tokens). ` +
        `Recommended limit is ${formatCount(settings.tokenLimit)} tokens.`,
    });
  }

  if (cost >= HIGH_COST_THRESHOLD) {
    warnings.push({
      level: WarningLevel.HIGH,
      message: `This commit could be expensive (${formatCost(cost)}). Consider splitting it into smaller commits.`,
    });
  } else if (cost >= settings.costWarningThreshold) {
    warnings.push({
      level: WarningLevel.MEDIUM,
      message: `This commit has a moderate cost (${formatCost(cost)}). Consider if it can be optimized.`,
    });
  }

  if (files.length > settings.maxFilesThreshold) {
    warnings.push({
      level: WarningLevel.HIGH,
      message:
        `You're modifying ${files.length} files. For atomic commits, consider limiting to ` +
        `${settings.maxFilesThreshold} files per commit.`,
    });
  }

  for (const file of files) {
    const fileDiff = extractFileDiff(diff, file.path);
    if (fileDiff === undefined) {
      continue;
    }

    const fileEstimate = estimateTokensAndCost(fileDiff, settings.model);

    if (fileEstimate.tokens >= Math.floor(settings.tokenLimit / 2)) {
      warnings.push({
        level: WarningLevel.HIGH,
        message:
          `File ${file.path} is too large (${formatCount(fileEstimate.tokens)} tokens). ` +
          'Consider splitting these changes across multiple commits.',
      });
    }

    if (fileEstimate.cost >= FILE_COST_THRESHOLD) {
      warnings.push({
        level: WarningLevel.HIGH,
        message:
          `File ${file.path} has expensive changes (${formatCost(fileEstimate.cost)}). ` +
          'Consider splitting these changes across multiple commits.',
      });
    }
  }

  return {
    estimatedTokens: tokens,
    estimatedCost: cost,
    numFiles: files.length,
    warnings,
    isComplex: warnings.some((warning) => warning.level === WarningLevel.HIGH),
  };
};

export const formatCostForHumans = (cost: number): string =>
  match(cost)
    .with(P.number.gte(1), (value) => `$${value.toFixed(2)}`)
    .with(P.number.gte(0.001), (value) => `${(value * 100).toFixed(2)}¢`)
    .otherwise(() => '<0.10¢');

export const getCostContext = (cost: number): string =>
  match(cost)
    .with(P.number.gte(0.1), () => 'very expensive')
    .with(P.number.gte(0.05), () => 'expensive')
    .with(P.number.gte(0.01), () => 'moderate')
    .with(P.number.gte(0.001), () => 'cheap')
    .otherwise(() => 'very cheap');
