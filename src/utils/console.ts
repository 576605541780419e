import chalk from 'chalk';
import inquirer from 'inquirer';
import { pastel } from 'gradient-string';
import type { ChangedFile, TokenUsage } from '../types/common.js';
import { WarningLevel, type CommitAnalysis } from '../types/analyzer.js';
import type { FileGroup } from '../types/grouping.js';
import type { CommitBatch } from '../core/batch.js';
import { formatCostForHumans, getCostContext } from '../core/analyzer.js';
import { describeGroup } from '../core/grouping/smart-grouper.js';
import { formatFileSize } from '../services/git.js';
import { INFO_MESSAGES } from '../constants/messages.js';
import { UI_CONSTANTS } from '../constants/ui.js';

export const printBanner = (title: string): void => {
  console.log(pastel(title));
};

export const printInfo = (message: string): void => {
  console.log(chalk.blue(message));
};

export const printSuccess = (message: string): void => {
  console.log(chalk.green(`✅ ${message}`));
};

export const printWarning = (message: string): void => {
  console.log(chalk.yellow(`⚠️  ${message}`));
};

export const printError = (message: string): void => {
  console.error(chalk.red(`❌ ${message}`));
};

const describeFile = (file: ChangedFile): string => {
  const details = [
    file.isBinary ? 'binary' : undefined,
    file.size !== undefined ? formatFileSize(file.size) : undefined,
  ].filter((detail): detail is string => detail !== undefined);

  return details.length > 0 ? `${file.path} ${chalk.gray(`(${details.join(', ')})`)}` : file.path;
};

export const printChangedFiles = (files: readonly ChangedFile[]): void => {
  console.log(chalk.bold(`\n${INFO_MESSAGES.CHANGED_FILES}`));
  files.forEach((file) => console.log(`  • ${describeFile(file)}`));
};

const warningColor = (level: WarningLevel): ((text: string) => string) =>
  level === WarningLevel.HIGH ? chalk.red : level === WarningLevel.MEDIUM ? chalk.yellow : chalk.gray;

export const printWarnings = (analysis: CommitAnalysis): void => {
  if (analysis.warnings.length === 0) {
    return;
  }

  console.log(chalk.bold.yellow('\n⚠️  Commit size warnings:'));
  analysis.warnings.forEach((warning) => {
    console.log(warningColor(warning.level)(`  • ${warning.message}`));
  });

  printAnalysisStats(analysis);
};

export const printAnalysisStats = (analysis: CommitAnalysis): void => {
  console.log(chalk.cyan(`\n${INFO_MESSAGES.ANALYSIS_TITLE}`));
  console.log(`  • Estimated tokens: ${analysis.estimatedTokens.toLocaleString('en-US')}`);
  console.log(
    `  • Estimated cost: ${formatCostForHumans(analysis.estimatedCost)} (${getCostContext(analysis.estimatedCost)})`
  );
  console.log(`  • Files changed: ${analysis.numFiles}`);
  console.log(`  • Complex: ${analysis.isComplex ? chalk.red('yes') : chalk.green('no')}`);
};

export const printBatchSummary = (totalFiles: number, totalBatches: number): void => {
  console.log(chalk.bold(`\n📦 Processing ${totalFiles} files in ${totalBatches} batches`));
};

export const printBatchStart = (batchNumber: number, totalBatches: number, batch: CommitBatch): void => {
  console.log(chalk.bold.blue(`\n📋 Batch ${batchNumber}/${totalBatches}`));

  if (batch.reason) {
    const confidence =
      batch.confidence !== undefined ? ` (${(batch.confidence * 100).toFixed(0)}% confidence)` : '';
    console.log(chalk.gray(`  ${batch.reason}${confidence}`));
  }

  batch.files.forEach((file) => console.log(`  • ${file.path}`));
};

export const printBatchComplete = (batchNumber: number, totalBatches: number): void => {
  console.log(chalk.green(`✓ Batch ${batchNumber}/${totalBatches} ready`));
};

export const printTokenUsage = (usage: TokenUsage, batchNumber?: number): void => {
  const heading = batchNumber !== undefined ? `💰 Token usage (batch ${batchNumber}):` : '💰 Token usage:';
  console.log(chalk.cyan(`\n${heading}`));
  console.log(`  • Prompt: ${usage.promptTokens.toLocaleString('en-US')} tokens (${formatCostForHumans(usage.inputCost)})`);
  console.log(
    `  • Completion: ${usage.completionTokens.toLocaleString('en-US')} tokens (${formatCostForHumans(usage.outputCost)})`
  );
  console.log(
    `  • Total: ${usage.totalTokens.toLocaleString('en-US')} tokens (${formatCostForHumans(usage.totalCost)}, ${getCostContext(usage.totalCost)})`
  );
};

export const printCommitMessage = (message: string): void => {
  const rule = chalk.gray('─'.repeat(UI_CONSTANTS.BOX_WIDTH));
  console.log(`\n${rule}`);
  message.split('\n').forEach((line, index) => {
    console.log(index === 0 ? chalk.bold.green(line) : line);
  });
  console.log(rule);
};

export const printGroupSummary = (groups: readonly FileGroup[]): void => {
  console.log(chalk.bold(`\n${INFO_MESSAGES.GROUPS_TITLE}`));

  groups.forEach((group, index) => {
    const [heading, ...details] = describeGroup(group).split('\n');
    console.log(`\n${chalk.bold.blue(`${index + 1}. ${heading}`)}`);
    details.forEach((line) => console.log(chalk.gray(`   ${line}`)));
  });
};

export const confirmAction = async (message: string, defaultValue: boolean = true): Promise<boolean> => {
  const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([
    {
      type: 'confirm',
      name: 'confirmed',
      message,
      default: defaultValue,
    },
  ]);
  return confirmed;
};
