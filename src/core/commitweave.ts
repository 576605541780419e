import chalk from 'chalk';
import ora from 'ora';
import type { ChangedFile, CommitOptions, CommitSuggestion, TokenUsage } from '../types/common.js';
import type { AnalyzerSettings } from '../types/analyzer.js';
import type { FileGroup } from '../types/grouping.js';
import { ErrorType } from '../types/error-handler.js';
import type { GitService } from '../services/git.js';
import type { GenerationResult } from '../services/ai.js';
import { SecureError } from '../utils/error-handler.js';
import { sanitizeError } from '../utils/security.js';
import { combineSuggestions, formatCommitBody, formatCommitMessage } from '../utils/commit-message.js';
import {
  printBatchComplete,
  printBatchStart,
  printBatchSummary,
  printChangedFiles,
  printCommitMessage,
  printError,
  printInfo,
  printSuccess,
  printTokenUsage,
  printWarning,
  printWarnings,
} from '../utils/console.js';
import { analyzeDiffComplexity } from './analyzer.js';
import { planBatches, type CommitBatch } from './batch.js';
import {
  ERROR_MESSAGES,
  INFO_MESSAGES,
  PROMPT_MESSAGES,
  SUCCESS_MESSAGES,
  WARNING_MESSAGES,
} from '../constants/messages.js';
import { UI_CONSTANTS } from '../constants/ui.js';

export interface CommitWeaveDependencies {
  git: Pick<GitService, 'isGitRepository' | 'getChangedFiles' | 'getDiff' | 'stageFiles' | 'createCommit'>;
  ai: { generateCommitMessage: (diff: string, files: readonly ChangedFile[]) => Promise<GenerationResult> };
  grouper: { buildGroups: (files: readonly ChangedFile[]) => FileGroup[] };
  settings: AnalyzerSettings & { smartGrouping: boolean };
  confirm: (message: string, defaultValue?: boolean) => Promise<boolean>;
}

export interface BatchResult {
  batch: CommitBatch;
  suggestion: CommitSuggestion;
  usage: TokenUsage;
}

export interface RunSummary {
  commitsCreated: number;
  batchesGenerated: number;
}

const withSpinner = async <T>(text: string, operation: () => Promise<T>): Promise<T> => {
  const spinner = ora(text).start();
  try {
    const result = await operation();
    spinner.stop();
    return result;
  } catch (error) {
    spinner.fail();
    throw error;
  }
};

export class CommitWeave {
  constructor(private readonly deps: CommitWeaveDependencies) {}

  run = async (options: CommitOptions = {}): Promise<RunSummary> => {
    const { git, settings } = this.deps;

    if (!(await git.isGitRepository())) {
      throw new SecureError(ERROR_MESSAGES.NOT_GIT_REPOSITORY, ErrorType.GIT_ERROR, { operation: 'run' }, true);
    }

    const files = await withSpinner(UI_CONSTANTS.SPINNER_MESSAGES.LOADING, () => git.getChangedFiles());
    if (files.length === 0) {
      throw new SecureError(ERROR_MESSAGES.NO_STAGED_CHANGES, ErrorType.GIT_ERROR, { operation: 'run' }, true);
    }

    if (options.dryRun) {
      printInfo(INFO_MESSAGES.DRY_RUN_NOTICE);
    }

    printChangedFiles(files);

    const diff = await git.getDiff(files);
    printWarnings(analyzeDiffComplexity(diff, files, settings));

    if (files.length > settings.maxFilesThreshold) {
      return this.runBatches(files, options);
    }

    return this.runSingle(files, diff, options);
  };

  private readonly runSingle = async (
    files: ChangedFile[],
    diff: string,
    options: CommitOptions
  ): Promise<RunSummary> => {
    const { suggestion, usage } = await withSpinner(UI_CONSTANTS.SPINNER_MESSAGES.GENERATING, () =>
      this.deps.ai.generateCommitMessage(diff, files)
    );

    printCommitMessage(formatCommitMessage(suggestion));
    printTokenUsage(usage);

    if (options.dryRun) {
      this.printWouldCommit(files);
      return { commitsCreated: 0, batchesGenerated: 1 };
    }

    if (!options.yes && !(await this.deps.confirm(PROMPT_MESSAGES.CREATE_COMMIT))) {
      printWarning(WARNING_MESSAGES.COMMIT_ABORTED);
      return { commitsCreated: 0, batchesGenerated: 1 };
    }

    const created = await this.commit(suggestion);
    if (created) {
      printSuccess(SUCCESS_MESSAGES.COMMIT_CREATED);
    }
    return { commitsCreated: created ? 1 : 0, batchesGenerated: 1 };
  };

  private readonly runBatches = async (
    files: ChangedFile[],
    options: CommitOptions
  ): Promise<RunSummary> => {
    const { settings } = this.deps;
    const smartGrouping = options.smartGrouping ?? settings.smartGrouping;

    printInfo(smartGrouping ? INFO_MESSAGES.SMART_GROUPING_ON : INFO_MESSAGES.FIXED_BATCHES);

    const batches = planBatches(files, {
      smartGrouping,
      maxFilesThreshold: settings.maxFilesThreshold,
      buildGroups: this.deps.grouper.buildGroups,
    });

    const results = await this.generateBatches(batches, options);
    if (results.length === 0) {
      throw new SecureError(
        ERROR_MESSAGES.NO_BATCHES_PROCESSED,
        ErrorType.AI_SERVICE_ERROR,
        { operation: 'runBatches' },
        true
      );
    }

    const summary = { commitsCreated: 0, batchesGenerated: results.length };

    if (options.dryRun) {
      return summary;
    }

    if (options.combine) {
      return { ...summary, commitsCreated: await this.commitCombined(results) };
    }

    // Every message is generated before the first commit, since committing rewrites the index
    const individually = options.yes || (await this.deps.confirm(PROMPT_MESSAGES.COMMIT_INDIVIDUALLY));
    if (!individually) {
      return { ...summary, commitsCreated: await this.commitCombined(results) };
    }

    let commitsCreated = 0;
    for (const [index, result] of results.entries()) {
      commitsCreated += await this.commitBatch(result, index + 1);
    }

    if (commitsCreated === 0) {
      printWarning(WARNING_MESSAGES.NOTHING_COMMITTED);
    }
    return { ...summary, commitsCreated };
  };

  private readonly generateBatches = async (
    batches: CommitBatch[],
    options: CommitOptions
  ): Promise<BatchResult[]> => {
    const interactive = !options.yes && !options.dryRun;
    const totalFiles = batches.reduce((sum, batch) => sum + batch.files.length, 0);
    const results: BatchResult[] = [];

    printBatchSummary(totalFiles, batches.length);

    for (const [index, batch] of batches.entries()) {
      const batchNumber = index + 1;
      printBatchStart(batchNumber, batches.length, batch);

      try {
        const batchDiff = await this.deps.git.getDiff(batch.files);
        const { suggestion, usage } = await withSpinner(
          `${UI_CONSTANTS.SPINNER_MESSAGES.GENERATING_BATCH} ${batchNumber}/${batches.length}`,
          () => this.deps.ai.generateCommitMessage(batchDiff, batch.files)
        );

        results.push({ batch, suggestion, usage });
        printBatchComplete(batchNumber, batches.length);
        printTokenUsage(usage, batchNumber);
        printCommitMessage(formatCommitMessage(suggestion));

        if (options.dryRun) {
          this.printWouldCommit(batch.files);
        }
      } catch (error) {
        printError(`Failed to process batch ${batchNumber}: ${sanitizeError(error)}`);
        if (interactive && !(await this.deps.confirm(PROMPT_MESSAGES.TRY_NEXT_BATCH))) {
          break;
        }
        continue;
      }

      const hasMore = batchNumber < batches.length;
      if (hasMore && interactive && !(await this.deps.confirm(PROMPT_MESSAGES.CONTINUE_BATCHES))) {
        printWarning(WARNING_MESSAGES.PROCESS_STOPPED);
        break;
      }
    }

    return results;
  };

  private readonly commit = async (suggestion: CommitSuggestion): Promise<boolean> => {
    const spinner = ora(UI_CONSTANTS.SPINNER_MESSAGES.COMMITTING).start();
    try {
      const created = await this.deps.git.createCommit(suggestion.title, formatCommitBody(suggestion));
      if (created) {
        spinner.succeed(`Committed: ${chalk.green(suggestion.title)}`);
      } else {
        spinner.warn(ERROR_MESSAGES.COMMIT_NOT_CREATED);
      }
      return created;
    } catch (error) {
      spinner.fail();
      throw error;
    }
  };

  private readonly commitBatch = async (result: BatchResult, batchNumber: number): Promise<number> => {
    try {
      await this.deps.git.stageFiles(result.batch.files.map((file) => file.path));
      return (await this.commit(result.suggestion)) ? 1 : 0;
    } catch (error) {
      printError(`Failed to commit batch ${batchNumber}: ${sanitizeError(error)}`);
      return 0;
    }
  };

  private readonly commitCombined = async (results: BatchResult[]): Promise<number> => {
    const combined = combineSuggestions(results.map((result) => result.suggestion));
    printCommitMessage(formatCommitMessage(combined));

    await this.deps.git.stageFiles(results.flatMap((result) => result.batch.files.map((file) => file.path)));
    const created = await this.commit(combined);
    if (created) {
      printSuccess(SUCCESS_MESSAGES.COMBINED_COMMIT_CREATED);
    }
    return created ? 1 : 0;
  };

  private readonly printWouldCommit = (files: readonly ChangedFile[]): void => {
    printInfo(`${INFO_MESSAGES.WOULD_COMMIT} ${files.length} file(s):`);
    files.forEach((file) => console.log(chalk.gray(`  - ${file.path}`)));
  };
}
