import simpleGit, { type SimpleGit } from 'simple-git';
import type { ChangedFile } from '../types/common.js';
import { CommitMessageSchema } from '../schemas/validation.js';
import { withTimeout } from '../utils/security.js';
import { shouldIgnoreFile } from '../utils/ignore.js';
import { ErrorType } from '../types/error-handler.js';
import { withErrorHandling, SecureError } from '../utils/error-handler.js';
import { calculateGitTimeout } from '../utils/timeout.js';
import { ERROR_MESSAGES } from '../constants/messages.js';
import { DEFAULT_IGNORED_PATTERNS } from '../constants/config.js';
import { BINARY_DIFF_HEADER } from '../constants/ai.js';

const BINARY_NUMSTAT_MARKER = '-\t-\t';
const SIZE_UNITS = ['B', 'KB', 'MB', 'GB'] as const;

export const formatFileSize = (bytes: number): string => {
  let size = bytes;
  for (const unit of SIZE_UNITS) {
    if (size < 1024) {
      return `${size.toFixed(2)} ${unit}`;
    }
    size /= 1024;
  }
  return `${size.toFixed(2)} TB`;
};

const splitLines = (output: string): string[] =>
  output
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

export class GitService {
  private readonly git: SimpleGit;

  constructor(
    baseDir: string = process.cwd(),
    private readonly ignoredPatterns: readonly string[] = DEFAULT_IGNORED_PATTERNS
  ) {
    this.git = simpleGit({ baseDir });
  }

  isGitRepository = async (): Promise<boolean> => {
    try {
      return await withTimeout(this.git.checkIsRepo(), calculateGitTimeout());
    } catch {
      return false;
    }
  };

  /**
   * Staged files minus ignored ones. Hash and size come from the index; any
   * lookup failure leaves them undefined.
   */
  getChangedFiles = async (): Promise<ChangedFile[]> => {
    return withErrorHandling(
      async () => {
        const nameOutput = await withTimeout(
          this.git.diff(['--staged', '--name-only', '--']),
          calculateGitTimeout()
        );
        const paths = splitLines(nameOutput).filter(
          (filePath) => !shouldIgnoreFile(filePath, this.ignoredPatterns)
        );

        if (paths.length === 0) {
          return [];
        }

        const binaryPaths = await this.getBinaryPaths();
        const files: ChangedFile[] = [];

        for (const filePath of paths) {
          const indexEntry = await this.readIndexEntry(filePath);
          files.push({
            path: filePath,
            ...(binaryPaths.has(filePath) ? { isBinary: true } : {}),
            ...indexEntry,
          });
        }

        return files;
      },
      { operation: 'getChangedFiles' }
    );
  };

  private readonly getBinaryPaths = async (): Promise<Set<string>> => {
    const numstat = await withTimeout(
      this.git.diff(['--staged', '--numstat']),
      calculateGitTimeout()
    );

    return new Set(
      splitLines(numstat)
        .filter((line) => line.startsWith(BINARY_NUMSTAT_MARKER))
        .map((line) => line.slice(BINARY_NUMSTAT_MARKER.length))
    );
  };

  private readonly readIndexEntry = async (
    filePath: string
  ): Promise<Pick<ChangedFile, 'hash' | 'size'>> => {
    try {
      // "<mode> <hash> <stage>\t<path>"
      const fields = (await this.git.raw(['ls-files', '-s', filePath])).trim().split(/\s+/);
      if (fields.length < 4) {
        return {};
      }

      const hash = fields[1];
      const size = Number.parseInt((await this.git.raw(['cat-file', '-s', hash])).trim(), 10);

      return Number.isNaN(size) ? {} : { hash, size };
    } catch {
      // deleted or unmerged entries have no blob to size
      return {};
    }
  };

  getDiff = async (files: readonly ChangedFile[] = []): Promise<string> => {
    return withErrorHandling(
      async () => {
        const numstat = await withTimeout(
          this.git.diff(['--staged', '--numstat']),
          calculateGitTimeout({ fileCount: files.length })
        );

        if (numstat.includes(BINARY_NUMSTAT_MARKER)) {
          const listing = files.map(
            (file) =>
              `- ${file.path} (${file.size !== undefined ? formatFileSize(file.size) : 'size unknown'})\n`
          );
          return `${BINARY_DIFF_HEADER}\n${listing.join('')}`;
        }

        const paths = files.map((file) => file.path);
        return withTimeout(
          this.git.diff(['--staged', '--', ...paths]),
          calculateGitTimeout({ fileCount: files.length })
        );
      },
      { operation: 'getDiff' }
    );
  };

  /** Replaces the index contents with exactly the given paths. */
  stageFiles = async (paths: readonly string[]): Promise<void> => {
    return withErrorHandling(
      async () => {
        if (paths.length === 0) {
          throw new SecureError(
            ERROR_MESSAGES.NO_FILES_TO_STAGE,
            ErrorType.VALIDATION_ERROR,
            { operation: 'stageFiles' },
            true
          );
        }

        await this.resetStaged();
        for (const filePath of paths) {
          await withTimeout(this.git.add(filePath), calculateGitTimeout());
        }
      },
      { operation: 'stageFiles' }
    );
  };

  resetStaged = async (): Promise<void> => {
    return withErrorHandling(
      async () => {
        await withTimeout(this.git.raw(['reset']), calculateGitTimeout());
      },
      { operation: 'resetStaged' }
    );
  };

  /** Commits the index with the title and body as separate paragraphs. */
  createCommit = async (title: string, body: string): Promise<boolean> => {
    return withErrorHandling(
      async () => {
        const titleValidation = CommitMessageSchema.safeParse(title);
        if (!titleValidation.success) {
          throw new SecureError(
            titleValidation.error.issues.map((issue) => issue.message).join(', '),
            ErrorType.VALIDATION_ERROR,
            { operation: 'createCommit' },
            true
          );
        }

        const message = body.trim().length > 0 ? [titleValidation.data, body] : [titleValidation.data];
        const result = await withTimeout(this.git.commit(message), calculateGitTimeout());

        return result.commit.length > 0;
      },
      { operation: 'createCommit' }
    );
  };
}
