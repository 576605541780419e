/**
 * Calculate dynamic timeout based on operation complexity
 */
export interface TimeoutCalculationOptions {
  diffSize?: number; // in characters
  fileCount?: number; // number of files being processed
  operationType: 'git' | 'ai';
}

const BASE_TIMEOUTS = {
  git: 15_000,
  ai: 20_000,
} as const;

const MAX_TIMEOUTS = {
  git: 60_000,
  ai: 90_000,
} as const;

export const calculateDynamicTimeout = (options: TimeoutCalculationOptions): number => {
  const { diffSize = 0, fileCount = 1, operationType } = options;

  let timeout: number = BASE_TIMEOUTS[operationType];

  // 1 second per 10KB of diff
  if (diffSize > 0) {
    timeout += Math.floor(diffSize / 1024 / 10) * 1000;
  }

  // 2 seconds per additional file
  if (fileCount > 1) {
    timeout += (fileCount - 1) * 2000;
  }

  return Math.max(Math.min(timeout, MAX_TIMEOUTS[operationType]), BASE_TIMEOUTS[operationType]);
};

export const calculateGitTimeout = (
  options: Omit<TimeoutCalculationOptions, 'operationType'> = {}
): number => calculateDynamicTimeout({ ...options, operationType: 'git' });

export const calculateAITimeout = (
  options: Omit<TimeoutCalculationOptions, 'operationType'> = {}
): number => calculateDynamicTimeout({ ...options, operationType: 'ai' });
