import type { SizeCheck } from '../types/security.js';
import { DEFAULT_LIMITS, SECRET_PATTERNS } from '../constants/security.js';

export const sanitizeError = (error: unknown): string => {
  if (typeof error === 'string') {
    return SECRET_PATTERNS.reduce(
      (message, [pattern, replacement]) => message.replace(pattern, replacement),
      error
    );
  }

  if (error instanceof Error) {
    return sanitizeError(error.message);
  }

  return 'An unknown error occurred';
};

export const validateDiffSize = (
  diff: string,
  maxSize: number = DEFAULT_LIMITS.maxDiffSize
): SizeCheck => {
  if (diff.length > maxSize) {
    return {
      isValid: false,
      error: `Diff content size ${diff.length} characters exceeds limit of ${maxSize} characters`,
    };
  }

  return {
    isValid: true,
    value: diff,
  };
};

export const withTimeout = <T>(
  promise: Promise<T>,
  timeoutMs: number = DEFAULT_LIMITS.timeoutMs
): Promise<T> => {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new Error(`Operation timed out after ${timeoutMs}ms`)),
      timeoutMs
    );
  });

  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
};
