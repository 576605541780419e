import { ErrorType } from '../types/error-handler.js';

export const ERROR_LOG_LIMIT = 100;
export const DEFAULT_RETRY_ATTEMPTS = 3;
export const DEFAULT_RETRY_DELAY_MS = 500;

// Checked in order against the lower-cased message
export const ERROR_PATTERNS: ReadonlyArray<{ type: ErrorType; patterns: readonly string[] }> = [
  { type: ErrorType.TIMEOUT_ERROR, patterns: ['timeout', 'timed out'] },
  { type: ErrorType.VALIDATION_ERROR, patterns: ['validation', 'invalid'] },
  { type: ErrorType.GIT_ERROR, patterns: ['git', 'repository', 'not a work tree'] },
  { type: ErrorType.AI_SERVICE_ERROR, patterns: ['api key', 'gemini', 'quota', 'model'] },
  { type: ErrorType.CONFIG_ERROR, patterns: ['config', 'configuration'] },
];
