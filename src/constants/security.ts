import type { ResourceLimits } from '../types/security.js';

export const DEFAULT_LIMITS: ResourceLimits = {
  maxDiffSize: 100_000,
  maxApiRequestSize: 750_000,
  timeoutMs: 25_000,
};

// Redacted from every error message before it is shown or logged
export const SECRET_PATTERNS: ReadonlyArray<readonly [RegExp, string]> = [
  [/api[_-]?key[=:]\s*[^\s]+/gi, 'api_key=***'],
  [/key=AIza[0-9A-Za-z_-]+/g, 'key=***'],
  [/token[=:]\s*[^\s]+/gi, 'token=***'],
  [/password[=:]\s*[^\s]+/gi, 'password=***'],
  [/secret[=:]\s*[^\s]+/gi, 'secret=***'],
];
