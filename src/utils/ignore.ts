import { minimatch } from 'minimatch';

const MATCH_OPTIONS = { matchBase: true, dot: true } as const;

/**
 * True when the repo-relative path matches any ignore glob. Patterns without a
 * slash match the file name at any depth, and a trailing `/*` covers the whole
 * directory tree.
 */
export const shouldIgnoreFile = (filePath: string, patterns: readonly string[]): boolean => {
  const normalizedPath = filePath.replace(/\\/g, '/');

  return patterns.some(
    (pattern) =>
      minimatch(normalizedPath, pattern, MATCH_OPTIONS) ||
      (pattern.endsWith('/*') && minimatch(normalizedPath, `${pattern}*`, MATCH_OPTIONS))
  );
};
