import * as path from 'path';

// Repository paths reported by git always use forward slashes
const posix = path.posix;

export const getFileName = (filePath: string): string => posix.basename(filePath);

export const getExtension = (filePath: string): string => posix.extname(filePath);

export const getStem = (filePath: string): string =>
  posix.basename(filePath, posix.extname(filePath));

export const getParentDir = (filePath: string): string => posix.dirname(posix.normalize(filePath));

/** Directory segments of the parent, empty for files at the repository root. */
export const getParentParts = (filePath: string): string[] => {
  const parent = getParentDir(filePath);
  return parent === '.' ? [] : parent.split('/').filter(Boolean);
};

/**
 * Every directory containing the file, nearest first, ending with the repository root ".".
 */
export const getAncestorDirs = (filePath: string): string[] => {
  const ancestors: string[] = [];
  let current = getParentDir(filePath);

  while (true) {
    ancestors.push(current);
    if (current === '.' || current === '/') {
      return ancestors;
    }
    current = posix.dirname(current);
  }
};

export const getPathParts = (filePath: string): string[] =>
  posix
    .normalize(filePath)
    .split('/')
    .filter((part) => part !== '' && part !== '.');
