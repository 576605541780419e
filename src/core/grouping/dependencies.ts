import {
  IMPORT_PATTERNS,
  LANGUAGE_BY_EXTENSION,
  MAX_FILE_SIZE_FOR_ANALYSIS,
} from '../../constants/grouping.js';
import type { ChangedFile } from '../../types/common.js';
import type { DependencyMap, FileSource, ImportLanguage } from '../../types/grouping.js';
import { getExtension, getParentParts, getStem } from '../../utils/path-utils.js';

export const getLanguageFromExtension = (extension: string): ImportLanguage | undefined =>
  LANGUAGE_BY_EXTENSION[extension.toLowerCase()];

export const normalizeImportPath = (importPath: string): string =>
  importPath
    .trim()
    .replace(/^["']+|["']+$/g, '')
    .replace(/^[./]+/, '');

/**
 * An import matches a file when its slash form appears inside the file's
 * directory-plus-stem path, or when its last segment is the file's stem.
 */
export const importMatchesFile = (importPath: string, filePath: string): boolean => {
  const importParts = importPath.replaceAll('.', '/').split('/');
  const fileStem = getStem(filePath);
  const fileString = [...getParentParts(filePath), fileStem].join('/');

  if (fileString.includes(importParts.join('/'))) {
    return true;
  }

  return importParts[importParts.length - 1] === fileStem;
};

export const extractImports = (content: string, language: ImportLanguage): string[] => {
  const imports: string[] = [];

  for (const pattern of IMPORT_PATTERNS[language]) {
    for (const match of content.matchAll(pattern)) {
      if (match.length > 1) {
        imports.push(...match.slice(1).filter((group): group is string => Boolean(group)));
      } else if (match[0]) {
        imports.push(match[0]);
      }
    }
  }

  return imports;
};

/**
 * Builds the direct import graph between changed files. Create one per
 * grouping run: the content cache is never invalidated.
 */
export class DependencyExtractor {
  private readonly contentCache = new Map<string, string>();

  constructor(
    private readonly source: FileSource,
    private readonly maxFileSize: number = MAX_FILE_SIZE_FOR_ANALYSIS
  ) {}

  getFileContents = (filePath: string): string => {
    const cached = this.contentCache.get(filePath);
    if (cached !== undefined) {
      return cached;
    }

    const content = this.readContents(filePath);
    this.contentCache.set(filePath, content);
    return content;
  };

  private readonly readContents = (filePath: string): string => {
    const size = this.source.sizeOf(filePath);
    if (size === undefined || size > this.maxFileSize) {
      return '';
    }

    const bytes = this.source.readBytes(filePath);
    // undecodable bytes are dropped, not replaced
    return bytes ? Buffer.from(bytes).toString('utf-8').replace(/\uFFFD/g, '') : '';
  };

  extract = (files: readonly ChangedFile[]): DependencyMap => {
    const dependencies: DependencyMap = new Map();

    for (const file of files) {
      if (file.isBinary) {
        continue;
      }

      const language = getLanguageFromExtension(getExtension(file.path));
      if (!language) {
        continue;
      }

      const content = this.getFileContents(file.path);
      if (!content) {
        continue;
      }

      const normalizedImports = extractImports(content, language)
        .map(normalizeImportPath)
        .filter((imp) => imp.length > 0);

      const matched = new Set<string>();
      for (const imp of normalizedImports) {
        for (const other of files) {
          if (other.path !== file.path && importMatchesFile(imp, other.path)) {
            matched.add(other.path);
          }
        }
      }

      if (matched.size > 0) {
        dependencies.set(file.path, [...matched].sort());
      }
    }

    return dependencies;
  };
}
