import type { ChangedFile } from './common.js';

export enum ChangeType {
  FEATURE = 'feature',
  FIX = 'fix',
  TEST = 'test',
  DOCS = 'docs',
  REFACTOR = 'refactor',
  STYLE = 'style',
  CHORE = 'chore',
  CONFIG = 'config',
  BUILD = 'build',
  PERF = 'perf',
}

export type RelationshipType =
  | 'test-implementation'
  | 'component-pair'
  | 'same-directory'
  | 'directory-hierarchy'
  | 'similar-naming';

export interface FileRelationship {
  fileA: string;
  fileB: string;
  relationshipType: RelationshipType;
  strength: number; // 0.0 to 1.0
}

/** Source path -> sorted, de-duplicated paths of other changed files it imports. */
export type DependencyMap = Map<string, string[]>;

export interface FileGroup {
  files: ChangedFile[];
  changeType: ChangeType;
  reason: string;
  confidence: number; // 0.0 to 1.0
  dependencies: string[];
}

export interface GroupingOptions {
  maxGroupSize: number;
  smallGroupThreshold: number;
}

export type ImportLanguage = 'python' | 'javascript' | 'typescript' | 'java' | 'go';

/**
 * Read access to file contents for dependency extraction.
 * Both methods return undefined for missing or unreadable paths.
 */
export interface FileSource {
  sizeOf(filePath: string): number | undefined;
  readBytes(filePath: string): Uint8Array | undefined;
}
