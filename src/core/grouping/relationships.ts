import {
  COMPONENT_EXTENSIONS,
  NAME_SEPARATOR_PATTERN,
  RELATIONSHIP_STRENGTH,
  SIMILAR_NAMING_THRESHOLD,
  TEST_MARKER_PATTERN,
} from '../../constants/grouping.js';
import type { ChangedFile } from '../../types/common.js';
import type { FileRelationship, RelationshipType } from '../../types/grouping.js';
import { getAncestorDirs, getExtension, getParentDir, getStem } from '../../utils/path-utils.js';
import { isTestFile } from './classifier.js';

const relationship = (
  fileA: string,
  fileB: string,
  relationshipType: RelationshipType,
  strength: number
): FileRelationship => ({ fileA, fileB, relationshipType, strength });

const splitName = (stem: string): Set<string> =>
  new Set(
    stem
      .toLowerCase()
      .split(NAME_SEPARATOR_PATTERN)
      .filter((part) => part.length > 0)
  );

export const isTestImplementationPair = (pathA: string, pathB: string): boolean => {
  const isTestA = isTestFile(pathA);
  const isTestB = isTestFile(pathB);

  if (isTestA === isTestB) {
    return false;
  }

  const testPath = isTestA ? pathA : pathB;
  const implPath = isTestA ? pathB : pathA;

  const testName = getStem(testPath).replace(TEST_MARKER_PATTERN, '');
  const implName = getStem(implPath);

  return testName === implName || implName.includes(testName) || testName.includes(implName);
};

/**
 * Returns [test, implementation] when exactly one of the paths is a test file.
 */
export const identifyTestAndImplementation = (
  pathA: string,
  pathB: string
): [string, string] | null => {
  const isTestA = isTestFile(pathA);
  const isTestB = isTestFile(pathB);

  if (isTestA && !isTestB) return [pathA, pathB];
  if (isTestB && !isTestA) return [pathB, pathA];
  return null;
};

const isComponentPair = (pathA: string, pathB: string): boolean => {
  const extA = getExtension(pathA);
  const extB = getExtension(pathB);

  return (
    getStem(pathA) === getStem(pathB) &&
    getParentDir(pathA) === getParentDir(pathB) &&
    extA !== extB &&
    (COMPONENT_EXTENSIONS.has(extA) || COMPONENT_EXTENSIONS.has(extB))
  );
};

export const hasSimilarNaming = (pathA: string, pathB: string): boolean => {
  const partsA = splitName(getStem(pathA));
  const partsB = splitName(getStem(pathB));

  const common = [...partsA].filter((part) => partsB.has(part));
  if (common.length === 0) {
    return false;
  }

  const union = new Set([...partsA, ...partsB]);
  return common.length / union.size >= SIMILAR_NAMING_THRESHOLD;
};

const isDirectoryHierarchy = (pathA: string, pathB: string): boolean =>
  getAncestorDirs(pathB).includes(getParentDir(pathA)) ||
  getAncestorDirs(pathA).includes(getParentDir(pathB));

/**
 * First matching rule wins. Similar naming is checked before same-directory.
 */
export const findRelationship = (pathA: string, pathB: string): FileRelationship | null => {
  if (isTestImplementationPair(pathA, pathB)) {
    return relationship(pathA, pathB, 'test-implementation', RELATIONSHIP_STRENGTH.TEST_IMPLEMENTATION);
  }

  if (isComponentPair(pathA, pathB)) {
    return relationship(pathA, pathB, 'component-pair', RELATIONSHIP_STRENGTH.COMPONENT_PAIR);
  }

  if (hasSimilarNaming(pathA, pathB)) {
    return relationship(pathA, pathB, 'similar-naming', RELATIONSHIP_STRENGTH.SIMILAR_NAMING);
  }

  if (getParentDir(pathA) === getParentDir(pathB)) {
    return relationship(pathA, pathB, 'same-directory', RELATIONSHIP_STRENGTH.SAME_DIRECTORY);
  }

  if (isDirectoryHierarchy(pathA, pathB)) {
    return relationship(pathA, pathB, 'directory-hierarchy', RELATIONSHIP_STRENGTH.DIRECTORY_HIERARCHY);
  }

  return null;
};

/** Pairwise scan over the changed files, in input order. */
export const detectRelationships = (files: readonly ChangedFile[]): FileRelationship[] => {
  const relationships: FileRelationship[] = [];

  for (let i = 0; i < files.length; i++) {
    for (let j = i + 1; j < files.length; j++) {
      const found = findRelationship(files[i].path, files[j].path);
      if (found) {
        relationships.push(found);
      }
    }
  }

  return relationships;
};
