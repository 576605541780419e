import { CHANGE_TYPE_PATTERNS, SOURCE_EXTENSIONS } from '../../constants/grouping.js';
import { ChangeType } from '../../types/grouping.js';
import { getExtension, getFileName } from '../../utils/path-utils.js';

interface CompiledRule {
  changeType: ChangeType;
  patterns: Array<{ regex: RegExp; matchFullPath: boolean }>;
}

const COMPILED_RULES: CompiledRule[] = CHANGE_TYPE_PATTERNS.map(([changeType, sources]) => ({
  changeType,
  patterns: sources.map((source) => ({
    regex: new RegExp(source, 'i'),
    matchFullPath: source.includes('/'),
  })),
}));

const TEST_RULE = COMPILED_RULES.find((rule) => rule.changeType === ChangeType.TEST);

const matchesRule = (rule: CompiledRule, filePath: string): boolean =>
  rule.patterns.some(({ regex, matchFullPath }) =>
    regex.test(matchFullPath ? filePath : getFileName(filePath))
  );

export const isTestFile = (filePath: string): boolean =>
  TEST_RULE !== undefined && matchesRule(TEST_RULE, filePath);

/**
 * Maps a repository path to exactly one change type. Pure and deterministic.
 */
export const classifyChange = (filePath: string): ChangeType => {
  for (const rule of COMPILED_RULES) {
    if (matchesRule(rule, filePath)) {
      return rule.changeType;
    }
  }

  const extension = getExtension(filePath).toLowerCase();
  if (!SOURCE_EXTENSIONS.has(extension)) {
    return ChangeType.CHORE;
  }

  const lowerPath = filePath.toLowerCase();
  if (lowerPath.includes('fix') || lowerPath.includes('bug')) {
    return ChangeType.FIX;
  }
  if (lowerPath.includes('feature') || lowerPath.includes('feat')) {
    return ChangeType.FEATURE;
  }

  // Unclassified source edits are assumed to be refactors
  return ChangeType.REFACTOR;
};
