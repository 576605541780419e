import { describe, expect, it } from 'vitest';
import { ChangeType } from '../../types/grouping.js';
import { classifyChange, isTestFile } from './classifier.js';

describe('classifyChange', () => {
  it.each([
    ['tests/helpers.py', ChangeType.TEST],
    ['src/foo_test.py', ChangeType.TEST],
    ['src/app.spec.ts', ChangeType.TEST],
    ['src/__tests__/app.ts', ChangeType.TEST],
    ['README.md', ChangeType.DOCS],
    ['docs/guide.txt', ChangeType.DOCS],
    ['package.json', ChangeType.BUILD],
    ['requirements.txt', ChangeType.BUILD],
    ['Makefile', ChangeType.BUILD],
    ['config/app.yaml', ChangeType.CONFIG],
    ['tsconfig.json', ChangeType.CONFIG],
    ['Dockerfile', ChangeType.CONFIG],
    ['styles/main.css', ChangeType.STYLE],
    ['src/fix_login.py', ChangeType.FIX],
    ['src/feature_flags.ts', ChangeType.FEATURE],
    ['src/utils/helpers.ts', ChangeType.REFACTOR],
    ['assets/logo.xyz', ChangeType.CHORE],
  ])('classifies %s as %s', (filePath, expected) => {
    expect(classifyChange(filePath)).toBe(expected);
  });

  it('lets the first matching rule win', () => {
    // a markdown file inside a tests directory is still a test change
    expect(classifyChange('tests/NOTES.md')).toBe(ChangeType.TEST);
  });

  it('matches name-only patterns case-insensitively', () => {
    expect(classifyChange('Readme.MD')).toBe(ChangeType.DOCS);
  });
});

describe('isTestFile', () => {
  it('recognises test paths', () => {
    expect(isTestFile('src/app.spec.ts')).toBe(true);
    expect(isTestFile('tests/test_user.py')).toBe(true);
  });

  it('rejects implementation paths', () => {
    expect(isTestFile('src/app.ts')).toBe(false);
    expect(isTestFile('src/contest.py')).toBe(false);
  });
});
