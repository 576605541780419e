import { describe, expect, it } from 'vitest';
import {
  CommitMessageSchema,
  CommitSuggestionSchema,
  CONFIG_KEYS,
  coerceConfigValue,
  isConfigKey,
} from './validation.js';

describe('coerceConfigValue', () => {
  it('parses numbers and keeps blanks invalid', () => {
    expect(coerceConfigValue('tokenLimit', '5000')).toBe(5000);
    expect(coerceConfigValue('costWarningThreshold', '0.02')).toBe(0.02);
    expect(coerceConfigValue('maxGroupSize', '  ')).toBeNaN();
  });

  it('accepts common boolean spellings', () => {
    expect(coerceConfigValue('smartGrouping', 'Yes')).toBe(true);
    expect(coerceConfigValue('smartGrouping', '0')).toBe(false);
    expect(coerceConfigValue('smartGrouping', 'maybe')).toBe('maybe');
  });

  it('splits pattern lists on commas', () => {
    expect(coerceConfigValue('ignoredPatterns', ' *.tmp, ,cache/* ')).toEqual(['*.tmp', 'cache/*']);
  });

  it('trims strings', () => {
    expect(coerceConfigValue('model', ' gemini-2.0-flash ')).toBe('gemini-2.0-flash');
  });
});

describe('config keys', () => {
  it('lists every configurable key', () => {
    expect(CONFIG_KEYS).toContain('maxFilesThreshold');
    expect(isConfigKey('smartGrouping')).toBe(true);
    expect(isConfigKey('colour')).toBe(false);
  });
});

describe('CommitSuggestionSchema', () => {
  it('fills in missing optional parts', () => {
    expect(
      CommitSuggestionSchema.parse({
        title: '  🐛 fix: guard empty cart ',
        body: { Fixes: { changes: ['Guarded empty cart'] } },
      })
    ).toEqual({
      title: '🐛 fix: guard empty cart',
      body: { Fixes: { emoji: '', changes: ['Guarded empty cart'] } },
      summary: '',
    });
  });

  it('requires a title', () => {
    expect(CommitSuggestionSchema.safeParse({ title: '   ', body: {} }).success).toBe(false);
  });
});

describe('CommitMessageSchema', () => {
  it('trims a valid message', () => {
    expect(CommitMessageSchema.parse(' feat: add search ')).toBe('feat: add search');
  });

  it('rejects blank or script-like messages', () => {
    expect(CommitMessageSchema.safeParse('   ').success).toBe(false);
    expect(CommitMessageSchema.safeParse('feat: <script>alert(1)</script>').success).toBe(false);
  });
});
