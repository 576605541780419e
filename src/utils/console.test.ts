import { describe, expect, it, vi } from 'vitest';
import { ChangeType } from '../types/grouping.js';
import { printGroupSummary } from './console.js';

const ANSI_ESCAPE = /\u001b\[[0-9;]*m/g;

describe('printGroupSummary', () => {
  it('prints each group as described by the grouping engine', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    printGroupSummary([
      {
        files: [{ path: 'src/a.ts' }, { path: 'src/b.ts' }],
        changeType: ChangeType.REFACTOR,
        reason: 'All refactor changes',
        confidence: 0.8,
        dependencies: ['src/feature_c.ts'],
      },
    ]);

    const lines = log.mock.calls.map(([line]) => String(line).replace(ANSI_ESCAPE, ''));
    expect(lines).toEqual([
      '\n🧩 Smart groups:',
      '\n1. Group: refactor',
      '   Reason: All refactor changes',
      '   Confidence: 80.0%',
      '   Files: src/a.ts, src/b.ts',
      '   Dependencies: src/feature_c.ts',
    ]);
  });
});
