import { beforeEach, describe, expect, it, vi } from 'vitest';
import { ErrorType } from '../types/error-handler.js';
import { SecureError } from '../utils/error-handler.js';
import {
  AIService,
  DIFF_TRUNCATED_MARKER,
  buildCommitPrompt,
  buildTokenUsage,
  parseSuggestion,
} from './ai.js';

const { generateContent } = vi.hoisted(() => ({ generateContent: vi.fn() }));

vi.mock('@google/genai', () => ({
  GoogleGenAI: class {
    models = { generateContent };
  },
}));

const responseText = JSON.stringify({
  title: '✨ feat: add search',
  body: { Features: { emoji: '✨', changes: ['Added search'] } },
  summary: 'Adds search.',
});

const promptOfCall = (index: number): string => {
  const request: unknown = generateContent.mock.calls[index]?.[0];
  if (typeof request !== 'object' || request === null || !('contents' in request)) {
    throw new Error('generateContent was not called with a request');
  }
  return String(request.contents);
};

describe('AIService', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  it('requires an API key', () => {
    expect(() => new AIService('')).toThrow(SecureError);
  });

  it('generates a suggestion with token usage', async () => {
    generateContent.mockResolvedValue({
      text: responseText,
      usageMetadata: { promptTokenCount: 1000, candidatesTokenCount: 200, totalTokenCount: 1200 },
    });

    const service = new AIService('test-secret-key');
    const { suggestion, usage } = await service.generateCommitMessage('diff --git a/a.ts b/a.ts', [
      { path: 'a.ts' },
    ]);

    expect(suggestion).toEqual({
      title: '✨ feat: add search',
      body: { Features: { emoji: '✨', changes: ['Added search'] } },
      summary: 'Adds search.',
    });
    expect(usage.promptTokens).toBe(1000);
    expect(usage.completionTokens).toBe(200);
    expect(usage.totalTokens).toBe(1200);
    expect(usage.totalCost).toBeCloseTo(0.000135, 10);
    expect(generateContent).toHaveBeenCalledWith(
      expect.objectContaining({
        model: 'gemini-2.0-flash-lite',
        config: { responseMimeType: 'application/json', temperature: 0.7, maxOutputTokens: 1000 },
      })
    );
  });

  it('uses the configured model', async () => {
    generateContent.mockResolvedValue({ text: responseText });

    await new AIService('test-secret-key', { model: 'gemini-2.5-pro' }).generateCommitMessage('diff', []);

    expect(generateContent).toHaveBeenCalledWith(expect.objectContaining({ model: 'gemini-2.5-pro' }));
  });

  it('redacts secrets before the diff leaves the machine', async () => {
    generateContent.mockResolvedValue({ text: responseText });

    await new AIService('test-secret-key').generateCommitMessage(
      '+const api_key = "placeholder-placeholder-value";\n',
      [{ path: 'src/settings.ts' }]
    );

    const prompt = promptOfCall(0);
    expect(prompt).toContain('+const [REDACTED];');
    expect(prompt).not.toContain('placeholder-placeholder-value');
  });

  it('truncates oversized diffs', async () => {
    generateContent.mockResolvedValue({ text: responseText });

    await new AIService('test-secret-key').generateCommitMessage('x'.repeat(100_001), [{ path: 'big.txt' }]);

    const prompt = promptOfCall(0);
    expect(prompt).toContain(`${'x'.repeat(100_000)}\n${DIFF_TRUNCATED_MARKER}`);
    expect(prompt).not.toContain('x'.repeat(100_001));
  });

  it('retries recoverable failures', async () => {
    generateContent
      .mockRejectedValueOnce(Object.assign(new Error('socket closed'), { code: 'ECONNRESET' }))
      .mockResolvedValueOnce({ text: responseText });

    const service = new AIService('test-secret-key', { retryDelayMs: 0 });
    const { suggestion } = await service.generateCommitMessage('diff', []);

    expect(suggestion.title).toBe('✨ feat: add search');
    expect(generateContent).toHaveBeenCalledTimes(2);
  });

  it('gives up after the configured attempts on unusable responses', async () => {
    generateContent.mockResolvedValue({ text: 'not json' });

    const service = new AIService('test-secret-key', { retryAttempts: 2, retryDelayMs: 0 });

    await expect(service.generateCommitMessage('diff', [])).rejects.toMatchObject({
      type: ErrorType.AI_SERVICE_ERROR,
    });
    expect(generateContent).toHaveBeenCalledTimes(2);
  });

  it('does not retry unknown failures', async () => {
    generateContent.mockRejectedValue(new Error('boom'));

    const service = new AIService('test-secret-key', { retryDelayMs: 0 });

    await expect(service.generateCommitMessage('diff', [])).rejects.toMatchObject({
      type: ErrorType.UNKNOWN_ERROR,
      isRecoverable: false,
    });
    expect(generateContent).toHaveBeenCalledTimes(1);
  });
});

describe('parseSuggestion', () => {
  it('accepts JSON wrapped in a code fence', () => {
    expect(parseSuggestion('```json\n{"title": "fix: guard cart"}\n```')).toEqual({
      title: 'fix: guard cart',
      body: {},
      summary: '',
    });
  });

  it('rejects empty and malformed responses', () => {
    expect(() => parseSuggestion('  ')).toThrow('Empty response from AI model');
    expect(() => parseSuggestion('{"summary": "no title"}')).toThrow(
      'AI response is not a valid commit suggestion'
    );
  });
});

describe('buildCommitPrompt', () => {
  it('embeds the diff and file list', () => {
    const prompt = buildCommitPrompt('diff --git a/a.ts b/a.ts', [{ path: 'a.ts' }, { path: 'b.ts' }]);

    expect(prompt).toContain('Files changed: a.ts, b.ts');
    expect(prompt).toContain('```\ndiff --git a/a.ts b/a.ts\n```');
  });

  it('uses the binary wording for binary summaries', () => {
    const prompt = buildCommitPrompt('Binary files changed:\n- logo.png (1.00 KB)\n', [{ path: 'logo.png' }]);

    expect(prompt.split('\n')[0]).toBe(
      'Generate a structured commit message in JSON format for the following binary file changes.'
    );
  });
});

describe('buildTokenUsage', () => {
  it('treats missing metadata as zero usage', () => {
    expect(buildTokenUsage(undefined, 'gemini-2.0-flash')).toEqual({
      promptTokens: 0,
      completionTokens: 0,
      totalTokens: 0,
      inputCost: 0,
      outputCost: 0,
      totalCost: 0,
    });
  });

  it('sums the counts when no total is reported', () => {
    expect(buildTokenUsage({ promptTokenCount: 10, candidatesTokenCount: 5 }, 'gemini-2.0-flash').totalTokens).toBe(
      15
    );
  });
});
