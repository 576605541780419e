import { GoogleGenAI } from '@google/genai';
import type { ChangedFile, CommitSuggestion, TokenUsage } from '../types/common.js';
import { CommitSuggestionSchema } from '../schemas/validation.js';
import { validateDiffSize, withTimeout } from '../utils/security.js';
import { ErrorType } from '../types/error-handler.js';
import { withErrorHandling, withRetry, SecureError } from '../utils/error-handler.js';
import { sanitizeDiffContent } from '../utils/data-sanitization.js';
import { DEFAULT_LIMITS } from '../constants/security.js';
import { calculateAITimeout } from '../utils/timeout.js';
import {
  AI_DEFAULT_MODEL,
  AI_MAX_OUTPUT_TOKENS,
  AI_RETRY_ATTEMPTS,
  AI_RETRY_DELAY_MS,
  AI_TEMPERATURE,
  BINARY_DIFF_HEADER,
  getModelCosts,
} from '../constants/ai.js';
import { ERROR_MESSAGES } from '../constants/messages.js';

export interface GenerationResult {
  suggestion: CommitSuggestion;
  usage: TokenUsage;
}

export interface AIServiceOptions {
  model?: string;
  retryAttempts?: number;
  retryDelayMs?: number;
}

interface UsageCounts {
  promptTokenCount?: number;
  candidatesTokenCount?: number;
  totalTokenCount?: number;
}

const JSON_FORMAT_EXAMPLE = `{
  "title": "✨ feat: example title",
  "body": {
    "Features": {
      "emoji": "✨",
      "changes": [
        "Added new feature X",
        "Updated configuration Y"
      ]
    },
    "Fixes": {
      "emoji": "🐛",
      "changes": [
        "Fixed issue Z"
      ]
    }
  },
  "summary": "This change implements feature X with configuration updates and bug fixes."
}`;

export const DIFF_TRUNCATED_MARKER = '... [diff truncated]';

const TITLE_RULE =
  '1. Title: Maximum 50 characters, MUST start with an appropriate gitmoji (e.g. 📝, ✨, 🐛), ' +
  'followed by the conventional commit type (feat, fix, etc) and a brief description.';

export const buildCommitPrompt = (diff: string, files: readonly ChangedFile[]): string => {
  const filesSummary = files.map((file) => file.path).join(', ');

  if (diff.startsWith(BINARY_DIFF_HEADER)) {
    return [
      'Generate a structured commit message in JSON format for the following binary file changes.',
      'The commit MUST follow conventional commits format with a gitmoji prefix.',
      '',
      `Files changed: ${filesSummary}`,
      '',
      diff,
      '',
      'Requirements:',
      TITLE_RULE,
      '2. Body: Create a simple summary of the binary file changes under a single "Changes" category.',
      '3. Summary: A brief sentence describing the data updates.',
      '',
      'Return the response in the following JSON format:',
      JSON_FORMAT_EXAMPLE,
    ].join('\n');
  }

  return [
    'Generate a structured commit message in JSON format for the following git diff.',
    'The commit MUST follow conventional commits format with a gitmoji prefix.',
    '',
    `Files changed: ${filesSummary}`,
    '',
    '```',
    diff,
    '```',
    '',
    'Requirements:',
    TITLE_RULE,
    '2. Body: Organize changes into categories. Each category should have an appropriate emoji and bullet points summarizing key changes.',
    '3. Summary: A brief sentence summarizing the overall impact.',
    '',
    'Return the response in the following JSON format:',
    JSON_FORMAT_EXAMPLE,
  ].join('\n');
};

export const buildTokenUsage = (metadata: UsageCounts | undefined, model: string): TokenUsage => {
  const promptTokens = metadata?.promptTokenCount ?? 0;
  const completionTokens = metadata?.candidatesTokenCount ?? 0;
  const totalTokens = metadata?.totalTokenCount ?? promptTokens + completionTokens;
  const costs = getModelCosts(model);

  const inputCost = (promptTokens / 1_000_000) * costs.input;
  const outputCost = (completionTokens / 1_000_000) * costs.output;

  return {
    promptTokens,
    completionTokens,
    totalTokens,
    inputCost,
    outputCost,
    totalCost: inputCost + outputCost,
  };
};

export const parseSuggestion = (text: string): CommitSuggestion => {
  // Models occasionally wrap JSON in a markdown fence despite the mime type
  const jsonText = text
    .trim()
    .replace(/^```(?:json)?\s*/i, '')
    .replace(/\s*```$/, '');

  if (!jsonText) {
    throw new SecureError(
      ERROR_MESSAGES.EMPTY_AI_RESPONSE,
      ErrorType.AI_SERVICE_ERROR,
      { operation: 'parseSuggestion' },
      true
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(jsonText);
  } catch (error) {
    throw new SecureError(
      `${ERROR_MESSAGES.INVALID_AI_RESPONSE}: ${error instanceof Error ? error.message : 'malformed JSON'}`,
      ErrorType.AI_SERVICE_ERROR,
      { operation: 'parseSuggestion' },
      true
    );
  }

  const result = CommitSuggestionSchema.safeParse(raw);
  if (!result.success) {
    throw new SecureError(
      `${ERROR_MESSAGES.INVALID_AI_RESPONSE}: ${result.error.issues.map((issue) => issue.message).join(', ')}`,
      ErrorType.AI_SERVICE_ERROR,
      { operation: 'parseSuggestion' },
      true
    );
  }

  return result.data;
};

export class AIService {
  private readonly genAI: GoogleGenAI;
  private readonly model: string;
  private readonly retryAttempts: number;
  private readonly retryDelayMs: number;

  constructor(apiKey: string, options: AIServiceOptions = {}) {
    if (!apiKey) {
      throw new SecureError(
        ERROR_MESSAGES.API_KEY_NOT_FOUND,
        ErrorType.CONFIG_ERROR,
        { operation: 'AIService.constructor' },
        true
      );
    }

    this.genAI = new GoogleGenAI({ apiKey });
    this.model = options.model ?? AI_DEFAULT_MODEL;
    this.retryAttempts = options.retryAttempts ?? AI_RETRY_ATTEMPTS;
    this.retryDelayMs = options.retryDelayMs ?? AI_RETRY_DELAY_MS;
  }

  generateCommitMessage = async (
    diff: string,
    files: readonly ChangedFile[]
  ): Promise<GenerationResult> => {
    const { sanitized, warnings } = sanitizeDiffContent(diff);
    warnings.forEach((warning) => console.warn(`🔒 ${warning}`));

    const sizeCheck = validateDiffSize(sanitized);
    if (!sizeCheck.isValid) {
      console.warn(`✂️  ${sizeCheck.error}, truncating`);
    }
    const promptDiff = sizeCheck.isValid
      ? sizeCheck.value
      : `${sanitized.slice(0, DEFAULT_LIMITS.maxDiffSize)}\n${DIFF_TRUNCATED_MARKER}`;

    const prompt = buildCommitPrompt(promptDiff, files);
    if (prompt.length > DEFAULT_LIMITS.maxApiRequestSize) {
      throw new SecureError(
        `${ERROR_MESSAGES.PROMPT_SIZE_EXCEEDED} ${DEFAULT_LIMITS.maxApiRequestSize} characters`,
        ErrorType.VALIDATION_ERROR,
        { operation: 'generateCommitMessage' },
        true
      );
    }

    return withRetry(
      async () =>
        withErrorHandling(
          async () => {
            const result = await withTimeout(
              this.genAI.models.generateContent({
                model: this.model,
                contents: prompt,
                config: {
                  responseMimeType: 'application/json',
                  temperature: AI_TEMPERATURE,
                  maxOutputTokens: AI_MAX_OUTPUT_TOKENS,
                },
              }),
              calculateAITimeout({ diffSize: prompt.length, fileCount: files.length })
            );

            return {
              suggestion: parseSuggestion(result.text ?? ''),
              usage: buildTokenUsage(result.usageMetadata, this.model),
            };
          },
          { operation: 'generateCommitMessage' }
        ),
      this.retryAttempts,
      this.retryDelayMs,
      { operation: 'generateCommitMessage' }
    );
  };
}
