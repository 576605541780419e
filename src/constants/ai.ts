import type { ModelCosts } from '../types/common.js';

export const AI_MODELS = [
  'gemini-1.5-flash',
  'gemini-1.5-pro',
  'gemini-2.0-flash',
  'gemini-2.0-flash-lite',
  'gemini-2.5-pro',
  'gemini-2.5-flash',
  'gemini-2.5-flash-lite',
] as const;

export type AIModel = (typeof AI_MODELS)[number];

export const AI_DEFAULT_MODEL: AIModel = 'gemini-2.0-flash-lite';
export const AI_RETRY_ATTEMPTS = 3;
export const AI_RETRY_DELAY_MS = 2000;
export const AI_TEMPERATURE = 0.7;
export const AI_MAX_OUTPUT_TOKENS = 1000;

export const TOKEN_ESTIMATION_RATIO = 4; // characters per token

// USD per million tokens
export const MODEL_COSTS: Record<AIModel, ModelCosts> = {
  'gemini-1.5-flash': { input: 0.075, output: 0.3 },
  'gemini-1.5-pro': { input: 1.25, output: 5.0 },
  'gemini-2.0-flash': { input: 0.1, output: 0.4 },
  'gemini-2.0-flash-lite': { input: 0.075, output: 0.3 },
  'gemini-2.5-pro': { input: 1.25, output: 10.0 },
  'gemini-2.5-flash': { input: 0.3, output: 2.5 },
  'gemini-2.5-flash-lite': { input: 0.1, output: 0.4 },
};

export const getModelCosts = (model: string): ModelCosts =>
  MODEL_COSTS[AI_MODELS.find((known) => known === model) ?? AI_DEFAULT_MODEL];

export const BINARY_DIFF_HEADER = 'Binary files changed:';
export const COMBINED_COMMIT_TITLE = '📦 chore: combine multiple changes';
