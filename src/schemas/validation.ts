import { z } from 'zod';
import { match } from 'ts-pattern';
import type { CommitConfig } from '../types/common.js';
import { AI_MODELS } from '../constants/ai.js';

// Base validation schemas
export const ApiKeySchema = z
  .string()
  .min(10, 'API key must be at least 10 characters long')
  .max(200, 'API key must be 200 characters or less')
  .regex(/^[A-Za-z0-9_-]+$/, 'API key contains invalid characters')
  .transform((val) => val.trim());

export const ModelSchema = z.enum(AI_MODELS);

const IgnoredPatternsSchema = z.array(z.string().min(1, 'Ignored pattern cannot be empty'));

// Configuration schema
export const CommitConfigSchema = z.object({
  apiKey: ApiKeySchema.optional(),
  model: ModelSchema.optional(),
  tokenLimit: z.number().int().positive('Token limit must be positive').optional(),
  maxFilesThreshold: z.number().int().min(1, 'Max files threshold must be at least 1').optional(),
  costWarningThreshold: z.number().nonnegative('Cost threshold cannot be negative').optional(),
  smartGrouping: z.boolean().optional(),
  maxGroupSize: z.number().int().min(1, 'Max group size must be at least 1').optional(),
  smallGroupThreshold: z.number().int().min(0, 'Small group threshold cannot be negative').optional(),
  ignoredPatterns: IgnoredPatternsSchema.optional(),
});

export const GroupingOptionsSchema = z.object({
  maxGroupSize: z.number().int().min(1, 'Max group size must be at least 1'),
  smallGroupThreshold: z.number().int().min(0, 'Small group threshold cannot be negative'),
});

// AI response schema; categories without an emoji are accepted
export const CommitSuggestionSchema = z.object({
  title: z.string().trim().min(1, 'Commit title is required'),
  body: z
    .record(
      z.object({
        emoji: z.string().default(''),
        changes: z.array(z.string()).default([]),
      })
    )
    .default({}),
  summary: z.string().default(''),
});

// Commit message validation schema
export const CommitMessageSchema = z
  .string()
  .min(1, 'Commit message must be a non-empty string')
  .refine((message) => message.trim().length > 0, 'Commit message cannot be empty')
  .refine((message) => {
    const suspiciousPatterns = [/<script/i, /javascript:/i, /vbscript:/i, /<iframe/i];
    return !suspiciousPatterns.some((pattern) => pattern.test(message));
  }, 'Commit message contains potentially malicious content')
  .transform((val) => val.trim());

export type ValidatedCommitConfig = z.infer<typeof CommitConfigSchema>;

/** Parses a raw CLI or environment string into the value type a config key expects. */
export const coerceConfigValue = (key: keyof CommitConfig, raw: string): unknown =>
  match(key)
    .with(
      'tokenLimit',
      'maxFilesThreshold',
      'costWarningThreshold',
      'maxGroupSize',
      'smallGroupThreshold',
      () => (raw.trim() === '' ? Number.NaN : Number(raw))
    )
    .with('smartGrouping', () =>
      match(raw.trim().toLowerCase())
        .with('true', '1', 'yes', 'on', () => true)
        .with('false', '0', 'no', 'off', () => false)
        .otherwise(() => raw)
    )
    .with('ignoredPatterns', () =>
      raw
        .split(',')
        .map((pattern) => pattern.trim())
        .filter((pattern) => pattern.length > 0)
    )
    .with('apiKey', 'model', () => raw.trim())
    .exhaustive();

export const CONFIG_KEYS = CommitConfigSchema.keyof().options;

export const isConfigKey = (key: string): key is keyof CommitConfig =>
  CONFIG_KEYS.some((configKey) => configKey === key);
