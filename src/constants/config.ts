import type { CommitConfig } from '../types/common.js';
import { AI_DEFAULT_MODEL } from './ai.js';

export const CONFIG_DIR = '.commitweave';
export const CONFIG_FILE = 'config.json';
export const CONFIG_FILE_MODE = 0o600;
export const CONFIG_DIR_MODE = 0o700;

export const DEFAULT_IGNORED_PATTERNS = [
  'bun.lockb',
  'package-lock.json',
  'yarn.lock',
  'pnpm-lock.yaml',
  '.env',
  '.env.*',
  '*.lock',
  '*.log',
  '__pycache__/*',
  '*.pyc',
  '.DS_Store',
  'dist/*',
  'build/*',
  'node_modules/*',
  '*.min.js',
  '*.min.css',
];

export const DEFAULT_CONFIG: Required<Omit<CommitConfig, 'apiKey'>> = {
  model: AI_DEFAULT_MODEL,
  tokenLimit: 120_000,
  maxFilesThreshold: 5,
  costWarningThreshold: 0.05,
  smartGrouping: true,
  maxGroupSize: 5,
  smallGroupThreshold: 3,
  ignoredPatterns: DEFAULT_IGNORED_PATTERNS,
};

export const ENV_OVERRIDES = {
  GEMINI_API_KEY: 'apiKey',
  COMMITWEAVE_MODEL: 'model',
  COMMITWEAVE_TOKEN_LIMIT: 'tokenLimit',
  COMMITWEAVE_MAX_FILES: 'maxFilesThreshold',
  COMMITWEAVE_COST_WARNING: 'costWarningThreshold',
} as const satisfies Record<string, keyof CommitConfig>;

export const CONFIG_DIR_ENV = 'COMMITWEAVE_CONFIG_DIR';
