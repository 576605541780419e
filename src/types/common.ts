export interface CommitConfig {
  apiKey?: string;
  model?: string;
  tokenLimit?: number;
  maxFilesThreshold?: number;
  costWarningThreshold?: number;
  smartGrouping?: boolean;
  maxGroupSize?: number;
  smallGroupThreshold?: number;
  ignoredPatterns?: string[];
}

export interface ChangedFile {
  path: string;
  isBinary?: boolean;
  size?: number;
  hash?: string;
}

export interface CommitCategory {
  emoji: string;
  changes: string[];
}

export interface CommitSuggestion {
  title: string;
  body: Record<string, CommitCategory>;
  summary: string;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
  inputCost: number;
  outputCost: number;
  totalCost: number;
}

export interface CommitOptions {
  yes?: boolean; // Automate the whole process without prompts
  combine?: boolean;
  smartGrouping?: boolean;
  dryRun?: boolean;
  model?: string;
}

export interface ModelCosts {
  input: number; // per million tokens
  output: number; // per million tokens
}
