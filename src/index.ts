export { SmartGrouper, describeGroup } from './core/grouping/smart-grouper.js';
export { classifyChange, isTestFile } from './core/grouping/classifier.js';
export { detectRelationships } from './core/grouping/relationships.js';
export { DependencyExtractor } from './core/grouping/dependencies.js';
export { LocalFileSource } from './core/grouping/file-source.js';
export { analyzeDiffComplexity, estimateTokensAndCost, formatCostForHumans, getCostContext } from './core/analyzer.js';
export { planBatches, type CommitBatch } from './core/batch.js';
export { CommitWeave, type CommitWeaveDependencies, type RunSummary } from './core/commitweave.js';
export { GitService, formatFileSize } from './services/git.js';
export { AIService, type GenerationResult } from './services/ai.js';
export { ConfigManager } from './config.js';
export { combineSuggestions, formatCommitMessage } from './utils/commit-message.js';
export { SecureError } from './utils/error-handler.js';

export { ChangeType } from './types/grouping.js';
export type * from './types/grouping.js';
export type * from './types/common.js';
export { WarningLevel } from './types/analyzer.js';
export type * from './types/analyzer.js';
