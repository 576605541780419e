import type { ChangedFile } from '../types/common.js';
import type { ChangeType, FileGroup } from '../types/grouping.js';

export interface CommitBatch {
  files: ChangedFile[];
  reason?: string;
  changeType?: ChangeType;
  confidence?: number;
}

export interface BatchPlanOptions {
  smartGrouping: boolean;
  maxFilesThreshold: number;
  buildGroups: (files: readonly ChangedFile[]) => FileGroup[];
}

export const chunkFiles = (files: readonly ChangedFile[], size: number): ChangedFile[][] => {
  const chunks: ChangedFile[][] = [];
  for (let start = 0; start < files.length; start += size) {
    chunks.push(files.slice(start, start + size));
  }
  return chunks;
};

/**
 * Splits the changed files into commit batches: one per smart group, or
 * consecutive chunks of `maxFilesThreshold` when grouping is off.
 */
export const planBatches = (
  files: readonly ChangedFile[],
  options: BatchPlanOptions
): CommitBatch[] => {
  if (files.length === 0) {
    return [];
  }

  if (!options.smartGrouping) {
    return chunkFiles(files, Math.max(1, options.maxFilesThreshold)).map((chunk) => ({
      files: chunk,
    }));
  }

  return options.buildGroups(files).map((group) => ({
    files: group.files,
    reason: group.reason,
    changeType: group.changeType,
    confidence: group.confidence,
  }));
};
