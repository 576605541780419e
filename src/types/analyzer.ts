export enum WarningLevel {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
}

export interface CommitWarning {
  level: WarningLevel;
  message: string;
}

export interface CommitAnalysis {
  estimatedTokens: number;
  estimatedCost: number;
  numFiles: number;
  warnings: CommitWarning[];
  isComplex: boolean;
}

export interface AnalyzerSettings {
  model: string;
  tokenLimit: number;
  maxFilesThreshold: number;
  costWarningThreshold: number;
}
