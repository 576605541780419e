export type SizeCheck =
  | { isValid: true; value: string }
  | { isValid: false; error: string };

export interface ResourceLimits {
  /** Characters of diff sent to the model per request */
  maxDiffSize: number;
  /** Characters in one complete prompt */
  maxApiRequestSize: number;
  timeoutMs: number;
}
