// ─── Generation ─────────────────────────────────────────────

/**
 * Settings for one generation run.
 */
export interface GenerationConfig {
  count: number;
  /** Sampled characters per key when no pattern is set. */
  length: number;
  /** Template where every `X` is a random character and everything else is literal. */
  pattern?: string;
  /** Custom character source; the built-in default is used when absent. */
  alphabet?: string;
  avoidAmbiguous: boolean;
  unique: boolean;
  /** Characters per group in fixed-length mode, 0 = no grouping. */
  groupSize: number;
  separator: string;
  uppercase: boolean;
}

export interface GenerationProgress {
  generated: number;
  total: number;
  elapsedMs: number;
}

/**
 * Receives observational messages from a generation run.
 * Neither callback can influence the result.
 */
export interface GenerationSink {
  progress?(event: GenerationProgress): void;
  advisory?(message: string): void;
}

// ─── Output ─────────────────────────────────────────────────

export type OutputFormat = 'text' | 'csv' | 'json';
