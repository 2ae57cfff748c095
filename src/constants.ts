/** Fixed thresholds of the observation pipeline (not read from the environment). */
export const SCORE_MIN = -10;
export const SCORE_MAX = 10;

export const ALERTS = {
  DAILY_CHANGE: 3,
  DAILY_CHANGE_WARNING: 5,
  MA_WINDOW: 3,
  DOMESTIC_FOREIGN_GAP: 5,
} as const;

export const HISTORY = {
  RETENTION_DAYS: 30,
  COMPARISON_DAYS: 7,
  HIGH_ZERO_RATIO: 80,
} as const;

/** Ratio cut-offs for the observation notes (percent). */
export const TRIGGERS = {
  ALIGNMENT_MAX_ZERO: 50,
  ALIGNMENT_MIN_DIRECTIONAL: 30,
  NOISE_MIN_ZERO: 80,
  NOISE_MIN_DAYS: 2,
  SKEW_MIN_DIRECTIONAL: 50,
  MACRO_MIN: 30,
} as const;

export const CATEGORY_FACTOR = {
  market: 1.2,
  sector: 1.0,
  theme: 0.8,
} as const;

export const ORIGIN_FACTOR = {
  domestic: 1.0,
  foreign: 1.1,
} as const;

/** Jaccard overlap above which two articles share one LLM verdict */
export const SIMILARITY_THRESHOLD = 0.6;
