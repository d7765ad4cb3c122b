// Sentence boundary: terminal mark (latin or CJK) followed by whitespace
export const SENTENCE_BOUNDARY = /(?<=[.!?。！？])\s+/u;

export const PERPLEXITY_BASE = 10;
export const PERPLEXITY_OUTLIER_FACTOR = 2.5;
export const PERPLEXITY_REGULAR_FACTOR = 1.2;
export const SHORT_SENTENCE_CHARS = 5;
export const LONG_SENTENCE_CHARS = 80;
export const JITTER_MIN = 0.8;
export const JITTER_MAX = 1.5;

export const BASE_SCORE = 0.5;
export const LOW_BURSTINESS = 0.4;
export const HIGH_BURSTINESS = 0.6;
export const BURSTINESS_WEIGHT = 0.2;
export const SMOOTH_VARIANCE = 10;
export const SMOOTH_BONUS = 0.2;
export const ROUGH_PENALTY = 0.15;
export const SCORE_FLOOR = 0.01;
export const SCORE_CEIL = 0.99;
export const AI_THRESHOLD = 50;

export const AI_HIGHLIGHT_BELOW = 15;
export const HUMAN_HIGHLIGHT_ABOVE = 25;
export const HISTOGRAM_BINS = 10;

export const INPUT_REQUIRED = 'input required';
