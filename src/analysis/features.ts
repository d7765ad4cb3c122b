// Stage 2: length statistics and the synthetic perplexity series
import {
  JITTER_MAX,
  JITTER_MIN,
  LONG_SENTENCE_CHARS,
  PERPLEXITY_BASE,
  PERPLEXITY_OUTLIER_FACTOR,
  PERPLEXITY_REGULAR_FACTOR,
  SHORT_SENTENCE_CHARS,
} from './analysis.constants';
import { Features } from './analysis.types';
import { RandomSource, uniform } from './random';
import { charCount } from './segmenter';

export const mean = (nums: readonly number[]): number =>
  nums.length ? nums.reduce((a, b) => a + b, 0) / nums.length : 0;

// Population variance (divides by n)
export const variance = (nums: readonly number[]): number => {
  if (!nums.length) return 0;
  const m = mean(nums);
  return nums.reduce((a, b) => a + (b - m) ** 2, 0) / nums.length;
};

export const burstiness = (lengths: readonly number[]): number => {
  const m = mean(lengths);
  if (m === 0) return 0;
  return Math.sqrt(variance(lengths)) / m;
};

/**
 * Placeholder for a language-model perplexity. Too short or too long sentences
 * get the high factor, everything else the regular one, then a jitter draw.
 */
export const syntheticPerplexity = (length: number, random: RandomSource): number => {
  const factor =
    length < SHORT_SENTENCE_CHARS || length > LONG_SENTENCE_CHARS
      ? PERPLEXITY_OUTLIER_FACTOR
      : PERPLEXITY_REGULAR_FACTOR;
  return PERPLEXITY_BASE * factor * uniform(random, JITTER_MIN, JITTER_MAX);
};

export const extractFeatures = (
  sentences: readonly string[],
  random: RandomSource,
): Features => {
  const sentenceLengths = sentences.map(charCount);
  const perplexitySeries = sentenceLengths.map((len) => syntheticPerplexity(len, random));

  return {
    sentenceLengths,
    meanLength: mean(sentenceLengths),
    burstiness: burstiness(sentenceLengths),
    perplexitySeries,
    perplexityVariance: variance(perplexitySeries),
  };
};
