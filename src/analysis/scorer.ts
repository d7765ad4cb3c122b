// Stage 3: burstiness + perplexity variance -> probability and verdict
import {
  AI_THRESHOLD,
  BASE_SCORE,
  BURSTINESS_WEIGHT,
  HIGH_BURSTINESS,
  LOW_BURSTINESS,
  ROUGH_PENALTY,
  SCORE_CEIL,
  SCORE_FLOOR,
  SMOOTH_BONUS,
  SMOOTH_VARIANCE,
} from './analysis.constants';
import { ScoreResult, Verdict } from './analysis.types';

// 50 itself is human
export const verdictFor = (probability: number): Verdict =>
  probability > AI_THRESHOLD ? Verdict.AI : Verdict.HUMAN;

export const score = (burstiness: number, perplexityVariance: number): ScoreResult => {
  let aiScore = BASE_SCORE;

  // [0.4, 0.6] is neutral
  if (burstiness < LOW_BURSTINESS) {
    aiScore += BURSTINESS_WEIGHT;
  } else if (burstiness > HIGH_BURSTINESS) {
    aiScore -= BURSTINESS_WEIGHT;
  }

  if (perplexityVariance < SMOOTH_VARIANCE) {
    aiScore += SMOOTH_BONUS;
  } else {
    aiScore -= ROUGH_PENALTY;
  }

  aiScore = Math.max(SCORE_FLOOR, Math.min(SCORE_CEIL, aiScore));
  const probability = aiScore * 100;

  return { probability, verdict: verdictFor(probability) };
};
