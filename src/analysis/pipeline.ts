import { AnalysisResult } from './analysis.types';
import { extractFeatures } from './features';
import { RandomSource } from './random';
import { score } from './scorer';
import { charCount, segment } from './segmenter';

// segment -> extract -> score
export const runPipeline = (text: string, random: RandomSource): AnalysisResult => {
  const sentences = segment(text);
  const features = extractFeatures(sentences, random);
  const { probability, verdict } = score(features.burstiness, features.perplexityVariance);

  return Object.freeze({
    aiProbability: probability,
    verdict,
    burstiness: features.burstiness,
    perplexityVariance: features.perplexityVariance,
    perplexityTrend: Object.freeze(features.perplexitySeries),
    sentences: Object.freeze(sentences),
    sentenceLengths: Object.freeze(features.sentenceLengths),
    stats: Object.freeze({
      sentenceCount: sentences.length,
      characterCount: charCount(text),
      averageSentenceLength: features.meanLength,
    }),
  });
};

// Empty input is not analysed at all
export const analyze = (text: string, random: RandomSource): AnalysisResult | null =>
  text ? runPipeline(text, random) : null;
