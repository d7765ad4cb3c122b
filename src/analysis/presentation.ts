// Data the UI needs for the highlighter, the perplexity line chart,
// the sentence length histogram and the score card. No markup here.
import {
  AI_HIGHLIGHT_BELOW,
  HISTOGRAM_BINS,
  HUMAN_HIGHLIGHT_ABOVE,
} from './analysis.constants';
import {
  AnalysisResult,
  HistogramBin,
  PerplexityChart,
  SentenceHighlight,
  Verdict,
} from './analysis.types';

export const highlightSentences = (result: AnalysisResult): SentenceHighlight[] =>
  result.sentences.map((sentence, index): SentenceHighlight => {
    const perplexity = result.perplexityTrend[index];
    if (perplexity < AI_HIGHLIGHT_BELOW) {
      return { index, sentence, perplexity, kind: 'ai', tooltip: `Low Perplexity (${perplexity.toFixed(1)})` };
    }
    if (perplexity > HUMAN_HIGHLIGHT_ABOVE) {
      return { index, sentence, perplexity, kind: 'human', tooltip: `High Perplexity (${perplexity.toFixed(1)})` };
    }
    return { index, sentence, perplexity, kind: 'neutral', tooltip: 'Neutral' };
  });

export const perplexityChart = (result: AnalysisResult): PerplexityChart => ({
  points: result.perplexityTrend.map((perplexity, index) => ({ index, perplexity })),
  aiZone: { from: 0, to: AI_HIGHLIGHT_BELOW },
});

/**
 * Equal-width bins over [min, max]. The last bin also takes values equal to max.
 * Identical lengths collapse into one bin.
 */
export const lengthHistogram = (
  lengths: readonly number[],
  binCount = HISTOGRAM_BINS,
): HistogramBin[] => {
  if (!lengths.length) return [];

  let min = lengths[0];
  let max = lengths[0];
  for (const len of lengths) {
    if (len < min) min = len;
    if (len > max) max = len;
  }
  if (min === max) return [{ start: min, end: max, count: lengths.length }];

  const bins = Math.max(1, Math.floor(binCount));
  const width = (max - min) / bins;
  const histogram: HistogramBin[] = Array.from({ length: bins }, (_, i) => ({
    start: min + i * width,
    end: i === bins - 1 ? max : min + (i + 1) * width,
    count: 0,
  }));

  for (const len of lengths) {
    const slot = Math.min(bins - 1, Math.floor((len - min) / width));
    histogram[slot].count += 1;
  }
  return histogram;
};

export const verdictLabel = (verdict: Verdict): string =>
  verdict === Verdict.AI ? 'AI Generated' : 'Human Written';

export const formatSummary = (result: AnalysisResult): string =>
  [
    `AI probability: ${result.aiProbability.toFixed(1)}%`,
    `Verdict: ${verdictLabel(result.verdict)}`,
    `Burstiness: ${result.burstiness.toFixed(2)}`,
    `Sentences: ${result.stats.sentenceCount}`,
    `Characters: ${result.stats.characterCount}`,
  ].join('\n');
