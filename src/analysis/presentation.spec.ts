import { AnalysisResult, Verdict } from './analysis.types';
import { analyze } from './pipeline';
import {
  formatSummary,
  highlightSentences,
  lengthHistogram,
  perplexityChart,
  verdictLabel,
} from './presentation';

const resultWith = (perplexityTrend: number[]): AnalysisResult => {
  const sentences = perplexityTrend.map((_, i) => `Sentence ${i}.`);
  return {
    aiProbability: 35,
    verdict: Verdict.HUMAN,
    burstiness: 0,
    perplexityVariance: 0,
    perplexityTrend,
    sentences,
    sentenceLengths: sentences.map((s) => s.length),
    stats: { sentenceCount: sentences.length, characterCount: 0, averageSentenceLength: 11 },
  };
};

describe('highlightSentences', () => {
  it('classifies by perplexity with open thresholds', () => {
    const highlights = highlightSentences(resultWith([9.6, 20, 30, 15, 25]));

    expect(highlights.map((h) => h.kind)).toEqual(['ai', 'neutral', 'human', 'neutral', 'neutral']);
    expect(highlights[0]).toEqual({
      index: 0,
      sentence: 'Sentence 0.',
      perplexity: 9.6,
      kind: 'ai',
      tooltip: 'Low Perplexity (9.6)',
    });
    expect(highlights[1].tooltip).toBe('Neutral');
    expect(highlights[2].tooltip).toBe('High Perplexity (30.0)');
  });

  it('returns nothing for no sentences', () => {
    expect(highlightSentences(resultWith([]))).toEqual([]);
  });
});

describe('perplexityChart', () => {
  it('indexes the series and marks the AI zone', () => {
    expect(perplexityChart(resultWith([12, 30]))).toEqual({
      points: [
        { index: 0, perplexity: 12 },
        { index: 1, perplexity: 30 },
      ],
      aiZone: { from: 0, to: 15 },
    });
  });
});

describe('lengthHistogram', () => {
  it('returns no bins for no lengths', () => {
    expect(lengthHistogram([])).toEqual([]);
  });

  it('collapses identical lengths into one bin', () => {
    expect(lengthHistogram([7, 7, 7])).toEqual([{ start: 7, end: 7, count: 3 }]);
  });

  it('puts the maximum in the last bin', () => {
    expect(lengthHistogram([10, 20, 30], 2)).toEqual([
      { start: 10, end: 20, count: 1 },
      { start: 20, end: 30, count: 2 },
    ]);
  });

  it('handles more lengths than fit in a call frame', () => {
    const lengths = Array.from({ length: 200_000 }, (_, i) => i % 100);
    const histogram = lengthHistogram(lengths);

    expect(histogram[0].start).toBe(0);
    expect(histogram[9].end).toBe(99);
    expect(histogram.reduce((sum, bin) => sum + bin.count, 0)).toBe(200_000);
  });

  it('uses ten bins by default', () => {
    const histogram = lengthHistogram([0, 100]);
    expect(histogram).toHaveLength(10);
    expect(histogram[0]).toEqual({ start: 0, end: 10, count: 1 });
    expect(histogram[9]).toEqual({ start: 90, end: 100, count: 1 });
    expect(histogram.reduce((sum, bin) => sum + bin.count, 0)).toBe(2);
  });
});

describe('formatSummary', () => {
  it('renders the score card', () => {
    const result = analyze('Hello world. How are you?', { next: () => 0 });
    if (!result) throw new Error('expected a result');

    expect(formatSummary(result)).toBe(
      [
        'AI probability: 90.0%',
        'Verdict: AI Generated',
        'Burstiness: 0.00',
        'Sentences: 2',
        'Characters: 25',
      ].join('\n'),
    );
  });

  it('labels both verdicts', () => {
    expect(verdictLabel(Verdict.AI)).toBe('AI Generated');
    expect(verdictLabel(Verdict.HUMAN)).toBe('Human Written');
  });
});
