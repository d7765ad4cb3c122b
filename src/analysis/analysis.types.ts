export enum Verdict {
  AI = 'AI',
  HUMAN = 'HUMAN',
}

export interface Features {
  sentenceLengths: number[];
  meanLength: number;
  burstiness: number;
  perplexitySeries: number[];
  perplexityVariance: number;
}

export interface ScoreResult {
  probability: number;
  verdict: Verdict;
}

export interface AnalysisStats {
  sentenceCount: number;
  characterCount: number;
  averageSentenceLength: number;
}

export interface AnalysisResult {
  readonly aiProbability: number;
  readonly verdict: Verdict;
  readonly burstiness: number;
  readonly perplexityVariance: number;
  readonly perplexityTrend: readonly number[];
  readonly sentences: readonly string[];
  readonly sentenceLengths: readonly number[];
  readonly stats: Readonly<AnalysisStats>;
}

export type HighlightKind = 'ai' | 'human' | 'neutral';

export interface SentenceHighlight {
  index: number;
  sentence: string;
  perplexity: number;
  kind: HighlightKind;
  tooltip: string;
}

export interface ChartPoint {
  index: number;
  perplexity: number;
}

export interface PerplexityChart {
  points: ChartPoint[];
  aiZone: { from: number; to: number };
}

export interface HistogramBin {
  start: number;
  end: number;
  count: number;
}

export interface AnalysisReport {
  result: AnalysisResult;
  highlights: SentenceHighlight[];
  chart: PerplexityChart;
  histogram: HistogramBin[];
  summary: string;
}
