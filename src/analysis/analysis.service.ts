import { Inject, Injectable, Logger } from '@nestjs/common';
import { AnalysisReport, AnalysisResult } from './analysis.types';
import { runPipeline } from './pipeline';
import {
  formatSummary,
  highlightSentences,
  lengthHistogram,
  perplexityChart,
} from './presentation';
import { RANDOM_SOURCE, RandomSource } from './random';

@Injectable()
export class AnalysisService {
  private readonly logger = new Logger(AnalysisService.name);

  constructor(@Inject(RANDOM_SOURCE) private readonly random: RandomSource) {}

  // Callers pass text that already went through analyzeTextSchema
  analyze(text: string): AnalysisResult {
    const result = runPipeline(text, this.random);
    this.logger.debug(
      `analysed ${result.stats.sentenceCount} sentences, probability ${result.aiProbability.toFixed(1)}`,
    );
    return result;
  }

  report(text: string): AnalysisReport {
    const result = this.analyze(text);
    return {
      result,
      highlights: highlightSentences(result),
      chart: perplexityChart(result),
      histogram: lengthHistogram(result.sentenceLengths),
      summary: formatSummary(result),
    };
  }
}
