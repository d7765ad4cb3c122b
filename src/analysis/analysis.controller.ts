import { Body, Controller, Post } from '@nestjs/common';
import { AnalyzeTextBody, analyzeTextSchema } from './analysis.dto';
import { AnalysisService } from './analysis.service';
import { AnalysisReport, AnalysisResult } from './analysis.types';
import { ZodValidationPipe } from './zod-validation.pipe';

export const analyzeTextPipe = new ZodValidationPipe(analyzeTextSchema);

@Controller('analysis')
export class AnalysisController {
  constructor(private readonly analysisService: AnalysisService) {}

  @Post()
  analyze(@Body(analyzeTextPipe) { text }: AnalyzeTextBody): AnalysisResult {
    return this.analysisService.analyze(text);
  }

  @Post('report')
  report(@Body(analyzeTextPipe) { text }: AnalyzeTextBody): AnalysisReport {
    return this.analysisService.report(text);
  }
}
