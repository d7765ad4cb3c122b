import { Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AnalysisController } from './analysis.controller';
import { AnalysisService } from './analysis.service';
import { mathRandom, RANDOM_SOURCE, RandomSource, seededRandom } from './random';

export const randomSourceFactory = (config: ConfigService): RandomSource => {
  const raw = config.get<string>('ANALYSIS_SEED');
  if (raw === undefined || raw.trim() === '') return mathRandom;

  const seed = Number(raw);
  if (!Number.isInteger(seed)) {
    Logger.warn(`ANALYSIS_SEED "${raw}" is not an integer, using Math.random`, 'AnalysisModule');
    return mathRandom;
  }
  return seededRandom(seed);
};

@Module({
  providers: [
    AnalysisService,
    {
      provide: RANDOM_SOURCE,
      useFactory: randomSourceFactory,
      inject: [ConfigService],
    },
  ],
  controllers: [AnalysisController],
})
export class AnalysisModule {}
