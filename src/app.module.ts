import { Module } from '@nestjs/common';
import { AppController } from './app.controller';
import { AnalysisModule } from './analysis/analysis.module';
import { ConfigModule } from '@nestjs/config';

@Module({
  imports: [ConfigModule.forRoot({
    isGlobal: true,
    envFilePath: '.env',
  })
    ,AnalysisModule],
  controllers: [AppController],
})
export class AppModule {}
