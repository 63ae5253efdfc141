import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { LoggerModule } from 'nestjs-pino';
import { AnalyzerConfigModule } from './analysis/config';
import { AnalysisModule } from './analysis/analysis.module';
import {
  createPinoConfig,
  loadLoggingSettings,
} from './shared/logging/pino.config';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
    }),
    LoggerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService) =>
        createPinoConfig(loadLoggingSettings(config)),
    }),
    AnalyzerConfigModule,
    AnalysisModule,
  ],
})
export class AppModule {}
