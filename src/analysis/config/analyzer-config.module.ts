/**
 * Analyzer Config Module
 * Provides the validated, frozen AnalyzerConfig to every stage.
 * Expects ConfigModule.forRoot({ isGlobal: true }) in the root module.
 */

import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ANALYZER_CONFIG } from './analyzer-config';
import { loadAnalyzerConfig } from './analyzer-config.loader';

@Global()
@Module({
  providers: [
    {
      provide: ANALYZER_CONFIG,
      useFactory: (configService: ConfigService) =>
        loadAnalyzerConfig(configService),
      inject: [ConfigService],
    },
  ],
  exports: [ANALYZER_CONFIG],
})
export class AnalyzerConfigModule {}
