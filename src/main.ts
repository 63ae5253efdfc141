#!/usr/bin/env node
import 'reflect-metadata';
import { INestApplicationContext, Logger as NestLogger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';
import { AnalysisService } from './analysis/analysis.service';

async function bootstrap(): Promise<number> {
  let app: INestApplicationContext;

  try {
    // Invalid configuration or a misconfigured embedding provider fail here
    app = await NestFactory.createApplicationContext(AppModule, {
      bufferLogs: true,
      abortOnError: false,
    });
  } catch (error) {
    // Release the logs buffered during the failed start-up
    NestLogger.flush();
    new NestLogger('Bootstrap').error(
      error instanceof Error ? error.message : String(error),
      error instanceof Error ? error.stack : undefined,
    );
    return 1;
  }

  app.useLogger(app.get(Logger));
  const logger = app.get(Logger);
  const analysis = app.get(AnalysisService);

  try {
    if (process.argv.includes('--setup')) {
      const inputFile = await analysis.setupInputFile();
      logger.log(`Setup complete: ${inputFile} written. Run again without --setup to analyse.`);
      return 0;
    }

    const summary = await analysis.run();
    logger.log(
      `Output saved to ${summary.outputFile}: ` +
        `${summary.output.extracted_sections.length} sections`,
    );
    return 0;
  } catch (error) {
    logger.error(
      error instanceof Error ? error.message : String(error),
      error instanceof Error ? error.stack : undefined,
    );
    return 1;
  } finally {
    await app.close();
  }
}

void bootstrap().then((exitCode) => {
  process.exitCode = exitCode;
});
