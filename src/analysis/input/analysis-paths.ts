/**
 * File locations for a run, read from ConfigService
 */

import { ConfigService } from '@nestjs/config';

export interface AnalysisPaths {
  pdfFolder: string;
  inputFile: string;
  outputFile: string;
}

export function resolveAnalysisPaths(
  configService: ConfigService,
): AnalysisPaths {
  return {
    pdfFolder: configService.get<string>('PDF_FOLDER', './pdfs'),
    inputFile: configService.get<string>('INPUT_FILE', 'input.json'),
    outputFile: configService.get<string>('OUTPUT_FILE', 'output.json'),
  };
}
