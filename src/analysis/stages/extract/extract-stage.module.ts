/**
 * Extract Stage Module
 */

import { Module } from '@nestjs/common';
import { ExtractStage } from './extract.stage';
import { PdfPageSource } from './sources/pdf-page.source';
import { PAGE_TEXT_SOURCE } from './types';

@Module({
  providers: [
    ExtractStage,
    PdfPageSource,
    { provide: PAGE_TEXT_SOURCE, useExisting: PdfPageSource },
  ],
  exports: [ExtractStage],
})
export class ExtractStageModule {}
