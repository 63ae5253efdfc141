/**
 * Extract Stage
 *
 * First stage of the analysis pipeline:
 * Extract → Segment → Rank → Assemble
 *
 * Pulls page texts for every input document. A document that cannot be
 * read, or that has no text at all, contributes zero pages and a warning;
 * the run continues with the remaining documents.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { join } from 'path';
import {
  DocumentPages,
  ExtractInput,
  ExtractOutput,
  PAGE_TEXT_SOURCE,
  PageTextSource,
} from './types';
import { ExtractionError } from './errors/extract-errors';
import {
  AnalysisWarning,
  AnalysisWarningType,
} from '../../common/types';

export interface ExtractStageResult extends ExtractOutput {
  warnings: AnalysisWarning[];
}

@Injectable()
export class ExtractStage {
  private readonly logger = new Logger(ExtractStage.name);

  constructor(
    @Inject(PAGE_TEXT_SOURCE)
    private readonly pageTextSource: PageTextSource,
  ) {}

  async execute(input: ExtractInput): Promise<ExtractStageResult> {
    const startTime = Date.now();

    this.logger.log(
      `=== Extract Stage Start === ${input.documents.length} documents in ${input.folderPath}`,
    );

    const documents: DocumentPages[] = [];
    const emptyDocuments: string[] = [];
    const warnings: AnalysisWarning[] = [];

    for (const ref of input.documents) {
      const filePath = join(input.folderPath, ref.filename);
      let pages: DocumentPages['pages'] = [];

      try {
        pages = await this.pageTextSource.extract(filePath, ref.filename);
      } catch (error) {
        if (!(error instanceof ExtractionError)) {
          throw error;
        }

        this.logger.warn(
          `Skipping ${ref.filename}: ${error.message} (${error.type})`,
        );
        warnings.push({
          type: AnalysisWarningType.EXTRACTION_EMPTY,
          documentId: ref.filename,
          message: error.message,
        });
        emptyDocuments.push(ref.filename);
        continue;
      }

      if (pages.every((page) => page.text.trim().length === 0)) {
        this.logger.warn(`No text extracted from ${ref.filename}`);
        warnings.push({
          type: AnalysisWarningType.EXTRACTION_EMPTY,
          documentId: ref.filename,
          message: `No text extracted from ${pages.length} page(s)`,
        });
        emptyDocuments.push(ref.filename);
      }

      documents.push({
        documentId: ref.filename,
        filename: ref.filename,
        title: ref.title,
        pages,
      });
    }

    const totalPages = documents.reduce(
      (sum, doc) => sum + doc.pages.length,
      0,
    );

    this.logger.log(
      `=== Extract Stage Complete === Duration: ${Date.now() - startTime}ms, ` +
        `Documents: ${documents.length}, Pages: ${totalPages}, Empty: ${emptyDocuments.length}`,
    );

    return { documents, totalPages, emptyDocuments, warnings };
  }
}
