/**
 * Segment Stage
 *
 * Second stage of the analysis pipeline:
 * Extract → Segment → Rank → Assemble
 *
 * Responsibilities:
 * - Classify page lines as headings through the ordered heading rules
 * - Partition each page into titled segments
 * - Split oversized segments at paragraph breaks
 * - Discard segments shorter than minSectionLength
 * - Emit frozen Sections in discovery order (document, page, position)
 *
 * Pages are segmented independently; a segment never spans two pages.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ANALYZER_CONFIG, AnalyzerConfig } from '../../config';
import { DocumentPages } from '../extract/types';
import {
  AnalysisWarning,
  AnalysisWarningType,
} from '../../common/types';
import { Section, SegmentInput, SegmentOutput } from './types';
import {
  PARAGRAPH_SEPARATOR,
  ParagraphSplitter,
  SegmentBuilder,
  TitleSynthesizer,
} from './builders';

interface DocumentSegmentation {
  sections: Section[];
  discarded: number;
}

@Injectable()
export class SegmentStage {
  private readonly logger = new Logger(SegmentStage.name);

  constructor(
    @Inject(ANALYZER_CONFIG) private readonly config: AnalyzerConfig,
    private readonly segmentBuilder: SegmentBuilder,
    private readonly paragraphSplitter: ParagraphSplitter,
    private readonly titleSynthesizer: TitleSynthesizer,
  ) {}

  execute(input: SegmentInput): SegmentOutput {
    const startTime = Date.now();

    this.logger.log(
      `=== Segment Stage Start === ${input.documents.length} documents ` +
        `(minSectionLength: ${this.config.minSectionLength}, ` +
        `sectionSizeBudget: ${this.config.sectionSizeBudget})`,
    );

    const sections: Section[] = [];
    const sectionsPerDocument: Record<string, number> = {};
    const warnings: AnalysisWarning[] = [];
    let discardedSegments = 0;

    for (const document of input.documents) {
      const result = this.segmentDocument(document);

      sections.push(...result.sections);
      sectionsPerDocument[document.documentId] = result.sections.length;
      discardedSegments += result.discarded;

      const hasText = document.pages.some((p) => p.text.trim().length > 0);
      if (hasText && result.sections.length === 0) {
        this.logger.warn(
          `No sections survived for ${document.documentId} ` +
            `(${result.discarded} segments below ${this.config.minSectionLength} chars)`,
        );
        warnings.push({
          type: AnalysisWarningType.SEGMENTATION_EMPTY,
          documentId: document.documentId,
          message: `All ${result.discarded} segments were shorter than ${this.config.minSectionLength} characters`,
        });
      }
    }

    if (sections.length === 0) {
      this.logger.warn('Candidate pool is empty after segmentation');
      warnings.push({
        type: AnalysisWarningType.SEGMENTATION_EMPTY,
        message: 'No sections survived segmentation in any document',
      });
    }

    this.logger.log(
      `=== Segment Stage Complete === Duration: ${Date.now() - startTime}ms, ` +
        `Sections: ${sections.length}, Discarded: ${discardedSegments}`,
    );

    return { sections, sectionsPerDocument, discardedSegments, warnings };
  }

  /**
   * Segment one document
   *
   * @returns Sections in page order, plus the number of discarded segments
   */
  segmentDocument(document: DocumentPages): DocumentSegmentation {
    const sections: Section[] = [];
    let discarded = 0;

    for (const page of document.pages) {
      for (const draft of this.segmentBuilder.build(page)) {
        const chunks = this.paragraphSplitter.split(
          draft.paragraphs,
          this.config.sectionSizeBudget,
        );

        for (const chunk of chunks) {
          const body = chunk.join(PARAGRAPH_SEPARATOR);

          if (body.length === 0 || body.length < this.config.minSectionLength) {
            discarded++;
            continue;
          }

          const title =
            draft.title ??
            this.titleSynthesizer.synthesize(
              body,
              this.config.maxHeadingLength,
            );

          sections.push(
            Object.freeze({
              documentId: document.documentId,
              title,
              body,
              pageNumber: draft.pageNumber,
              charLength: body.length,
              titleSource: draft.title === null ? 'synthesized' : draft.titleSource,
              position: sections.length,
            }),
          );
        }
      }
    }

    this.logger.log(
      `Segmented ${document.documentId}: ${document.pages.length} pages → ` +
        `${sections.length} sections (${discarded} discarded)`,
    );

    return { sections, discarded };
  }
}
