/**
 * Assemble Stage
 *
 * Last stage of the analysis pipeline:
 * Extract → Segment → Rank → Assemble
 *
 * Turns the ranked result into the output artifact. Ranks are reassigned
 * 1..N in result order. Writing the file is left to OutputWriterService so
 * nothing reaches disk unless the whole workflow succeeded.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ANALYZER_CONFIG, AnalyzerConfig } from '../../config';
import { AnalysisOutput, AssembleInput, OutputMetadata } from './types';

@Injectable()
export class AssembleStage {
  private readonly logger = new Logger(AssembleStage.name);

  constructor(
    @Inject(ANALYZER_CONFIG) private readonly config: AnalyzerConfig,
  ) {}

  execute(input: AssembleInput): AnalysisOutput {
    const { job, result } = input;
    const description = job.query.description?.trim();

    const metadata: OutputMetadata = {
      input_documents: job.documents.map((doc) => doc.filename),
      persona: job.query.role,
      job_to_be_done: job.query.task,
      ...(description ? { description } : {}),
      processing_timestamp: input.processedAt.toISOString(),
      similarity_model: this.config.similarityModel,
    };

    const output: AnalysisOutput = {
      metadata,
      extracted_sections: result.sections.map((ranked, i) => ({
        document: ranked.section.documentId,
        section_title: ranked.section.title,
        importance_rank: i + 1,
        page_number: ranked.section.pageNumber,
        similarity: ranked.similarity,
      })),
      subsection_analysis: result.sections.map((ranked) => ({
        document: ranked.section.documentId,
        refined_text: ranked.refinedText,
        page_number: ranked.section.pageNumber,
      })),
    };

    this.logger.log(
      `=== Assemble Stage Complete === ${output.extracted_sections.length} sections ` +
        `from ${metadata.input_documents.length} documents`,
    );

    return output;
  }
}
