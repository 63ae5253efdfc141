/**
 * Analysis Service
 *
 * One run: resolve the job, run the workflow, write the artifact.
 * The output file is written only after the whole workflow succeeded.
 */

import { Injectable, Logger } from '@nestjs/common';
import {
  AnalysisWorkflowService,
  WorkflowResult,
} from './workflow/analysis-workflow.service';
import { OutputWriterService } from './stages/assemble/services/output-writer.service';
import { InputLoaderService } from './input/services/input-loader.service';
import { DocumentDiscoveryService } from './input/services/document-discovery.service';
import {
  AskFn,
  InteractiveSetupService,
} from './input/services/interactive-setup.service';

export interface AnalysisRunSummary extends WorkflowResult {
  outputFile: string;
}

@Injectable()
export class AnalysisService {
  private readonly logger = new Logger(AnalysisService.name);

  constructor(
    private readonly inputLoader: InputLoaderService,
    private readonly discovery: DocumentDiscoveryService,
    private readonly setup: InteractiveSetupService,
    private readonly workflow: AnalysisWorkflowService,
    private readonly outputWriter: OutputWriterService,
  ) {}

  async run(ask?: AskFn): Promise<AnalysisRunSummary> {
    const { job, paths } = await this.inputLoader.load(ask);

    this.logger.log(
      `Role: ${job.query.role} | Task: ${job.query.task} | ` +
        `Documents: ${job.documents.map((d) => d.filename).join(', ')}`,
    );

    const result = await this.workflow.execute(job, paths.pdfFolder);
    await this.outputWriter.write(paths.outputFile, result.output);

    this.logSummary(result);

    return { ...result, outputFile: paths.outputFile };
  }

  /**
   * Interactive --setup: prompt for the query and write the input file
   *
   * @returns path of the written input file
   */
  async setupInputFile(ask?: AskFn): Promise<string> {
    const { pdfFolder, inputFile } = this.inputLoader.paths;

    const documents = await this.discovery.discover(pdfFolder);
    const query = await this.setup.promptQuery(ask);
    await this.setup.writeInputFile(inputFile, documents, query);

    return inputFile;
  }

  private logSummary(result: WorkflowResult): void {
    const { rankedResult, metrics } = result;

    this.logger.log(
      `Pages: ${metrics.totalPages}, sections: ${metrics.sectionCount} ` +
        `(${metrics.discardedSegments} segments discarded), ` +
        `embedded: ${rankedResult.embeddedCount}/${rankedResult.candidateCount}, ` +
        `ranked: ${rankedResult.sections.length}`,
    );

    for (const ranked of rankedResult.sections) {
      this.logger.log(
        `#${ranked.rank} ${ranked.section.documentId} p.${ranked.section.pageNumber} ` +
          `"${ranked.section.title}" (similarity ${ranked.similarity.toFixed(4)})`,
      );
    }

    for (const warning of result.warnings) {
      this.logger.warn(
        `${warning.type}${warning.documentId ? ` [${warning.documentId}]` : ''}: ${warning.message}`,
      );
    }
  }
}
