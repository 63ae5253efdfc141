/**
 * Analysis Workflow Service
 *
 * Creates and runs the LangGraph.js StateGraph for the four-stage
 * analysis pipeline: Extract → Segment → Rank → Assemble
 *
 * Non-fatal issues accumulate as warnings in the state. Fatal errors
 * (EmbeddingProviderError and anything unexpected) abort the run.
 */

import { Injectable, Logger } from '@nestjs/common';
import { StateGraph, START, END } from '@langchain/langgraph';
import {
  AnalysisState,
  AnalysisStateType,
  createInitialState,
} from './analysis-state';
import { createExtractNode } from './nodes/extract.node';
import { createSegmentNode } from './nodes/segment.node';
import { createRankNode } from './nodes/rank.node';
import { createAssembleNode } from './nodes/assemble.node';
import { ExtractStage } from '../stages/extract/extract.stage';
import { SegmentStage } from '../stages/segment/segment.stage';
import { RankStage } from '../stages/rank/rank.stage';
import { AssembleStage } from '../stages/assemble/assemble.stage';
import { AnalysisOutput } from '../stages/assemble/types';
import { RankedResult } from '../stages/rank/types';
import { AnalysisJob, AnalysisWarning } from '../common/types';

export interface WorkflowResult {
  output: AnalysisOutput;
  rankedResult: RankedResult;
  warnings: AnalysisWarning[];
  metrics: {
    duration: number;
    stagesCompleted: string[];
    totalPages: number;
    sectionCount: number;
    discardedSegments: number;
  };
}

/**
 * Type guard to validate workflow result matches expected state type
 */
function isAnalysisStateType(value: unknown): value is AnalysisStateType {
  return (
    typeof value === 'object' &&
    value !== null &&
    'job' in value &&
    'sections' in value &&
    Array.isArray(value.sections) &&
    'warnings' in value &&
    Array.isArray(value.warnings) &&
    'metrics' in value &&
    typeof value.metrics === 'object' &&
    value.metrics !== null
  );
}

@Injectable()
export class AnalysisWorkflowService {
  private readonly logger = new Logger(AnalysisWorkflowService.name);
  private workflow: ReturnType<typeof StateGraph.prototype.compile> | null =
    null;

  constructor(
    private readonly extractStage: ExtractStage,
    private readonly segmentStage: SegmentStage,
    private readonly rankStage: RankStage,
    private readonly assembleStage: AssembleStage,
  ) {
    this.initializeWorkflow();
  }

  private initializeWorkflow(): void {
    this.logger.log('Initializing LangGraph analysis workflow...');

    const graph = new StateGraph(AnalysisState)
      .addNode('extract', createExtractNode(this.extractStage))
      .addNode('segment', createSegmentNode(this.segmentStage))
      .addNode('rank', createRankNode(this.rankStage))
      .addNode('assemble', createAssembleNode(this.assembleStage))
      .addEdge(START, 'extract')
      .addEdge('extract', 'segment')
      .addEdge('segment', 'rank')
      .addEdge('rank', 'assemble')
      .addEdge('assemble', END);

    // No checkpointer: one stateless run per invocation
    this.workflow = graph.compile();

    this.logger.log('LangGraph analysis workflow initialized');
  }

  /**
   * Run the analysis workflow
   *
   * @throws EmbeddingProviderError if the embedding provider fails on the query
   */
  async execute(
    job: AnalysisJob,
    folderPath: string,
    processedAt?: Date,
  ): Promise<WorkflowResult> {
    const startTime = Date.now();

    this.logger.log(
      `Starting analysis workflow: ${job.documents.length} documents, ` +
        `role "${job.query.role}"`,
    );

    if (!this.workflow) {
      throw new Error('Workflow not initialized');
    }

    try {
      const result: unknown = await this.workflow.invoke(
        createInitialState({ job, folderPath, processedAt }),
      );

      if (!isAnalysisStateType(result)) {
        throw new Error('Workflow returned invalid state type');
      }

      const { output, rankedResult } = result;
      if (!output || !rankedResult) {
        throw new Error(`Workflow stopped at stage ${result.currentStage}`);
      }

      const duration = Date.now() - startTime;

      if (result.warnings.length > 0) {
        this.logger.warn(
          `Workflow completed with ${result.warnings.length} warnings: ` +
            result.warnings.map((w) => w.type).join(', '),
        );
      }

      this.logger.log(
        `Workflow completed (${duration}ms, stages: ` +
          `${result.metrics.stagesCompleted.join(' → ')})`,
      );

      return {
        output,
        rankedResult,
        warnings: result.warnings,
        metrics: {
          duration,
          stagesCompleted: result.metrics.stagesCompleted,
          totalPages: result.metrics.totalPages,
          sectionCount: result.sections.length,
          discardedSegments: result.metrics.discardedSegments,
        },
      };
    } catch (error) {
      this.logger.error(
        `Workflow execution failed (${Date.now() - startTime}ms)`,
        error instanceof Error ? error.stack : String(error),
      );
      throw error;
    }
  }

  isInitialized(): boolean {
    return this.workflow !== null;
  }
}
