/**
 * Analysis Workflow State Definition
 */

import { Annotation } from '@langchain/langgraph';
import type { AnalysisJob, AnalysisWarning } from '../common/types';
import type { DocumentPages } from '../stages/extract/types';
import type { Section } from '../stages/segment/types';
import type { RankedResult } from '../stages/rank/types';
import type { AnalysisOutput } from '../stages/assemble/types';

export interface WorkflowMetrics {
  startTime: Date;
  stagesCompleted: string[];
  totalPages: number;
  discardedSegments: number;
}

export const AnalysisState = Annotation.Root({
  // Input
  job: Annotation<AnalysisJob>,
  folderPath: Annotation<string>,
  processedAt: Annotation<Date>,

  // Extract stage output
  documents: Annotation<DocumentPages[]>,

  // Segment stage output
  sections: Annotation<Section[]>,

  // Rank stage output
  rankedResult: Annotation<RankedResult | null>,

  // Assemble stage output
  output: Annotation<AnalysisOutput | null>,

  // Workflow metadata
  currentStage: Annotation<string>,
  warnings: Annotation<AnalysisWarning[]>,
  metrics: Annotation<WorkflowMetrics>,
});

export type AnalysisStateType = typeof AnalysisState.State;

export function createInitialState(input: {
  job: AnalysisJob;
  folderPath: string;
  processedAt?: Date;
}): AnalysisStateType {
  const startTime = new Date();

  return {
    job: input.job,
    folderPath: input.folderPath,
    processedAt: input.processedAt ?? startTime,

    documents: [],
    sections: [],
    rankedResult: null,
    output: null,

    currentStage: 'init',
    warnings: [],
    metrics: {
      startTime,
      stagesCompleted: [],
      totalPages: 0,
      discardedSegments: 0,
    },
  };
}

/**
 * Record a finished stage in the metrics
 */
export function completeStage(
  state: AnalysisStateType,
  stage: string,
  extra: Partial<Omit<WorkflowMetrics, 'startTime' | 'stagesCompleted'>> = {},
): WorkflowMetrics {
  return {
    ...state.metrics,
    ...extra,
    stagesCompleted: [...state.metrics.stagesCompleted, stage],
  };
}
