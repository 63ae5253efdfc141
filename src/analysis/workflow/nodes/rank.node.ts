/**
 * Rank Node for LangGraph Workflow
 *
 * EmbeddingProviderError propagates and aborts the workflow.
 */

import { Logger } from '@nestjs/common';
import { AnalysisStateType, completeStage } from '../analysis-state';
import { RankStage } from '../../stages/rank/rank.stage';

export function createRankNode(rankStage: RankStage) {
  const logger = new Logger('RankNode');

  return async (
    state: AnalysisStateType,
  ): Promise<Partial<AnalysisStateType>> => {
    try {
      const output = await rankStage.execute({
        query: state.job.query,
        sections: state.sections,
      });

      return {
        rankedResult: output.result,
        currentStage: 'rank',
        warnings: [...state.warnings, ...output.warnings],
        metrics: completeStage(state, 'rank'),
      };
    } catch (error) {
      logger.error(
        `Rank node failed with ${state.sections.length} candidates`,
        error instanceof Error ? error.stack : String(error),
      );
      throw error;
    }
  };
}
