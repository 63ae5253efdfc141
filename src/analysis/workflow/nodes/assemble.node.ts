/**
 * Assemble Node for LangGraph Workflow
 */

import { AnalysisStateType, completeStage } from '../analysis-state';
import { AssembleStage } from '../../stages/assemble/assemble.stage';

export function createAssembleNode(assembleStage: AssembleStage) {
  return (state: AnalysisStateType): Partial<AnalysisStateType> => {
    if (!state.rankedResult) {
      throw new Error('Assemble node reached without a ranked result');
    }

    return {
      output: assembleStage.execute({
        job: state.job,
        result: state.rankedResult,
        processedAt: state.processedAt,
      }),
      currentStage: 'assemble',
      metrics: completeStage(state, 'assemble'),
    };
  };
}
