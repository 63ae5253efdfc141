/**
 * Extract Node for LangGraph Workflow
 */

import { Logger } from '@nestjs/common';
import { AnalysisStateType, completeStage } from '../analysis-state';
import { ExtractStage } from '../../stages/extract/extract.stage';

/**
 * Create Extract node function for LangGraph
 */
export function createExtractNode(extractStage: ExtractStage) {
  const logger = new Logger('ExtractNode');

  return async (
    state: AnalysisStateType,
  ): Promise<Partial<AnalysisStateType>> => {
    logger.log(
      `Extract node executing for ${state.job.documents.length} documents`,
    );

    const output = await extractStage.execute({
      folderPath: state.folderPath,
      documents: state.job.documents,
    });

    if (output.emptyDocuments.length > 0) {
      logger.warn(
        `Documents without text: ${output.emptyDocuments.join(', ')}`,
      );
    }

    return {
      documents: output.documents,
      currentStage: 'extract',
      warnings: [...state.warnings, ...output.warnings],
      metrics: completeStage(state, 'extract', {
        totalPages: output.totalPages,
      }),
    };
  };
}
