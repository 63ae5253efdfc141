/**
 * Segment Node for LangGraph Workflow
 */

import { Logger } from '@nestjs/common';
import { AnalysisStateType, completeStage } from '../analysis-state';
import { SegmentStage } from '../../stages/segment/segment.stage';

export function createSegmentNode(segmentStage: SegmentStage) {
  const logger = new Logger('SegmentNode');

  return (state: AnalysisStateType): Partial<AnalysisStateType> => {
    const output = segmentStage.execute({ documents: state.documents });

    logger.log(
      `Segment node completed: ${output.sections.length} sections, ` +
        `${output.discardedSegments} discarded`,
    );

    for (const [documentId, count] of Object.entries(
      output.sectionsPerDocument,
    )) {
      logger.debug(`${documentId}: ${count} sections`);
    }

    return {
      sections: output.sections,
      currentStage: 'segment',
      warnings: [...state.warnings, ...output.warnings],
      metrics: completeStage(state, 'segment', {
        discardedSegments: output.discardedSegments,
      }),
    };
  };
}
