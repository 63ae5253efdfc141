import { Module } from '@nestjs/common';
import { AnalysisWorkflowService } from './analysis-workflow.service';
import { ExtractStageModule } from '../stages/extract';
import { SegmentStageModule } from '../stages/segment';
import { RankStageModule } from '../stages/rank';
import { AssembleStageModule } from '../stages/assemble';

@Module({
  imports: [
    ExtractStageModule,
    SegmentStageModule,
    RankStageModule,
    AssembleStageModule,
  ],
  providers: [AnalysisWorkflowService],
  exports: [AnalysisWorkflowService],
})
export class WorkflowModule {}
