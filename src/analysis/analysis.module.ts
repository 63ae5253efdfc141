import { Module } from '@nestjs/common';
import { AnalysisService } from './analysis.service';
import { InputModule } from './input/input.module';
import { WorkflowModule } from './workflow/workflow.module';
import { AssembleStageModule } from './stages/assemble';

@Module({
  imports: [InputModule, WorkflowModule, AssembleStageModule],
  providers: [AnalysisService],
  exports: [AnalysisService],
})
export class AnalysisModule {}
