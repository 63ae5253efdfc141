/**
 * Assemble Stage Module
 */

import { Module } from '@nestjs/common';
import { AssembleStage } from './assemble.stage';
import { OutputWriterService } from './services/output-writer.service';

@Module({
  providers: [AssembleStage, OutputWriterService],
  exports: [AssembleStage, OutputWriterService],
})
export class AssembleStageModule {}
