/**
 * Input Module
 */

import { Module } from '@nestjs/common';
import { DocumentDiscoveryService } from './services/document-discovery.service';
import { InputLoaderService } from './services/input-loader.service';
import { InteractiveSetupService } from './services/interactive-setup.service';

@Module({
  providers: [
    DocumentDiscoveryService,
    InputLoaderService,
    InteractiveSetupService,
  ],
  exports: [DocumentDiscoveryService, InputLoaderService, InteractiveSetupService],
})
export class InputModule {}
