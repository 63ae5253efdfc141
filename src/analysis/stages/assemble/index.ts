/**
 * Assemble Stage Barrel Export
 */

export * from './assemble-stage.module';
export * from './assemble.stage';
export * from './services/output-writer.service';
export * from './types';
