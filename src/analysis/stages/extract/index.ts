/**
 * Extract Stage Barrel Export
 */

export * from './extract-stage.module';
export * from './extract.stage';
export * from './sources/pdf-page.source';
export * from './types';
export * from './errors/extract-errors';
