/**
 * Segment Stage Barrel Export
 */

export * from './segment-stage.module';
export * from './segment.stage';
export * from './types';
