/**
 * Rank Stage Barrel Export
 */

export * from './rank-stage.module';
export * from './rank.stage';
export * from './providers/embedding-provider.factory';
export * from './errors/rank-errors';
export * from './services';
export * from './types';
