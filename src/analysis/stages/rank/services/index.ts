/**
 * Rank Services Barrel Export
 */

export * from './similarity-scorer';
export * from './text-refiner';
export * from './query-text.builder';
