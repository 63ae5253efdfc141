export * from './analysis-warning';
export * from './analysis-job';
