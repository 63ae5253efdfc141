export * from './rank-types';
