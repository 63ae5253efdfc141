export * from './segment-types';
