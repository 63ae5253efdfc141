export * from './assemble-types';
