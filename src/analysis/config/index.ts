/**
 * Config Barrel Export
 */

export * from './analyzer-config';
export * from './analyzer-config.loader';
export * from './analyzer-config.module';
export * from './errors/configuration-errors';
