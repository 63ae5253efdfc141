/**
 * Input Barrel Export
 */

export * from './input.module';
export * from './analysis-paths';
export * from './dto/analysis-input.dto';
export * from './errors/input-errors';
export * from './services/document-discovery.service';
export * from './services/input-loader.service';
export * from './services/interactive-setup.service';
