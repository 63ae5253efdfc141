/**
 * Builders Barrel Export
 */

export * from './page-text.normalizer';
export * from './segment-builder';
export * from './paragraph-splitter';
export * from './title-synthesizer';
