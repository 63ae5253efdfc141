/**
 * Detectors Barrel Export
 */

export * from './numbered-heading.detector';
export * from './all-caps-heading.detector';
export * from './title-case-heading.detector';
export * from './colon-heading.detector';
export * from './bullet-heading.detector';
export * from './heading-classifier';
