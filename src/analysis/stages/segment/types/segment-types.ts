/**
 * Segment Stage Type Definitions
 */

import type { DocumentPages } from '../../extract/types';
import type { AnalysisWarning } from '../../../common/types';

/**
 * Built-in heading rule kinds. Additional rules may use their own kind.
 */
export type BuiltInHeadingKind =
  | 'numbered'
  | 'all-caps'
  | 'title-case'
  | 'colon'
  | 'bullet';

/**
 * One heading heuristic over a single trimmed line.
 * Rules are composed by HeadingClassifier in descending priority.
 */
export interface HeadingRule {
  readonly kind: string;
  readonly priority: number;
  matches(line: string): boolean;
}

export const HEADING_RULES = Symbol('HEADING_RULES');

export interface HeadingMatch {
  kind: string;
  priority: number;
}

/**
 * A contiguous titled span of page text; the unit of relevance ranking
 */
export interface Section {
  readonly documentId: string;
  readonly title: string;
  readonly body: string;
  readonly pageNumber: number;
  readonly charLength: number;
  /** heading rule kind that produced the title, or 'synthesized' */
  readonly titleSource: string;
  /** zero-based discovery index within the document */
  readonly position: number;
}

/**
 * Segment under construction
 */
export interface SegmentDraft {
  title: string | null;
  titleSource: string;
  pageNumber: number;
  paragraphs: string[];
}

export interface SegmentInput {
  documents: DocumentPages[];
}

export interface SegmentOutput {
  sections: Section[];
  sectionsPerDocument: Record<string, number>;
  discardedSegments: number;
  warnings: AnalysisWarning[];
}
