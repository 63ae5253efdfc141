/**
 * Rank Stage Type Definitions
 */

import type { Section } from '../../segment/types';
import type { AnalysisWarning } from '../../../common/types';

/**
 * Persona and task the sections are ranked against
 */
export interface Query {
  role: string;
  task: string;
  description?: string;
}

export interface ScoredSection {
  section: Section;
  /** cosine similarity, in [-1, 1] */
  similarity: number;
}

export interface RankedSection extends ScoredSection {
  /** 1-based */
  rank: number;
  refinedText: string;
}

export interface RankedResult {
  sections: RankedSection[];
  candidateCount: number;
  embeddedCount: number;
  droppedCount: number;
}

export interface RankInput {
  query: Query;
  sections: Section[];
}

export interface RankOutput {
  result: RankedResult;
  warnings: AnalysisWarning[];
}
