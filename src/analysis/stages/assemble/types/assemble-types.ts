/**
 * Assemble Stage Type Definitions
 *
 * AnalysisOutput mirrors the JSON artifact, hence the snake_case keys.
 */

import type { AnalysisJob } from '../../../common/types';
import type { RankedResult } from '../../rank/types';

export interface OutputMetadata {
  input_documents: string[];
  persona: string;
  job_to_be_done: string;
  description?: string;
  /** ISO-8601 */
  processing_timestamp: string;
  similarity_model: string;
}

export interface ExtractedSection {
  document: string;
  section_title: string;
  importance_rank: number;
  page_number: number;
  similarity: number;
}

export interface SubsectionAnalysis {
  document: string;
  refined_text: string;
  page_number: number;
}

export interface AnalysisOutput {
  metadata: OutputMetadata;
  extracted_sections: ExtractedSection[];
  subsection_analysis: SubsectionAnalysis[];
}

export interface AssembleInput {
  job: AnalysisJob;
  result: RankedResult;
  processedAt: Date;
}
