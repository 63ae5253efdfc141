/**
 * Non-fatal issues collected during a run
 */

export enum AnalysisWarningType {
  EXTRACTION_EMPTY = 'EXTRACTION_EMPTY',
  SEGMENTATION_EMPTY = 'SEGMENTATION_EMPTY',
  SECTION_EMBEDDING_FAILED = 'SECTION_EMBEDDING_FAILED',
}

export interface AnalysisWarning {
  type: AnalysisWarningType;
  documentId?: string;
  message: string;
}
