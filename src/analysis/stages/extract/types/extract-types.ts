/**
 * Extract Stage Type Definitions
 */

/**
 * Plain text of one PDF page, as produced by the text extractor
 */
export interface PageText {
  readonly pageNumber: number; // 1-based
  readonly text: string;
}

/**
 * Pages of one input document, in reading order
 */
export interface DocumentPages {
  documentId: string; // filename as given in the job
  filename: string;
  title: string;
  pages: PageText[];
}

/**
 * Capability that yields the page texts of one document
 */
export interface PageTextSource {
  extract(filePath: string, documentId: string): Promise<PageText[]>;
}

export const PAGE_TEXT_SOURCE = Symbol('PAGE_TEXT_SOURCE');

/**
 * Document reference handed to the extract stage
 */
export interface DocumentRef {
  filename: string;
  title: string;
}

export interface ExtractInput {
  folderPath: string;
  documents: DocumentRef[];
}

export interface ExtractOutput {
  documents: DocumentPages[];
  totalPages: number;
  emptyDocuments: string[];
}
