/**
 * PDF Page Source
 *
 * Uses LangChain.js PDFLoader to extract plain text per page.
 * Image-only pages come back with empty text and are kept; they simply
 * yield no sections later on.
 */

import { Injectable, Logger } from '@nestjs/common';
import { access } from 'fs/promises';
import { PDFLoader } from '@langchain/community/document_loaders/fs/pdf';
import { Document } from '@langchain/core/documents';
import { PageText, PageTextSource } from '../types';
import {
  CorruptedPdfError,
  DocumentNotFoundError,
  PasswordProtectedPdfError,
  UnsupportedDocumentError,
} from '../errors/extract-errors';

@Injectable()
export class PdfPageSource implements PageTextSource {
  private readonly logger = new Logger(PdfPageSource.name);

  /**
   * Extract page texts from a PDF file
   *
   * @throws DocumentNotFoundError if the file does not exist
   * @throws UnsupportedDocumentError if the file is not a PDF
   * @throws PasswordProtectedPdfError if the PDF is encrypted
   * @throws CorruptedPdfError for any other loader failure
   */
  async extract(filePath: string, documentId: string): Promise<PageText[]> {
    if (!filePath.toLowerCase().endsWith('.pdf')) {
      throw new UnsupportedDocumentError(documentId, filePath);
    }

    try {
      await access(filePath);
    } catch {
      throw new DocumentNotFoundError(documentId, filePath);
    }

    const startTime = Date.now();

    try {
      const loader = new PDFLoader(filePath, {
        splitPages: true,
        parsedItemSeparator: ' ',
      });

      const documents = await loader.load();

      const pages = documents
        .map((doc, index) => ({
          pageNumber: this.getPageNumber(doc, index + 1),
          text: doc.pageContent,
        }))
        .sort((a, b) => a.pageNumber - b.pageNumber);

      this.logger.log(
        `PDF extraction complete - ${documentId}: ${pages.length} pages, ` +
          `${pages.filter((p) => p.text.trim().length === 0).length} empty ` +
          `(${Date.now() - startTime}ms)`,
      );

      return pages;
    } catch (error) {
      this.logger.error(
        `PDF extraction failed - File: ${filePath}`,
        error instanceof Error ? error.stack : String(error),
      );

      if (error instanceof Error) {
        const errorMessage = error.message.toLowerCase();

        if (
          errorMessage.includes('password') ||
          errorMessage.includes('encrypted')
        ) {
          throw new PasswordProtectedPdfError(documentId, filePath, error);
        }

        throw new CorruptedPdfError(documentId, filePath, error.message, error);
      }

      throw new CorruptedPdfError(documentId, filePath, String(error));
    }
  }

  /**
   * Page number from loader metadata (metadata.loc.pageNumber)
   */
  private getPageNumber(doc: Document, fallback: number): number {
    const loc: unknown = doc.metadata.loc;

    if (
      typeof loc === 'object' &&
      loc !== null &&
      'pageNumber' in loc &&
      typeof loc.pageNumber === 'number'
    ) {
      return loc.pageNumber;
    }

    return fallback;
  }
}
