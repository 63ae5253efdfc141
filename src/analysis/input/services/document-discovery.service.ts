/**
 * Document Discovery Service
 * Lists the PDFs of a folder and derives display titles from file names
 */

import { Injectable, Logger } from '@nestjs/common';
import { readdir } from 'fs/promises';
import { DocumentRef } from '../../stages/extract/types';
import { NoDocumentsError } from '../errors/input-errors';

@Injectable()
export class DocumentDiscoveryService {
  private readonly logger = new Logger(DocumentDiscoveryService.name);

  /**
   * @throws NoDocumentsError if the folder is missing or holds no PDFs
   */
  async discover(folderPath: string): Promise<DocumentRef[]> {
    let entries: string[];

    try {
      entries = await readdir(folderPath);
    } catch (error) {
      this.logger.warn(
        `Cannot read PDF folder ${folderPath}: ${error instanceof Error ? error.message : String(error)}`,
      );
      throw new NoDocumentsError(folderPath);
    }

    const filenames = entries
      .filter((name) => name.toLowerCase().endsWith('.pdf'))
      .sort();

    if (filenames.length === 0) {
      throw new NoDocumentsError(folderPath);
    }

    this.logger.log(`Found ${filenames.length} PDF files in ${folderPath}`);

    return filenames.map((filename) => ({
      filename,
      title: titleFromFilename(filename),
    }));
  }
}

/**
 * "paris-food_guide.pdf" → "Paris Food Guide"
 */
export function titleFromFilename(filename: string): string {
  return filename
    .replace(/\.pdf$/i, '')
    .replace(/[-_]/g, ' ')
    .replace(
      /[A-Za-z]+/g,
      (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase(),
    );
}
