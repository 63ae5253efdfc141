/**
 * Paragraph Splitter
 *
 * Secondary split for oversized segments: packs paragraphs greedily into
 * chunks whose joined length stays within the size budget. A paragraph
 * longer than the budget on its own becomes a chunk of its own.
 */

import { Injectable } from '@nestjs/common';

export const PARAGRAPH_SEPARATOR = '\n\n';

@Injectable()
export class ParagraphSplitter {
  split(paragraphs: string[], budget: number): string[][] {
    if (
      paragraphs.length < 2 ||
      paragraphs.join(PARAGRAPH_SEPARATOR).length <= budget
    ) {
      return [paragraphs];
    }

    const chunks: string[][] = [];
    let current: string[] = [];
    let currentLength = 0;

    for (const paragraph of paragraphs) {
      const nextLength =
        current.length === 0
          ? paragraph.length
          : currentLength + PARAGRAPH_SEPARATOR.length + paragraph.length;

      if (current.length > 0 && nextLength > budget) {
        chunks.push(current);
        current = [paragraph];
        currentLength = paragraph.length;
      } else {
        current.push(paragraph);
        currentLength = nextLength;
      }
    }

    if (current.length > 0) {
      chunks.push(current);
    }

    return chunks;
  }
}
