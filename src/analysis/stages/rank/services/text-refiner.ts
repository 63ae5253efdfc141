/**
 * Text Refiner
 *
 * Produces the refined_text excerpt of a ranked section: control
 * characters removed, whitespace collapsed, truncated on a word boundary.
 */

import { Injectable } from '@nestjs/common';

// eslint-disable-next-line no-control-regex
const CONTROL_CHARS = /[\u0000-\u001F\u007F]/g;

@Injectable()
export class TextRefiner {
  refine(text: string, maxLength: number): string {
    const cleaned = text.replace(CONTROL_CHARS, ' ').replace(/\s+/g, ' ').trim();

    if (cleaned.length <= maxLength) {
      return cleaned;
    }

    const prefix = cleaned.slice(0, maxLength);

    // Cut fell exactly between two words
    if (cleaned[maxLength] === ' ') {
      return prefix.trimEnd();
    }

    const lastSpace = prefix.lastIndexOf(' ');
    return lastSpace > 0 ? prefix.slice(0, lastSpace) : prefix;
  }
}
