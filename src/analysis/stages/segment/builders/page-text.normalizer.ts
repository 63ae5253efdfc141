/**
 * Page Text Normalizer
 *
 * Normalizes extracted page text before line classification:
 * line endings, control characters, runs of spaces, per-line trimming.
 * Blank lines are preserved as paragraph breaks.
 */

import { Injectable } from '@nestjs/common';

@Injectable()
export class PageTextNormalizer {
  normalize(text: string): string {
    if (text.length === 0) {
      return text;
    }

    return (
      text
        // CRLF → LF, CR → LF
        .replace(/\r\n?/g, '\n')
        // Control characters except \n and \t (form feeds included)
        // eslint-disable-next-line no-control-regex
        .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, '')
        .replace(/[ \t\u00A0]+/g, ' ')
        .split('\n')
        .map((line) => line.trim())
        .join('\n')
        .trim()
    );
  }

  toLines(text: string): string[] {
    const normalized = this.normalize(text);
    return normalized.length === 0 ? [] : normalized.split('\n');
  }
}
