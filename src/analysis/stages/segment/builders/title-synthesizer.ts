/**
 * Title Synthesizer
 *
 * Titles for segments without a detected heading: the first words of the
 * body, capped at the heading length limit.
 */

import { Injectable } from '@nestjs/common';

@Injectable()
export class TitleSynthesizer {
  private readonly maxWords = 8;

  synthesize(body: string, maxLength: number): string {
    const words = body.split(/\s+/).filter((w) => w.length > 0);
    const title =
      words.slice(0, this.maxWords).join(' ') +
      (words.length > this.maxWords ? '...' : '');

    return title.length > maxLength ? title.slice(0, maxLength).trimEnd() : title;
  }
}
