/**
 * Title Case Heading Detector
 *
 * Detects short lines where every significant word is capitalised:
 * "Budget Tips", "Things to Do in Nice"
 */

import { Inject, Injectable } from '@nestjs/common';
import { ANALYZER_CONFIG, AnalyzerConfig } from '../../../config';
import { HeadingRule } from '../types';

const CONNECTIVES = new Set([
  'a',
  'an',
  'the',
  'and',
  'or',
  'nor',
  'but',
  'of',
  'in',
  'on',
  'at',
  'to',
  'for',
  'by',
  'with',
  'from',
  'as',
  'vs',
]);

@Injectable()
export class TitleCaseHeadingDetector implements HeadingRule {
  readonly kind = 'title-case';
  readonly priority = 20;

  constructor(
    @Inject(ANALYZER_CONFIG) private readonly config: AnalyzerConfig,
  ) {}

  matches(line: string): boolean {
    if (!/^\p{Lu}/u.test(line)) {
      return false;
    }

    // Sentences end with punctuation, headings usually don't
    if (/[.!?]$/.test(line)) {
      return false;
    }

    const words = line.split(/\s+/);
    if (words.length > this.config.maxHeadingWords) {
      return false;
    }

    return words.every((word) => this.isCapitalisedOrConnective(word));
  }

  private isCapitalisedOrConnective(word: string): boolean {
    const letters = word.replace(/^[^\p{L}]+/u, '');

    // Numbers, symbols, "&"
    if (letters.length === 0) {
      return true;
    }

    if (/^\p{Lu}/u.test(letters)) {
      return true;
    }

    return CONNECTIVES.has(letters.replace(/[^\p{L}]/gu, '').toLowerCase());
  }
}
