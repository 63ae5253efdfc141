/**
 * Numbered Heading Detector
 *
 * Detects explicitly numbered headings:
 * "1. Introduction", "2) Scope", "3.1 Budget Tips", "Chapter 4", "Part IV"
 * Highest priority: explicit numbering is the most reliable signal.
 */

import { Inject, Injectable } from '@nestjs/common';
import { ANALYZER_CONFIG, AnalyzerConfig } from '../../../config';
import { HeadingRule } from '../types';

@Injectable()
export class NumberedHeadingDetector implements HeadingRule {
  readonly kind = 'numbered';
  readonly priority = 40;

  // "1." / "1)" / "1.2" / "1.2.3." followed by a capitalised word; a bare "12 " is not numbering
  private readonly numberPrefixRegex =
    /^(?:\d+[.)]|\d+(?:\.\d+)+[.)]?)\s+\p{Lu}/u;

  // "Chapter 3", "Section 12", "Part IV"
  private readonly keywordRegex = /^(?:chapter|section|part)\s+(?:\d+|[ivxlc]+)\b/i;

  constructor(
    @Inject(ANALYZER_CONFIG) private readonly config: AnalyzerConfig,
  ) {}

  matches(line: string): boolean {
    if (!this.numberPrefixRegex.test(line) && !this.keywordRegex.test(line)) {
      return false;
    }

    // Long numbered sentences are list items, not headings
    const wordCount = line.split(/\s+/).length;
    if (/[.!?]$/.test(line) && wordCount > this.config.maxHeadingWords) {
      return false;
    }

    return true;
  }
}
