/**
 * ALL CAPS Heading Detector
 *
 * Detects headings written entirely in upper case: "INTRODUCTION",
 * "BUDGET TIPS", "CHAPTER 1: OVERVIEW"
 */

import { Injectable } from '@nestjs/common';
import { HeadingRule } from '../types';

@Injectable()
export class AllCapsHeadingDetector implements HeadingRule {
  readonly kind = 'all-caps';
  readonly priority = 30;

  private readonly minWords = 1;
  private readonly minLength = 4;

  matches(line: string): boolean {
    if (line.length < this.minLength) {
      return false;
    }

    // Needs cased letters, none of them lower case
    if (line === line.toLowerCase() || line !== line.toUpperCase()) {
      return false;
    }

    const words = line.split(/\s+/).filter((w) => /\p{L}/u.test(w));
    return words.length >= this.minWords;
  }
}
