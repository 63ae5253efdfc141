/**
 * Colon Heading Detector
 *
 * Detects short lead-in lines ending with a colon: "What to pack:"
 * Lowest priority of the built-in rules.
 */

import { Inject, Injectable } from '@nestjs/common';
import { ANALYZER_CONFIG, AnalyzerConfig } from '../../../config';
import { HeadingRule } from '../types';

@Injectable()
export class ColonHeadingDetector implements HeadingRule {
  readonly kind = 'colon';
  readonly priority = 10;

  constructor(
    @Inject(ANALYZER_CONFIG) private readonly config: AnalyzerConfig,
  ) {}

  matches(line: string): boolean {
    if (!line.endsWith(':') || !/^[\p{L}\p{N}]/u.test(line)) {
      return false;
    }

    return line.split(/\s+/).length <= this.config.maxHeadingWords;
  }
}
