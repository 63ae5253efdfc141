/**
 * Heading Classifier
 *
 * Composes the registered heading rules in descending priority and reports
 * the first one that accepts a line. New heuristics are added by registering
 * another HeadingRule under HEADING_RULES; existing rules stay untouched.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ANALYZER_CONFIG, AnalyzerConfig } from '../../../config';
import { HEADING_RULES, HeadingMatch, HeadingRule } from '../types';

@Injectable()
export class HeadingClassifier {
  private readonly logger = new Logger(HeadingClassifier.name);
  private readonly rules: HeadingRule[];

  constructor(
    @Inject(ANALYZER_CONFIG) private readonly config: AnalyzerConfig,
    @Inject(HEADING_RULES) rules: HeadingRule[],
  ) {
    // Array.prototype.sort is stable: equal priorities keep registration order
    this.rules = [...rules].sort((a, b) => b.priority - a.priority);

    this.logger.log(
      `Heading rules: ${this.rules.map((r) => `${r.kind}(${r.priority})`).join(' > ')}`,
    );
  }

  /**
   * Classify a single line
   *
   * @param line - Raw or trimmed line text
   * @returns Matching rule, or null for body text
   */
  classify(line: string): HeadingMatch | null {
    const trimmed = line.trim();

    if (trimmed.length === 0) {
      return null;
    }

    // Anything this long is body text
    if (trimmed.length > this.config.maxHeadingLength) {
      return null;
    }

    for (const rule of this.rules) {
      if (rule.matches(trimmed)) {
        return { kind: rule.kind, priority: rule.priority };
      }
    }

    return null;
  }
}
