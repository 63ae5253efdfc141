/**
 * Bullet Heading Detector
 *
 * Detects short bulleted lead-ins: "• Museums", "- Getting Around"
 * Below every other built-in rule.
 */

import { Injectable } from '@nestjs/common';
import { HeadingRule } from '../types';

const MAX_BULLET_HEADING_WORDS = 8;

@Injectable()
export class BulletHeadingDetector implements HeadingRule {
  readonly kind = 'bullet';
  readonly priority = 5;

  private readonly bulletRegex = /^[•\-*]\s*\p{Lu}/u;

  matches(line: string): boolean {
    if (!this.bulletRegex.test(line)) {
      return false;
    }

    // Bulleted sentences are list items
    if (/[.!?]$/.test(line)) {
      return false;
    }

    return line.split(/\s+/).length <= MAX_BULLET_HEADING_WORDS;
  }
}
