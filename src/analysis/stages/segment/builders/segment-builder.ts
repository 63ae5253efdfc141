/**
 * Segment Builder
 *
 * Partitions one page into segments, using heading lines as boundaries.
 * Lines before the first heading form an untitled leading segment.
 * Lines of a paragraph are joined with spaces; blank lines end a paragraph.
 */

import { Injectable } from '@nestjs/common';
import { PageText } from '../../extract/types';
import { HeadingClassifier } from '../detectors/heading-classifier';
import { SegmentDraft } from '../types';
import { PageTextNormalizer } from './page-text.normalizer';

@Injectable()
export class SegmentBuilder {
  constructor(
    private readonly classifier: HeadingClassifier,
    private readonly normalizer: PageTextNormalizer,
  ) {}

  build(page: PageText): SegmentDraft[] {
    const segments: SegmentDraft[] = [];
    let current: SegmentDraft | null = null;
    let paragraph: string[] = [];

    const flushParagraph = () => {
      if (current && paragraph.length > 0) {
        current.paragraphs.push(paragraph.join(' '));
      }
      paragraph = [];
    };

    for (const line of this.normalizer.toLines(page.text)) {
      if (line.length === 0) {
        flushParagraph();
        continue;
      }

      const heading = this.classifier.classify(line);

      if (heading) {
        flushParagraph();
        current = {
          title: line,
          titleSource: heading.kind,
          pageNumber: page.pageNumber,
          paragraphs: [],
        };
        segments.push(current);
        continue;
      }

      if (!current) {
        current = {
          title: null,
          titleSource: 'synthesized',
          pageNumber: page.pageNumber,
          paragraphs: [],
        };
        segments.push(current);
      }

      paragraph.push(line);
    }

    flushParagraph();

    return segments;
  }
}
