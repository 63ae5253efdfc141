/**
 * Segment Stage Module
 */

import { Module } from '@nestjs/common';
import { SegmentStage } from './segment.stage';
import { HEADING_RULES, HeadingRule } from './types';

// Detectors
import {
  NumberedHeadingDetector,
  AllCapsHeadingDetector,
  TitleCaseHeadingDetector,
  ColonHeadingDetector,
  BulletHeadingDetector,
  HeadingClassifier,
} from './detectors';

// Builders
import {
  PageTextNormalizer,
  SegmentBuilder,
  ParagraphSplitter,
  TitleSynthesizer,
} from './builders';

@Module({
  providers: [
    // Main stage
    SegmentStage,

    // Detectors
    NumberedHeadingDetector,
    AllCapsHeadingDetector,
    TitleCaseHeadingDetector,
    ColonHeadingDetector,
    BulletHeadingDetector,
    {
      provide: HEADING_RULES,
      useFactory: (...rules: HeadingRule[]) => rules,
      inject: [
        NumberedHeadingDetector,
        AllCapsHeadingDetector,
        TitleCaseHeadingDetector,
        ColonHeadingDetector,
        BulletHeadingDetector,
      ],
    },
    HeadingClassifier,

    // Builders
    PageTextNormalizer,
    SegmentBuilder,
    ParagraphSplitter,
    TitleSynthesizer,
  ],
  exports: [SegmentStage],
})
export class SegmentStageModule {}
