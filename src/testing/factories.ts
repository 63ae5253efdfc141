/**
 * Test factories: stages wired by hand, without a Nest container
 */

import {
  AnalyzerConfig,
  AnalyzerSettings,
  createAnalyzerConfig,
} from '../analysis/config';
import {
  AllCapsHeadingDetector,
  ColonHeadingDetector,
  BulletHeadingDetector,
  HeadingClassifier,
  NumberedHeadingDetector,
  TitleCaseHeadingDetector,
} from '../analysis/stages/segment/detectors';
import {
  PageTextNormalizer,
  ParagraphSplitter,
  SegmentBuilder,
  TitleSynthesizer,
} from '../analysis/stages/segment/builders';
import { SegmentStage } from '../analysis/stages/segment/segment.stage';
import { HeadingRule, Section } from '../analysis/stages/segment/types';
import { DocumentPages } from '../analysis/stages/extract/types';
import { RankStage } from '../analysis/stages/rank/rank.stage';
import {
  QueryTextBuilder,
  SimilarityScorer,
  TextRefiner,
} from '../analysis/stages/rank/services';
import { KeywordEmbeddings } from './keyword-embeddings';

export function builtInHeadingRules(config: AnalyzerConfig): HeadingRule[] {
  return [
    new NumberedHeadingDetector(config),
    new AllCapsHeadingDetector(),
    new TitleCaseHeadingDetector(config),
    new ColonHeadingDetector(config),
    new BulletHeadingDetector(),
  ];
}

export function createHeadingClassifier(
  overrides: Partial<AnalyzerSettings> = {},
  extraRules: HeadingRule[] = [],
): HeadingClassifier {
  const config = createAnalyzerConfig(overrides);
  return new HeadingClassifier(config, [
    ...builtInHeadingRules(config),
    ...extraRules,
  ]);
}

export function createSegmentStage(
  overrides: Partial<AnalyzerSettings> = {},
): SegmentStage {
  const config = createAnalyzerConfig(overrides);
  const classifier = new HeadingClassifier(config, builtInHeadingRules(config));

  return new SegmentStage(
    config,
    new SegmentBuilder(classifier, new PageTextNormalizer()),
    new ParagraphSplitter(),
    new TitleSynthesizer(),
  );
}

export function createRankStage(
  overrides: Partial<AnalyzerSettings> = {},
  embeddings: KeywordEmbeddings = new KeywordEmbeddings(),
): RankStage {
  return new RankStage(
    createAnalyzerConfig(overrides),
    embeddings,
    new QueryTextBuilder(),
    new SimilarityScorer(),
    new TextRefiner(),
  );
}

export function singlePageDocument(
  documentId: string,
  text: string,
): DocumentPages {
  return {
    documentId,
    filename: documentId,
    title: documentId,
    pages: [{ pageNumber: 1, text }],
  };
}

export function makeSection(
  documentId: string,
  title: string,
  body: string,
  position = 0,
  pageNumber = 1,
): Section {
  return {
    documentId,
    title,
    body,
    pageNumber,
    charLength: body.length,
    titleSource: 'all-caps',
    position,
  };
}

export const PARIS_GUIDE_PAGE =
  'INTRODUCTION\n' +
  'This guide covers outdoor seating options for families in Paris with budgets under 50 euros per meal.\n' +
  '\n' +
  'BUDGET TIPS\n' +
  'Look for lunch menus which are significantly cheaper than dinner.';
