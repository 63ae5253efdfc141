import { Test } from '@nestjs/testing';
import { ConfigModule } from '@nestjs/config';
import { SegmentStage } from './segment.stage';
import { SegmentStageModule } from './segment-stage.module';
import {
  ANALYZER_CONFIG,
  AnalyzerConfigModule,
  createAnalyzerConfig,
} from '../../config';
import { AnalysisWarningType } from '../../common/types';
import { DocumentPages } from '../extract/types';
import {
  PARIS_GUIDE_PAGE,
  createSegmentStage,
  singlePageDocument,
} from '../../../testing/factories';

const P1 = 'the first paragraph covers trains.';
const P2 = 'the second paragraph covers buses.';
const P3 = 'the third paragraph covers ferries.';

describe('SegmentStage', () => {
  it('segments the travel guide page into its two headed sections', () => {
    const stage = createSegmentStage({ minSectionLength: 20 });

    const { sections } = stage.segmentDocument(
      singlePageDocument('paris.pdf', PARIS_GUIDE_PAGE),
    );

    expect(sections).toEqual([
      {
        documentId: 'paris.pdf',
        title: 'INTRODUCTION',
        body: 'This guide covers outdoor seating options for families in Paris with budgets under 50 euros per meal.',
        pageNumber: 1,
        charLength: 101,
        titleSource: 'all-caps',
        position: 0,
      },
      {
        documentId: 'paris.pdf',
        title: 'BUDGET TIPS',
        body: 'Look for lunch menus which are significantly cheaper than dinner.',
        pageNumber: 1,
        charLength: 65,
        titleSource: 'all-caps',
        position: 1,
      },
    ]);
  });

  it('synthesizes a title for text before the first heading', () => {
    const stage = createSegmentStage({ minSectionLength: 20 });

    const { sections } = stage.segmentDocument(
      singlePageDocument(
        'guide.pdf',
        'Welcome to the city guide for travellers on a budget.\n' +
          'More text continues here across lines.\n' +
          '\n' +
          'MUSEUMS\n' +
          'The Louvre offers free entry on the first Friday evening of each month.',
      ),
    );

    expect(sections.map((s) => [s.title, s.titleSource])).toEqual([
      ['Welcome to the city guide for travellers on...', 'synthesized'],
      ['MUSEUMS', 'all-caps'],
    ]);
    expect(sections[0].body).toBe(
      'Welcome to the city guide for travellers on a budget. More text continues here across lines.',
    );
  });

  it('discards short fragments instead of merging them', () => {
    const stage = createSegmentStage({ minSectionLength: 50 });

    const { sections, discarded } = stage.segmentDocument(
      singlePageDocument(
        'notes.pdf',
        'NOTES\nBring water.\n\nOVERVIEW\nDETAILS\n' +
          'Some details about the itinerary, the hotels and the evening trains.',
      ),
    );

    // NOTES is too short, OVERVIEW has no body at all
    expect(sections.map((s) => s.title)).toEqual(['DETAILS']);
    expect(discarded).toBe(2);
  });

  it('splits a heading-free page into size-bounded chunks', () => {
    const stage = createSegmentStage({
      minSectionLength: 10,
      sectionSizeBudget: 70,
    });

    const { sections } = stage.segmentDocument(
      singlePageDocument('plain.pdf', `${P1}\n\n${P2}\n\n${P3}`),
    );

    expect(sections.map((s) => s.body)).toEqual([`${P1}\n\n${P2}`, P3]);
    expect(sections.map((s) => s.title)).toEqual([
      'the first paragraph covers trains. the second paragraph...',
      'the third paragraph covers ferries.',
    ]);
  });

  it('keeps the heading title on continuation chunks', () => {
    const stage = createSegmentStage({
      minSectionLength: 10,
      sectionSizeBudget: 70,
    });

    const { sections } = stage.segmentDocument(
      singlePageDocument('transport.pdf', `TRANSPORT\n${P1}\n\n${P2}\n\n${P3}`),
    );

    expect(sections.map((s) => s.title)).toEqual(['TRANSPORT', 'TRANSPORT']);
  });

  it('keeps a line opening with a bare number in the body', () => {
    const stage = createSegmentStage({ minSectionLength: 20 });

    const { sections } = stage.segmentDocument(
      singlePageDocument(
        'budget.pdf',
        'BUDGET TIPS\n' +
          'Look for lunch menus which are significantly cheaper than dinner.\n' +
          '2 Adults and 2 children eat for 40 euros.\n' +
          'Bakeries sell sandwiches for a few euros.',
      ),
    );

    expect(sections).toHaveLength(1);
    expect(sections[0].title).toBe('BUDGET TIPS');
    expect(sections[0].body).toBe(
      'Look for lunch menus which are significantly cheaper than dinner. ' +
        '2 Adults and 2 children eat for 40 euros. ' +
        'Bakeries sell sandwiches for a few euros.',
    );
  });

  it('titles a section with a bulleted lead-in', () => {
    const stage = createSegmentStage({ minSectionLength: 20 });

    const { sections } = stage.segmentDocument(
      singlePageDocument(
        'metro.pdf',
        '- Getting Around\n' +
          'The metro runs from early morning until after midnight on weekends.',
      ),
    );

    expect(sections.map((s) => [s.title, s.titleSource, s.body])).toEqual([
      [
        '- Getting Around',
        'bullet',
        'The metro runs from early morning until after midnight on weekends.',
      ],
    ]);
  });

  it('yields one section for a single paragraph under the budget', () => {
    const stage = createSegmentStage({ minSectionLength: 10 });

    const { sections } = stage.segmentDocument(
      singlePageDocument('one.pdf', `${P1}\n${P2}`),
    );

    expect(sections).toHaveLength(1);
    expect(sections[0].body).toBe(`${P1} ${P2}`);
  });

  it('numbers positions across pages and keeps the starting page', () => {
    const stage = createSegmentStage({ minSectionLength: 10 });
    const document: DocumentPages = {
      documentId: 'two-pages.pdf',
      filename: 'two-pages.pdf',
      title: 'Two Pages',
      pages: [
        { pageNumber: 1, text: `TRAINS\n${P1}` },
        { pageNumber: 2, text: '' },
        { pageNumber: 3, text: `BUSES\n${P2}\nFERRIES\n${P3}` },
      ],
    };

    const { sections } = stage.segmentDocument(document);

    expect(
      sections.map((s) => [s.title, s.pageNumber, s.position]),
    ).toEqual([
      ['TRAINS', 1, 0],
      ['BUSES', 3, 1],
      ['FERRIES', 3, 2],
    ]);
  });

  it('never treats overlong lines as headings', () => {
    const stage = createSegmentStage({
      minSectionLength: 10,
      maxHeadingLength: 20,
    });

    const { sections } = stage.segmentDocument(
      singlePageDocument(
        'long.pdf',
        `INTRODUCTION TO THE CITY OF LIGHTS\n${P1}`,
      ),
    );

    expect(sections).toHaveLength(1);
    expect(sections[0].titleSource).toBe('synthesized');
    expect(sections[0].body).toBe(`INTRODUCTION TO THE CITY OF LIGHTS ${P1}`);
    expect(sections[0].title.length).toBeLessThanOrEqual(20);
  });

  it('produces frozen sections that satisfy the length invariants', () => {
    const minSectionLength = 40;
    const stage = createSegmentStage({
      minSectionLength,
      sectionSizeBudget: 80,
    });

    const { sections } = stage.execute({
      documents: [
        singlePageDocument('paris.pdf', PARIS_GUIDE_PAGE),
        singlePageDocument('plain.pdf', `${P1}\n\n${P2}\n\n${P3}`),
        singlePageDocument('notes.pdf', 'NOTES\nshort\n\nTIPS\ntiny'),
      ],
    });

    expect(sections.length).toBeGreaterThan(0);
    for (const section of sections) {
      expect(section.charLength).toBe(section.body.length);
      expect(section.charLength).toBeGreaterThanOrEqual(minSectionLength);
      expect(section.title.length).toBeGreaterThan(0);
      expect(Object.isFrozen(section)).toBe(true);
    }
  });

  it('is idempotent', () => {
    const stage = createSegmentStage({ minSectionLength: 20 });
    const input = {
      documents: [
        singlePageDocument('paris.pdf', PARIS_GUIDE_PAGE),
        singlePageDocument('plain.pdf', `${P1}\n\n${P2}`),
      ],
    };

    expect(stage.execute(input).sections).toEqual(
      stage.execute(input).sections,
    );
  });

  it('pools documents in input order', () => {
    const stage = createSegmentStage({ minSectionLength: 20 });

    const result = stage.execute({
      documents: [
        singlePageDocument('b.pdf', `BUSES\n${P2}`),
        singlePageDocument('a.pdf', `TRAINS\n${P1}`),
      ],
    });

    expect(result.sections.map((s) => s.documentId)).toEqual([
      'b.pdf',
      'a.pdf',
    ]);
    expect(result.sectionsPerDocument).toEqual({ 'b.pdf': 1, 'a.pdf': 1 });
  });

  it('reports an empty pool as warnings, not an error', () => {
    const stage = createSegmentStage({ minSectionLength: 500 });

    const result = stage.execute({
      documents: [
        singlePageDocument('paris.pdf', PARIS_GUIDE_PAGE),
        singlePageDocument('scan.pdf', ''),
      ],
    });

    expect(result.sections).toEqual([]);
    expect(result.discardedSegments).toBe(2);
    expect(result.warnings).toEqual([
      {
        type: AnalysisWarningType.SEGMENTATION_EMPTY,
        documentId: 'paris.pdf',
        message: 'All 2 segments were shorter than 500 characters',
      },
      {
        type: AnalysisWarningType.SEGMENTATION_EMPTY,
        message: 'No sections survived segmentation in any document',
      },
    ]);
  });

  it('handles an empty document set', () => {
    const stage = createSegmentStage();

    expect(stage.execute({ documents: [] }).sections).toEqual([]);
  });

  it('is wired by SegmentStageModule', async () => {
    const moduleRef = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({ isGlobal: true, ignoreEnvFile: true }),
        AnalyzerConfigModule,
        SegmentStageModule,
      ],
    })
      .overrideProvider(ANALYZER_CONFIG)
      .useValue(createAnalyzerConfig({ minSectionLength: 20 }))
      .compile();

    const stage = moduleRef.get(SegmentStage);
    const { sections } = stage.segmentDocument(
      singlePageDocument('paris.pdf', PARIS_GUIDE_PAGE),
    );

    expect(sections.map((s) => s.title)).toEqual([
      'INTRODUCTION',
      'BUDGET TIPS',
    ]);
  });
});
