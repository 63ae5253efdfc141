import { createAnalyzerConfig } from '../../../config';
import { NumberedHeadingDetector } from './numbered-heading.detector';
import { AllCapsHeadingDetector } from './all-caps-heading.detector';
import { TitleCaseHeadingDetector } from './title-case-heading.detector';
import { ColonHeadingDetector } from './colon-heading.detector';
import { BulletHeadingDetector } from './bullet-heading.detector';

const config = createAnalyzerConfig({ maxHeadingWords: 10 });

describe('NumberedHeadingDetector', () => {
  const detector = new NumberedHeadingDetector(config);

  it.each(['1. Introduction', '2) Scope', '3.1 Budget Tips', '4.2.1. Metro Passes', 'Chapter 4', 'PART IV', 'Section 2.'])(
    'accepts %p',
    (line) => {
      expect(detector.matches(line)).toBe(true);
    },
  );

  it.each([
    '50 euros per meal',
    '2 Adults and 2 children eat for 40 euros.',
    '2024 Paris Olympics drew record crowds',
    'Part of the plan',
    '1. Preheat the oven to 200 degrees and then bake the bread for twenty minutes.',
    'Introduction',
  ])('rejects %p', (line) => {
    expect(detector.matches(line)).toBe(false);
  });
});

describe('AllCapsHeadingDetector', () => {
  const detector = new AllCapsHeadingDetector();

  it.each(['INTRODUCTION', 'BUDGET TIPS', 'CHAPTER 1: OVERVIEW'])(
    'accepts %p',
    (line) => {
      expect(detector.matches(line)).toBe(true);
    },
  );

  it.each(['USA', '2024', 'Budget Tips', '-- 12 --'])('rejects %p', (line) => {
    expect(detector.matches(line)).toBe(false);
  });
});

describe('TitleCaseHeadingDetector', () => {
  const detector = new TitleCaseHeadingDetector(config);

  it.each(['Budget Tips', 'Things to Do in Nice', 'Day 3 & Beyond'])(
    'accepts %p',
    (line) => {
      expect(detector.matches(line)).toBe(true);
    },
  );

  it.each([
    'Look for lunch menus',
    'Budget Tips.',
    'budget tips',
    'A Very Long Title With Far Too Many Words For Any Real Heading',
  ])('rejects %p', (line) => {
    expect(detector.matches(line)).toBe(false);
  });

  it('honours maxHeadingWords', () => {
    const strict = new TitleCaseHeadingDetector(
      createAnalyzerConfig({ maxHeadingWords: 2 }),
    );

    expect(strict.matches('Budget Tips')).toBe(true);
    expect(strict.matches('Budget Travel Tips')).toBe(false);
  });
});

describe('ColonHeadingDetector', () => {
  const detector = new ColonHeadingDetector(config);

  it.each(['What to pack:', 'Note:'])('accepts %p', (line) => {
    expect(detector.matches(line)).toBe(true);
  });

  it.each([
    'Here is a very long sentence that goes on and on until it ends:',
    ':',
    'Packing list',
  ])('rejects %p', (line) => {
    expect(detector.matches(line)).toBe(false);
  });
});

describe('BulletHeadingDetector', () => {
  const detector = new BulletHeadingDetector();

  it.each(['• Museums and Galleries', '- Getting Around', '* Day Trips', '•Markets'])(
    'accepts %p',
    (line) => {
      expect(detector.matches(line)).toBe(true);
    },
  );

  it.each([
    '- look for cheap menus',
    '- Eat early.',
    '-5 degrees at night',
    '• Book tables early because terraces fill up quickly in summer',
    'Museums',
  ])('rejects %p', (line) => {
    expect(detector.matches(line)).toBe(false);
  });
});
