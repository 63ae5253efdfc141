import { HeadingRule } from '../types';
import { createHeadingClassifier } from '../../../../testing/factories';

describe('HeadingClassifier', () => {
  it('prefers the highest priority rule', () => {
    const classifier = createHeadingClassifier();

    expect(classifier.classify('1. INTRODUCTION')).toEqual({
      kind: 'numbered',
      priority: 40,
    });
    expect(classifier.classify('INTRODUCTION')).toEqual({
      kind: 'all-caps',
      priority: 30,
    });
    expect(classifier.classify('Budget Tips')).toEqual({
      kind: 'title-case',
      priority: 20,
    });
    expect(classifier.classify('what to pack:')).toEqual({
      kind: 'colon',
      priority: 10,
    });
  });

  it('returns null for body text and blank lines', () => {
    const classifier = createHeadingClassifier();

    expect(
      classifier.classify(
        'Look for lunch menus which are significantly cheaper than dinner.',
      ),
    ).toBeNull();
    expect(classifier.classify('')).toBeNull();
    expect(classifier.classify('   ')).toBeNull();
  });

  it('trims lines before classifying', () => {
    const classifier = createHeadingClassifier();

    expect(classifier.classify('   BUDGET TIPS  ')).toEqual({
      kind: 'all-caps',
      priority: 30,
    });
  });

  it('rejects lines longer than maxHeadingLength', () => {
    const classifier = createHeadingClassifier({ maxHeadingLength: 20 });

    expect(classifier.classify('INTRODUCTION TO THE CITY OF LIGHTS')).toBeNull();
    expect(classifier.classify('INTRODUCTION')).not.toBeNull();
  });

  it('accepts additional rules without touching the built-in ones', () => {
    const arrowRule: HeadingRule = {
      kind: 'arrow',
      priority: 50,
      matches: (line) => line.startsWith('→ '),
    };
    const classifier = createHeadingClassifier({}, [arrowRule]);

    expect(classifier.classify('→ Packing')).toEqual({
      kind: 'arrow',
      priority: 50,
    });
    expect(classifier.classify('INTRODUCTION')?.kind).toBe('all-caps');
  });

  it('ranks a bulleted lead-in below every other built-in rule', () => {
    const classifier = createHeadingClassifier();

    expect(classifier.classify('- Getting Around')).toEqual({
      kind: 'bullet',
      priority: 5,
    });
    expect(classifier.classify('• MUSEUMS')?.kind).toBe('all-caps');
  });

  it('keeps registration order for equal priorities', () => {
    const first: HeadingRule = {
      kind: 'first',
      priority: 30,
      matches: () => true,
    };
    const classifier = createHeadingClassifier({}, [first]);

    // all-caps was registered before "first"
    expect(classifier.classify('INTRODUCTION')?.kind).toBe('all-caps');
    expect(classifier.classify('lower case line')?.kind).toBe('first');
  });
});
