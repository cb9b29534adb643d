import { describe, it, expect } from 'vitest';
import { bionicTokenize, fixation, reconstructNarrative } from '../src/pipeline/bionic';

describe('fixation', () => {
  it('should emphasize half the letters, rounded up', () => {
    expect(fixation('reading').boldPrefixLength).toBe(4);
    expect(fixation('The').boldPrefixLength).toBe(2);
    expect(fixation('AI').boldPrefixLength).toBe(1);
    expect(fixation('a').boldPrefixLength).toBe(1);
    expect(fixation('2024').boldPrefixLength).toBe(2);
  });

  it('should leave surrounding punctuation outside the core', () => {
    expect(fixation('mat.')).toEqual({ coreStart: 0, coreEnd: 3, boldPrefixLength: 2 });
    expect(fixation('"Hello,')).toEqual({ coreStart: 1, coreEnd: 6, boldPrefixLength: 3 });
  });

  it('should count only letters inside the core', () => {
    expect(fixation("don't").boldPrefixLength).toBe(2);
    expect(fixation('e-mail').boldPrefixLength).toBe(4);
  });

  it('should keep combining marks with their letter', () => {
    expect(fixation('e\u0301te')).toEqual({ coreStart: 0, coreEnd: 4, boldPrefixLength: 3 });
  });

  it('should emphasize nothing in a word without letters or digits', () => {
    expect(fixation('—')).toEqual({ coreStart: 0, coreEnd: 0, boldPrefixLength: 0 });
    expect(fixation('...')).toEqual({ coreStart: 0, coreEnd: 0, boldPrefixLength: 0 });
  });
});

describe('bionicTokenize', () => {
  it('should fixate every word of a sentence', () => {
    const doc = bionicTokenize('The cat sat on the mat.');
    expect(doc.tokens.map((t) => t.word)).toEqual(['The', 'cat', 'sat', 'on', 'the', 'mat.']);
    expect(doc.tokens.map((t) => t.boldPrefixLength)).toEqual([2, 2, 2, 1, 2, 2]);
  });

  it('should keep every whitespace run', () => {
    const text = '  Hello,\tworld!\n\nNew para ';
    const doc = bionicTokenize(text);
    expect(doc.leading).toBe('  ');
    expect(doc.tokens.map((t) => [t.word, t.separator])).toEqual([
      ['Hello,', '\t'],
      ['world!', '\n\n'],
      ['New', ' '],
      ['para', ' '],
    ]);
    expect(reconstructNarrative(doc)).toBe(text);
  });

  it('should reconstruct the narrative exactly', () => {
    const samples = [
      '',
      '   ',
      'single',
      'Café au lait — 3.5 km, “quoted” text.\n\nNext paragraph.',
      'naïve coöperation non-breaking',
      '日本語 の テキスト',
    ];
    for (const s of samples) {
      expect(reconstructNarrative(bionicTokenize(s))).toBe(s);
    }
  });

  it('should give the same word the same fixation', () => {
    const doc = bionicTokenize('word word word');
    expect(new Set(doc.tokens.map((t) => t.boldPrefixLength)).size).toBe(1);
  });
});
