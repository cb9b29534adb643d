import { describe, it, expect } from 'vitest';
import { MalformedInputError } from '../src/pipeline/errors';
import {
  cleanText,
  normalizeSegments,
  normalizeTranscription,
  parseTimestamp,
} from '../src/pipeline/normalize';
import type { RawSegment } from '../src/pipeline/types';

describe('parseTimestamp', () => {
  it('should parse hours, minutes and seconds', () => {
    expect(parseTimestamp('00:01:02.500')).toBe(62.5);
    expect(parseTimestamp('1:02:03,250')).toBe(3723.25);
  });

  it('should read a single colon as minutes', () => {
    expect(parseTimestamp('01:30,250')).toBe(90.25);
  });

  it('should accept bare seconds', () => {
    expect(parseTimestamp('12.5')).toBe(12.5);
    expect(parseTimestamp('125')).toBe(125);
    expect(parseTimestamp(7)).toBe(7);
  });

  it('should reject garbage', () => {
    expect(() => parseTimestamp('abc')).toThrow(MalformedInputError);
    expect(() => parseTimestamp(Number.NaN)).toThrow(MalformedInputError);
  });
});

describe('cleanText', () => {
  it('should strip control characters, annotations and speaker markers', () => {
    expect(cleanText('Hello\u0007  [Music]  world >> again\n')).toBe('Hello world again');
  });

  it('should delete format characters without splitting words', () => {
    expect(cleanText('hy\u00ADphen\u00ADated \uFEFFword')).toBe('hyphenated word');
  });

  it('should keep zero-width joiners inside emoji sequences', () => {
    const family = '\u{1F468}\u200D\u{1F469}\u200D\u{1F467}';
    expect(cleanText(`we ${family} travel`)).toBe(`we ${family} travel`);
  });
});

describe('normalizeSegments', () => {
  it('should clean, clamp and order segments', () => {
    const raw: RawSegment[] = [
      { start: '00:00:05.000', end: '00:00:06.000', text: 'second' },
      { start: 1, end: 0.5, text: 'first' },
      { start: -2, text: ' zero ' },
      { start: 3, end: 4, text: '[Music]' },
    ];
    expect(normalizeSegments('captions', raw)).toEqual([
      { startSec: 0, endSec: 0, text: 'zero' },
      { startSec: 1, endSec: 1, text: 'first' },
      { startSec: 5, endSec: 6, text: 'second' },
    ]);
  });

  it('should keep source order for equal start times', () => {
    const out = normalizeSegments('captions', [
      { start: 2, end: 3, text: 'b' },
      { start: 1, end: 2, text: 'a' },
      { start: 2, end: 4, text: 'c' },
    ]);
    expect(out.map((s) => s.text)).toEqual(['a', 'b', 'c']);
  });

  it('should produce non-decreasing start times for shuffled input', () => {
    let state = 42;
    const rand = () => {
      state = (state * 1103515245 + 12345) % 2147483648;
      return state / 2147483648;
    };
    for (let run = 0; run < 20; run++) {
      const raw: RawSegment[] = Array.from({ length: 30 }, (_, i) => ({
        start: Math.round(rand() * 1000) / 10,
        end: Math.round(rand() * 1000) / 10,
        text: `word${i}`,
      }));
      const out = normalizeSegments('transcribed', raw);
      expect(out).toHaveLength(30);
      for (let i = 1; i < out.length; i++) {
        expect(out[i].startSec).toBeGreaterThanOrEqual(out[i - 1].startSec);
        expect(out[i].endSec).toBeGreaterThanOrEqual(out[i].startSec);
      }
    }
  });

  it('should freeze segments', () => {
    const [first] = normalizeSegments('captions', [{ start: 0, end: 1, text: 'x' }]);
    expect(Object.isFrozen(first)).toBe(true);
  });

  it('should fail when nothing is left', () => {
    expect(() => normalizeSegments('captions', [{ start: 0, text: '  [Applause] ' }])).toThrow(MalformedInputError);
    expect(() => normalizeSegments('captions', [])).toThrow('The captions variant produced no segments');
  });
});

describe('normalizeTranscription', () => {
  it('should use timed segments when present', () => {
    const out = normalizeTranscription({
      text: 'ignored here',
      segments: [{ start: 0, end: 2.5, text: ' Hello  there ' }],
    });
    expect(out).toEqual([{ startSec: 0, endSec: 2.5, text: 'Hello there' }]);
  });

  it('should fall back to a single segment spanning the audio', () => {
    expect(normalizeTranscription({ text: ' Hello there ', duration: 12 })).toEqual([
      { startSec: 0, endSec: 12, text: 'Hello there' },
    ]);
  });

  it('should fail on an empty transcription', () => {
    expect(() => normalizeTranscription({ text: '' })).toThrow(MalformedInputError);
  });
});
