import { describe, it, expect } from 'vitest';
import { chunkTranscripts } from '../src/pipeline/chunk';
import { MalformedInputError } from '../src/pipeline/errors';
import { seg } from './helpers';

const numbered = (n: number) => Array.from({ length: n }, (_, i) => seg(i, i + 1, `segment-${i}`));

describe('chunkTranscripts', () => {
  it('should close a chunk when the next segment would exceed the budget', () => {
    const chunks = chunkTranscripts(
      { captions: null, transcribed: numbered(6) },
      { charBudget: 20, overlapSegments: 0 }
    );
    expect(chunks.map((c) => c.transcribedText)).toEqual([
      'segment-0 segment-1',
      'segment-2 segment-3',
      'segment-4 segment-5',
    ]);
    expect(chunks.map((c) => c.index)).toEqual([0, 1, 2]);
    expect(chunks.every((c) => c.overlapSegments === 0)).toBe(true);
  });

  it('should repeat trailing segments at the start of the next chunk', () => {
    const chunks = chunkTranscripts(
      { captions: null, transcribed: numbered(6) },
      { charBudget: 20, overlapSegments: 1 }
    );
    expect(chunks.map((c) => c.transcribedText)).toEqual([
      'segment-0 segment-1',
      'segment-1 segment-2',
      'segment-2 segment-3',
      'segment-3 segment-4',
      'segment-4 segment-5',
    ]);
    expect(chunks.map((c) => c.overlapSegments)).toEqual([0, 1, 1, 1, 1]);
  });

  it('should cover every segment once outside the overlap, within budget', () => {
    const words = Array.from({ length: 20 }, (_, i) => `w${i}`);
    const chunks = chunkTranscripts(
      { captions: null, transcribed: words.map((w, i) => seg(i, i + 1, w)) },
      { charBudget: 12, overlapSegments: 2 }
    );
    const covered: string[] = [];
    for (const c of chunks) {
      expect((c.transcribedText ?? '').length).toBeLessThanOrEqual(12);
      covered.push(...(c.transcribedText ?? '').split(' ').slice(c.overlapSegments));
    }
    expect(covered).toEqual(words);
  });

  it('should give an over-budget segment a chunk of its own', () => {
    const long = 'x'.repeat(50);
    const chunks = chunkTranscripts(
      { captions: null, transcribed: [seg(0, 1, 'short'), seg(1, 2, long), seg(2, 3, 'tail')] },
      { charBudget: 20, overlapSegments: 1 }
    );
    expect(chunks.map((c) => c.transcribedText)).toEqual(['short', long, 'tail']);
    expect(chunks.map((c) => c.overlapSegments)).toEqual([0, 0, 0]);
    expect(chunks[1].charBudget).toBe(20);
  });

  it('should slice captions to the time range of each chunk', () => {
    const chunks = chunkTranscripts(
      {
        transcribed: [seg(0, 5, 'alpha'), seg(5, 10, 'beta'), seg(10, 15, 'gamma')],
        captions: [seg(0, 2, 'a1'), seg(3, 6, 'a2'), seg(6, 9, 'b1'), seg(11, 14, 'c1')],
      },
      { charBudget: 10, overlapSegments: 0 }
    );
    expect(chunks).toEqual([
      {
        index: 0,
        captionText: 'a1 a2 b1',
        transcribedText: 'alpha beta',
        captionsPresent: true,
        charBudget: 10,
        startSec: 0,
        endSec: 10,
        segmentCount: 2,
        overlapSegments: 0,
      },
      {
        index: 1,
        captionText: 'c1',
        transcribedText: 'gamma',
        captionsPresent: true,
        charBudget: 10,
        startSec: 10,
        endSec: 15,
        segmentCount: 1,
        overlapSegments: 0,
      },
    ]);
  });

  it('should chunk captions alone when there is no transcription', () => {
    const [chunk] = chunkTranscripts(
      { captions: [seg(0, 1, 'hello'), seg(1, 2, 'world')], transcribed: null },
      { charBudget: 6000, overlapSegments: 2 }
    );
    expect(chunk.captionText).toBe('hello world');
    expect(chunk.transcribedText).toBeNull();
    expect(chunk.captionsPresent).toBe(true);
  });

  it('should mark captions absent when only the transcription exists', () => {
    const [chunk] = chunkTranscripts(
      { captions: null, transcribed: [seg(0, 1, 'hello'), seg(1, 2, 'world')] },
      { charBudget: 6000, overlapSegments: 2 }
    );
    expect(chunk.captionText).toBe('hello world');
    expect(chunk.transcribedText).toBe('hello world');
    expect(chunk.captionsPresent).toBe(false);
  });

  it('should refuse to chunk without any variant', () => {
    expect(() => chunkTranscripts({ captions: null, transcribed: null }, { charBudget: 100, overlapSegments: 0 })).toThrow(
      MalformedInputError
    );
  });
});
