/**
 * In-process stand-ins for the pipeline's collaborators
 */

import type {
  AcquiredSource,
  Acquirer,
  BookInput,
  Chunk,
  DocumentAssembler,
  RewriteRequest,
  Rewriter,
  TranscriptSegment,
} from '../src/pipeline/types';

export function seg(startSec: number, endSec: number, text: string): TranscriptSegment {
  return { startSec, endSec, text };
}

export function vtt(cues: Array<[string, string, string]>): string {
  const body = cues.map(([start, end, text]) => `${start} --> ${end}\n${text}`).join('\n\n');
  return `WEBVTT\n\n${body}\n`;
}

export function makeChunk(overrides: Partial<Chunk> = {}): Chunk {
  return {
    index: 0,
    captionText: 'the cat sat on the mat',
    transcribedText: 'the cat sad on the mat',
    captionsPresent: true,
    charBudget: 6000,
    startSec: 0,
    endSec: 5,
    segmentCount: 1,
    overlapSegments: 0,
    ...overrides,
  };
}

export class StubAcquirer implements Acquirer {
  calls: Array<{ videoId: string; workDir: string }> = [];

  constructor(private readonly source: (videoId: string) => Omit<AcquiredSource, 'videoId'>) {}

  async acquire(videoId: string, workDir: string): Promise<AcquiredSource> {
    this.calls.push({ videoId, workDir });
    return { videoId, ...this.source(videoId) };
  }
}

export class StubRewriter implements Rewriter {
  requests: RewriteRequest[] = [];

  constructor(private readonly answer: (req: RewriteRequest, call: number) => string | Promise<string>) {}

  async rewrite(req: RewriteRequest): Promise<string> {
    this.requests.push(req);
    return this.answer(req, this.requests.length);
  }
}

export class StubAssembler implements DocumentAssembler {
  books: BookInput[] = [];

  async write(book: BookInput): Promise<string> {
    this.books.push(book);
    return `/books/${book.videoId}.xhtml`;
  }
}
