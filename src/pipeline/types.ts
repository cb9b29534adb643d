export type ISO8601 = string;

export type VariantKind = 'captions' | 'transcribed';

/** Timed text as it comes out of a caption file or a transcription response. */
export interface RawSegment {
  start: number | string;
  end?: number | string;
  text: string;
}

export interface RawTranscript {
  text: string;
  /** Duration of the transcribed audio in seconds, when the service reports it. */
  duration?: number;
  segments?: RawSegment[];
}

export interface TranscriptSegment {
  readonly startSec: number;
  readonly endSec: number;
  readonly text: string;
}

export interface VariantSet {
  captions: TranscriptSegment[] | null;
  transcribed: TranscriptSegment[] | null;
}

export interface Chunk {
  index: number;
  /** Caption text for the chunk's time range, or the transcribed text when captions are absent. */
  captionText: string;
  transcribedText: string | null;
  captionsPresent: boolean;
  charBudget: number;
  startSec: number;
  endSec: number;
  segmentCount: number;
  /** Leading segments repeated from the previous chunk. */
  overlapSegments: number;
}

export interface DegradedChunk {
  index: number;
  reason: string;
  attempts: number;
}

export interface RewrittenChunk {
  index: number;
  prose: string;
  attempts: number;
  degraded: DegradedChunk | null;
}

export interface BionicToken {
  word: string;
  /** Characters of the core, counted from `coreStart`, rendered emphasized. */
  boldPrefixLength: number;
  coreStart: number;
  coreEnd: number;
  /** Whitespace between this word and the next one (or the end of the text). */
  separator: string;
}

export interface BionicDocument {
  leading: string;
  tokens: BionicToken[];
}

export type VideoStatus = 'success' | 'degraded' | 'failed';

export interface VideoOutcome {
  videoId: string;
  title: string | null;
  status: VideoStatus;
  reason: string | null;
  chunkCount: number;
  degradedChunks: DegradedChunk[];
  outputPath: string | null;
  durationMs: number;
}

// Collaborators

export interface AcquiredSource {
  videoId: string;
  title: string;
  /** Caption file contents (WebVTT), null when the platform had none. */
  captions: string | null;
  audioPath: string | null;
}

export interface Acquirer {
  acquire(videoId: string, workDir: string): Promise<AcquiredSource>;
}

export interface CallOptions {
  signal?: AbortSignal;
}

export interface Transcriber {
  transcribe(audioPath: string, opts?: CallOptions): Promise<RawTranscript>;
}

export interface RewriteRequest {
  system: string;
  prompt: string;
}

export interface Rewriter {
  rewrite(req: RewriteRequest, opts?: CallOptions): Promise<string>;
}

export interface BookInput {
  videoId: string;
  title: string;
  document: BionicDocument;
  status: VideoStatus;
  degradedChunks: DegradedChunk[];
  createdAt: ISO8601;
}

export interface DocumentAssembler {
  /** Returns the path of the written document. */
  write(book: BookInput): Promise<string>;
}
