import fs from 'fs-extra';
import path from 'path';
import { assembleNarrative } from './assemble';
import { bionicTokenize } from './bionic';
import { parseCaptions } from './captions';
import { chunkTranscripts, type ChunkOptions } from './chunk';
import { ENV } from './env';
import { MalformedInputError } from './errors';
import type { ConcurrencyGate } from './gate';
import { toVideoId } from './ids';
import { debug, error, errorMessage, info, warn } from './log';
import { normalizeSegments, normalizeTranscription } from './normalize';
import { reconcileChunks } from './reconcile';
import { withTimeout, type RetryConfig } from './retry';
import type {
  Acquirer,
  DocumentAssembler,
  RawTranscript,
  Rewriter,
  TranscriptSegment,
  Transcriber,
  VideoOutcome,
} from './types';

export interface PipelineDeps {
  acquirer: Acquirer;
  /** Absent when no speech-to-text capability is configured; the transcribed variant is then absent too */
  transcriber?: Transcriber;
  rewriter: Rewriter;
  assembler: DocumentAssembler;
  gate?: ConcurrencyGate;
}

export interface RunPipelineOptions {
  artifactsRoot?: string;
  chunk?: Partial<ChunkOptions>;
  retry?: Partial<RetryConfig>;
  rewriteTimeoutMs?: number;
  transcribeTimeoutMs?: number;
  lookbackChars?: number;
  keepAudio?: boolean;
}

async function transcribeVariant(
  videoId: string,
  audioPath: string,
  transcriber: Transcriber,
  timeoutMs: number
): Promise<TranscriptSegment[] | null> {
  let raw: RawTranscript;
  try {
    raw = await withTimeout((signal) => transcriber.transcribe(audioPath, { signal }), timeoutMs, 'transcription');
  } catch (e) {
    // A failed transcription leaves only the captions; not fatal
    warn('run.transcribe.fail', { videoId, error: errorMessage(e) });
    return null;
  }
  return normalizeTranscription(raw);
}

/**
 * Convert one video into a bionic document. Never throws: every failure is
 * reported as a `failed` outcome so a batch can carry on.
 */
export async function convertVideo(
  videoOrUrl: string,
  deps: PipelineDeps,
  opts: RunPipelineOptions = {}
): Promise<VideoOutcome> {
  const videoId = toVideoId(videoOrUrl);
  const startTs = Date.now();
  const outcome: VideoOutcome = {
    videoId,
    title: null,
    status: 'failed',
    reason: null,
    chunkCount: 0,
    degradedChunks: [],
    outputPath: null,
    durationMs: 0,
  };
  const workDir = path.resolve(opts.artifactsRoot ?? ENV.artifactsRoot, videoId);
  let audioPath: string | null = null;

  try {
    info('run.start', { videoId });
    const source = await deps.acquirer.acquire(videoId, workDir);
    const title = source.title;
    outcome.title = title;
    audioPath = source.audioPath;

    const captions = source.captions !== null ? normalizeSegments('captions', parseCaptions(source.captions)) : null;
    let transcribed: TranscriptSegment[] | null = null;
    if (source.audioPath && deps.transcriber) {
      transcribed = await transcribeVariant(
        videoId,
        source.audioPath,
        deps.transcriber,
        opts.transcribeTimeoutMs ?? ENV.transcribeTimeoutSec * 1000
      );
    }
    if (!captions && !transcribed) {
      throw new MalformedInputError(`No transcript variant available for ${videoId}`);
    }
    debug('run.variants', {
      videoId,
      captions: captions?.length ?? null,
      transcribed: transcribed?.length ?? null,
    });

    const chunks = chunkTranscripts(
      { captions, transcribed },
      {
        charBudget: opts.chunk?.charBudget ?? ENV.charBudget,
        overlapSegments: opts.chunk?.overlapSegments ?? ENV.overlapSegments,
      }
    );
    outcome.chunkCount = chunks.length;

    const rewritten = await reconcileChunks(chunks, {
      rewriter: deps.rewriter,
      gate: deps.gate,
      retry: {
        maxAttempts: ENV.rewriteAttempts,
        initialDelay: ENV.retryBaseMs,
        maxDelay: ENV.retryMaxMs,
        ...opts.retry,
      },
      timeoutMs: opts.rewriteTimeoutMs ?? ENV.rewriteTimeoutSec * 1000,
      lookbackChars: opts.lookbackChars ?? ENV.lookbackChars,
    });
    for (const r of rewritten) {
      if (r.degraded) outcome.degradedChunks.push(r.degraded);
    }

    const narrative = assembleNarrative(rewritten);
    const document = bionicTokenize(narrative);
    outcome.status = outcome.degradedChunks.length ? 'degraded' : 'success';
    if (outcome.status === 'degraded') {
      outcome.reason = `${outcome.degradedChunks.length} of ${chunks.length} chunks fell back to raw transcript text`;
    }
    outcome.outputPath = await deps.assembler.write({
      videoId,
      title,
      document,
      status: outcome.status,
      degradedChunks: outcome.degradedChunks,
      createdAt: new Date().toISOString(),
    });
  } catch (e) {
    outcome.status = 'failed';
    outcome.reason = e instanceof Error ? `${e.name}: ${e.message}` : String(e);
    error('run.fail', { videoId, reason: outcome.reason });
  } finally {
    if (audioPath && !(opts.keepAudio ?? ENV.keepAudio)) {
      try {
        await fs.remove(audioPath);
      } catch (e) {
        warn('run.cleanup.fail', { videoId, audioPath, error: errorMessage(e) });
      }
    }
  }

  outcome.durationMs = Date.now() - startTs;
  info('run.complete', {
    videoId,
    status: outcome.status,
    chunks: outcome.chunkCount,
    degraded: outcome.degradedChunks.length,
    durationMs: outcome.durationMs,
  });
  return outcome;
}
