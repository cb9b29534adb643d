import { execa } from 'execa';
import fs from 'fs-extra';
import path from 'path';
import { ENV } from './env';
import { debug, info } from './log';
import { parseTimestamp } from './normalize';
import type { CallOptions, RawTranscript, Transcriber } from './types';

export interface AudioPiece {
    path: string;
    offsetSec: number;
}

/** Limits for one ffprobe/ffmpeg run; the signal kills the child process when aborted. */
export interface ProcessOptions {
    signal?: AbortSignal;
    timeoutMs?: number;
}

function execOptions(opts: ProcessOptions) {
    return { timeout: opts.timeoutMs ?? ENV.ffmpegTimeoutSec * 1000, cancelSignal: opts.signal };
}

export async function probeDuration(audioPath: string, opts: ProcessOptions = {}): Promise<number> {
    const probe = await execa(
        'ffprobe',
        [
            '-v',
            'error',
            '-show_entries',
            'format=duration',
            '-of',
            'default=noprint_wrappers=1:nokey=1',
            audioPath,
        ],
        execOptions(opts)
    );
    const parsed = parseFloat(probe.stdout);
    if (!Number.isFinite(parsed)) {
        throw new Error(`ffprobe could not determine duration for ${audioPath}. Raw output: ${probe.stdout}`);
    }
    return Math.max(0, parsed);
}

/**
 * Cut audio into pieces of about segmentSec without re-encoding. Stream copy
 * cuts on frame boundaries, so each piece's real duration is probed to place
 * the next one.
 */
export async function splitAudio(
    audioPath: string,
    outDir: string,
    segmentSec: number,
    opts: ProcessOptions = {}
): Promise<AudioPiece[]> {
    await fs.ensureDir(outDir);
    const ext = path.extname(audioPath) || '.mp3';
    try {
        await execa(
            'ffmpeg',
            [
                '-y',
                '-loglevel',
                'error',
                '-hide_banner',
                '-nostdin',
                '-i',
                audioPath,
                '-f',
                'segment',
                '-segment_time',
                String(Math.max(1, Math.floor(segmentSec))),
                '-c',
                'copy',
                path.join(outDir, `piece_%04d${ext}`),
            ],
            execOptions(opts)
        );
    } catch (e) {
        const msg = e instanceof Error ? e.message : String(e);
        throw new Error(`ffmpeg failed while splitting ${audioPath}. Underlying error: ${msg}`);
    }
    const files = (await fs.readdir(outDir)).filter((f) => f.startsWith('piece_') && f.endsWith(ext)).sort();
    const pieces: AudioPiece[] = [];
    let offsetSec = 0;
    for (const f of files) {
        const p = path.join(outDir, f);
        pieces.push({ path: p, offsetSec });
        offsetSec += await probeDuration(p, opts);
    }
    info('audio.split', { audioPath, pieces: pieces.length, durationSec: offsetSec });
    return pieces;
}

/** Join per-piece transcripts, shifting segment times by each piece's offset. */
export function mergeTranscripts(parts: Array<{ offsetSec: number; transcript: RawTranscript }>): RawTranscript {
    const text: string[] = [];
    const segments: NonNullable<RawTranscript['segments']> = [];
    let duration = 0;
    for (const { offsetSec, transcript } of parts) {
        if (transcript.text.trim()) text.push(transcript.text.trim());
        for (const s of transcript.segments ?? []) {
            const start = parseTimestamp(s.start) + offsetSec;
            const end = s.end === undefined ? start : parseTimestamp(s.end) + offsetSec;
            segments.push({ start, end, text: s.text });
        }
        duration = Math.max(duration, offsetSec + (transcript.duration ?? 0));
    }
    return { text: text.join(' '), duration, segments };
}

export interface SegmentedTranscriberOptions {
    /** Upload limit of the wrapped transcriber */
    maxBytes: number;
    segmentSec: number;
    /** Per ffprobe/ffmpeg run (defaults to FFMPEG_TIMEOUT_SEC) */
    timeoutSec?: number;
}

/** Sends audio over the upload limit to the wrapped transcriber piece by piece. */
export class SegmentedTranscriber implements Transcriber {
    constructor(private readonly inner: Transcriber, private readonly opts: SegmentedTranscriberOptions) {}

    async transcribe(audioPath: string, callOpts: CallOptions = {}): Promise<RawTranscript> {
        const { size } = await fs.stat(audioPath);
        if (size <= this.opts.maxBytes) {
            return this.inner.transcribe(audioPath, callOpts);
        }
        info('audio.split.needed', { audioPath, bytes: size, maxBytes: this.opts.maxBytes });
        const piecesDir = `${audioPath}.pieces`;
        try {
            const pieces = await splitAudio(audioPath, piecesDir, this.opts.segmentSec, {
                signal: callOpts.signal,
                timeoutMs: (this.opts.timeoutSec ?? ENV.ffmpegTimeoutSec) * 1000,
            });
            const parts: Array<{ offsetSec: number; transcript: RawTranscript }> = [];
            for (const [i, piece] of pieces.entries()) {
                debug('audio.piece.transcribe', { idx: i, total: pieces.length });
                parts.push({ offsetSec: piece.offsetSec, transcript: await this.inner.transcribe(piece.path, callOpts) });
            }
            return mergeTranscripts(parts);
        } finally {
            await fs.remove(piecesDir);
        }
    }
}
