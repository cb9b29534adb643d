import { MalformedInputError } from './errors';
import type { RawSegment, RawTranscript, TranscriptSegment, VariantKind } from './types';

const TIMESTAMP_RE = /^(?:(\d+):)?(?:(\d{1,2}):)?(\d+(?:[.,]\d+)?)$/;

/** Seconds from a number or an `hh:mm:ss.mmm` / `mm:ss,mmm` / `ss.mmm` string. */
export function parseTimestamp(value: number | string): number {
    if (typeof value === 'number') {
        if (!Number.isFinite(value)) throw new MalformedInputError(`Invalid timestamp: ${value}`);
        return value;
    }
    const m = value.trim().match(TIMESTAMP_RE);
    if (!m) throw new MalformedInputError(`Invalid timestamp: "${value}"`);
    // With a single colon the leading group is minutes, not hours
    const [hours, minutes] = m[2] === undefined ? [0, Number(m[1] ?? 0)] : [Number(m[1]), Number(m[2])];
    const seconds = Number(m[3].replace(',', '.'));
    return hours * 3600 + minutes * 60 + seconds;
}

/**
 * Canonical segment text: control characters, non-speech annotations ("[Music]")
 * and ">>" speaker markers removed, whitespace runs collapsed. Invisible format
 * characters are deleted in place, except the zero-width joiners that hold emoji
 * and script sequences together.
 */
export function cleanText(text: string): string {
    return text
        .replace(/\p{Cc}/gu, ' ')
        .replace(/(?![\u200C\u200D])\p{Cf}/gu, '')
        .replace(/\[[^\]]*\]/g, ' ')
        .replace(/>>+/g, ' ')
        .replace(/\s+/g, ' ')
        .trim();
}

export function normalizeSegments(kind: VariantKind, raw: RawSegment[]): TranscriptSegment[] {
    const segments: TranscriptSegment[] = [];
    for (const r of raw) {
        const text = cleanText(r.text);
        if (!text) continue;
        const startSec = Math.max(0, parseTimestamp(r.start));
        const endSec = Math.max(startSec, r.end === undefined ? startSec : parseTimestamp(r.end));
        segments.push(Object.freeze({ startSec, endSec, text }));
    }
    if (!segments.length) {
        throw new MalformedInputError(`The ${kind} variant produced no segments`, { kind, rawCount: raw.length });
    }
    // Array#sort is stable: equal start times keep their source order
    return segments.sort((a, b) => a.startSec - b.startSec);
}

/** Transcription responses carry timed segments when asked for verbose output; plain text becomes one segment. */
export function normalizeTranscription(raw: RawTranscript): TranscriptSegment[] {
    if (raw.segments && raw.segments.length) {
        return normalizeSegments('transcribed', raw.segments);
    }
    return normalizeSegments('transcribed', [{ start: 0, end: raw.duration ?? 0, text: raw.text }]);
}
