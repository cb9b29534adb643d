import { MalformedInputError } from './errors';
import { debug, info } from './log';
import type { Chunk, TranscriptSegment, VariantSet } from './types';

export interface ChunkOptions {
    /** Maximum characters of the boundary-choosing variant per chunk */
    charBudget: number;
    /** Trailing segments of a closed chunk repeated at the start of the next one */
    overlapSegments: number;
}

interface SegmentRange {
    from: number;
    to: number;
    overlap: number;
}

function joinedLength(segments: TranscriptSegment[], from: number, to: number): number {
    let n = 0;
    for (let j = from; j < to; j++) n += segments[j].text.length + (j > from ? 1 : 0);
    return n;
}

function joinText(segments: TranscriptSegment[], from: number, to: number): string {
    return segments.slice(from, to).map((s) => s.text).join(' ');
}

/** Group segment indices into [from, to) windows that fit the budget, seeding each with the overlap. */
function planRanges(segments: TranscriptSegment[], budget: number, overlap: number): SegmentRange[] {
    const ranges: SegmentRange[] = [];
    let from = 0;
    let seeded = 0;
    let len = 0;
    for (let i = 0; i < segments.length; i++) {
        const segLen = segments[i].text.length;
        const hasNew = i - from > seeded;
        if (hasNew && len + 1 + segLen > budget) {
            ranges.push({ from, to: i, overlap: seeded });
            // Shrink the overlap until it leaves room for the next new segment
            let k = Math.min(overlap, i - from);
            while (k > 0 && joinedLength(segments, i - k, i) + 1 + segLen > budget) k--;
            from = i - k;
            seeded = k;
            len = joinedLength(segments, from, i);
        }
        // An over-budget segment is never split: it forms a chunk on its own
        len = i > from ? len + 1 + segLen : segLen;
    }
    if (segments.length) ranges.push({ from, to: segments.length, overlap: seeded });
    return ranges;
}

/** Index of the primary segment with the greatest start at or before t (0 when none). */
function ownerOf(primary: TranscriptSegment[], t: number): number {
    let lo = 0;
    let hi = primary.length - 1;
    let found = 0;
    while (lo <= hi) {
        const mid = (lo + hi) >> 1;
        if (primary[mid].startSec <= t) {
            found = mid;
            lo = mid + 1;
        } else {
            hi = mid - 1;
        }
    }
    return found;
}

/**
 * Split the variants of one video into rewrite-sized chunks.
 *
 * Boundaries follow the higher-trust variant (transcribed, else captions). Each
 * caption segment belongs to the primary segment in force at its midpoint, so the
 * caption text of a chunk covers the same time range as its primary text.
 */
export function chunkTranscripts(variants: VariantSet, opts: ChunkOptions): Chunk[] {
    const primary = variants.transcribed ?? variants.captions;
    if (!primary) {
        throw new MalformedInputError('No transcript variant available to chunk');
    }
    const secondary = variants.transcribed ? variants.captions : null;
    const charBudget = Math.max(1, Math.floor(opts.charBudget));
    const overlap = Math.max(0, Math.floor(opts.overlapSegments));

    let captionBuckets: string[][] | null = null;
    if (secondary) {
        const buckets: string[][] = primary.map(() => []);
        for (const s of secondary) {
            buckets[ownerOf(primary, (s.startSec + s.endSec) / 2)].push(s.text);
        }
        captionBuckets = buckets;
    }

    const chunks = planRanges(primary, charBudget, overlap).map((r, index): Chunk => {
        const primaryText = joinText(primary, r.from, r.to);
        let captionText = primaryText;
        if (captionBuckets) {
            captionText = captionBuckets.slice(r.from, r.to).flat().join(' ');
        }
        let endSec = 0;
        for (let j = r.from; j < r.to; j++) endSec = Math.max(endSec, primary[j].endSec);
        return {
            index,
            captionText,
            transcribedText: variants.transcribed ? primaryText : null,
            captionsPresent: variants.captions !== null,
            charBudget,
            startSec: primary[r.from].startSec,
            endSec,
            segmentCount: r.to - r.from,
            overlapSegments: r.overlap,
        };
    });

    for (const c of chunks) {
        if (overlap > 0 && c.overlapSegments === 0 && c.index > 0) {
            debug('chunk.overlap.dropped', { index: c.index, charBudget });
        }
    }
    info('chunk.complete', {
        count: chunks.length,
        primary: variants.transcribed ? 'transcribed' : 'captions',
        segments: primary.length,
        charBudget,
        overlap,
    });
    return chunks;
}
