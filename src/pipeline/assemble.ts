import { AssemblyError } from './errors';
import { debug } from './log';
import type { RewrittenChunk } from './types';

/** Trailing sentences of the text so far searched for restatements. */
export const OVERLAP_WINDOW_SENTENCES = 4;
export const MIN_CONTAINED_CHARS = 20;
export const MIN_FUZZY_WORDS = 4;
export const DICE_THRESHOLD = 0.85;

export interface SentenceSpan {
    text: string;
    start: number;
    end: number;
}

/** Sentences end at . ! ? (optionally closed by quotes/brackets) followed by whitespace. */
export function splitSentences(text: string): SentenceSpan[] {
    const spans: SentenceSpan[] = [];
    const boundary = /[.!?]+["'”’)\]]*\s+/g;
    let start = 0;
    for (const m of text.matchAll(boundary)) {
        const end = (m.index ?? 0) + m[0].trimEnd().length;
        spans.push({ text: text.slice(start, end), start, end });
        start = (m.index ?? 0) + m[0].length;
    }
    if (start < text.length) {
        const rest = text.slice(start).trimEnd();
        if (rest) spans.push({ text: rest, start, end: start + rest.length });
    }
    return spans;
}

export function normalizeForMatch(s: string): string {
    return s
        .toLowerCase()
        .replace(/[^\p{L}\p{N}]+/gu, ' ')
        .trim();
}

function diceCoefficient(a: string[], b: string[]): number {
    const counts = new Map<string, number>();
    for (const w of a) counts.set(w, (counts.get(w) ?? 0) + 1);
    let shared = 0;
    for (const w of b) {
        const n = counts.get(w) ?? 0;
        if (n > 0) {
            shared++;
            counts.set(w, n - 1);
        }
    }
    return (2 * shared) / (a.length + b.length);
}

/**
 * Whether `candidate`, a leading sentence of the next chunk, restates `previous`,
 * a sentence already assembled. Normalized text must be equal, or the candidate
 * (at least 20 characters) must be contained in `previous`, or both must have at
 * least 4 words with the candidate no longer than `previous` and a word Dice
 * coefficient of at least 0.85. A candidate that extends `previous` never matches.
 */
export function sentencesMatch(previous: string, candidate: string): boolean {
    const np = normalizeForMatch(previous);
    const nc = normalizeForMatch(candidate);
    if (!np || !nc) return false;
    if (np === nc) return true;
    if (nc.length >= MIN_CONTAINED_CHARS && np.includes(nc)) return true;
    const wp = np.split(' ');
    const wc = nc.split(' ');
    if (wp.length < MIN_FUZZY_WORDS || wc.length < MIN_FUZZY_WORDS || wc.length > wp.length) return false;
    return diceCoefficient(wp, wc) >= DICE_THRESHOLD;
}

/**
 * Drop the leading sentences of `next` that restate, in order, sentences among
 * the tail of `previous`. Returns `next` untouched when nothing matches.
 */
export function stripRestatedLead(previous: string, next: string): { text: string; dropped: number } {
    const tail = splitSentences(previous).slice(-OVERLAP_WINDOW_SENTENCES);
    const lead = splitSentences(next);
    let pos = 0;
    let dropped = 0;
    for (const sentence of lead.slice(0, OVERLAP_WINDOW_SENTENCES)) {
        let j = pos;
        while (j < tail.length && !sentencesMatch(tail[j].text, sentence.text)) j++;
        if (j >= tail.length) break;
        pos = j + 1;
        dropped++;
    }
    if (!dropped) return { text: next, dropped };
    const rest = dropped < lead.length ? next.slice(lead[dropped].start) : '';
    return { text: rest, dropped };
}

/**
 * Concatenate rewritten chunks in index order into one narrative, separated by
 * paragraph breaks, with restated overlap sentences removed. Degraded chunks are
 * assembled like any other; a missing index is an AssemblyError.
 */
export function assembleNarrative(chunks: RewrittenChunk[]): string {
    const ordered = [...chunks].sort((a, b) => a.index - b.index);
    ordered.forEach((c, i) => {
        if (c.index !== i) {
            throw new AssemblyError(`Rewritten chunk ${i} is missing`, {
                expected: i,
                found: c.index,
                total: ordered.length,
            });
        }
    });

    let narrative = '';
    for (const c of ordered) {
        let prose = c.prose.trim();
        if (!prose) continue;
        if (narrative) {
            const { text, dropped } = stripRestatedLead(narrative, prose);
            if (dropped) debug('assemble.overlap.strip', { idx: c.index, sentences: dropped });
            prose = text.trim();
            if (!prose) continue;
            narrative += '\n\n' + prose;
        } else {
            narrative = prose;
        }
    }
    return narrative;
}
