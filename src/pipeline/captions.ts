import type { RawSegment } from './types';

const TIMING_RE = /^\s*(\S+)\s+-->\s+(\S+)/;

const ENTITIES: Array<[RegExp, string]> = [
    [/&nbsp;/g, ' '],
    [/&lt;/g, '<'],
    [/&gt;/g, '>'],
    [/&quot;/g, '"'],
    [/&#39;/g, "'"],
    [/&amp;/g, '&'],
];

function stripMarkup(line: string): string {
    let out = line.replace(/<[^>]*>/g, '');
    for (const [re, ch] of ENTITIES) out = out.replace(re, ch);
    return out.replace(/\s+/g, ' ').trim();
}

/**
 * Parse a WebVTT (or SRT) caption file into timed cues.
 *
 * Everything that is not a timing line or the text under one is ignored: the
 * WEBVTT header, NOTE/STYLE/REGION blocks, cue identifiers and SRT counters.
 * Inline tags such as `<c>` and `<00:00:01.500>` are stripped. Auto-generated
 * captions roll each line through two or three cues, so a line equal to the last
 * emitted one is dropped, and so is a cue left with no text.
 */
export function parseCaptions(content: string): RawSegment[] {
    const lines = content.replace(/^\uFEFF/, '').split(/\r?\n/);
    const cues: RawSegment[] = [];
    let lastLine = '';
    let i = 0;
    while (i < lines.length) {
        const timing = lines[i].match(TIMING_RE);
        i++;
        if (!timing) continue;
        const text: string[] = [];
        while (i < lines.length && lines[i].trim() !== '') {
            const cleaned = stripMarkup(lines[i]);
            if (cleaned && cleaned !== lastLine) {
                text.push(cleaned);
                lastLine = cleaned;
            }
            i++;
        }
        if (text.length) cues.push({ start: timing[1], end: timing[2], text: text.join(' ') });
    }
    return cues;
}
