import type { BionicDocument, BionicToken } from './types';

/** Share of a word's letters rendered emphasized. */
export const FIXATION_RATIO = 0.5;

const LETTER_OR_DIGIT = /[\p{L}\p{N}]/u;
const MARK = /\p{M}/u;

export interface Fixation {
    coreStart: number;
    coreEnd: number;
    boldPrefixLength: number;
}

/**
 * Fixation of a single whitespace-free word. The core runs from the first to
 * the last letter/digit; ceil(n * ratio) of its n letters/digits (at least one)
 * are emphasized, and boldPrefixLength is the span of core characters covering
 * them, any combining marks on the last one included.
 */
export function fixation(word: string): Fixation {
    const chars = Array.from(word);
    let first = -1;
    let last = -1;
    chars.forEach((ch, i) => {
        if (LETTER_OR_DIGIT.test(ch)) {
            if (first < 0) first = i;
            last = i;
        }
    });
    if (first < 0) return { coreStart: 0, coreEnd: 0, boldPrefixLength: 0 };

    // Trailing combining marks belong to the core
    while (last + 1 < chars.length && MARK.test(chars[last + 1])) last++;

    const offset = (n: number) => chars.slice(0, n).join('').length;
    const core = chars.slice(first, last + 1);
    const letters = core.filter((ch) => LETTER_OR_DIGIT.test(ch)).length;
    const target = Math.max(1, Math.ceil(letters * FIXATION_RATIO));

    let seen = 0;
    let taken = 0;
    while (taken < core.length && seen < target) {
        if (LETTER_OR_DIGIT.test(core[taken])) seen++;
        taken++;
    }
    while (taken < core.length && MARK.test(core[taken])) taken++;

    return {
        coreStart: offset(first),
        coreEnd: offset(last + 1),
        boldPrefixLength: core.slice(0, taken).join('').length,
    };
}

/** Split a narrative into bionic tokens, keeping every whitespace run. */
export function bionicTokenize(narrative: string): BionicDocument {
    const matches = [...narrative.matchAll(/\S+/g)];
    const leading = matches.length ? narrative.slice(0, matches[0].index ?? 0) : narrative;
    const tokens: BionicToken[] = matches.map((m, i) => {
        const word = m[0];
        const end = (m.index ?? 0) + word.length;
        const nextStart = i + 1 < matches.length ? matches[i + 1].index ?? end : narrative.length;
        return { word, ...fixation(word), separator: narrative.slice(end, nextStart) };
    });
    return { leading, tokens };
}

export function reconstructNarrative(doc: BionicDocument): string {
    return doc.leading + doc.tokens.map((t) => t.word + t.separator).join('');
}
