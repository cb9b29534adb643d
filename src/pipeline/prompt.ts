import type { Chunk, RewriteRequest } from './types';

export const SYNTHESIS_SYSTEM =
    'You are a professional editor who merges imperfect transcripts of the same recording into polished book prose.';

const NOT_AVAILABLE = 'Not available.';

const INSTRUCTIONS = `INSTRUCTIONS:
1. Cross-reference the transcripts to settle technical terms, names and numbers.
2. Where they disagree, prefer the wording that fits the context; transcript A is usually more accurate on words, transcript B on proper nouns shown on screen.
3. Rewrite the content as coherent, readable book-style narrative prose in the speaker's voice.
4. Fix grammar and punctuation. Remove filler words (uh, um, you know), stutters and false starts.
5. Keep every idea. Do not summarize, shorten drastically or add new material.
6. If previous text is given, continue seamlessly from it with consistent terminology, without repeating it.
OUTPUT ONLY THE CLEANED PROSE. NO INTRODUCTION, HEADINGS OR EXPLANATIONS.`;

/**
 * Synthesis request for one chunk. Transcript A is the speech-to-text variant,
 * transcript B the platform captions; an absent variant is announced as such.
 */
export function buildSynthesisPrompt(chunk: Chunk, lookback: string | null): RewriteRequest {
    const a = chunk.transcribedText ?? NOT_AVAILABLE;
    const b = chunk.captionsPresent ? chunk.captionText : NOT_AVAILABLE;
    const parts = [
        'Below are two imperfect transcripts of the same passage of a video.',
        `TRANSCRIPT A (speech-to-text): ${a}`,
        `TRANSCRIPT B (platform captions): ${b}`,
    ];
    if (lookback) {
        parts.push(`PREVIOUS TEXT (already written, for continuity only): ${lookback}`);
    }
    parts.push(INSTRUCTIONS);
    return { system: SYNTHESIS_SYSTEM, prompt: parts.join('\n\n') };
}

/** Tail of the previous chunk's prose, cut forward to a word boundary. */
export function lookbackTail(prose: string, maxChars: number): string | null {
    const text = prose.trim();
    if (!text || maxChars <= 0) return null;
    if (text.length <= maxChars) return text;
    const tail = text.slice(text.length - maxChars);
    const space = tail.search(/\s/);
    return space >= 0 ? tail.slice(space).trim() : tail;
}
