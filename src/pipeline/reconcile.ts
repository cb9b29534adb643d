import { RejectedOutputError } from './errors';
import type { ConcurrencyGate } from './gate';
import { errorMessage, info, startStep, warn } from './log';
import { buildSynthesisPrompt, lookbackTail } from './prompt';
import { DEFAULT_RETRY_CONFIG, withRetry, withTimeout, type RetryConfig } from './retry';
import type { Chunk, RewrittenChunk, Rewriter } from './types';

/** Accepted response length, relative to the longer input transcript. */
export const MIN_LENGTH_RATIO = 0.3;
export const MAX_LENGTH_RATIO = 3;

export interface ReconcileOptions {
    rewriter: Rewriter;
    /** Shared gate bounding concurrent rewrite calls across pipelines */
    gate?: ConcurrencyGate;
    retry?: Partial<RetryConfig>;
    /** Per-call watchdog; 0 disables */
    timeoutMs?: number;
    /** Characters of the previous chunk's prose passed along as context */
    lookbackChars?: number;
}

/**
 * Clean up a model response: Unicode NFC, no control characters except
 * newlines, no wrapping code fence or quotes.
 */
export function repairProse(raw: string): string {
    let text = raw.normalize('NFC').replace(/\r\n?/g, '\n');
    text = text.replace(/[^\P{Cc}\n\t]/gu, '').replace(/\t/g, ' ');
    text = text.trim();
    const fenced = text.match(/^```[\w-]*\n([\s\S]*?)\n?```$/);
    if (fenced) text = fenced[1].trim();
    const quoted = text.match(/^["“]([\s\S]*)["”]$/);
    if (quoted && !/["“”]/.test(quoted[1])) text = quoted[1].trim();
    return text;
}

/** Repaired prose, or RejectedOutputError when it is empty or its length is implausible. */
export function validateRewrite(raw: string, chunk: Chunk): string {
    const prose = repairProse(raw);
    if (!prose) {
        throw new RejectedOutputError('Rewrite returned empty prose', { index: chunk.index });
    }
    const reference = Math.max(chunk.captionText.length, chunk.transcribedText?.length ?? 0);
    const ratio = prose.length / Math.max(1, reference);
    if (ratio < MIN_LENGTH_RATIO || ratio > MAX_LENGTH_RATIO) {
        throw new RejectedOutputError(
            `Rewrite length ${prose.length} is ${ratio.toFixed(2)}x the input length ${reference}`,
            { index: chunk.index, ratio }
        );
    }
    return prose;
}

/** Highest-trust raw text of a chunk, used when no rewrite could be obtained. */
export function fallbackText(chunk: Chunk): string {
    return chunk.transcribedText ?? chunk.captionText;
}

/**
 * Rewrite one chunk. Transient failures are retried with backoff; a permanent
 * failure or exhausted attempts degrade the chunk to its raw text. Never throws
 * for a failed call.
 */
export async function reconcileChunk(
    chunk: Chunk,
    lookback: string | null,
    opts: ReconcileOptions
): Promise<RewrittenChunk> {
    const config: RetryConfig = { ...DEFAULT_RETRY_CONFIG, ...opts.retry };
    const request = buildSynthesisPrompt(chunk, lookback);
    let attempts = 0;

    const call = async (attempt: number): Promise<string> => {
        attempts = attempt;
        const run = () =>
            withTimeout(
                (signal) => opts.rewriter.rewrite(request, { signal }),
                opts.timeoutMs ?? 0,
                `rewrite chunk ${chunk.index}`
            );
        const raw = opts.gate ? await opts.gate.run(run) : await run();
        return validateRewrite(raw, chunk);
    };

    try {
        const prose = await withRetry(call, config, {
            onRetry: ({ attempt, delayMs, error }) =>
                warn('reconcile.chunk.retry', {
                    idx: chunk.index,
                    attempt,
                    delayMs,
                    error: errorMessage(error),
                    kind: error instanceof Error ? error.name : typeof error,
                }),
        });
        info('reconcile.chunk.done', { idx: chunk.index, attempts, chars: prose.length });
        return { index: chunk.index, prose, attempts, degraded: null };
    } catch (e) {
        const reason = e instanceof Error ? `${e.name}: ${e.message}` : String(e);
        warn('reconcile.chunk.degraded', { idx: chunk.index, attempts, reason });
        return {
            index: chunk.index,
            prose: fallbackText(chunk),
            attempts,
            degraded: { index: chunk.index, reason, attempts },
        };
    }
}

/**
 * Rewrite chunks one after another in index order; each request carries the
 * tail of the previous chunk's prose.
 */
export async function reconcileChunks(chunks: Chunk[], opts: ReconcileOptions): Promise<RewrittenChunk[]> {
    const ordered = [...chunks].sort((a, b) => a.index - b.index);
    const timer = startStep('reconcile.chunks', { total: ordered.length });
    const results: RewrittenChunk[] = [];
    let lookback: string | null = null;
    for (const chunk of ordered) {
        const rewritten = await reconcileChunk(chunk, lookback, opts);
        results.push(rewritten);
        lookback = lookbackTail(rewritten.prose, opts.lookbackChars ?? 600);
        timer.eta(results.length, ordered.length);
    }
    timer.end({ degraded: results.filter((r) => r.degraded).length });
    return results;
}
