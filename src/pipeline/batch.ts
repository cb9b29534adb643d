import fs from 'fs-extra';
import { errorMessage, info, warn } from './log';
import { convertVideo, type PipelineDeps, type RunPipelineOptions } from './run';
import type { VideoOutcome } from './types';

export interface BatchOptions {
  concurrency?: number;
  pipeline?: RunPipelineOptions;
  /** Called once per finished video, e.g. to persist the outcome */
  onOutcome?: (outcome: VideoOutcome) => Promise<void>;
}

export interface BatchSummary {
  outcomes: VideoOutcome[];
  succeeded: number;
  degraded: number;
  failed: number;
}

/** Video ids or URLs, one per line; blank lines and `#` comments are skipped. */
export function parseVideoList(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter((l) => l && !l.startsWith('#'));
}

export async function readVideoList(filePath: string): Promise<string[]> {
  if (!(await fs.pathExists(filePath))) {
    throw new Error(`Video list not found: ${filePath}`);
  }
  return parseVideoList(await fs.readFile(filePath, 'utf8'));
}

/**
 * Convert every video through a bounded worker pool. Outcomes come back in input
 * order; one video's failure never stops the others.
 */
export async function runBatch(
  videos: string[],
  deps: PipelineDeps,
  opts: BatchOptions = {}
): Promise<BatchSummary> {
  const concurrency = Math.max(1, Math.floor(opts.concurrency ?? 1));
  const outcomes: VideoOutcome[] = new Array(videos.length);
  let next = 0;

  async function worker() {
    while (next < videos.length) {
      const idx = next++;
      info('batch.item.start', { idx: idx + 1, total: videos.length, video: videos[idx] });
      const outcome = await convertVideo(videos[idx], deps, opts.pipeline);
      outcomes[idx] = outcome;
      if (opts.onOutcome) {
        try {
          await opts.onOutcome(outcome);
        } catch (e) {
          warn('batch.outcome.hook.fail', { videoId: outcome.videoId, error: errorMessage(e) });
        }
      }
    }
  }

  const workers: Promise<void>[] = [];
  for (let i = 0; i < Math.min(concurrency, videos.length); i++) {
    workers.push(worker());
  }
  await Promise.all(workers);

  const summary: BatchSummary = {
    outcomes,
    succeeded: outcomes.filter((o) => o.status === 'success').length,
    degraded: outcomes.filter((o) => o.status === 'degraded').length,
    failed: outcomes.filter((o) => o.status === 'failed').length,
  };
  info('batch.complete', {
    total: videos.length,
    succeeded: summary.succeeded,
    degraded: summary.degraded,
    failed: summary.failed,
  });
  return summary;
}
