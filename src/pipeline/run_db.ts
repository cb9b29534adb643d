import { Client } from 'pg';
import { ENV } from './env';
import { warn, debug, errorMessage } from './log';
import type { VideoOutcome } from './types';

export async function withPg<T>(fn: (c: Client) => Promise<T>): Promise<T> {
  const client = new Client({ connectionString: ENV.databaseUrl });
  try {
    await client.connect();
  } catch (e) {
    const redacted = ENV.databaseUrl.replace(/:[^:@/]+@/, ':***@');
    warn('db.connect.fail', { url: redacted, error: errorMessage(e) });
    throw e;
  }
  try {
    return await fn(client);
  } finally {
    try { await client.end(); } catch (e) { debug('db.end.fail', { error: errorMessage(e) }); }
  }
}

export async function ensureVideo(client: Client, videoId: string, title?: string | null) {
  await client.query(
    `INSERT INTO videos (id, title) VALUES ($1,$2)
     ON CONFLICT (id) DO UPDATE SET title = COALESCE(EXCLUDED.title, videos.title)`,
    [videoId, title || null]
  );
}

export async function insertConversion(client: Client, outcome: VideoOutcome): Promise<string> {
  const res = await client.query<{ id: string }>(
    `INSERT INTO conversions (video_id, status, reason, chunk_count, degraded_chunks, output_path, duration_ms)
     VALUES ($1,$2,$3,$4,$5,$6,$7) RETURNING id`,
    [
      outcome.videoId,
      outcome.status,
      outcome.reason,
      outcome.chunkCount,
      outcome.degradedChunks.map((d) => d.index),
      outcome.outputPath,
      outcome.durationMs,
    ]
  );
  return res.rows[0].id;
}

/** Persist a finished conversion. Skipped when DISABLE_DB=true. */
export async function recordOutcome(outcome: VideoOutcome): Promise<void> {
  if (ENV.disableDb) {
    debug('db.disabled', { videoId: outcome.videoId });
    return;
  }
  await withPg(async (c) => {
    await ensureVideo(c, outcome.videoId, outcome.title);
    const id = await insertConversion(c, outcome);
    debug('db.conversion.insert', { videoId: outcome.videoId, id });
  });
}
