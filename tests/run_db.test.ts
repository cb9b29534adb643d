import { describe, it, expect } from 'vitest';
import { recordOutcome } from '../src/pipeline/run_db';

describe('recordOutcome', () => {
  it('should skip persistence when the database is disabled', async () => {
    await expect(
      recordOutcome({
        videoId: 'abc123def45',
        title: 'Cats',
        status: 'success',
        reason: null,
        chunkCount: 1,
        degradedChunks: [],
        outputPath: '/books/Cats.xhtml',
        durationMs: 10,
      })
    ).resolves.toBeUndefined();
  });
});
