import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import { describe, it, expect } from 'vitest';
import { parseVideoList, readVideoList, runBatch } from '../src/pipeline/batch';
import { StubAcquirer, StubAssembler, StubRewriter, vtt } from './helpers';

describe('parseVideoList', () => {
  it('should skip blank lines and comments', () => {
    expect(parseVideoList('vid-one\n\n  # later\r\nhttps://youtu.be/abc123def45\n  vid-two  \n')).toEqual([
      'vid-one',
      'https://youtu.be/abc123def45',
      'vid-two',
    ]);
  });
});

describe('readVideoList', () => {
  it('should read a list file', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'links-'));
    try {
      const file = path.join(dir, 'links.txt');
      await fs.writeFile(file, '# talks\nvid-one\nvid-two\n');
      await expect(readVideoList(file)).resolves.toEqual(['vid-one', 'vid-two']);
    } finally {
      await fs.remove(dir);
    }
  });

  it('should fail for a missing file', async () => {
    const file = path.join(os.tmpdir(), 'no-such-dir-for-links', 'links.txt');
    await expect(readVideoList(file)).rejects.toThrow(`Video list not found: ${file}`);
  });
});

describe('runBatch', () => {
  it('should convert every video and keep input order', async () => {
    const acquirer = new StubAcquirer((videoId) => {
      if (videoId.startsWith('bad')) throw new Error('video unavailable');
      return {
        title: videoId,
        captions: vtt([['00:00:00.000', '00:00:03.000', 'the cat sat on the mat']]),
        audioPath: null,
      };
    });
    const seen: string[] = [];
    const summary = await runBatch(
      ['vid-one-aaa', 'bad-video-x', 'vid-two-bbb'],
      {
        acquirer,
        rewriter: new StubRewriter(() => 'The cat sat on the mat.'),
        assembler: new StubAssembler(),
      },
      {
        concurrency: 2,
        pipeline: { artifactsRoot: path.join(os.tmpdir(), 'bionic-batch-test'), retry: { initialDelay: 0, jitter: false } },
        onOutcome: async (outcome) => {
          seen.push(outcome.videoId);
          if (outcome.videoId === 'vid-two-bbb') throw new Error('database down');
        },
      }
    );

    expect(summary.outcomes.map((o) => [o.videoId, o.status])).toEqual([
      ['vid-one-aaa', 'success'],
      ['bad-video-x', 'failed'],
      ['vid-two-bbb', 'success'],
    ]);
    expect(summary.outcomes[1].reason).toBe('Error: video unavailable');
    expect(summary).toMatchObject({ succeeded: 2, degraded: 0, failed: 1 });
    expect([...seen].sort()).toEqual(['bad-video-x', 'vid-one-aaa', 'vid-two-bbb']);
  });

  it('should return an empty summary for no videos', async () => {
    const summary = await runBatch([], {
      acquirer: new StubAcquirer(() => ({ title: 't', captions: null, audioPath: null })),
      rewriter: new StubRewriter(() => ''),
      assembler: new StubAssembler(),
    });
    expect(summary).toEqual({ outcomes: [], succeeded: 0, degraded: 0, failed: 0 });
  });
});
