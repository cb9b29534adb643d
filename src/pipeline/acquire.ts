import { execa } from 'execa';
import fs from 'fs-extra';
import path from 'path';
import { ENV } from './env';
import { debug, info, warn } from './log';
import type { AcquiredSource, Acquirer } from './types';

export interface YtDlpOptions {
    bin: string;
    pythonBin: string;
    timeoutSec: number;
    cookiesFile: string;
}

function execErrorMessage(e: unknown): string {
    if (!(e instanceof Error)) return String(e);
    const stderr = 'stderr' in e && typeof e.stderr === 'string' ? e.stderr : '';
    return (stderr || e.message).slice(-800);
}

/** yt-dlp invocations to try in order: configured binary, plain yt-dlp, python module. */
export function ytDlpCandidates(opts: YtDlpOptions, args: string[]): Array<[string, string[]]> {
    const candidates: Array<[string, string[]]> = [[opts.bin, args]];
    if (opts.bin !== 'yt-dlp') candidates.push(['yt-dlp', args]);
    if (opts.pythonBin) candidates.push([opts.pythonBin, ['-m', 'yt_dlp', ...args]]);
    candidates.push(['python3', ['-m', 'yt_dlp', ...args]]);
    return candidates;
}

/**
 * Downloads the English captions (manual, else automatic) as WebVTT and the
 * audio as a 64 kbps mp3 into the video's work directory.
 */
export class YtDlpAcquirer implements Acquirer {
    constructor(
        private readonly opts: YtDlpOptions = {
            bin: ENV.ytdlpBin,
            pythonBin: ENV.ytdlpPythonBin,
            timeoutSec: ENV.ytdlpTimeoutSec,
            cookiesFile: ENV.ytdlpCookiesFile,
        }
    ) {}

    async acquire(videoId: string, workDir: string): Promise<AcquiredSource> {
        await fs.ensureDir(workDir);
        const args = [
            '--no-simulate',
            '--dump-single-json',
            '--no-warnings',
            '--write-subs',
            '--write-auto-subs',
            '--sub-langs',
            'en',
            '--sub-format',
            'vtt',
            '-f',
            'bestaudio/best',
            '-x',
            '--audio-format',
            'mp3',
            '--audio-quality',
            '64K',
            '-o',
            path.join(workDir, 'source.%(ext)s'),
        ];
        if (this.opts.cookiesFile) args.push('--cookies', this.opts.cookiesFile);
        args.push(`https://www.youtube.com/watch?v=${videoId}`);

        const errors: string[] = [];
        let stdout: string | null = null;
        for (const [cmd, a] of ytDlpCandidates(this.opts, args)) {
            try {
                const res = await execa(cmd, a, { timeout: this.opts.timeoutSec * 1000 });
                stdout = res.stdout;
                break;
            } catch (e) {
                errors.push(`[${cmd}] ${execErrorMessage(e)}`);
                debug('acquire.ytdlp.fail', { videoId, cmd });
            }
        }
        if (stdout === null) {
            throw new Error(`All yt-dlp download attempts failed for ${videoId}. Errors:\n${errors.join('\n---\n')}`);
        }

        let title = videoId;
        try {
            const meta: unknown = JSON.parse(stdout);
            if (meta && typeof meta === 'object' && 'title' in meta && typeof meta.title === 'string' && meta.title.trim()) {
                title = meta.title.trim();
            }
        } catch (e) {
            warn('acquire.meta.unparsable', { videoId, error: e instanceof Error ? e.message : String(e) });
        }

        const files = await fs.readdir(workDir);
        const subtitle = files.filter((f) => f.startsWith('source.') && f.endsWith('.vtt')).sort()[0];
        let captions: string | null = null;
        if (subtitle) {
            captions = await fs.readFile(path.join(workDir, subtitle), 'utf8');
            await fs.remove(path.join(workDir, subtitle));
        }
        const audio = path.join(workDir, 'source.mp3');
        const audioPath = (await fs.pathExists(audio)) ? audio : null;

        info('acquire.complete', { videoId, title, captions: captions !== null, audio: audioPath !== null });
        return { videoId, title, captions, audioPath };
    }
}
