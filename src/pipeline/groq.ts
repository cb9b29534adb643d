/**
 * Client for an OpenAI-compatible API (Groq by default) serving the rewrite
 * and transcription capabilities
 */

import fs from 'fs-extra';
import path from 'path';
import ky, { HTTPError, TimeoutError as KyTimeoutError, type KyInstance, type Options as KyOptions } from 'ky';
import { ENV } from './env';
import { errorFromStatus, NetworkError, RejectedOutputError, TimeoutError } from './errors';
import { debug } from './log';
import type { CallOptions, RawTranscript, RewriteRequest, Rewriter, Transcriber } from './types';

export interface GroqClientOptions {
  apiKey: string;
  baseUrl?: string;
  rewriteModel?: string;
  temperature?: number;
  transcribeModel?: string;
  language?: string;
  /** Custom fetch, used by tests to answer in process */
  fetch?: KyOptions['fetch'];
}

interface ChatCompletionResponse {
  choices: Array<{
    message?: {
      content?: string | null;
    };
  }>;
}

interface TranscriptionResponse {
  text: string;
  duration?: number;
  segments?: Array<{ start: number; end: number; text: string }>;
}

/** Seconds from a Retry-After header (delta-seconds or HTTP date). */
export function parseRetryAfter(header: string | null, now = Date.now()): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header);
  if (Number.isFinite(seconds)) return Math.max(0, seconds);
  const date = Date.parse(header);
  return Number.isNaN(date) ? undefined : Math.max(0, Math.ceil((date - now) / 1000));
}

/**
 * Convert ky/fetch failures into the pipeline's call error taxonomy
 */
export async function toCallError(error: unknown): Promise<unknown> {
  if (error instanceof HTTPError) {
    const { status, statusText, headers } = error.response;
    let detail = statusText;
    try {
      detail = (await error.response.text()) || statusText;
    } catch (e) {
      debug('llm.error.body.unreadable', { status, error: e instanceof Error ? e.message : String(e) });
    }
    return errorFromStatus(status, `HTTP ${status}: ${detail.slice(0, 300)}`, parseRetryAfter(headers.get('retry-after')));
  }
  if (error instanceof KyTimeoutError) {
    return new TimeoutError(`Request timeout: ${error.message}`);
  }
  if (error instanceof Error && error.name === 'AbortError') {
    return new TimeoutError('Request aborted');
  }
  if (error instanceof TypeError) {
    return new NetworkError(`Network error: ${error.message}`);
  }
  return error;
}

export class GroqClient implements Rewriter, Transcriber {
  private client: KyInstance;
  private readonly rewriteModel: string;
  private readonly temperature: number;
  private readonly transcribeModel: string;
  private readonly language: string;

  constructor(options: GroqClientOptions) {
    const {
      apiKey,
      baseUrl = 'https://api.groq.com/openai/v1',
      rewriteModel = 'llama-3.3-70b-versatile',
      temperature = 0.3,
      transcribeModel = 'whisper-large-v3',
      language = 'en',
    } = options;

    const kyOptions: KyOptions = {
      prefixUrl: baseUrl,
      // Timeouts and retries are owned by the pipeline
      timeout: false,
      retry: 0,
      headers: { Authorization: `Bearer ${apiKey}` },
    };
    if (options.fetch) {
      kyOptions.fetch = options.fetch;
    }
    this.client = ky.create(kyOptions);
    this.rewriteModel = rewriteModel;
    this.temperature = temperature;
    this.transcribeModel = transcribeModel;
    this.language = language;
  }

  static fromEnv(): GroqClient {
    if (!ENV.groqApiKey) {
      throw new Error('Missing GROQ_API_KEY environment variable');
    }
    return new GroqClient({
      apiKey: ENV.groqApiKey,
      baseUrl: ENV.llmBaseUrl,
      rewriteModel: ENV.rewriteModel,
      temperature: ENV.rewriteTemperature,
      transcribeModel: ENV.transcribeModel,
      language: ENV.transcribeLanguage,
    });
  }

  private async request<T>(url: string, options: KyOptions): Promise<T> {
    try {
      return await this.client(url, options).json<T>();
    } catch (error) {
      throw await toCallError(error);
    }
  }

  async rewrite(req: RewriteRequest, opts: CallOptions = {}): Promise<string> {
    debug('llm.rewrite.call', { model: this.rewriteModel, inputLength: req.prompt.length });
    const data = await this.request<ChatCompletionResponse>('chat/completions', {
      method: 'post',
      json: {
        model: this.rewriteModel,
        temperature: this.temperature,
        messages: [
          { role: 'system', content: req.system },
          { role: 'user', content: req.prompt },
        ],
      },
      signal: opts.signal,
    });
    const content = data.choices[0]?.message?.content;
    if (!content) {
      throw new RejectedOutputError('No content returned from the completion endpoint');
    }
    return content;
  }

  async transcribe(audioPath: string, opts: CallOptions = {}): Promise<RawTranscript> {
    const audio = await fs.readFile(audioPath);
    const form = new FormData();
    form.append('file', new Blob([new Uint8Array(audio)]), path.basename(audioPath));
    form.append('model', this.transcribeModel);
    form.append('language', this.language);
    form.append('response_format', 'verbose_json');
    debug('llm.transcribe.call', { model: this.transcribeModel, bytes: audio.length });
    const data = await this.request<TranscriptionResponse>('audio/transcriptions', {
      method: 'post',
      body: form,
      signal: opts.signal,
    });
    return {
      text: data.text ?? '',
      duration: data.duration,
      segments: data.segments?.map((s) => ({ start: s.start, end: s.end, text: s.text })),
    };
  }
}
