import { env } from '../../env';
import { StreamError } from '../../errors';
import { defaultFetch, previewBody, readResponseText, timeoutController, type FetchLike } from '../../http/fetch';
import { log } from '../../log';
import { incStageError, startStageTimer } from '../../metrics';
import { BufferedStreamingRecognizer } from '../bufferedStreamingRecognizer';
import type { STTProvider } from '../provider';
import type { AudioConfig, STTOptions, STTTranscript, StreamingRecognizer } from '../types';

export interface HttpSttOptions {
  url?: string;
  timeoutMs?: number;
  maxStreamBytes?: number;
  fetchImpl?: FetchLike;
}

/**
 * Posts raw audio to a recognition endpoint and expects `{ text, confidence? }`
 * back. Audio parameters travel as headers so the body stays the device's
 * bytes untouched.
 */
export class HttpSttProvider implements STTProvider {
  public readonly id = 'http_stt';

  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly maxStreamBytes: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: HttpSttOptions = {}) {
    this.url = options.url ?? env.STT_URL;
    this.timeoutMs = options.timeoutMs ?? env.STT_TIMEOUT_MS;
    this.maxStreamBytes = options.maxStreamBytes ?? env.STT_MAX_BUFFER_BYTES;
    this.fetchImpl = options.fetchImpl ?? defaultFetch;
  }

  public async transcribe(audio: Buffer, config: AudioConfig, opts: STTOptions = {}): Promise<STTTranscript> {
    const endTimer = startStageTimer('stt');
    const { signal, dispose } = timeoutController(this.timeoutMs, opts.signal);

    try {
      const response = await this.fetchImpl(this.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/octet-stream',
          'X-Audio-Encoding': config.encoding,
          'X-Sample-Rate': String(config.sampleRateHz),
          'X-Language': config.language,
        },
        body: new Uint8Array(audio),
        signal,
      });

      if (!response.ok) {
        const preview = previewBody(await readResponseText(response));
        log.error(
          { event: 'stt_http_error', status: response.status, body_preview: preview, ...opts.logContext },
          'stt request failed',
        );
        throw new StreamError(`stt http error ${response.status}: ${preview}`);
      }

      const data = (await response.json()) as { text?: unknown; confidence?: unknown };
      const text = typeof data.text === 'string' ? data.text.trim() : '';
      const confidence = typeof data.confidence === 'number' ? data.confidence : undefined;

      log.info(
        { event: 'stt_transcribed', audio_bytes: audio.length, text_chars: text.length, ...opts.logContext },
        'stt transcribed',
      );

      return confidence === undefined ? { text } : { text, confidence };
    } catch (error) {
      incStageError('stt');
      if (error instanceof StreamError) {
        throw error;
      }
      throw new StreamError('stt request failed', { cause: error });
    } finally {
      dispose();
      endTimer();
    }
  }

  public startStreaming(config: AudioConfig, opts: STTOptions = {}): StreamingRecognizer {
    return new BufferedStreamingRecognizer(
      (audio, cfg, streamOpts) => this.transcribe(audio, cfg, streamOpts),
      config,
      { maxBytes: this.maxStreamBytes, logContext: opts.logContext },
    );
  }
}
