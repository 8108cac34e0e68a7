import { env } from '../env';
import { StreamError } from '../errors';
import { defaultFetch, previewBody, readResponseText, type FetchLike } from '../http/fetch';
import { log } from '../log';
import { incStageError, startStageTimer } from '../metrics';
import type { SpeechSynthesizer, TTSOptions, TTSRequest } from './types';

interface ChunkReader {
  read(): Promise<{ done: boolean; value?: Uint8Array }>;
  releaseLock(): void;
}

/** Re-slices an arbitrary byte stream into fixed-size chunks; the tail may be shorter. */
export async function* rechunk(reader: ChunkReader, chunkBytes: number): AsyncGenerator<Buffer> {
  let pending = Buffer.alloc(0);

  try {
    while (true) {
      const { value, done } = await reader.read();
      if (done) {
        break;
      }
      if (!value || value.length === 0) {
        continue;
      }

      pending = pending.length === 0 ? Buffer.from(value) : Buffer.concat([pending, value]);
      while (pending.length >= chunkBytes) {
        yield pending.subarray(0, chunkBytes);
        pending = pending.subarray(chunkBytes);
      }
    }
  } finally {
    reader.releaseLock();
  }

  if (pending.length > 0) {
    yield pending;
  }
}

export class HttpSpeechSynthesizer implements SpeechSynthesizer {
  private readonly url: string;
  private readonly voice?: string;
  private readonly chunkBytes: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: { url?: string; voice?: string; chunkBytes?: number; fetchImpl?: FetchLike } = {}) {
    this.url = options.url ?? env.TTS_URL;
    this.voice = options.voice ?? env.TTS_VOICE_ID;
    this.chunkBytes = options.chunkBytes ?? env.TTS_CHUNK_BYTES;
    this.fetchImpl = options.fetchImpl ?? defaultFetch;
  }

  public async synthesize(request: TTSRequest, opts: TTSOptions = {}): Promise<AsyncIterable<Buffer>> {
    const endTimer = startStageTimer('tts');

    try {
      const response = await this.fetchImpl(this.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          text: request.text,
          voice: request.voice ?? this.voice,
          language: request.language,
        }),
        signal: opts.signal,
      });

      if (!response.ok) {
        const preview = previewBody(await readResponseText(response));
        log.error(
          { event: 'tts_http_error', status: response.status, body_preview: preview, ...opts.logContext },
          'tts request failed',
        );
        throw new StreamError(`tts http error ${response.status}`);
      }

      if (!response.body) {
        throw new StreamError('tts response missing body');
      }

      return rechunk(response.body.getReader(), this.chunkBytes);
    } catch (error) {
      incStageError('tts');
      if (error instanceof StreamError) {
        throw error;
      }
      throw new StreamError('tts request failed', { cause: error });
    } finally {
      endTimer();
    }
  }
}
