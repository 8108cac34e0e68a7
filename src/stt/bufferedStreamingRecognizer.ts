import { StateError, StreamError } from '../errors';
import { log } from '../log';
import type { AudioConfig, STTOptions, STTTranscript, StreamingRecognizer } from './types';

export type BatchTranscribe = (
  audio: Buffer,
  config: AudioConfig,
  opts: STTOptions,
) => Promise<STTTranscript>;

/**
 * Streaming facade over a batch recognizer: frames are accumulated inside the
 * handle and submitted in one request on `end()`.
 */
export class BufferedStreamingRecognizer implements StreamingRecognizer {
  private readonly chunks: Buffer[] = [];
  private readonly controller = new AbortController();
  private bufferedBytes = 0;
  private ended = false;
  private cancelled = false;

  constructor(
    private readonly transcribe: BatchTranscribe,
    private readonly config: AudioConfig,
    private readonly options: { maxBytes: number; logContext?: Record<string, unknown> },
  ) {}

  public async stream(chunk: Buffer): Promise<void> {
    if (this.ended || this.cancelled) {
      throw new StateError('recognition stream is closed');
    }
    if (chunk.length === 0) {
      return;
    }
    if (this.bufferedBytes + chunk.length > this.options.maxBytes) {
      throw new StreamError(`recognition stream exceeded ${this.options.maxBytes} bytes`);
    }

    this.chunks.push(chunk);
    this.bufferedBytes += chunk.length;
  }

  public async end(): Promise<STTTranscript> {
    if (this.ended) {
      throw new StateError('recognition stream already ended');
    }
    this.ended = true;

    if (this.cancelled) {
      throw new StreamError('recognition stream was cancelled');
    }
    if (this.bufferedBytes === 0) {
      throw new StreamError('no audio received');
    }

    const audio = Buffer.concat(this.chunks, this.bufferedBytes);
    this.chunks.length = 0;

    try {
      return await this.transcribe(audio, this.config, {
        signal: this.controller.signal,
        logContext: this.options.logContext,
      });
    } catch (error) {
      if (error instanceof StreamError) {
        throw error;
      }
      throw new StreamError('speech-to-text failed', { cause: error });
    }
  }

  public cancel(reason = 'cancelled'): void {
    if (this.cancelled) {
      return;
    }
    this.cancelled = true;
    this.chunks.length = 0;
    this.bufferedBytes = 0;
    this.controller.abort(reason);
    log.debug({ event: 'stt_stream_cancelled', reason, ...this.options.logContext }, 'stt stream cancelled');
  }
}
