export interface AudioConfig {
  sampleRateHz: number;
  encoding: string;
  language: string;
}

export interface STTTranscript {
  text: string;
  confidence?: number;
}

export interface STTOptions {
  signal?: AbortSignal;
  logContext?: Record<string, unknown>;
}

/**
 * One utterance worth of streaming recognition. Frames go in through
 * `stream` in arrival order; `end` closes the stream and yields the final
 * transcript exactly once. A second `end` rejects with a StateError.
 */
export interface StreamingRecognizer {
  stream(chunk: Buffer): Promise<void>;
  end(): Promise<STTTranscript>;
  cancel(reason?: string): void;
}
