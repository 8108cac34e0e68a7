export interface TTSRequest {
  text: string;
  voice?: string;
  language?: string;
}

export interface TTSOptions {
  signal?: AbortSignal;
  logContext?: Record<string, unknown>;
}

/** Synthesized audio arrives as an ordered stream of binary chunks. */
export interface SpeechSynthesizer {
  synthesize(request: TTSRequest, opts?: TTSOptions): Promise<AsyncIterable<Buffer>>;
}
