import type { AudioConfig, STTOptions, STTTranscript, StreamingRecognizer } from './types';

export interface STTProvider {
  readonly id: string;
  transcribe(audio: Buffer, config: AudioConfig, opts?: STTOptions): Promise<STTTranscript>;
  startStreaming(config: AudioConfig, opts?: STTOptions): StreamingRecognizer;
}
