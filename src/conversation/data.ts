import { ValidationError } from '../errors';
import type { ConversationHandle } from '../ai/types';
import type { SagaData } from '../saga/types';
import type { AudioConfig } from '../stt/types';

/** Keys of the request record shared by the conversation steps. */
export const DataKeys = {
  deviceId: 'device_id',
  sessionId: 'session_id',
  language: 'language',
  audio: 'audio_data',
  audioConfig: 'audio_config',
  transcription: 'transcription',
  confidence: 'stt_confidence',
  contentSafe: 'is_content_safe',
  llmResponse: 'llm_response',
  responseAudio: 'response_audio',
  conversation: 'conversation',
} as const;

export function readString(data: SagaData, key: string): string | undefined {
  const value = data[key];
  return typeof value === 'string' ? value : undefined;
}

export function requireString(data: SagaData, key: string): string {
  const value = readString(data, key);
  if (value === undefined) {
    throw new ValidationError(`saga data missing ${key}`);
  }
  return value;
}

export function readNumber(data: SagaData, key: string): number | undefined {
  const value = data[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

export function readBuffer(data: SagaData, key: string): Buffer | undefined {
  const value = data[key];
  return Buffer.isBuffer(value) ? value : undefined;
}

export function readChunks(data: SagaData, key: string): Buffer[] {
  const value = data[key];
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter((chunk): chunk is Buffer => Buffer.isBuffer(chunk));
}

export function readAudioConfig(data: SagaData, fallback: AudioConfig): AudioConfig {
  const value = data[DataKeys.audioConfig];
  if (typeof value !== 'object' || value === null) {
    return fallback;
  }

  const sampleRateHz =
    'sampleRateHz' in value && typeof value.sampleRateHz === 'number' ? value.sampleRateHz : fallback.sampleRateHz;
  const encoding = 'encoding' in value && typeof value.encoding === 'string' ? value.encoding : fallback.encoding;
  const language = 'language' in value && typeof value.language === 'string' ? value.language : fallback.language;
  return { sampleRateHz, encoding, language };
}

function isConversationHandle(value: unknown): value is ConversationHandle {
  return (
    typeof value === 'object' &&
    value !== null &&
    'send' in value &&
    typeof value.send === 'function' &&
    'sessionId' in value &&
    typeof value.sessionId === 'string'
  );
}

export function requireConversation(data: SagaData): ConversationHandle {
  const value = data[DataKeys.conversation];
  if (!isConversationHandle(value)) {
    throw new ValidationError(`saga data missing ${DataKeys.conversation}`);
  }
  return value;
}
