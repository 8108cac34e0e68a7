import { env } from '../env';
import { ContentRejectedError, StreamError, TimeoutError, ValidationError } from '../errors';
import { log } from '../log';
import type { ContentValidator } from '../ai/types';
import type { SagaData, Step, StepResult } from '../saga/types';
import type { STTProvider } from '../stt/provider';
import type { SpeechSynthesizer } from '../tts/types';
import {
  DataKeys,
  readAudioConfig,
  readBuffer,
  readString,
  requireConversation,
  requireString,
} from './data';

export const StepIds = {
  speechToText: 'speech_to_text',
  contentValidation: 'content_validation',
  llmProcessing: 'llm_processing',
  textToSpeech: 'text_to_speech',
} as const;

export interface ConversationStepDeps {
  stt: STTProvider;
  validator: ContentValidator;
  tts: SpeechSynthesizer;
}

function logContext(data: SagaData): Record<string, unknown> {
  return {
    device_id: readString(data, DataKeys.deviceId),
    session_id: readString(data, DataKeys.sessionId),
  };
}

function noopCompensation(stepId: string): (data: SagaData) => Promise<void> {
  return async (data) => {
    log.info({ event: 'saga_step_compensated', step_id: stepId, ...logContext(data) }, 'step compensated');
  };
}

function throwIfAborted(signal: AbortSignal): void {
  if (signal.aborted) {
    throw signal.reason instanceof Error ? signal.reason : new TimeoutError('step aborted');
  }
}

/** Uses the transcript produced while streaming; otherwise transcribes `audio_data` in one request. */
export function speechToTextStep(stt: STTProvider): Step {
  return {
    id: StepIds.speechToText,
    async execute(data, signal): Promise<StepResult> {
      const streamed = readString(data, DataKeys.transcription)?.trim();
      if (streamed) {
        return { success: true, data: { text: streamed, source: 'stream' } };
      }

      const audio = readBuffer(data, DataKeys.audio);
      if (!audio || audio.length === 0) {
        return { success: false, error: new ValidationError('no transcript or audio to recognize') };
      }

      const config = readAudioConfig(data, {
        sampleRateHz: env.DEFAULT_SAMPLE_RATE,
        encoding: env.DEFAULT_ENCODING,
        language: readString(data, DataKeys.language) ?? env.DEFAULT_LANGUAGE,
      });
      const transcript = await stt.transcribe(audio, config, { signal, logContext: logContext(data) });
      const text = transcript.text.trim();
      if (!text) {
        return { success: false, error: new StreamError('empty transcript') };
      }

      data[DataKeys.transcription] = text;
      if (transcript.confidence !== undefined) {
        data[DataKeys.confidence] = transcript.confidence;
      }
      return { success: true, data: { text, source: 'batch' } };
    },
    compensate: noopCompensation(StepIds.speechToText),
  };
}

export function contentValidationStep(validator: ContentValidator): Step {
  return {
    id: StepIds.contentValidation,
    async execute(data): Promise<StepResult> {
      const transcript = requireString(data, DataKeys.transcription);
      const verdict = await validator.validate(transcript);
      data[DataKeys.contentSafe] = verdict.safe;

      if (!verdict.safe) {
        log.warn(
          { event: 'content_rejected', matched_count: verdict.matched.length, ...logContext(data) },
          'transcript rejected by content validator',
        );
        return { success: false, error: new ContentRejectedError() };
      }
      return { success: true, data: { safe: true } };
    },
    compensate: noopCompensation(StepIds.contentValidation),
  };
}

export function llmProcessingStep(): Step {
  return {
    id: StepIds.llmProcessing,
    async execute(data, signal): Promise<StepResult> {
      const transcript = requireString(data, DataKeys.transcription);
      const conversation = requireConversation(data);
      const reply = (await conversation.send(transcript, { signal })).trim();
      throwIfAborted(signal);
      if (!reply) {
        return { success: false, error: new StreamError('language model returned an empty reply') };
      }

      data[DataKeys.llmResponse] = reply;
      return { success: true, data: { chars: reply.length } };
    },
    compensate: noopCompensation(StepIds.llmProcessing),
  };
}

/** Collects every chunk before succeeding so a failed synthesis never leaves partial audio. */
export function textToSpeechStep(tts: SpeechSynthesizer): Step {
  return {
    id: StepIds.textToSpeech,
    async execute(data, signal): Promise<StepResult> {
      const text = requireString(data, DataKeys.llmResponse);
      const stream = await tts.synthesize(
        { text, language: readString(data, DataKeys.language) },
        { signal, logContext: logContext(data) },
      );

      const chunks: Buffer[] = [];
      let bytes = 0;
      for await (const chunk of stream) {
        throwIfAborted(signal);
        chunks.push(chunk);
        bytes += chunk.length;
      }

      if (bytes === 0) {
        return { success: false, error: new StreamError('speech synthesis produced no audio') };
      }

      data[DataKeys.responseAudio] = chunks;
      return { success: true, data: { chunks: chunks.length, bytes } };
    },
    compensate: noopCompensation(StepIds.textToSpeech),
  };
}

export function createConversationSteps(deps: ConversationStepDeps): Step[] {
  return [
    speechToTextStep(deps.stt),
    contentValidationStep(deps.validator),
    llmProcessingStep(),
    textToSpeechStep(deps.tts),
  ];
}
