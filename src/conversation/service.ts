import { env } from '../env';
import { StreamError, errorFromCode } from '../errors';
import { log } from '../log';
import type { ConversationHandle } from '../ai/types';
import type { SagaManager } from '../saga/manager';
import type { SagaData, SagaId, SagaInstance } from '../saga/types';
import type { AudioConfig } from '../stt/types';
import { DataKeys, readChunks, readNumber, readString } from './data';
import { CONVERSATION_SAGA, createConversationDefinition } from './definition';
import type { ConversationStepDeps } from './steps';

export interface UtteranceRequest {
  deviceId: string;
  sessionId: string;
  language: string;
  conversation: ConversationHandle;
  /** Final transcript from a streaming recognizer. */
  transcript?: string;
  /** Raw audio for batch recognition when no transcript is available. */
  audio?: Buffer;
  audioConfig?: AudioConfig;
}

export interface UtteranceResult {
  sagaId: SagaId;
  transcript: string;
  reply: string;
  audio: Buffer[];
  confidence?: number;
}

export interface ConversationServiceOptions {
  sagaTimeoutMs?: number;
  waitTimeoutMs?: number;
  pollIntervalMs?: number;
}

/**
 * Runs one utterance through the `conversation_processing` saga and waits for
 * it. Failures come back as the typed error recorded by the failing step.
 */
export class ConversationService {
  private readonly waitTimeoutMs: number;
  private readonly pollIntervalMs: number;

  constructor(
    private readonly sagas: SagaManager,
    deps: ConversationStepDeps,
    options: ConversationServiceOptions = {},
  ) {
    this.waitTimeoutMs = options.waitTimeoutMs ?? env.SAGA_WAIT_TIMEOUT_MS;
    this.pollIntervalMs = options.pollIntervalMs ?? env.SAGA_POLL_INTERVAL_MS;
    this.sagas.registerDefinition(createConversationDefinition(deps, options.sagaTimeoutMs));
  }

  public async processUtterance(request: UtteranceRequest): Promise<UtteranceResult> {
    const data: SagaData = {
      [DataKeys.deviceId]: request.deviceId,
      [DataKeys.sessionId]: request.sessionId,
      [DataKeys.language]: request.language,
      [DataKeys.conversation]: request.conversation,
    };
    if (request.transcript !== undefined) {
      data[DataKeys.transcription] = request.transcript;
    }
    if (request.audio) {
      data[DataKeys.audio] = request.audio;
    }
    if (request.audioConfig) {
      data[DataKeys.audioConfig] = request.audioConfig;
    }

    const sagaId = this.sagas.start(CONVERSATION_SAGA, data);
    log.info(
      { event: 'conversation_saga_started', saga_id: sagaId, device_id: request.deviceId, session_id: request.sessionId },
      'conversation saga started',
    );

    const instance = await this.sagas.waitForCompletion(sagaId, {
      timeoutMs: this.waitTimeoutMs,
      pollIntervalMs: this.pollIntervalMs,
    });
    return this.toResult(instance);
  }

  public getSagaStatus(id: SagaId): SagaInstance | undefined {
    return this.sagas.get(id);
  }

  /** Drains saga events into the log until `signal` aborts. */
  public async logEvents(signal: AbortSignal): Promise<void> {
    while (true) {
      const next = await this.sagas.nextEvent(signal);
      if (!next) {
        return;
      }
      log.debug(
        { event: 'saga_event', saga_id: next.sagaId, step_id: next.stepId, type: next.type, data: next.data },
        'saga event',
      );
    }
  }

  private toResult(instance: SagaInstance): UtteranceResult {
    if (instance.state !== 'completed') {
      const failure = instance.error;
      throw failure
        ? errorFromCode(failure.code, failure.message)
        : new StreamError(`saga ${instance.id} ended ${instance.state}`);
    }

    const transcript = readString(instance.data, DataKeys.transcription) ?? '';
    const reply = readString(instance.data, DataKeys.llmResponse) ?? '';
    const confidence = readNumber(instance.data, DataKeys.confidence);
    return {
      sagaId: instance.id,
      transcript,
      reply,
      audio: readChunks(instance.data, DataKeys.responseAudio),
      ...(confidence === undefined ? {} : { confidence }),
    };
  }
}
