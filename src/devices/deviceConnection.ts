import { env } from '../env';
import { StateError, StreamError, errorCodeOf, errorMessageOf } from '../errors';
import { log } from '../log';
import { incInboundAudioFrames, incInboundAudioFramesDropped } from '../metrics';
import type { ConversationHandle, ConversationModel } from '../ai/types';
import type { UtteranceRequest, UtteranceResult } from '../conversation/service';
import { persistSession, resolveDeviceSession } from '../sessions/resolver';
import { appendTurn } from '../sessions/session';
import type { Session, SessionStore, Turn } from '../sessions/types';
import type { STTProvider } from '../stt/provider';
import type { AudioConfig, StreamingRecognizer } from '../stt/types';
import type { ConnectionHub, HubConnection } from './connectionHub';
import {
  encodeMessage,
  errorMessage,
  listeningEnded,
  listeningStarted,
  listeningStartFailed,
  parseInboundMessage,
  pongMessage,
  speakingEnded,
  speakingStarted,
  type InboundMessage,
  type ListeningStartMessage,
  type OutboundMessage,
} from './messages';
import { OutboundQueue, type OutboundFrame } from './outboundQueue';
import type { DeviceTransport } from './transport';

export type ConnectionState = 'idle' | 'listening' | 'processing' | 'speaking';

export interface UtteranceProcessor {
  processUtterance(request: UtteranceRequest): Promise<UtteranceResult>;
}

export interface DeviceConnectionDeps {
  hub: ConnectionHub<DeviceConnection>;
  store: SessionStore;
  stt: STTProvider;
  model: ConversationModel;
  processor: UtteranceProcessor;
  clock?: () => Date;
}

export interface DeviceConnectionOptions {
  continuationMs: number;
  defaultLanguage: string;
  defaultSampleRateHz: number;
  defaultEncoding: string;
  pingIntervalMs: number;
  pongWaitMs: number;
  outboundQueueSize: number;
  outboundDrainTimeoutMs: number;
}

export function defaultConnectionOptions(): DeviceConnectionOptions {
  return {
    continuationMs: env.SESSION_CONTINUATION_MINUTES * 60_000,
    defaultLanguage: env.DEFAULT_LANGUAGE,
    defaultSampleRateHz: env.DEFAULT_SAMPLE_RATE,
    defaultEncoding: env.DEFAULT_ENCODING,
    pingIntervalMs: env.WS_PING_INTERVAL_MS,
    pongWaitMs: env.WS_PONG_WAIT_MS,
    outboundQueueSize: env.OUTBOUND_QUEUE_SIZE,
    outboundDrainTimeoutMs: env.OUTBOUND_DRAIN_TIMEOUT_MS,
  };
}

interface Utterance {
  startedAt: Date;
  frames: number;
  bytes: number;
}

interface PendingTurn {
  session: Session;
  conversation: ConversationHandle;
  transcript: string;
  confidence?: number;
  startedAt: Date;
  endedAt: Date;
}

type WorkItem = { name: string; run: () => Promise<void> };

/**
 * One device's WebSocket connection and its conversation state machine:
 * idle -> listening -> processing -> speaking -> idle.
 *
 * Inbound messages and audio frames run through a serial work queue in
 * arrival order. The reply pipeline runs detached from that queue so control
 * messages (ping, a premature listening_start) are still answered while it
 * is in flight.
 */
export class DeviceConnection implements HubConnection {
  public readonly deviceId: string;

  private readonly deps: DeviceConnectionDeps;
  private readonly options: DeviceConnectionOptions;
  private readonly clock: () => Date;
  private readonly outbound: OutboundQueue;
  private readonly work: WorkItem[] = [];
  private workRunning = false;
  private idle: Promise<void> = Promise.resolve();
  private heartbeat: NodeJS.Timeout | null = null;
  private lastPongAt: number;

  private state: ConnectionState = 'idle';
  private session: Session | null = null;
  private recognizer: StreamingRecognizer | null = null;
  private conversation: ConversationHandle | null = null;
  private conversationLanguage: string | null = null;
  private utterance: Utterance | null = null;
  private pipeline: Promise<void> = Promise.resolve();
  private closed = false;

  constructor(
    deviceId: string,
    private readonly transport: DeviceTransport,
    deps: DeviceConnectionDeps,
    options: DeviceConnectionOptions = defaultConnectionOptions(),
  ) {
    this.deviceId = deviceId;
    this.deps = deps;
    this.options = options;
    this.clock = deps.clock ?? (() => new Date());
    this.lastPongAt = Date.now();
    this.outbound = new OutboundQueue(
      options.outboundQueueSize,
      (frame) => this.transport.send(frame),
      () => this.close(1008, 'slow_consumer'),
      { device_id: deviceId },
      options.outboundDrainTimeoutMs,
    );
  }

  public start(): void {
    this.deps.hub.register(this);
    this.heartbeat = setInterval(() => this.checkHeartbeat(), this.options.pingIntervalMs);
    this.heartbeat.unref();
    log.info({ event: 'device_connected', device_id: this.deviceId }, 'device connected');
  }

  public getState(): ConnectionState {
    return this.state;
  }

  public getSession(): Session | null {
    return this.session;
  }

  public isClosed(): boolean {
    return this.closed;
  }

  public handleText(raw: string): void {
    this.enqueue({ name: 'control_message', run: () => this.onControlMessage(raw) });
  }

  public handleBinary(frame: Buffer): void {
    incInboundAudioFrames();
    this.enqueue({ name: 'audio_frame', run: () => this.onAudioFrame(frame) });
  }

  public handlePong(): void {
    this.lastPongAt = Date.now();
  }

  /** Closes the socket and tears the connection down. Safe to call more than once. */
  public close(code: number, reason: string): void {
    if (this.closed) {
      return;
    }
    this.transport.close(code, reason);
    this.teardown(reason);
  }

  public handleClose(code?: number, reason?: string): void {
    if (this.closed) {
      return;
    }
    log.info({ event: 'device_socket_closed', device_id: this.deviceId, code, reason }, 'device socket closed');
    this.teardown(reason || 'socket_closed');
  }

  /** Resolves once queued inbound work and any in-flight reply have settled. */
  public async whenIdle(): Promise<void> {
    let observed: Promise<void> | undefined;
    while (observed !== this.idle) {
      observed = this.idle;
      await observed;
    }
    await this.pipeline;
  }

  private enqueue(item: WorkItem): void {
    if (this.closed) {
      return;
    }
    this.work.push(item);
    if (!this.workRunning) {
      this.workRunning = true;
      this.idle = this.runWork();
    }
  }

  private async runWork(): Promise<void> {
    while (this.work.length > 0 && !this.closed) {
      const item = this.work.shift();
      if (!item) {
        continue;
      }
      try {
        await item.run();
      } catch (error) {
        log.error(
          { err: error, event: 'device_task_failed', task: item.name, device_id: this.deviceId },
          'device task failed',
        );
      }
    }
    this.work.length = 0;
    this.workRunning = false;
  }

  private async onControlMessage(raw: string): Promise<void> {
    let message: InboundMessage;
    try {
      message = parseInboundMessage(raw);
    } catch (error) {
      this.sendError(error);
      return;
    }

    switch (message.type) {
      case 'listening_start':
        await this.onListeningStart(message);
        return;
      case 'listening_end':
        await this.onListeningEnd();
        return;
      case 'ping':
        this.sendMessage(pongMessage(message.data, this.clock()));
        return;
      case 'pong':
        this.handlePong();
        return;
    }
  }

  private async onListeningStart(message: ListeningStartMessage): Promise<void> {
    if (this.state !== 'idle') {
      this.sendError(new StateError(`cannot start listening while ${this.state}`));
      return;
    }

    let session: Session;
    let conversation: ConversationHandle;
    try {
      session = await resolveDeviceSession(this.deps.store, this.deviceId, {
        continuationMs: this.options.continuationMs,
        defaultLanguage: this.options.defaultLanguage,
        language: message.language,
        cached: this.session,
        now: this.clock(),
      });
      conversation = await this.resolveConversation(session);
    } catch (error) {
      log.warn(
        { err: error, event: 'listening_start_failed', device_id: this.deviceId },
        'listening start failed',
      );
      if (!this.closed) {
        this.sendMessage(listeningStartFailed(errorCodeOf(error, 'resource_error'), errorMessageOf(error), this.clock()));
      }
      return;
    }

    if (this.closed) {
      return;
    }

    const config: AudioConfig = {
      sampleRateHz: message.sample_rate ?? this.options.defaultSampleRateHz,
      encoding: message.encoding ?? this.options.defaultEncoding,
      language: session.metadata.language,
    };
    this.recognizer = this.deps.stt.startStreaming(config, {
      logContext: { device_id: this.deviceId, session_id: session.id },
    });
    this.session = session;
    this.conversation = conversation;
    this.utterance = { startedAt: this.clock(), frames: 0, bytes: 0 };
    this.state = 'listening';

    log.info(
      {
        event: 'listening_started',
        device_id: this.deviceId,
        session_id: session.id,
        sample_rate: config.sampleRateHz,
        encoding: config.encoding,
        language: config.language,
      },
      'listening started',
    );
    this.sendMessage(listeningStarted(session.id, this.clock()));
  }

  private async onAudioFrame(frame: Buffer): Promise<void> {
    const recognizer = this.recognizer;
    if (this.state !== 'listening' || !recognizer || !this.utterance) {
      incInboundAudioFramesDropped(`state_${this.state}`);
      return;
    }

    this.utterance.frames += 1;
    this.utterance.bytes += frame.length;
    try {
      await recognizer.stream(frame);
    } catch (error) {
      if (this.recognizer !== recognizer) {
        return;
      }
      log.warn({ err: error, event: 'audio_stream_failed', device_id: this.deviceId }, 'audio stream failed');
      recognizer.cancel('stream_failed');
      this.resetUtterance();
      this.sendError(error instanceof StreamError ? error : new StreamError('audio stream failed', { cause: error }));
    }
  }

  private async onListeningEnd(): Promise<void> {
    const recognizer = this.recognizer;
    const session = this.session;
    const conversation = this.conversation;
    const utterance = this.utterance;
    if (this.state !== 'listening' || !recognizer || !session || !conversation || !utterance) {
      this.sendError(new StateError(`cannot end listening while ${this.state}`));
      return;
    }

    this.recognizer = null;
    this.utterance = null;
    this.state = 'processing';

    const logContext = {
      device_id: this.deviceId,
      session_id: session.id,
      frames: utterance.frames,
      bytes: utterance.bytes,
    };

    if (utterance.bytes === 0) {
      recognizer.cancel('no_audio');
      this.state = 'idle';
      log.info({ event: 'listening_ended_without_audio', ...logContext }, 'listening ended without audio');
      this.sendError(new StreamError('no audio received'));
      return;
    }

    let transcript: string;
    let confidence: number | undefined;
    try {
      const result = await recognizer.end();
      transcript = result.text.trim();
      confidence = result.confidence;
    } catch (error) {
      if (this.closed) {
        return;
      }
      this.state = 'idle';
      log.warn({ err: error, event: 'recognition_failed', ...logContext }, 'recognition failed');
      this.sendError(error instanceof StreamError ? error : new StreamError('speech-to-text failed', { cause: error }));
      return;
    }

    if (this.closed) {
      return;
    }
    if (!transcript) {
      this.state = 'idle';
      this.sendError(new StreamError('empty transcript'));
      return;
    }

    log.info({ event: 'listening_ended', transcript_chars: transcript.length, ...logContext }, 'listening ended');
    this.sendMessage(listeningEnded(session.id, transcript, this.clock()));

    const pending: PendingTurn = {
      session,
      conversation,
      transcript,
      startedAt: utterance.startedAt,
      endedAt: this.clock(),
      ...(confidence === undefined ? {} : { confidence }),
    };
    this.pipeline = this.runPipeline(pending).catch((error: unknown) => {
      log.error({ err: error, event: 'device_pipeline_crashed', device_id: this.deviceId }, 'pipeline crashed');
      if (!this.closed) {
        this.state = 'idle';
      }
    });
  }

  private async runPipeline(pending: PendingTurn): Promise<void> {
    const { session } = pending;
    let result: UtteranceResult;
    try {
      result = await this.deps.processor.processUtterance({
        deviceId: this.deviceId,
        sessionId: session.id,
        language: session.metadata.language,
        conversation: pending.conversation,
        transcript: pending.transcript,
      });
    } catch (error) {
      if (this.closed) {
        log.info(
          { event: 'pipeline_result_discarded', device_id: this.deviceId, session_id: session.id },
          'pipeline failed after disconnect',
        );
        return;
      }
      log.warn(
        { err: error, event: 'pipeline_failed', device_id: this.deviceId, session_id: session.id },
        'pipeline failed',
      );
      // The handle may hold the failed exchange; the next listening_start reseeds it from session.turns.
      this.dropConversation(pending.conversation);
      this.state = 'idle';
      this.sendError(error);
      return;
    }

    if (this.closed) {
      log.info(
        { event: 'pipeline_result_discarded', device_id: this.deviceId, session_id: session.id, saga_id: result.sagaId },
        'reply discarded after disconnect',
      );
      return;
    }

    this.state = 'speaking';
    const delivered = await this.streamReply(session.id, result);
    if (!delivered || this.closed) {
      log.info(
        { event: 'reply_interrupted', device_id: this.deviceId, session_id: session.id, saga_id: result.sagaId },
        'reply interrupted',
      );
      this.dropConversation(pending.conversation);
      if (!this.closed) {
        this.state = 'idle';
      }
      return;
    }

    const audioBytes = result.audio.reduce((total, chunk) => total + chunk.length, 0);
    log.info(
      {
        event: 'reply_sent',
        device_id: this.deviceId,
        session_id: session.id,
        saga_id: result.sagaId,
        chunks: result.audio.length,
        audio_bytes: audioBytes,
      },
      'reply sent',
    );

    try {
      await this.persistTurns(pending, result);
    } finally {
      if (!this.closed) {
        this.state = 'idle';
      }
    }
  }

  /** Streams speaking_start, each audio chunk and speaking_end, waiting for queue room between frames. */
  private async streamReply(sessionId: string, result: UtteranceResult): Promise<boolean> {
    if (!(await this.sendAwaited(encodeMessage(speakingStarted(sessionId, result.reply, this.clock()))))) {
      return false;
    }
    for (const chunk of result.audio) {
      if (!(await this.sendAwaited(chunk))) {
        return false;
      }
    }
    return this.sendAwaited(encodeMessage(speakingEnded(sessionId, this.clock())));
  }

  private async persistTurns(pending: PendingTurn, result: UtteranceResult): Promise<void> {
    const { session } = pending;
    const now = this.clock();
    const userTurn: Turn = {
      timestamp: pending.endedAt,
      role: 'user',
      content: result.transcript || pending.transcript,
      durationMs: Math.max(0, pending.endedAt.getTime() - pending.startedAt.getTime()),
      ...(pending.confidence === undefined ? {} : { metadata: { confidence: pending.confidence } }),
    };
    const assistantTurn: Turn = {
      timestamp: now,
      role: 'assistant',
      content: result.reply,
      durationMs: Math.max(0, now.getTime() - pending.endedAt.getTime()),
    };

    appendTurn(session, userTurn, now);
    appendTurn(session, assistantTurn, now);
    await persistSession(this.deps.store, session, 'add_turns');
  }

  private async resolveConversation(session: Session): Promise<ConversationHandle> {
    if (
      this.conversation &&
      this.conversation.sessionId === session.id &&
      this.conversationLanguage === session.metadata.language
    ) {
      return this.conversation;
    }

    const conversation = await this.deps.model.startConversation({
      deviceId: this.deviceId,
      sessionId: session.id,
      language: session.metadata.language,
      history: session.turns,
    });
    this.conversationLanguage = session.metadata.language;
    return conversation;
  }

  private dropConversation(conversation: ConversationHandle): void {
    if (this.conversation === conversation) {
      this.conversation = null;
      this.conversationLanguage = null;
    }
  }

  private resetUtterance(): void {
    this.recognizer = null;
    this.utterance = null;
    this.state = 'idle';
  }

  private checkHeartbeat(): void {
    if (this.closed) {
      return;
    }
    if (Date.now() - this.lastPongAt > this.options.pongWaitMs) {
      log.warn({ event: 'device_pong_timeout', device_id: this.deviceId }, 'device missed pong deadline');
      this.transport.terminate();
      this.teardown('pong_timeout');
      return;
    }
    this.transport.ping();
  }

  private sendMessage(message: OutboundMessage): void {
    this.send(encodeMessage(message));
  }

  private sendError(error: unknown): void {
    const code = errorCodeOf(error);
    this.sendMessage(errorMessage(code, errorMessageOf(error), this.clock()));
  }

  private send(frame: OutboundFrame): void {
    if (this.closed) {
      return;
    }
    this.outbound.push(frame);
  }

  private async sendAwaited(frame: OutboundFrame): Promise<boolean> {
    if (this.closed) {
      return false;
    }
    return this.outbound.send(frame);
  }

  private teardown(reason: string): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    if (this.heartbeat) {
      clearInterval(this.heartbeat);
      this.heartbeat = null;
    }

    const recognizer = this.recognizer;
    this.recognizer = null;
    if (recognizer) {
      recognizer.cancel('disconnected');
      recognizer.end().catch((error: unknown) => {
        log.debug(
          { err: error, event: 'recognizer_end_after_cancel', device_id: this.deviceId },
          'recognizer end after cancel',
        );
      });
    }

    this.conversation = null;
    this.conversationLanguage = null;
    this.utterance = null;
    this.work.length = 0;
    this.deps.hub.unregister(this);
    this.outbound.close();

    log.info(
      { event: 'device_disconnected', device_id: this.deviceId, session_id: this.session?.id, state: this.state, reason },
      'device disconnected',
    );
  }
}
