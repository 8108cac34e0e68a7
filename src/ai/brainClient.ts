import { env } from '../env';
import { StreamError } from '../errors';
import { defaultFetch, previewBody, readResponseText, timeoutController, type FetchLike } from '../http/fetch';
import { log } from '../log';
import { incStageError, startStageTimer } from '../metrics';
import { defaultBrainReply } from './defaultBrain';
import {
  turnsToConversation,
  type ConversationContext,
  type ConversationHandle,
  type ConversationModel,
  type ConversationTurn,
} from './types';

export function buildBrainUrl(base: string): string {
  const trimmed = base.replace(/\/$/, '');
  if (trimmed.endsWith('/reply')) {
    return trimmed;
  }
  return `${trimmed}/reply`;
}

abstract class HistoryConversationHandle implements ConversationHandle {
  public readonly sessionId: string;
  protected readonly deviceId: string;
  protected readonly language: string;
  private readonly turns: ConversationTurn[];

  constructor(context: ConversationContext) {
    this.sessionId = context.sessionId;
    this.deviceId = context.deviceId;
    this.language = context.language;
    this.turns = turnsToConversation(context.history);
  }

  public async send(text: string, opts: { signal?: AbortSignal } = {}): Promise<string> {
    const sentAt = new Date();
    const reply = await this.reply(text, this.history(), opts.signal);
    this.turns.push(
      { role: 'user', content: text, timestamp: sentAt },
      { role: 'assistant', content: reply, timestamp: new Date() },
    );
    return reply;
  }

  public history(): ConversationTurn[] {
    return this.turns.map((turn) => ({ ...turn, timestamp: new Date(turn.timestamp) }));
  }

  protected abstract reply(text: string, history: ConversationTurn[], signal?: AbortSignal): Promise<string>;
}

class HttpConversationHandle extends HistoryConversationHandle {
  constructor(
    context: ConversationContext,
    private readonly url: string,
    private readonly timeoutMs: number,
    private readonly fetchImpl: FetchLike,
  ) {
    super(context);
  }

  protected async reply(text: string, history: ConversationTurn[], parent?: AbortSignal): Promise<string> {
    const endTimer = startStageTimer('llm');
    const { signal, dispose } = timeoutController(this.timeoutMs, parent);

    try {
      const response = await this.fetchImpl(this.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          deviceId: this.deviceId,
          sessionId: this.sessionId,
          language: this.language,
          transcript: text,
          history,
        }),
        signal,
      });

      if (!response.ok) {
        const preview = previewBody(await readResponseText(response));
        throw new StreamError(`brain reply failed ${response.status}: ${preview}`);
      }

      const data = (await response.json()) as { text?: unknown };
      const reply = typeof data.text === 'string' ? data.text.trim() : '';
      if (!reply) {
        throw new StreamError('brain reply missing text');
      }

      return reply;
    } catch (error) {
      incStageError('llm');
      log.error(
        {
          err: error,
          event: 'brain_reply_failed',
          device_id: this.deviceId,
          session_id: this.sessionId,
        },
        'brain reply failed',
      );
      if (error instanceof StreamError) {
        throw error;
      }
      throw new StreamError('brain request failed', { cause: error });
    } finally {
      dispose();
      endTimer();
    }
  }
}

class LocalConversationHandle extends HistoryConversationHandle {
  protected async reply(text: string): Promise<string> {
    return defaultBrainReply({ transcript: text, language: this.language });
  }
}

export class HttpConversationModel implements ConversationModel {
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: { baseUrl: string; timeoutMs?: number; fetchImpl?: FetchLike }) {
    this.url = buildBrainUrl(options.baseUrl);
    this.timeoutMs = options.timeoutMs ?? env.BRAIN_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? defaultFetch;
  }

  public async startConversation(context: ConversationContext): Promise<ConversationHandle> {
    return new HttpConversationHandle(context, this.url, this.timeoutMs, this.fetchImpl);
  }
}

export class LocalConversationModel implements ConversationModel {
  public async startConversation(context: ConversationContext): Promise<ConversationHandle> {
    return new LocalConversationHandle(context);
  }
}

export function createConversationModel(baseUrl: string | undefined = env.BRAIN_URL): ConversationModel {
  if (!baseUrl) {
    log.info({ event: 'brain_route', source: 'brain_local_default', has_brain_url: false }, 'brain routed to local default');
    return new LocalConversationModel();
  }

  log.info({ event: 'brain_route', source: 'brain_http', has_brain_url: true }, 'brain routed to http');
  return new HttpConversationModel({ baseUrl });
}
