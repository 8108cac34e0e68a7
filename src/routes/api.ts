import express, { type NextFunction, type Request, type Response, Router } from 'express';
import { env } from '../env';
import { RuntimeError, ValidationError, errorCodeOf, errorMessageOf, type ErrorCode } from '../errors';
import { log } from '../log';
import { incSessionPersistFailure } from '../metrics';
import type { ConversationModel } from '../ai/types';
import type { ConversationService } from '../conversation/service';
import type { SagaInstance } from '../saga/types';
import { resolveDeviceSession } from '../sessions/resolver';
import type { Session, SessionStore, Turn } from '../sessions/types';

export interface ApiRouterDeps {
  service: Pick<ConversationService, 'processUtterance' | 'getSagaStatus'>;
  store: SessionStore;
  model: ConversationModel;
  token?: string;
  continuationMs?: number;
  clock?: () => Date;
}

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  validation_error: 400,
  state_error: 409,
  content_rejected: 422,
  stream_error: 502,
  resource_error: 503,
  timeout_error: 504,
};

export function sagaStatusJson(instance: SagaInstance): Record<string, unknown> {
  return {
    id: instance.id,
    definition: instance.definition,
    state: instance.state,
    started_at: instance.startedAt.toISOString(),
    completed_at: instance.completedAt?.toISOString() ?? null,
    error: instance.error
      ? { step_id: instance.error.stepId ?? null, code: instance.error.code, message: instance.error.message }
      : null,
    steps: instance.steps.map((step) => ({
      id: step.id,
      state: step.state,
      started_at: step.startedAt?.toISOString() ?? null,
      completed_at: step.completedAt?.toISOString() ?? null,
      error: step.error ?? null,
    })),
  };
}

function turnJson(turn: Turn): Record<string, unknown> {
  return {
    timestamp: turn.timestamp.toISOString(),
    role: turn.role,
    content: turn.content,
    duration_ms: turn.durationMs,
    metadata: turn.metadata ?? null,
  };
}

export function sessionJson(session: Session): Record<string, unknown> {
  return {
    id: session.id,
    device_id: session.deviceId,
    status: session.status,
    language: session.metadata.language,
    preferences: session.metadata.preferences,
    turns: session.turns.map(turnJson),
    created_at: session.createdAt.toISOString(),
    last_active_at: session.lastActiveAt.toISOString(),
    last_turn_at: session.lastTurnAt?.toISOString() ?? null,
    expires_at: session.expiresAt.toISOString(),
  };
}

function sendError(res: Response, error: unknown): void {
  const code = errorCodeOf(error, 'stream_error');
  const status = error instanceof RuntimeError ? STATUS_BY_CODE[code] : 500;
  res.status(status).json({ error: code, message: errorMessageOf(error) });
}

function parseSampleRate(value: string | undefined): number {
  if (value === undefined || value.trim() === '') {
    return env.DEFAULT_SAMPLE_RATE;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ValidationError(`invalid sample rate: ${value}`);
  }
  return parsed;
}

/**
 * Read-only inspection routes plus a batch utterance endpoint for devices
 * that cannot hold a stream open. All routes require the device bearer token.
 */
export function createApiRouter(deps: ApiRouterDeps): Router {
  const router = Router();
  const token = deps.token ?? env.DEVICE_STREAM_TOKEN;
  const continuationMs = deps.continuationMs ?? env.SESSION_CONTINUATION_MINUTES * 60_000;
  const clock = deps.clock ?? (() => new Date());

  router.use((req: Request, res: Response, next: NextFunction) => {
    const header = req.header('authorization') ?? '';
    const presented = header.startsWith('Bearer ') ? header.slice('Bearer '.length).trim() : '';
    if (!presented || presented !== token) {
      res.status(401).json({ error: 'unauthorized' });
      return;
    }
    next();
  });

  router.get('/sagas/:id', (req, res) => {
    const instance = deps.service.getSagaStatus(req.params.id);
    if (!instance) {
      res.status(404).json({ error: 'saga_not_found' });
      return;
    }
    res.status(200).json(sagaStatusJson(instance));
  });

  router.get('/devices/:deviceId/session', async (req, res) => {
    try {
      const session = await deps.store.getActive(req.params.deviceId);
      if (!session) {
        res.status(404).json({ error: 'session_not_found' });
        return;
      }
      res.status(200).json(sessionJson(session));
    } catch (error) {
      log.error({ err: error, event: 'session_lookup_failed', device_id: req.params.deviceId }, 'session lookup failed');
      sendError(res, error);
    }
  });

  router.post(
    '/devices/:deviceId/utterances',
    express.raw({ type: () => true, limit: env.STT_MAX_BUFFER_BYTES }),
    async (req, res) => {
      const deviceId = req.params.deviceId;
      const startedAt = clock();

      try {
        const audio: unknown = req.body;
        if (!Buffer.isBuffer(audio) || audio.length === 0) {
          throw new ValidationError('request body must contain audio');
        }

        const language = req.header('x-language') || undefined;
        const session = await resolveDeviceSession(deps.store, deviceId, {
          continuationMs,
          defaultLanguage: env.DEFAULT_LANGUAGE,
          language,
          now: startedAt,
        });
        const conversation = await deps.model.startConversation({
          deviceId,
          sessionId: session.id,
          language: session.metadata.language,
          history: session.turns,
        });

        const result = await deps.service.processUtterance({
          deviceId,
          sessionId: session.id,
          language: session.metadata.language,
          conversation,
          audio,
          audioConfig: {
            sampleRateHz: parseSampleRate(req.header('x-sample-rate')),
            encoding: req.header('x-audio-encoding') || env.DEFAULT_ENCODING,
            language: session.metadata.language,
          },
        });

        const finishedAt = clock();
        const turns: Turn[] = [
          {
            timestamp: startedAt,
            role: 'user',
            content: result.transcript,
            durationMs: 0,
            ...(result.confidence === undefined ? {} : { metadata: { confidence: result.confidence } }),
          },
          {
            timestamp: finishedAt,
            role: 'assistant',
            content: result.reply,
            durationMs: Math.max(0, finishedAt.getTime() - startedAt.getTime()),
          },
        ];
        try {
          for (const turn of turns) {
            await deps.store.addTurn(session.id, turn);
          }
        } catch (error) {
          incSessionPersistFailure('add_turns');
          log.error(
            { err: error, event: 'session_persist_failed', operation: 'add_turns', device_id: deviceId, session_id: session.id },
            'session persist failed',
          );
        }

        res.status(200).json({
          saga_id: result.sagaId,
          session_id: session.id,
          transcript: result.transcript,
          reply: result.reply,
          audio_base64: Buffer.concat(result.audio).toString('base64'),
        });
      } catch (error) {
        log.warn({ err: error, event: 'utterance_request_failed', device_id: deviceId }, 'utterance request failed');
        sendError(res, error);
      }
    },
  );

  return router;
}
