import { z } from 'zod';
import { env } from '../env';
import { ResourceError } from '../errors';
import { log } from '../log';
import { evalScript, type ScriptRunner } from '../redis/scripts';
import { appendTurn, isSessionActive } from './session';
import type { DeviceId, Session, SessionId, SessionStore, Turn } from './types';

// KEYS: active pointer, session document
// ARGV: session id, document json, expiresAt epoch ms, '1' when active
const LUA_CREATE_SESSION = `
local activeKey = KEYS[1]
local sessionKey = KEYS[2]
local sessionId = ARGV[1]
local document = ARGV[2]
local expiresAtMs = ARGV[3]
local isActive = ARGV[4] == '1'

if redis.call('EXISTS', sessionKey) == 1 then
  return 'session_exists'
end

if isActive then
  if redis.call('EXISTS', activeKey) == 1 then
    return 'device_has_active'
  end
  redis.call('SET', activeKey, sessionId, 'PXAT', expiresAtMs)
end

redis.call('SET', sessionKey, document, 'PXAT', expiresAtMs)
return 'OK'
`;

const LUA_UPDATE_SESSION = `
local activeKey = KEYS[1]
local sessionKey = KEYS[2]
local sessionId = ARGV[1]
local document = ARGV[2]
local expiresAtMs = ARGV[3]
local isActive = ARGV[4] == '1'

if redis.call('EXISTS', sessionKey) == 0 then
  return 'not_found'
end

local pointer = redis.call('GET', activeKey)
if isActive then
  if pointer and pointer ~= sessionId then
    return 'device_has_active'
  end
  redis.call('SET', activeKey, sessionId, 'PXAT', expiresAtMs)
elseif pointer == sessionId then
  redis.call('DEL', activeKey)
end

redis.call('SET', sessionKey, document, 'PXAT', expiresAtMs)
return 'OK'
`;

const StoredTurnSchema = z.object({
  timestamp: z.coerce.date(),
  role: z.enum(['user', 'assistant']),
  content: z.string(),
  durationMs: z.number().int().nonnegative(),
  metadata: z
    .object({
      confidence: z.number().optional(),
      emotion: z.string().optional(),
    })
    .optional(),
});

const StoredSessionSchema = z.object({
  id: z.string().min(1),
  deviceId: z.string().min(1),
  status: z.enum(['active', 'expired', 'terminated']),
  turns: z.array(StoredTurnSchema),
  metadata: z.object({
    language: z.string().min(1),
    preferences: z.record(z.unknown()),
  }),
  createdAt: z.coerce.date(),
  lastActiveAt: z.coerce.date(),
  lastTurnAt: z.coerce.date().optional(),
  expiresAt: z.coerce.date(),
});

export interface SessionRedis extends ScriptRunner {
  get(key: string): Promise<string | null>;
}

export function buildSessionKeys(
  deviceId: DeviceId,
  sessionId: SessionId,
  prefix: string = env.SESSION_PREFIX,
): { activeKey: string; sessionKey: string } {
  return {
    activeKey: `${prefix}:device:${deviceId}:active`,
    sessionKey: `${prefix}:session:${sessionId}`,
  };
}

export function serializeSession(session: Session): string {
  return JSON.stringify(session);
}

export function parseSession(raw: string): Session {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ResourceError('stored session is not valid json', { cause: error });
  }

  const parsed = StoredSessionSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new ResourceError(`stored session is invalid: ${issues}`);
  }

  return parsed.data;
}

/**
 * Redis-backed sessions. Documents expire at `expiresAt` through PXAT, and the
 * per-device active pointer is written by Lua so the one-active-session rule
 * holds across server instances.
 */
export class RedisSessionStore implements SessionStore {
  private readonly redis: SessionRedis;
  private readonly prefix: string;
  private readonly clock: () => Date;

  constructor(options: { redis: SessionRedis; prefix?: string; clock?: () => Date }) {
    this.redis = options.redis;
    this.prefix = options.prefix ?? env.SESSION_PREFIX;
    this.clock = options.clock ?? (() => new Date());
  }

  public async getActive(deviceId: DeviceId): Promise<Session | null> {
    const pointerKey = buildSessionKeys(deviceId, '', this.prefix).activeKey;
    const sessionId = await this.read(() => this.redis.get(pointerKey), 'get_active_pointer');
    if (!sessionId) {
      return null;
    }

    const session = await this.getById(sessionId);
    if (!session || session.deviceId !== deviceId || !isSessionActive(session, this.clock())) {
      return null;
    }
    return session;
  }

  public async getById(id: SessionId): Promise<Session | null> {
    const { sessionKey } = buildSessionKeys('', id, this.prefix);
    const raw = await this.read(() => this.redis.get(sessionKey), 'get_session');
    return raw ? parseSession(raw) : null;
  }

  public async create(session: Session): Promise<void> {
    const result = await this.write(LUA_CREATE_SESSION, session, 'create');
    if (result === 'session_exists') {
      throw new ResourceError(`session ${session.id} already exists`);
    }
    if (result === 'device_has_active') {
      throw new ResourceError(`device ${session.deviceId} already has an active session`);
    }
    this.assertOk(result, session, 'create');

    log.info(
      { event: 'session_created', session_id: session.id, device_id: session.deviceId },
      'session created',
    );
  }

  public async update(session: Session): Promise<void> {
    const result = await this.write(LUA_UPDATE_SESSION, session, 'update');
    if (result === 'not_found') {
      throw new ResourceError(`session ${session.id} not found`);
    }
    if (result === 'device_has_active') {
      throw new ResourceError(`device ${session.deviceId} already has an active session`);
    }
    this.assertOk(result, session, 'update');
  }

  public async addTurn(id: SessionId, turn: Turn): Promise<Session> {
    const session = await this.getById(id);
    if (!session) {
      throw new ResourceError(`session ${id} not found`);
    }
    if (session.status !== 'active') {
      throw new ResourceError(`session ${id} is ${session.status}`);
    }

    appendTurn(session, turn, this.clock());
    await this.update(session);
    return session;
  }

  private async write(script: string, session: Session, operation: string): Promise<string> {
    const { activeKey, sessionKey } = buildSessionKeys(session.deviceId, session.id, this.prefix);
    try {
      return await evalScript(
        this.redis,
        script,
        [activeKey, sessionKey],
        [
          session.id,
          serializeSession(session),
          String(session.expiresAt.getTime()),
          session.status === 'active' ? '1' : '0',
        ],
      );
    } catch (error) {
      log.error(
        {
          err: error,
          event: 'session_store_write_failed',
          operation,
          session_id: session.id,
          device_id: session.deviceId,
        },
        'session store write failed',
      );
      throw new ResourceError(`session ${operation} failed`, { cause: error });
    }
  }

  private async read<T>(run: () => Promise<T>, operation: string): Promise<T> {
    try {
      return await run();
    } catch (error) {
      log.error({ err: error, event: 'session_store_read_failed', operation }, 'session store read failed');
      throw new ResourceError(`session ${operation} failed`, { cause: error });
    }
  }

  private assertOk(result: string, session: Session, operation: string): void {
    if (result === 'OK') {
      return;
    }
    log.error(
      { event: 'session_store_unknown_result', result, operation, session_id: session.id },
      'session store returned unknown result',
    );
    throw new ResourceError(`session ${operation} returned ${result}`);
  }
}
