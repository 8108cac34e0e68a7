import { randomUUID } from 'crypto';
import { ValidationError } from '../errors';
import type { DeviceId, Session, Turn } from './types';

export const SESSION_TTL_MS = 24 * 60 * 60 * 1000;

export function createSession(
  deviceId: DeviceId,
  options: { language: string; now?: Date; id?: string },
): Session {
  if (deviceId.trim() === '') {
    throw new ValidationError('device_id is required');
  }

  const now = options.now ?? new Date();
  return {
    id: options.id ?? randomUUID(),
    deviceId,
    status: 'active',
    turns: [],
    metadata: {
      language: options.language,
      preferences: {},
    },
    createdAt: new Date(now),
    lastActiveAt: new Date(now),
    expiresAt: new Date(now.getTime() + SESSION_TTL_MS),
  };
}

/** Every mutation goes through here: expiresAt is always lastActiveAt + 24h. */
export function touchSession(session: Session, now: Date = new Date()): void {
  session.lastActiveAt = new Date(now);
  session.expiresAt = new Date(now.getTime() + SESSION_TTL_MS);
}

export function appendTurn(session: Session, turn: Turn, now: Date = new Date()): void {
  const last = session.turns[session.turns.length - 1];
  if (last && turn.timestamp.getTime() < last.timestamp.getTime()) {
    throw new ValidationError(
      `turn at ${turn.timestamp.toISOString()} precedes last turn at ${last.timestamp.toISOString()}`,
    );
  }

  session.turns.push(freezeTurn(turn));
  session.lastTurnAt = new Date(turn.timestamp);
  touchSession(session, now);
}

export function setSessionLanguage(session: Session, language: string, now: Date = new Date()): boolean {
  if (session.metadata.language === language) {
    return false;
  }
  session.metadata.language = language;
  touchSession(session, now);
  return true;
}

export function terminateSession(session: Session, now: Date = new Date()): void {
  session.status = 'terminated';
  touchSession(session, now);
}

export function expireSession(session: Session, now: Date = new Date()): void {
  session.status = 'expired';
  touchSession(session, now);
}

export function isSessionActive(session: Session, now: Date = new Date()): boolean {
  return session.status === 'active' && session.expiresAt.getTime() > now.getTime();
}

/**
 * A session continues while it is active and its last turn (or, before the
 * first turn, its last activity) is within the continuation window.
 */
export function canContinueSession(session: Session, windowMs: number, now: Date = new Date()): boolean {
  if (!isSessionActive(session, now)) {
    return false;
  }
  const reference = session.lastTurnAt ?? session.lastActiveAt;
  return now.getTime() - reference.getTime() <= windowMs;
}

export function freezeTurn(turn: Turn): Turn {
  return Object.freeze({
    timestamp: new Date(turn.timestamp),
    role: turn.role,
    content: turn.content,
    durationMs: turn.durationMs,
    ...(turn.metadata ? { metadata: Object.freeze({ ...turn.metadata }) } : {}),
  });
}

export function cloneSession(session: Session): Session {
  return {
    id: session.id,
    deviceId: session.deviceId,
    status: session.status,
    turns: session.turns.map(freezeTurn),
    metadata: {
      language: session.metadata.language,
      preferences: { ...session.metadata.preferences },
    },
    createdAt: new Date(session.createdAt),
    lastActiveAt: new Date(session.lastActiveAt),
    ...(session.lastTurnAt ? { lastTurnAt: new Date(session.lastTurnAt) } : {}),
    expiresAt: new Date(session.expiresAt),
  };
}
