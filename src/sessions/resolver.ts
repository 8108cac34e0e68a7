import { log } from '../log';
import { incSessionPersistFailure } from '../metrics';
import { canContinueSession, createSession, setSessionLanguage, terminateSession } from './session';
import type { DeviceId, Session, SessionStore } from './types';

export interface ResolveSessionOptions {
  continuationMs: number;
  defaultLanguage: string;
  /** Language negotiated by the device, applied to the resolved session. */
  language?: string;
  /** The caller's in-memory session, reused when the store lookup fails. */
  cached?: Session | null;
  now?: Date;
}

/**
 * Returns the session a new utterance belongs to. A session past the
 * continuation window is terminated and replaced by a fresh one.
 */
export async function resolveDeviceSession(
  store: SessionStore,
  deviceId: DeviceId,
  options: ResolveSessionOptions,
): Promise<Session> {
  const now = options.now ?? new Date();
  let current: Session | null;
  try {
    current = await store.getActive(deviceId);
  } catch (error) {
    const cached = options.cached;
    if (!cached || !canContinueSession(cached, options.continuationMs, now)) {
      throw error;
    }
    log.warn(
      { err: error, event: 'session_lookup_failed_reusing', device_id: deviceId, session_id: cached.id },
      'session lookup failed, reusing in-memory session',
    );
    current = cached;
  }

  if (current && !canContinueSession(current, options.continuationMs, now)) {
    terminateSession(current, now);
    await store.update(current);
    log.info({ event: 'session_superseded', device_id: deviceId, session_id: current.id }, 'session superseded');
    current = null;
  }

  if (!current) {
    const fresh = createSession(deviceId, { language: options.language ?? options.defaultLanguage, now });
    await store.create(fresh);
    log.info({ event: 'session_started', device_id: deviceId, session_id: fresh.id }, 'session started');
    return fresh;
  }

  if (options.language && setSessionLanguage(current, options.language, now)) {
    await persistSession(store, current, 'update_language');
  }
  return current;
}

/** Writes the session, logging and counting a failure instead of raising it. */
export async function persistSession(store: SessionStore, session: Session, operation: string): Promise<boolean> {
  try {
    await store.update(session);
    return true;
  } catch (error) {
    incSessionPersistFailure(operation);
    log.error(
      { err: error, event: 'session_persist_failed', operation, device_id: session.deviceId, session_id: session.id },
      'session persist failed',
    );
    return false;
  }
}
