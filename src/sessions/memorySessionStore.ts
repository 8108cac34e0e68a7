import { env } from '../env';
import { ResourceError } from '../errors';
import { log } from '../log';
import { appendTurn, cloneSession, expireSession, isSessionActive } from './session';
import type { DeviceId, Session, SessionId, SessionStore, Turn } from './types';

/**
 * Process-local session store. Used in development and tests, and as the
 * reference behaviour for the Redis store.
 */
export class MemorySessionStore implements SessionStore {
  private readonly sessions = new Map<SessionId, Session>();
  private readonly activeByDevice = new Map<DeviceId, SessionId>();
  private readonly clock: () => Date;
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(options: { clock?: () => Date } = {}) {
    this.clock = options.clock ?? (() => new Date());
  }

  public async getActive(deviceId: DeviceId): Promise<Session | null> {
    const id = this.activeByDevice.get(deviceId);
    if (!id) {
      return null;
    }

    const session = this.sessions.get(id);
    if (!session) {
      this.activeByDevice.delete(deviceId);
      return null;
    }

    if (!isSessionActive(session, this.clock())) {
      this.activeByDevice.delete(deviceId);
      return null;
    }

    return cloneSession(session);
  }

  public async getById(id: SessionId): Promise<Session | null> {
    const session = this.sessions.get(id);
    return session ? cloneSession(session) : null;
  }

  public async create(session: Session): Promise<void> {
    if (this.sessions.has(session.id)) {
      throw new ResourceError(`session ${session.id} already exists`);
    }

    if (session.status === 'active') {
      const existing = await this.getActive(session.deviceId);
      if (existing) {
        throw new ResourceError(`device ${session.deviceId} already has an active session`);
      }
      this.activeByDevice.set(session.deviceId, session.id);
    }

    this.sessions.set(session.id, cloneSession(session));
  }

  public async update(session: Session): Promise<void> {
    if (!this.sessions.has(session.id)) {
      throw new ResourceError(`session ${session.id} not found`);
    }

    const pointer = this.activeByDevice.get(session.deviceId);
    if (session.status === 'active') {
      if (pointer && pointer !== session.id) {
        const other = this.sessions.get(pointer);
        if (other && isSessionActive(other, this.clock())) {
          throw new ResourceError(`device ${session.deviceId} already has an active session`);
        }
      }
      this.activeByDevice.set(session.deviceId, session.id);
    } else if (pointer === session.id) {
      this.activeByDevice.delete(session.deviceId);
    }

    this.sessions.set(session.id, cloneSession(session));
  }

  public async addTurn(id: SessionId, turn: Turn): Promise<Session> {
    const session = this.sessions.get(id);
    if (!session) {
      throw new ResourceError(`session ${id} not found`);
    }
    if (session.status !== 'active') {
      throw new ResourceError(`session ${id} is ${session.status}`);
    }

    appendTurn(session, turn, this.clock());
    return cloneSession(session);
  }

  /**
   * Marks every active session past its expiresAt as expired and drops
   * sessions that were already closed and are past their expiresAt. Returns
   * the number newly expired.
   */
  public expireSessions(): number {
    const now = this.clock();
    let expired = 0;
    for (const session of [...this.sessions.values()]) {
      if (session.expiresAt.getTime() > now.getTime()) {
        continue;
      }
      if (session.status !== 'active') {
        this.sessions.delete(session.id);
        continue;
      }

      expireSession(session, now);
      if (this.activeByDevice.get(session.deviceId) === session.id) {
        this.activeByDevice.delete(session.deviceId);
      }
      expired += 1;
    }
    return expired;
  }

  /** Runs `expireSessions` every `intervalMs` until `stop`. */
  public startExpiry(intervalMs: number = env.SESSION_SWEEP_INTERVAL_MS): void {
    this.stop();
    this.sweepTimer = setInterval(() => {
      const expired = this.expireSessions();
      if (expired > 0) {
        log.info({ event: 'sessions_expired', count: expired }, 'sessions expired');
      }
    }, intervalMs);
    this.sweepTimer.unref();
  }

  public stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }
}
