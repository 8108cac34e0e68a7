export type SessionId = string;
export type DeviceId = string;

export type SessionStatus = 'active' | 'expired' | 'terminated';

export type TurnRole = 'user' | 'assistant';

export interface TurnMetadata {
  confidence?: number;
  emotion?: string;
}

export interface Turn {
  readonly timestamp: Date;
  readonly role: TurnRole;
  readonly content: string;
  readonly durationMs: number;
  readonly metadata?: Readonly<TurnMetadata>;
}

export interface SessionMetadata {
  language: string;
  preferences: Record<string, unknown>;
}

export interface Session {
  id: SessionId;
  deviceId: DeviceId;
  status: SessionStatus;
  turns: Turn[];
  metadata: SessionMetadata;
  createdAt: Date;
  lastActiveAt: Date;
  lastTurnAt?: Date;
  expiresAt: Date;
}

/**
 * Persistence for device sessions.
 *
 * Implementations guarantee that at most one session per device is `active`:
 * `create` rejects with a ResourceError when the device already has one.
 * `getActive` never returns an expired or terminated session.
 */
export interface SessionStore {
  getActive(deviceId: DeviceId): Promise<Session | null>;
  getById(id: SessionId): Promise<Session | null>;
  create(session: Session): Promise<void>;
  update(session: Session): Promise<void>;
  addTurn(id: SessionId, turn: Turn): Promise<Session>;
}
