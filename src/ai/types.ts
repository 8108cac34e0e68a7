import type { Turn } from '../sessions/types';

export interface ConversationTurn {
  role: 'user' | 'assistant';
  content: string;
  timestamp: Date;
}

export interface ConversationContext {
  deviceId: string;
  sessionId: string;
  language: string;
  history: readonly Turn[];
}

/**
 * A stateful chat: each `send` is one user message and resolves with the
 * assistant reply. The exchange is added to the handle's history only when
 * the reply succeeds.
 */
export interface ConversationHandle {
  readonly sessionId: string;
  send(text: string, opts?: { signal?: AbortSignal }): Promise<string>;
  history(): ConversationTurn[];
}

export interface ConversationModel {
  startConversation(context: ConversationContext): Promise<ConversationHandle>;
}

export interface ContentVerdict {
  safe: boolean;
  matched: string[];
}

export interface ContentValidator {
  validate(text: string): Promise<ContentVerdict>;
}

export function turnsToConversation(turns: readonly Turn[]): ConversationTurn[] {
  return turns.map((turn) => ({
    role: turn.role,
    content: turn.content,
    timestamp: new Date(turn.timestamp),
  }));
}
