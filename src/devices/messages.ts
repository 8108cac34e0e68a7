import { z } from 'zod';
import { ValidationError, type ErrorCode } from '../errors';

const ListeningStartSchema = z.object({
  type: z.literal('listening_start'),
  timestamp: z.string().optional(),
  sample_rate: z.number().int().positive().optional(),
  encoding: z.string().min(1).optional(),
  language: z.string().min(1).optional(),
});

const ListeningEndSchema = z.object({
  type: z.literal('listening_end'),
  timestamp: z.string().optional(),
});

const PingSchema = z.object({
  type: z.literal('ping'),
  timestamp: z.string().optional(),
  data: z.unknown().optional(),
});

const PongSchema = z.object({
  type: z.literal('pong'),
  timestamp: z.string().optional(),
  data: z.unknown().optional(),
});

const InboundMessageSchema = z.discriminatedUnion('type', [
  ListeningStartSchema,
  ListeningEndSchema,
  PingSchema,
  PongSchema,
]);

export type ListeningStartMessage = z.infer<typeof ListeningStartSchema>;
export type InboundMessage = z.infer<typeof InboundMessageSchema>;

const INBOUND_TYPES: readonly string[] = ['listening_start', 'listening_end', 'ping', 'pong'];

export function parseInboundMessage(raw: string): InboundMessage {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ValidationError('message is not valid json', { cause: error });
  }

  if (typeof json !== 'object' || json === null || !('type' in json) || typeof json.type !== 'string') {
    throw new ValidationError('message type is required');
  }
  if (!INBOUND_TYPES.includes(json.type)) {
    throw new ValidationError(`unsupported message type: ${json.type}`);
  }

  const parsed = InboundMessageSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new ValidationError(`invalid ${json.type} message: ${issues}`);
  }
  return parsed.data;
}

export type OutboundMessage =
  | { type: 'listening_start'; timestamp: string; session_id: string; status: 'ready' }
  | { type: 'listening_start'; timestamp: string; status: 'error'; code: ErrorCode; message: string }
  | { type: 'listening_end'; timestamp: string; session_id: string; status: 'processing'; transcript: string }
  | { type: 'speaking_start'; timestamp: string; session_id: string; text: string }
  | { type: 'speaking_end'; timestamp: string; session_id: string }
  | { type: 'pong'; timestamp: string; data?: unknown }
  | { type: 'error'; timestamp: string; code: ErrorCode; message: string };

function stamp(now: Date): string {
  return now.toISOString();
}

export function listeningStarted(sessionId: string, now: Date = new Date()): OutboundMessage {
  return { type: 'listening_start', timestamp: stamp(now), session_id: sessionId, status: 'ready' };
}

export function listeningStartFailed(code: ErrorCode, message: string, now: Date = new Date()): OutboundMessage {
  return { type: 'listening_start', timestamp: stamp(now), status: 'error', code, message };
}

export function listeningEnded(sessionId: string, transcript: string, now: Date = new Date()): OutboundMessage {
  return { type: 'listening_end', timestamp: stamp(now), session_id: sessionId, status: 'processing', transcript };
}

export function speakingStarted(sessionId: string, text: string, now: Date = new Date()): OutboundMessage {
  return { type: 'speaking_start', timestamp: stamp(now), session_id: sessionId, text };
}

export function speakingEnded(sessionId: string, now: Date = new Date()): OutboundMessage {
  return { type: 'speaking_end', timestamp: stamp(now), session_id: sessionId };
}

export function pongMessage(data: unknown, now: Date = new Date()): OutboundMessage {
  return data === undefined ? { type: 'pong', timestamp: stamp(now) } : { type: 'pong', timestamp: stamp(now), data };
}

export function errorMessage(code: ErrorCode, message: string, now: Date = new Date()): OutboundMessage {
  return { type: 'error', timestamp: stamp(now), code, message };
}

export function encodeMessage(message: OutboundMessage): string {
  return JSON.stringify(message);
}
