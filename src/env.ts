import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const emptyToUndefined = (value: unknown): unknown => {
  if (typeof value === 'string' && value.trim() === '') {
    return undefined;
  }
  return value;
};

const commaList = (value: unknown): unknown => {
  if (typeof value === 'string') {
    return value
      .split(',')
      .map((entry) => entry.trim())
      .filter((entry) => entry !== '');
  }
  return value;
};

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive(),
  LOG_LEVEL: z.preprocess(
    emptyToUndefined,
    z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  ),
  DEVICE_STREAM_TOKEN: z.string().min(1),
  REDIS_URL: z.string().min(1),
  SESSION_PREFIX: z.preprocess(emptyToUndefined, z.string().min(1).default('voicesession')),
  SESSION_STORE: z.preprocess(emptyToUndefined, z.enum(['redis', 'memory']).default('redis')),
  SESSION_CONTINUATION_MINUTES: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().default(30),
  ),
  DEFAULT_LANGUAGE: z.preprocess(emptyToUndefined, z.string().min(1).default('id-ID')),
  DEFAULT_SAMPLE_RATE: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(48000)),
  DEFAULT_ENCODING: z.preprocess(emptyToUndefined, z.string().min(1).default('LINEAR16')),
  STT_URL: z.string().min(1),
  STT_TIMEOUT_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(10000)),
  STT_MAX_BUFFER_BYTES: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().default(10 * 1024 * 1024),
  ),
  TTS_URL: z.string().min(1),
  TTS_VOICE_ID: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
  TTS_CHUNK_BYTES: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(4096)),
  BRAIN_URL: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
  BRAIN_TIMEOUT_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(15000)),
  CONTENT_BLOCKLIST: z.preprocess(commaList, z.array(z.string().min(1)).default([])),
  SAGA_TIMEOUT_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(30000)),
  SAGA_WAIT_TIMEOUT_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(30000)),
  SAGA_POLL_INTERVAL_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(100)),
  SAGA_EVENT_QUEUE_SIZE: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(100)),
  SAGA_RETENTION_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(10 * 60_000)),
  WS_PING_INTERVAL_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(54000)),
  WS_PONG_WAIT_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(60000)),
  WS_MAX_MESSAGE_BYTES: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().default(512 * 1024),
  ),
  OUTBOUND_QUEUE_SIZE: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(256)),
  OUTBOUND_DRAIN_TIMEOUT_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(10000)),
  SESSION_SWEEP_INTERVAL_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(60000)),
});

export type Env = z.infer<typeof EnvSchema>;

const parsed = EnvSchema.safeParse(process.env);

if (!parsed.success) {
  const issues = parsed.error.issues
    .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    .join(', ');
  throw new Error(`Invalid environment variables: ${issues}`);
}

export const env = parsed.data;
