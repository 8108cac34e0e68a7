import { createConversationModel } from './ai/brainClient';
import { createContentValidator } from './ai/contentValidator';
import { ConversationService } from './conversation/service';
import { env } from './env';
import { log } from './log';
import { closeRedisClient, getRedisClient } from './redis/client';
import { SagaManager } from './saga/manager';
import { buildServer } from './server';
import { MemorySessionStore } from './sessions/memorySessionStore';
import { RedisSessionStore } from './sessions/redisSessionStore';
import type { SessionStore } from './sessions/types';
import { HttpSttProvider } from './stt/providers/httpStt';
import { HttpSpeechSynthesizer } from './tts/httpTTS';

let memoryStore: MemorySessionStore | null = null;

function createSessionStore(): SessionStore {
  if (env.SESSION_STORE === 'memory') {
    log.warn({ event: 'session_store_memory' }, 'using in-memory session store');
    memoryStore = new MemorySessionStore();
    memoryStore.startExpiry();
    return memoryStore;
  }
  return new RedisSessionStore({ redis: getRedisClient() });
}

const store = createSessionStore();
const stt = new HttpSttProvider();
const model = createConversationModel();
const sagas = new SagaManager();
const service = new ConversationService(sagas, {
  stt,
  validator: createContentValidator(),
  tts: new HttpSpeechSynthesizer(),
});

const eventLogAbort = new AbortController();
service.logEvents(eventLogAbort.signal).catch((error: unknown) => {
  log.error({ err: error, event: 'saga_event_log_failed' }, 'saga event log stopped');
});

const { server, hub, wss } = buildServer({ store, stt, model, service });

server.listen(env.PORT, () => {
  log.info({ port: env.PORT, session_store: env.SESSION_STORE }, 'server listening');
});

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  log.info({ event: 'shutdown_started', signal }, 'shutting down');

  hub.closeAll(1001, 'server_shutdown');
  wss.close();
  eventLogAbort.abort();
  sagas.stop();
  memoryStore?.stop();

  await new Promise<void>((resolve) => {
    server.close((error) => {
      if (error) {
        log.warn({ err: error, event: 'http_close_failed' }, 'http server close failed');
      }
      resolve();
    });
  });

  if (env.SESSION_STORE === 'redis') {
    await closeRedisClient();
  }
  log.info({ event: 'shutdown_complete' }, 'shutdown complete');
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    shutdown(signal)
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        log.error({ err: error, event: 'shutdown_failed' }, 'shutdown failed');
        process.exit(1);
      });
  });
}
