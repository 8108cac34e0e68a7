import assert from 'node:assert/strict';
import { setTimeout as sleep } from 'node:timers/promises';
import { test } from 'node:test';
import type { UtteranceResult } from '../src/conversation/service';
import type { DeviceConnection, DeviceConnectionOptions, UtteranceProcessor } from '../src/devices/deviceConnection';
import type { Session, SessionStore } from '../src/sessions/types';
import { EchoConversationModel, FakeSttProvider, FakeSynthesizer, FakeTransport, tick } from './fakes';
import { setTestEnv } from './testEnv';

setTestEnv();

const T0 = new Date('2024-05-01T08:00:00.000Z');
const MINUTE = 60_000;

const OPTIONS: DeviceConnectionOptions = {
  continuationMs: 30 * MINUTE,
  defaultLanguage: 'id-ID',
  defaultSampleRateHz: 48000,
  defaultEncoding: 'LINEAR16',
  pingIntervalMs: 60_000,
  pongWaitMs: 120_000,
  outboundQueueSize: 64,
  outboundDrainTimeoutMs: 1000,
};

class Deferred<T> {
  public readonly promise: Promise<T>;
  private settle: (value: T) => void = () => undefined;

  constructor() {
    this.promise = new Promise<T>((resolve) => {
      this.settle = resolve;
    });
  }

  resolve(value: T): void {
    this.settle(value);
  }
}

async function setup(
  options: {
    transcript?: string;
    store?: (clock: () => Date) => SessionStore;
    processor?: UtteranceProcessor;
    tts?: FakeSynthesizer;
    connection?: Partial<DeviceConnectionOptions>;
  } = {},
) {
  const { ConnectionHub } = await import('../src/devices/connectionHub');
  const { DeviceConnection } = await import('../src/devices/deviceConnection');
  const { MemorySessionStore } = await import('../src/sessions/memorySessionStore');
  const { SagaManager } = await import('../src/saga/manager');
  const { ConversationService } = await import('../src/conversation/service');
  const { KeywordContentValidator } = await import('../src/ai/contentValidator');

  let current = T0.getTime();
  const clock = (): Date => new Date(current);
  const hub = new ConnectionHub<DeviceConnection>();
  const store = options.store ? options.store(clock) : new MemorySessionStore({ clock });
  const stt = new FakeSttProvider(options.transcript ?? 'halo', 0.9);
  const model = new EchoConversationModel();
  const sagas = new SagaManager();
  const service = new ConversationService(
    sagas,
    { stt, tts: options.tts ?? new FakeSynthesizer(), validator: new KeywordContentValidator(['pistol']) },
    { pollIntervalMs: 5, waitTimeoutMs: 2000 },
  );

  const connect = (transport: FakeTransport = new FakeTransport()) => {
    const connection = new DeviceConnection(
      'toy-1',
      transport,
      { hub, store, stt, model, processor: options.processor ?? service, clock },
      { ...OPTIONS, ...options.connection },
    );
    connection.start();
    return { connection, transport };
  };

  return {
    hub,
    store,
    stt,
    model,
    sagas,
    connect,
    advance: (ms: number) => {
      current += ms;
    },
  };
}

async function settle(connection: DeviceConnection): Promise<void> {
  await connection.whenIdle();
  await tick();
}

function speak(connection: DeviceConnection, frames: Buffer[], start: Record<string, unknown> = {}): void {
  connection.handleText(JSON.stringify({ type: 'listening_start', ...start }));
  for (const frame of frames) {
    connection.handleBinary(frame);
  }
  connection.handleText(JSON.stringify({ type: 'listening_end' }));
}

const REPLY_KINDS = ['listening_start', 'listening_end', 'speaking_start', 'audio', 'audio', 'speaking_end'];

test('an utterance is transcribed, answered and stored', async () => {
  const { connect, stt, store, sagas } = await setup();
  const { connection, transport } = connect();

  speak(connection, [Buffer.from([1, 2]), Buffer.from([3]), Buffer.from([4, 5])], { language: 'id-ID' });
  await settle(connection);

  assert.deepEqual(transport.kinds(), REPLY_KINDS);
  const [ready, ack, speaking, done] = transport.messages();
  assert.equal(ready?.['status'], 'ready');
  const sessionId = ready?.['session_id'];
  assert.equal(typeof sessionId, 'string');
  assert.deepEqual(
    { status: ack?.['status'], transcript: ack?.['transcript'], session_id: ack?.['session_id'] },
    { status: 'processing', transcript: 'halo', session_id: sessionId },
  );
  assert.equal(speaking?.['text'], 'echo: halo');
  assert.equal(done?.['session_id'], sessionId);
  assert.deepEqual(transport.audio(), [Buffer.from('aa'), Buffer.from('bb')]);

  assert.deepEqual(stt.streams[0]?.chunks, [Buffer.from([1, 2]), Buffer.from([3]), Buffer.from([4, 5])]);
  assert.deepEqual(stt.streams[0]?.config, { sampleRateHz: 48000, encoding: 'LINEAR16', language: 'id-ID' });

  const stored = await store.getActive('toy-1');
  assert.equal(stored?.id, sessionId);
  assert.deepEqual(
    stored?.turns.map((turn) => [turn.role, turn.content]),
    [
      ['user', 'halo'],
      ['assistant', 'echo: halo'],
    ],
  );
  assert.deepEqual(stored?.turns[0]?.metadata, { confidence: 0.9 });
  assert.equal(connection.getState(), 'idle');
  sagas.stop();
});

test('a session continues within the window and is replaced after it', async () => {
  const { connect, store, model, advance, sagas } = await setup();
  const { connection, transport } = connect();

  speak(connection, [Buffer.from([1])]);
  await settle(connection);
  const firstId = transport.messages()[0]?.['session_id'];

  advance(10 * MINUTE);
  speak(connection, [Buffer.from([2])]);
  await settle(connection);
  assert.equal(transport.messages()[4]?.['session_id'], firstId);
  assert.equal(model.started.length, 1);

  advance(45 * MINUTE);
  speak(connection, [Buffer.from([3])]);
  await settle(connection);
  const thirdId = transport.messages()[8]?.['session_id'];
  assert.equal(typeof thirdId, 'string');
  assert.notEqual(thirdId, firstId);

  const previous = await store.getById(String(firstId));
  assert.equal(previous?.status, 'terminated');
  assert.equal(previous?.turns.length, 4);
  assert.equal(model.started.length, 2);
  assert.equal(model.started[1]?.history.length, 0);
  assert.equal((await store.getActive('toy-1'))?.id, thirdId);
  sagas.stop();
});

test('a negotiated language is applied to the session and the recognizer', async () => {
  const { connect, stt, store, sagas } = await setup();
  const { connection } = connect();

  speak(connection, [Buffer.from([1])], { language: 'en-US', sample_rate: 16000, encoding: 'OPUS' });
  await settle(connection);

  assert.deepEqual(stt.streams[0]?.config, { sampleRateHz: 16000, encoding: 'OPUS', language: 'en-US' });
  assert.equal((await store.getActive('toy-1'))?.metadata.language, 'en-US');
  sagas.stop();
});

test('unsafe content produces one error and no audio', async () => {
  const { connect, store, sagas } = await setup({ transcript: 'aku punya pistol' });
  const { connection, transport } = connect();

  speak(connection, [Buffer.from([1])]);
  await settle(connection);

  assert.deepEqual(transport.kinds(), ['listening_start', 'listening_end', 'error']);
  const error = transport.messages()[2];
  assert.equal(error?.['code'], 'content_rejected');
  assert.equal(error?.['message'], 'content is not child-safe');
  assert.equal((await store.getActive('toy-1'))?.turns.length, 0);
  assert.equal(connection.getState(), 'idle');
  sagas.stop();
});

test('a second listening_start while listening is rejected without disturbing the first', async () => {
  const { connect, stt, sagas } = await setup();
  const { connection, transport } = connect();

  connection.handleText(JSON.stringify({ type: 'listening_start' }));
  connection.handleText(JSON.stringify({ type: 'listening_start' }));
  connection.handleBinary(Buffer.from([1, 2]));
  connection.handleText(JSON.stringify({ type: 'listening_end' }));
  await settle(connection);

  assert.deepEqual(transport.kinds(), [
    'listening_start',
    'error',
    'listening_end',
    'speaking_start',
    'audio',
    'audio',
    'speaking_end',
  ]);
  const rejection = transport.messages()[1];
  assert.equal(rejection?.['code'], 'state_error');
  assert.equal(rejection?.['message'], 'cannot start listening while listening');
  assert.equal(stt.streams.length, 1);
  assert.deepEqual(stt.streams[0]?.chunks, [Buffer.from([1, 2])]);
  sagas.stop();
});

test('listening_end without audio never reaches the pipeline', async () => {
  const { connect, stt, sagas } = await setup();
  const { connection, transport } = connect();

  speak(connection, []);
  await settle(connection);

  assert.deepEqual(transport.kinds(), ['listening_start', 'error']);
  assert.equal(transport.messages()[1]?.['code'], 'stream_error');
  assert.equal(transport.messages()[1]?.['message'], 'no audio received');
  assert.equal(stt.transcribeCalls.length, 0);
  assert.equal(stt.streams[0]?.cancelled, 'no_audio');
  assert.equal(sagas.size(), 0);
  sagas.stop();
});

test('listening_end outside listening is a state error', async () => {
  const { connect, sagas } = await setup();
  const { connection, transport } = connect();

  connection.handleText(JSON.stringify({ type: 'listening_end' }));
  await settle(connection);

  assert.equal(transport.messages()[0]?.['code'], 'state_error');
  assert.equal(transport.messages()[0]?.['message'], 'cannot end listening while idle');
  sagas.stop();
});

test('audio frames outside listening are dropped', async () => {
  const { connect, stt, sagas } = await setup();
  const { connection, transport } = connect();

  connection.handleBinary(Buffer.from([1, 2, 3]));
  await settle(connection);

  assert.deepEqual(transport.frames, []);
  assert.equal(stt.streams.length, 0);
  sagas.stop();
});

test('malformed messages are reported and the connection stays open', async () => {
  const { connect, sagas } = await setup();
  const { connection, transport } = connect();

  connection.handleText('{oops');
  connection.handleText(JSON.stringify({ type: 'ping', data: 'x' }));
  await settle(connection);

  const [error, pong] = transport.messages();
  assert.equal(error?.['type'], 'error');
  assert.equal(error?.['code'], 'validation_error');
  assert.equal(error?.['message'], 'message is not valid json');
  assert.equal(pong?.['type'], 'pong');
  assert.equal(pong?.['data'], 'x');
  assert.equal(transport.closed, null);
  assert.equal(connection.isClosed(), false);
  sagas.stop();
});

test('a failed session lookup fails listening_start with resource_error', async () => {
  const { MemorySessionStore } = await import('../src/sessions/memorySessionStore');
  const { ResourceError } = await import('../src/errors');
  class DownStore extends MemorySessionStore {
    async getActive(): Promise<Session | null> {
      throw new ResourceError('store down');
    }
  }
  const { connect, sagas } = await setup({ store: (clock) => new DownStore({ clock }) });
  const { connection, transport } = connect();

  connection.handleText(JSON.stringify({ type: 'listening_start' }));
  await settle(connection);

  const reply = transport.messages()[0];
  assert.equal(reply?.['type'], 'listening_start');
  assert.equal(reply?.['status'], 'error');
  assert.equal(reply?.['code'], 'resource_error');
  assert.equal(reply?.['message'], 'store down');
  assert.equal(connection.getState(), 'idle');
  sagas.stop();
});

test('turn persistence failures are not reported to the device', async () => {
  const { MemorySessionStore } = await import('../src/sessions/memorySessionStore');
  const { ResourceError } = await import('../src/errors');
  class FlakyStore extends MemorySessionStore {
    public failUpdates = false;

    async update(session: Session): Promise<void> {
      if (this.failUpdates) {
        throw new ResourceError('store down');
      }
      return super.update(session);
    }
  }
  const { connect, store, sagas } = await setup({ store: (clock) => new FlakyStore({ clock }) });
  const { connection, transport } = connect();
  assert.ok(store instanceof FlakyStore);

  connection.handleText(JSON.stringify({ type: 'listening_start' }));
  await settle(connection);
  store.failUpdates = true;
  connection.handleBinary(Buffer.from([1]));
  connection.handleText(JSON.stringify({ type: 'listening_end' }));
  await settle(connection);

  assert.deepEqual(transport.kinds(), REPLY_KINDS);
  assert.equal(connection.getSession()?.turns.length, 2);
  assert.equal((await store.getActive('toy-1'))?.turns.length, 0);
  sagas.stop();
});

test('a reply finished after disconnect is discarded', async () => {
  const gate = new Deferred<UtteranceResult>();
  const { connect, store, hub, sagas } = await setup({ processor: { processUtterance: () => gate.promise } });
  const { connection, transport } = connect();

  speak(connection, [Buffer.from([1])]);
  await tick();
  assert.equal(connection.getState(), 'processing');

  connection.handleText(JSON.stringify({ type: 'listening_start' }));
  await tick();
  connection.handleClose(1000, 'bye');
  gate.resolve({ sagaId: 'saga-1', transcript: 'halo', reply: 'hai', audio: [Buffer.from('aa')] });
  await tick();

  assert.deepEqual(transport.kinds(), ['listening_start', 'listening_end', 'error']);
  assert.equal(transport.messages()[2]?.['code'], 'state_error');
  assert.equal((await store.getActive('toy-1'))?.turns.length, 0);
  assert.equal(hub.size(), 0);
  sagas.stop();
});

test('disconnecting while listening cancels recognition', async () => {
  const { connect, stt, hub, sagas } = await setup();
  const { connection, transport } = connect();

  connection.handleText(JSON.stringify({ type: 'listening_start' }));
  connection.handleBinary(Buffer.from([1]));
  await settle(connection);
  connection.handleClose(1001, 'going away');
  connection.handleText(JSON.stringify({ type: 'ping' }));
  await tick();

  assert.equal(stt.streams[0]?.cancelled, 'disconnected');
  assert.equal(hub.size(), 0);
  assert.deepEqual(transport.kinds(), ['listening_start']);
  sagas.stop();
});

test('a reconnect replaces the previous connection', async () => {
  const { connect, hub, sagas } = await setup();
  const first = connect();
  const second = connect();

  assert.deepEqual(first.transport.closed, { code: 4000, reason: 'replaced_by_new_connection' });
  assert.equal(first.connection.isClosed(), true);
  assert.equal(hub.get('toy-1'), second.connection);
  assert.equal(second.connection.isClosed(), false);
  sagas.stop();
});

test('a connection that stops answering pings is terminated', async () => {
  const { connect, hub, sagas } = await setup({ connection: { pingIntervalMs: 10, pongWaitMs: 25 } });
  const { connection, transport } = connect();

  await sleep(80);

  assert.ok(transport.pings >= 1);
  assert.equal(transport.terminated, true);
  assert.equal(connection.isClosed(), true);
  assert.equal(hub.size(), 0);
  sagas.stop();
});

test('a reply longer than the outbound queue is streamed in full', async () => {
  const chunks = Array.from({ length: 300 }, (_, i) => Buffer.alloc(8, i % 256));
  const { connect, store, sagas } = await setup({
    tts: new FakeSynthesizer(chunks),
    connection: { outboundQueueSize: 16 },
  });
  const { connection, transport } = connect();

  speak(connection, [Buffer.from([1])]);
  await settle(connection);

  const kinds = transport.kinds();
  assert.deepEqual(kinds.slice(0, 3), ['listening_start', 'listening_end', 'speaking_start']);
  assert.equal(kinds[kinds.length - 1], 'speaking_end');
  assert.deepEqual(transport.audio(), chunks);
  assert.equal(transport.closed, null);
  assert.equal((await store.getActive('toy-1'))?.turns.length, 2);
  sagas.stop();
});

class StallingTransport extends FakeTransport {
  send(frame: string | Buffer): Promise<void> {
    this.frames.push(frame);
    return new Promise<void>(() => undefined);
  }
}

test('a device that stops draining mid-reply is closed and the turn is not stored', async () => {
  const chunks = Array.from({ length: 10 }, () => Buffer.from('aa'));
  const { connect, store, hub, sagas } = await setup({
    tts: new FakeSynthesizer(chunks),
    connection: { outboundQueueSize: 4, outboundDrainTimeoutMs: 20 },
  });
  const transport = new StallingTransport();
  const { connection } = connect(transport);

  speak(connection, [Buffer.from([1])]);
  await settle(connection);

  assert.deepEqual(transport.closed, { code: 1008, reason: 'slow_consumer' });
  assert.deepEqual(transport.kinds(), ['listening_start']);
  assert.equal(connection.isClosed(), true);
  assert.equal(hub.size(), 0);
  assert.equal((await store.getActive('toy-1'))?.turns.length, 0);
  sagas.stop();
});

test('a synthesis failure sends one error, no audio, and reseeds the conversation', async () => {
  const { StreamError } = await import('../src/errors');
  const tts = new FakeSynthesizer([Buffer.from('aa')], new StreamError('tts broke'));
  const { connect, store, model, sagas } = await setup({ tts });
  const { connection, transport } = connect();

  speak(connection, [Buffer.from([1])]);
  await settle(connection);

  assert.deepEqual(transport.kinds(), ['listening_start', 'listening_end', 'error']);
  assert.equal(transport.messages()[2]?.['code'], 'stream_error');
  assert.equal(transport.messages()[2]?.['message'], 'tts broke');
  assert.equal((await store.getActive('toy-1'))?.turns.length, 0);
  assert.equal(connection.getState(), 'idle');

  tts.failAfter = undefined;
  speak(connection, [Buffer.from([2])]);
  await settle(connection);

  assert.deepEqual(transport.kinds().slice(3), REPLY_KINDS.slice(0, 3).concat(['audio', 'speaking_end']));
  assert.equal(model.started.length, 2);
  assert.equal(model.started[1]?.history.length, 0);
  assert.deepEqual(
    model.handles[1]?.history().map((turn) => turn.content),
    ['halo', 'echo: halo'],
  );
  assert.equal((await store.getActive('toy-1'))?.turns.length, 2);
  sagas.stop();
});
