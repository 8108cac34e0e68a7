import assert from 'node:assert/strict';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';
import { tick } from './fakes';

setTestEnv();

test('frames are written in push order', async () => {
  const { OutboundQueue } = await import('../src/devices/outboundQueue');
  const written: Array<string | Buffer> = [];
  const queue = new OutboundQueue(
    8,
    async (frame) => {
      written.push(frame);
    },
    () => assert.fail('unexpected overflow'),
  );

  queue.push('first');
  queue.push(Buffer.from([1, 2]));
  queue.push('last');
  await tick();

  assert.deepEqual(written, ['first', Buffer.from([1, 2]), 'last']);
  queue.close();
  await queue.done();
});

test('overflow closes the queue and reports once', async () => {
  const { OutboundQueue } = await import('../src/devices/outboundQueue');
  let overflows = 0;
  const queue = new OutboundQueue(
    2,
    () => new Promise<void>(() => undefined),
    () => {
      overflows += 1;
    },
  );

  assert.equal(queue.push('a'), true);
  assert.equal(queue.push('b'), true);
  assert.equal(queue.push('c'), true);
  assert.equal(queue.push('d'), false);
  assert.equal(queue.push('e'), false);

  assert.equal(overflows, 1);
  assert.equal(queue.isClosed(), true);
});

test('a failed write closes the queue', async () => {
  const { OutboundQueue } = await import('../src/devices/outboundQueue');
  const queue = new OutboundQueue(
    4,
    async () => {
      throw new Error('socket gone');
    },
    () => undefined,
  );

  queue.push('a');
  await tick();

  assert.equal(queue.isClosed(), true);
  assert.equal(queue.push('b'), false);
  await queue.done();
});

test('send waits for the pump instead of overflowing', async () => {
  const { OutboundQueue } = await import('../src/devices/outboundQueue');
  const written: Array<string | Buffer> = [];
  const queue = new OutboundQueue(
    4,
    async (frame) => {
      written.push(frame);
    },
    () => assert.fail('unexpected overflow'),
  );

  const expected: string[] = [];
  for (let i = 0; i < 20; i += 1) {
    expected.push(`chunk-${i}`);
    assert.equal(await queue.send(`chunk-${i}`), true);
  }
  await tick();

  assert.deepEqual(written, expected);
  assert.equal(queue.isClosed(), false);
  queue.close();
  await queue.done();
});

test('send gives up on a device that stops draining', async () => {
  const { OutboundQueue } = await import('../src/devices/outboundQueue');
  let overflows = 0;
  const queue = new OutboundQueue(
    4,
    () => new Promise<void>(() => undefined),
    () => {
      overflows += 1;
    },
    {},
    20,
  );

  assert.equal(await queue.send('a'), true);
  assert.equal(await queue.send('b'), true);
  assert.equal(await queue.send('c'), true);
  assert.equal(await queue.send('d'), false);

  assert.equal(overflows, 1);
  assert.equal(queue.isClosed(), true);
});

test('control frames still fit while a send waits for room', async () => {
  const { OutboundQueue } = await import('../src/devices/outboundQueue');
  const queue = new OutboundQueue(
    4,
    () => new Promise<void>(() => undefined),
    () => assert.fail('unexpected overflow'),
    {},
    1000,
  );

  assert.equal(await queue.send('a'), true);
  assert.equal(await queue.send('b'), true);
  assert.equal(await queue.send('c'), true);
  const waiting = queue.send('d');

  assert.equal(queue.push('pong'), true);
  queue.close();
  assert.equal(await waiting, false);
});
