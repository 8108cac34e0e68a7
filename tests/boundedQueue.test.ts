import assert from 'node:assert/strict';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';

setTestEnv();

test('offer refuses items past capacity', async () => {
  const { BoundedQueue } = await import('../src/queue/boundedQueue');
  const queue = new BoundedQueue<number>(2);

  assert.equal(queue.offer(1), true);
  assert.equal(queue.offer(2), true);
  assert.equal(queue.offer(3), false);
  assert.equal(queue.size(), 2);

  assert.equal(await queue.take(), 1);
  assert.equal(await queue.take(), 2);
});

test('take waits for the next offer', async () => {
  const { BoundedQueue } = await import('../src/queue/boundedQueue');
  const queue = new BoundedQueue<string>(1);

  const pending = queue.take();
  assert.equal(queue.offer('a'), true);

  assert.equal(await pending, 'a');
  assert.equal(queue.size(), 0);
});

test('an aborted take resolves undefined and leaves later items queued', async () => {
  const { BoundedQueue } = await import('../src/queue/boundedQueue');
  const queue = new BoundedQueue<string>(1);
  const controller = new AbortController();

  const pending = queue.take(controller.signal);
  controller.abort();
  assert.equal(await pending, undefined);

  assert.equal(queue.offer('a'), true);
  assert.equal(queue.size(), 1);
});

test('capacity must be positive', async () => {
  const { BoundedQueue } = await import('../src/queue/boundedQueue');

  assert.throws(() => new BoundedQueue(0));
});

test('whenBelow resolves once a take makes room', async () => {
  const { BoundedQueue } = await import('../src/queue/boundedQueue');
  const queue = new BoundedQueue<number>(3);
  queue.offer(1);
  queue.offer(2);
  queue.offer(3);

  let roomy = false;
  const waiting = queue.whenBelow(2).then(() => {
    roomy = true;
  });

  await queue.take();
  await Promise.resolve();
  assert.equal(roomy, false);

  await queue.take();
  await waiting;
  assert.equal(roomy, true);
  assert.equal(queue.size(), 1);
});

test('an aborted whenBelow resolves with the queue still full', async () => {
  const { BoundedQueue } = await import('../src/queue/boundedQueue');
  const queue = new BoundedQueue<number>(1);
  queue.offer(1);
  const controller = new AbortController();

  const waiting = queue.whenBelow(1, controller.signal);
  controller.abort();
  await waiting;

  assert.equal(queue.size(), 1);
});
