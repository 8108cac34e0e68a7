import assert from 'node:assert/strict';
import { test } from 'node:test';
import type { SagaDefinition, Step, StepResult } from '../src/saga/types';
import { setTestEnv } from './testEnv';

setTestEnv();

const FAST_WAIT = { timeoutMs: 2000, pollIntervalMs: 5 };

interface StepBehaviour {
  fail?: Error;
  throws?: Error;
  hang?: boolean;
  compensateThrows?: boolean;
}

function recordingStep(id: string, journal: string[], behaviour: StepBehaviour = {}): Step {
  return {
    id,
    async execute(data, signal): Promise<StepResult> {
      journal.push(`execute:${id}`);
      if (behaviour.hang) {
        await new Promise<void>((resolve) => {
          signal.addEventListener('abort', () => resolve(), { once: true });
        });
        journal.push(`aborted:${id}`);
        return { success: true };
      }
      if (behaviour.throws) {
        throw behaviour.throws;
      }
      if (behaviour.fail) {
        return { success: false, error: behaviour.fail };
      }
      data[id] = `${id}-done`;
      return { success: true, data: { step: id } };
    },
    async compensate(): Promise<void> {
      journal.push(`compensate:${id}`);
      if (behaviour.compensateThrows) {
        throw new Error(`cannot undo ${id}`);
      }
    },
  };
}

function definition(steps: Step[], timeoutMs = 1000): SagaDefinition {
  return { name: 'test_saga', steps, timeoutMs };
}

async function createManager(
  options: import('../src/saga/manager').SagaManagerOptions = {},
): Promise<import('../src/saga/manager').SagaManager> {
  const { SagaManager } = await import('../src/saga/manager');
  return new SagaManager({ retentionMs: 60_000, ...options });
}

test('runs every step in order and completes', async () => {
  const manager = await createManager();
  const journal: string[] = [];
  manager.registerDefinition(
    definition([recordingStep('a', journal), recordingStep('b', journal), recordingStep('c', journal)]),
  );

  const id = manager.start('test_saga', { input: 1 });
  const result = await manager.waitForCompletion(id, FAST_WAIT);

  assert.equal(result.state, 'completed');
  assert.deepEqual(journal, ['execute:a', 'execute:b', 'execute:c']);
  assert.deepEqual(
    result.steps.map((step) => step.state),
    ['completed', 'completed', 'completed'],
  );
  assert.deepEqual(result.steps[1]?.result, { step: 'b' });
  assert.deepEqual(result.data, { input: 1, a: 'a-done', b: 'b-done', c: 'c-done' });
  assert.ok(result.completedAt);
  assert.equal(result.error, undefined);
  manager.stop();
});

test('a failing step compensates earlier steps in reverse order', async () => {
  const { StreamError } = await import('../src/errors');
  const manager = await createManager();
  const journal: string[] = [];
  manager.registerDefinition(
    definition([
      recordingStep('a', journal),
      recordingStep('b', journal),
      recordingStep('c', journal, { fail: new StreamError('c broke') }),
      recordingStep('d', journal),
    ]),
  );

  const id = manager.start('test_saga', {});
  const result = await manager.waitForCompletion(id, FAST_WAIT);

  assert.equal(result.state, 'compensated');
  assert.deepEqual(journal, ['execute:a', 'execute:b', 'execute:c', 'compensate:b', 'compensate:a']);
  assert.deepEqual(
    result.steps.map((step) => step.state),
    ['compensated', 'compensated', 'failed', 'pending'],
  );
  assert.equal(result.steps[2]?.error, 'c broke');
  assert.deepEqual(result.error, { stepId: 'c', code: 'stream_error', message: 'c broke' });
  manager.stop();
});

test('a failing first step compensates nothing', async () => {
  const { ContentRejectedError } = await import('../src/errors');
  const manager = await createManager();
  const journal: string[] = [];
  manager.registerDefinition(
    definition([recordingStep('a', journal, { throws: new ContentRejectedError() }), recordingStep('b', journal)]),
  );

  const result = await manager.waitForCompletion(manager.start('test_saga', {}), FAST_WAIT);

  assert.equal(result.state, 'compensated');
  assert.deepEqual(journal, ['execute:a']);
  assert.deepEqual(result.error, { stepId: 'a', code: 'content_rejected', message: 'content is not child-safe' });
  manager.stop();
});

test('a failing compensation does not stop the walk', async () => {
  const manager = await createManager();
  const journal: string[] = [];
  manager.registerDefinition(
    definition([
      recordingStep('a', journal),
      recordingStep('b', journal, { compensateThrows: true }),
      recordingStep('c', journal, { fail: new Error('c broke') }),
    ]),
  );

  const result = await manager.waitForCompletion(manager.start('test_saga', {}), FAST_WAIT);

  assert.equal(result.state, 'compensated');
  assert.deepEqual(journal, ['execute:a', 'execute:b', 'execute:c', 'compensate:b', 'compensate:a']);
  assert.deepEqual(
    result.steps.map((step) => step.state),
    ['compensated', 'completed', 'failed'],
  );
  manager.stop();
});

test('the definition deadline fails the in-flight step', async () => {
  const manager = await createManager();
  const journal: string[] = [];
  manager.registerDefinition(
    definition([recordingStep('a', journal), recordingStep('slow', journal, { hang: true })], 30),
  );

  const result = await manager.waitForCompletion(manager.start('test_saga', {}), FAST_WAIT);

  assert.equal(result.state, 'compensated');
  assert.equal(result.error?.stepId, 'slow');
  assert.equal(result.error?.code, 'timeout_error');
  assert.equal(result.error?.message, 'saga deadline of 30ms exceeded during slow');
  assert.deepEqual(journal.slice(0, 2), ['execute:a', 'execute:slow']);
  assert.deepEqual([...journal.slice(2)].sort(), ['aborted:slow', 'compensate:a']);
  manager.stop();
});

test('waitForCompletion gives up independently of the saga', async () => {
  const { TimeoutError } = await import('../src/errors');
  const manager = await createManager();
  manager.registerDefinition(definition([recordingStep('slow', [], { hang: true })], 200));

  const id = manager.start('test_saga', {});
  await assert.rejects(manager.waitForCompletion(id, { timeoutMs: 20, pollIntervalMs: 5 }), TimeoutError);
  assert.equal(manager.get(id)?.state, 'running');

  const result = await manager.waitForCompletion(id, FAST_WAIT);
  assert.equal(result.state, 'compensated');
  manager.stop();
});

test('unknown definitions and ids are validation errors', async () => {
  const { ValidationError } = await import('../src/errors');
  const manager = await createManager();

  assert.throws(() => manager.start('missing', {}), ValidationError);
  await assert.rejects(manager.waitForCompletion('nope', FAST_WAIT), ValidationError);
  assert.equal(manager.get('nope'), undefined);
  manager.stop();
});

test('definitions need unique step ids', async () => {
  const { ValidationError } = await import('../src/errors');
  const manager = await createManager();

  assert.throws(
    () => manager.registerDefinition(definition([recordingStep('a', []), recordingStep('a', [])])),
    ValidationError,
  );
  manager.stop();
});

test('get returns a snapshot', async () => {
  const manager = await createManager();
  manager.registerDefinition(definition([recordingStep('a', [])]));

  const id = manager.start('test_saga', { input: 1 });
  const done = await manager.waitForCompletion(id, FAST_WAIT);
  done.data['input'] = 2;
  done.steps.length = 0;

  const again = manager.get(id);
  assert.equal(again?.data['input'], 1);
  assert.equal(again?.steps.length, 1);
  manager.stop();
});

test('events are emitted in lifecycle order', async () => {
  const manager = await createManager();
  manager.registerDefinition(definition([recordingStep('a', [])]));

  const id = manager.start('test_saga', {});
  await manager.waitForCompletion(id, FAST_WAIT);

  const types: string[] = [];
  for (let i = 0; i < 4; i += 1) {
    const event = await manager.nextEvent();
    assert.equal(event?.sagaId, id);
    types.push(event?.type ?? 'none');
  }
  assert.deepEqual(types, ['saga_started', 'step_started', 'step_completed', 'saga_completed']);
  manager.stop();
});

test('a full event queue drops events without blocking the saga', async () => {
  const manager = await createManager({ eventQueueSize: 2 });
  manager.registerDefinition(definition([recordingStep('a', [])]));

  const result = await manager.waitForCompletion(manager.start('test_saga', {}), FAST_WAIT);
  assert.equal(result.state, 'completed');

  assert.equal((await manager.nextEvent())?.type, 'saga_started');
  assert.equal((await manager.nextEvent())?.type, 'step_started');
  assert.equal(await manager.nextEvent(AbortSignal.abort()), undefined);
  manager.stop();
});

test('terminal instances are pruned after the retention period', async () => {
  const manager = await createManager({ retentionMs: 1000 });
  manager.registerDefinition(definition([recordingStep('a', [])]));

  const id = manager.start('test_saga', {});
  await manager.waitForCompletion(id, FAST_WAIT);

  assert.equal(manager.pruneTerminal(Date.now()), 0);
  assert.equal(manager.pruneTerminal(Date.now() + 1000), 1);
  assert.equal(manager.get(id), undefined);
  manager.stop();
});
