import assert from 'node:assert/strict';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';

setTestEnv();

class StubConnection {
  public closedWith: { code: number; reason: string } | null = null;

  constructor(public readonly deviceId: string) {}

  close(code: number, reason: string): void {
    this.closedWith = { code, reason };
  }
}

test('register admits one connection per device', async () => {
  const { ConnectionHub } = await import('../src/devices/connectionHub');
  const hub = new ConnectionHub<StubConnection>();

  assert.equal(hub.register(new StubConnection('toy-1')), undefined);
  assert.equal(hub.register(new StubConnection('toy-2')), undefined);

  assert.equal(hub.size(), 2);
  assert.equal(hub.has('toy-1'), true);
});

test('a new connection replaces and closes the previous one', async () => {
  const { ConnectionHub, REPLACED_CLOSE_CODE, REPLACED_CLOSE_REASON } = await import('../src/devices/connectionHub');
  const hub = new ConnectionHub<StubConnection>();
  const first = new StubConnection('toy-1');
  const second = new StubConnection('toy-1');

  hub.register(first);
  assert.equal(hub.register(second), first);

  assert.deepEqual(first.closedWith, { code: 4000, reason: 'replaced_by_new_connection' });
  assert.equal(REPLACED_CLOSE_CODE, 4000);
  assert.equal(REPLACED_CLOSE_REASON, 'replaced_by_new_connection');
  assert.equal(second.closedWith, null);
  assert.equal(hub.get('toy-1'), second);
  assert.equal(hub.size(), 1);
});

test('unregister ignores a connection that was already replaced', async () => {
  const { ConnectionHub } = await import('../src/devices/connectionHub');
  const hub = new ConnectionHub<StubConnection>();
  const first = new StubConnection('toy-1');
  const second = new StubConnection('toy-1');
  hub.register(first);
  hub.register(second);

  assert.equal(hub.unregister(first), false);
  assert.equal(hub.get('toy-1'), second);

  assert.equal(hub.unregister(second), true);
  assert.equal(hub.size(), 0);
  assert.equal(hub.unregister(second), false);
});

test('closeAll closes and forgets every connection', async () => {
  const { ConnectionHub } = await import('../src/devices/connectionHub');
  const hub = new ConnectionHub<StubConnection>();
  const a = new StubConnection('toy-1');
  const b = new StubConnection('toy-2');
  hub.register(a);
  hub.register(b);

  hub.closeAll(1001, 'server_shutdown');

  assert.deepEqual(a.closedWith, { code: 1001, reason: 'server_shutdown' });
  assert.deepEqual(b.closedWith, { code: 1001, reason: 'server_shutdown' });
  assert.equal(hub.size(), 0);
});
