import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'fs/promises';
import path from 'path';
import { performance } from 'perf_hooks';
import { setTimeout as delay } from 'timers/promises';
import { Bridge, type BridgeResult } from '../bridge.js';
import { bridgeConfigSchema } from '../config/types.js';
import { quote } from '../protocol/codec.js';
import { log, LogLevel } from '../utils/logger.js';
import { FakeEventSource, systemError } from './helpers/fake-source.js';
import { CommandInput, LineCollector } from './helpers/streams.js';
import { createTempTree, waitFor } from './helpers/test-repo.js';

log.setLevel(LogLevel.SILENT);

interface Harness {
  source: FakeEventSource;
  input: CommandInput;
  output: LineCollector;
  bridge: Bridge;
  result: Promise<BridgeResult>;
}

function startBridge(): Harness {
  const source = new FakeEventSource();
  const input = new CommandInput();
  const output = new LineCollector();
  const config = bridgeConfigSchema.parse({
    debounceMs: 10,
    retry: { maxAttempts: 2, baseDelayMs: 1, maxDelayMs: 2 }
  });
  const bridge = new Bridge({ input: input.stream, output: output.stream, config, source });
  return { source, input, output, bridge, result: bridge.run() };
}

async function handshake(harness: Harness): Promise<void> {
  assert.equal(await harness.output.next(), 'VERSION 1');
  harness.input.send('VERSION 1');
}

test('a replica is registered, waited on and reported', async () => {
  const tree = await createTempTree({ 'a.txt': 'a', 'sub/b.txt': 'b' });
  const harness = startBridge();
  try {
    await handshake(harness);
    harness.input.send(`START h1 ${quote(tree.root)}`, 'DIR', 'DIR sub', 'DONE');
    assert.deepEqual(await harness.output.take(3), ['OK', 'OK', 'OK']);

    harness.source.emit(path.join(tree.root, 'a.txt'), 'modified');
    harness.input.send('WAIT h1');
    assert.equal(await harness.output.next(), 'CHANGES h1');

    harness.input.send('CHANGES h1');
    assert.deepEqual(await harness.output.take(2), ['RECURSIVE a.txt', 'DONE']);

    harness.input.end();
    const result = await harness.result;
    assert.equal(result.exitCode, 0);
    assert.equal(result.session.reason, 'end-of-input');
    assert.deepEqual(result.released, { released: 2, failed: 0 });
    assert.equal(harness.source.closed, true);
  } finally {
    await tree.cleanup();
  }
});

test('a directory created and filled before it is watched is reported by its contents', async () => {
  const tree = await createTempTree();
  const harness = startBridge();
  try {
    await handshake(harness);
    harness.input.send(`START h1 ${quote(tree.root)}`, 'DONE');
    assert.equal(await harness.output.next(), 'OK');

    await fs.mkdir(path.join(tree.root, 'sub'));
    await fs.writeFile(path.join(tree.root, 'a.txt'), 'a');
    await fs.writeFile(path.join(tree.root, 'sub/b.txt'), 'b');
    harness.source.emit(path.join(tree.root, 'sub'), 'created', true);
    harness.source.emit(path.join(tree.root, 'a.txt'), 'created');
    await harness.bridge.pump.idle();
    harness.source.emit(path.join(tree.root, 'sub/b.txt'), 'created');

    harness.input.send('WAIT h1');
    assert.equal(await harness.output.next(), 'CHANGES h1');
    harness.input.send('CHANGES h1');
    assert.deepEqual(await harness.output.take(3), ['RECURSIVE a.txt', 'RECURSIVE sub/b.txt', 'DONE']);

    harness.input.end();
    assert.equal((await harness.result).exitCode, 0);
  } finally {
    await tree.cleanup();
  }
});

test('a WAIT with a timeout answers NOCHANGES no earlier than asked', async () => {
  const tree = await createTempTree();
  const harness = startBridge();
  try {
    await handshake(harness);
    harness.input.send(`START h1 ${quote(tree.root)}`, 'DONE');
    assert.equal(await harness.output.next(), 'OK');

    const start = performance.now();
    harness.input.send('WAIT h1 50');
    assert.equal(await harness.output.next(), 'NOCHANGES h1');
    assert.ok(performance.now() - start >= 50);

    harness.input.end();
    assert.equal((await harness.result).exitCode, 0);
  } finally {
    await tree.cleanup();
  }
});

test('any other command cancels a pending WAIT without losing changes', async () => {
  const tree = await createTempTree({ 'a.txt': 'a' });
  const harness = startBridge();
  try {
    await handshake(harness);
    harness.input.send(`START h1 ${quote(tree.root)}`, 'DONE');
    assert.equal(await harness.output.next(), 'OK');

    harness.input.send('WAIT h1', 'CHANGES h1');
    assert.equal(await harness.output.next(), 'DONE');

    harness.source.emit(path.join(tree.root, 'a.txt'), 'modified');
    await delay(40);
    assert.deepEqual(harness.output.remaining, []);

    harness.input.send('CHANGES h1');
    assert.deepEqual(await harness.output.take(2), ['RECURSIVE a.txt', 'DONE']);

    harness.input.end();
    assert.equal((await harness.result).exitCode, 0);
  } finally {
    await tree.cleanup();
  }
});

test('a change in one replica ends the waits on all of them', async () => {
  const tree = await createTempTree({ 'one/': '', 'two/': '' });
  const harness = startBridge();
  try {
    await handshake(harness);
    harness.input.send(
      `START h1 ${quote(path.join(tree.root, 'one'))}`,
      'DONE',
      `START h2 ${quote(path.join(tree.root, 'two'))}`,
      'DONE'
    );
    assert.deepEqual(await harness.output.take(2), ['OK', 'OK']);

    harness.input.send('WAIT h1', 'WAIT h2');
    await waitFor(() => harness.bridge.session.rootState('h2') === 'waiting', 2_000, 'WAIT h2');
    assert.equal(harness.bridge.session.rootState('h1'), 'waiting');

    harness.source.emit(path.join(tree.root, 'two/x.txt'), 'created');
    assert.equal(await harness.output.next(), 'CHANGES h2');
    assert.equal(harness.bridge.session.rootState('h1'), 'idle');

    harness.input.send('CHANGES h2');
    assert.deepEqual(await harness.output.take(2), ['RECURSIVE x.txt', 'DONE']);

    harness.input.end();
    assert.equal((await harness.result).exitCode, 0);
  } finally {
    await tree.cleanup();
  }
});

test('a WAIT for an unknown replica ends the session', async () => {
  const harness = startBridge();
  await handshake(harness);
  harness.input.send('WAIT nope');

  assert.equal(await harness.output.next(), 'ERROR unknown%20replica%3A%20nope');
  const result = await harness.result;
  assert.equal(result.exitCode, 3);
  assert.equal(result.session.reason, 'protocol-violation');
});

test('a command before VERSION fails the handshake', async () => {
  const harness = startBridge();
  assert.equal(await harness.output.next(), 'VERSION 1');
  harness.input.send('START h1 /data');

  assert.equal(await harness.output.next(), 'ERROR expected%20VERSION%2C%20got%20START');
  const result = await harness.result;
  assert.equal(result.exitCode, 2);
  assert.equal(result.session.reason, 'handshake-failed');
});

test('an unparseable first line fails the handshake', async () => {
  const harness = startBridge();
  assert.equal(await harness.output.next(), 'VERSION 1');
  harness.input.send('HELLO');

  assert.equal(await harness.output.next(), `ERROR ${quote('unexpected command: HELLO')}`);
  assert.equal((await harness.result).exitCode, 2);
});

test('an unsupported version fails the handshake', async () => {
  const harness = startBridge();
  assert.equal(await harness.output.next(), 'VERSION 1');
  harness.input.send('VERSION 0');

  assert.equal(await harness.output.next(), `ERROR ${quote('unsupported protocol version 0 (supported: 1-1)')}`);
  assert.equal((await harness.result).exitCode, 2);
});

test('a newer host version is answered with the highest version supported', async () => {
  const harness = startBridge();
  assert.equal(await harness.output.next(), 'VERSION 1');
  harness.input.send('VERSION 2', 'RESET unknown');
  harness.input.end();

  const result = await harness.result;
  assert.equal(result.exitCode, 0);
  assert.equal(harness.bridge.session.negotiatedVersion, 1);
  assert.deepEqual(harness.output.remaining, []);
});

test('a replica that cannot be watched is refused and the session goes on', async () => {
  const tree = await createTempTree();
  const missing = path.join(tree.root, 'missing');
  const harness = startBridge();
  try {
    await handshake(harness);
    harness.input.send(`START h1 ${quote(missing)}`, 'DIR', 'DONE', `START h2 ${quote(tree.root)}`, 'DONE');

    assert.deepEqual(await harness.output.take(2), [`ERROR ${quote(`no such directory: ${missing}`)}`, 'OK']);
    assert.equal(harness.bridge.registry.hasRoot('h1'), false);
    assert.equal(harness.bridge.registry.hasRoot('h2'), true);

    harness.input.end();
    assert.equal((await harness.result).exitCode, 0);
  } finally {
    await tree.cleanup();
  }
});

test('LINK is refused and the replica dropped', async () => {
  const tree = await createTempTree();
  const harness = startBridge();
  try {
    await handshake(harness);
    harness.input.send(`START h1 ${quote(tree.root)}`, 'LINK l', 'DIR', 'DONE', `START h2 ${quote(tree.root)}`, 'DONE');

    assert.deepEqual(await harness.output.take(3), [
      'OK',
      `ERROR ${quote('link following is not supported, please disable the links preference')}`,
      'OK'
    ]);
    assert.equal(harness.bridge.registry.hasRoot('h1'), false);

    harness.input.end();
    assert.equal((await harness.result).exitCode, 0);
  } finally {
    await tree.cleanup();
  }
});

test('a second WAIT on the same replica drops only that replica', async () => {
  const tree = await createTempTree();
  const harness = startBridge();
  try {
    await handshake(harness);
    harness.input.send(`START h1 ${quote(tree.root)}`, 'DONE');
    assert.equal(await harness.output.next(), 'OK');

    harness.input.send('WAIT h1', 'WAIT h1');
    assert.equal(await harness.output.next(), `ERROR ${quote('WAIT for h1 while already waiting on it')}`);
    assert.equal(harness.bridge.registry.hasRoot('h1'), false);

    harness.input.end();
    assert.equal((await harness.result).exitCode, 0);
  } finally {
    await tree.cleanup();
  }
});

test('RESET forgets a replica so it can be registered again', async () => {
  const tree = await createTempTree();
  const harness = startBridge();
  try {
    await handshake(harness);
    harness.input.send(`START h1 ${quote(tree.root)}`, 'DONE');
    assert.equal(await harness.output.next(), 'OK');

    harness.input.send('RESET h1', 'RESET nope', `START h1 ${quote(tree.root)}`, 'DONE');
    assert.equal(await harness.output.next(), 'OK');
    assert.equal(harness.source.active.size, 1);

    harness.input.end();
    assert.equal((await harness.result).exitCode, 0);
  } finally {
    await tree.cleanup();
  }
});

test('a replica whose watcher cannot be restored is reported and asks for a rescan', async () => {
  const tree = await createTempTree({ 'sub/': '' });
  const sub = path.join(tree.root, 'sub');
  const harness = startBridge();
  try {
    await handshake(harness);
    harness.input.send(`START h1 ${quote(tree.root)}`, 'DONE');
    assert.equal(await harness.output.next(), 'OK');

    const handle = harness.source.handleFor(sub);
    assert.ok(handle);
    harness.source.failSubscribe.set(sub, systemError('EIO'));
    harness.source.fail(handle, new Error('overflow'));
    assert.equal(await harness.output.next(), `ERROR ${quote(`root h1 degraded: cannot watch ${sub}: EIO`)}`);

    harness.input.send('WAIT h1');
    assert.equal(await harness.output.next(), `ERROR ${quote(`root h1 is unavailable: cannot watch ${sub}: EIO`)}`);

    harness.input.send('CHANGES h1');
    assert.deepEqual(await harness.output.take(2), ['RECURSIVE ', 'DONE']);

    harness.input.end();
    assert.equal((await harness.result).exitCode, 0);
  } finally {
    await tree.cleanup();
  }
});

test('re-registering a degraded replica starts from a clean change set', async () => {
  const tree = await createTempTree({ 'a.txt': 'a', 'sub/': '' });
  const sub = path.join(tree.root, 'sub');
  const harness = startBridge();
  try {
    await handshake(harness);
    harness.input.send(`START h1 ${quote(tree.root)}`, 'DONE');
    assert.equal(await harness.output.next(), 'OK');

    const handle = harness.source.handleFor(sub);
    assert.ok(handle);
    harness.source.failSubscribe.set(sub, systemError('EIO'));
    harness.source.fail(handle, new Error('overflow'));
    assert.equal(await harness.output.next(), `ERROR ${quote(`root h1 degraded: cannot watch ${sub}: EIO`)}`);

    harness.source.failSubscribe.delete(sub);
    harness.input.send(`START h1 ${quote(tree.root)}`, 'DONE');
    assert.equal(await harness.output.next(), 'OK');

    harness.input.send('CHANGES h1');
    assert.equal(await harness.output.next(), 'DONE');

    harness.source.emit(path.join(tree.root, 'a.txt'), 'modified');
    harness.input.send('WAIT h1');
    assert.equal(await harness.output.next(), 'CHANGES h1');
    harness.input.send('CHANGES h1');
    assert.deepEqual(await harness.output.take(2), ['RECURSIVE a.txt', 'DONE']);

    harness.input.end();
    assert.equal((await harness.result).exitCode, 0);
  } finally {
    await tree.cleanup();
  }
});

test('a malformed command after the handshake is a protocol violation', async () => {
  const harness = startBridge();
  await handshake(harness);
  harness.input.send('WAIT');

  assert.equal(await harness.output.next(), `ERROR ${quote('malformed WAIT command: expected at least 1 argument(s)')}`);
  assert.equal((await harness.result).exitCode, 3);
});

test('stop ends the session cleanly', async () => {
  const harness = startBridge();
  await handshake(harness);
  await waitFor(() => harness.bridge.session.negotiatedVersion === 1, 2_000, 'handshake');

  harness.bridge.stop();

  const result = await harness.result;
  assert.equal(result.exitCode, 0);
  assert.equal(result.session.reason, 'stopped');
});

test('a release that fails at shutdown is reflected in the exit code', async () => {
  const tree = await createTempTree();
  const harness = startBridge();
  try {
    await handshake(harness);
    harness.input.send(`START h1 ${quote(tree.root)}`, 'DONE');
    assert.equal(await harness.output.next(), 'OK');

    harness.source.failUnsubscribe.add(tree.root);
    harness.input.end();

    const result = await harness.result;
    assert.equal(result.exitCode, 4);
    assert.equal(result.session.reason, 'end-of-input');
    assert.deepEqual(result.released, { released: 0, failed: 1 });
  } finally {
    await tree.cleanup();
  }
});

test('a broken response stream ends the session with an I/O failure', async () => {
  const tree = await createTempTree();
  const harness = startBridge();
  try {
    await handshake(harness);
    harness.output.stream.destroy();
    harness.input.send(`START h1 ${quote(tree.root)}`);

    const result = await harness.result;
    assert.equal(result.exitCode, 5);
    assert.equal(result.session.reason, 'io-failure');
  } finally {
    await tree.cleanup();
  }
});

test('START inside a registration dialogue is a protocol violation', async () => {
  const tree = await createTempTree();
  const harness = startBridge();
  try {
    await handshake(harness);
    harness.input.send(`START h1 ${quote(tree.root)}`, `START h2 ${quote(tree.root)}`);

    assert.deepEqual(await harness.output.take(2), [
      'OK',
      `ERROR ${quote('unexpected command while registering h1: START')}`
    ]);
    assert.equal((await harness.result).exitCode, 3);
  } finally {
    await tree.cleanup();
  }
});

test('DONE outside a registration dialogue is a protocol violation', async () => {
  const harness = startBridge();
  await handshake(harness);
  harness.input.send('DONE');

  assert.equal(await harness.output.next(), `ERROR ${quote('unexpected command: DONE')}`);
  assert.equal((await harness.result).exitCode, 3);
});
