import test from 'node:test';
import assert from 'node:assert/strict';
import { setTimeout as delay } from 'timers/promises';
import { KeyedMutex, Mutex } from '../utils/mutex.js';

test('Mutex runs critical sections one after another in arrival order', async () => {
  const mutex = new Mutex();
  const trace: string[] = [];

  const section = (name: string, ms: number) =>
    mutex.runExclusive(async () => {
      trace.push(`${name}:start`);
      await delay(ms);
      trace.push(`${name}:end`);
    });

  await Promise.all([section('a', 20), section('b', 1), section('c', 1)]);

  assert.deepEqual(trace, ['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end']);
  assert.equal(mutex.isLocked(), false);
});

test('Mutex releases after a failing section', async () => {
  const mutex = new Mutex();

  await assert.rejects(
    mutex.runExclusive(async () => {
      throw new Error('boom');
    }),
    { message: 'boom' }
  );

  assert.equal(await mutex.runExclusive(async () => 'next'), 'next');
});

test('KeyedMutex serializes per key and lets other keys through', async () => {
  const locks = new KeyedMutex<string>();
  const trace: string[] = [];

  const slow = locks.runExclusive('a', async () => {
    trace.push('a1:start');
    await delay(30);
    trace.push('a1:end');
  });
  const queued = locks.runExclusive('a', async () => {
    trace.push('a2');
  });
  const other = locks.runExclusive('b', async () => {
    trace.push('b');
  });

  await Promise.all([slow, queued, other]);

  assert.deepEqual(trace, ['a1:start', 'b', 'a1:end', 'a2']);
  assert.equal(locks.size, 0);
  assert.equal(locks.isLocked('a'), false);
});
