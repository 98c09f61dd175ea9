import test from 'node:test';
import assert from 'node:assert/strict';
import { formatLogLine, LogLevel, parseLogLevel } from '../utils/logger.js';

const AT = new Date('2024-01-02T03:04:05.000Z');

test('formatLogLine renders timestamp, level, message and metadata', () => {
  assert.equal(
    formatLogLine('INFO', 'Watching root', { root: 'h1', subscriptions: 3 }, { timestamp: AT }),
    '[2024-01-02T03:04:05.000Z] [INFO] Watching root {"root":"h1","subscriptions":3}'
  );
});

test('formatLogLine leaves out empty metadata', () => {
  assert.equal(formatLogLine('WARN', 'careful', {}, { timestamp: AT }), '[2024-01-02T03:04:05.000Z] [WARN] careful');
  assert.equal(formatLogLine('DEBUG', 'plain', undefined, { timestamp: AT }), '[2024-01-02T03:04:05.000Z] [DEBUG] plain');
});

test('parseLogLevel accepts level names in any case', () => {
  assert.equal(parseLogLevel('WARN', LogLevel.DEBUG), LogLevel.WARN);
  assert.equal(parseLogLevel('silent', LogLevel.DEBUG), LogLevel.SILENT);
  assert.equal(parseLogLevel('loud', LogLevel.INFO), LogLevel.INFO);
  assert.equal(parseLogLevel(undefined, LogLevel.ERROR), LogLevel.ERROR);
});
