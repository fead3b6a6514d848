import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';

setTestEnv();

const fixedNow = (): Date => new Date(2024, 0, 2, 3, 4, 5);

function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'call-logs-'));
}

function readLines(filePath: string): Array<Record<string, unknown>> {
  return fs
    .readFileSync(filePath, 'utf8')
    .split('\n')
    .filter((line) => line !== '')
    .map((line) => JSON.parse(line) as Record<string, unknown>);
}

test('open names the destination with a timestamp and the stream id', async () => {
  const { CallLogRegistry } = await import('../src/observability/callLogs');
  const dir = makeTempDir();
  const registry = new CallLogRegistry({ dir, now: fixedNow });

  const sink = registry.open('CA123');
  await sink.close();

  assert.equal(sink.path, path.join(dir, 'call_20240102_030405_CA123.log'));
  assert.equal(fs.existsSync(sink.path), true);
});

test('open never hands out the same destination twice', async () => {
  const { CallLogRegistry } = await import('../src/observability/callLogs');
  const dir = makeTempDir();
  const registry = new CallLogRegistry({ dir, now: fixedNow });

  const first = registry.open('CA123');
  const second = registry.open('CA123');
  await Promise.all([first.close(), second.close()]);

  assert.equal(path.basename(first.path), 'call_20240102_030405_CA123.log');
  assert.equal(path.basename(second.path), 'call_20240102_030405_CA123_2.log');
});

test('open creates the log directory and strips path separators from the stream id', async () => {
  const { CallLogRegistry } = await import('../src/observability/callLogs');
  const dir = path.join(makeTempDir(), 'nested');
  const registry = new CallLogRegistry({ dir, now: fixedNow });

  const sink = registry.open('../MZ 9');
  await sink.close();

  assert.equal(sink.path, path.join(dir, 'call_20240102_030405____MZ_9.log'));
  assert.equal(fs.existsSync(sink.path), true);
});

test('sink writes one JSON line per entry and honours the level', async () => {
  const { CallLogRegistry } = await import('../src/observability/callLogs');
  const dir = makeTempDir();
  const registry = new CallLogRegistry({ dir, now: fixedNow, level: 'info' });

  const sink = registry.open('CA123');
  sink.info('Call started - Stream SID: CA123');
  sink.debug('Audio payload size: 4');
  sink.error('Error processing audio data: boom', { code: 'bad_delta' });
  await sink.close();
  sink.info('written after close');

  const lines = readLines(sink.path);
  assert.equal(lines.length, 2);
  assert.equal(lines[0].msg, 'Call started - Stream SID: CA123');
  assert.equal(lines[0].level, 30);
  assert.equal(lines[0].stream_sid, 'CA123');
  assert.equal(lines[1].msg, 'Error processing audio data: boom');
  assert.equal(lines[1].level, 50);
  assert.equal(lines[1].code, 'bad_delta');
});

test('sink keeps debug entries when the level is debug', async () => {
  const { CallLogRegistry } = await import('../src/observability/callLogs');
  const registry = new CallLogRegistry({ dir: makeTempDir(), now: fixedNow, level: 'debug' });

  const sink = registry.open('CA777');
  sink.debug('Full event payload: {"type":"session.created"}');
  await sink.close();
  await sink.close();

  const lines = readLines(sink.path);
  assert.equal(lines.length, 1);
  assert.equal(lines[0].level, 20);
  assert.equal(lines[0].msg, 'Full event payload: {"type":"session.created"}');
});

test('formatLogTimestamp pads every component', async () => {
  const { formatLogTimestamp } = await import('../src/observability/callLogs');
  assert.equal(formatLogTimestamp(new Date(2025, 10, 9, 8, 7, 6)), '20251109_080706');
});
