import assert from 'node:assert/strict';
import { test } from 'node:test';
import { FakeChannel, MemoryCallLogs } from './fakes';
import { setTestEnv } from './testEnv';

setTestEnv();

async function setup(options: { streamId?: string } = {}) {
  const { CallContext } = await import('../src/calls/callContext');
  const { TurnController } = await import('../src/calls/turnController');
  const { ModelRealtimeAdapter } = await import('../src/realtime/modelAdapter');

  const logs = new MemoryCallLogs();
  const call = new CallContext(logs);
  if (options.streamId) {
    call.begin(options.streamId);
  }
  const model = new FakeChannel('model');
  const telephony = new FakeChannel('telephony');
  const turns = new TurnController();
  const adapter = new ModelRealtimeAdapter(call, model, telephony, turns);
  return { logs, call, model, telephony, turns, adapter };
}

test('audio deltas are relayed to telephony tagged with the stream id', async () => {
  const { adapter, telephony } = await setup({ streamId: 'S1' });

  await adapter.handleMessage(JSON.stringify({ type: 'response.audio.delta', delta: 'AAAA' }));

  assert.deepEqual(telephony.sentJson(), [{ event: 'media', streamSid: 'S1', media: { payload: 'AAAA' } }]);
});

test('audio payload bytes survive the relay untouched', async () => {
  const { adapter, telephony } = await setup({ streamId: 'S1' });
  const audio = Buffer.from([0x00, 0xff, 0x7f, 0x80, 0x01, 0xfe, 0x10]);
  const delta = audio.toString('base64');

  await adapter.handleMessage(JSON.stringify({ type: 'response.audio.delta', delta }));

  const [frame] = telephony.sentJson();
  const media = frame.media as { payload: string };
  assert.equal(media.payload, delta);
  assert.deepEqual(Buffer.from(media.payload, 'base64'), audio);
});

test('a malformed delta is logged and does not stop later deltas', async () => {
  const { adapter, telephony, logs } = await setup({ streamId: 'S1' });

  await adapter.handleMessage(JSON.stringify({ type: 'response.audio.delta', delta: 'A$B' }));
  await adapter.handleMessage(JSON.stringify({ type: 'response.audio.delta', delta: 'AQID' }));

  assert.deepEqual(logs.sinks[0].messages('error'), [
    'Error processing audio data: malformed audio payload: invalid base64 (length 3)',
  ]);
  assert.deepEqual(telephony.sentJson(), [{ event: 'media', streamSid: 'S1', media: { payload: 'AQID' } }]);
});

test('empty deltas and deltas before the call starts are not relayed', async () => {
  const notStarted = await setup();
  await notStarted.adapter.handleMessage(JSON.stringify({ type: 'response.audio.delta', delta: 'AAAA' }));
  assert.deepEqual(notStarted.telephony.sent, []);
  assert.equal(notStarted.logs.sinks.length, 0);

  const started = await setup({ streamId: 'S1' });
  await started.adapter.handleMessage(JSON.stringify({ type: 'response.audio.delta', delta: '' }));
  assert.deepEqual(started.telephony.sent, []);
});

test('no audio is sent once the telephony side has closed', async () => {
  const { adapter, telephony } = await setup({ streamId: 'S1' });
  telephony.peerClose();

  await adapter.handleMessage(JSON.stringify({ type: 'response.audio.delta', delta: 'AAAA' }));

  assert.deepEqual(telephony.sent, []);
});

test('a superseding turn cancels the previous turn on the model connection', async () => {
  const { adapter, model, logs, turns } = await setup({ streamId: 'S1' });

  for (const id of ['t1', 't2', 't2', 't3']) {
    await adapter.handleMessage(JSON.stringify({ type: 'turn.start', turn: { id } }));
  }

  assert.deepEqual(model.sentJson(), [
    { type: 'response.cancel', turn_id: 't1' },
    { type: 'response.cancel', turn_id: 't2' },
  ]);
  assert.equal(turns.activeTurnId, 't3');
  const info = logs.sinks[0].messages('info');
  assert.ok(info.includes('Cancelled response for turn t1'));
  assert.ok(info.includes('New turn started: t3'));
});

test('stale turn ends leave the active turn in place', async () => {
  const { adapter, turns, logs } = await setup({ streamId: 'S1' });

  await adapter.handleMessage(JSON.stringify({ type: 'turn.start', turn: { id: 't1' } }));
  await adapter.handleMessage(JSON.stringify({ type: 'turn.end', turn: { id: 'old' } }));
  assert.equal(turns.activeTurnId, 't1');

  await adapter.handleMessage(JSON.stringify({ type: 'turn.end', turn: { id: 't1' } }));
  assert.equal(turns.activeTurnId, null);

  const info = logs.sinks[0].messages('info');
  assert.ok(info.includes('Ignoring stale turn end: old (active: t1)'));
  assert.ok(info.includes('Turn ended: t1'));
});

test('turn starts without an id do not change the turn state', async () => {
  const { adapter, turns, model } = await setup({ streamId: 'S1' });

  await adapter.handleMessage(JSON.stringify({ type: 'turn.start', turn: { id: 't1' } }));
  await adapter.handleMessage(JSON.stringify({ type: 'turn.start' }));

  assert.equal(turns.activeTurnId, 't1');
  assert.deepEqual(model.sent, []);
});

test('loggable events get a summary and a debug payload line', async () => {
  const { adapter, logs } = await setup({ streamId: 'S1' });
  const payload = JSON.stringify({ type: 'session.created', session: { id: 'sess_1' } });

  await adapter.handleMessage(payload);
  await adapter.handleMessage(JSON.stringify({ type: 'response.text.delta', delta: 'hi' }));

  assert.deepEqual(logs.sinks[0].entries, [
    { level: 'info', message: 'Model event: session.created', fields: undefined },
    { level: 'debug', message: `Full event payload: ${payload}`, fields: undefined },
  ]);
});

test('model error events and unreadable events are logged as errors', async () => {
  const { adapter, logs } = await setup({ streamId: 'S1' });

  await adapter.handleMessage(
    JSON.stringify({ type: 'error', error: { type: 'invalid_request_error', code: 'bad_value', message: 'nope' } }),
  );
  await adapter.handleMessage('{oops');

  const errors = logs.sinks[0].entries.filter((entry) => entry.level === 'error');
  assert.equal(errors.length, 2);
  assert.deepEqual(errors[0], { level: 'error', message: 'Model reported error: nope', fields: { code: 'bad_value' } });
  assert.match(errors[1].message, /^Unreadable model event: /);
});

test('sendSessionUpdate sends the configuration message', async () => {
  const { adapter, model } = await setup();
  const { buildSessionUpdate } = await import('../src/realtime/sessionConfig');
  const { buildRelayConfig } = await import('../src/config');
  const { parseEnv } = await import('../src/env');

  const config = buildRelayConfig(parseEnv({ OPENAI_API_KEY: 'test-key' }));
  await adapter.sendSessionUpdate(buildSessionUpdate(config, 'Be brief.'));

  assert.deepEqual(model.sentJson(), [
    {
      type: 'session.update',
      session: {
        turn_detection: {
          type: 'server_vad',
          mode: 'normal',
          time_units: { speech_gap_ms: 600, speech_timeout_ms: 6000 },
        },
        input_audio_format: 'g711_ulaw',
        output_audio_format: 'g711_ulaw',
        voice: 'shimmer',
        instructions: 'Be brief.',
        modalities: ['text', 'audio'],
        temperature: 0.8,
      },
    },
  ]);
});
