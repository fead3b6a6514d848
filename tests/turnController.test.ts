import assert from 'node:assert/strict';
import { test } from 'node:test';
import { TurnController } from '../src/calls/turnController';

test('turnController starts idle', () => {
  const turns = new TurnController();
  assert.deepEqual(turns.getState(), { kind: 'idle' });
  assert.equal(turns.activeTurnId, null);
});

test('turnController cancels each superseded turn exactly once', () => {
  const turns = new TurnController();
  const cancelled: string[] = [];

  for (const turnId of ['t1', 't2', 't3']) {
    const outcome = turns.turnStarted(turnId);
    if (outcome.kind === 'superseded') {
      cancelled.push(outcome.cancelTurnId);
    }
  }

  assert.deepEqual(cancelled, ['t1', 't2']);
  assert.equal(turns.activeTurnId, 't3');
});

test('turnController treats a repeated start as a no-op', () => {
  const turns = new TurnController();
  assert.deepEqual(turns.turnStarted('t1'), { kind: 'started', turnId: 't1' });
  assert.deepEqual(turns.turnStarted('t1'), { kind: 'repeat', turnId: 't1' });
  assert.deepEqual(turns.getState(), { kind: 'active', turnId: 't1' });
});

test('turnController returns to idle when the active turn ends', () => {
  const turns = new TurnController();
  turns.turnStarted('t1');

  assert.deepEqual(turns.turnEnded('t1'), { kind: 'ended', turnId: 't1' });
  assert.deepEqual(turns.getState(), { kind: 'idle' });

  assert.deepEqual(turns.turnStarted('t2'), { kind: 'started', turnId: 't2' });
});

test('turnController ignores stale and duplicate turn ends', () => {
  const turns = new TurnController();
  turns.turnStarted('t1');
  turns.turnStarted('t2');

  assert.deepEqual(turns.turnEnded('t1'), { kind: 'stale', turnId: 't1', activeTurnId: 't2' });
  assert.deepEqual(turns.getState(), { kind: 'active', turnId: 't2' });

  turns.turnEnded('t2');
  assert.deepEqual(turns.turnEnded('t2'), { kind: 'stale', turnId: 't2', activeTurnId: null });
  assert.deepEqual(turns.getState(), { kind: 'idle' });
});
