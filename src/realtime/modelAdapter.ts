import type { CallContext } from '../calls/callContext';
import type { TurnController } from '../calls/turnController';
import { errorMessage } from '../errors';
import { log } from '../log';
import {
  incAudioDeltaFailures,
  incFramesForwarded,
  incInboundFramesDropped,
  incTurnCancellations,
} from '../metrics';
import { buildOutboundMedia } from '../telephony/frames';
import { MessageChannel, sendJson } from '../transport/channel';
import { relayAudioPayload } from './audio';
import { classifyModelEvent, isLoggableEvent, parseModelEvent, type ModelEvent } from './events';
import type { SessionUpdate } from './sessionConfig';

export interface ResponseCancel {
  type: 'response.cancel';
  turn_id: string;
}

/**
 * Consumes the model side of a call: logs lifecycle events, drives the turn
 * controller and relays synthesized audio back to the caller.
 */
export class ModelRealtimeAdapter {
  constructor(
    private readonly call: CallContext,
    private readonly model: MessageChannel,
    private readonly telephony: MessageChannel,
    private readonly turns: TurnController,
  ) {}

  async sendSessionUpdate(update: SessionUpdate): Promise<void> {
    log.debug({ event: 'session_update_sent', session: update.session }, 'sending session update');
    await sendJson(this.model, update);
  }

  async pump(messages: AsyncIterable<string>): Promise<void> {
    for await (const text of messages) {
      await this.handleMessage(text);
    }
  }

  async handleMessage(text: string): Promise<void> {
    const parsed = parseModelEvent(text);
    if (!parsed.ok) {
      this.call.error(`Unreadable model event: ${parsed.detail}`);
      return;
    }

    const { event } = parsed;
    if (isLoggableEvent(event.type)) {
      this.call.info(`Model event: ${event.type}`);
      this.call.debug(`Full event payload: ${text}`);
    }

    try {
      await this.dispatch(event);
    } catch (error) {
      this.call.error(`Error handling model event ${event.type}: ${errorMessage(error)}`);
      log.warn({ err: error, event: 'model_event_failed', type: event.type, stream_sid: this.call.streamId }, 'model event failed');
    }
  }

  private async dispatch(event: ModelEvent): Promise<void> {
    const classified = classifyModelEvent(event);
    switch (classified.kind) {
      case 'turn_start':
        await this.onTurnStart(classified.turnId);
        return;
      case 'turn_end':
        this.onTurnEnd(classified.turnId);
        return;
      case 'audio_delta':
        if (classified.delta !== null) {
          await this.onAudioDelta(classified.delta);
        }
        return;
      case 'error':
        this.call.error(`Model reported error: ${classified.message}`, { code: classified.code });
        return;
      case 'other':
        return;
    }
  }

  private async onTurnStart(turnId: string | null): Promise<void> {
    if (turnId === null) {
      this.call.error('Turn start event without a turn id ignored');
      return;
    }

    const outcome = this.turns.turnStarted(turnId);
    if (outcome.kind === 'repeat') {
      return;
    }
    if (outcome.kind === 'superseded') {
      const cancel: ResponseCancel = { type: 'response.cancel', turn_id: outcome.cancelTurnId };
      await sendJson(this.model, cancel);
      incTurnCancellations();
      this.call.info(`Cancelled response for turn ${outcome.cancelTurnId}`);
    }
    this.call.info(`New turn started: ${outcome.turnId}`);
  }

  private onTurnEnd(turnId: string | null): void {
    if (turnId === null) {
      this.call.info('Turn ended: unknown');
      return;
    }

    const outcome = this.turns.turnEnded(turnId);
    if (outcome.kind === 'stale') {
      this.call.info(`Ignoring stale turn end: ${turnId} (active: ${outcome.activeTurnId ?? 'none'})`);
      return;
    }
    this.call.info(`Turn ended: ${turnId}`);
  }

  private async onAudioDelta(delta: string): Promise<void> {
    const streamSid = this.call.streamId;
    if (streamSid === null) {
      incInboundFramesDropped('no_stream_sid');
      log.warn({ event: 'audio_delta_before_start' }, 'audio delta received before telephony start');
      return;
    }
    if (!this.telephony.isOpen()) {
      return;
    }

    let payload: string;
    try {
      payload = relayAudioPayload(delta);
    } catch (error) {
      incAudioDeltaFailures();
      this.call.error(`Error processing audio data: ${errorMessage(error)}`);
      return;
    }

    await sendJson(this.telephony, buildOutboundMedia(streamSid, payload));
    incFramesForwarded('model_to_telephony');
    this.call.info('Sent audio response to Twilio');
    this.call.debug(`Audio response size: ${payload.length}`);
  }
}
