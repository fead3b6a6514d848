import type { CallContext } from '../calls/callContext';
import { errorMessage } from '../errors';
import { log } from '../log';
import { incFramesForwarded, incInboundFramesDropped } from '../metrics';
import { MessageChannel, sendJson } from '../transport/channel';
import { InboundTelephonyFrame, parseTelephonyFrame } from './frames';

export type IngressStep = 'continue' | 'stop';

export interface InputAudioAppend {
  type: 'input_audio_buffer.append';
  audio: string;
}

/**
 * Consumes the telephony side of a call: opens the call log on `start` and
 * forwards caller audio to the model as buffer appends.
 */
export class TelephonyIngress {
  constructor(
    private readonly call: CallContext,
    private readonly model: MessageChannel,
  ) {}

  async pump(messages: AsyncIterable<string>): Promise<void> {
    try {
      for await (const text of messages) {
        const step = await this.handleMessage(text);
        if (step === 'stop') {
          break;
        }
      }
    } finally {
      this.call.info('Client disconnected');
      if (this.model.isOpen()) {
        this.model.close(1000, 'telephony_closed');
      }
    }
  }

  async handleMessage(text: string): Promise<IngressStep> {
    const parsed = parseTelephonyFrame(text);
    if (!parsed.ok) {
      incInboundFramesDropped(parsed.reason);
      log.warn(
        { event: 'telephony_frame_invalid', reason: parsed.reason, detail: parsed.detail, stream_sid: this.call.streamId },
        'telephony frame rejected',
      );
      return 'continue';
    }

    try {
      return await this.handleFrame(parsed.frame, text);
    } catch (error) {
      this.call.error(`Error relaying telephony frame: ${errorMessage(error)}`);
      log.warn({ err: error, event: 'telephony_frame_failed', stream_sid: this.call.streamId }, 'telephony frame failed');
      return 'continue';
    }
  }

  async handleFrame(frame: InboundTelephonyFrame, rawText: string): Promise<IngressStep> {
    switch (frame.kind) {
      case 'start':
        this.onStart(frame.streamId, rawText);
        return 'continue';
      case 'media':
        await this.onMedia(frame.payload);
        return 'continue';
      case 'stop':
        this.call.info('Stream stopped by telephony provider');
        return 'stop';
      case 'unknown':
        return 'continue';
    }
  }

  private onStart(streamId: string, rawText: string): void {
    if (!this.call.begin(streamId)) {
      this.call.error(`Ignoring repeated start event for stream ${streamId}`);
      return;
    }
    this.call.info(`Call started - Stream SID: ${streamId}`);
    this.call.info(`Start event payload: ${rawText}`);
  }

  private async onMedia(payload: string): Promise<void> {
    if (!this.model.isOpen()) {
      incInboundFramesDropped('model_closed');
      return;
    }

    const append: InputAudioAppend = { type: 'input_audio_buffer.append', audio: payload };
    this.call.info('Received audio data from Twilio');
    this.call.debug(`Audio payload size: ${payload.length}`);
    await sendJson(this.model, append);
    incFramesForwarded('telephony_to_model');
  }
}
