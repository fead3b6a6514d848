import { randomUUID } from 'crypto';
import type { RelayConfig } from '../config';
import { errorMessage } from '../errors';
import { log } from '../log';
import { sessionClosed, sessionOpened } from '../metrics';
import { logCallEvent, type CallLogOpener } from '../observability/callLogs';
import { ModelRealtimeAdapter } from '../realtime/modelAdapter';
import { buildSessionUpdate } from '../realtime/sessionConfig';
import { TelephonyIngress } from '../telephony/ingress';
import type { MessageChannel } from '../transport/channel';
import { CallContext } from './callContext';
import { TurnController } from './turnController';

export interface RelaySessionOptions {
  telephony: MessageChannel;
  connectModel: () => Promise<MessageChannel>;
  logs: CallLogOpener;
  config: RelayConfig;
  loadInstructions: () => string;
  now?: () => Date;
}

type SessionOutcome = 'completed' | 'model_connect_failed' | 'failed';

/**
 * Bridges one telephony media stream to one realtime model connection. Both
 * directional pumps run concurrently; when either ends, the opposite
 * connection is closed so the other pump drains and finishes too.
 *
 * `run` never rejects: every failure ends this call only and lands in logs.
 */
export class RelaySession {
  public readonly id = randomUUID();
  public readonly call: CallContext;
  public readonly turns = new TurnController();
  private readonly telephony: MessageChannel;
  private model: MessageChannel | null = null;

  constructor(private readonly options: RelaySessionOptions) {
    this.telephony = options.telephony;
    this.call = new CallContext(options.logs, options.now);
  }

  async run(): Promise<void> {
    sessionOpened();
    logCallEvent('relay_session_started', { session_id: this.id });

    let outcome: SessionOutcome = 'completed';
    try {
      outcome = await this.relay();
    } catch (error) {
      outcome = 'failed';
      this.call.error(`Relay session failed: ${errorMessage(error)}`);
      log.error({ err: error, session_id: this.id, stream_sid: this.call.streamId }, 'relay session failed');
    } finally {
      await this.shutdown(outcome);
    }
  }

  private async relay(): Promise<SessionOutcome> {
    const model = await this.connectModel();
    if (!model) {
      return 'model_connect_failed';
    }

    const modelAdapter = new ModelRealtimeAdapter(this.call, model, this.telephony, this.turns);
    const ingress = new TelephonyIngress(this.call, model);

    await modelAdapter.sendSessionUpdate(
      buildSessionUpdate(this.options.config, this.options.loadInstructions()),
    );

    await Promise.all([
      this.runPump('telephony', () => ingress.pump(this.telephony.messages()), model),
      this.runPump('model', () => modelAdapter.pump(model.messages()), this.telephony),
    ]);
    return 'completed';
  }

  private async connectModel(): Promise<MessageChannel | null> {
    try {
      this.model = await this.options.connectModel();
      return this.model;
    } catch (error) {
      log.error({ err: error, session_id: this.id }, 'model connection failed');
      return null;
    }
  }

  private async runPump(name: string, pump: () => Promise<void>, opposite: MessageChannel): Promise<void> {
    try {
      await pump();
    } catch (error) {
      this.call.error(`Error in ${name} pump: ${errorMessage(error)}`);
      log.error({ err: error, session_id: this.id, pump: name, stream_sid: this.call.streamId }, 'relay pump failed');
    } finally {
      if (opposite.isOpen()) {
        opposite.close(1000, `${name}_ended`);
      }
    }
  }

  private async shutdown(outcome: SessionOutcome): Promise<void> {
    if (this.model?.isOpen()) {
      this.model.close(1000, 'session_ended');
    }
    if (this.telephony.isOpen()) {
      this.telephony.close(1000, 'session_ended');
    }

    const durationMs = Date.now() - this.call.startedAt.getTime();
    this.call.info('Call ended', { outcome, duration_ms: durationMs });
    try {
      await this.call.close();
    } catch (error) {
      log.error({ err: error, session_id: this.id, path: this.call.logPath }, 'call log close failed');
    }

    sessionClosed(outcome, durationMs);
    logCallEvent('relay_session_ended', {
      session_id: this.id,
      stream_sid: this.call.streamId,
      outcome,
      duration_ms: durationMs,
    });
  }
}
