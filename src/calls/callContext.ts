import type { CallLogFields, CallLogOpener, CallLogSink } from '../observability/callLogs';

/**
 * Per-call identity and audit sink shared by both directional pumps. Until the
 * telephony `start` frame arrives there is no stream id and no sink, and every
 * logging call is a no-op.
 */
export class CallContext {
  public readonly startedAt: Date;
  private currentStreamId: string | null = null;
  private sink: CallLogSink | null = null;

  constructor(
    private readonly logs: CallLogOpener,
    now: () => Date = () => new Date(),
  ) {
    this.startedAt = now();
  }

  get streamId(): string | null {
    return this.currentStreamId;
  }

  get logPath(): string | null {
    return this.sink?.path ?? null;
  }

  /** Returns false when the call was already started; the first stream id is kept. */
  begin(streamId: string): boolean {
    if (this.sink) {
      return false;
    }
    this.currentStreamId = streamId;
    this.sink = this.logs.open(streamId);
    return true;
  }

  info(message: string, fields?: CallLogFields): void {
    this.sink?.info(message, fields);
  }

  debug(message: string, fields?: CallLogFields): void {
    this.sink?.debug(message, fields);
  }

  error(message: string, fields?: CallLogFields): void {
    this.sink?.error(message, fields);
  }

  async close(): Promise<void> {
    await this.sink?.close();
  }
}
