import path from 'path';
import pino from 'pino';
import { log } from '../log';

export type CallLogLevel = 'debug' | 'info' | 'error';

export type CallLogFields = Record<string, unknown>;

/**
 * Append-only log destination for exactly one call. Every entry lands as one
 * complete line, so both directional pumps may write to the same sink.
 */
export interface CallLogSink {
  readonly path: string;
  readonly streamId: string;
  info(message: string, fields?: CallLogFields): void;
  debug(message: string, fields?: CallLogFields): void;
  error(message: string, fields?: CallLogFields): void;
  close(): Promise<void>;
}

export interface CallLogOpener {
  open(streamId: string): CallLogSink;
}

export interface CallLogRegistryOptions {
  dir: string;
  level?: CallLogLevel;
  now?: () => Date;
}

type Destination = ReturnType<typeof pino.destination>;

const pad = (value: number): string => String(value).padStart(2, '0');

export function formatLogTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function sanitizeStreamId(streamId: string): string {
  const cleaned = streamId.replace(/[^A-Za-z0-9_-]/g, '_');
  return cleaned === '' ? 'unknown' : cleaned;
}

class FileCallLogSink implements CallLogSink {
  private readonly logger: pino.Logger;
  private closed = false;
  private closing?: Promise<void>;

  constructor(
    public readonly path: string,
    public readonly streamId: string,
    private readonly destination: Destination,
    level: CallLogLevel,
  ) {
    this.logger = pino(
      {
        level,
        base: { stream_sid: streamId },
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      destination,
    );
  }

  info(message: string, fields?: CallLogFields): void {
    this.write('info', message, fields);
  }

  debug(message: string, fields?: CallLogFields): void {
    this.write('debug', message, fields);
  }

  error(message: string, fields?: CallLogFields): void {
    this.write('error', message, fields);
  }

  close(): Promise<void> {
    if (this.closing) {
      return this.closing;
    }
    this.closed = true;
    this.closing = new Promise<void>((resolve) => {
      this.destination.once('close', () => resolve());
      this.destination.once('error', (err: unknown) => {
        log.error({ err, path: this.path }, 'call log close failed');
        resolve();
      });
      this.destination.end();
    });
    return this.closing;
  }

  private write(level: CallLogLevel, message: string, fields?: CallLogFields): void {
    if (this.closed) {
      return;
    }
    if (fields) {
      this.logger[level](fields, message);
    } else {
      this.logger[level](message);
    }
  }
}

/**
 * Hands out one file-backed sink per call. File names combine a timestamp with
 * the stream id and are never handed out twice within a process.
 */
export class CallLogRegistry implements CallLogOpener {
  private readonly dir: string;
  private readonly level: CallLogLevel;
  private readonly now: () => Date;
  private readonly issuedPaths = new Set<string>();

  constructor(options: CallLogRegistryOptions) {
    this.dir = options.dir;
    this.level = options.level ?? 'info';
    this.now = options.now ?? (() => new Date());
  }

  open(streamId: string): CallLogSink {
    const filePath = this.nextPath(streamId);
    const destination = pino.destination({ dest: filePath, sync: true, mkdir: true, append: true });
    const sink = new FileCallLogSink(filePath, streamId, destination, this.level);

    logCallEvent('call_log_opened', { stream_sid: streamId, path: filePath });
    return sink;
  }

  private nextPath(streamId: string): string {
    const base = `call_${formatLogTimestamp(this.now())}_${sanitizeStreamId(streamId)}`;
    let candidate = path.join(this.dir, `${base}.log`);
    let attempt = 1;
    while (this.issuedPaths.has(candidate)) {
      attempt += 1;
      candidate = path.join(this.dir, `${base}_${attempt}.log`);
    }
    this.issuedPaths.add(candidate);
    return candidate;
  }
}

export function logCallEvent(event: string, payload: Record<string, unknown> = {}): void {
  log.info({ event, ...payload }, 'call event');
}
