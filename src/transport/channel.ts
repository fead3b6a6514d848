/**
 * One side of a relayed call: a text-framed duplex connection whose inbound
 * messages are consumed as an async sequence that ends when the peer closes.
 */
export interface MessageChannel {
  readonly label: string;
  isOpen(): boolean;
  send(message: string): Promise<void>;
  messages(): AsyncIterable<string>;
  close(code?: number, reason?: string): void;
}

export class ChannelClosedError extends Error {
  constructor(label: string) {
    super(`${label} channel is closed`);
    this.name = 'ChannelClosedError';
  }
}

export function sendJson(channel: MessageChannel, payload: unknown): Promise<void> {
  return channel.send(JSON.stringify(payload));
}

/**
 * Single-consumer buffer bridging event-emitter sockets to `for await` loops.
 * Messages pushed before the consumer starts are kept in arrival order.
 */
export class MessageQueue implements AsyncIterable<string> {
  private readonly buffered: string[] = [];
  private waiter?: (result: IteratorResult<string>) => void;
  private ended = false;

  push(message: string): void {
    if (this.ended) {
      return;
    }
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      waiter({ value: message, done: false });
      return;
    }
    this.buffered.push(message);
  }

  end(): void {
    if (this.ended) {
      return;
    }
    this.ended = true;
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      waiter({ value: undefined, done: true });
    }
  }

  isEnded(): boolean {
    return this.ended;
  }

  [Symbol.asyncIterator](): AsyncIterator<string> {
    return {
      next: (): Promise<IteratorResult<string>> => {
        const next = this.buffered.shift();
        if (next !== undefined) {
          return Promise.resolve({ value: next, done: false });
        }
        if (this.ended) {
          return Promise.resolve({ value: undefined, done: true });
        }
        return new Promise((resolve) => {
          this.waiter = resolve;
        });
      },
      return: (): Promise<IteratorResult<string>> => {
        this.buffered.length = 0;
        this.end();
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }
}
