import WebSocket, { RawData } from 'ws';
import { buildModelSocketUrl, type ModelConnectionConfig } from '../config';
import { log } from '../log';
import { ChannelClosedError, MessageChannel, MessageQueue } from './channel';

function rawDataToString(data: RawData): string {
  const buffer = Buffer.isBuffer(data)
    ? data
    : Array.isArray(data)
      ? Buffer.concat(data)
      : Buffer.from(data);
  return buffer.toString('utf8');
}

export class WsChannel implements MessageChannel {
  private readonly queue = new MessageQueue();

  constructor(
    private readonly socket: WebSocket,
    public readonly label: string,
  ) {
    socket.on('message', (data, isBinary) => {
      if (isBinary) {
        log.debug({ event: 'binary_frame_ignored', channel: label }, 'binary frame ignored');
        return;
      }
      this.queue.push(rawDataToString(data));
    });

    socket.on('close', (code, reason) => {
      log.debug(
        { event: 'channel_closed', channel: label, code, reason: reason.toString('utf8') },
        'channel closed',
      );
      this.queue.end();
    });

    socket.on('error', (error) => {
      log.warn({ err: error, event: 'channel_error', channel: label }, 'channel error');
      this.queue.end();
    });
  }

  isOpen(): boolean {
    return this.socket.readyState === WebSocket.OPEN;
  }

  send(message: string): Promise<void> {
    if (!this.isOpen()) {
      return Promise.reject(new ChannelClosedError(this.label));
    }
    return new Promise((resolve, reject) => {
      this.socket.send(message, (error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  }

  messages(): AsyncIterable<string> {
    return this.queue;
  }

  close(code = 1000, reason?: string): void {
    const state = this.socket.readyState;
    if (state === WebSocket.CLOSING || state === WebSocket.CLOSED) {
      return;
    }
    if (state === WebSocket.CONNECTING) {
      this.socket.terminate();
      return;
    }
    this.socket.close(code, reason);
  }
}

/**
 * Opens the realtime model socket with bearer auth. Listeners are attached
 * before the handshake completes so no early event is lost.
 */
export function connectModelChannel(config: ModelConnectionConfig): Promise<WsChannel> {
  const socket = new WebSocket(buildModelSocketUrl(config), {
    headers: {
      Authorization: `Bearer ${config.apiKey}`,
      'OpenAI-Beta': 'realtime=v1',
    },
  });
  const channel = new WsChannel(socket, 'model');

  return new Promise((resolve, reject) => {
    const onOpen = (): void => {
      socket.off('unexpected-response', onUnexpected);
      socket.off('error', onError);
      resolve(channel);
    };
    const onError = (error: Error): void => {
      socket.off('open', onOpen);
      socket.off('unexpected-response', onUnexpected);
      reject(error);
    };
    const onUnexpected = (_request: unknown, response: { statusCode?: number }): void => {
      socket.off('open', onOpen);
      socket.off('error', onError);
      socket.terminate();
      reject(new Error(`model socket handshake rejected with status ${response.statusCode ?? 'unknown'}`));
    };

    socket.once('open', onOpen);
    socket.once('error', onError);
    socket.once('unexpected-response', onUnexpected);
  });
}
