import { randomUUID } from 'crypto';
import express, { NextFunction, Request, Response } from 'express';
import http from 'http';
import { WebSocketServer } from 'ws';
import { RelaySession } from './calls/relaySession';
import type { RelayConfig } from './config';
import { log } from './log';
import { metricsHandler, metricsMiddleware } from './metrics';
import { CallLogRegistry, type CallLogOpener } from './observability/callLogs';
import { loadSystemPrompt } from './prompts';
import { healthRouter } from './routes/health';
import { createIncomingCallRouter, MEDIA_STREAM_PATH } from './routes/incomingCall';
import { connectModelChannel, WsChannel } from './transport/wsChannel';

type RequestWithId = Request & { id?: string };

function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const incomingId = req.header('x-request-id');
  const requestId = incomingId && incomingId.trim() !== '' ? incomingId : randomUUID();
  res.setHeader('x-request-id', requestId);
  (req as RequestWithId).id = requestId;
  next();
}

function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction,
): void {
  log.error({ err }, 'unhandled error');
  res.status(500).json({ error: 'internal_server_error' });
}

function isMediaStreamRequest(request: http.IncomingMessage): boolean {
  if (!request.url) {
    return false;
  }
  const host = request.headers.host ?? 'localhost';
  const url = new URL(request.url, `http://${host}`);
  return url.pathname === MEDIA_STREAM_PATH;
}

function attachMediaWebSocketServer(
  server: http.Server,
  config: RelayConfig,
  logs: CallLogOpener,
): WebSocketServer {
  const wss = new WebSocketServer({ noServer: true });

  server.on('upgrade', (request, socket, head) => {
    if (!isMediaStreamRequest(request)) {
      socket.destroy();
      return;
    }

    wss.handleUpgrade(request, socket, head, (ws) => {
      wss.emit('connection', ws, request);
    });
  });

  wss.on('connection', (ws, request: http.IncomingMessage) => {
    log.info({ event: 'media_stream_connected', remote: request.socket.remoteAddress }, 'client connected');

    const session = new RelaySession({
      telephony: new WsChannel(ws, 'telephony'),
      connectModel: () => connectModelChannel(config.model),
      logs,
      config,
      loadInstructions: () => loadSystemPrompt(config.promptsPath),
    });

    void session.run();
  });

  return wss;
}

export function buildServer(
  config: RelayConfig,
  logs: CallLogOpener = new CallLogRegistry({ dir: config.callLogDir, level: config.callLogLevel }),
): { app: express.Express; server: http.Server; wss: WebSocketServer } {
  const app = express();

  app.disable('x-powered-by');
  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));
  app.use(requestIdMiddleware);
  app.use(metricsMiddleware);

  app.get('/', (_req, res) => {
    res.status(200).json({ message: 'Media relay is running' });
  });
  app.use('/health', healthRouter);
  app.get('/metrics', (req, res, next) => {
    metricsHandler(req, res).catch(next);
  });
  app.use('/incoming-call', createIncomingCallRouter(config));

  app.use(errorHandler);

  const server = http.createServer(app);
  const wss = attachMediaWebSocketServer(server, config, logs);

  return { app, server, wss };
}
