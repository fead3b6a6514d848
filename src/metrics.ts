import type { Request, Response, NextFunction, RequestHandler } from 'express';
import client from 'prom-client';

/**
 * Relay Prometheus metrics
 *
 * Histograms here record milliseconds or seconds as their names say;
 * prom-client's startTimer() is not used because it reports seconds.
 */

const register = new client.Registry();
const METRICS_PREFIX = 'media_relay_';

client.collectDefaultMetrics({
  register,
  prefix: METRICS_PREFIX,
});

const httpRequestDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}http_request_duration_ms`,
  help: 'HTTP request duration in milliseconds (Express)',
  labelNames: ['method', 'route', 'code'] as const,
  buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000],
  registers: [register],
});

const activeSessions = new client.Gauge({
  name: `${METRICS_PREFIX}active_sessions`,
  help: 'Relay sessions currently running',
  registers: [register],
});

const sessionsTotal = new client.Counter({
  name: `${METRICS_PREFIX}sessions_total`,
  help: 'Relay sessions finished, by outcome',
  labelNames: ['outcome'] as const,
  registers: [register],
});

const sessionDurationSeconds = new client.Histogram({
  name: `${METRICS_PREFIX}session_duration_seconds`,
  help: 'Relay session duration in seconds',
  buckets: [5, 10, 30, 60, 120, 300, 900],
  registers: [register],
});

const framesForwardedTotal = new client.Counter({
  name: `${METRICS_PREFIX}frames_forwarded_total`,
  help: 'Audio frames forwarded between telephony and model',
  labelNames: ['direction'] as const,
  registers: [register],
});

const inboundFramesDroppedTotal = new client.Counter({
  name: `${METRICS_PREFIX}inbound_frames_dropped_total`,
  help: 'Telephony frames dropped before reaching the model',
  labelNames: ['reason'] as const,
  registers: [register],
});

const turnCancellationsTotal = new client.Counter({
  name: `${METRICS_PREFIX}turn_cancellations_total`,
  help: 'Model responses cancelled because a new turn superseded them',
  registers: [register],
});

const audioDeltaFailuresTotal = new client.Counter({
  name: `${METRICS_PREFIX}audio_delta_failures_total`,
  help: 'Model audio deltas that could not be relayed',
  registers: [register],
});

function nowNs(): bigint {
  return process.hrtime.bigint();
}

function nsToMs(ns: bigint): number {
  return Number(ns) / 1_000_000;
}

function getRouteLabel(req: Request): string {
  const routePath: unknown = req.route?.path;
  if (typeof routePath === 'string') {
    return req.baseUrl ? `${req.baseUrl}${routePath}` : routePath;
  }
  return 'unmatched';
}

export type FrameDirection = 'telephony_to_model' | 'model_to_telephony';

export const metricsMiddleware: RequestHandler = (req: Request, res: Response, next: NextFunction) => {
  const start = nowNs();

  res.on('finish', () => {
    httpRequestDurationMs.observe(
      {
        method: req.method,
        route: getRouteLabel(req),
        code: String(res.statusCode),
      },
      nsToMs(nowNs() - start),
    );
  });

  next();
};

export async function metricsHandler(_req: Request, res: Response): Promise<void> {
  res.setHeader('Content-Type', register.contentType);
  res.status(200).send(await register.metrics());
}

export function sessionOpened(): void {
  activeSessions.inc();
}

export function sessionClosed(outcome: string, durationMs: number): void {
  activeSessions.dec();
  sessionsTotal.inc({ outcome });
  sessionDurationSeconds.observe(durationMs / 1000);
}

export function incFramesForwarded(direction: FrameDirection, count = 1): void {
  framesForwardedTotal.inc({ direction }, count);
}

export function incInboundFramesDropped(reason: string, count = 1): void {
  const label = reason && reason.trim() !== '' ? reason : 'unknown';
  inboundFramesDroppedTotal.inc({ reason: label }, count);
}

export function incTurnCancellations(): void {
  turnCancellationsTotal.inc();
}

export function incAudioDeltaFailures(): void {
  audioDeltaFailuresTotal.inc();
}
