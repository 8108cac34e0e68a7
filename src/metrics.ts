import type { Request, Response, NextFunction, RequestHandler } from 'express';
import client from 'prom-client';

/**
 * Runtime Prometheus metrics
 *
 * prom-client Histogram.startTimer() measures seconds; stage and HTTP
 * durations here are recorded in milliseconds to match the *_ms names.
 */

const register = new client.Registry();
const METRICS_PREFIX = 'toy_voice_runtime_';

client.collectDefaultMetrics({
  register,
  prefix: METRICS_PREFIX,
});

const httpRequestDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}http_request_duration_ms`,
  help: 'HTTP request duration in milliseconds (Express)',
  labelNames: ['method', 'route', 'code'] as const,
  buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 20000],
  registers: [register],
});

// STT/LLM/TTS provider calls
const stageDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}stage_duration_ms`,
  help: 'Provider stage duration in milliseconds (stt/llm/tts)',
  labelNames: ['stage'] as const,
  buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 20000, 60000],
  registers: [register],
});

const stageErrorsTotal = new client.Counter({
  name: `${METRICS_PREFIX}stage_errors_total`,
  help: 'Provider stage errors (stt/llm/tts)',
  labelNames: ['stage'] as const,
  registers: [register],
});

const inboundAudioFramesTotal = new client.Counter({
  name: `${METRICS_PREFIX}inbound_audio_frames_total`,
  help: 'Binary audio frames received from devices',
  registers: [register],
});

const inboundAudioFramesDroppedTotal = new client.Counter({
  name: `${METRICS_PREFIX}inbound_audio_frames_dropped_total`,
  help: 'Binary audio frames dropped before reaching a recognizer',
  labelNames: ['reason'] as const,
  registers: [register],
});

const activeConnections = new client.Gauge({
  name: `${METRICS_PREFIX}active_device_connections`,
  help: 'Device connections currently registered',
  registers: [register],
});

const sagaOutcomesTotal = new client.Counter({
  name: `${METRICS_PREFIX}saga_outcomes_total`,
  help: 'Saga instances by definition and terminal state',
  labelNames: ['definition', 'state'] as const,
  registers: [register],
});

const sagaDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}saga_duration_ms`,
  help: 'Saga wall time from start to terminal state in milliseconds',
  labelNames: ['definition', 'state'] as const,
  buckets: [50, 100, 250, 500, 1000, 2500, 5000, 10000, 20000, 30000, 60000],
  registers: [register],
});

const sagaEventsDroppedTotal = new client.Counter({
  name: `${METRICS_PREFIX}saga_events_dropped_total`,
  help: 'Saga events dropped because the event queue was full',
  registers: [register],
});

const sessionPersistFailuresTotal = new client.Counter({
  name: `${METRICS_PREFIX}session_persist_failures_total`,
  help: 'Session store writes that failed and were degraded to in-memory state',
  labelNames: ['operation'] as const,
  registers: [register],
});

function nowNs(): bigint {
  return process.hrtime.bigint();
}

function nsToMs(ns: bigint): number {
  return Number(ns) / 1_000_000;
}

// Avoid high-cardinality route labels
function getRouteLabel(req: Request): string {
  const route: unknown = req.route;
  const routePath =
    typeof route === 'object' && route !== null && 'path' in route && typeof route.path === 'string'
      ? route.path
      : undefined;

  if (routePath) return req.baseUrl ? `${req.baseUrl}${routePath}` : routePath;

  const raw = req.path || req.url || 'unknown';
  return raw
    .replace(/\b[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}\b/gi, ':uuid')
    .replace(/\b[0-9a-f]{16,}\b/gi, ':id')
    .replace(/\b\d{6,}\b/g, ':n');
}

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

/**
 * Starts a stage timer and returns an end() function that records
 * milliseconds in stageDurationMs.
 */
export function startStageTimer(stage: string): () => void {
  const start = nowNs();
  return () => {
    stageDurationMs.observe({ stage }, nsToMs(nowNs() - start));
  };
}

export function incStageError(stage: string): void {
  stageErrorsTotal.inc({ stage });
}

export function incInboundAudioFrames(count = 1): void {
  inboundAudioFramesTotal.inc(count);
}

export function incInboundAudioFramesDropped(reason: string, count = 1): void {
  const label = reason && reason.trim() !== '' ? reason : 'unknown';
  inboundAudioFramesDroppedTotal.inc({ reason: label }, count);
}

export function setActiveConnections(count: number): void {
  activeConnections.set(count);
}

export function recordSagaOutcome(definition: string, state: string, durationMs: number): void {
  sagaOutcomesTotal.inc({ definition, state });
  sagaDurationMs.observe({ definition, state }, durationMs);
}

export function incSagaEventsDropped(): void {
  sagaEventsDroppedTotal.inc();
}

export function incSessionPersistFailure(operation: string): void {
  sessionPersistFailuresTotal.inc({ operation });
}
