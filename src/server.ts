import { randomUUID } from 'crypto';
import express, { NextFunction, Request, Response } from 'express';
import http from 'http';
import WebSocket, { WebSocketServer } from 'ws';
import { env } from './env';
import type { ConversationModel } from './ai/types';
import type { ConversationService } from './conversation/service';
import { ConnectionHub } from './devices/connectionHub';
import { DeviceConnection, defaultConnectionOptions, type DeviceConnectionOptions } from './devices/deviceConnection';
import { WsDeviceTransport, rawDataToBuffer } from './devices/transport';
import { log } from './log';
import { metricsHandler, metricsMiddleware } from './metrics';
import { createApiRouter } from './routes/api';
import { createHealthRouter } from './routes/health';
import type { SessionStore } from './sessions/types';
import type { STTProvider } from './stt/provider';

type RequestWithId = Request & { id?: string };

export const DEVICE_STREAM_PATH = '/v1/devices/stream';

export interface ServerDeps {
  store: SessionStore;
  stt: STTProvider;
  model: ConversationModel;
  service: ConversationService;
  token?: string;
  connectionOptions?: DeviceConnectionOptions;
}

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

export function parseStreamRequest(
  request: http.IncomingMessage,
): { deviceId: string; token: string | null } | null {
  if (!request.url) {
    return null;
  }

  const host = request.headers.host ?? 'localhost';
  const url = new URL(request.url, `http://${host}`);
  if (url.pathname !== DEVICE_STREAM_PATH) {
    return null;
  }

  const deviceId = url.searchParams.get('device_id')?.trim();
  if (!deviceId) {
    return null;
  }

  return {
    deviceId,
    token: url.searchParams.get('token'),
  };
}

function attachDeviceWebSocketServer(
  server: http.Server,
  hub: ConnectionHub<DeviceConnection>,
  deps: ServerDeps,
  token: string,
): WebSocketServer {
  const wss = new WebSocketServer({ noServer: true, maxPayload: env.WS_MAX_MESSAGE_BYTES });
  const options = deps.connectionOptions ?? defaultConnectionOptions();

  server.on('upgrade', (request, socket, head) => {
    const parsed = parseStreamRequest(request);
    if (!parsed) {
      socket.destroy();
      return;
    }

    if (!parsed.token || parsed.token !== token) {
      log.warn({ event: 'device_stream_unauthorized', device_id: parsed.deviceId }, 'device stream token rejected');
      socket.destroy();
      return;
    }

    wss.handleUpgrade(request, socket, head, (ws) => {
      onDeviceSocket(ws, parsed.deviceId);
    });
  });

  function onDeviceSocket(ws: WebSocket, deviceId: string): void {
    const connection = new DeviceConnection(
      deviceId,
      new WsDeviceTransport(ws),
      { hub, store: deps.store, stt: deps.stt, model: deps.model, processor: deps.service },
      options,
    );
    connection.start();

    ws.on('message', (data, isBinary) => {
      const buffer = rawDataToBuffer(data);
      if (isBinary) {
        connection.handleBinary(buffer);
        return;
      }
      connection.handleText(buffer.toString('utf8'));
    });

    ws.on('pong', () => {
      connection.handlePong();
    });

    ws.on('close', (code, reason) => {
      connection.handleClose(code, reason.toString('utf8'));
    });

    ws.on('error', (error) => {
      log.error({ err: error, device_id: deviceId }, 'device websocket error');
      connection.handleClose(1011, 'socket_error');
    });
  }

  return wss;
}

export function buildServer(deps: ServerDeps): {
  app: express.Express;
  server: http.Server;
  hub: ConnectionHub<DeviceConnection>;
  wss: WebSocketServer;
} {
  const app = express();
  const hub = new ConnectionHub<DeviceConnection>();
  const token = deps.token ?? env.DEVICE_STREAM_TOKEN;

  app.disable('x-powered-by');
  app.use(requestIdMiddleware);
  app.use(metricsMiddleware);

  app.use('/health', createHealthRouter(hub));
  app.get('/metrics', metricsHandler);
  app.use('/v1', createApiRouter({ service: deps.service, store: deps.store, model: deps.model, token }));

  app.use(errorHandler);

  const server = http.createServer(app);
  const wss = attachDeviceWebSocketServer(server, hub, deps, token);

  return { app, server, hub, wss };
}
