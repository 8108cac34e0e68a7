import WebSocket from 'ws';
import { StreamError } from '../errors';
import type { OutboundFrame } from './outboundQueue';

export interface DeviceTransport {
  send(frame: OutboundFrame): Promise<void>;
  ping(): void;
  close(code: number, reason: string): void;
  terminate(): void;
}

export class WsDeviceTransport implements DeviceTransport {
  constructor(private readonly ws: WebSocket) {}

  public send(frame: OutboundFrame): Promise<void> {
    if (this.ws.readyState !== WebSocket.OPEN) {
      return Promise.reject(new StreamError('websocket is not open'));
    }

    return new Promise((resolve, reject) => {
      this.ws.send(frame, { binary: Buffer.isBuffer(frame) }, (error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  }

  public ping(): void {
    if (this.ws.readyState === WebSocket.OPEN) {
      this.ws.ping();
    }
  }

  public close(code: number, reason: string): void {
    if (this.ws.readyState === WebSocket.OPEN || this.ws.readyState === WebSocket.CONNECTING) {
      this.ws.close(code, reason);
    }
  }

  public terminate(): void {
    this.ws.terminate();
  }
}

export function rawDataToBuffer(data: WebSocket.RawData): Buffer {
  if (Buffer.isBuffer(data)) {
    return data;
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data);
  }
  return Buffer.from(data);
}
