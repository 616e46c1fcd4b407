import { WebSocket, WebSocketServer } from 'ws';
import type { RawData } from 'ws';
import { DEFAULT_MAX_FRAME_BYTES } from '@agentwire/core';
import {
  ConnectionClosedError,
  ConnectionError,
  MalformedPayloadError,
} from '@agentwire/protocol';
import { FrameQueue } from './frame-queue.js';
import { formatHostPort } from './socket.js';
import type { ConnectionHandler, Transport, TransportListener, TransportOptions } from './types.js';

function toBuffer(data: RawData): Buffer {
  if (Array.isArray(data)) return Buffer.concat(data);
  if (data instanceof ArrayBuffer) return Buffer.from(data);
  return data;
}

function hasCode(err: Error, code: string): boolean {
  return 'code' in err && err.code === code;
}

/**
 * One binary WebSocket message per frame body; the WebSocket layer does the
 * framing, so no length prefix is added.
 */
export class WebSocketTransport implements Transport {
  private ws: WebSocket | null = null;
  private queue = new FrameQueue();
  private readonly maxFrameBytes: number;

  constructor(
    readonly endpoint: string,
    options: TransportOptions = {},
    private readonly accepted = false,
  ) {
    this.maxFrameBytes = options.maxFrameBytes ?? DEFAULT_MAX_FRAME_BYTES;
  }

  static fromSocket(ws: WebSocket, endpoint: string, options?: TransportOptions): WebSocketTransport {
    const transport = new WebSocketTransport(endpoint, options, true);
    transport.attach(ws);
    return transport;
  }

  async connect(): Promise<void> {
    if (this.isConnected()) return;
    if (this.accepted) {
      throw new ConnectionError(`Cannot redial an accepted connection on ${this.endpoint}`);
    }

    await new Promise<void>((resolve, reject) => {
      const socket = new WebSocket(this.endpoint, { maxPayload: this.maxFrameBytes });
      const onError = (err: Error) => {
        socket.terminate();
        reject(
          new ConnectionError(`Failed to connect to ${this.endpoint}: ${err.message}`, {
            endpoint: this.endpoint,
          }),
        );
      };
      socket.once('error', onError);
      socket.once('open', () => {
        socket.off('error', onError);
        this.attach(socket);
        resolve();
      });
    });
  }

  async send(data: Uint8Array): Promise<void> {
    const ws = this.ws;
    if (!ws || !this.isConnected()) {
      throw new ConnectionError('Not connected', { endpoint: this.endpoint });
    }
    if (data.byteLength > this.maxFrameBytes) {
      throw new MalformedPayloadError(
        `Frame of ${data.byteLength} bytes exceeds maximum of ${this.maxFrameBytes} bytes`,
        { length: data.byteLength, max_frame_bytes: this.maxFrameBytes },
      );
    }
    await new Promise<void>((resolve, reject) => {
      ws.send(data, { binary: true }, (err) => {
        if (err) reject(new ConnectionError(`Send failed on ${this.endpoint}: ${err.message}`));
        else resolve();
      });
    });
  }

  async receive(signal?: AbortSignal): Promise<Uint8Array> {
    if (!this.ws) {
      throw new ConnectionError('Not connected', { endpoint: this.endpoint });
    }
    return this.queue.shift(signal);
  }

  async close(): Promise<void> {
    const ws = this.ws;
    if (!ws) return;
    this.ws = null;
    this.queue.error(new ConnectionClosedError('Transport closed', { endpoint: this.endpoint }));
    if (ws.readyState === WebSocket.CLOSED) return;
    await new Promise<void>((resolve) => {
      ws.once('close', () => resolve());
      ws.close(1000);
    });
  }

  isConnected(): boolean {
    return this.ws !== null && this.ws.readyState === WebSocket.OPEN && !this.queue.failed;
  }

  private attach(ws: WebSocket): void {
    const queue = new FrameQueue();
    this.ws = ws;
    this.queue = queue;
    ws.binaryType = 'nodebuffer';

    ws.on('message', (data) => {
      queue.push(toBuffer(data));
    });
    ws.on('error', (err) => {
      if (hasCode(err, 'WS_ERR_UNSUPPORTED_MESSAGE_LENGTH')) {
        queue.error(
          new MalformedPayloadError(`Frame exceeds maximum of ${this.maxFrameBytes} bytes`, {
            max_frame_bytes: this.maxFrameBytes,
          }),
        );
        return;
      }
      queue.error(new ConnectionError(`Connection error on ${this.endpoint}: ${err.message}`));
    });
    ws.on('close', () => {
      queue.error(new ConnectionClosedError('Connection closed by peer', { endpoint: this.endpoint }));
    });
  }
}

export class WebSocketListener implements TransportListener {
  private wss: WebSocketServer | null = null;

  constructor(
    private readonly host: string,
    private readonly port: number,
    private readonly path = '/',
    private readonly options: TransportOptions = {},
  ) {}

  get endpoint(): string {
    const address = this.wss?.address();
    const port = address && typeof address === 'object' ? address.port : this.port;
    const suffix = this.path === '/' ? '' : this.path;
    return `ws://${formatHostPort(this.host, port)}${suffix}`;
  }

  async listen(onConnection: ConnectionHandler): Promise<void> {
    if (this.wss) {
      throw new Error(`Already listening on ${this.endpoint}`);
    }
    const wss = new WebSocketServer({
      host: this.host,
      port: this.port,
      maxPayload: this.options.maxFrameBytes ?? DEFAULT_MAX_FRAME_BYTES,
      ...(this.path === '/' ? {} : { path: this.path }),
    });

    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error) => {
        reject(new ConnectionError(`Failed to listen on ${this.endpoint}: ${err.message}`));
      };
      wss.once('error', onError);
      wss.once('listening', () => {
        wss.off('error', onError);
        resolve();
      });
    });
    this.wss = wss;

    wss.on('connection', (ws) => {
      onConnection(WebSocketTransport.fromSocket(ws, this.endpoint, this.options));
    });
  }

  async close(): Promise<void> {
    const wss = this.wss;
    if (!wss) return;
    this.wss = null;
    for (const ws of wss.clients) ws.terminate();
    await new Promise<void>((resolve, reject) => {
      wss.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }
}
