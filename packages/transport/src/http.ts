import { createServer, request } from 'node:http';
import type { ClientRequest, IncomingMessage, RequestOptions, Server, ServerResponse } from 'node:http';
import { DEFAULT_MAX_FRAME_BYTES, generateId, toError } from '@agentwire/core';
import {
  ConnectionClosedError,
  ConnectionError,
  FrameDecoder,
  MalformedPayloadError,
  encodeFrame,
} from '@agentwire/protocol';
import { FrameQueue } from './frame-queue.js';
import { formatHostPort } from './socket.js';
import type { ConnectionHandler, Transport, TransportListener, TransportOptions } from './types.js';

export const SESSION_HEADER = 'x-agentwire-session';

function basePath(path: string): string {
  return path.endsWith('/') ? path.slice(0, -1) : path;
}

function oversize(length: number, max: number): MalformedPayloadError {
  return new MalformedPayloadError(`Frame of ${length} bytes exceeds maximum of ${max} bytes`, {
    length,
    max_frame_bytes: max,
  });
}

/**
 * Frames over plain HTTP/1.1. `connect()` opens a long-lived
 * `GET <path>/frames` whose response carries length-prefixed frames from the
 * server; each `send()` is one `POST <path>/frames/<session>` with the frame
 * body.
 */
export class HttpTransport implements Transport {
  private stream: ClientRequest | null = null;
  private session: string | null = null;
  private queue = new FrameQueue();
  private readonly url: URL;
  private readonly maxFrameBytes: number;

  constructor(
    readonly endpoint: string,
    options: TransportOptions = {},
  ) {
    this.url = new URL(endpoint);
    this.maxFrameBytes = options.maxFrameBytes ?? DEFAULT_MAX_FRAME_BYTES;
  }

  async connect(): Promise<void> {
    if (this.isConnected()) return;

    await new Promise<void>((resolve, reject) => {
      const fail = (reason: string) => {
        reject(
          new ConnectionError(`Failed to connect to ${this.endpoint}: ${reason}`, {
            endpoint: this.endpoint,
          }),
        );
      };
      const req = request(this.target('GET', '/frames', { agent: false }), (res) => {
        const session = res.headers[SESSION_HEADER];
        if (res.statusCode !== 200 || typeof session !== 'string') {
          res.resume();
          req.destroy();
          fail(`HTTP ${res.statusCode ?? 0}`);
          return;
        }
        req.off('error', onError);
        this.attach(req, res, session);
        resolve();
      });
      const onError = (err: Error) => fail(err.message);
      req.once('error', onError);
      req.end();
    });
  }

  async send(data: Uint8Array): Promise<void> {
    const session = this.session;
    if (!session || !this.isConnected()) {
      throw new ConnectionError('Not connected', { endpoint: this.endpoint });
    }
    if (data.byteLength > this.maxFrameBytes) {
      throw oversize(data.byteLength, this.maxFrameBytes);
    }

    const status = await new Promise<number>((resolve, reject) => {
      const req = request(
        this.target('POST', `/frames/${session}`, {
          headers: {
            'content-type': 'application/octet-stream',
            'content-length': data.byteLength,
          },
        }),
        (res) => {
          res.resume();
          resolve(res.statusCode ?? 0);
        },
      );
      req.once('error', (err) => {
        reject(new ConnectionError(`Send failed on ${this.endpoint}: ${err.message}`));
      });
      req.end(data);
    });

    if (status === 413) {
      throw new MalformedPayloadError(`Peer rejected a frame of ${data.byteLength} bytes`, {
        length: data.byteLength,
      });
    }
    if (status !== 204) {
      throw new ConnectionError(`Send failed on ${this.endpoint}: HTTP ${status}`, {
        endpoint: this.endpoint,
      });
    }
  }

  async receive(signal?: AbortSignal): Promise<Uint8Array> {
    if (!this.session) {
      throw new ConnectionError('Not connected', { endpoint: this.endpoint });
    }
    return this.queue.shift(signal);
  }

  async close(): Promise<void> {
    const stream = this.stream;
    if (!stream) return;
    this.stream = null;
    this.session = null;
    this.queue.error(new ConnectionClosedError('Transport closed', { endpoint: this.endpoint }));
    stream.destroy();
  }

  isConnected(): boolean {
    return this.stream !== null && !this.queue.failed;
  }

  private target(method: string, suffix: string, extra: RequestOptions = {}): RequestOptions {
    return {
      ...extra,
      method,
      host: this.url.hostname.replace(/^\[|\]$/g, ''),
      port: this.url.port ? Number(this.url.port) : 80,
      path: `${basePath(this.url.pathname)}${suffix}`,
    };
  }

  private attach(req: ClientRequest, res: IncomingMessage, session: string): void {
    const queue = new FrameQueue();
    const decoder = new FrameDecoder(this.maxFrameBytes);
    this.stream = req;
    this.session = session;
    this.queue = queue;

    const closed = () =>
      new ConnectionClosedError('Connection closed by peer', { endpoint: this.endpoint });

    res.on('data', (chunk: Buffer) => {
      decoder.push(chunk);
      try {
        for (let frame = decoder.next(); frame; frame = decoder.next()) {
          queue.push(frame);
        }
      } catch (err) {
        queue.error(toError(err));
        res.destroy();
      }
    });
    res.on('end', () => queue.error(closed()));
    res.on('error', () => queue.error(closed()));
    res.on('close', () => queue.error(closed()));
  }
}

/** Server half of one HTTP session: frames out on the stream, frames in by POST. */
class HttpSessionTransport implements Transport {
  private readonly queue = new FrameQueue();
  private open = true;

  constructor(
    readonly endpoint: string,
    private readonly res: ServerResponse,
    private readonly maxFrameBytes: number,
  ) {
    res.on('close', () => {
      this.open = false;
      this.queue.error(new ConnectionClosedError('Connection closed by peer', { endpoint }));
    });
  }

  async connect(): Promise<void> {
    if (this.isConnected()) return;
    throw new ConnectionError(`Cannot redial an accepted connection on ${this.endpoint}`);
  }

  async send(data: Uint8Array): Promise<void> {
    if (!this.isConnected()) {
      throw new ConnectionError('Not connected', { endpoint: this.endpoint });
    }
    const frame = encodeFrame(data, this.maxFrameBytes);
    await new Promise<void>((resolve, reject) => {
      this.res.write(frame, (err) => {
        if (err) reject(new ConnectionError(`Send failed on ${this.endpoint}: ${err.message}`));
        else resolve();
      });
    });
  }

  async receive(signal?: AbortSignal): Promise<Uint8Array> {
    return this.queue.shift(signal);
  }

  async close(): Promise<void> {
    if (!this.open) return;
    this.open = false;
    this.queue.error(new ConnectionClosedError('Transport closed', { endpoint: this.endpoint }));
    this.res.end();
  }

  isConnected(): boolean {
    return this.open && !this.res.writableEnded && !this.res.destroyed;
  }

  /** False once reading has stopped; the frame is dropped. */
  deliver(body: Buffer): boolean {
    if (this.queue.failed) return false;
    this.queue.push(body);
    return true;
  }

  /** Stop reading. The stream stays writable so the owner can answer. */
  fail(err: Error): void {
    this.queue.error(err);
  }
}

export class HttpListener implements TransportListener {
  private server: Server | null = null;
  private readonly sessions = new Map<string, HttpSessionTransport>();
  private readonly maxFrameBytes: number;

  constructor(
    private readonly host: string,
    private readonly port: number,
    private readonly path = '/',
    options: TransportOptions = {},
  ) {
    this.maxFrameBytes = options.maxFrameBytes ?? DEFAULT_MAX_FRAME_BYTES;
  }

  get endpoint(): string {
    const address = this.server?.address();
    const port = address && typeof address === 'object' ? address.port : this.port;
    return `http://${formatHostPort(this.host, port)}${basePath(this.path)}`;
  }

  async listen(onConnection: ConnectionHandler): Promise<void> {
    if (this.server) {
      throw new Error(`Already listening on ${this.endpoint}`);
    }
    const server = createServer((req, res) => this.handle(req, res, onConnection));

    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error) => {
        reject(new ConnectionError(`Failed to listen on ${this.endpoint}: ${err.message}`));
      };
      server.once('error', onError);
      server.listen(this.port, this.host, () => {
        server.off('error', onError);
        resolve();
      });
    });
    this.server = server;
  }

  async close(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;
    await Promise.all([...this.sessions.values()].map((session) => session.close()));
    this.sessions.clear();
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => {
      server.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  private handle(req: IncomingMessage, res: ServerResponse, onConnection: ConnectionHandler): void {
    const pathname = new URL(req.url ?? '/', 'http://localhost').pathname;
    const frames = `${basePath(this.path)}/frames`;

    if (req.method === 'GET' && pathname === frames) {
      this.openSession(res, onConnection);
      return;
    }
    if (req.method === 'POST' && pathname.startsWith(`${frames}/`)) {
      this.receiveFrame(req, res, pathname.slice(frames.length + 1));
      return;
    }
    req.resume();
    res.writeHead(404).end();
  }

  private openSession(res: ServerResponse, onConnection: ConnectionHandler): void {
    const id = generateId();
    res.writeHead(200, {
      'content-type': 'application/octet-stream',
      'cache-control': 'no-store',
      [SESSION_HEADER]: id,
    });
    res.flushHeaders();

    const session = new HttpSessionTransport(this.endpoint, res, this.maxFrameBytes);
    this.sessions.set(id, session);
    res.once('close', () => this.sessions.delete(id));
    onConnection(session);
  }

  private receiveFrame(req: IncomingMessage, res: ServerResponse, id: string): void {
    const session = this.sessions.get(id);
    if (!session) {
      req.resume();
      res.writeHead(404).end();
      return;
    }

    const max = this.maxFrameBytes;
    const declared = Number(req.headers['content-length'] ?? 0);
    const chunks: Buffer[] = [];
    let size = 0;
    let rejected = false;
    const reject = (length: number) => {
      rejected = true;
      chunks.length = 0;
      session.fail(oversize(length, max));
    };
    if (declared > max) reject(declared);

    req.on('data', (chunk: Buffer) => {
      if (rejected) return;
      size += chunk.length;
      if (size > max) reject(size);
      else chunks.push(chunk);
    });
    req.on('end', () => {
      if (rejected) {
        res.writeHead(413).end();
        return;
      }
      res.writeHead(session.deliver(Buffer.concat(chunks)) ? 204 : 410).end();
    });
  }
}
