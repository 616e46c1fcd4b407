import { createConnection, createServer } from 'node:net';
import type { ListenOptions, NetConnectOpts, Server, Socket } from 'node:net';
import { chmod, mkdir, rm } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { dirname } from 'node:path';
import { DEFAULT_MAX_FRAME_BYTES, toError } from '@agentwire/core';
import {
  ConnectionClosedError,
  ConnectionError,
  FrameDecoder,
  encodeFrame,
} from '@agentwire/protocol';
import { FrameQueue } from './frame-queue.js';
import type { ConnectionHandler, Transport, TransportListener, TransportOptions } from './types.js';

/** Length-prefixed framing over a `node:net` stream socket (Unix or TCP). */
export class SocketTransport implements Transport {
  private socket: Socket | null = null;
  private queue = new FrameQueue();
  private readonly maxFrameBytes: number;

  /** `target` is `null` for sockets accepted by a listener, which cannot redial. */
  constructor(
    readonly endpoint: string,
    private readonly target: NetConnectOpts | null,
    options: TransportOptions = {},
  ) {
    this.maxFrameBytes = options.maxFrameBytes ?? DEFAULT_MAX_FRAME_BYTES;
  }

  static fromSocket(socket: Socket, endpoint: string, options?: TransportOptions): SocketTransport {
    const transport = new SocketTransport(endpoint, null, options);
    transport.attach(socket);
    return transport;
  }

  async connect(): Promise<void> {
    if (this.isConnected()) return;
    const target = this.target;
    if (!target) {
      throw new ConnectionError(`Cannot redial an accepted connection on ${this.endpoint}`);
    }

    await new Promise<void>((resolve, reject) => {
      const s = createConnection(target);
      const onError = (err: Error) => {
        s.destroy();
        reject(
          new ConnectionError(`Failed to connect to ${this.endpoint}: ${err.message}`, {
            endpoint: this.endpoint,
          }),
        );
      };
      s.once('error', onError);
      s.once('connect', () => {
        s.off('error', onError);
        this.attach(s);
        resolve();
      });
    });
  }

  async send(data: Uint8Array): Promise<void> {
    const socket = this.socket;
    if (!socket || !this.isConnected()) {
      throw new ConnectionError('Not connected', { endpoint: this.endpoint });
    }
    const frame = encodeFrame(data, this.maxFrameBytes);
    await new Promise<void>((resolve, reject) => {
      socket.write(frame, (err) => {
        if (err) {
          reject(new ConnectionError(`Send failed on ${this.endpoint}: ${err.message}`));
        } else {
          resolve();
        }
      });
    });
  }

  async receive(signal?: AbortSignal): Promise<Uint8Array> {
    if (!this.socket) {
      throw new ConnectionError('Not connected', { endpoint: this.endpoint });
    }
    return this.queue.shift(signal);
  }

  async close(): Promise<void> {
    const socket = this.socket;
    if (!socket) return;
    this.socket = null;
    this.queue.error(new ConnectionClosedError('Transport closed', { endpoint: this.endpoint }));
    if (socket.destroyed) return;
    await new Promise<void>((resolve) => {
      socket.once('close', () => resolve());
      socket.destroy();
    });
  }

  isConnected(): boolean {
    return this.socket !== null && !this.socket.destroyed;
  }

  private attach(socket: Socket): void {
    const queue = new FrameQueue();
    const decoder = new FrameDecoder(this.maxFrameBytes);
    this.socket = socket;
    this.queue = queue;

    // A frame that fails to decode stops reading but keeps the socket
    // writable, so the owner can answer before closing.
    const onData = (chunk: Buffer) => {
      decoder.push(chunk);
      try {
        for (let frame = decoder.next(); frame; frame = decoder.next()) {
          queue.push(frame);
        }
      } catch (err) {
        socket.off('data', onData);
        socket.pause();
        decoder.reset();
        queue.error(toError(err));
      }
    };
    socket.on('data', onData);
    socket.on('error', (err) => {
      queue.error(new ConnectionError(`Connection error on ${this.endpoint}: ${err.message}`));
    });
    socket.on('close', () => {
      queue.error(new ConnectionClosedError('Connection closed by peer', { endpoint: this.endpoint }));
    });
  }
}

/** Shared accept loop for Unix and TCP listeners. */
abstract class SocketListener implements TransportListener {
  protected server: Server | null = null;
  private readonly sockets = new Set<Socket>();

  constructor(protected readonly options: TransportOptions = {}) {}

  abstract get endpoint(): string;

  protected abstract listenOptions(): ListenOptions;

  protected async beforeListen(): Promise<void> {}

  protected async afterListen(): Promise<void> {}

  protected async afterClose(): Promise<void> {}

  async listen(onConnection: ConnectionHandler): Promise<void> {
    if (this.server) {
      throw new Error(`Already listening on ${this.endpoint}`);
    }
    await this.beforeListen();

    const server = createServer((socket) => {
      this.sockets.add(socket);
      socket.once('close', () => this.sockets.delete(socket));
      onConnection(SocketTransport.fromSocket(socket, this.endpoint, this.options));
    });

    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error) => {
        reject(new ConnectionError(`Failed to listen on ${this.endpoint}: ${err.message}`));
      };
      server.once('error', onError);
      server.listen(this.listenOptions(), () => {
        server.off('error', onError);
        resolve();
      });
    });
    this.server = server;
    await this.afterListen();
  }

  async close(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;
    for (const socket of this.sockets) socket.destroy();
    this.sockets.clear();
    await new Promise<void>((resolve, reject) => {
      server.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
    await this.afterClose();
  }
}

export class UnixSocketTransport extends SocketTransport {
  constructor(path: string, options?: TransportOptions) {
    super(`unix://${path}`, { path }, options);
  }
}

/**
 * Listens on a Unix domain socket. The parent directory is created owner-only
 * when missing, a stale socket file is replaced, and the socket file is
 * restricted to the owner and removed again on close.
 */
export class UnixSocketListener extends SocketListener {
  constructor(
    private readonly path: string,
    options?: TransportOptions,
  ) {
    super(options);
  }

  get endpoint(): string {
    return `unix://${this.path}`;
  }

  protected listenOptions(): ListenOptions {
    return { path: this.path };
  }

  protected override async beforeListen(): Promise<void> {
    const dir = dirname(this.path);
    if (!existsSync(dir)) {
      await mkdir(dir, { recursive: true, mode: 0o700 });
    }
    await rm(this.path, { force: true });
  }

  protected override async afterListen(): Promise<void> {
    await chmod(this.path, 0o600);
  }

  protected override async afterClose(): Promise<void> {
    await rm(this.path, { force: true });
  }
}

/** Bracket IPv6 literals so `host:port` stays unambiguous. */
export function formatHostPort(host: string, port: number): string {
  return host.includes(':') ? `[${host}]:${port}` : `${host}:${port}`;
}

export class TcpTransport extends SocketTransport {
  constructor(host: string, port: number, options?: TransportOptions) {
    super(`tcp://${formatHostPort(host, port)}`, { host, port }, options);
  }
}

export class TcpListener extends SocketListener {
  constructor(
    private readonly host: string,
    private readonly port: number,
    options?: TransportOptions,
  ) {
    super(options);
  }

  /** Port reported by the OS once bound, the requested one before that. */
  get boundPort(): number {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address.port : this.port;
  }

  get endpoint(): string {
    return `tcp://${formatHostPort(this.host, this.boundPort)}`;
  }

  protected listenOptions(): ListenOptions {
    return { host: this.host, port: this.port };
  }
}
