import { DEFAULT_MAX_FRAME_BYTES, toError } from '@agentwire/core';
import {
  ConnectionClosedError,
  ConnectionError,
  FrameDecoder,
  encodeFrame,
} from '@agentwire/protocol';
import { FrameQueue } from './frame-queue.js';
import type { ConnectionHandler, Transport, TransportListener, TransportOptions } from './types.js';

export interface MemoryTransportOptions extends TransportOptions {
  /** Network to dial through on `connect()`. Pairs built directly have none. */
  network?: MemoryNetwork;
}

/**
 * In-process transport. Frames go through the same length-prefix encoder and
 * decoder as the socket transports, so size limits behave identically.
 */
export class MemoryTransport implements Transport {
  private peer: MemoryTransport | null = null;
  private queue = new FrameQueue();
  private decoder: FrameDecoder;
  private linked = false;
  private reading = true;
  private readonly maxFrameBytes: number;
  private readonly network: MemoryNetwork | null;

  constructor(
    readonly endpoint: string,
    options: MemoryTransportOptions = {},
  ) {
    this.maxFrameBytes = options.maxFrameBytes ?? DEFAULT_MAX_FRAME_BYTES;
    this.network = options.network ?? null;
    this.decoder = new FrameDecoder(this.maxFrameBytes);
  }

  /** Connect two transports to each other. */
  static link(a: MemoryTransport, b: MemoryTransport): void {
    a.attach(b);
    b.attach(a);
  }

  async connect(): Promise<void> {
    if (this.isConnected()) return;
    if (!this.network) {
      throw new ConnectionError(`No in-memory network to reach ${this.endpoint}`, {
        endpoint: this.endpoint,
      });
    }
    this.network.dial(this);
  }

  async send(data: Uint8Array): Promise<void> {
    const peer = this.peer;
    if (!peer) {
      throw new ConnectionError('Not connected', { endpoint: this.endpoint });
    }
    peer.deliver(encodeFrame(data, this.maxFrameBytes));
  }

  async receive(signal?: AbortSignal): Promise<Uint8Array> {
    if (!this.linked) {
      throw new ConnectionError('Not connected', { endpoint: this.endpoint });
    }
    return this.queue.shift(signal);
  }

  async close(): Promise<void> {
    this.disconnect(new ConnectionClosedError('Transport closed', { endpoint: this.endpoint }));
  }

  isConnected(): boolean {
    return this.peer !== null;
  }

  private attach(peer: MemoryTransport): void {
    this.peer = peer;
    this.linked = true;
    this.queue = new FrameQueue();
    this.decoder = new FrameDecoder(this.maxFrameBytes);
    this.reading = true;
  }

  /** A frame that fails to decode ends reading; the link stays up for a reply. */
  private deliver(frame: Buffer): void {
    if (!this.reading) return;
    this.decoder.push(frame);
    try {
      for (let body = this.decoder.next(); body; body = this.decoder.next()) {
        this.queue.push(body);
      }
    } catch (err) {
      this.reading = false;
      this.decoder.reset();
      this.queue.error(toError(err));
    }
  }

  private disconnect(reason: Error): void {
    const peer = this.peer;
    if (!peer) return;
    this.peer = null;
    this.queue.error(reason);
    peer.disconnect(
      new ConnectionClosedError('Connection closed by peer', { endpoint: peer.endpoint }),
    );
  }
}

/** Two transports already connected to each other. */
export function createMemoryTransportPair(
  endpoint = 'memory://pair',
  options: TransportOptions = {},
): [MemoryTransport, MemoryTransport] {
  const a = new MemoryTransport(endpoint, options);
  const b = new MemoryTransport(endpoint, options);
  MemoryTransport.link(a, b);
  return [a, b];
}

type Acceptor = (client: MemoryTransport) => void;

/** Name-based rendezvous between `MemoryListener`s and dialing transports. */
export class MemoryNetwork {
  private readonly listeners = new Map<string, Acceptor>();

  bind(endpoint: string, accept: Acceptor): void {
    if (this.listeners.has(endpoint)) {
      throw new ConnectionError(`Address already in use: ${endpoint}`, { endpoint });
    }
    this.listeners.set(endpoint, accept);
  }

  unbind(endpoint: string): void {
    this.listeners.delete(endpoint);
  }

  isBound(endpoint: string): boolean {
    return this.listeners.has(endpoint);
  }

  dial(client: MemoryTransport): void {
    const accept = this.listeners.get(client.endpoint);
    if (!accept) {
      throw new ConnectionError(`Failed to connect to ${client.endpoint}: no listener`, {
        endpoint: client.endpoint,
      });
    }
    accept(client);
  }
}

/** Network used by `memory://` endpoints when none is passed explicitly. */
export const defaultMemoryNetwork = new MemoryNetwork();

export class MemoryListener implements TransportListener {
  private readonly accepted = new Set<MemoryTransport>();
  private listening = false;
  private readonly network: MemoryNetwork;

  constructor(
    readonly endpoint: string,
    private readonly options: MemoryTransportOptions = {},
  ) {
    this.network = options.network ?? defaultMemoryNetwork;
  }

  async listen(onConnection: ConnectionHandler): Promise<void> {
    if (this.listening) {
      throw new Error(`Already listening on ${this.endpoint}`);
    }
    this.network.bind(this.endpoint, (client) => {
      const server = new MemoryTransport(this.endpoint, {
        maxFrameBytes: this.options.maxFrameBytes,
      });
      MemoryTransport.link(client, server);
      for (const transport of this.accepted) {
        if (!transport.isConnected()) this.accepted.delete(transport);
      }
      this.accepted.add(server);
      onConnection(server);
    });
    this.listening = true;
  }

  async close(): Promise<void> {
    if (!this.listening) return;
    this.listening = false;
    this.network.unbind(this.endpoint);
    await Promise.all([...this.accepted].map((transport) => transport.close()));
    this.accepted.clear();
  }
}
