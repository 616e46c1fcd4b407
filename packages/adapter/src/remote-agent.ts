import { noopLogger, toError } from '@agentwire/core';
import type { Agent, Logger, Message } from '@agentwire/core';
import {
  ConnectionTimeoutError,
  InvalidMessageError,
  createRequestEnvelope,
  decodeEnvelope,
  encodeEnvelope,
  errorFromPayload,
  readErrorPayload,
  readMessagePayload,
} from '@agentwire/protocol';
import type { Envelope, RequestPayload } from '@agentwire/protocol';
import { createTransport } from '@agentwire/transport';
import type { MemoryNetwork, Transport } from '@agentwire/transport';
import { CallLock } from './call-lock.js';

export const DEFAULT_CALL_TIMEOUT_MS = 30_000;

export interface RemoteAgentOptions {
  /** Endpoint to dial. Ignored when `transport` is given. */
  endpoint?: string;
  transport?: Transport;
  /** Bound on the wait for each reply frame. Default: 30s. */
  timeoutMs?: number;
  maxFrameBytes?: number;
  /** Network for `memory://` endpoints. */
  network?: MemoryNetwork;
  logger?: Logger;
}

/**
 * Client-side proxy for an agent exported by a `LocalAgent`. Calls are sent
 * one at a time over a single lazily opened connection. Any transport or
 * framing failure drops the connection so the next call starts clean.
 */
export class RemoteAgent implements Agent {
  private readonly transport: Transport;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly calls = new CallLock();

  constructor(
    readonly name: string,
    options: RemoteAgentOptions,
  ) {
    if (options.transport) {
      this.transport = options.transport;
    } else if (options.endpoint) {
      this.transport = createTransport(options.endpoint, {
        maxFrameBytes: options.maxFrameBytes,
        network: options.network,
      });
    } else {
      throw new TypeError('RemoteAgent needs an endpoint or a transport');
    }
    this.timeoutMs = options.timeoutMs ?? DEFAULT_CALL_TIMEOUT_MS;
    this.logger = options.logger ?? noopLogger;
  }

  get endpoint(): string {
    return this.transport.endpoint;
  }

  async process(message: Message): Promise<Message> {
    const request = createRequestEnvelope('process', this.name, message);
    const reply = await this.calls.run(() =>
      this.guard(async () => {
        await this.sendRequest(request);
        return this.receiveReply(request.id);
      }),
    );

    if (reply.type === 'response') return readMessagePayload(reply);
    throw this.unexpectedReply(reply);
  }

  /** Yields each `stream_chunk` until the server sends `stream_end`. */
  async *stream(message: Message): AsyncGenerator<Message> {
    const request = createRequestEnvelope('stream', this.name, message);
    const release = await this.calls.acquire();
    let settled = false;
    try {
      await this.guard(() => this.sendRequest(request));
      for (;;) {
        const reply = await this.guard(() => this.receiveReply(request.id));
        if (reply.type === 'stream_chunk') {
          yield readMessagePayload(reply);
          continue;
        }
        settled = true;
        if (reply.type === 'stream_end') return;
        throw this.unexpectedReply(reply);
      }
    } finally {
      // Frames of an abandoned stream would be read as replies to the next call.
      if (!settled) await this.disconnect();
      release();
    }
  }

  async close(): Promise<void> {
    await this.disconnect();
  }

  private async sendRequest(request: Envelope<RequestPayload>): Promise<void> {
    if (!this.transport.isConnected()) {
      await this.transport.connect();
      this.logger.debug(`Connected to '${this.name}' at ${this.endpoint}`);
    }
    await this.transport.send(encodeEnvelope(request));
  }

  private async receiveReply(requestId: string): Promise<Envelope> {
    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort(
        new ConnectionTimeoutError(
          `Timed out after ${this.timeoutMs}ms waiting for agent '${this.name}'`,
          { agent_name: this.name, timeout_ms: this.timeoutMs },
        ),
      );
    }, this.timeoutMs);

    let frame: Uint8Array;
    try {
      frame = await this.transport.receive(controller.signal);
    } finally {
      clearTimeout(timer);
    }

    const reply = decodeEnvelope(frame);
    if (reply.id !== requestId) {
      throw new InvalidMessageError(
        `Reply id '${reply.id}' does not match request id '${requestId}'`,
        { expected_id: requestId, received_id: reply.id },
      );
    }
    return reply;
  }

  private unexpectedReply(reply: Envelope): Error {
    if (reply.type === 'error') {
      return errorFromPayload(this.name, readErrorPayload(reply));
    }
    return new InvalidMessageError(`Unexpected '${reply.type}' envelope in reply`, {
      type: reply.type,
    });
  }

  /** Run one exchange step; on failure drop the connection and rethrow. */
  private async guard<T>(step: () => Promise<T>): Promise<T> {
    try {
      return await step();
    } catch (err) {
      await this.disconnect();
      throw err;
    }
  }

  private async disconnect(): Promise<void> {
    try {
      await this.transport.close();
    } catch (err) {
      this.logger.warn(`Failed to close connection to '${this.name}': ${toError(err).message}`);
    }
  }
}
