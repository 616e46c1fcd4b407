import { noopLogger, toError } from '@agentwire/core';
import type { Agent, Logger, Message, Metadata } from '@agentwire/core';
import {
  AgentNotFoundError,
  ConnectionClosedError,
  ConnectionTimeoutError,
  InvalidMessageError,
  MalformedPayloadError,
  ProtocolError,
  ProtocolErrorCode,
  createErrorEnvelope,
  createResponseEnvelope,
  createStreamChunkEnvelope,
  createStreamEndEnvelope,
  decodeEnvelope,
  decodeMessage,
  encodeEnvelope,
  isConnectionError,
  readRequestPayload,
} from '@agentwire/protocol';
import type { Envelope } from '@agentwire/protocol';
import { startHeartbeatLoop } from '@agentwire/registry';
import type { AgentRegistry, PeriodicTask } from '@agentwire/registry';
import { createListener } from '@agentwire/transport';
import type { MemoryNetwork, Transport, TransportListener } from '@agentwire/transport';

export const DEFAULT_IDLE_TIMEOUT_MS = 60_000;

/** Id used in error replies when the request id could not be read. */
const UNKNOWN_ID = 'unknown';

export interface LocalAgentOptions {
  /** Where to listen. Ignored when `listener` is given. */
  endpoint?: string;
  listener?: TransportListener;
  /** Registry to announce this agent in while it runs. */
  registry?: AgentRegistry;
  heartbeatIntervalMs?: number;
  heartbeatRetryMs?: number;
  capabilities?: Metadata;
  metadata?: Metadata;
  maxFrameBytes?: number;
  /** Close a connection after this long without a frame. Default: 60s. */
  idleTimeoutMs?: number;
  /** Network for `memory://` endpoints. */
  network?: MemoryNetwork;
  logger?: Logger;
}

/**
 * Exports an `Agent` on an endpoint. Each accepted connection gets its own
 * request loop; requests on one connection are answered in order.
 */
export class LocalAgent {
  private readonly listener: TransportListener;
  private readonly idleTimeoutMs: number;
  private readonly logger: Logger;
  private readonly connections = new Set<Transport>();
  private readonly handlers = new Set<Promise<void>>();
  private controller: AbortController | null = null;
  private heartbeat: PeriodicTask | null = null;
  private running = false;

  constructor(
    readonly agent: Agent,
    private readonly options: LocalAgentOptions,
  ) {
    if (options.listener) {
      this.listener = options.listener;
    } else if (options.endpoint) {
      this.listener = createListener(options.endpoint, {
        maxFrameBytes: options.maxFrameBytes,
        network: options.network,
      });
    } else {
      throw new TypeError('LocalAgent needs an endpoint or a listener');
    }
    this.idleTimeoutMs = options.idleTimeoutMs ?? DEFAULT_IDLE_TIMEOUT_MS;
    this.logger = options.logger ?? noopLogger;
  }

  get name(): string {
    return this.agent.name;
  }

  /** Bound endpoint; reports the real port after listening on port 0. */
  get endpoint(): string {
    return this.listener.endpoint;
  }

  get activeConnections(): number {
    return this.connections.size;
  }

  isRunning(): boolean {
    return this.running;
  }

  async start(): Promise<void> {
    if (this.running) {
      throw new Error(`LocalAgent '${this.name}' is already running`);
    }
    this.controller = new AbortController();
    await this.listener.listen((transport) => this.accept(transport));
    this.running = true;

    const { registry } = this.options;
    if (registry) {
      try {
        await registry.register({
          name: this.name,
          endpoint: this.endpoint,
          capabilities: this.options.capabilities,
          metadata: this.options.metadata,
        });
      } catch (err) {
        await this.stop();
        throw err;
      }
      this.heartbeat = startHeartbeatLoop(registry, this.name, {
        intervalMs: this.options.heartbeatIntervalMs,
        retryDelayMs: this.options.heartbeatRetryMs,
        logger: this.logger,
      });
    }

    this.logger.info(`Serving agent '${this.name}' on ${this.endpoint}`);
  }

  /** Close the listener and every connection, then leave the registry. */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    this.controller?.abort(new ConnectionClosedError('Server shutting down'));
    this.controller = null;

    await this.listener.close();
    await Promise.all([...this.connections].map((transport) => transport.close()));
    await Promise.allSettled([...this.handlers]);

    const registered = this.heartbeat !== null;
    await this.heartbeat?.stop();
    this.heartbeat = null;
    const { registry } = this.options;
    if (registry && registered) {
      try {
        await registry.unregister(this.name);
      } catch (err) {
        this.logger.warn(`Failed to unregister '${this.name}': ${toError(err).message}`);
      }
    }

    this.logger.info(`Stopped serving agent '${this.name}'`);
  }

  private accept(transport: Transport): void {
    const signal = this.controller?.signal;
    if (!signal || signal.aborted) {
      transport.close().catch((err: unknown) => {
        this.logger.debug(`Failed to close rejected connection: ${toError(err).message}`);
      });
      return;
    }

    this.connections.add(transport);
    const handler: Promise<void> = this.serve(transport, signal)
      .catch((err: unknown) => {
        this.logger.error(`Connection handler for '${this.name}' failed: ${toError(err).message}`);
      })
      .finally(() => {
        this.connections.delete(transport);
        this.handlers.delete(handler);
      });
    this.handlers.add(handler);
  }

  private async serve(transport: Transport, signal: AbortSignal): Promise<void> {
    try {
      while (!signal.aborted) {
        let frame: Uint8Array;
        try {
          frame = await this.receiveFrame(transport, signal);
        } catch (err) {
          if (err instanceof MalformedPayloadError) {
            await this.replyBestEffort(transport, UNKNOWN_ID, err);
          } else {
            this.logger.debug(`Connection ended: ${toError(err).message}`);
          }
          return;
        }

        let envelope: Envelope;
        try {
          envelope = decodeEnvelope(frame);
        } catch (err) {
          if (!(err instanceof ProtocolError)) throw err;
          this.logger.warn(`Rejecting undecodable frame: ${err.message}`);
          await this.replyBestEffort(transport, UNKNOWN_ID, err);
          return;
        }

        try {
          await this.dispatch(transport, envelope, signal);
        } catch (err) {
          if (!isConnectionError(err)) throw err;
          this.logger.debug(`Connection lost while replying: ${err.message}`);
          return;
        }
      }
    } finally {
      await transport.close();
    }
  }

  /** Next frame, bounded by the idle timeout and server shutdown. */
  private async receiveFrame(transport: Transport, signal: AbortSignal): Promise<Uint8Array> {
    const idle = new AbortController();
    const onShutdown = () => idle.abort(signal.reason);
    signal.addEventListener('abort', onShutdown, { once: true });
    const timer = setTimeout(() => {
      idle.abort(new ConnectionTimeoutError(`Connection idle for ${this.idleTimeoutMs}ms`));
    }, this.idleTimeoutMs);
    try {
      return await transport.receive(idle.signal);
    } finally {
      clearTimeout(timer);
      signal.removeEventListener('abort', onShutdown);
    }
  }

  private async dispatch(transport: Transport, envelope: Envelope, signal: AbortSignal): Promise<void> {
    const { id } = envelope;
    if (envelope.type !== 'request') {
      await this.reply(
        transport,
        createErrorEnvelope(
          id,
          ProtocolErrorCode.INVALID_MESSAGE,
          `Expected a 'request' envelope, got '${envelope.type}'`,
          { type: envelope.type },
        ),
      );
      return;
    }

    let method: string;
    let message: Message;
    try {
      const request = readRequestPayload(envelope);
      if (request.agent_name !== undefined && request.agent_name !== this.name) {
        throw new AgentNotFoundError(request.agent_name, { agent_name: request.agent_name });
      }
      if (request.method !== 'process' && request.method !== 'stream') {
        throw new InvalidMessageError(`Unknown method: ${request.method}`, {
          method: request.method,
        });
      }
      method = request.method;
      message = decodeMessage(request.message);
    } catch (err) {
      if (!(err instanceof ProtocolError)) throw err;
      await this.reply(transport, createErrorEnvelope(id, err.code, err.message, err.details));
      return;
    }

    if (method === 'stream') {
      await this.handleStream(transport, id, message, signal);
    } else {
      await this.handleProcess(transport, id, message);
    }
  }

  private async handleProcess(transport: Transport, id: string, message: Message): Promise<void> {
    let result: Message;
    try {
      result = await this.agent.process(message);
    } catch (err) {
      await this.replyAgentError(transport, id, err);
      return;
    }

    try {
      await this.reply(transport, createResponseEnvelope(id, result));
    } catch (err) {
      if (!(err instanceof MalformedPayloadError)) throw err;
      await this.reply(transport, createErrorEnvelope(id, err.code, err.message, err.details));
    }
  }

  private async handleStream(
    transport: Transport,
    id: string,
    message: Message,
    signal: AbortSignal,
  ): Promise<void> {
    if (!this.agent.stream) {
      await this.reply(
        transport,
        createErrorEnvelope(
          id,
          ProtocolErrorCode.INVALID_MESSAGE,
          `Agent '${this.name}' does not support streaming`,
          { agent_name: this.name },
        ),
      );
      return;
    }

    try {
      for await (const chunk of this.agent.stream(message)) {
        if (signal.aborted) return;
        await this.reply(transport, createStreamChunkEnvelope(id, chunk));
      }
    } catch (err) {
      if (isConnectionError(err)) throw err;
      if (err instanceof MalformedPayloadError) {
        await this.reply(transport, createErrorEnvelope(id, err.code, err.message, err.details));
        return;
      }
      await this.replyAgentError(transport, id, err);
      return;
    }
    await this.reply(transport, createStreamEndEnvelope(id));
  }

  private async replyAgentError(transport: Transport, id: string, err: unknown): Promise<void> {
    const error = toError(err);
    this.logger.warn(`Agent '${this.name}' failed: ${error.message}`);
    await this.reply(
      transport,
      createErrorEnvelope(id, ProtocolErrorCode.AGENT_ERROR, error.message, {
        agent_name: this.name,
      }),
    );
  }

  private async reply(transport: Transport, envelope: Envelope<unknown>): Promise<void> {
    await transport.send(encodeEnvelope(envelope));
  }

  /** Error reply on a connection that is about to be closed. */
  private async replyBestEffort(transport: Transport, id: string, err: ProtocolError): Promise<void> {
    try {
      await this.reply(transport, createErrorEnvelope(id, err.code, err.message, err.details));
    } catch (sendErr) {
      this.logger.debug(`Could not send error reply: ${toError(sendErr).message}`);
    }
  }
}
