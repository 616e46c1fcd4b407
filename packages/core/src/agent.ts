import type { Message } from './messages.js';

/**
 * Capability interface every agent satisfies, whether it runs in this
 * process or behind a `RemoteAgent` proxy.
 */
export interface Agent {
  readonly name: string;
  process(message: Message): Promise<Message>;
  /** Optional incremental variant of `process`. */
  stream?(message: Message): AsyncIterable<Message>;
}
