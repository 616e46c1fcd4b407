import type { Logger, Metadata } from '@agentwire/core';

/** A registered agent and its liveness record. */
export interface AgentRegistration {
  name: string;
  endpoint: string;
  capabilities: Metadata;
  metadata: Metadata;
  registeredAt: Date;
  lastHeartbeat: Date;
}

export interface RegistrationInput {
  name: string;
  endpoint: string;
  capabilities?: Metadata;
  metadata?: Metadata;
}

/**
 * Agent discovery and liveness tracking. Every read returns copies, so callers
 * cannot mutate registry state.
 */
export interface AgentRegistry {
  /** Begin periodic pruning. */
  start(): Promise<void>;
  stop(): Promise<void>;
  register(input: RegistrationInput): Promise<AgentRegistration>;
  /** Resolves `false` when the name was not registered. */
  unregister(name: string): Promise<boolean>;
  /** Throws `AgentNotFoundError` for unknown names. */
  lookup(name: string): Promise<AgentRegistration>;
  list(): Promise<AgentRegistration[]>;
  heartbeat(name: string): Promise<void>;
  /** Remove registrations whose last heartbeat is older than the timeout. */
  pruneStale(): Promise<string[]>;
  size(): Promise<number>;
}

export interface RegistryOptions {
  /** Expected heartbeat cadence of registered agents. Default: 30s. */
  heartbeatIntervalMs?: number;
  /** Age after which a registration is pruned. Must exceed the interval. Default: 90s. */
  heartbeatTimeoutMs?: number;
  /** Default: 60s. */
  pruneIntervalMs?: number;
  /** Milliseconds since the epoch. Default: `Date.now`. */
  clock?: () => number;
  logger?: Logger;
}
