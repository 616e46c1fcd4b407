import { noopLogger } from '@agentwire/core';
import type { Logger } from '@agentwire/core';
import {
  AgentNotFoundError,
  DuplicateAgentError,
  RegistrationFailedError,
} from '@agentwire/protocol';
import { PeriodicTask } from './periodic-task.js';
import { ReadWriteLock } from './rw-lock.js';
import type {
  AgentRegistration,
  AgentRegistry,
  RegistrationInput,
  RegistryOptions,
} from './types.js';

export const DEFAULT_HEARTBEAT_INTERVAL_MS = 30_000;
export const DEFAULT_HEARTBEAT_TIMEOUT_MS = 90_000;
export const DEFAULT_PRUNE_INTERVAL_MS = 60_000;

export function cloneRegistration(reg: AgentRegistration): AgentRegistration {
  return {
    name: reg.name,
    endpoint: reg.endpoint,
    capabilities: structuredClone(reg.capabilities),
    metadata: structuredClone(reg.metadata),
    registeredAt: new Date(reg.registeredAt.getTime()),
    lastHeartbeat: new Date(reg.lastHeartbeat.getTime()),
  };
}

/**
 * Registry semantics shared by every backend. Subclasses only store and load
 * entries; all mutation goes through the write lock here.
 */
export abstract class BaseAgentRegistry implements AgentRegistry {
  readonly heartbeatIntervalMs: number;
  readonly heartbeatTimeoutMs: number;
  readonly pruneIntervalMs: number;

  protected readonly logger: Logger;
  protected readonly lock = new ReadWriteLock();
  private readonly clock: () => number;
  private readonly pruner: PeriodicTask;

  constructor(options: RegistryOptions = {}) {
    this.heartbeatIntervalMs = options.heartbeatIntervalMs ?? DEFAULT_HEARTBEAT_INTERVAL_MS;
    this.heartbeatTimeoutMs = options.heartbeatTimeoutMs ?? DEFAULT_HEARTBEAT_TIMEOUT_MS;
    this.pruneIntervalMs = options.pruneIntervalMs ?? DEFAULT_PRUNE_INTERVAL_MS;
    if (this.heartbeatTimeoutMs <= this.heartbeatIntervalMs) {
      throw new RangeError(
        `heartbeatTimeoutMs (${this.heartbeatTimeoutMs}) must exceed heartbeatIntervalMs (${this.heartbeatIntervalMs})`,
      );
    }
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? noopLogger;
    this.pruner = new PeriodicTask({
      name: 'registry pruning',
      intervalMs: this.pruneIntervalMs,
      run: async () => {
        await this.pruneStale();
      },
      logger: this.logger,
    });
  }

  // Storage, one implementation per backend.
  protected abstract readEntry(name: string): Promise<AgentRegistration | undefined>;
  protected abstract writeEntry(reg: AgentRegistration): Promise<void>;
  protected abstract deleteEntry(name: string): Promise<boolean>;
  protected abstract readAll(): Promise<AgentRegistration[]>;

  /** Backend setup before pruning starts. */
  protected async open(): Promise<void> {}

  protected async shutdown(): Promise<void> {}

  get pruning(): boolean {
    return this.pruner.running;
  }

  async start(): Promise<void> {
    await this.open();
    this.pruner.start();
    this.logger.info(`Registry started (prune every ${this.pruneIntervalMs}ms)`);
  }

  async stop(): Promise<void> {
    await this.pruner.stop();
    await this.shutdown();
    this.logger.info('Registry stopped');
  }

  async register(input: RegistrationInput): Promise<AgentRegistration> {
    if (!input.name) {
      throw new RegistrationFailedError('Agent name cannot be empty');
    }
    if (!input.endpoint) {
      throw new RegistrationFailedError(`Agent '${input.name}' has no endpoint`, {
        agent_name: input.name,
      });
    }

    return this.lock.write(async () => {
      const now = this.clock();
      const existing = await this.readEntry(input.name);
      if (existing && existing.endpoint !== input.endpoint && !this.isStale(existing, now)) {
        throw new DuplicateAgentError(input.name, {
          agent_name: input.name,
          endpoint: existing.endpoint,
        });
      }

      const reg: AgentRegistration = {
        name: input.name,
        endpoint: input.endpoint,
        capabilities: structuredClone(input.capabilities ?? {}),
        metadata: structuredClone(input.metadata ?? {}),
        registeredAt: new Date(now),
        lastHeartbeat: new Date(now),
      };
      await this.writeEntry(reg);
      this.logger.info(`Registered agent '${reg.name}' at ${reg.endpoint}`);
      return cloneRegistration(reg);
    });
  }

  async unregister(name: string): Promise<boolean> {
    return this.lock.write(async () => {
      const removed = await this.deleteEntry(name);
      if (removed) {
        this.logger.info(`Unregistered agent '${name}'`);
      } else {
        this.logger.warn(`Cannot unregister unknown agent '${name}'`);
      }
      return removed;
    });
  }

  async lookup(name: string): Promise<AgentRegistration> {
    return this.lock.read(async () => {
      const reg = await this.readEntry(name);
      if (!reg) throw new AgentNotFoundError(name, { agent_name: name });
      return reg;
    });
  }

  async list(): Promise<AgentRegistration[]> {
    return this.lock.read(() => this.readAll());
  }

  async size(): Promise<number> {
    return (await this.list()).length;
  }

  /** Refresh liveness. The new heartbeat is always later than the previous one. */
  async heartbeat(name: string): Promise<void> {
    await this.lock.write(async () => {
      const reg = await this.readEntry(name);
      if (!reg) throw new AgentNotFoundError(name, { agent_name: name });
      const next = Math.max(this.clock(), reg.lastHeartbeat.getTime() + 1);
      await this.writeEntry({ ...reg, lastHeartbeat: new Date(next) });
    });
  }

  async pruneStale(): Promise<string[]> {
    return this.lock.write(async () => {
      const now = this.clock();
      const pruned: string[] = [];
      for (const reg of await this.readAll()) {
        if (!this.isStale(reg, now)) continue;
        await this.deleteEntry(reg.name);
        pruned.push(reg.name);
        this.logger.warn(
          `Pruned stale agent '${reg.name}' (last heartbeat ${now - reg.lastHeartbeat.getTime()}ms ago)`,
        );
      }
      return pruned;
    });
  }

  protected isStale(reg: AgentRegistration, now: number): boolean {
    return now - reg.lastHeartbeat.getTime() > this.heartbeatTimeoutMs;
  }
}
