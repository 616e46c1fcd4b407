import { Redis } from 'ioredis';
import { isMetadata, isRecord } from '@agentwire/core';
import { BaseAgentRegistry } from './base-registry.js';
import type { AgentRegistration, RegistryOptions } from './types.js';

const DEFAULT_KEY_PREFIX = 'agentwire:';

export interface RedisAgentRegistryOptions extends RegistryOptions {
  /** Connection URL, used when no `client` is given. */
  url?: string;
  /** Existing connection. The registry leaves it open on `stop()`. */
  client?: Redis;
  /** Default: `agentwire:`. */
  keyPrefix?: string;
}

interface StoredRegistration {
  name: string;
  endpoint: string;
  capabilities: unknown;
  metadata: unknown;
  registered_at: string;
  last_heartbeat: string;
}

function serialize(reg: AgentRegistration): string {
  const stored: StoredRegistration = {
    name: reg.name,
    endpoint: reg.endpoint,
    capabilities: reg.capabilities,
    metadata: reg.metadata,
    registered_at: reg.registeredAt.toISOString(),
    last_heartbeat: reg.lastHeartbeat.toISOString(),
  };
  return JSON.stringify(stored);
}

function parseDate(value: unknown): Date | null {
  if (typeof value !== 'string') return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

function deserialize(raw: string): AgentRegistration | null {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!isRecord(value)) return null;
  const { name, endpoint, capabilities, metadata } = value;
  const registeredAt = parseDate(value['registered_at']);
  const lastHeartbeat = parseDate(value['last_heartbeat']);
  if (
    typeof name !== 'string' ||
    typeof endpoint !== 'string' ||
    !isMetadata(capabilities) ||
    !isMetadata(metadata) ||
    !registeredAt ||
    !lastHeartbeat
  ) {
    return null;
  }
  return { name, endpoint, capabilities, metadata, registeredAt, lastHeartbeat };
}

/**
 * Registry shared through Redis: one JSON value per agent at
 * `<prefix>agent:<name>` plus the set of names at `<prefix>agents`.
 */
export class RedisAgentRegistry extends BaseAgentRegistry {
  private client: Redis | null;
  private readonly ownsClient: boolean;
  private readonly url: string | undefined;
  private readonly keyPrefix: string;

  constructor(options: RedisAgentRegistryOptions) {
    super(options);
    if (!options.client && !options.url) {
      throw new TypeError('RedisAgentRegistry needs either a client or a url');
    }
    this.client = options.client ?? null;
    this.ownsClient = !options.client;
    this.url = options.url;
    this.keyPrefix = options.keyPrefix ?? DEFAULT_KEY_PREFIX;
  }

  isConnected(): boolean {
    return this.client?.status === 'ready';
  }

  protected override async open(): Promise<void> {
    if (this.client || !this.url) return;
    const client = new Redis(this.url, { lazyConnect: true });
    await client.connect();
    this.client = client;
  }

  protected override async shutdown(): Promise<void> {
    if (this.client && this.ownsClient) {
      await this.client.quit();
      this.client = null;
    }
  }

  private get redis(): Redis {
    if (!this.client) throw new Error('Redis not connected');
    return this.client;
  }

  private agentKey(name: string): string {
    return `${this.keyPrefix}agent:${name}`;
  }

  private get namesKey(): string {
    return `${this.keyPrefix}agents`;
  }

  /** Unreadable values are removed along with their name. */
  private async decode(name: string, raw: string | null): Promise<AgentRegistration | undefined> {
    if (raw === null) return undefined;
    const reg = deserialize(raw);
    if (!reg) {
      this.logger.warn(`Dropping unreadable registration for '${name}'`);
      await this.deleteEntry(name);
      return undefined;
    }
    return reg;
  }

  protected async readEntry(name: string): Promise<AgentRegistration | undefined> {
    return this.decode(name, await this.redis.get(this.agentKey(name)));
  }

  protected async writeEntry(reg: AgentRegistration): Promise<void> {
    await this.redis
      .multi()
      .set(this.agentKey(reg.name), serialize(reg))
      .sadd(this.namesKey, reg.name)
      .exec();
  }

  protected async deleteEntry(name: string): Promise<boolean> {
    const results = await this.redis
      .multi()
      .del(this.agentKey(name))
      .srem(this.namesKey, name)
      .exec();
    const deleted = results?.[0]?.[1];
    return typeof deleted === 'number' && deleted > 0;
  }

  protected async readAll(): Promise<AgentRegistration[]> {
    const names = (await this.redis.smembers(this.namesKey)).sort();
    if (names.length === 0) return [];
    const values = await this.redis.mget(...names.map((name) => this.agentKey(name)));
    const out: AgentRegistration[] = [];
    for (const [i, name] of names.entries()) {
      const reg = await this.decode(name, values[i] ?? null);
      if (reg) out.push(reg);
    }
    return out;
  }
}
