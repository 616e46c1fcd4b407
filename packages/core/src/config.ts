import type { Metadata } from './messages.js';

/** 10 MiB, the largest frame body accepted on the wire. */
export const DEFAULT_MAX_FRAME_BYTES = 10 * 1024 * 1024;

/** Top-level configuration schema. Every section is optional on disk. */
export interface AgentwireConfig {
  protocol: ProtocolConfig;
  server: ServerConfig;
  client: ClientConfig;
  registry: RegistryConfig;
  agents: ExportedAgentConfig[];
  remotes: RemoteAgentConfig[];
}

export interface ProtocolConfig {
  maxFrameBytes: number;
}

export interface ServerConfig {
  /** Close a connection that sends nothing for this long. Default: 60000. */
  idleTimeoutMs: number;
}

export interface ClientConfig {
  /** Bound on each remote call. Default: 30000. */
  timeoutMs: number;
}

export type RegistryBackend = 'memory' | 'redis';

export interface RegistryConfig {
  backend: RegistryBackend;
  redisUrl?: string;
  keyPrefix?: string;
  heartbeatIntervalMs: number;
  heartbeatTimeoutMs: number;
  pruneIntervalMs: number;
}

/** An agent implementation this process serves on `endpoint`. */
export interface ExportedAgentConfig {
  name: string;
  endpoint: string;
  capabilities?: Metadata;
  metadata?: Metadata;
}

/** A remote agent this process calls through a proxy. */
export interface RemoteAgentConfig {
  name: string;
  endpoint: string;
  timeoutMs?: number;
}

export const DEFAULT_CONFIG: AgentwireConfig = {
  protocol: { maxFrameBytes: DEFAULT_MAX_FRAME_BYTES },
  server: { idleTimeoutMs: 60_000 },
  client: { timeoutMs: 30_000 },
  registry: {
    backend: 'memory',
    heartbeatIntervalMs: 30_000,
    heartbeatTimeoutMs: 90_000,
    pruneIntervalMs: 60_000,
  },
  agents: [],
  remotes: [],
};

/** Every field env overrides may address, optional ones included. */
export const CONFIG_FIELDS = {
  ...DEFAULT_CONFIG,
  registry: { ...DEFAULT_CONFIG.registry, redisUrl: '', keyPrefix: '' },
};

/** Shape accepted before defaults are applied. */
export interface PartialAgentwireConfig {
  protocol?: Partial<ProtocolConfig>;
  server?: Partial<ServerConfig>;
  client?: Partial<ClientConfig>;
  registry?: Partial<RegistryConfig>;
  agents?: ExportedAgentConfig[];
  remotes?: RemoteAgentConfig[];
}

/** Fill every missing section and field from `DEFAULT_CONFIG`. */
export function resolveConfig(partial: PartialAgentwireConfig = {}): AgentwireConfig {
  const d = DEFAULT_CONFIG;
  const registry = partial.registry ?? {};
  return {
    protocol: {
      maxFrameBytes: partial.protocol?.maxFrameBytes ?? d.protocol.maxFrameBytes,
    },
    server: {
      idleTimeoutMs: partial.server?.idleTimeoutMs ?? d.server.idleTimeoutMs,
    },
    client: {
      timeoutMs: partial.client?.timeoutMs ?? d.client.timeoutMs,
    },
    registry: {
      backend: registry.backend ?? d.registry.backend,
      ...(registry.redisUrl !== undefined ? { redisUrl: registry.redisUrl } : {}),
      ...(registry.keyPrefix !== undefined ? { keyPrefix: registry.keyPrefix } : {}),
      heartbeatIntervalMs: registry.heartbeatIntervalMs ?? d.registry.heartbeatIntervalMs,
      heartbeatTimeoutMs: registry.heartbeatTimeoutMs ?? d.registry.heartbeatTimeoutMs,
      pruneIntervalMs: registry.pruneIntervalMs ?? d.registry.pruneIntervalMs,
    },
    agents: [...(partial.agents ?? [])],
    remotes: [...(partial.remotes ?? [])],
  };
}
