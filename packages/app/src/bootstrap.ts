import type {
  Agent,
  AgentwireConfig,
  Logger,
  PartialAgentwireConfig,
} from '@agentwire/core';
import {
  CONFIG_FIELDS,
  applyEnvOverrides,
  checkConfig,
  formatConfigErrors,
  loadConfig,
  noopLogger,
  resolveConfig,
  toError,
} from '@agentwire/core';
import { InMemoryAgentRegistry, RedisAgentRegistry } from '@agentwire/registry';
import type { AgentRegistry } from '@agentwire/registry';
import { LocalAgent, RemoteAgent } from '@agentwire/adapter';
import type { MemoryNetwork } from '@agentwire/transport';

export interface BootstrapOptions {
  /** JSON5 file to load. Ignored when `config` is given. */
  configPath?: string;
  config?: PartialAgentwireConfig;
  /** Implementations for the `agents` section, matched by name. */
  agents?: Agent[];
  logger?: Logger;
  /** Source of `AGENTWIRE_*` overrides. Default: `process.env`. */
  env?: Record<string, string | undefined>;
  /** Network for `memory://` endpoints. */
  network?: MemoryNetwork;
}

export interface AppServer {
  config: AgentwireConfig;
  registry: AgentRegistry;
  servers: Map<string, LocalAgent>;
  remotes: Map<string, RemoteAgent>;
  shutdown: () => Promise<void>;
}

/**
 * Bootstrap the process:
 * 1. Load and validate config, then apply env overrides
 * 2. Start the registry (memory or Redis)
 * 3. Serve each configured agent that has an implementation
 * 4. Build a proxy for each configured remote
 * 5. Return an AppServer handle for lifecycle management
 */
export async function bootstrap(options: BootstrapOptions = {}): Promise<AppServer> {
  const logger = options.logger ?? noopLogger;
  const { network } = options;

  // 1. Config
  const config = applyEnvOverrides(readConfig(options), options.env, CONFIG_FIELDS);
  const errors = checkConfig(config);
  if (errors.length > 0) {
    throw new Error(`Invalid configuration: ${formatConfigErrors(errors)}`);
  }

  // 2. Registry
  const registry = createRegistry(config, logger);
  await registry.start();

  // 3. Exported agents
  const implementations = new Map((options.agents ?? []).map((agent) => [agent.name, agent]));
  const servers = new Map<string, LocalAgent>();
  for (const entry of config.agents) {
    const agent = implementations.get(entry.name);
    if (!agent) {
      logger.warn(`No implementation for agent '${entry.name}'; skipping`);
      continue;
    }
    const server = new LocalAgent(agent, {
      endpoint: entry.endpoint,
      registry,
      capabilities: entry.capabilities,
      metadata: entry.metadata,
      heartbeatIntervalMs: config.registry.heartbeatIntervalMs,
      maxFrameBytes: config.protocol.maxFrameBytes,
      idleTimeoutMs: config.server.idleTimeoutMs,
      network,
      logger,
    });
    try {
      await server.start();
      servers.set(entry.name, server);
    } catch (err) {
      logger.error(`Failed to serve agent '${entry.name}': ${toError(err).message}`);
    }
  }
  logger.info(`${servers.size} agent(s) served`);

  // 4. Remote proxies
  const remotes = new Map<string, RemoteAgent>();
  for (const entry of config.remotes) {
    remotes.set(
      entry.name,
      new RemoteAgent(entry.name, {
        endpoint: entry.endpoint,
        timeoutMs: entry.timeoutMs ?? config.client.timeoutMs,
        maxFrameBytes: config.protocol.maxFrameBytes,
        network,
        logger,
      }),
    );
  }

  let closed = false;
  const shutdown = async (): Promise<void> => {
    if (closed) return;
    closed = true;
    logger.info('Shutting down...');

    for (const [name, server] of servers) {
      try {
        await server.stop();
      } catch (err) {
        logger.error(`Error stopping agent '${name}': ${toError(err).message}`);
      }
    }

    for (const [name, remote] of remotes) {
      try {
        await remote.close();
      } catch (err) {
        logger.error(`Error closing remote '${name}': ${toError(err).message}`);
      }
    }

    try {
      await registry.stop();
    } catch (err) {
      logger.error(`Error stopping registry: ${toError(err).message}`);
    }

    logger.info('Shutdown complete');
  };

  return { config, registry, servers, remotes, shutdown };
}

function readConfig(options: BootstrapOptions): AgentwireConfig {
  if (options.config || !options.configPath) {
    return resolveConfig(options.config);
  }
  const result = loadConfig(options.configPath);
  if (!result.valid || !result.config) {
    throw new Error(`Invalid configuration: ${formatConfigErrors(result.errors)}`);
  }
  return result.config;
}

function createRegistry(config: AgentwireConfig, logger: Logger): AgentRegistry {
  const { backend, redisUrl, keyPrefix, ...timing } = config.registry;
  if (backend === 'redis') {
    return new RedisAgentRegistry({ ...timing, url: redisUrl, keyPrefix, logger });
  }
  return new InMemoryAgentRegistry({ ...timing, logger });
}
