import { noopLogger } from '@agentwire/core';
import type { Logger } from '@agentwire/core';
import { AgentNotFoundError } from '@agentwire/protocol';
import { DEFAULT_HEARTBEAT_INTERVAL_MS } from './base-registry.js';
import { PeriodicTask } from './periodic-task.js';
import type { AgentRegistry } from './types.js';

export const DEFAULT_HEARTBEAT_RETRY_MS = 5_000;

export interface HeartbeatLoopOptions {
  /** Default: 30s. */
  intervalMs?: number;
  /** Delay before retrying after a failed beat. Default: 5s. */
  retryDelayMs?: number;
  logger?: Logger;
}

/**
 * Beat for `name` now and then every interval. The loop ends by itself once
 * the registry no longer knows the name (it was pruned or unregistered).
 */
export function startHeartbeatLoop(
  registry: AgentRegistry,
  name: string,
  options: HeartbeatLoopOptions = {},
): PeriodicTask {
  const logger = options.logger ?? noopLogger;
  const retryDelayMs = options.retryDelayMs ?? DEFAULT_HEARTBEAT_RETRY_MS;

  const task = new PeriodicTask({
    name: `heartbeat for '${name}'`,
    intervalMs: options.intervalMs ?? DEFAULT_HEARTBEAT_INTERVAL_MS,
    runImmediately: true,
    run: () => registry.heartbeat(name),
    onError: (err) => {
      if (err instanceof AgentNotFoundError) {
        logger.warn(`Agent '${name}' is no longer registered; stopping heartbeat`);
        return false;
      }
      logger.warn(`Heartbeat for '${name}' failed, retrying in ${retryDelayMs}ms: ${err.message}`);
      return retryDelayMs;
    },
    logger,
  });
  task.start();
  return task;
}
