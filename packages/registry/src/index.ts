export type {
  AgentRegistration,
  RegistrationInput,
  AgentRegistry,
  RegistryOptions,
} from './types.js';

export { ReadWriteLock } from './rw-lock.js';
export { PeriodicTask } from './periodic-task.js';
export type { PeriodicTaskOptions } from './periodic-task.js';

export {
  BaseAgentRegistry,
  cloneRegistration,
  DEFAULT_HEARTBEAT_INTERVAL_MS,
  DEFAULT_HEARTBEAT_TIMEOUT_MS,
  DEFAULT_PRUNE_INTERVAL_MS,
} from './base-registry.js';
export { InMemoryAgentRegistry } from './memory-registry.js';
export { RedisAgentRegistry } from './redis-registry.js';
export type { RedisAgentRegistryOptions } from './redis-registry.js';

export { startHeartbeatLoop, DEFAULT_HEARTBEAT_RETRY_MS } from './heartbeat.js';
export type { HeartbeatLoopOptions } from './heartbeat.js';
