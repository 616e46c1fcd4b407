export { LocalAgent, DEFAULT_IDLE_TIMEOUT_MS } from './local-agent.js';
export type { LocalAgentOptions } from './local-agent.js';
export { RemoteAgent, DEFAULT_CALL_TIMEOUT_MS } from './remote-agent.js';
export type { RemoteAgentOptions } from './remote-agent.js';
export { CallLock } from './call-lock.js';
