// Messages
export { createMessage, isJsonValue, isMetadata } from './messages.js';
export type { JsonValue, Metadata, Message, MessageInit } from './messages.js';

// Tool results
export { createToolResult } from './tools.js';
export type { ToolResult, ToolResultInit } from './tools.js';

// Agent contract
export type { Agent } from './agent.js';
export { EchoAgent } from './echo-agent.js';

// Logging
export { noopLogger, createConsoleLogger } from './logger.js';
export type { Logger } from './logger.js';

// Configuration
export { CONFIG_FIELDS, DEFAULT_CONFIG, DEFAULT_MAX_FRAME_BYTES, resolveConfig } from './config.js';
export type {
  AgentwireConfig,
  PartialAgentwireConfig,
  ProtocolConfig,
  ServerConfig,
  ClientConfig,
  RegistryBackend,
  RegistryConfig,
  ExportedAgentConfig,
  RemoteAgentConfig,
} from './config.js';

// Configuration validator
export { validateConfig, loadConfig, checkConfig, formatConfigErrors } from './config-validator.js';
export type {
  ConfigValidationError,
  ConfigValidationResult,
} from './config-validator.js';

// Environment overlay
export { applyEnvOverrides } from './config-env-overlay.js';

// Utilities
export { generateId, now, isRecord, toError, sleep } from './utils.js';
