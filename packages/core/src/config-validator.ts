import JSON5 from 'json5';
import { readFileSync } from 'node:fs';
import type {
  AgentwireConfig,
  ExportedAgentConfig,
  PartialAgentwireConfig,
  RemoteAgentConfig,
} from './config.js';
import { resolveConfig } from './config.js';
import type { Metadata } from './messages.js';
import { isMetadata } from './messages.js';
import { isRecord } from './utils.js';

const OBJECT_SECTIONS = ['protocol', 'server', 'client', 'registry'] as const;
const LIST_SECTIONS = ['agents', 'remotes'] as const;

const VALID_TOP_LEVEL_KEYS = new Set<string>([...OBJECT_SECTIONS, ...LIST_SECTIONS]);

/** Numeric fields per section that must be positive integers when present. */
const POSITIVE_INTEGERS: Record<(typeof OBJECT_SECTIONS)[number], readonly string[]> = {
  protocol: ['maxFrameBytes'],
  server: ['idleTimeoutMs'],
  client: ['timeoutMs'],
  registry: ['heartbeatIntervalMs', 'heartbeatTimeoutMs', 'pruneIntervalMs'],
};

export interface ConfigValidationError {
  path: string;
  message: string;
}

export interface ConfigValidationResult {
  valid: boolean;
  errors: ConfigValidationError[];
  config?: AgentwireConfig;
}

/**
 * Parse and validate a JSON5 config string, then fill defaults.
 * Rejects unknown top-level keys (strict mode).
 */
export function validateConfig(json5String: string): ConfigValidationResult {
  const errors: ConfigValidationError[] = [];

  let parsed: unknown;
  try {
    parsed = JSON5.parse(json5String);
  } catch (err) {
    return {
      valid: false,
      errors: [{ path: '', message: `Invalid JSON5: ${String(err)}` }],
    };
  }

  if (!isRecord(parsed)) {
    return {
      valid: false,
      errors: [{ path: '', message: 'Config must be an object' }],
    };
  }

  for (const key of Object.keys(parsed)) {
    if (!VALID_TOP_LEVEL_KEYS.has(key)) {
      errors.push({ path: key, message: `Unknown top-level key: "${key}"` });
    }
  }

  for (const section of OBJECT_SECTIONS) {
    const value = parsed[section];
    if (value === undefined) continue;
    if (!isRecord(value)) {
      errors.push({ path: section, message: `Section "${section}" must be an object` });
      continue;
    }
    checkPositiveIntegers(section, value, errors, false);
  }

  const registry = parsed['registry'];
  if (isRecord(registry)) {
    validateRegistry(registry, errors);
  }

  const agents = validateEntries(parsed['agents'], 'agents', errors, toExportedAgent);
  const remotes = validateEntries(parsed['remotes'], 'remotes', errors, toRemoteAgent);

  if (errors.length > 0) {
    return { valid: false, errors };
  }

  const partial: PartialAgentwireConfig = {
    protocol: { maxFrameBytes: numberAt(parsed, 'protocol', 'maxFrameBytes') },
    server: { idleTimeoutMs: numberAt(parsed, 'server', 'idleTimeoutMs') },
    client: { timeoutMs: numberAt(parsed, 'client', 'timeoutMs') },
    registry: {
      backend: isRecord(registry) && registry['backend'] === 'redis' ? 'redis' : undefined,
      redisUrl: stringAt(parsed, 'registry', 'redisUrl'),
      keyPrefix: stringAt(parsed, 'registry', 'keyPrefix'),
      heartbeatIntervalMs: numberAt(parsed, 'registry', 'heartbeatIntervalMs'),
      heartbeatTimeoutMs: numberAt(parsed, 'registry', 'heartbeatTimeoutMs'),
      pruneIntervalMs: numberAt(parsed, 'registry', 'pruneIntervalMs'),
    },
    agents,
    remotes,
  };

  return { valid: true, errors, config: resolveConfig(partial) };
}

/**
 * Re-check a resolved config after it was changed in memory, e.g. by
 * `applyEnvOverrides`. Every numeric field must now be present.
 */
export function checkConfig(config: AgentwireConfig): ConfigValidationError[] {
  const errors: ConfigValidationError[] = [];
  for (const section of OBJECT_SECTIONS) {
    const value: unknown = config[section];
    if (!isRecord(value)) {
      errors.push({ path: section, message: `Section "${section}" must be an object` });
      continue;
    }
    checkPositiveIntegers(section, value, errors, true);
    if (section === 'registry') validateRegistry(value, errors);
  }
  return errors;
}

/** `path: message` pairs joined for an exception message. */
export function formatConfigErrors(errors: ConfigValidationError[]): string {
  return errors.map((e) => `${e.path}: ${e.message}`).join('; ');
}

function checkPositiveIntegers(
  section: (typeof OBJECT_SECTIONS)[number],
  value: Record<string, unknown>,
  errors: ConfigValidationError[],
  required: boolean,
): void {
  for (const field of POSITIVE_INTEGERS[section]) {
    const n = value[field];
    if (n === undefined && !required) continue;
    if (!(typeof n === 'number' && Number.isInteger(n) && n > 0)) {
      errors.push({ path: `${section}.${field}`, message: 'Must be a positive integer' });
    }
  }
}

function numberAt(root: Record<string, unknown>, section: string, field: string): number | undefined {
  const value = root[section];
  if (!isRecord(value)) return undefined;
  const n = value[field];
  return typeof n === 'number' ? n : undefined;
}

function stringAt(root: Record<string, unknown>, section: string, field: string): string | undefined {
  const value = root[section];
  if (!isRecord(value)) return undefined;
  const s = value[field];
  return typeof s === 'string' ? s : undefined;
}

/**
 * Load and validate a JSON5 config file from disk.
 */
export function loadConfig(filePath: string): ConfigValidationResult {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (err) {
    return {
      valid: false,
      errors: [{ path: '', message: `Cannot read config file: ${String(err)}` }],
    };
  }
  return validateConfig(content);
}

function validateRegistry(registry: Record<string, unknown>, errors: ConfigValidationError[]): void {
  const backend = registry['backend'];
  if (backend !== undefined && backend !== 'memory' && backend !== 'redis') {
    errors.push({ path: 'registry.backend', message: 'Must be "memory" or "redis"' });
  }
  if (backend === 'redis' && typeof registry['redisUrl'] !== 'string') {
    errors.push({ path: 'registry.redisUrl', message: 'Required when backend is "redis"' });
  }

  const interval = registry['heartbeatIntervalMs'];
  const timeout = registry['heartbeatTimeoutMs'];
  const resolved = resolveConfig({
    registry: {
      heartbeatIntervalMs: typeof interval === 'number' ? interval : undefined,
      heartbeatTimeoutMs: typeof timeout === 'number' ? timeout : undefined,
    },
  }).registry;
  if (resolved.heartbeatTimeoutMs <= resolved.heartbeatIntervalMs) {
    errors.push({
      path: 'registry.heartbeatTimeoutMs',
      message: 'Must exceed registry.heartbeatIntervalMs',
    });
  }
}

function validateEntries<T>(
  value: unknown,
  section: string,
  errors: ConfigValidationError[],
  convert: (entry: Record<string, unknown>, path: string, errors: ConfigValidationError[]) => T | null,
): T[] {
  if (value === undefined) return [];
  if (!Array.isArray(value)) {
    errors.push({ path: section, message: `Section "${section}" must be an array` });
    return [];
  }

  const out: T[] = [];
  const seen = new Set<string>();
  value.forEach((entry: unknown, i) => {
    const path = `${section}[${i}]`;
    if (!isRecord(entry)) {
      errors.push({ path, message: 'Entry must be an object' });
      return;
    }
    const converted = convert(entry, path, errors);
    if (!converted) return;
    const name = String(entry['name']);
    if (seen.has(name)) {
      errors.push({ path: `${path}.name`, message: `Duplicate name: "${name}"` });
      return;
    }
    seen.add(name);
    out.push(converted);
  });
  return out;
}

function requireString(
  entry: Record<string, unknown>,
  field: string,
  path: string,
  errors: ConfigValidationError[],
): string | null {
  const value = entry[field];
  if (typeof value !== 'string' || value.length === 0) {
    errors.push({ path: `${path}.${field}`, message: 'Must be a non-empty string' });
    return null;
  }
  return value;
}

function optionalMetadata(
  entry: Record<string, unknown>,
  field: string,
  path: string,
  errors: ConfigValidationError[],
): Metadata | undefined | null {
  const value = entry[field];
  if (value === undefined) return undefined;
  if (!isMetadata(value)) {
    errors.push({ path: `${path}.${field}`, message: 'Must be an object' });
    return null;
  }
  return value;
}

function toExportedAgent(
  entry: Record<string, unknown>,
  path: string,
  errors: ConfigValidationError[],
): ExportedAgentConfig | null {
  const name = requireString(entry, 'name', path, errors);
  const endpoint = requireString(entry, 'endpoint', path, errors);
  const capabilities = optionalMetadata(entry, 'capabilities', path, errors);
  const metadata = optionalMetadata(entry, 'metadata', path, errors);
  if (name === null || endpoint === null || capabilities === null || metadata === null) {
    return null;
  }
  return {
    name,
    endpoint,
    ...(capabilities ? { capabilities } : {}),
    ...(metadata ? { metadata } : {}),
  };
}

function toRemoteAgent(
  entry: Record<string, unknown>,
  path: string,
  errors: ConfigValidationError[],
): RemoteAgentConfig | null {
  const name = requireString(entry, 'name', path, errors);
  const endpoint = requireString(entry, 'endpoint', path, errors);
  const timeoutMs = entry['timeoutMs'];
  if (timeoutMs !== undefined && !(typeof timeoutMs === 'number' && timeoutMs > 0)) {
    errors.push({ path: `${path}.timeoutMs`, message: 'Must be a positive number' });
    return null;
  }
  if (name === null || endpoint === null) return null;
  return { name, endpoint, ...(typeof timeoutMs === 'number' ? { timeoutMs } : {}) };
}
