import { describe, it, expect } from 'vitest';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  validateConfig,
  loadConfig,
  checkConfig,
  formatConfigErrors,
  resolveConfig,
  applyEnvOverrides,
  DEFAULT_CONFIG,
} from '../src/index.js';

const here = dirname(fileURLToPath(import.meta.url));

const VALID_CONFIG = `{
  protocol: { maxFrameBytes: 1048576 },
  server: { idleTimeoutMs: 5000 },
  client: { timeoutMs: 2000 },
  registry: { backend: "memory", heartbeatIntervalMs: 1000, heartbeatTimeoutMs: 3000, pruneIntervalMs: 2000 },
  agents: [{ name: "echo", endpoint: "tcp://127.0.0.1:7400", capabilities: { streaming: true } }],
  remotes: [{ name: "math", endpoint: "unix:///tmp/math.sock", timeoutMs: 1500 }],
}`;

describe('config validator', () => {
  it('accepts a valid config', () => {
    const result = validateConfig(VALID_CONFIG);
    expect(result.valid).toBe(true);
    expect(result.errors).toHaveLength(0);
    expect(result.config?.protocol.maxFrameBytes).toBe(1048576);
    expect(result.config?.agents).toEqual([
      { name: 'echo', endpoint: 'tcp://127.0.0.1:7400', capabilities: { streaming: true } },
    ]);
    expect(result.config?.remotes).toEqual([
      { name: 'math', endpoint: 'unix:///tmp/math.sock', timeoutMs: 1500 },
    ]);
  });

  it('fills defaults for an empty config', () => {
    const result = validateConfig('{}');
    expect(result.valid).toBe(true);
    expect(result.config).toEqual(DEFAULT_CONFIG);
  });

  it('keeps defaults for fields a section omits', () => {
    const result = validateConfig('{ registry: { pruneIntervalMs: 500 } }');
    expect(result.config?.registry).toEqual({
      backend: 'memory',
      heartbeatIntervalMs: 30_000,
      heartbeatTimeoutMs: 90_000,
      pruneIntervalMs: 500,
    });
  });

  it('rejects malformed JSON5', () => {
    const result = validateConfig('{ this is not valid json5 !!!');
    expect(result.valid).toBe(false);
    expect(result.errors[0]?.message).toMatch(/Invalid JSON5/);
  });

  it('rejects non-object config', () => {
    const result = validateConfig('"just a string"');
    expect(result.valid).toBe(false);
    expect(result.errors[0]?.message).toBe('Config must be an object');
  });

  it('rejects unknown top-level keys', () => {
    const result = validateConfig('{ gateway: {} }');
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([{ path: 'gateway', message: 'Unknown top-level key: "gateway"' }]);
  });

  it('rejects non-positive numeric fields', () => {
    const result = validateConfig('{ client: { timeoutMs: 0 }, protocol: { maxFrameBytes: 1.5 } }');
    expect(result.valid).toBe(false);
    expect(result.errors.map((e) => e.path)).toEqual(['protocol.maxFrameBytes', 'client.timeoutMs']);
  });

  it('requires heartbeat timeout to exceed the interval', () => {
    const result = validateConfig('{ registry: { heartbeatIntervalMs: 30000, heartbeatTimeoutMs: 30000 } }');
    expect(result.valid).toBe(false);
    expect(result.errors[0]?.path).toBe('registry.heartbeatTimeoutMs');
  });

  it('requires redisUrl for the redis backend', () => {
    const result = validateConfig('{ registry: { backend: "redis" } }');
    expect(result.valid).toBe(false);
    expect(result.errors[0]?.path).toBe('registry.redisUrl');
  });

  it('rejects an unknown registry backend', () => {
    const result = validateConfig('{ registry: { backend: "etcd" } }');
    expect(result.errors[0]?.message).toBe('Must be "memory" or "redis"');
  });

  it('reports agent entries without a name or endpoint', () => {
    const result = validateConfig('{ agents: [{ name: "a" }, { endpoint: "tcp://h:1" }] }');
    expect(result.valid).toBe(false);
    expect(result.errors.map((e) => e.path)).toEqual(['agents[0].endpoint', 'agents[1].name']);
  });

  it('reports duplicate agent names', () => {
    const result = validateConfig(
      '{ agents: [{ name: "a", endpoint: "tcp://h:1" }, { name: "a", endpoint: "tcp://h:2" }] }',
    );
    expect(result.errors).toEqual([{ path: 'agents[1].name', message: 'Duplicate name: "a"' }]);
  });

  it('rejects a list section that is not an array', () => {
    const result = validateConfig('{ remotes: {} }');
    expect(result.errors).toEqual([{ path: 'remotes', message: 'Section "remotes" must be an array' }]);
  });

  it('loads and validates the default.json5 file', () => {
    const configPath = resolve(here, '../../../config/default.json5');
    const result = loadConfig(configPath);
    expect(result.valid).toBe(true);
    expect(result.errors).toHaveLength(0);
    expect(result.config?.agents[0]?.name).toBe('echo');
  });

  it('reports a missing file', () => {
    const result = loadConfig('/nonexistent/path/config.json5');
    expect(result.valid).toBe(false);
    expect(result.errors[0]?.message).toMatch(/Cannot read config file/);
  });
});

describe('checkConfig', () => {
  it('accepts the defaults', () => {
    expect(checkConfig(resolveConfig())).toEqual([]);
  });

  it('rejects overrides that are not positive integers', () => {
    const config = applyEnvOverrides(resolveConfig(), {
      AGENTWIRE_CLIENT__TIMEOUTMS: 'fast',
      AGENTWIRE_PROTOCOL__MAXFRAMEBYTES: '0',
    });
    expect(formatConfigErrors(checkConfig(config))).toBe(
      'protocol.maxFrameBytes: Must be a positive integer; client.timeoutMs: Must be a positive integer',
    );
  });

  it('rejects a heartbeat timeout lowered below the interval', () => {
    const config = applyEnvOverrides(resolveConfig(), {
      AGENTWIRE_REGISTRY__HEARTBEATTIMEOUTMS: '1000',
    });
    expect(checkConfig(config)).toEqual([
      { path: 'registry.heartbeatTimeoutMs', message: 'Must exceed registry.heartbeatIntervalMs' },
    ]);
  });

  it('rejects an unknown backend and a redis backend without a URL', () => {
    const config = applyEnvOverrides(resolveConfig(), { AGENTWIRE_REGISTRY__BACKEND: 'redis' });
    expect(checkConfig(config)).toEqual([
      { path: 'registry.redisUrl', message: 'Required when backend is "redis"' },
    ]);
    applyEnvOverrides(config, { AGENTWIRE_REGISTRY__BACKEND: 'etcd' });
    expect(checkConfig(config)).toEqual([
      { path: 'registry.backend', message: 'Must be "memory" or "redis"' },
    ]);
  });
});
