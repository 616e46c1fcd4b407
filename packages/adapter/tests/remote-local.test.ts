import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { EchoAgent, createMessage } from '@agentwire/core';
import {
  AgentNotFoundError,
  ConnectionError,
  ConnectionTimeoutError,
  InvalidMessageError,
  RemoteExecutionError,
} from '@agentwire/protocol';
import { MemoryNetwork } from '@agentwire/transport';
import { LocalAgent } from '../src/local-agent.js';
import { RemoteAgent } from '../src/remote-agent.js';
import { FailingAgent, SlowAgent, userMessage } from './helpers.js';

describe('RemoteAgent over a unix socket', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'agentwire-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('calls a LocalAgent end to end', async () => {
    const endpoint = `unix://${join(dir, 't.sock')}`;
    const server = new LocalAgent(new EchoAgent(), { endpoint });
    await server.start();
    const remote = new RemoteAgent('echo', { endpoint });
    try {
      const reply = await remote.process(userMessage('hi'));
      expect(reply.role).toBe('agent');
      expect(reply.content).toBe('Echo: hi');
    } finally {
      await remote.close();
      await server.stop();
    }
  });

  it('fails with a connection error when nothing listens', async () => {
    const remote = new RemoteAgent('echo', { endpoint: `unix://${join(dir, 'none.sock')}` });
    await expect(remote.process(userMessage('hi'))).rejects.toBeInstanceOf(ConnectionError);
  });

  it('carries metadata across the wire', async () => {
    const endpoint = `unix://${join(dir, 't.sock')}`;
    const server = new LocalAgent(new EchoAgent(), { endpoint });
    await server.start();
    const remote = new RemoteAgent('echo', { endpoint });
    try {
      const reply = await remote.process(
        createMessage({ role: 'user', content: 'x', metadata: { trace: 'abc', attempt: 2 } }),
      );
      expect(reply.metadata).toEqual({ trace: 'abc', attempt: 2 });
    } finally {
      await remote.close();
      await server.stop();
    }
  });
});

describe('RemoteAgent over TCP', () => {
  let server: LocalAgent;

  beforeEach(async () => {
    server = new LocalAgent(new EchoAgent(), { endpoint: 'tcp://127.0.0.1:0' });
    await server.start();
  });

  afterEach(async () => {
    await server.stop();
  });

  it('serves concurrent callers on separate connections without cross-talk', async () => {
    const remotes = Array.from({ length: 8 }, () => new RemoteAgent('echo', { endpoint: server.endpoint }));
    try {
      const replies = await Promise.all(
        remotes.map((remote, i) => remote.process(userMessage(`caller-${i}`))),
      );
      expect(replies.map((r) => r.content)).toEqual(
        remotes.map((_, i) => `Echo: caller-${i}`),
      );
      expect(server.activeConnections).toBe(8);
    } finally {
      await Promise.all(remotes.map((remote) => remote.close()));
    }
  });

  it('serializes overlapping calls on one RemoteAgent', async () => {
    const remote = new RemoteAgent('echo', { endpoint: server.endpoint });
    try {
      const replies = await Promise.all(
        ['a', 'b', 'c', 'd'].map((content) => remote.process(userMessage(content))),
      );
      expect(replies.map((r) => r.content)).toEqual(['Echo: a', 'Echo: b', 'Echo: c', 'Echo: d']);
      expect(server.activeConnections).toBe(1);
    } finally {
      await remote.close();
    }
  });

  it('streams chunks until stream_end', async () => {
    const remote = new RemoteAgent('echo', { endpoint: server.endpoint });
    const chunks: unknown[] = [];
    try {
      for await (const chunk of remote.stream(userMessage('one two three'))) {
        chunks.push(chunk.content);
      }
      expect(chunks).toEqual(['one', 'two', 'three']);
      expect((await remote.process(userMessage('after'))).content).toBe('Echo: after');
    } finally {
      await remote.close();
    }
  });

  it('rejects a call addressed to another agent name', async () => {
    const remote = new RemoteAgent('search', { endpoint: server.endpoint });
    try {
      await expect(remote.process(userMessage('hi'))).rejects.toThrow(
        new AgentNotFoundError('search'),
      );
    } finally {
      await remote.close();
    }
  });
});

describe('RemoteAgent error handling', () => {
  let network: MemoryNetwork;

  beforeEach(() => {
    network = new MemoryNetwork();
  });

  it('maps an agent failure to RemoteExecutionError', async () => {
    const server = new LocalAgent(new FailingAgent(), { endpoint: 'memory://failing', network });
    await server.start();
    const remote = new RemoteAgent('failing', { endpoint: 'memory://failing', network });
    try {
      const err: unknown = await remote.process(userMessage('x')).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(RemoteExecutionError);
      expect(err).toMatchObject({
        agentName: 'failing',
        originalError: 'boom',
        code: 'AGENT_ERROR',
        details: { agent_name: 'failing' },
      });
    } finally {
      await remote.close();
      await server.stop();
    }
  });

  it('keeps the connection after an agent failure', async () => {
    const server = new LocalAgent(new FailingAgent(), { endpoint: 'memory://failing', network });
    await server.start();
    const remote = new RemoteAgent('failing', { endpoint: 'memory://failing', network });
    try {
      await expect(remote.process(userMessage('x'))).rejects.toThrow(RemoteExecutionError);
      await expect(remote.process(userMessage('y'))).rejects.toThrow(RemoteExecutionError);
      expect(server.activeConnections).toBe(1);
    } finally {
      await remote.close();
      await server.stop();
    }
  });

  it('times out, drops the connection and reconnects on the next call', async () => {
    const agent = new SlowAgent();
    const server = new LocalAgent(agent, { endpoint: 'memory://slow', network });
    await server.start();
    const remote = new RemoteAgent('slow', { endpoint: 'memory://slow', network, timeoutMs: 50 });
    try {
      await expect(remote.process(userMessage('wait'))).rejects.toBeInstanceOf(
        ConnectionTimeoutError,
      );
      agent.release();

      const reply = await remote.process(userMessage('quick'));
      expect(reply.content).toBe('done: quick');
    } finally {
      await remote.close();
      await server.stop();
    }
  });

  it('reports a missing stream implementation as INVALID_MESSAGE', async () => {
    const server = new LocalAgent(new SlowAgent(), { endpoint: 'memory://slow', network });
    await server.start();
    const remote = new RemoteAgent('slow', { endpoint: 'memory://slow', network });
    try {
      const consume = async () => {
        const chunks: unknown[] = [];
        for await (const chunk of remote.stream(userMessage('x'))) chunks.push(chunk.content);
        return chunks;
      };
      await expect(consume()).rejects.toThrow(InvalidMessageError);
      await expect(consume()).rejects.toThrow("Agent 'slow' does not support streaming");
    } finally {
      await remote.close();
      await server.stop();
    }
  });

  it('needs an endpoint or a transport', () => {
    expect(() => new RemoteAgent('x', {})).toThrow(TypeError);
  });
});
