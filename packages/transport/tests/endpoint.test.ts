import { describe, it, expect } from 'vitest';
import {
  InvalidEndpointError,
  createListener,
  createTransport,
  parseEndpoint,
} from '../src/endpoint.js';
import { HttpListener, HttpTransport } from '../src/http.js';
import { MemoryListener, MemoryTransport } from '../src/memory.js';
import type { Transport } from '../src/types.js';
import { TcpListener, TcpTransport, UnixSocketListener, UnixSocketTransport } from '../src/socket.js';
import { WebSocketListener, WebSocketTransport } from '../src/websocket.js';

describe('parseEndpoint', () => {
  it('parses unix socket paths', () => {
    expect(parseEndpoint('unix:///tmp/agent.sock')).toEqual({
      scheme: 'unix',
      path: '/tmp/agent.sock',
    });
  });

  it('parses tcp host and port', () => {
    expect(parseEndpoint('tcp://localhost:8080')).toEqual({
      scheme: 'tcp',
      host: 'localhost',
      port: 8080,
    });
  });

  it('splits tcp at the last colon and strips IPv6 brackets', () => {
    expect(parseEndpoint('tcp://[::1]:9000')).toEqual({ scheme: 'tcp', host: '::1', port: 9000 });
  });

  it('parses websocket URLs', () => {
    expect(parseEndpoint('ws://127.0.0.1:7000/agents')).toEqual({
      scheme: 'ws',
      host: '127.0.0.1',
      port: 7000,
      path: '/agents',
    });
  });

  it('defaults websocket port to 80', () => {
    expect(parseEndpoint('ws://example.test')).toMatchObject({ port: 80, path: '/' });
  });

  it('parses http URLs', () => {
    expect(parseEndpoint('http://[::1]:8080/agents/echo')).toEqual({
      scheme: 'http',
      host: '::1',
      port: 8080,
      path: '/agents/echo',
    });
    expect(parseEndpoint('http://localhost')).toMatchObject({ port: 80, path: '/' });
  });

  it('parses memory names', () => {
    expect(parseEndpoint('memory://echo')).toEqual({ scheme: 'memory', name: 'echo' });
  });

  it('rejects ports outside 1..65535 for clients', () => {
    expect(() => parseEndpoint('tcp://localhost:0')).toThrow(InvalidEndpointError);
    expect(() => parseEndpoint('tcp://localhost:65536')).toThrow(
      "Invalid endpoint 'tcp://localhost:65536': port 65536 out of range 1..65535",
    );
  });

  it('allows port 0 for listeners', () => {
    expect(parseEndpoint('tcp://127.0.0.1:0', { listen: true })).toEqual({
      scheme: 'tcp',
      host: '127.0.0.1',
      port: 0,
    });
  });

  it('rejects non-numeric ports', () => {
    expect(() => parseEndpoint('tcp://localhost:http')).toThrow(
      "Invalid endpoint 'tcp://localhost:http': port 'http' is not a number",
    );
  });

  it('rejects a tcp endpoint without a port', () => {
    expect(() => parseEndpoint('tcp://localhost')).toThrow('expected host:port');
  });

  it('rejects an empty unix path', () => {
    expect(() => parseEndpoint('unix://')).toThrow('missing socket path');
  });

  it('rejects unknown schemes', () => {
    expect(() => parseEndpoint('ftp://localhost:21')).toThrow(
      "Invalid endpoint 'ftp://localhost:21': unsupported scheme",
    );
  });
});

describe('factories', () => {
  it('builds client transports per scheme', () => {
    expect(createTransport('unix:///tmp/a.sock')).toBeInstanceOf(UnixSocketTransport);
    expect(createTransport('tcp://localhost:1')).toBeInstanceOf(TcpTransport);
    expect(createTransport('ws://localhost:1')).toBeInstanceOf(WebSocketTransport);
    expect(createTransport('http://localhost:1')).toBeInstanceOf(HttpTransport);
    expect(createTransport('memory://a')).toBeInstanceOf(MemoryTransport);
  });

  it('keeps the URI as the transport endpoint', () => {
    expect(createTransport('unix:///tmp/a.sock').endpoint).toBe('unix:///tmp/a.sock');
    expect(createTransport('tcp://localhost:8080').endpoint).toBe('tcp://localhost:8080');
  });

  it('builds listeners per scheme', () => {
    expect(createListener('unix:///tmp/a.sock')).toBeInstanceOf(UnixSocketListener);
    expect(createListener('tcp://127.0.0.1:0')).toBeInstanceOf(TcpListener);
    expect(createListener('ws://127.0.0.1:0')).toBeInstanceOf(WebSocketListener);
    expect(createListener('http://127.0.0.1:0')).toBeInstanceOf(HttpListener);
    expect(createListener('memory://a')).toBeInstanceOf(MemoryListener);
  });

  it('dials memory endpoints through the default network', async () => {
    const listener = createListener('memory://factory-default');
    const accepted: Transport[] = [];
    await listener.listen((transport) => accepted.push(transport));
    const client = createTransport('memory://factory-default');
    try {
      await client.connect();
      await client.send(new TextEncoder().encode('hello'));
      expect(accepted).toHaveLength(1);
      const [server] = accepted;
      expect(new TextDecoder().decode(await server?.receive())).toBe('hello');
    } finally {
      await client.close();
      await listener.close();
    }
  });

  it('rejects a client transport on port 0', () => {
    expect(() => createTransport('tcp://127.0.0.1:0')).toThrow(InvalidEndpointError);
  });
});
