import { HttpListener, HttpTransport } from './http.js';
import { MemoryListener, MemoryTransport, defaultMemoryNetwork } from './memory.js';
import type { MemoryNetwork } from './memory.js';
import {
  TcpListener,
  TcpTransport,
  UnixSocketListener,
  UnixSocketTransport,
} from './socket.js';
import type { Transport, TransportListener, TransportOptions } from './types.js';
import { WebSocketListener, WebSocketTransport } from './websocket.js';

export type Endpoint =
  | { scheme: 'unix'; path: string }
  | { scheme: 'tcp'; host: string; port: number }
  | { scheme: 'ws'; host: string; port: number; path: string }
  | { scheme: 'http'; host: string; port: number; path: string }
  | { scheme: 'memory'; name: string };

export class InvalidEndpointError extends Error {
  readonly endpoint: string;

  constructor(endpoint: string, reason: string) {
    super(`Invalid endpoint '${endpoint}': ${reason}`);
    this.name = 'InvalidEndpointError';
    this.endpoint = endpoint;
  }
}

export interface ParseEndpointOptions {
  /** Accept port 0 (bind an ephemeral port). */
  listen?: boolean;
}

function parsePort(uri: string, text: string, listen: boolean): number {
  if (!/^\d+$/.test(text)) {
    throw new InvalidEndpointError(uri, `port '${text}' is not a number`);
  }
  const port = Number(text);
  const min = listen ? 0 : 1;
  if (port < min || port > 65535) {
    throw new InvalidEndpointError(uri, `port ${port} out of range ${min}..65535`);
  }
  return port;
}

function stripBrackets(host: string): string {
  return host.startsWith('[') && host.endsWith(']') ? host.slice(1, -1) : host;
}

/**
 * Parse `unix:///path`, `tcp://host:port`, `ws://host:port[/path]`,
 * `http://host:port[/path]` or `memory://name`. TCP splits host and port at the last colon.
 */
export function parseEndpoint(uri: string, options: ParseEndpointOptions = {}): Endpoint {
  const listen = options.listen ?? false;

  if (uri.startsWith('unix://')) {
    const path = uri.slice('unix://'.length);
    if (!path) throw new InvalidEndpointError(uri, 'missing socket path');
    return { scheme: 'unix', path };
  }

  if (uri.startsWith('tcp://')) {
    const rest = uri.slice('tcp://'.length);
    const colon = rest.lastIndexOf(':');
    if (colon <= 0) throw new InvalidEndpointError(uri, 'expected host:port');
    const host = stripBrackets(rest.slice(0, colon));
    if (!host) throw new InvalidEndpointError(uri, 'missing host');
    return { scheme: 'tcp', host, port: parsePort(uri, rest.slice(colon + 1), listen) };
  }

  for (const scheme of ['ws', 'http'] as const) {
    if (!uri.startsWith(`${scheme}://`)) continue;
    let url: URL;
    try {
      url = new URL(uri);
    } catch {
      throw new InvalidEndpointError(uri, 'malformed URL');
    }
    const host = stripBrackets(url.hostname);
    if (!host) throw new InvalidEndpointError(uri, 'missing host');
    const port = url.port ? parsePort(uri, url.port, listen) : 80;
    return { scheme, host, port, path: url.pathname || '/' };
  }

  if (uri.startsWith('memory://')) {
    const name = uri.slice('memory://'.length);
    if (!name) throw new InvalidEndpointError(uri, 'missing name');
    return { scheme: 'memory', name };
  }

  throw new InvalidEndpointError(uri, 'unsupported scheme');
}

export interface EndpointFactoryOptions extends TransportOptions {
  /** Network for `memory://` endpoints. Default: the process-wide network. */
  network?: MemoryNetwork;
}

/** Build an unconnected client transport for `uri`. */
export function createTransport(uri: string, options: EndpointFactoryOptions = {}): Transport {
  const endpoint = parseEndpoint(uri);
  switch (endpoint.scheme) {
    case 'unix':
      return new UnixSocketTransport(endpoint.path, options);
    case 'tcp':
      return new TcpTransport(endpoint.host, endpoint.port, options);
    case 'ws':
      return new WebSocketTransport(uri, options);
    case 'http':
      return new HttpTransport(uri, options);
    case 'memory':
      return new MemoryTransport(uri, {
        maxFrameBytes: options.maxFrameBytes,
        network: options.network ?? defaultMemoryNetwork,
      });
  }
}

/** Build a listener for `uri`; TCP, WebSocket and HTTP accept port 0. */
export function createListener(uri: string, options: EndpointFactoryOptions = {}): TransportListener {
  const endpoint = parseEndpoint(uri, { listen: true });
  switch (endpoint.scheme) {
    case 'unix':
      return new UnixSocketListener(endpoint.path, options);
    case 'tcp':
      return new TcpListener(endpoint.host, endpoint.port, options);
    case 'ws':
      return new WebSocketListener(endpoint.host, endpoint.port, endpoint.path, options);
    case 'http':
      return new HttpListener(endpoint.host, endpoint.port, endpoint.path, options);
    case 'memory':
      return new MemoryListener(uri, options);
  }
}
