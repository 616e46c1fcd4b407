export type {
  Transport,
  TransportListener,
  TransportOptions,
  ConnectionHandler,
} from './types.js';

export { FrameQueue } from './frame-queue.js';

export {
  SocketTransport,
  UnixSocketTransport,
  UnixSocketListener,
  TcpTransport,
  TcpListener,
  formatHostPort,
} from './socket.js';

export { WebSocketTransport, WebSocketListener } from './websocket.js';

export { HttpTransport, HttpListener, SESSION_HEADER } from './http.js';

export {
  MemoryTransport,
  MemoryListener,
  MemoryNetwork,
  createMemoryTransportPair,
  defaultMemoryNetwork,
} from './memory.js';
export type { MemoryTransportOptions } from './memory.js';

export {
  InvalidEndpointError,
  parseEndpoint,
  createTransport,
  createListener,
} from './endpoint.js';
export type { Endpoint, ParseEndpointOptions, EndpointFactoryOptions } from './endpoint.js';
