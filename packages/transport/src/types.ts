/**
 * Bidirectional, message-oriented byte channel. `send` writes one frame and
 * `receive` resolves with the next complete frame body, so callers never see
 * partial reads.
 */
export interface Transport {
  /** URI this transport dials, or the listener's URI for accepted connections. */
  readonly endpoint: string;
  connect(): Promise<void>;
  send(data: Uint8Array): Promise<void>;
  /** Rejects with the signal's reason when aborted while waiting. */
  receive(signal?: AbortSignal): Promise<Uint8Array>;
  close(): Promise<void>;
  isConnected(): boolean;
}

/** Called once per accepted connection with an already-connected transport. */
export type ConnectionHandler = (transport: Transport) => void;

export interface TransportListener {
  /** Bound endpoint; reports the real port once listening on port 0. */
  readonly endpoint: string;
  listen(onConnection: ConnectionHandler): Promise<void>;
  close(): Promise<void>;
}

export interface TransportOptions {
  /** Largest frame body accepted or sent. Default: 10 MiB. */
  maxFrameBytes?: number;
}
