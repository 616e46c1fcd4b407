import type { JsonValue, Metadata } from '@agentwire/core';

export const PROTOCOL_VERSION = '1.0';

export const ENVELOPE_TYPES = [
  'request',
  'response',
  'error',
  'heartbeat',
  'register',
  'unregister',
  'stream_chunk',
  'stream_end',
] as const;

export type EnvelopeType = (typeof ENVELOPE_TYPES)[number];

export type RequestMethod = 'process' | 'stream';

/** Outer container for every frame on the wire. */
export interface Envelope<P = Record<string, unknown>> {
  version: string;
  type: EnvelopeType;
  id: string;
  /** ISO 8601. */
  timestamp: string;
  payload: P;
}

/** Serialized form of a `Message`. */
export interface WireMessage {
  role: string;
  content: JsonValue;
  metadata: Metadata;
  timestamp: string;
}

export interface RequestPayload {
  method: string;
  agent_name?: string;
  message: unknown;
}

export interface ResponsePayload {
  message: WireMessage;
}

export interface ErrorPayload {
  error_code: string;
  error_message: string;
  error_details: Metadata;
}

export interface WireToolResult {
  success: boolean;
  data: JsonValue;
  error: string | null;
  metadata: Metadata;
}
