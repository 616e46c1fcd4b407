import type { Message, Metadata, ToolResult } from '@agentwire/core';
import {
  createMessage,
  createToolResult,
  generateId,
  isJsonValue,
  isMetadata,
  isRecord,
  now,
} from '@agentwire/core';
import {
  InvalidMessageError,
  MalformedPayloadError,
  ProtocolErrorCode,
  UnsupportedVersionError,
} from './errors.js';
import type {
  Envelope,
  EnvelopeType,
  ErrorPayload,
  RequestMethod,
  RequestPayload,
  ResponsePayload,
  WireMessage,
  WireToolResult,
} from './types.js';
import { ENVELOPE_TYPES, PROTOCOL_VERSION } from './types.js';

const encoder = new TextEncoder();
const decoder = new TextDecoder('utf-8', { fatal: true });

export function encodeMessage(message: Message): WireMessage {
  return {
    role: message.role,
    content: message.content,
    metadata: { ...message.metadata },
    timestamp: message.timestamp.toISOString(),
  };
}

/**
 * Decode a wire message. A missing timestamp decodes to now and missing
 * metadata to `{}`.
 */
export function decodeMessage(raw: unknown): Message {
  if (!isRecord(raw)) {
    throw new MalformedPayloadError('Failed to decode message: expected an object');
  }
  const { role, content, metadata, timestamp } = raw;
  if (typeof role !== 'string' || role.length === 0) {
    throw new MalformedPayloadError("Failed to decode message: missing field 'role'");
  }
  if (!('content' in raw) || !isJsonValue(content)) {
    throw new MalformedPayloadError("Failed to decode message: missing field 'content'");
  }
  if (metadata !== undefined && !isMetadata(metadata)) {
    throw new MalformedPayloadError("Failed to decode message: 'metadata' must be an object");
  }

  let decodedAt = new Date();
  if (timestamp !== undefined) {
    decodedAt = typeof timestamp === 'string' ? new Date(timestamp) : new Date(NaN);
    if (Number.isNaN(decodedAt.getTime())) {
      throw new MalformedPayloadError(
        "Failed to decode message: 'timestamp' must be an ISO 8601 string",
      );
    }
  }

  return createMessage({ role, content, metadata: metadata ?? {}, timestamp: decodedAt });
}

export function encodeToolResult(result: ToolResult): WireToolResult {
  return {
    success: result.success,
    data: result.success ? result.data : null,
    error: result.success ? null : result.error,
    metadata: { ...result.metadata },
  };
}

export function decodeToolResult(raw: unknown): ToolResult {
  if (!isRecord(raw) || typeof raw['success'] !== 'boolean') {
    throw new MalformedPayloadError("Failed to decode tool result: missing field 'success'");
  }
  const { success, data, error, metadata } = raw;
  if (metadata !== undefined && !isMetadata(metadata)) {
    throw new MalformedPayloadError("Failed to decode tool result: 'metadata' must be an object");
  }
  if (success) {
    if (data !== undefined && !isJsonValue(data)) {
      throw new MalformedPayloadError("Failed to decode tool result: 'data' is not JSON");
    }
    return createToolResult({ success, data: data ?? null, metadata: metadata ?? {} });
  }
  if (typeof error !== 'string' || error.length === 0) {
    throw new MalformedPayloadError("Failed to decode tool result: missing field 'error'");
  }
  return createToolResult({ success, error, metadata: metadata ?? {} });
}

function envelope<P>(type: EnvelopeType, id: string, payload: P): Envelope<P> {
  return { version: PROTOCOL_VERSION, type, id, timestamp: now(), payload };
}

/** Build a `request` envelope with a fresh id. */
export function createRequestEnvelope(
  method: RequestMethod,
  agentName: string,
  message: Message,
): Envelope<RequestPayload> {
  return envelope('request', generateId(), {
    method,
    agent_name: agentName,
    message: encodeMessage(message),
  });
}

export function createResponseEnvelope(id: string, message: Message): Envelope<ResponsePayload> {
  return envelope('response', id, { message: encodeMessage(message) });
}

export function createErrorEnvelope(
  id: string,
  code: ProtocolErrorCode | string,
  message: string,
  details: Metadata = {},
): Envelope<ErrorPayload> {
  return envelope('error', id, {
    error_code: code,
    error_message: message,
    error_details: details,
  });
}

export function createStreamChunkEnvelope(
  id: string,
  message: Message,
): Envelope<ResponsePayload> {
  return envelope('stream_chunk', id, { message: encodeMessage(message) });
}

export function createStreamEndEnvelope(id: string): Envelope<Record<string, never>> {
  return envelope('stream_end', id, {});
}

function isEnvelopeType(value: unknown): value is EnvelopeType {
  return ENVELOPE_TYPES.some((type) => type === value);
}

/**
 * Check the outer structure of a parsed frame. The version is checked before
 * anything else so a peer speaking another version gets UNSUPPORTED_VERSION.
 */
export function validateEnvelope(value: unknown): Envelope {
  if (!isRecord(value)) {
    throw new InvalidMessageError('Envelope must be an object');
  }
  const { version, type, id, timestamp, payload } = value;

  if (version === undefined) {
    throw new InvalidMessageError("Missing required field 'version'");
  }
  if (version !== PROTOCOL_VERSION) {
    throw new UnsupportedVersionError(`Unsupported protocol version: ${String(version)}`, {
      supported_versions: [PROTOCOL_VERSION],
    });
  }
  if (type === undefined) {
    throw new InvalidMessageError("Missing required field 'type'");
  }
  if (!isEnvelopeType(type)) {
    throw new InvalidMessageError(`Unknown envelope type: ${String(type)}`);
  }
  if (typeof id !== 'string' || id.length === 0) {
    throw new InvalidMessageError("Missing required field 'id'");
  }
  if (!isRecord(payload)) {
    throw new InvalidMessageError("Missing or invalid field 'payload'");
  }

  return {
    version,
    type,
    id,
    timestamp: typeof timestamp === 'string' ? timestamp : now(),
    payload,
  };
}

export function encodeEnvelope(env: Envelope<unknown>): Uint8Array {
  return encoder.encode(JSON.stringify(env));
}

export function decodeEnvelope(bytes: Uint8Array): Envelope {
  let parsed: unknown;
  try {
    parsed = JSON.parse(decoder.decode(bytes));
  } catch (err) {
    throw new MalformedPayloadError(
      `Failed to decode envelope: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  return validateEnvelope(parsed);
}

export function readRequestPayload(env: Envelope): RequestPayload {
  const { method, agent_name: agentName, message } = env.payload;
  if (typeof method !== 'string' || method.length === 0) {
    throw new InvalidMessageError("Request payload is missing 'method'", { id: env.id });
  }
  if (agentName !== undefined && typeof agentName !== 'string') {
    throw new InvalidMessageError("Request field 'agent_name' must be a string", { id: env.id });
  }
  return agentName === undefined ? { method, message } : { method, agent_name: agentName, message };
}

/** Decode the message carried by a `response` or `stream_chunk` envelope. */
export function readMessagePayload(env: Envelope): Message {
  if (!('message' in env.payload)) {
    throw new MalformedPayloadError(`'${env.type}' payload is missing 'message'`, { id: env.id });
  }
  return decodeMessage(env.payload['message']);
}

export function readErrorPayload(env: Envelope): ErrorPayload {
  const { error_code: code, error_message: message, error_details: details } = env.payload;
  return {
    error_code: typeof code === 'string' ? code : ProtocolErrorCode.AGENT_ERROR,
    error_message: typeof message === 'string' ? message : 'Unknown error',
    error_details: isMetadata(details) ? details : {},
  };
}
