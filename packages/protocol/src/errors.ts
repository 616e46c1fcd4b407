import type { Metadata } from '@agentwire/core';
import type { ErrorPayload } from './types.js';

/** Error codes carried in `error_code` on the wire. */
export enum ProtocolErrorCode {
  CONNECTION_FAILED = 'CONNECTION_FAILED',
  CONNECTION_TIMEOUT = 'CONNECTION_TIMEOUT',
  CONNECTION_CLOSED = 'CONNECTION_CLOSED',

  INVALID_MESSAGE = 'INVALID_MESSAGE',
  UNSUPPORTED_VERSION = 'UNSUPPORTED_VERSION',
  MALFORMED_PAYLOAD = 'MALFORMED_PAYLOAD',

  AGENT_NOT_FOUND = 'AGENT_NOT_FOUND',
  AGENT_UNAVAILABLE = 'AGENT_UNAVAILABLE',
  AGENT_TIMEOUT = 'AGENT_TIMEOUT',
  /** The wrapped agent's `process` threw. */
  AGENT_ERROR = 'AGENT_ERROR',

  TOOL_NOT_FOUND = 'TOOL_NOT_FOUND',
  TOOL_EXECUTION_FAILED = 'TOOL_EXECUTION_FAILED',

  REGISTRATION_FAILED = 'REGISTRATION_FAILED',
  DUPLICATE_AGENT = 'DUPLICATE_AGENT',
}

/** Base class for every classified failure in the adapter layer. */
export class ProtocolError extends Error {
  readonly code: ProtocolErrorCode;
  readonly details: Metadata;

  constructor(code: ProtocolErrorCode, message: string, details: Metadata = {}) {
    super(message);
    this.name = 'ProtocolError';
    this.code = code;
    this.details = details;
  }
}

/** Thrown when a connection cannot be established or an I/O operation fails. */
export class ConnectionError extends ProtocolError {
  constructor(message: string, details?: Metadata) {
    super(ProtocolErrorCode.CONNECTION_FAILED, message, details);
    this.name = 'ConnectionError';
  }
}

export class ConnectionTimeoutError extends ProtocolError {
  constructor(message: string, details?: Metadata) {
    super(ProtocolErrorCode.CONNECTION_TIMEOUT, message, details);
    this.name = 'ConnectionTimeoutError';
  }
}

/** Thrown when the peer (or this side) closed the connection mid-operation. */
export class ConnectionClosedError extends ProtocolError {
  constructor(message: string, details?: Metadata) {
    super(ProtocolErrorCode.CONNECTION_CLOSED, message, details);
    this.name = 'ConnectionClosedError';
  }
}

export class InvalidMessageError extends ProtocolError {
  constructor(message: string, details?: Metadata) {
    super(ProtocolErrorCode.INVALID_MESSAGE, message, details);
    this.name = 'InvalidMessageError';
  }
}

export class UnsupportedVersionError extends ProtocolError {
  constructor(message: string, details?: Metadata) {
    super(ProtocolErrorCode.UNSUPPORTED_VERSION, message, details);
    this.name = 'UnsupportedVersionError';
  }
}

export class MalformedPayloadError extends ProtocolError {
  constructor(message: string, details?: Metadata) {
    super(ProtocolErrorCode.MALFORMED_PAYLOAD, message, details);
    this.name = 'MalformedPayloadError';
  }
}

export class AgentNotFoundError extends ProtocolError {
  readonly agentName: string;

  constructor(agentName: string, details?: Metadata) {
    super(ProtocolErrorCode.AGENT_NOT_FOUND, `Agent '${agentName}' not found`, details);
    this.name = 'AgentNotFoundError';
    this.agentName = agentName;
  }
}

export class AgentUnavailableError extends ProtocolError {
  readonly agentName: string;

  constructor(agentName: string, details?: Metadata) {
    super(ProtocolErrorCode.AGENT_UNAVAILABLE, `Agent '${agentName}' is unavailable`, details);
    this.name = 'AgentUnavailableError';
    this.agentName = agentName;
  }
}

export class AgentTimeoutError extends ProtocolError {
  readonly agentName: string;

  constructor(agentName: string, timeoutMs: number, details?: Metadata) {
    super(
      ProtocolErrorCode.AGENT_TIMEOUT,
      `Agent '${agentName}' timed out after ${timeoutMs}ms`,
      details,
    );
    this.name = 'AgentTimeoutError';
    this.agentName = agentName;
  }
}

export class ToolNotFoundError extends ProtocolError {
  constructor(toolName: string, details?: Metadata) {
    super(ProtocolErrorCode.TOOL_NOT_FOUND, `Tool '${toolName}' not found`, details);
    this.name = 'ToolNotFoundError';
  }
}

export class ToolExecutionFailedError extends ProtocolError {
  constructor(toolName: string, reason: string, details?: Metadata) {
    super(
      ProtocolErrorCode.TOOL_EXECUTION_FAILED,
      `Tool '${toolName}' execution failed: ${reason}`,
      details,
    );
    this.name = 'ToolExecutionFailedError';
  }
}

export class RegistrationFailedError extends ProtocolError {
  constructor(message: string, details?: Metadata) {
    super(ProtocolErrorCode.REGISTRATION_FAILED, message, details);
    this.name = 'RegistrationFailedError';
  }
}

export class DuplicateAgentError extends ProtocolError {
  readonly agentName: string;

  constructor(agentName: string, details?: Metadata) {
    super(ProtocolErrorCode.DUPLICATE_AGENT, `Agent '${agentName}' is already registered`, details);
    this.name = 'DuplicateAgentError';
    this.agentName = agentName;
  }
}

/** The remote agent itself failed; carries the remote error text verbatim. */
export class RemoteExecutionError extends Error {
  readonly agentName: string;
  readonly originalError: string;
  /** Wire code reported by the server, `AGENT_ERROR` unless it said otherwise. */
  readonly code: string;
  readonly details: Metadata;

  constructor(
    agentName: string,
    originalError: string,
    details: Metadata = {},
    code: string = ProtocolErrorCode.AGENT_ERROR,
  ) {
    super(`Remote execution failed on agent '${agentName}': ${originalError}`);
    this.name = 'RemoteExecutionError';
    this.agentName = agentName;
    this.originalError = originalError;
    this.code = code;
    this.details = details;
  }
}

const CONNECTION_CODES: ReadonlySet<string> = new Set([
  ProtocolErrorCode.CONNECTION_FAILED,
  ProtocolErrorCode.CONNECTION_TIMEOUT,
  ProtocolErrorCode.CONNECTION_CLOSED,
]);

const PROTOCOL_CODES: ReadonlySet<string> = new Set([
  ProtocolErrorCode.INVALID_MESSAGE,
  ProtocolErrorCode.UNSUPPORTED_VERSION,
  ProtocolErrorCode.MALFORMED_PAYLOAD,
]);

/** True for connect/send/receive failures, timeouts and closed connections. */
export function isConnectionError(err: unknown): err is ProtocolError {
  return err instanceof ProtocolError && CONNECTION_CODES.has(err.code);
}

/** True for malformed, invalid or wrongly-versioned envelopes. */
export function isProtocolClassError(err: unknown): err is ProtocolError {
  return err instanceof ProtocolError && PROTOCOL_CODES.has(err.code);
}

/**
 * Rebuild a typed error from an `error` envelope payload received from
 * `agentName`'s server.
 */
export function errorFromPayload(agentName: string, payload: ErrorPayload): Error {
  const { error_code: code, error_message: message, error_details: details } = payload;
  switch (code) {
    case ProtocolErrorCode.CONNECTION_FAILED:
      return new ConnectionError(message, details);
    case ProtocolErrorCode.CONNECTION_TIMEOUT:
      return new ConnectionTimeoutError(message, details);
    case ProtocolErrorCode.CONNECTION_CLOSED:
      return new ConnectionClosedError(message, details);
    case ProtocolErrorCode.INVALID_MESSAGE:
      return new InvalidMessageError(message, details);
    case ProtocolErrorCode.UNSUPPORTED_VERSION:
      return new UnsupportedVersionError(message, details);
    case ProtocolErrorCode.MALFORMED_PAYLOAD:
      return new MalformedPayloadError(message, details);
    case ProtocolErrorCode.AGENT_NOT_FOUND: {
      const name = details['agent_name'];
      return new AgentNotFoundError(typeof name === 'string' ? name : agentName, details);
    }
    default:
      return new RemoteExecutionError(agentName, message, details, code);
  }
}
