// Errors
export {
  ProtocolErrorCode,
  ProtocolError,
  ConnectionError,
  ConnectionTimeoutError,
  ConnectionClosedError,
  InvalidMessageError,
  UnsupportedVersionError,
  MalformedPayloadError,
  AgentNotFoundError,
  AgentUnavailableError,
  AgentTimeoutError,
  ToolNotFoundError,
  ToolExecutionFailedError,
  RegistrationFailedError,
  DuplicateAgentError,
  RemoteExecutionError,
  isConnectionError,
  isProtocolClassError,
  errorFromPayload,
} from './errors.js';

// Wire types
export { PROTOCOL_VERSION, ENVELOPE_TYPES } from './types.js';
export type {
  Envelope,
  EnvelopeType,
  RequestMethod,
  WireMessage,
  RequestPayload,
  ResponsePayload,
  ErrorPayload,
  WireToolResult,
} from './types.js';

// Codec
export {
  encodeMessage,
  decodeMessage,
  encodeToolResult,
  decodeToolResult,
  createRequestEnvelope,
  createResponseEnvelope,
  createErrorEnvelope,
  createStreamChunkEnvelope,
  createStreamEndEnvelope,
  validateEnvelope,
  encodeEnvelope,
  decodeEnvelope,
  readRequestPayload,
  readMessagePayload,
  readErrorPayload,
} from './codec.js';

// Framing
export { FRAME_HEADER_BYTES, encodeFrame, FrameDecoder } from './framing.js';
