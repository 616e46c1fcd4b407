import { describe, it, expect } from 'vitest';
import {
  AgentNotFoundError,
  ConnectionClosedError,
  ConnectionError,
  ConnectionTimeoutError,
  DuplicateAgentError,
  MalformedPayloadError,
  ProtocolError,
  ProtocolErrorCode,
  RemoteExecutionError,
  UnsupportedVersionError,
  errorFromPayload,
  isConnectionError,
  isProtocolClassError,
} from '../src/errors.js';

describe('ProtocolError hierarchy', () => {
  it('carries code, details and name', () => {
    const err = new ConnectionError('refused', { endpoint: 'tcp://localhost:1' });
    expect(err).toBeInstanceOf(ProtocolError);
    expect(err).toBeInstanceOf(Error);
    expect(err.code).toBe(ProtocolErrorCode.CONNECTION_FAILED);
    expect(err.details).toEqual({ endpoint: 'tcp://localhost:1' });
    expect(err.name).toBe('ConnectionError');
  });

  it('defaults details to {}', () => {
    expect(new MalformedPayloadError('bad').details).toEqual({});
  });

  it('formats agent-scoped messages', () => {
    expect(new AgentNotFoundError('echo').message).toBe("Agent 'echo' not found");
    expect(new DuplicateAgentError('echo').message).toBe("Agent 'echo' is already registered");
  });

  it('keeps the remote error text on RemoteExecutionError', () => {
    const err = new RemoteExecutionError('echo', 'boom', { agent_name: 'echo' });
    expect(err.message).toBe("Remote execution failed on agent 'echo': boom");
    expect(err.originalError).toBe('boom');
    expect(err.code).toBe('AGENT_ERROR');
  });
});

describe('classification', () => {
  it('recognises connection-class errors', () => {
    expect(isConnectionError(new ConnectionError('x'))).toBe(true);
    expect(isConnectionError(new ConnectionTimeoutError('x'))).toBe(true);
    expect(isConnectionError(new ConnectionClosedError('x'))).toBe(true);
    expect(isConnectionError(new MalformedPayloadError('x'))).toBe(false);
    expect(isConnectionError(new Error('x'))).toBe(false);
  });

  it('recognises protocol-class errors', () => {
    expect(isProtocolClassError(new UnsupportedVersionError('x'))).toBe(true);
    expect(isProtocolClassError(new MalformedPayloadError('x'))).toBe(true);
    expect(isProtocolClassError(new ConnectionError('x'))).toBe(false);
  });
});

describe('errorFromPayload', () => {
  const payload = (code: string) => ({
    error_code: code,
    error_message: 'server said no',
    error_details: { hint: 1 },
  });

  it('maps connection codes to connection errors', () => {
    const err = errorFromPayload('echo', payload('CONNECTION_TIMEOUT'));
    expect(err).toBeInstanceOf(ConnectionTimeoutError);
    expect(err.message).toBe('server said no');
  });

  it('maps protocol codes to protocol errors', () => {
    expect(errorFromPayload('echo', payload('UNSUPPORTED_VERSION'))).toBeInstanceOf(
      UnsupportedVersionError,
    );
  });

  it('maps AGENT_NOT_FOUND using the reported name', () => {
    const err = errorFromPayload('echo', {
      error_code: 'AGENT_NOT_FOUND',
      error_message: 'missing',
      error_details: { agent_name: 'other' },
    });
    expect(err).toBeInstanceOf(AgentNotFoundError);
    expect(err.message).toBe("Agent 'other' not found");
  });

  it('maps everything else to RemoteExecutionError', () => {
    const err = errorFromPayload('echo', payload('AGENT_ERROR'));
    expect(err).toBeInstanceOf(RemoteExecutionError);
    expect(err).toMatchObject({
      agentName: 'echo',
      originalError: 'server said no',
      code: 'AGENT_ERROR',
      details: { hint: 1 },
    });
  });

  it('keeps unrecognised codes on the remote error', () => {
    expect(errorFromPayload('echo', payload('TOOL_NOT_FOUND'))).toMatchObject({
      code: 'TOOL_NOT_FOUND',
    });
  });
});
