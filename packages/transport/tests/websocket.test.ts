import { describe, it, expect } from 'vitest';
import { ConnectionError, MalformedPayloadError } from '@agentwire/protocol';
import type { Transport } from '../src/types.js';
import { WebSocketListener, WebSocketTransport } from '../src/websocket.js';

describe('WebSocketListener', () => {
  it('reports the bound port and path', async () => {
    const listener = new WebSocketListener('127.0.0.1', 0, '/agents');
    await listener.listen(() => {});
    try {
      expect(listener.endpoint).toMatch(/^ws:\/\/127\.0\.0\.1:\d+\/agents$/);
      expect(listener.endpoint).not.toBe('ws://127.0.0.1:0/agents');
    } finally {
      await listener.close();
    }
  });

  it('surfaces an oversize message as MALFORMED_PAYLOAD on the receiver', async () => {
    const accepted: Transport[] = [];
    const listener = new WebSocketListener('127.0.0.1', 0, '/', { maxFrameBytes: 8 });
    await listener.listen((transport) => accepted.push(transport));
    const client = new WebSocketTransport(listener.endpoint);
    try {
      await client.connect();
      await expect.poll(() => accepted.length).toBe(1);
      await client.send(new Uint8Array(9));
      await expect(accepted[0]?.receive()).rejects.toBeInstanceOf(MalformedPayloadError);
    } finally {
      await client.close();
      await listener.close();
    }
  });
});

describe('WebSocketTransport', () => {
  it('refuses to send over its own limit', async () => {
    const listener = new WebSocketListener('127.0.0.1', 0);
    await listener.listen(() => {});
    const client = new WebSocketTransport(listener.endpoint, { maxFrameBytes: 4 });
    try {
      await client.connect();
      await expect(client.send(new Uint8Array(5))).rejects.toThrow(
        'Frame of 5 bytes exceeds maximum of 4 bytes',
      );
    } finally {
      await client.close();
      await listener.close();
    }
  });

  it('maps a refused connection to ConnectionError', async () => {
    const listener = new WebSocketListener('127.0.0.1', 0);
    await listener.listen(() => {});
    const endpoint = listener.endpoint;
    await listener.close();

    await expect(new WebSocketTransport(endpoint).connect()).rejects.toBeInstanceOf(
      ConnectionError,
    );
  });
});
