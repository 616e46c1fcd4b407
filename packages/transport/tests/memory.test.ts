import { describe, it, expect } from 'vitest';
import { ConnectionClosedError, ConnectionError, MalformedPayloadError } from '@agentwire/protocol';
import {
  MemoryListener,
  MemoryNetwork,
  MemoryTransport,
  createMemoryTransportPair,
} from '../src/memory.js';
import type { Transport } from '../src/types.js';

const text = (s: string) => new TextEncoder().encode(s);
const str = (b: Uint8Array) => new TextDecoder().decode(b);

describe('createMemoryTransportPair', () => {
  it('connects both ends', async () => {
    const [a, b] = createMemoryTransportPair();
    expect(a.isConnected()).toBe(true);
    expect(b.isConnected()).toBe(true);

    await a.send(text('to b'));
    await b.send(text('to a'));
    expect(str(await b.receive())).toBe('to b');
    expect(str(await a.receive())).toBe('to a');
  });

  it('tells the peer when one end closes', async () => {
    const [a, b] = createMemoryTransportPair();
    const pending = b.receive();
    await a.close();

    await expect(pending).rejects.toThrow('Connection closed by peer');
    await expect(a.receive()).rejects.toThrow('Transport closed');
    expect(b.isConnected()).toBe(false);
  });

  it('cannot reconnect without a network', async () => {
    const [a] = createMemoryTransportPair('memory://pair');
    await a.close();
    await expect(a.connect()).rejects.toThrow('No in-memory network to reach memory://pair');
  });

  it('stops reading on a frame over the receiver limit but can still answer', async () => {
    const a = new MemoryTransport('memory://x');
    const b = new MemoryTransport('memory://x', { maxFrameBytes: 2 });
    MemoryTransport.link(a, b);

    await a.send(text('abc'));
    await expect(b.receive()).rejects.toBeInstanceOf(MalformedPayloadError);
    expect(b.isConnected()).toBe(true);

    await a.send(text('ok'));
    await b.send(text('no'));
    expect(str(await a.receive())).toBe('no');
    await expect(b.receive()).rejects.toBeInstanceOf(MalformedPayloadError);

    await b.close();
    await expect(a.receive()).rejects.toBeInstanceOf(ConnectionClosedError);
  });
});

describe('MemoryNetwork', () => {
  it('fails to dial an unbound name', async () => {
    const network = new MemoryNetwork();
    const client = new MemoryTransport('memory://nobody', { network });
    await expect(client.connect()).rejects.toBeInstanceOf(ConnectionError);
    await expect(client.connect()).rejects.toThrow(
      'Failed to connect to memory://nobody: no listener',
    );
  });

  it('refuses a second listener on the same name', async () => {
    const network = new MemoryNetwork();
    const first = new MemoryListener('memory://a', { network });
    await first.listen(() => {});

    const second = new MemoryListener('memory://a', { network });
    await expect(second.listen(() => {})).rejects.toThrow('Address already in use: memory://a');
    await first.close();
    expect(network.isBound('memory://a')).toBe(false);
  });

  it('hands each dial to the listener as a separate connection', async () => {
    const network = new MemoryNetwork();
    const accepted: Transport[] = [];
    const listener = new MemoryListener('memory://a', { network });
    await listener.listen((transport) => accepted.push(transport));

    const one = new MemoryTransport('memory://a', { network });
    const two = new MemoryTransport('memory://a', { network });
    await one.connect();
    await two.connect();
    await two.send(text('from two'));

    expect(accepted).toHaveLength(2);
    expect(str(await (accepted[1] ?? one).receive())).toBe('from two');
    await listener.close();
  });
});
