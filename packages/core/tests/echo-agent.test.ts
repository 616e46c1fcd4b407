import { describe, it, expect } from 'vitest';
import { EchoAgent, createMessage } from '../src/index.js';

describe('EchoAgent', () => {
  it('prefixes the content and keeps the metadata', async () => {
    const reply = await new EchoAgent().process(
      createMessage({ role: 'user', content: 'hi', metadata: { trace: 't-1' } }),
    );
    expect(reply.role).toBe('agent');
    expect(reply.content).toBe('Echo: hi');
    expect(reply.metadata).toEqual({ trace: 't-1' });
  });

  it('serializes structured content', async () => {
    const reply = await new EchoAgent().process(
      createMessage({ role: 'user', content: { q: [1, 2] } }),
    );
    expect(reply.content).toBe('Echo: {"q":[1,2]}');
  });

  it('streams word by word', async () => {
    const words: unknown[] = [];
    for await (const chunk of new EchoAgent('words').stream(
      createMessage({ role: 'user', content: '  one two\tthree ' }),
    )) {
      words.push(chunk.content);
    }
    expect(words).toEqual(['one', 'two', 'three']);
  });
});
