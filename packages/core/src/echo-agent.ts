import { createMessage } from './messages.js';
import type { Message } from './messages.js';
import type { Agent } from './agent.js';

function textOf(message: Message): string {
  return typeof message.content === 'string' ? message.content : JSON.stringify(message.content);
}

/**
 * Replies `Echo: <content>` with the request metadata; streams the content
 * word by word. Served by the default configuration.
 */
export class EchoAgent implements Agent {
  constructor(readonly name = 'echo') {}

  async process(message: Message): Promise<Message> {
    return createMessage({
      role: 'agent',
      content: `Echo: ${textOf(message)}`,
      metadata: { ...message.metadata },
    });
  }

  async *stream(message: Message): AsyncGenerator<Message> {
    for (const word of textOf(message).split(/\s+/).filter(Boolean)) {
      yield createMessage({ role: 'agent', content: word });
    }
  }
}
