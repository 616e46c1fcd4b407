import { createMessage } from '@agentwire/core';
import type { Agent, Message } from '@agentwire/core';

export const userMessage = (content: string): Message => createMessage({ role: 'user', content });

export class FailingAgent implements Agent {
  readonly name = 'failing';

  async process(): Promise<Message> {
    throw new Error('boom');
  }
}

/** Holds every call until `release()`; no streaming support. */
export class SlowAgent implements Agent {
  readonly name = 'slow';
  private waiters: (() => void)[] = [];

  async process(message: Message): Promise<Message> {
    if (message.content === 'wait') {
      await new Promise<void>((resolve) => this.waiters.push(resolve));
    }
    return createMessage({ role: 'agent', content: `done: ${String(message.content)}` });
  }

  release(): void {
    for (const resolve of this.waiters.splice(0)) resolve();
  }
}
