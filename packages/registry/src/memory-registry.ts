import { BaseAgentRegistry, cloneRegistration } from './base-registry.js';
import type { AgentRegistration, RegistryOptions } from './types.js';

/** Process-lifetime registry backed by a `Map`. */
export class InMemoryAgentRegistry extends BaseAgentRegistry {
  private readonly entries = new Map<string, AgentRegistration>();

  constructor(options?: RegistryOptions) {
    super(options);
  }

  protected async readEntry(name: string): Promise<AgentRegistration | undefined> {
    const reg = this.entries.get(name);
    return reg && cloneRegistration(reg);
  }

  protected async writeEntry(reg: AgentRegistration): Promise<void> {
    this.entries.set(reg.name, cloneRegistration(reg));
  }

  protected async deleteEntry(name: string): Promise<boolean> {
    return this.entries.delete(name);
  }

  protected async readAll(): Promise<AgentRegistration[]> {
    return [...this.entries.values()].map(cloneRegistration);
  }
}
