import { type AgentDescriptor, agentDescriptorSchema } from '@cairn/shared';

/** Delegate agents available to COORDINATED runs, by name. */
export class AgentRegistry {
  private agents = new Map<string, AgentDescriptor>();

  constructor(initial: AgentDescriptor[] = []) {
    for (const agent of initial) this.register(agent);
  }

  register(descriptor: AgentDescriptor): void {
    const agent = agentDescriptorSchema.parse(descriptor);
    this.agents.set(agent.name, agent);
  }

  get(name: string): AgentDescriptor | undefined {
    return this.agents.get(name);
  }

  list(): AgentDescriptor[] {
    return Array.from(this.agents.values());
  }

  findByCapability(capability: string): AgentDescriptor[] {
    const wanted = capability.toLowerCase();
    return this.list().filter(a => a.capabilities.some(c => c.toLowerCase() === wanted));
  }

  unregister(name: string): boolean {
    return this.agents.delete(name);
  }

  get size(): number {
    return this.agents.size;
  }
}
