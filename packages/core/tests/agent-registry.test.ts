import { describe, it, expect } from 'vitest';
import { AgentRegistry } from '../src/agent-registry.js';

describe('AgentRegistry', () => {
  it('registers descriptors and finds them by capability', () => {
    const agents = new AgentRegistry([
      { name: 'researcher', capabilities: ['Search', 'summarize'], prompt: 'Find sources' },
      { name: 'writer', capabilities: ['draft'], prompt: 'Write prose' },
    ]);

    expect(agents.size).toBe(2);
    expect(agents.findByCapability('search').map(a => a.name)).toEqual(['researcher']);
    expect(agents.get('writer')?.prompt).toBe('Write prose');
  });

  it('replaces a descriptor registered under the same name', () => {
    const agents = new AgentRegistry();
    agents.register({ name: 'writer', capabilities: [], prompt: 'v1' });
    agents.register({ name: 'writer', capabilities: [], prompt: 'v2' });
    expect(agents.list()).toEqual([{ name: 'writer', capabilities: [], prompt: 'v2' }]);
  });

  it('rejects a descriptor without a name', () => {
    expect(() => new AgentRegistry().register({ name: '', capabilities: [], prompt: '' })).toThrow();
  });

  it('unregisters by name', () => {
    const agents = new AgentRegistry([{ name: 'writer', capabilities: [], prompt: '' }]);
    expect(agents.unregister('writer')).toBe(true);
    expect(agents.size).toBe(0);
  });
});
