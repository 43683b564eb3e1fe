/**
 * Structural contract for a delegate agent in COORDINATED runs.
 * Where descriptors come from (config file, markdown, API) is not the core's concern.
 */
export interface AgentDescriptor {
  name: string;
  capabilities: string[];
  prompt: string;
}
