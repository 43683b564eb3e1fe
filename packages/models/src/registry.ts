import type { ModelProviderName, ModelTier } from '@cairn/shared';
import type { ModelProvider } from './provider.js';

export class ModelProviderRegistry {
  private providers = new Map<ModelProviderName, ModelProvider>();

  register(provider: ModelProvider): void {
    this.providers.set(provider.name, provider);
  }

  get(name: ModelProviderName): ModelProvider | undefined {
    return this.providers.get(name);
  }

  async getAvailable(tier: ModelTier): Promise<ModelProvider[]> {
    const available: ModelProvider[] = [];
    for (const provider of this.providers.values()) {
      if (provider.supportedTiers.includes(tier) && await provider.isAvailable()) {
        available.push(provider);
      }
    }
    return available;
  }

  /**
   * First registered provider in `priority` order that serves the tier and
   * reports itself available.
   */
  async pick(priority: ModelProviderName[], tier: ModelTier): Promise<ModelProvider | undefined> {
    for (const name of priority) {
      const provider = this.providers.get(name);
      if (provider && provider.supportedTiers.includes(tier) && await provider.isAvailable()) {
        return provider;
      }
    }
    return undefined;
  }

  listAll(): ModelProvider[] {
    return Array.from(this.providers.values());
  }

  has(name: ModelProviderName): boolean {
    return this.providers.has(name);
  }
}
