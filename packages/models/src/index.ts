export { ModelProvider } from './provider.js';
export { ModelProviderRegistry } from './registry.js';
export { OllamaProvider } from './providers/ollama.js';
export type { OllamaProviderConfig } from './providers/ollama.js';
export { AnthropicProvider } from './providers/anthropic.js';
export type { AnthropicProviderConfig } from './providers/anthropic.js';
export { OpenAIProvider } from './providers/openai.js';
export type { OpenAIProviderConfig } from './providers/openai.js';
