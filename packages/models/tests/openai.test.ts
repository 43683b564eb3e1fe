import { describe, it, expect, vi } from 'vitest';
import { ModelTier } from '@cairn/shared';

const { create } = vi.hoisted(() => ({
  create: vi.fn().mockResolvedValue({
    choices: [{ message: { content: '{"ok":true}' }, finish_reason: 'stop' }],
    usage: { prompt_tokens: 1_000_000, completion_tokens: 1_000_000, total_tokens: 2_000_000 },
  }),
}));

vi.mock('openai', () => ({
  default: vi.fn().mockImplementation(() => ({ chat: { completions: { create } } })),
}));

import { OpenAIProvider } from '../src/providers/openai.js';

describe('OpenAIProvider', () => {
  const provider = new OpenAIProvider({ apiKey: 'test-key' });

  it('lists its SLM and LLM models', async () => {
    const models = await provider.listModels();
    expect(models.map(m => m.id)).toEqual(['gpt-4o-mini', 'gpt-4o']);
  });

  it('requests JSON output and prices the usage', async () => {
    const res = await provider.chat({
      model: 'gpt-4o',
      provider: 'openai',
      tier: ModelTier.LLM,
      system: 'reply in JSON',
      messages: [{ role: 'user', content: 'status?' }],
      responseFormat: 'json',
    });

    expect(res.content).toBe('{"ok":true}');
    // gpt-4o: 1M input at $2.50 + 1M output at $10.00
    expect(res.costUsd).toBeCloseTo(12.5, 6);

    const [params] = create.mock.calls[0] ?? [];
    expect(params.response_format).toEqual({ type: 'json_object' });
    expect(params.messages).toEqual([
      { role: 'system', content: 'reply in JSON' },
      { role: 'user', content: 'status?' },
    ]);
  });
});
