import { describe, it, expect, vi, afterEach } from 'vitest';
import { ModelTier } from '@cairn/shared';
import { OllamaProvider } from '../src/providers/ollama.js';

afterEach(() => {
  vi.unstubAllGlobals();
});

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('OllamaProvider', () => {
  const provider = new OllamaProvider({ baseUrl: 'http://ollama.test', model: 'qwen2.5:7b' });

  it('serves the SLM tier with its configured model', () => {
    expect(provider.supportedTiers).toEqual([ModelTier.SLM]);
    expect(provider.modelFor()).toBe('qwen2.5:7b');
  });

  it('reports unavailable when the server cannot be reached', async () => {
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new Error('ECONNREFUSED')));
    expect(await provider.isAvailable()).toBe(false);
  });

  it('sends the chat request and maps the response', async () => {
    const fetchMock = vi.fn().mockResolvedValue(jsonResponse({
      model: 'qwen2.5:7b',
      message: { role: 'assistant', content: 'hi there' },
      done: true,
      prompt_eval_count: 12,
      eval_count: 3,
    }));
    vi.stubGlobal('fetch', fetchMock);

    const res = await provider.chat({
      model: 'qwen2.5:7b',
      provider: 'ollama',
      tier: ModelTier.SLM,
      system: 'be brief',
      messages: [{ role: 'user', content: 'hello' }],
      responseFormat: 'json',
    });

    expect(res.content).toBe('hi there');
    expect(res.tokenUsage).toEqual({ promptTokens: 12, completionTokens: 3, totalTokens: 15 });
    expect(res.costUsd).toBe(0);
    expect(res.finishReason).toBe('stop');

    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe('http://ollama.test/api/chat');
    const body = JSON.parse(String(init?.body));
    expect(body.messages).toEqual([
      { role: 'system', content: 'be brief' },
      { role: 'user', content: 'hello' },
    ]);
    expect(body.format).toBe('json');
  });

  it('throws on a non-OK response', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response('model not found', { status: 404 })));

    await expect(provider.chat({
      model: 'missing',
      provider: 'ollama',
      tier: ModelTier.SLM,
      messages: [{ role: 'user', content: 'hello' }],
    })).rejects.toThrow('Ollama API error (404): model not found');
  });
});
