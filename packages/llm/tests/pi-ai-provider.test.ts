import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Api, Model } from '@mariozechner/pi-ai';
import { ProviderError } from '@agentnet/core';
import { PiAiTextGenerator } from '../src/pi-ai-provider.js';

const mocks = vi.hoisted(() => ({
  events: [] as Array<Record<string, unknown>>,
  calls: [] as Array<{ context: unknown; options: unknown }>,
}));

vi.mock('@mariozechner/pi-ai', () => ({
  stream: vi.fn((_model: unknown, context: unknown, options: unknown) => {
    mocks.calls.push({ context, options });
    return (async function* () {
      yield* mocks.events;
    })();
  }),
  getModel: vi.fn(),
}));

const fakeModel = {
  id: 'gpt-4o-mini',
  name: 'GPT-4o mini',
  api: 'openai-completions',
  provider: 'openai',
  baseUrl: 'https://api.openai.com/v1',
  reasoning: false,
  input: ['text'],
  cost: { input: 0, output: 0, cacheRead: 0, cacheWrite: 0 },
  contextWindow: 128000,
  maxTokens: 16384,
} as unknown as Model<Api>;

describe('PiAiTextGenerator', () => {
  beforeEach(() => {
    mocks.events.length = 0;
    mocks.calls.length = 0;
  });

  it('fails as an initialisation error when the API key is missing', async () => {
    const generator = new PiAiTextGenerator({ model: fakeModel, id: 'openai', env: {} });

    const err = await generator.generate('hi').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ProviderError);
    expect(err).toHaveProperty(
      'message',
      '[openai] Missing API key: environment variable OPENAI_API_KEY is not set',
    );
    expect(mocks.calls).toHaveLength(0);
  });

  it('accumulates text deltas into the result', async () => {
    mocks.events.push(
      { type: 'start' },
      { type: 'text_delta', delta: 'Bonjour' },
      { type: 'text_delta', delta: ' le monde' },
      { type: 'done', reason: 'stop' },
    );
    const generator = new PiAiTextGenerator({
      model: fakeModel,
      env: { OPENAI_API_KEY: 'test-secret' },
    });

    await expect(generator.generate('Translate: hello world')).resolves.toBe('Bonjour le monde');
  });

  it('passes the system prompt, user text and call options through', async () => {
    mocks.events.push({ type: 'text_delta', delta: 'ok' });
    const generator = new PiAiTextGenerator({
      model: fakeModel,
      apiKeyEnv: 'MY_KEY',
      env: { MY_KEY: 'test-secret' },
    });

    await generator.generate(
      { system: 'You summarise.', user: 'Long text' },
      { temperature: 0, maxTokens: 50 },
    );

    expect(mocks.calls).toHaveLength(1);
    expect(mocks.calls[0]?.context).toMatchObject({
      systemPrompt: 'You summarise.',
      messages: [{ role: 'user', content: [{ type: 'text', text: 'Long text' }] }],
    });
    expect(mocks.calls[0]?.options).toMatchObject({
      apiKey: 'test-secret',
      temperature: 0,
      maxTokens: 50,
    });
  });

  it('turns an error event into a ProviderError carrying its message', async () => {
    mocks.events.push(
      { type: 'text_delta', delta: 'partial' },
      { type: 'error', reason: 'error', error: { errorMessage: '429 Rate limit reached' } },
    );
    const generator = new PiAiTextGenerator({
      model: fakeModel,
      id: 'openai',
      env: { OPENAI_API_KEY: 'test-secret' },
    });

    const failure = generator.generate('hi');
    await expect(failure).rejects.toBeInstanceOf(ProviderError);
    await expect(failure).rejects.toThrow('[openai] 429 Rate limit reached');
  });

  it('uses a generic message for an error event without one', async () => {
    mocks.events.push({ type: 'error', reason: 'error', error: {} });
    const generator = new PiAiTextGenerator({
      model: fakeModel,
      id: 'openai',
      env: { OPENAI_API_KEY: 'test-secret' },
    });

    await expect(generator.generate('hi')).rejects.toThrow(
      '[openai] Completion stream ended with an error event',
    );
  });

  it('defaults its id to the model provider', () => {
    const generator = new PiAiTextGenerator({ model: fakeModel });
    expect(generator.id).toBe('pi-ai:openai');
  });
});
