import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ProviderError } from '@agentnet/core';
import { AzureOpenAITextGenerator } from '../src/azure-openai-provider.js';

const mocks = vi.hoisted(() => ({
  create: vi.fn(),
  constructed: [] as unknown[],
}));

vi.mock('openai', () => ({
  AzureOpenAI: class MockAzureOpenAI {
    chat = { completions: { create: mocks.create } };
    constructor(options: unknown) {
      mocks.constructed.push(options);
    }
  },
}));

const ENV = {
  AZURE_OPENAI_API_KEY: 'test-secret',
  AZURE_OPENAI_ENDPOINT: 'https://example.openai.azure.com',
  AZURE_OPENAI_API_VERSION: '2024-06-01',
};

function createGenerator(env: Record<string, string | undefined> = ENV): AzureOpenAITextGenerator {
  return new AzureOpenAITextGenerator({
    deployment: 'gpt-4o-mini',
    apiKeyEnv: 'AZURE_OPENAI_API_KEY',
    endpointEnv: 'AZURE_OPENAI_ENDPOINT',
    apiVersionEnv: 'AZURE_OPENAI_API_VERSION',
    env,
  });
}

describe('AzureOpenAITextGenerator', () => {
  beforeEach(() => {
    mocks.create.mockReset();
    mocks.constructed.length = 0;
  });

  it('reports every missing setting as an initialisation failure', async () => {
    const generator = createGenerator({ AZURE_OPENAI_API_KEY: 'test-secret' });

    await expect(generator.generate('hi')).rejects.toThrow(
      '[azure-openai] Missing configuration: environment variable(s) AZURE_OPENAI_ENDPOINT, AZURE_OPENAI_API_VERSION not set',
    );
    expect(mocks.constructed).toHaveLength(0);
  });

  it('builds the client once and returns the first choice', async () => {
    mocks.create.mockResolvedValue({ choices: [{ message: { content: 'A short summary.' } }] });
    const generator = createGenerator();

    await expect(generator.generate({ system: 'sys', user: 'text' })).resolves.toBe('A short summary.');
    await generator.generate('again');

    expect(mocks.constructed).toEqual([
      {
        apiKey: 'test-secret',
        endpoint: 'https://example.openai.azure.com',
        apiVersion: '2024-06-01',
        deployment: 'gpt-4o-mini',
      },
    ]);
    expect(mocks.create.mock.calls[0]?.[0]).toMatchObject({
      model: 'gpt-4o-mini',
      messages: [
        { role: 'system', content: 'sys' },
        { role: 'user', content: 'text' },
      ],
    });
    expect(mocks.create.mock.calls[1]?.[0]).toMatchObject({
      messages: [{ role: 'user', content: 'again' }],
    });
  });

  it('requests a JSON object when asked for json output', async () => {
    mocks.create.mockResolvedValue({ choices: [{ message: { content: '{}' } }] });
    const generator = createGenerator();

    await generator.generate('route', { responseFormat: 'json', temperature: 0 });
    expect(mocks.create.mock.calls[0]?.[0]).toMatchObject({
      temperature: 0,
      response_format: { type: 'json_object' },
    });
  });

  it('wraps transport failures in a ProviderError', async () => {
    const transport = new Error('ECONNRESET');
    mocks.create.mockRejectedValue(transport);
    const generator = createGenerator();

    const err = await generator.generate('hi').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ProviderError);
    expect(err).toHaveProperty('cause', transport);
  });

  it('returns an empty string when the completion has no content', async () => {
    mocks.create.mockResolvedValue({ choices: [] });
    await expect(createGenerator().generate('hi')).resolves.toBe('');
  });
});
