import { fileURLToPath } from 'node:url';
import { describe, it, expect, vi, afterEach } from 'vitest';
import type { AgentNetConfig, TextGenerator } from '@agentnet/core';
import { ConfigError, noopLogger, toPromptMessages } from '@agentnet/core';
import { NO_SUITABLE_AGENT_MESSAGE } from '@agentnet/orchestrator';
import { bootstrap } from '../src/bootstrap.js';
import type { AppServer } from '../src/bootstrap.js';

const DEFAULT_CONFIG_PATH = fileURLToPath(new URL('../../../config/default.json5', import.meta.url));

function createConfig(mode: 'llm' | 'lexical' = 'llm'): AgentNetConfig {
  return {
    server: { port: 0, host: '127.0.0.1' },
    providers: {
      primary: { type: 'openai', model: 'gpt-4o-mini', apiKeyEnv: 'OPENAI_API_KEY' },
      temperature: 0.3,
    },
    router: { mode, minConfidence: 0, tagWeight: 2, textWeight: 1 },
    network: { requestTimeoutMs: 5_000 },
    logging: { level: 'error' },
    agents: [
      {
        name: 'summarizer',
        address: 'http://127.0.0.1:5001',
        template: 'summarize',
        listen: { port: 0, host: '127.0.0.1' },
      },
      {
        name: 'translator',
        address: 'http://127.0.0.1:5002',
        template: 'translate',
        listen: { port: 0, host: '127.0.0.1' },
      },
    ],
  };
}

/** Answers routing prompts with the translator and agent prompts with a fixed text. */
function createGenerator() {
  return {
    id: 'fake',
    generate: vi.fn<TextGenerator['generate']>(async (prompt) => {
      const { system } = toPromptMessages(prompt);
      if (system?.startsWith('You are a query router')) {
        return '{"agent": "translator", "confidence": 0.9, "rationale": "Translation request"}';
      }
      return 'Bonjour';
    }),
  };
}

describe('bootstrap', () => {
  let app: AppServer | undefined;

  afterEach(async () => {
    await app?.shutdown();
    app = undefined;
  });

  it('serves the network through the gateway', async () => {
    app = await bootstrap({ config: createConfig(), generator: createGenerator(), logger: noopLogger });

    const res = await fetch(`http://127.0.0.1:${app.gateway.port}/submit`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ query: 'Translate this text to French: Hello' }),
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      status: 'completed',
      decision: { agent: 'translator', strategy: 'llm' },
      response: { agent: 'translator', state: 'completed', text: 'Bonjour' },
    });
  });

  it('hosts each listening agent on its own server', async () => {
    app = await bootstrap({ config: createConfig(), generator: createGenerator(), logger: noopLogger });

    expect(app.agentServers.map((server) => server.agentName)).toEqual(['summarizer', 'translator']);
    const translatorServer = app.agentServers[1];
    const res = await fetch(`http://127.0.0.1:${translatorServer?.port}/agent.json`);

    expect(await res.json()).toMatchObject({
      name: 'translator',
      description: 'Translates text into specified target languages',
    });
  });

  it('forwards the translation prompt with the configured temperature', async () => {
    const generator = createGenerator();
    app = await bootstrap({ config: createConfig(), generator, logger: noopLogger, listen: false });

    await expect(app.network.submit('Translate this text to French: Hello')).resolves.toBe('Bonjour');
    expect(generator.generate).toHaveBeenCalledTimes(2);
    expect(generator.generate.mock.calls[1]).toEqual([
      {
        system: 'You are a helpful translator assistant. Reply with the translation only.',
        user: 'Translate the following text to French:\n\nHello',
      },
      expect.objectContaining({ temperature: 0.3 }),
    ]);
  });

  it('routes lexically without calling the model in lexical mode', async () => {
    const generator = createGenerator();
    app = await bootstrap({ config: createConfig('lexical'), generator, logger: noopLogger, listen: false });

    await expect(app.network.submit('asdf qwer zxcv')).resolves.toBe(NO_SUITABLE_AGENT_MESSAGE);
    expect(generator.generate).not.toHaveBeenCalled();
  });

  it('loads the default config file', async () => {
    app = await bootstrap({
      configPath: DEFAULT_CONFIG_PATH,
      env: {},
      generator: createGenerator(),
      logger: noopLogger,
      listen: false,
    });

    expect(app.registry.all().map((agent) => agent.name)).toEqual([
      'summarizer',
      'translator',
      'query-gate',
      'fewshot-retriever',
      'sql-generator',
      'nlq-reconstructor',
      'product-writer',
    ]);
    expect(app.agentServers).toHaveLength(7);
  });

  it('rejects an invalid config file', async () => {
    await expect(
      bootstrap({ configPath: '/nonexistent/agentnet.json5', generator: createGenerator(), logger: noopLogger }),
    ).rejects.toThrow(ConfigError);
  });
});
