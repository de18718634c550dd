import type { Logger, ProviderConfig, ProvidersConfig, TextGenerator } from '@agentnet/core';
import { ConfigError, noopLogger } from '@agentnet/core';
import { getModel } from '@mariozechner/pi-ai';
import type { Api, Model } from '@mariozechner/pi-ai';
import { AzureOpenAITextGenerator } from './azure-openai-provider.js';
import { FallbackTextGenerator } from './fallback-generator.js';
import { PiAiTextGenerator } from './pi-ai-provider.js';

export interface ProviderFactoryOptions {
  logger?: Logger;
  env?: Record<string, string | undefined>;
}

/** Look up an OpenAI model in pi-ai's model catalogue. */
export function resolveOpenAIModel(modelId: string): Model<Api> {
  const model = getModel(
    'openai' as Parameters<typeof getModel>[0],
    modelId as Parameters<typeof getModel>[1],
  );
  if (!model) {
    throw new ConfigError(`Unknown OpenAI model "${modelId}"`);
  }
  return model;
}

/** Build the TextGenerator for one configured provider. */
export function createProvider(
  config: ProviderConfig,
  options: ProviderFactoryOptions = {},
): TextGenerator {
  switch (config.type) {
    case 'openai':
      return new PiAiTextGenerator({
        id: 'openai',
        model: resolveOpenAIModel(config.model),
        apiKeyEnv: config.apiKeyEnv,
        env: options.env,
      });
    case 'azure-openai':
      return new AzureOpenAITextGenerator({
        id: 'azure-openai',
        deployment: config.deployment,
        apiKeyEnv: config.apiKeyEnv,
        endpointEnv: config.endpointEnv,
        apiVersionEnv: config.apiVersionEnv,
        env: options.env,
      });
  }
}

/** Primary provider with the configured secondary behind it. */
export function createTextGenerator(
  config: ProvidersConfig,
  options: ProviderFactoryOptions = {},
): FallbackTextGenerator {
  return new FallbackTextGenerator({
    primary: createProvider(config.primary, options),
    secondary: config.secondary ? createProvider(config.secondary, options) : undefined,
    logger: options.logger ?? noopLogger,
  });
}
