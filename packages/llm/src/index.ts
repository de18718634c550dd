// Providers
export { PiAiTextGenerator } from './pi-ai-provider.js';
export type { PiAiTextGeneratorOptions } from './pi-ai-provider.js';
export { AzureOpenAITextGenerator } from './azure-openai-provider.js';
export type { AzureOpenAITextGeneratorOptions } from './azure-openai-provider.js';

// Fallback policy
export { FallbackTextGenerator } from './fallback-generator.js';
export type { FallbackTextGeneratorOptions } from './fallback-generator.js';

// Factory
export { createProvider, createTextGenerator, resolveOpenAIModel } from './provider-factory.js';
export type { ProviderFactoryOptions } from './provider-factory.js';
