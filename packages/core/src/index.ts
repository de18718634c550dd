// Agent data model
export type {
  InputField,
  Skill,
  AgentDescriptor,
  RoutingStrategy,
  RoutingDecision,
  TaskRequest,
  TaskState,
  TaskResponse,
  AgentEndpoint,
} from './agent.js';

// Text generation abstraction
export type { PromptMessages, GenerateOptions, TextGenerator } from './llm.js';
export { toPromptMessages } from './llm.js';

// Errors
export {
  AgentNetError,
  DuplicateAgentError,
  UnknownAgentError,
  EmptyRegistryError,
  InvalidQueryError,
  ProviderError,
  ProviderUnavailableError,
  EmptyCompletionError,
  AgentTransportError,
  TimeoutError,
  ConfigError,
  errorMessage,
} from './errors.js';
export type { ProviderFailure } from './errors.js';

// Logging
export type { Logger, LogLevel } from './logger.js';
export { LOG_LEVELS, createConsoleLogger, noopLogger } from './logger.js';

// Configuration
export type {
  AgentNetConfig,
  ServerConfig,
  OpenAIProviderConfig,
  AzureOpenAIProviderConfig,
  ProviderConfig,
  ProvidersConfig,
  RouterConfig,
  NetworkConfig,
  LoggingConfig,
  AgentConfigEntry,
} from './config.js';
export {
  DEFAULT_ROUTER_CONFIG,
  DEFAULT_NETWORK_CONFIG,
  DEFAULT_LOGGING_CONFIG,
} from './config.js';
export { validateConfig, validateConfigObject, loadConfig } from './config-validator.js';
export type {
  ConfigValidationError,
  ConfigValidationResult,
  ValidateConfigOptions,
} from './config-validator.js';
export { applyEnvOverrides } from './config-env-overlay.js';

// Utilities
export { generateId, isRecord, isNonEmptyString, deepFreeze } from './utils.js';
