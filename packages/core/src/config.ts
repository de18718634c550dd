import type { Skill } from './agent.js';
import type { LogLevel } from './logger.js';

/** Top-level configuration schema for the agent network. */
export interface AgentNetConfig {
  server: ServerConfig;
  providers: ProvidersConfig;
  router: RouterConfig;
  network: NetworkConfig;
  logging: LoggingConfig;
  agents: AgentConfigEntry[];
}

/** Where the router gateway listens. */
export interface ServerConfig {
  port: number;
  host?: string;
}

export interface OpenAIProviderConfig {
  type: 'openai';
  model: string;
  apiKeyEnv: string;
}

export interface AzureOpenAIProviderConfig {
  type: 'azure-openai';
  deployment: string;
  apiKeyEnv: string;
  endpointEnv: string;
  apiVersionEnv: string;
}

export type ProviderConfig = OpenAIProviderConfig | AzureOpenAIProviderConfig;

export interface ProvidersConfig {
  primary: ProviderConfig;
  secondary?: ProviderConfig;
  temperature?: number;
  maxTokens?: number;
}

export interface RouterConfig {
  /** `lexical` skips the LLM and routes by word overlap only. */
  mode: 'llm' | 'lexical';
  /** LLM picks below this confidence count as no match. */
  minConfidence: number;
  tagWeight: number;
  textWeight: number;
}

export interface NetworkConfig {
  /** Deadline for the whole route-then-dispatch sequence. */
  requestTimeoutMs: number;
}

export interface LoggingConfig {
  level: LogLevel;
}

/** One agent as declared in config. */
export interface AgentConfigEntry {
  name: string;
  address: string;
  description?: string;
  /** Built-in prompt template; also supplies default skills. */
  template?: string;
  skills?: Skill[];
  /** Host this agent in-process and serve it on this port. */
  listen?: ServerConfig;
}

export const DEFAULT_ROUTER_CONFIG: RouterConfig = {
  mode: 'llm',
  minConfidence: 0,
  tagWeight: 2,
  textWeight: 1,
};

export const DEFAULT_NETWORK_CONFIG: NetworkConfig = {
  requestTimeoutMs: 60_000,
};

export const DEFAULT_LOGGING_CONFIG: LoggingConfig = {
  level: 'info',
};
