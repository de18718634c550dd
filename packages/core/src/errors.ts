/** Base class for every typed failure in the agent network. */
export class AgentNetError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    cause?: unknown,
  ) {
    super(message);
    this.name = 'AgentNetError';
    if (cause !== undefined) this.cause = cause;
  }
}

/** Thrown when an agent name is registered twice. */
export class DuplicateAgentError extends AgentNetError {
  constructor(public readonly agentName: string) {
    super('DUPLICATE_AGENT', `Agent "${agentName}" is already registered`);
    this.name = 'DuplicateAgentError';
  }
}

/** Thrown when looking up an agent that was never registered. */
export class UnknownAgentError extends AgentNetError {
  constructor(public readonly agentName: string) {
    super('UNKNOWN_AGENT', `Agent "${agentName}" is not registered`);
    this.name = 'UnknownAgentError';
  }
}

/** Thrown when routing is attempted against a registry with no agents. */
export class EmptyRegistryError extends AgentNetError {
  constructor() {
    super('EMPTY_REGISTRY', 'No agents are registered');
    this.name = 'EmptyRegistryError';
  }
}

/** Thrown when a query or task payload is blank or not a string. */
export class InvalidQueryError extends AgentNetError {
  constructor(message = 'Query must be a non-empty string') {
    super('INVALID_QUERY', message);
    this.name = 'InvalidQueryError';
  }
}

/** A single provider failed to initialise or to complete a call. */
export class ProviderError extends AgentNetError {
  constructor(
    public readonly provider: string,
    message: string,
    cause?: unknown,
  ) {
    super('PROVIDER_ERROR', `[${provider}] ${message}`, cause);
    this.name = 'ProviderError';
  }
}

export interface ProviderFailure {
  provider: string;
  error: unknown;
}

/** Every configured provider failed for one logical call. */
export class ProviderUnavailableError extends AgentNetError {
  constructor(
    public readonly causes: ProviderFailure[] = [],
    message = 'All text generation providers failed',
  ) {
    const detail = causes
      .map((c) => `${c.provider}: ${errorMessage(c.error)}`)
      .join('; ');
    super(
      'PROVIDER_UNAVAILABLE',
      detail ? `${message} (${detail})` : message,
      causes.length > 0 ? causes[causes.length - 1]?.error : undefined,
    );
    this.name = 'ProviderUnavailableError';
  }
}

/** The provider answered, but with nothing usable. */
export class EmptyCompletionError extends AgentNetError {
  constructor(public readonly agentName: string) {
    super('EMPTY_COMPLETION', `Agent "${agentName}" received an empty completion`);
    this.name = 'EmptyCompletionError';
  }
}

/** A remote agent could not be reached or answered with an error status. */
export class AgentTransportError extends AgentNetError {
  constructor(
    public readonly agentName: string,
    message: string,
    public readonly status?: number,
    cause?: unknown,
  ) {
    super('AGENT_TRANSPORT', `Agent "${agentName}": ${message}`, cause);
    this.name = 'AgentTransportError';
  }
}

/** The route-then-dispatch sequence exceeded its deadline. */
export class TimeoutError extends AgentNetError {
  constructor(public readonly timeoutMs: number) {
    super('TIMEOUT', `Request timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/** Configuration could not be read or failed validation. */
export class ConfigError extends AgentNetError {
  constructor(message: string, cause?: unknown) {
    super('CONFIG_ERROR', message, cause);
    this.name = 'ConfigError';
  }
}

/** Render any thrown value as a message string. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
