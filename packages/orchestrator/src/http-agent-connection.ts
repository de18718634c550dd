import type { Logger, TaskRequest, TaskResponse } from '@agentnet/core';
import {
  AgentTransportError,
  ProviderUnavailableError,
  errorMessage,
  isRecord,
  noopLogger,
} from '@agentnet/core';
import type { AgentConnection } from './agent-connection.js';

export interface HttpAgentConnectionOptions {
  agentName: string;
  /** Base URL of the agent server, e.g. `http://127.0.0.1:5001`. */
  address: string;
  logger?: Logger;
  /** Injected for tests. Default: global fetch. */
  fetch?: typeof fetch;
}

/** Narrow an unknown JSON body to a TaskResponse. */
export function parseTaskResponse(value: unknown): TaskResponse | undefined {
  if (!isRecord(value)) return undefined;
  const { id, agent, state, text } = value;
  if (typeof id !== 'string' || typeof agent !== 'string' || typeof text !== 'string') {
    return undefined;
  }
  if (state !== 'completed' && state !== 'input-required') return undefined;
  return { id, agent, state, text };
}

function errorBody(value: unknown): { code?: string; message?: string } {
  if (!isRecord(value) || !isRecord(value.error)) return {};
  const { code, message } = value.error;
  return {
    code: typeof code === 'string' ? code : undefined,
    message: typeof message === 'string' ? message : undefined,
  };
}

/**
 * Sends tasks to an agent server over HTTP: `POST {address}/tasks/send`.
 * Non-2xx answers become `AgentTransportError`, except a provider outage
 * reported by the agent, which surfaces as `ProviderUnavailableError`.
 */
export class HttpAgentConnection implements AgentConnection {
  readonly agentName: string;
  private readonly baseUrl: string;
  private readonly logger: Logger;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpAgentConnectionOptions) {
    this.agentName = options.agentName;
    this.baseUrl = options.address.replace(/\/+$/, '');
    this.logger = options.logger ?? noopLogger;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async send(request: TaskRequest, signal?: AbortSignal): Promise<TaskResponse> {
    const url = `${this.baseUrl}/tasks/send`;
    this.logger.debug(`POST ${url} (task ${request.id})`);

    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(request),
        signal,
      });
    } catch (err) {
      if (signal?.aborted) throw err;
      throw new AgentTransportError(this.agentName, `Unreachable at ${this.baseUrl}: ${errorMessage(err)}`, undefined, err);
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (err) {
      if (signal?.aborted) throw err;
      throw new AgentTransportError(this.agentName, `Invalid JSON from agent (HTTP ${res.status})`, res.status, err);
    }

    if (!res.ok) {
      const { code, message } = errorBody(body);
      if (res.status === 503 && code === 'PROVIDER_UNAVAILABLE') {
        throw new ProviderUnavailableError([], message);
      }
      throw new AgentTransportError(this.agentName, `HTTP ${res.status}: ${message ?? res.statusText}`, res.status);
    }

    const response = parseTaskResponse(body);
    if (!response) {
      throw new AgentTransportError(this.agentName, 'Malformed task response', res.status);
    }
    return response;
  }

  async isAvailable(signal?: AbortSignal): Promise<boolean> {
    try {
      const res = await this.fetchImpl(`${this.baseUrl}/health`, { signal });
      return res.ok;
    } catch (err) {
      this.logger.debug(`Health check for "${this.agentName}" failed: ${errorMessage(err)}`);
      return false;
    }
  }
}
