import type { AgentDescriptor, Logger, RoutingDecision, TaskResponse } from '@agentnet/core';
import {
  ConfigError,
  InvalidQueryError,
  TimeoutError,
  UnknownAgentError,
  generateId,
  isNonEmptyString,
  noopLogger,
} from '@agentnet/core';
import type { AgentConnection } from './agent-connection.js';
import type { AgentDescriptorRegistry } from './agent-registry.js';
import type { AgentRouter } from './agent-router.js';

/** Returned by `submit` when routing selects no agent. */
export const NO_SUITABLE_AGENT_MESSAGE = 'No suitable agent was found to handle this request.';

export const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;

export type DispatchResult =
  | { status: 'completed'; decision: RoutingDecision; response: TaskResponse }
  | { status: 'no-agent'; decision: RoutingDecision; message: string };

export interface AgentStatus {
  name: string;
  address: string;
  available: boolean;
}

export interface NetworkManagerOptions {
  registry: AgentDescriptorRegistry;
  router: AgentRouter;
  /** One connection per registered agent, keyed by agent name. */
  connections: ReadonlyMap<string, AgentConnection>;
  logger?: Logger;
  /** Deadline for route-then-dispatch. Default: 60000. */
  requestTimeoutMs?: number;
}

/**
 * Entry point for callers: routes a query and forwards it to the chosen
 * agent, all under one deadline.
 */
export class NetworkManager {
  private readonly registry: AgentDescriptorRegistry;
  private readonly router: AgentRouter;
  private readonly connections: ReadonlyMap<string, AgentConnection>;
  private readonly logger: Logger;
  private readonly requestTimeoutMs: number;

  constructor(options: NetworkManagerOptions) {
    this.registry = options.registry;
    this.router = options.router;
    this.connections = options.connections;
    this.logger = options.logger ?? noopLogger;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;

    for (const descriptor of this.registry.all()) {
      if (!this.connections.has(descriptor.name)) {
        throw new ConfigError(`No connection configured for agent "${descriptor.name}"`);
      }
    }
    for (const name of this.connections.keys()) {
      if (!this.registry.has(name)) {
        throw new UnknownAgentError(name);
      }
    }
  }

  /** Routing decision only; nothing is dispatched. */
  async route(query: string): Promise<RoutingDecision> {
    assertQuery(query);
    return this.withTimeout((signal) => this.router.select(query, this.registry, signal));
  }

  async dispatch(query: string, fields?: Record<string, string>): Promise<DispatchResult> {
    assertQuery(query);
    return this.withTimeout(async (signal) => {
      const decision = await this.router.select(query, this.registry, signal);
      const agent = decision.selectedAgent;
      if (!agent) {
        this.logger.info(`No agent selected: ${decision.rationale}`);
        return { status: 'no-agent', decision, message: NO_SUITABLE_AGENT_MESSAGE };
      }

      this.logger.info(`Dispatching to "${agent.name}" via ${decision.strategy} routing`);
      const response = await this.connectionFor(agent.name).send(
        { id: generateId(), query, fields },
        signal,
      );
      return { status: 'completed', decision, response };
    });
  }

  /** Route and dispatch, answering with the agent's text or NO_SUITABLE_AGENT_MESSAGE. */
  async submit(query: string): Promise<string> {
    const result = await this.dispatch(query);
    return result.status === 'completed' ? result.response.text : result.message;
  }

  /** Send straight to a named agent, skipping the router. */
  async runAgent(name: string, query: string, fields?: Record<string, string>): Promise<TaskResponse> {
    assertQuery(query);
    const connection = this.connectionFor(this.registry.lookup(name).name);
    return this.withTimeout((signal) => connection.send({ id: generateId(), query, fields }, signal));
  }

  listAgents(): AgentDescriptor[] {
    return this.registry.all();
  }

  /** Probe every agent's connection. */
  async agentStatuses(): Promise<AgentStatus[]> {
    return Promise.all(
      this.registry.all().map(async (descriptor) => ({
        name: descriptor.name,
        address: descriptor.address,
        available: await this.withTimeout((signal) =>
          this.connectionFor(descriptor.name).isAvailable(signal),
        ).catch(() => false),
      })),
    );
  }

  private connectionFor(name: string): AgentConnection {
    const connection = this.connections.get(name);
    if (!connection) {
      throw new UnknownAgentError(name);
    }
    return connection;
  }

  private async withTimeout<T>(fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new TimeoutError(this.requestTimeoutMs));
        controller.abort();
      }, this.requestTimeoutMs);
    });

    try {
      return await Promise.race([fn(controller.signal), deadline]);
    } finally {
      clearTimeout(timer);
    }
  }
}

function assertQuery(query: string): void {
  if (!isNonEmptyString(query)) {
    throw new InvalidQueryError();
  }
}
