import type { AgentEndpoint, TaskRequest, TaskResponse } from '@agentnet/core';

/**
 * How the network manager reaches one agent. Implementations exist for
 * in-process endpoints and for agents behind an HTTP server, so the
 * manager never knows which kind it is talking to.
 */
export interface AgentConnection {
  readonly agentName: string;
  send(request: TaskRequest, signal?: AbortSignal): Promise<TaskResponse>;
  /** Whether the agent currently answers. */
  isAvailable(signal?: AbortSignal): Promise<boolean>;
}

/** Calls an endpoint living in the same process. */
export class LocalAgentConnection implements AgentConnection {
  constructor(private readonly endpoint: AgentEndpoint) {}

  get agentName(): string {
    return this.endpoint.descriptor.name;
  }

  send(request: TaskRequest, signal?: AbortSignal): Promise<TaskResponse> {
    return this.endpoint.handle(request, signal);
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }
}
