import type { RoutingStrategy, Skill, TaskResponse } from '@agentnet/core';

/** JSON error envelope returned by both servers. */
export interface ErrorBody {
  error: {
    code: string;
    message: string;
  };
}

/** A routing decision as sent over the wire: the agent by name only. */
export interface DecisionBody {
  agent: string | null;
  confidence: number;
  rationale: string;
  strategy: RoutingStrategy;
}

export type SubmitBody =
  | { status: 'completed'; decision: DecisionBody; response: TaskResponse }
  | { status: 'no-agent'; decision: DecisionBody; message: string };

export interface AgentSummary {
  name: string;
  description?: string;
  address: string;
  skills: Skill[];
  available: boolean;
}

/** Parsed body of `/route`, `/submit` and `/run/:agent`. */
export interface QueryBody {
  query: string;
  fields?: Record<string, string>;
}

export interface ServerListenOptions {
  /** 0 picks a free port. */
  port: number;
  host?: string;
}
