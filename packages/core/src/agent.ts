/** A named input an agent skill expects alongside the free-text query. */
export interface InputField {
  name: string;
  description?: string;
  required?: boolean;
}

/** A declared capability of an agent. Name, description and tags are routing evidence. */
export interface Skill {
  name: string;
  description: string;
  tags: string[];
  expectedInputs: InputField[];
  /** Prompt template the agent endpoint uses for this skill. */
  template?: string;
}

/** Static catalogue entry for one agent. Frozen once registered. */
export interface AgentDescriptor {
  name: string;
  /** Base URL of the agent's HTTP server. */
  address: string;
  description?: string;
  skills: Skill[];
}

export type RoutingStrategy = 'llm' | 'lexical';

/**
 * Outcome of routing one query. An absent `selectedAgent` means no agent
 * is suitable; that is a valid decision, not an error.
 */
export interface RoutingDecision {
  selectedAgent?: AgentDescriptor;
  /** Advisory score in [0, 1]. Always 0 when nothing was selected. */
  confidence: number;
  rationale: string;
  strategy: RoutingStrategy;
}

export interface TaskRequest {
  id: string;
  query: string;
  /** Structured inputs such as `target_language` or `schema`. */
  fields?: Record<string, string>;
}

export type TaskState = 'completed' | 'input-required';

export interface TaskResponse {
  id: string;
  agent: string;
  state: TaskState;
  text: string;
}

/** A network-reachable handler for one agent's tasks. */
export interface AgentEndpoint {
  readonly descriptor: AgentDescriptor;
  handle(request: TaskRequest, signal?: AbortSignal): Promise<TaskResponse>;
}
