export { AgentDescriptorRegistry } from './agent-registry.js';
export { AgentRouter } from './agent-router.js';
export type { AgentRouterOptions } from './agent-router.js';
export { LexicalScorer, DEFAULT_LEXICAL_WEIGHTS, stem, tokenize } from './lexical-scorer.js';
export type { LexicalMatch, LexicalWeights } from './lexical-scorer.js';
export { buildRoutingPrompt, parseRoutingReply } from './routing-prompt.js';
export type { RoutingReply } from './routing-prompt.js';
export { LocalAgentConnection } from './agent-connection.js';
export type { AgentConnection } from './agent-connection.js';
export { HttpAgentConnection, parseTaskResponse } from './http-agent-connection.js';
export type { HttpAgentConnectionOptions } from './http-agent-connection.js';
export {
  NetworkManager,
  NO_SUITABLE_AGENT_MESSAGE,
  DEFAULT_REQUEST_TIMEOUT_MS,
} from './network-manager.js';
export type { AgentStatus, DispatchResult, NetworkManagerOptions } from './network-manager.js';
