export { AgentServer } from './agent-server.js';
export type { AgentServerOptions } from './agent-server.js';
export { GatewayServer, toDecisionBody } from './gateway-server.js';
export type { GatewayServerOptions } from './gateway-server.js';
export {
  HttpError,
  parseFields,
  parseQueryBody,
  readJsonBody,
  sendError,
  sendJson,
  statusForError,
} from './http-utils.js';
export type {
  AgentSummary,
  DecisionBody,
  ErrorBody,
  QueryBody,
  ServerListenOptions,
  SubmitBody,
} from './types.js';
