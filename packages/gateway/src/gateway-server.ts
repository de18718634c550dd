import { createServer, type Server, type IncomingMessage, type ServerResponse } from 'node:http';
import type { Logger, RoutingDecision } from '@agentnet/core';
import { noopLogger } from '@agentnet/core';
import type { NetworkManager } from '@agentnet/orchestrator';
import { assertMethod } from './agent-server.js';
import {
  HttpError,
  boundPort,
  close,
  listen,
  parseQueryBody,
  readJsonBody,
  sendError,
  sendJson,
} from './http-utils.js';
import type { AgentSummary, DecisionBody, ServerListenOptions, SubmitBody } from './types.js';

export interface GatewayServerOptions extends ServerListenOptions {
  network: NetworkManager;
  logger?: Logger;
}

export function toDecisionBody(decision: RoutingDecision): DecisionBody {
  return {
    agent: decision.selectedAgent?.name ?? null,
    confidence: decision.confidence,
    rationale: decision.rationale,
    strategy: decision.strategy,
  };
}

const RUN_PREFIX = '/run/';

/**
 * HTTP front door of the agent network: lists agents, routes and
 * submits queries, and runs a named agent directly.
 */
export class GatewayServer {
  private server: Server | null = null;
  private readonly network: NetworkManager;
  private readonly logger: Logger;
  private startTime = Date.now();

  constructor(private readonly options: GatewayServerOptions) {
    this.network = options.network;
    this.logger = options.logger ?? noopLogger;
  }

  get port(): number | undefined {
    return boundPort(this.server);
  }

  async start(): Promise<void> {
    this.startTime = Date.now();
    const server = createServer((req: IncomingMessage, res: ServerResponse) => {
      this.handleRequest(req, res).catch((err: unknown) => sendError(res, err, this.logger));
    });
    await listen(server, this.options);
    this.server = server;
    this.logger.info(`Gateway listening on port ${this.port}`);
  }

  async stop(): Promise<void> {
    if (!this.server) return;
    await close(this.server);
    this.server = null;
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const { pathname } = new URL(req.url ?? '/', 'http://localhost');

    if (pathname.startsWith(RUN_PREFIX)) {
      assertMethod(req, 'POST');
      const agent = decodeAgentName(pathname.slice(RUN_PREFIX.length));
      const { query, fields } = parseQueryBody(await readJsonBody(req));
      sendJson(res, 200, await this.network.runAgent(agent, query, fields));
      return;
    }

    switch (pathname) {
      case '/health':
        assertMethod(req, 'GET');
        sendJson(res, 200, {
          status: 'ok',
          agents: this.network.listAgents().length,
          uptime: Date.now() - this.startTime,
        });
        return;

      case '/agents': {
        assertMethod(req, 'GET');
        const statuses = await this.network.agentStatuses();
        const agents: AgentSummary[] = this.network.listAgents().map((descriptor, index) => ({
          name: descriptor.name,
          description: descriptor.description,
          address: descriptor.address,
          skills: descriptor.skills,
          available: statuses[index]?.available ?? false,
        }));
        sendJson(res, 200, { agents });
        return;
      }

      case '/route': {
        assertMethod(req, 'POST');
        const { query } = parseQueryBody(await readJsonBody(req));
        sendJson(res, 200, toDecisionBody(await this.network.route(query)));
        return;
      }

      case '/submit': {
        assertMethod(req, 'POST');
        const { query, fields } = parseQueryBody(await readJsonBody(req));
        const result = await this.network.dispatch(query, fields);
        const body: SubmitBody =
          result.status === 'completed'
            ? { status: 'completed', decision: toDecisionBody(result.decision), response: result.response }
            : { status: 'no-agent', decision: toDecisionBody(result.decision), message: result.message };
        sendJson(res, 200, body);
        return;
      }

      default:
        throw new HttpError(404, 'NOT_FOUND', `No route for ${pathname}`);
    }
  }
}

function decodeAgentName(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch (err) {
    if (err instanceof URIError) {
      throw new HttpError(400, 'INVALID_PATH', `Malformed agent name in path: "${segment}"`);
    }
    throw err;
  }
}
