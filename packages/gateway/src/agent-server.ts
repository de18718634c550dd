import { createServer, type Server, type IncomingMessage, type ServerResponse } from 'node:http';
import type { AgentEndpoint, Logger, TaskRequest } from '@agentnet/core';
import { generateId, isRecord, noopLogger } from '@agentnet/core';
import {
  HttpError,
  boundPort,
  close,
  listen,
  parseFields,
  readJsonBody,
  sendError,
  sendJson,
} from './http-utils.js';
import type { ServerListenOptions } from './types.js';

export interface AgentServerOptions extends ServerListenOptions {
  endpoint: AgentEndpoint;
  logger?: Logger;
}

function parseTaskRequest(body: unknown): TaskRequest {
  if (!isRecord(body)) {
    throw new HttpError(400, 'INVALID_BODY', 'Request body must be a JSON object');
  }
  const { id, query, fields } = body;
  if (typeof query !== 'string') {
    throw new HttpError(400, 'INVALID_BODY', '"query" must be a string');
  }
  if (id !== undefined && typeof id !== 'string') {
    throw new HttpError(400, 'INVALID_BODY', '"id" must be a string');
  }
  return { id: id ?? generateId(), query, fields: parseFields(fields) };
}

/**
 * Serves one agent endpoint over HTTP:
 * `GET /agent.json`, `GET /health` and `POST /tasks/send`.
 */
export class AgentServer {
  private server: Server | null = null;
  private readonly endpoint: AgentEndpoint;
  private readonly logger: Logger;

  constructor(private readonly options: AgentServerOptions) {
    this.endpoint = options.endpoint;
    this.logger = options.logger ?? noopLogger;
  }

  get agentName(): string {
    return this.endpoint.descriptor.name;
  }

  /** Bound port once started. */
  get port(): number | undefined {
    return boundPort(this.server);
  }

  async start(): Promise<void> {
    const server = createServer((req: IncomingMessage, res: ServerResponse) => {
      this.handleRequest(req, res).catch((err: unknown) => sendError(res, err, this.logger));
    });
    await listen(server, this.options);
    this.server = server;
    this.logger.info(`Agent "${this.agentName}" listening on port ${this.port}`);
  }

  async stop(): Promise<void> {
    if (!this.server) return;
    await close(this.server);
    this.server = null;
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const { pathname } = new URL(req.url ?? '/', 'http://localhost');

    switch (pathname) {
      case '/agent.json':
        assertMethod(req, 'GET');
        sendJson(res, 200, this.endpoint.descriptor);
        return;

      case '/health':
        assertMethod(req, 'GET');
        sendJson(res, 200, { status: 'ok', agent: this.agentName });
        return;

      case '/tasks/send': {
        assertMethod(req, 'POST');
        const request = parseTaskRequest(await readJsonBody(req));
        this.logger.debug(`Task ${request.id} received by "${this.agentName}"`);
        // A caller that disconnects before the reply cancels the task.
        const controller = new AbortController();
        res.on('close', () => {
          if (!res.writableFinished) controller.abort();
        });
        sendJson(res, 200, await this.endpoint.handle(request, controller.signal));
        return;
      }

      default:
        throw new HttpError(404, 'NOT_FOUND', `No route for ${pathname}`);
    }
  }
}

export function assertMethod(req: IncomingMessage, method: string): void {
  if (req.method !== method) {
    throw new HttpError(405, 'METHOD_NOT_ALLOWED', `${req.method ?? 'UNKNOWN'} is not allowed here`);
  }
}
