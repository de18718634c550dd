import type { IncomingMessage, Server, ServerResponse } from 'node:http';
import type { Logger } from '@agentnet/core';
import {
  AgentNetError,
  AgentTransportError,
  InvalidQueryError,
  ProviderUnavailableError,
  TimeoutError,
  UnknownAgentError,
  errorMessage,
  isNonEmptyString,
  isRecord,
} from '@agentnet/core';
import type { ErrorBody, QueryBody, ServerListenOptions } from './types.js';

const MAX_BODY_BYTES = 1024 * 1024;

/** A request-level failure carrying its HTTP status. */
export class HttpError extends AgentNetError {
  constructor(
    public readonly status: number,
    code: string,
    message: string,
  ) {
    super(code, message);
    this.name = 'HttpError';
  }
}

export function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

export function statusForError(err: unknown): number {
  if (err instanceof HttpError) return err.status;
  if (err instanceof InvalidQueryError) return 400;
  if (err instanceof UnknownAgentError) return 404;
  if (err instanceof AgentTransportError) return 502;
  if (err instanceof ProviderUnavailableError) return 503;
  if (err instanceof TimeoutError) return 504;
  return 500;
}

export function sendError(res: ServerResponse, err: unknown, logger: Logger): void {
  // Caller already gone.
  if (res.destroyed) return;
  const status = statusForError(err);
  const body: ErrorBody = {
    error: {
      code: err instanceof AgentNetError ? err.code : 'INTERNAL_ERROR',
      message: errorMessage(err),
    },
  };
  if (status >= 500) {
    logger.error(`Request failed with ${status}: ${body.error.message}`);
  }
  if (res.headersSent) {
    res.end();
    return;
  }
  sendJson(res, status, body);
}

/** Read and parse a JSON request body. An empty body parses as `{}`. */
export function readJsonBody(req: IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let tooLarge = false;

    req.on('data', (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_BODY_BYTES) {
        tooLarge = true;
        return;
      }
      chunks.push(chunk);
    });
    req.on('error', reject);
    req.on('end', () => {
      if (tooLarge) {
        reject(new HttpError(413, 'PAYLOAD_TOO_LARGE', `Request body exceeds ${MAX_BODY_BYTES} bytes`));
        return;
      }
      const text = Buffer.concat(chunks).toString('utf8');
      if (text.trim() === '') {
        resolve({});
        return;
      }
      try {
        resolve(JSON.parse(text));
      } catch {
        reject(new HttpError(400, 'INVALID_JSON', 'Request body is not valid JSON'));
      }
    });
  });
}

/** Validate optional structured inputs: an object of string values. */
export function parseFields(value: unknown): Record<string, string> | undefined {
  if (value === undefined) return undefined;
  if (!isRecord(value)) {
    throw new HttpError(400, 'INVALID_BODY', '"fields" must be an object of strings');
  }
  const fields: Record<string, string> = {};
  for (const [key, fieldValue] of Object.entries(value)) {
    if (typeof fieldValue !== 'string') {
      throw new HttpError(400, 'INVALID_BODY', `"fields.${key}" must be a string`);
    }
    fields[key] = fieldValue;
  }
  return fields;
}

/** Body of the gateway's query routes: a non-empty `query` plus optional `fields`. */
export function parseQueryBody(body: unknown): QueryBody {
  const query = isRecord(body) ? body.query : undefined;
  if (!isRecord(body) || !isNonEmptyString(query)) {
    throw new InvalidQueryError('"query" must be a non-empty string');
  }
  return { query, fields: parseFields(body.fields) };
}

export function listen(server: Server, options: ServerListenOptions): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(options.port, options.host, () => {
      server.off('error', reject);
      resolve();
    });
  });
}

export function close(server: Server): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    server.close((err) => {
      if (err) reject(err);
      else resolve();
    });
  });
}

/** Port the server is bound to, or undefined before listen. */
export function boundPort(server: Server | null): number | undefined {
  const address = server?.address();
  return address && typeof address === 'object' ? address.port : undefined;
}
