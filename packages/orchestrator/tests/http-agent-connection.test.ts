import { describe, it, expect, vi } from 'vitest';
import { AgentTransportError, ProviderUnavailableError } from '@agentnet/core';
import { HttpAgentConnection, parseTaskResponse } from '../src/http-agent-connection.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function createConnection(impl: typeof fetch) {
  const fetchMock = vi.fn<typeof fetch>(impl);
  const connection = new HttpAgentConnection({
    agentName: 'translator',
    address: 'http://127.0.0.1:5002/',
    fetch: fetchMock,
  });
  return { connection, fetchMock };
}

const task = { id: 'task-1', query: 'Translate this text to French: Hello' };

describe('HttpAgentConnection', () => {
  it('posts the task to /tasks/send and returns the parsed response', async () => {
    const { connection, fetchMock } = createConnection(async () =>
      jsonResponse({ id: 'task-1', agent: 'translator', state: 'completed', text: 'Bonjour' }),
    );

    const response = await connection.send(task);

    expect(response).toEqual({ id: 'task-1', agent: 'translator', state: 'completed', text: 'Bonjour' });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe('http://127.0.0.1:5002/tasks/send');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe(JSON.stringify(task));
  });

  it('maps a provider outage reported by the agent to ProviderUnavailableError', async () => {
    const { connection } = createConnection(async () =>
      jsonResponse({ error: { code: 'PROVIDER_UNAVAILABLE', message: 'All text generation providers failed' } }, 503),
    );

    const error = await connection.send(task).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ProviderUnavailableError);
    expect(error).toHaveProperty('message', 'All text generation providers failed');
  });

  it('maps other error statuses to AgentTransportError', async () => {
    const { connection } = createConnection(async () =>
      jsonResponse({ error: { code: 'INTERNAL', message: 'boom' } }, 500),
    );

    const error = await connection.send(task).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(AgentTransportError);
    expect(error).toHaveProperty('status', 500);
    expect(error).toHaveProperty('message', 'Agent "translator": HTTP 500: boom');
  });

  it('wraps network failures', async () => {
    const { connection } = createConnection(async () => {
      throw new TypeError('fetch failed');
    });

    await expect(connection.send(task)).rejects.toThrow(
      'Agent "translator": Unreachable at http://127.0.0.1:5002: fetch failed',
    );
  });

  it('rejects a response that is not a task response', async () => {
    const { connection } = createConnection(async () => jsonResponse({ ok: true }));

    await expect(connection.send(task)).rejects.toThrow(AgentTransportError);
  });

  it('reports availability from the health route', async () => {
    const healthy = createConnection(async () => jsonResponse({ status: 'ok' }));
    const down = createConnection(async () => {
      throw new TypeError('fetch failed');
    });

    await expect(healthy.connection.isAvailable()).resolves.toBe(true);
    expect(healthy.fetchMock.mock.calls[0]?.[0]).toBe('http://127.0.0.1:5002/health');
    await expect(down.connection.isAvailable()).resolves.toBe(false);
  });
});

describe('parseTaskResponse', () => {
  it('accepts both task states and rejects anything else', () => {
    expect(parseTaskResponse({ id: 'a', agent: 'b', state: 'input-required', text: 'c' })?.state).toBe(
      'input-required',
    );
    expect(parseTaskResponse({ id: 'a', agent: 'b', state: 'failed', text: 'c' })).toBeUndefined();
    expect(parseTaskResponse(['a'])).toBeUndefined();
  });
});
