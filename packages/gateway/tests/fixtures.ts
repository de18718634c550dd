import { vi } from 'vitest';
import type { Mock } from 'vitest';
import type { AgentDescriptor, AgentEndpoint } from '@agentnet/core';

export const summarizer: AgentDescriptor = {
  name: 'summarizer',
  address: 'http://127.0.0.1:5001',
  description: 'Summarizes text content',
  skills: [
    {
      name: 'Summarize Text',
      description: 'Produce a concise summary of the given text',
      tags: ['summarize', 'summary', 'text'],
      expectedInputs: [{ name: 'text', required: true }],
    },
  ],
};

export const translator: AgentDescriptor = {
  name: 'translator',
  address: 'http://127.0.0.1:5002',
  description: 'Translates text into another language',
  skills: [
    {
      name: 'Translate Text',
      description: 'Translate text into a target language',
      tags: ['translate', 'translation', 'language'],
      expectedInputs: [{ name: 'text', required: true }, { name: 'target_language' }],
    },
  ],
};

type HandleFn = AgentEndpoint['handle'];

export function createEndpoint(
  descriptor: AgentDescriptor,
  impl?: HandleFn,
): { descriptor: AgentDescriptor; handle: Mock<HandleFn> } {
  return {
    descriptor,
    handle: vi.fn<HandleFn>(
      impl ??
        (async (request) => ({
          id: request.id,
          agent: descriptor.name,
          state: 'completed',
          text: `${descriptor.name} handled: ${request.query}`,
        })),
    ),
  };
}

export async function postJson(url: string, body: unknown): Promise<Response> {
  return fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: typeof body === 'string' ? body : JSON.stringify(body),
  });
}
