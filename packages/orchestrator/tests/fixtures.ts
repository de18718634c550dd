import { vi } from 'vitest';
import type { Mock } from 'vitest';
import type { AgentDescriptor, Logger, TextGenerator } from '@agentnet/core';

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

export function createGenerator(
  impl: TextGenerator['generate'],
): { id: string; generate: Mock<TextGenerator['generate']> } {
  return { id: 'fake', generate: vi.fn<TextGenerator['generate']>(impl) };
}

export function createLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}
