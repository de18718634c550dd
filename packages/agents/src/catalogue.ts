import type { Skill } from '@agentnet/core';

/** Default description and skills for an agent built on a template. */
export interface CatalogueEntry {
  description: string;
  skills: Skill[];
}

const CATALOGUE: Record<string, CatalogueEntry> = {
  summarize: {
    description: 'Summarizes text content',
    skills: [
      {
        name: 'Summarize Text',
        description: 'Summarize the given text into a concise format',
        tags: ['summarize', 'summary', 'content', 'text'],
        expectedInputs: [{ name: 'text', required: true }],
        template: 'summarize',
      },
    ],
  },
  translate: {
    description: 'Translates text into specified target languages',
    skills: [
      {
        name: 'Translate Text',
        description: 'Translate text to a specified target language',
        tags: ['translate', 'translation', 'language', 'multilingual'],
        expectedInputs: [
          { name: 'text', required: true },
          { name: 'target_language', description: 'Defaults to Spanish', required: false },
        ],
        template: 'translate',
      },
    ],
  },
  'sql-generation': {
    description: 'Generates SQL queries from natural language questions',
    skills: [
      {
        name: 'Generate SQL',
        description: 'Generate a SQL query from a natural language question',
        tags: ['nlq', 'sql', 'generation', 'text2sql', 'query'],
        expectedInputs: [
          { name: 'nlq', required: true },
          { name: 'schema', required: false },
          { name: 'fewshots', required: false },
        ],
        template: 'sql-generation',
      },
    ],
  },
  'nlq-reconstruction': {
    description: 'Refines and reconstructs natural language queries for better SQL generation',
    skills: [
      {
        name: 'Reconstruct NLQ',
        description: 'Refine and reconstruct a natural language question',
        tags: ['nlq', 'reconstruction', 'rewrite', 'question'],
        expectedInputs: [{ name: 'query', required: true }],
        template: 'nlq-reconstruction',
      },
    ],
  },
  'product-description': {
    description: 'Generates compelling product descriptions for e-commerce listings',
    skills: [
      {
        name: 'Write Product Description',
        description: 'Create persuasive and SEO-friendly product descriptions from product data',
        tags: ['ecommerce', 'copywriting', 'product', 'description'],
        expectedInputs: [
          { name: 'product', required: true },
          { name: 'features', required: false },
        ],
        template: 'product-description',
      },
    ],
  },
  gating: {
    description: 'Determines if a natural language query is suitable for SQL generation',
    skills: [
      {
        name: 'Evaluate Query',
        description: 'Evaluate if a natural language query is suitable for SQL generation',
        tags: ['nlq', 'gating', 'evaluation', 'text2sql'],
        expectedInputs: [{ name: 'query', required: true }],
        template: 'gating',
      },
    ],
  },
  'dynamic-fewshots': {
    description: 'Retrieves relevant few-shot examples for SQL generation',
    skills: [
      {
        name: 'Get Few-Shots',
        description: 'Retrieve relevant few-shot examples for SQL generation',
        tags: ['nlq', 'few-shots', 'examples', 'text2sql'],
        expectedInputs: [
          { name: 'query', required: true },
          { name: 'n_examples', description: 'Defaults to 3', required: false },
        ],
        template: 'dynamic-fewshots',
      },
    ],
  },
};

/** Catalogue defaults for a template id, deep-copied so callers may freeze them. */
export function getCatalogueEntry(templateId: string): CatalogueEntry | undefined {
  const entry = CATALOGUE[templateId];
  return entry ? structuredClone(entry) : undefined;
}
