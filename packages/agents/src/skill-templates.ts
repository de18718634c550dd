import type { PromptMessages, TaskRequest } from '@agentnet/core';
import { extractTargetLanguage } from './language.js';

/** Fixed instruction template behind one agent skill. */
export interface SkillTemplate {
  id: string;
  /** Shown to the caller when the task carries nothing to work on. */
  missingInputMessage: string;
  /** Whether the request carries something to work on. Default: a non-blank query. */
  hasInput?(request: TaskRequest): boolean;
  build(request: TaskRequest): PromptMessages;
}

export const summarizeTemplate: SkillTemplate = {
  id: 'summarize',
  missingInputMessage: 'Please provide text content to summarize.',
  build: (request) => ({
    system: 'You are a helpful assistant that summarizes text.',
    user: `Summarize the following text in a concise manner:\n\n${request.query}`,
  }),
};

export const translateTemplate: SkillTemplate = {
  id: 'translate',
  missingInputMessage: 'Please provide text content to translate and a target language.',
  hasInput: (request) => extractTargetLanguage(request.query).text !== '',
  build: (request) => {
    const parsed = extractTargetLanguage(request.query);
    const language = request.fields?.['target_language']?.trim() || parsed.language;
    return {
      system: 'You are a helpful translator assistant. Reply with the translation only.',
      user: `Translate the following text to ${language}:\n\n${parsed.text}`,
    };
  },
};

export const sqlGenerationTemplate: SkillTemplate = {
  id: 'sql-generation',
  missingInputMessage:
    'Please provide a natural language query, and optionally a schema and few-shot examples.',
  build: (request) => {
    const sections = [`Question: ${request.query}`];
    const schema = request.fields?.['schema'];
    const fewshots = request.fields?.['fewshots'];
    if (schema) sections.push(`Schema:\n${schema}`);
    if (fewshots) sections.push(`Examples (question and SQL pairs):\n${fewshots}`);
    return {
      system:
        'You translate natural language questions into a single ANSI SQL query. '
        + 'Use only tables and columns from the schema when one is given. '
        + 'Reply with the SQL statement only, without commentary or code fences.',
      user: sections.join('\n\n'),
    };
  },
};

export const nlqReconstructionTemplate: SkillTemplate = {
  id: 'nlq-reconstruction',
  missingInputMessage: 'Please provide a natural language query to reconstruct.',
  build: (request) => ({
    system:
      'You refine terse or ambiguous analytics questions into one clear, complete question '
      + 'suitable for SQL generation. Keep the original intent, name the measure, the '
      + 'grouping and the time range when they are implied, and end with a question mark. '
      + 'Reply with the rewritten question only.',
    user: request.query,
  }),
};

export const productDescriptionTemplate: SkillTemplate = {
  id: 'product-description',
  missingInputMessage: 'Please provide product details to describe.',
  build: (request) => {
    const details = Object.entries(request.fields ?? {})
      .map(([key, value]) => `- ${key}: ${value}`)
      .join('\n');
    return {
      system:
        'You write persuasive, SEO-friendly product descriptions for e-commerce listings. '
        + 'Keep to the facts given and write two short paragraphs.',
      user: details ? `${request.query}\n\nProduct data:\n${details}` : request.query,
    };
  },
};

export const gatingTemplate: SkillTemplate = {
  id: 'gating',
  missingInputMessage: 'Please provide a natural language query to evaluate.',
  build: (request) => ({
    system:
      'You decide whether a natural language question can be answered with a single SQL query '
      + 'over a business database (sales, orders, customers, products). Requests for explanations, '
      + 'how-to questions and data changes are not suitable. Reply with JSON only: '
      + '{"proceed": true|false, "confidence": <number between 0 and 1>, "reason": "<one sentence>"}',
    user: request.query,
  }),
};

export const DEFAULT_FEWSHOT_COUNT = 3;

interface FewshotExample {
  nlq: string;
  sql: string;
}

const FEWSHOT_EXAMPLES: readonly FewshotExample[] = [
  {
    nlq: 'How many orders were placed yesterday?',
    sql: "SELECT COUNT(*) FROM orders WHERE order_date = CURRENT_DATE - INTERVAL '1 day'",
  },
  {
    nlq: 'Which three products sold the most units this year?',
    sql: "SELECT p.name, SUM(o.quantity) AS units FROM order_items o JOIN products p ON p.id = o.product_id "
      + "WHERE o.created_at >= DATE_TRUNC('year', CURRENT_DATE) GROUP BY p.name ORDER BY units DESC LIMIT 3",
  },
  {
    nlq: 'What is the average basket value per store?',
    sql: 'SELECT store_id, AVG(total) AS avg_basket FROM orders GROUP BY store_id',
  },
  {
    nlq: 'Show monthly revenue for the past twelve months',
    sql: "SELECT DATE_TRUNC('month', order_date) AS month, SUM(total) AS revenue FROM orders "
      + "WHERE order_date >= CURRENT_DATE - INTERVAL '12 months' GROUP BY month ORDER BY month",
  },
  {
    nlq: 'List customers who have not ordered since January',
    sql: 'SELECT c.name FROM customers c WHERE NOT EXISTS (SELECT 1 FROM orders o '
      + "WHERE o.customer_id = c.id AND o.order_date >= DATE_TRUNC('year', CURRENT_DATE))",
  },
  {
    nlq: 'Which products are below their reorder level?',
    sql: 'SELECT name, stock FROM products WHERE stock < reorder_level',
  },
];

export const dynamicFewshotsTemplate: SkillTemplate = {
  id: 'dynamic-fewshots',
  missingInputMessage: 'Please provide a natural language query to find examples for.',
  build: (request) => {
    const requested = Number.parseInt(request.fields?.['n_examples'] ?? '', 10);
    const count = Number.isInteger(requested) && requested > 0
      ? Math.min(requested, FEWSHOT_EXAMPLES.length)
      : DEFAULT_FEWSHOT_COUNT;
    const bank = FEWSHOT_EXAMPLES
      .map((example, i) => `${i + 1}. Q: ${example.nlq}\n   SQL: ${example.sql}`)
      .join('\n');
    return {
      system:
        `You pick the ${count} examples most similar to a new question from an example bank, `
        + 'to be used as few-shot prompts for SQL generation. Copy the examples unchanged. '
        + 'Reply with a JSON array only: [{"nlq": "...", "sql": "..."}]',
      user: `Question: ${request.query}\n\nExample bank:\n${bank}`,
    };
  },
};

const TEMPLATES = new Map<string, SkillTemplate>(
  [
    summarizeTemplate,
    translateTemplate,
    sqlGenerationTemplate,
    nlqReconstructionTemplate,
    productDescriptionTemplate,
    gatingTemplate,
    dynamicFewshotsTemplate,
  ].map((t) => [t.id, t]),
);

export const SKILL_TEMPLATE_IDS: readonly string[] = [...TEMPLATES.keys()];

export function getSkillTemplate(id: string): SkillTemplate | undefined {
  return TEMPLATES.get(id);
}
