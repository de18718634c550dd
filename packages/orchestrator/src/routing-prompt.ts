import type { AgentDescriptor, PromptMessages } from '@agentnet/core';
import { isRecord } from '@agentnet/core';

/** Parsed form of the model's routing reply. */
export interface RoutingReply {
  /** Chosen agent name, or null when the model found no fit. */
  agent: string | null;
  confidence: number;
  rationale: string;
}

const REPLY_FORMAT =
  '{"agent": "<agent name or null>", "confidence": <number between 0 and 1>, "rationale": "<one sentence>"}';

function describeAgent(agent: AgentDescriptor, position: number): string {
  const lines = [`${position}. ${agent.name}${agent.description ? `: ${agent.description}` : ''}`];
  for (const skill of agent.skills) {
    const details: string[] = [];
    if (skill.tags.length > 0) details.push(`tags: ${skill.tags.join(', ')}`);
    if (skill.expectedInputs.length > 0) {
      details.push(`inputs: ${skill.expectedInputs.map((input) => input.name).join(', ')}`);
    }
    const suffix = details.length > 0 ? ` (${details.join('; ')})` : '';
    lines.push(`   - Skill "${skill.name}": ${skill.description}${suffix}`);
  }
  return lines.join('\n');
}

/** Prompt asking a model to pick one agent for `query`, agents listed in registry order. */
export function buildRoutingPrompt(
  query: string,
  agents: readonly AgentDescriptor[],
): Required<PromptMessages> {
  const system = [
    'You are a query router for a network of text-processing agents.',
    "Choose the single agent best suited to handle the user's query, using each agent's description, skills and tags.",
    '',
    'Available agents:',
    agents.map((agent, index) => describeAgent(agent, index + 1)).join('\n'),
    '',
    'Guidelines:',
    '- Pick the agent whose skills match the primary intent of the query.',
    '- Only use agent names from the list above.',
    '- If no agent fits, answer with null for "agent" and a confidence of 0.',
    '',
    `Reply with a JSON object only: ${REPLY_FORMAT}`,
  ].join('\n');

  return { system, user: query };
}

function stripCodeFences(text: string): string {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(text);
  return fenced?.[1] ?? text;
}

/** Extract the first balanced JSON object, ignoring braces inside strings. */
function extractJsonObject(text: string): string | undefined {
  const start = text.indexOf('{');
  if (start === -1) return undefined;

  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < text.length; i++) {
    const char = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (char === '\\') escaped = true;
      else if (char === '"') inString = false;
      continue;
    }
    if (char === '"') inString = true;
    else if (char === '{') depth++;
    else if (char === '}') {
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }
  return undefined;
}

/**
 * Parse a routing reply. Returns undefined when the reply is not a JSON
 * object, `agent` is neither a string nor null, or `confidence` is not
 * a finite number. Confidence is clamped into [0, 1].
 */
export function parseRoutingReply(reply: string): RoutingReply | undefined {
  const json = extractJsonObject(stripCodeFences(reply));
  if (json === undefined) return undefined;

  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch {
    return undefined;
  }
  if (!isRecord(value)) return undefined;

  const { agent, confidence, rationale } = value;
  if (agent !== null && typeof agent !== 'string') return undefined;
  if (typeof confidence !== 'number' || !Number.isFinite(confidence)) return undefined;

  const name = typeof agent === 'string' ? agent.trim() : null;
  return {
    agent: name === '' ? null : name,
    confidence: Math.min(1, Math.max(0, confidence)),
    rationale: typeof rationale === 'string' ? rationale : '',
  };
}
