import type { AgentDescriptor, Logger, RoutingDecision, TextGenerator } from '@agentnet/core';
import {
  EmptyRegistryError,
  InvalidQueryError,
  errorMessage,
  isNonEmptyString,
  noopLogger,
} from '@agentnet/core';
import type { AgentDescriptorRegistry } from './agent-registry.js';
import { LexicalScorer, tokenize } from './lexical-scorer.js';
import type { LexicalWeights } from './lexical-scorer.js';
import { buildRoutingPrompt, parseRoutingReply } from './routing-prompt.js';

/** Options for the AgentRouter. */
export interface AgentRouterOptions {
  /** Model used for the primary decision. Without one the router is lexical only. */
  generator?: TextGenerator;
  logger?: Logger;
  /** Model decisions below this confidence select nothing. Default: 0. */
  minConfidence?: number;
  weights?: Partial<LexicalWeights>;
}

/**
 * Picks the agent best suited to a query. Asks the configured model
 * first and falls back to lexical scoring when the model call fails or
 * its reply cannot be parsed.
 */
export class AgentRouter {
  private readonly generator: TextGenerator | undefined;
  private readonly logger: Logger;
  private readonly minConfidence: number;
  private readonly scorer: LexicalScorer;

  constructor(options: AgentRouterOptions = {}) {
    this.generator = options.generator;
    this.logger = options.logger ?? noopLogger;
    this.minConfidence = options.minConfidence ?? 0;
    this.scorer = new LexicalScorer(options.weights);
  }

  async select(
    query: string,
    registry: AgentDescriptorRegistry,
    signal?: AbortSignal,
  ): Promise<RoutingDecision> {
    if (!isNonEmptyString(query)) {
      throw new InvalidQueryError();
    }
    const agents = registry.all();
    if (agents.length === 0) {
      throw new EmptyRegistryError();
    }

    if (!this.generator) {
      return this.selectLexically(query, agents);
    }

    let reply: string;
    try {
      reply = await this.generator.generate(buildRoutingPrompt(query, agents), {
        temperature: 0,
        responseFormat: 'json',
        signal,
      });
    } catch (err) {
      if (signal?.aborted) throw err;
      this.logger.warn(`Routing model failed, using lexical routing: ${errorMessage(err)}`);
      return this.selectLexically(query, agents);
    }

    const parsed = parseRoutingReply(reply);
    if (!parsed) {
      this.logger.warn('Routing model returned a malformed decision, using lexical routing');
      return this.selectLexically(query, agents);
    }

    if (parsed.agent === null) {
      return noSelection('llm', parsed.rationale || 'No registered agent fits the query');
    }

    const selected = registry.find(parsed.agent);
    if (!selected) {
      this.logger.warn(`Routing model chose unregistered agent "${parsed.agent}"`);
      return noSelection('llm', `Model chose unregistered agent "${parsed.agent}"`);
    }

    if (parsed.confidence < this.minConfidence) {
      return noSelection(
        'llm',
        `Confidence ${parsed.confidence} for "${selected.name}" is below ${this.minConfidence}`,
      );
    }

    this.logger.debug(`Routed to "${selected.name}" (confidence ${parsed.confidence})`);
    return {
      selectedAgent: selected,
      confidence: parsed.confidence,
      rationale: parsed.rationale,
      strategy: 'llm',
    };
  }

  /** Deterministic word-overlap routing. */
  selectLexically(query: string, agents: readonly AgentDescriptor[]): RoutingDecision {
    const match = this.scorer.best(query, agents);
    if (!match) {
      return noSelection('lexical', 'No agent shares vocabulary with the query');
    }

    const queryStems = tokenize(query);
    return {
      selectedAgent: match.agent,
      confidence: match.matched.length / queryStems.length,
      rationale: `Matched ${match.matched.join(', ')} (score ${match.score})`,
      strategy: 'lexical',
    };
  }
}

function noSelection(strategy: RoutingDecision['strategy'], rationale: string): RoutingDecision {
  return { confidence: 0, rationale, strategy };
}
