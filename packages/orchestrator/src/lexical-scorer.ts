import type { AgentDescriptor } from '@agentnet/core';

export interface LexicalWeights {
  /** Points for a query stem found among an agent's skill tags. */
  tagWeight: number;
  /** Points for a query stem found only in descriptions or skill names. */
  textWeight: number;
}

export const DEFAULT_LEXICAL_WEIGHTS: LexicalWeights = { tagWeight: 2, textWeight: 1 };

const STOPWORDS = new Set([
  'a', 'an', 'and', 'are', 'as', 'at', 'be', 'by', 'can', 'could', 'do', 'for',
  'from', 'how', 'i', 'in', 'into', 'is', 'it', 'me', 'my', 'of', 'on', 'or',
  'please', 'some', 'that', 'the', 'this', 'to', 'was', 'what', 'which', 'with',
  'would', 'you', 'your',
]);

/** Checked in order; the first suffix that leaves a stem of 3+ chars is removed. */
const SUFFIXES: ReadonlyArray<readonly [suffix: string, replacement: string]> = [
  ['izations', 'iz'],
  ['ization', 'iz'],
  ['ations', 'at'],
  ['ation', 'at'],
  ['ions', ''],
  ['ion', ''],
  ['ings', ''],
  ['ing', ''],
  ['ers', ''],
  ['er', ''],
  ['ors', ''],
  ['or', ''],
  ['ies', 'y'],
  ['es', ''],
  ['ed', ''],
  ['ly', ''],
  ['s', ''],
  ['e', ''],
];

const MIN_STEM_LENGTH = 3;

/** Crude suffix-stripping stemmer: translate, translation, translator → translat; summarization → summariz. */
export function stem(word: string): string {
  const lower = word.toLowerCase();
  for (const [suffix, replacement] of SUFFIXES) {
    if (lower.endsWith(suffix) && lower.length - suffix.length >= MIN_STEM_LENGTH) {
      return lower.slice(0, lower.length - suffix.length) + replacement;
    }
  }
  return lower;
}

/** Distinct stems of the non-stopword words in `text`, in first-seen order. */
export function tokenize(text: string): string[] {
  const stems = new Set<string>();
  for (const word of text.toLowerCase().split(/[^a-z0-9]+/)) {
    if (word === '' || STOPWORDS.has(word)) continue;
    stems.add(stem(word));
  }
  return [...stems];
}

export interface LexicalMatch {
  agent: AgentDescriptor;
  score: number;
  /** Query stems that contributed to the score. */
  matched: string[];
}

interface AgentVocabulary {
  tags: Set<string>;
  text: Set<string>;
}

/**
 * Deterministic word-overlap scoring of a query against agent
 * descriptors. Each distinct query stem counts once per agent, at the
 * highest weight it earns.
 */
export class LexicalScorer {
  readonly weights: LexicalWeights;
  private readonly vocabularies = new WeakMap<AgentDescriptor, AgentVocabulary>();

  constructor(weights: Partial<LexicalWeights> = {}) {
    this.weights = { ...DEFAULT_LEXICAL_WEIGHTS, ...weights };
  }

  score(queryStems: readonly string[], agent: AgentDescriptor): LexicalMatch {
    const vocabulary = this.vocabularyOf(agent);
    let score = 0;
    const matched: string[] = [];

    for (const queryStem of queryStems) {
      let points = 0;
      if (vocabulary.tags.has(queryStem)) {
        points = Math.max(points, this.weights.tagWeight);
      }
      if (vocabulary.text.has(queryStem)) {
        points = Math.max(points, this.weights.textWeight);
      }
      if (points > 0) {
        score += points;
        matched.push(queryStem);
      }
    }

    return { agent, score, matched };
  }

  /**
   * Highest-scoring agent for the query, or undefined when nothing
   * scores above zero. Ties go to the earlier agent.
   */
  best(query: string, agents: readonly AgentDescriptor[]): LexicalMatch | undefined {
    const queryStems = tokenize(query);
    let best: LexicalMatch | undefined;

    for (const agent of agents) {
      const match = this.score(queryStems, agent);
      if (match.score > 0 && (!best || match.score > best.score)) {
        best = match;
      }
    }

    return best;
  }

  private vocabularyOf(agent: AgentDescriptor): AgentVocabulary {
    let vocabulary = this.vocabularies.get(agent);
    if (!vocabulary) {
      const textParts = [agent.description ?? ''];
      const tags = new Set<string>();
      for (const skill of agent.skills) {
        textParts.push(skill.name, skill.description);
        for (const tag of skill.tags) {
          for (const tagStem of tokenize(tag)) tags.add(tagStem);
        }
      }
      vocabulary = { tags, text: new Set(tokenize(textParts.join(' '))) };
      this.vocabularies.set(agent, vocabulary);
    }
    return vocabulary;
  }
}
