import { describe, it, expect } from 'vitest';
import {
  dynamicFewshotsTemplate,
  gatingTemplate,
  getSkillTemplate,
  productDescriptionTemplate,
  sqlGenerationTemplate,
  summarizeTemplate,
  translateTemplate,
  SKILL_TEMPLATE_IDS,
} from '../src/skill-templates.js';

describe('skill templates', () => {
  it('registers every built-in template by id', () => {
    expect(SKILL_TEMPLATE_IDS).toEqual([
      'summarize',
      'translate',
      'sql-generation',
      'nlq-reconstruction',
      'product-description',
      'gating',
      'dynamic-fewshots',
    ]);
    expect(getSkillTemplate('translate')).toBe(translateTemplate);
    expect(getSkillTemplate('poetry')).toBeUndefined();
  });

  it('summarize embeds the query', () => {
    expect(summarizeTemplate.build({ id: 't1', query: 'Long article' })).toEqual({
      system: 'You are a helpful assistant that summarizes text.',
      user: 'Summarize the following text in a concise manner:\n\nLong article',
    });
  });

  it('translate parses the language from the query', () => {
    const prompt = translateTemplate.build({ id: 't1', query: 'Translate this text to French: Hello' });
    expect(prompt.user).toBe('Translate the following text to French:\n\nHello');
  });

  it('translate prefers an explicit target_language field', () => {
    const prompt = translateTemplate.build({
      id: 't1',
      query: 'Translate this text to French: Hello',
      fields: { target_language: 'Dutch' },
    });
    expect(prompt.user).toBe('Translate the following text to Dutch:\n\nHello');
  });

  it('sql-generation appends schema and few-shot sections when present', () => {
    const bare = sqlGenerationTemplate.build({ id: 't1', query: 'total sales last month' });
    expect(bare.user).toBe('Question: total sales last month');

    const full = sqlGenerationTemplate.build({
      id: 't2',
      query: 'total sales last month',
      fields: { schema: 'sales(id, amount, sale_date)', fewshots: '[]' },
    });
    expect(full.user).toBe(
      'Question: total sales last month\n\nSchema:\nsales(id, amount, sale_date)\n\n'
      + 'Examples (question and SQL pairs):\n[]',
    );
  });

  it('product-description lists structured product data', () => {
    const prompt = productDescriptionTemplate.build({
      id: 't1',
      query: 'Write a listing',
      fields: { product: 'Ceramic mug', colour: 'blue' },
    });
    expect(prompt.user).toBe('Write a listing\n\nProduct data:\n- product: Ceramic mug\n- colour: blue');
  });

  it('translate needs text beyond the instruction', () => {
    expect(translateTemplate.hasInput?.({ id: 't1', query: 'Translate to French' })).toBe(false);
    expect(translateTemplate.hasInput?.({ id: 't2', query: 'Translate to French: Hello' })).toBe(true);
  });

  it('gating asks for a JSON verdict on the question', () => {
    const prompt = gatingTemplate.build({ id: 't1', query: 'How many orders shipped last week?' });

    expect(prompt.user).toBe('How many orders shipped last week?');
    expect(prompt.system).toContain('{"proceed": true|false');
  });

  it('dynamic-fewshots lists the example bank and the requested count', () => {
    const prompt = dynamicFewshotsTemplate.build({
      id: 't1',
      query: 'monthly revenue by store',
      fields: { n_examples: '2' },
    });

    expect(prompt.system).toMatch(/^You pick the 2 examples most similar/);
    expect(prompt.user).toMatch(/^Question: monthly revenue by store\n\nExample bank:\n1\. Q: How many orders/);
    expect(prompt.user).toContain('6. Q: Which products are below their reorder level?');
  });

  it('dynamic-fewshots falls back to three examples on a bad count', () => {
    const prompt = dynamicFewshotsTemplate.build({ id: 't1', query: 'q', fields: { n_examples: 'many' } });
    expect(prompt.system).toMatch(/^You pick the 3 examples/);
  });
});
