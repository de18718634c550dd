import { describe, it, expect } from 'vitest';
import { getCatalogueEntry } from '../src/catalogue.js';
import { SKILL_TEMPLATE_IDS } from '../src/skill-templates.js';

describe('getCatalogueEntry', () => {
  it('has an entry whose skills point back at each template', () => {
    for (const id of SKILL_TEMPLATE_IDS) {
      const entry = getCatalogueEntry(id);
      expect(entry?.skills[0]?.template).toBe(id);
    }
  });

  it('describes the query gate for the SQL pipeline', () => {
    expect(getCatalogueEntry('gating')).toEqual({
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
    });
  });

  it('returns independent copies', () => {
    const first = getCatalogueEntry('summarize');
    first?.skills[0]?.tags.push('changed');

    expect(getCatalogueEntry('summarize')?.skills[0]?.tags).toEqual(['summarize', 'summary', 'content', 'text']);
  });

  it('returns undefined for an unknown template', () => {
    expect(getCatalogueEntry('poetry')).toBeUndefined();
  });
});
