import { describe, it, expect } from 'vitest';
import { buildRefinementPrompt } from '../../src/prompts/index.js';
import type { AnalysisResult } from '../../src/types/index.js';

const analysis: AnalysisResult = {
  domain: 'api',
  complexity: 'medium',
  keywords: ['api', 'rest'],
  technologyStack: [],
  patterns: ['integration'],
  implicitRequirements: ['API documentation and versioning strategy'],
  domainScores: { api: 1 },
};

describe('buildRefinementPrompt', () => {
  const prompt = buildRefinementPrompt('A REST API for invoices', analysis, { knownDomains: ['api', 'web'] });

  it('should embed the description and the analysis', () => {
    expect(prompt).toContain('## PROJECT DESCRIPTION\nA REST API for invoices\n');
    expect(prompt).toContain('- **Domain**: api (candidates: api (1))');
    expect(prompt).toContain('- **Keywords**: api, rest');
    expect(prompt).toContain('### Suggested technologies\n- none\n');
    expect(prompt).toContain('### Implicit requirements\n- API documentation and versioning strategy\n');
  });

  it('should list the known domains and complexity levels', () => {
    expect(prompt).toContain('Known labels: api, web.');
    expect(prompt).toContain('One of low, medium, high, very_high.');
  });

  it('should say when no domain was detected', () => {
    const { domain: _domain, domainScores: _scores, ...rest } = analysis;
    const bare = buildRefinementPrompt('Something vague to build', rest, { knownDomains: [] });
    expect(bare).toContain('- **Domain**: none detected\n');
  });
});
