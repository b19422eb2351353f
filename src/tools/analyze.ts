import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { AnalyzeInputSchema, type AnalysisResult, type Registries } from '../types/index.js';
import { analyzeProject } from '../engines/project-analyzer.js';
import { selectTemplate } from '../engines/phase-decomposer.js';
import { buildRefinementPrompt } from '../prompts/index.js';
import { logger } from '../utils/logger.js';

/**
 * Tool definition for project analysis
 */
export const analyzeTool: Tool = {
  name: 'strategos_analyze',
  description: `Classify a project description before planning it.

Detects:
- Domain (web, api, data, mobile, ...) with a confidence per candidate
- Complexity (low, medium, high, very_high)
- Keywords, architecture patterns and likely technologies
- Implicit requirements

The result is keyword-based. It comes with a refinement prompt: review the
analysis, then pass the revised version as \`analysis\` to strategos_plan.`,

  inputSchema: {
    type: 'object',
    properties: {
      description: {
        type: 'string',
        description: 'Natural-language project description (at least 10 characters)',
      },
    },
    required: ['description'],
  },
};

export interface AnalyzeResult {
  analysis: AnalysisResult;
  template: string;
  refinementPrompt: string;
  nextStep: string;
}

/**
 * Handle project analysis
 */
export function handleAnalyze(args: Record<string, unknown>, registries: Registries): AnalyzeResult {
  const input = AnalyzeInputSchema.parse(args);
  const analysis = analyzeProject(input.description, registries.analysis);
  const template = selectTemplate(analysis.domain, registries).name;

  logger.updateContext({ stage: 'analysis', domain: analysis.domain });
  logger.info('Project analyzed', {
    complexity: analysis.complexity,
    template,
    keywords: analysis.keywords.length,
  });

  return {
    analysis,
    template,
    refinementPrompt: buildRefinementPrompt(input.description, analysis, {
      knownDomains: Object.keys(registries.domainIndex).sort(),
    }),
    nextStep: 'Review the analysis, then call strategos_plan with { analysis } or { description }',
  };
}
