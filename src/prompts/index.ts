/**
 * Prompt Library for Strategos
 *
 * The structural analyzer only matches keywords. These prompts hand its
 * result to the calling agent, which revises it and passes the revised
 * analysis back to strategos_plan.
 *
 * Key principle: the agent supplies judgement, the prompts supply structure.
 */

import type { AnalysisResult, ComplexityLevel } from '../types/index.js';
import { ComplexityLevelSchema } from '../types/index.js';

export interface RefinementContext {
  /** Domain labels that select a phase template */
  knownDomains: readonly string[];
}

function bulletList(items: readonly string[], empty: string): string {
  return items.length > 0 ? items.map((item) => `- ${item}`).join('\n') : `- ${empty}`;
}

/**
 * Builds the prompt asking the agent to review a keyword-based analysis
 */
export function buildRefinementPrompt(
  description: string,
  analysis: AnalysisResult,
  context: RefinementContext
): string {
  const levels: readonly ComplexityLevel[] = ComplexityLevelSchema.options;
  const scores = Object.entries(analysis.domainScores ?? {})
    .map(([domain, score]) => `${domain} (${score})`)
    .join(', ');

  return `You are reviewing an automated analysis of a software project before it is turned into an execution plan.

## PROJECT DESCRIPTION
${description}

## AUTOMATED ANALYSIS
- **Domain**: ${analysis.domain ?? 'none detected'}${scores ? ` (candidates: ${scores})` : ''}
- **Complexity**: ${analysis.complexity}
- **Keywords**: ${analysis.keywords.join(', ') || 'none'}
- **Patterns**: ${analysis.patterns.join(', ') || 'none'}

### Suggested technologies
${bulletList(analysis.technologyStack, 'none')}

### Implicit requirements
${bulletList(analysis.implicitRequirements, 'none')}

## YOUR TASK
The analysis above comes from keyword matching and can be wrong. Check it against the description:

1. **Domain**: Pick the label that best fits. Known labels: ${context.knownDomains.join(', ')}. Leave it out when none fits.
2. **Complexity**: One of ${levels.join(', ')}. Judge scope and risk, not description length.
3. **Technology stack**: Keep what the description implies, drop guesses it contradicts.
4. **Implicit requirements**: Add requirements the project clearly needs but does not state.

## OUTPUT FORMAT
Return the revised analysis as JSON and pass it as \`analysis\` to strategos_plan:

\`\`\`json
{
  "domain": "web",
  "complexity": "medium",
  "keywords": ["..."],
  "technologyStack": ["..."],
  "patterns": ["..."],
  "implicitRequirements": ["..."]
}
\`\`\`

## GUIDELINES
- Do not invent features the description does not mention
- Keep keywords and patterns unless they are plainly wrong
- An unknown domain is planned with the generic template`;
}
