import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { Registries, ResourceProfile, ScoringWeights } from '../types/index.js';
import { NotFoundError } from '../utils/errors.js';

const TemplatesInputSchema = z.object({
  template: z.string().optional(),
});

/**
 * Tool definition for registry listing
 */
export const templatesTool: Tool = {
  name: 'strategos_templates',
  description: `List the planning registries the server loaded.

Returns domain labels and the template each selects, phase templates with
their phases, phase types with their task suffixes, resource profiles and
scoring weights. Pass \`template\` to list a single phase template.`,

  inputSchema: {
    type: 'object',
    properties: {
      template: {
        type: 'string',
        description: 'Name of one phase template to list',
      },
    },
  },
};

interface TemplateSummary {
  name: string;
  description: string;
  domains: string[];
  phases: Array<{ id: string; name: string; estimatedDuration: string; dependencies: string[] }>;
}

interface TemplatesResult {
  domains: Record<string, string>;
  templates: TemplateSummary[];
  phaseTypes: Array<{ phaseType: string; aliases: string[]; tasks: string[] }>;
  profiles: ResourceProfile[];
  weights: ScoringWeights;
}

/**
 * Handle registry listing
 */
export function handleTemplates(args: Record<string, unknown>, registries: Registries): TemplatesResult {
  const input = TemplatesInputSchema.parse(args);

  let templates = Object.values(registries.phaseTemplates);
  if (input.template !== undefined) {
    const template = registries.phaseTemplates[input.template];
    if (!template) {
      throw new NotFoundError('Template', input.template, {
        available: Object.keys(registries.phaseTemplates),
      });
    }
    templates = [template];
  }

  return {
    domains: { ...registries.domainIndex },
    templates: templates.map((template) => ({
      name: template.name,
      description: template.description,
      domains: [...template.domains],
      phases: template.phases.map((phase) => ({
        id: phase.id,
        name: phase.name,
        estimatedDuration: phase.estimatedDuration ?? template.baseDuration,
        dependencies: [...phase.dependencies],
      })),
    })),
    phaseTypes: registries.phaseTypes.map((phaseType) => ({
      phaseType: phaseType.phaseType,
      aliases: [...phaseType.aliases],
      tasks: phaseType.tasks.map((task) => task.idSuffix),
    })),
    profiles: [...registries.profiles],
    weights: registries.weights,
  };
}
