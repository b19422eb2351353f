import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { PlanInputSchema, PLAN_STAGES, type PlanPayload, type Registries } from '../types/index.js';
import { runPipeline } from '../engines/pipeline.js';

/**
 * Tool definition for staged planning
 */
export const planTool: Tool = {
  name: 'strategos_plan',
  description: `Turn a project into phases, a task graph and a resourced mission plan.

Stages run in order: analysis -> decomposition -> task_graph -> mission_map.
Runs every stage up to \`stage\` (default mission_map). Results of earlier
stages can be passed back in to resume: a revised \`analysis\`, a
\`decomposition\` or a \`taskGraph\`. The response names the next stage and
the inputs it needs.

The mission map pairs every implementation task with a test-writing task
that runs first, assigns a resource profile and priority to each task, and
lists parallel groups, execution order, utilization and conflicts.`,

  inputSchema: {
    type: 'object',
    properties: {
      description: {
        type: 'string',
        description: 'Project description. Analyzed when no analysis is given.',
      },
      analysis: {
        type: 'object',
        description: 'AnalysisResult from strategos_analyze, possibly revised',
      },
      decomposition: {
        type: 'object',
        description: 'DecompositionResult from an earlier call',
      },
      taskGraph: {
        type: 'object',
        description: 'TaskGraphResult from an earlier call',
      },
      stage: {
        type: 'string',
        enum: [...PLAN_STAGES],
        description: 'Last stage to run',
        default: 'mission_map',
      },
      includeDiagrams: {
        type: 'boolean',
        description: 'Add Mermaid diagrams and a text dependency matrix',
        default: false,
      },
      format: {
        type: 'string',
        enum: ['json', 'yaml'],
        description: 'Response encoding',
        default: 'json',
      },
    },
  },
};

/**
 * Handle a planning request
 */
export function handlePlan(args: Record<string, unknown>, registries: Registries): PlanPayload {
  const input = PlanInputSchema.parse(args);
  return runPipeline(input, registries);
}
