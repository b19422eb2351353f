#!/usr/bin/env tsx
/**
 * Plan a project from the command line and print the plan as YAML
 *
 *   npx tsx scripts/plan-project.ts "<description>" [stage] [--diagrams]
 */
import { stringify } from 'yaml';
import { loadRegistries } from '../src/registry/index.js';
import { runPipeline } from '../src/engines/index.js';
import { PlanStageSchema } from '../src/types/index.js';
import { classifyError } from '../src/utils/errors.js';

const args = process.argv.slice(2);
const includeDiagrams = args.includes('--diagrams');
const [description, stageArg] = args.filter((arg) => !arg.startsWith('--'));

if (!description) {
  console.error('Usage: npx tsx scripts/plan-project.ts "<description>" [stage] [--diagrams]');
  console.error(`Stages: ${PlanStageSchema.options.join(', ')}`);
  process.exit(1);
}

async function main(projectDescription: string): Promise<void> {
  const stage = PlanStageSchema.parse(stageArg ?? 'mission_map');
  const registries = await loadRegistries();
  const plan = runPipeline({ description: projectDescription, stage, includeDiagrams }, registries);
  console.log(stringify(plan));
}

main(description).catch((error: unknown) => {
  const classified = classifyError(error);
  console.error(`${classified.code}: ${classified.message}`);
  process.exit(1);
});
