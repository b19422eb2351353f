/**
 * Planning Pipeline
 *
 * Runs the planning stages up to the requested one. Upstream results the
 * caller supplies are used as given; the rest are derived, and only when a
 * later stage consumes them.
 */

import type {
  AnalysisResult,
  DecompositionResult,
  MissionMapResult,
  PlanInput,
  PlanPayload,
  PlanStage,
  Registries,
  TaskGraphResult,
} from '../types/index.js';
import { PLAN_STAGES } from '../types/index.js';
import { PreconditionError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { analyzeProject } from './project-analyzer.js';
import { analyzeDecomposition, decomposePhases } from './phase-decomposer.js';
import { analyzeTaskGraph, buildTaskGraph } from './task-graph-builder.js';
import { createMissionMap } from './mission-map.js';
import { renderDiagrams } from './diagram-renderer.js';

/**
 * Inputs each stage consumes, by payload field name
 */
export const STAGE_REQUIREMENTS: Readonly<Record<PlanStage, readonly string[]>> = {
  analysis: ['description'],
  decomposition: ['analysis'],
  task_graph: ['analysis', 'decomposition'],
  mission_map: ['taskGraph'],
};

export function nextStageOf(stage: PlanStage): PlanStage | null {
  return PLAN_STAGES[PLAN_STAGES.indexOf(stage) + 1] ?? null;
}

type PipelineInput = Pick<PlanInput, 'description' | 'analysis' | 'decomposition' | 'taskGraph' | 'stage'> & {
  includeDiagrams?: boolean | undefined;
};

/**
 * @throws PreconditionError when a stage must be derived but neither a
 *   description nor an analysis was given
 */
export function runPipeline(input: PipelineInput, registries: Registries): PlanPayload {
  const target = input.stage;
  let analysis = input.analysis;
  // Supplied graphs are validated and their derived fields recomputed
  let decomposition = input.decomposition && analyzeDecomposition(input.decomposition);
  let taskGraph = input.taskGraph && analyzeTaskGraph(input.taskGraph.tasks);
  let missionMap: MissionMapResult | undefined;

  const requireAnalysis = (stage: PlanStage): AnalysisResult => {
    if (!analysis) {
      if (!input.description) {
        throw new PreconditionError(stage, ['description or analysis']);
      }
      analysis = analyzeProject(input.description, registries.analysis);
    }
    logger.updateContext({ domain: analysis.domain });
    return analysis;
  };

  const requireDecomposition = (): DecompositionResult => {
    decomposition ??= decomposePhases(requireAnalysis('decomposition'), registries);
    return decomposition;
  };

  const requireTaskGraph = (): TaskGraphResult => {
    taskGraph ??= buildTaskGraph(requireDecomposition(), requireAnalysis('task_graph'), registries);
    return taskGraph;
  };

  logger.updateContext({ stage: target });

  switch (target) {
    case 'analysis':
      requireAnalysis('analysis');
      break;
    case 'decomposition':
      requireDecomposition();
      break;
    case 'task_graph':
      requireTaskGraph();
      break;
    case 'mission_map':
      missionMap = createMissionMap(requireTaskGraph(), registries);
      break;
  }

  const nextStage = nextStageOf(target);
  const payload: PlanPayload = {
    stage: target,
    ...(analysis && { analysis }),
    ...(decomposition && { decomposition }),
    ...(taskGraph && { taskGraph }),
    ...(missionMap && { missionMap }),
    nextStage,
    nextStageRequirements: nextStage ? [...STAGE_REQUIREMENTS[nextStage]] : [],
  };

  if (input.includeDiagrams) {
    payload.diagrams = renderDiagrams({ decomposition, taskGraph, missionMap });
  }

  logger.info('Plan stage completed', {
    stage: target,
    phases: decomposition?.phases.length,
    tasks: missionMap?.tasks.length ?? taskGraph?.taskCount,
  });

  return payload;
}
