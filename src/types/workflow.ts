import { z } from 'zod';
import { AnalysisResultSchema, type AnalysisResult } from './analysis.js';
import { DecompositionResultSchema, type DecompositionResult } from './phase.js';
import { TaskGraphResultSchema, type TaskGraphResult } from './task.js';
import type { MissionMapResult } from './mission.js';

/**
 * Pipeline stages, in execution order
 */
export const PlanStageSchema = z.enum(['analysis', 'decomposition', 'task_graph', 'mission_map']);

export type PlanStage = z.infer<typeof PlanStageSchema>;

export const PLAN_STAGES: readonly PlanStage[] = PlanStageSchema.options;

/**
 * Input for strategos_plan
 */
export const PlanInputSchema = z
  .object({
    description: z.string().trim().min(10, 'Project description must be at least 10 characters').optional(),
    analysis: AnalysisResultSchema.optional(),
    decomposition: DecompositionResultSchema.optional(),
    taskGraph: TaskGraphResultSchema.optional(),
    stage: PlanStageSchema.default('mission_map'),
    includeDiagrams: z.boolean().default(false),
    format: z.enum(['json', 'yaml']).default('json'),
  });

export type PlanInput = z.infer<typeof PlanInputSchema>;

/**
 * Mermaid and ASCII renderings of a plan
 */
export interface PlanDiagrams {
  phaseHierarchy?: string;
  taskGraph?: string;
  timeline?: string;
  dependencyMatrix?: string;
}

/**
 * Accumulated output of one pipeline run
 */
export interface PlanPayload {
  stage: PlanStage;
  analysis?: AnalysisResult;
  decomposition?: DecompositionResult;
  taskGraph?: TaskGraphResult;
  missionMap?: MissionMapResult;
  diagrams?: PlanDiagrams;
  nextStage: PlanStage | null;
  nextStageRequirements: string[];
}
