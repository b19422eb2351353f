/**
 * Strategos Type Definitions
 *
 * Central export for all types used across the system.
 */

export {
  type AnalysisResult,
  type AnalyzeInput,
  type ComplexityLevel,
  AnalysisResultSchema,
  AnalyzeInputSchema,
  ComplexityLevelSchema,
} from './analysis.js';

export {
  type Phase,
  type DecompositionResult,
  PhaseSchema,
  DecompositionResultSchema,
} from './phase.js';

export {
  type Task,
  type TaskGraphResult,
  TaskSchema,
  TaskGraphResultSchema,
  VERIFICATION_PREFIX,
  IMPLEMENTATION_PREFIX,
  isVerificationTask,
  pairedVerificationId,
  withDependencies,
} from './task.js';

export {
  type ResourceAssignment,
  type ResourceUtilization,
  type ResourceConflict,
  type WorkloadBalance,
  type EfficiencyLabel,
  type MissionMapResult,
  ResourceAssignmentSchema,
  ResourceUtilizationSchema,
  ResourceConflictSchema,
  WorkloadBalanceSchema,
  EfficiencyLabelSchema,
  MissionMapResultSchema,
} from './mission.js';

export {
  type ComplexityMultipliers,
  type PhaseTemplateEntry,
  type PhaseTemplate,
  type TaskTemplateEntry,
  type PhaseTypeTemplate,
  type ResourceProfile,
  type AssignmentWeights,
  type PriorityWeights,
  type ScoringWeights,
  type AnalysisKeywords,
  type Registries,
  ComplexityMultipliersSchema,
  PhaseTemplateEntrySchema,
  PhaseTemplateSchema,
  TaskTemplateEntrySchema,
  PhaseTypeTemplateSchema,
  ResourceProfileSchema,
  ProfileRegistryFileSchema,
  AssignmentWeightsSchema,
  PriorityWeightsSchema,
  ScoringWeightsSchema,
  AnalysisKeywordsSchema,
} from './registry.js';

export {
  type PlanStage,
  type PlanInput,
  type PlanDiagrams,
  type PlanPayload,
  PlanStageSchema,
  PlanInputSchema,
  PLAN_STAGES,
} from './workflow.js';
