/**
 * Engines Index
 *
 * Exports the planning engines, leaf first.
 */

export {
  parseDurationDays,
  formatDays,
  scaleDuration,
  parseEffortDays,
  estimateVerificationEffort,
  formatEffortTotal,
} from './duration.js';

export {
  toDependencyMatrix,
  assertUniqueIds,
  assertDependenciesExist,
  findCycle,
  assertAcyclic,
  assertValidGraph,
  computeDepths,
  computeDependents,
  type DependencyMatrix,
  type GraphNode,
  type GraphKind,
} from './graph.js';

export { analyzeProject } from './project-analyzer.js';

export { resolvePhaseType } from './phase-type.js';

export {
  decomposePhases,
  analyzeDecomposition,
  selectTemplate,
  findPhaseCriticalPath,
  findParallelOpportunities,
} from './phase-decomposer.js';

export { buildTaskGraph, analyzeTaskGraph, emptyTaskGraph } from './task-graph-builder.js';

export { injectVerification, needsVerification } from './verification-injector.js';

export { assignResources, calculatePriority, scoreProfile } from './resource-assigner.js';

export {
  createParallelGroups,
  labelAssignments,
  generateExecutionOrder,
  type ParallelGroups,
} from './schedule-generator.js';

export { analyzeUtilization, totalEffortEstimate, type UtilizationReport } from './utilization-analyzer.js';

export { createMissionMap } from './mission-map.js';

export { renderDiagrams, type DiagramOptions } from './diagram-renderer.js';

export { runPipeline, nextStageOf, STAGE_REQUIREMENTS } from './pipeline.js';
