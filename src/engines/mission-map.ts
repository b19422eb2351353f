/**
 * Mission Mapper
 *
 * Turns a task graph into an executable mission plan: verification
 * injection, resource assignment, scheduling, utilization analysis.
 */

import type { MissionMapResult, Registries, TaskGraphResult } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { assertValidGraph, toDependencyMatrix } from './graph.js';
import { injectVerification } from './verification-injector.js';
import { assignResources } from './resource-assigner.js';
import { createParallelGroups, generateExecutionOrder, labelAssignments } from './schedule-generator.js';
import { analyzeUtilization, totalEffortEstimate } from './utilization-analyzer.js';

/**
 * @throws DependencyError when a task depends on an unknown task
 * @throws CycleError when the graph, with verification pairs added, is cyclic
 * @throws ConfigurationError when no resource profile is configured
 */
export function createMissionMap(
  taskGraph: Pick<TaskGraphResult, 'tasks'>,
  registries: Pick<Registries, 'profiles' | 'weights'>
): MissionMapResult {
  assertValidGraph('task', taskGraph.tasks);

  const { tasks, pairs } = injectVerification(taskGraph.tasks);
  assertValidGraph('task', tasks);

  const matrix = toDependencyMatrix(tasks);
  const parallelGroups = createParallelGroups(tasks, matrix, registries.weights.parallelGroupSize);
  const resourceAssignments = labelAssignments(
    assignResources(tasks, registries.profiles, registries.weights, pairs),
    parallelGroups
  );
  const executionOrder = generateExecutionOrder(tasks, matrix);
  const report = analyzeUtilization(resourceAssignments, registries.profiles);

  logger.debug('Mission map created', undefined, {
    taskCount: tasks.length,
    injected: tasks.length - taskGraph.tasks.length,
    parallelGroups: Object.keys(parallelGroups).length,
    conflicts: report.conflicts.length,
  });

  return {
    tasks,
    resourceAssignments,
    executionOrder,
    parallelGroups,
    totalEffortEstimate: totalEffortEstimate(resourceAssignments),
    ...report,
  };
}
