/**
 * Task Graph Builder
 *
 * Expands every phase of a decomposition into tasks from the template of
 * its phase type, links phases through their terminal tasks, and analyses
 * the resulting DAG: depth, critical path, bottlenecks, parallel groups.
 */

import type {
  AnalysisResult,
  DecompositionResult,
  Phase,
  PhaseTypeTemplate,
  Registries,
  Task,
  TaskGraphResult,
  TaskTemplateEntry,
} from '../types/index.js';
import { withDependencies } from '../types/index.js';
import { ConfigurationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import {
  assertValidGraph,
  computeDependents,
  computeDepths,
  toDependencyMatrix,
  type DependencyMatrix,
} from './graph.js';
import { resolvePhaseType } from './phase-type.js';

const ENHANCED_SUFFIX = '_enhanced';
const BASE_COMPLEXITY = 3;
const MAX_COMPLEXITY = 10;

/**
 * Resize a phase type's task list for a complexity multiplier.
 *
 * Shrinking keeps the leading entries. Growing appends "enhanced" copies of
 * the leading entries, at most one per original entry.
 */
export function adjustTaskTemplates(
  entries: readonly TaskTemplateEntry[],
  multiplier: number
): TaskTemplateEntry[] {
  if (multiplier === 1 || entries.length === 0) {
    return [...entries];
  }

  const target = Math.max(1, Math.floor(entries.length * multiplier));
  if (target < entries.length) {
    return entries.slice(0, target);
  }

  const extras = entries.slice(0, Math.min(target - entries.length, entries.length)).map(
    (entry): TaskTemplateEntry => ({
      ...entry,
      idSuffix: entry.idSuffix + ENHANCED_SUFFIX,
      name: `${entry.name} (Enhanced)`,
      complexityScore: Math.min(MAX_COMPLEXITY, (entry.complexityScore ?? BASE_COMPLEXITY) + 1),
    })
  );
  return [...entries, ...extras];
}

/**
 * Tasks of one phase with intra-phase dependencies resolved.
 *
 * A dependency on an entry dropped by shrinking is pruned; one naming no
 * entry of the phase type at all is a template error.
 */
export function expandPhase(
  phase: Phase,
  phaseType: PhaseTypeTemplate,
  multiplier: number
): Task[] {
  const entries = adjustTaskTemplates(phaseType.tasks, multiplier);
  const kept = new Set(entries.map((entry) => entry.idSuffix));
  const declared = new Set(phaseType.tasks.map((entry) => entry.idSuffix));

  return entries.map((entry) => {
    const dependencies: string[] = [];
    for (const suffix of entry.internalDependencies) {
      if (kept.has(suffix)) {
        dependencies.push(phase.id + suffix);
      } else if (!declared.has(suffix)) {
        throw new ConfigurationError(
          `Task template '${entry.idSuffix}' of phase type '${phaseType.phaseType}' depends on unknown suffix '${suffix}'`,
          { phaseType: phaseType.phaseType, idSuffix: entry.idSuffix, dependency: suffix }
        );
      }
    }

    return {
      id: phase.id + entry.idSuffix,
      name: entry.name,
      description: entry.description,
      phaseId: phase.id,
      dependencies: [...new Set(dependencies)],
      ...(entry.estimatedEffort !== undefined && { estimatedEffort: entry.estimatedEffort }),
      ...(entry.complexityScore !== undefined && { complexityScore: entry.complexityScore }),
      ...(entry.resourceProfile !== undefined && { resourceProfile: entry.resourceProfile }),
      outputs: [...entry.outputs],
      validationCriteria: [...entry.validationCriteria],
      humanCheckpoint: entry.humanCheckpoint,
    };
  });
}

/**
 * Tasks of a phase that no other task of the same phase depends on
 */
export function terminalTasks(phaseTasks: readonly Task[]): string[] {
  const depended = new Set(phaseTasks.flatMap((task) => task.dependencies));
  return phaseTasks.filter((task) => !depended.has(task.id)).map((task) => task.id);
}

/**
 * Make every task of a phase depend on the terminal tasks of each upstream
 * phase. Order is intra-phase dependencies first, then upstream phases in
 * declaration order, de-duplicated.
 */
export function linkPhases(tasks: readonly Task[], phases: readonly Phase[]): Task[] {
  const byPhase = new Map<string, Task[]>();
  for (const task of tasks) {
    const group = byPhase.get(task.phaseId);
    if (group) {
      group.push(task);
    } else {
      byPhase.set(task.phaseId, [task]);
    }
  }

  const terminals = new Map<string, string[]>();
  for (const [phaseId, phaseTasks] of byPhase) {
    terminals.set(phaseId, terminalTasks(phaseTasks));
  }

  const upstream = new Map(phases.map((phase) => [phase.id, phase.dependencies]));

  return tasks.map((task) => {
    const linked = [...task.dependencies];
    for (const phaseId of upstream.get(task.phaseId) ?? []) {
      linked.push(...(terminals.get(phaseId) ?? []));
    }
    return withDependencies(task, [...new Set(linked)]);
  });
}

/**
 * Walk back from the first deepest task through its deepest dependency.
 */
export function findTaskCriticalPath(matrix: DependencyMatrix, depths: ReadonlyMap<string, number>): string[] {
  let current: string | undefined;
  let maxDepth = -1;
  for (const [id, depth] of depths) {
    if (depth > maxDepth) {
      maxDepth = depth;
      current = id;
    }
  }

  const path: string[] = [];
  const seen = new Set<string>();
  while (current !== undefined && !seen.has(current)) {
    seen.add(current);
    path.unshift(current);

    let next: string | undefined;
    let nextDepth = -1;
    for (const dep of matrix[current] ?? []) {
      const depth = depths.get(dep) ?? 0;
      if (depth > nextDepth) {
        nextDepth = depth;
        next = dep;
      }
    }
    current = next;
  }
  return path;
}

/**
 * Tasks scoring at least 3: fan-in (2 for three or more dependents, 1 for
 * two), 2 on the critical path, 1 for complexity of 4 or more.
 */
export function findBottlenecks(
  tasks: readonly Task[],
  matrix: DependencyMatrix,
  criticalPath: readonly string[]
): string[] {
  const dependents = computeDependents(matrix);
  const critical = new Set(criticalPath);

  return tasks
    .filter((task) => {
      const fanIn = dependents.get(task.id)?.length ?? 0;
      let score = fanIn >= 3 ? 2 : fanIn >= 2 ? 1 : 0;
      if (critical.has(task.id)) score += 2;
      if ((task.complexityScore ?? 0) >= 4) score += 1;
      return score >= 3;
    })
    .map((task) => task.id);
}

/**
 * Tasks of equal depth without a dependency on a task of the same depth,
 * in groups of at least two, shallowest first.
 */
export function findParallelTasks(matrix: DependencyMatrix, depths: ReadonlyMap<string, number>): string[][] {
  const levels = new Map<number, string[]>();
  for (const [id, depth] of depths) {
    const level = levels.get(depth);
    if (level) {
      level.push(id);
    } else {
      levels.set(depth, [id]);
    }
  }

  const groups: string[][] = [];
  for (const depth of [...levels.keys()].sort((a, b) => a - b)) {
    const candidates = (levels.get(depth) ?? []).filter(
      (id) => !(matrix[id] ?? []).some((dep) => depths.get(dep) === depth)
    );
    if (candidates.length >= 2) {
      groups.push(candidates);
    }
  }
  return groups;
}

export function emptyTaskGraph(): TaskGraphResult {
  return {
    tasks: [],
    taskCount: 0,
    dependencyMatrix: {},
    criticalPath: [],
    bottlenecks: [],
    parallelTasks: [],
  };
}

/**
 * Analyse an already-linked task list. Used directly when the caller
 * supplies its own tasks.
 *
 * @throws DependencyError when a task depends on an unknown task
 * @throws CycleError when the task graph is cyclic
 */
export function analyzeTaskGraph(tasks: readonly Task[]): TaskGraphResult {
  assertValidGraph('task', tasks);

  const dependencyMatrix = toDependencyMatrix(tasks);
  const depths = computeDepths(dependencyMatrix);
  const criticalPath = findTaskCriticalPath(dependencyMatrix, depths);

  return {
    tasks: [...tasks],
    taskCount: tasks.length,
    dependencyMatrix,
    criticalPath,
    bottlenecks: findBottlenecks(tasks, dependencyMatrix, criticalPath),
    parallelTasks: findParallelTasks(dependencyMatrix, depths),
  };
}

/**
 * Expand a decomposition into its task graph.
 *
 * @throws ConfigurationError when a phase matches no phase type
 */
export function buildTaskGraph(
  decomposition: Pick<DecompositionResult, 'phases'>,
  analysis: Pick<AnalysisResult, 'complexity'>,
  registries: Pick<Registries, 'phaseTypes' | 'weights'>
): TaskGraphResult {
  if (decomposition.phases.length === 0) {
    return emptyTaskGraph();
  }

  assertValidGraph('phase', decomposition.phases);
  const multiplier = registries.weights.taskMultipliers[analysis.complexity] ?? 1;

  const tasks = decomposition.phases.flatMap((phase) =>
    expandPhase(phase, resolvePhaseType(phase, registries.phaseTypes), multiplier)
  );
  const result = analyzeTaskGraph(linkPhases(tasks, decomposition.phases));

  logger.debug('Task graph built', undefined, {
    taskCount: result.taskCount,
    criticalPathLength: result.criticalPath.length,
    bottlenecks: result.bottlenecks.length,
  });

  return result;
}
