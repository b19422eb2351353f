/**
 * Schedule Generator
 *
 * Groups tasks that can run side by side and derives a total execution
 * order in which every task follows its dependencies and, among ready
 * tasks, verification work comes first.
 */

import type { ResourceAssignment, Task } from '../types/index.js';
import { isVerificationTask } from '../types/index.js';
import { CycleError } from '../utils/errors.js';
import { computeDepths, findCycle, type DependencyMatrix } from './graph.js';

const DEFAULT_COMPLEXITY = 3;

/**
 * group id -> task ids
 */
export type ParallelGroups = Record<string, string[]>;

/**
 * Parallel groups per depth level. Within a level, tasks without a
 * same-level dependency are ordered by descending complexity and chunked.
 */
export function createParallelGroups(
  tasks: readonly Task[],
  matrix: DependencyMatrix,
  groupSize: number
): ParallelGroups {
  const complexity = new Map(tasks.map((task) => [task.id, task.complexityScore ?? DEFAULT_COMPLEXITY]));
  const depths = computeDepths(matrix);

  const levels = new Map<number, string[]>();
  for (const [id, depth] of depths) {
    const level = levels.get(depth);
    if (level) {
      level.push(id);
    } else {
      levels.set(depth, [id]);
    }
  }

  const groups: ParallelGroups = {};
  for (const depth of [...levels.keys()].sort((a, b) => a - b)) {
    const candidates = (levels.get(depth) ?? [])
      .filter((id) => !(matrix[id] ?? []).some((dep) => depths.get(dep) === depth))
      .sort((a, b) => (complexity.get(b) ?? DEFAULT_COMPLEXITY) - (complexity.get(a) ?? DEFAULT_COMPLEXITY));

    if (candidates.length < 2) continue;

    for (let start = 0, index = 0; start < candidates.length; start += groupSize, index++) {
      groups[`level_${depth}_group_${index}`] = candidates.slice(start, start + groupSize);
    }
  }
  return groups;
}

/**
 * Copies of the assignments carrying the id of the group holding their task
 */
export function labelAssignments(
  assignments: readonly ResourceAssignment[],
  groups: ParallelGroups
): ResourceAssignment[] {
  const groupOf = new Map<string, string>();
  for (const [groupId, taskIds] of Object.entries(groups)) {
    for (const taskId of taskIds) {
      groupOf.set(taskId, groupId);
    }
  }

  return assignments.map(({ taskId, resourceProfile, estimatedEffort, priority }) => {
    const parallelGroup = groupOf.get(taskId);
    const labelled: ResourceAssignment = { taskId, resourceProfile, estimatedEffort, priority };
    if (parallelGroup !== undefined) labelled.parallelGroup = parallelGroup;
    return labelled;
  });
}

/**
 * Ready tasks, verification first, each part sorted by id
 */
export function orderFrontier(ready: readonly string[]): string[] {
  const verification = ready.filter(isVerificationTask).sort();
  const rest = ready.filter((id) => !isVerificationTask(id)).sort();
  return [...verification, ...rest];
}

/**
 * Total order by repeated expansion of the ready frontier.
 *
 * @throws CycleError when the remaining tasks all wait on each other
 */
export function generateExecutionOrder(tasks: readonly Task[], matrix: DependencyMatrix): string[] {
  const order: string[] = [];
  const done = new Set<string>();
  let remaining = tasks.map((task) => task.id);

  while (remaining.length > 0) {
    const ready = remaining.filter((id) => (matrix[id] ?? []).every((dep) => done.has(dep)));

    if (ready.length === 0) {
      const stuck = new Set(remaining);
      const cycle = findCycle(
        remaining.map((id) => ({ id, dependencies: (matrix[id] ?? []).filter((dep) => stuck.has(dep)) }))
      );
      throw new CycleError('task', cycle ?? remaining);
    }

    for (const id of orderFrontier(ready)) {
      order.push(id);
      done.add(id);
    }
    const readySet = new Set(ready);
    remaining = remaining.filter((id) => !readySet.has(id));
  }

  return order;
}
