/**
 * Verification Injector
 *
 * Pairs every implementation task with a verification task ("test_" id)
 * that must complete first. Missing verification tasks are synthesized and
 * placed directly before their implementation task.
 */

import type { Task } from '../types/index.js';
import { isVerificationTask, pairedVerificationId, withDependencies } from '../types/index.js';
import { estimateVerificationEffort } from './duration.js';

/**
 * Task names containing any of these are checks themselves and get no pair
 */
const NON_IMPLEMENTATION_KEYWORDS = ['validate', 'deploy', 'verify', 'check'] as const;

const DEFAULT_COMPLEXITY = 3;

export interface VerificationResult {
  tasks: Task[];
  /** task id -> id of its counterpart, in both directions */
  pairs: Map<string, string>;
}

export function needsVerification(task: Pick<Task, 'id' | 'name'>): boolean {
  if (isVerificationTask(task.id)) return false;
  const name = task.name.toLowerCase();
  return !NON_IMPLEMENTATION_KEYWORDS.some((keyword) => name.includes(keyword));
}

export function createVerificationTask(task: Task): Task {
  return {
    id: pairedVerificationId(task.id),
    name: `Write Unit Tests for ${task.name}`,
    description:
      `Write failing unit tests for ${task.name} before it is implemented. ` +
      'The tests define the expected behaviour and interface.',
    phaseId: task.phaseId,
    dependencies: [],
    estimatedEffort: estimateVerificationEffort(task.estimatedEffort),
    complexityScore: Math.max(1, (task.complexityScore ?? DEFAULT_COMPLEXITY) - 1),
    ...(task.resourceProfile !== undefined && { resourceProfile: task.resourceProfile }),
    outputs: [`test_${task.id}.spec.ts`, `test_cases_${task.id}.json`],
    validationCriteria: [
      'Tests must fail before the implementation exists',
      'Tests cover all expected functionality',
      'Tests follow naming conventions',
      'Tests include edge cases',
    ],
    humanCheckpoint: false,
  };
}

/**
 * Add the missing verification tasks and make each implementation task
 * depend on its pair. Running it on its own output changes nothing.
 */
export function injectVerification(tasks: readonly Task[]): VerificationResult {
  const existing = new Set(tasks.map((task) => task.id));

  const withPairs: Task[] = [];
  for (const task of tasks) {
    if (needsVerification(task)) {
      const pairId = pairedVerificationId(task.id);
      if (!existing.has(pairId)) {
        withPairs.push(createVerificationTask(task));
        existing.add(pairId);
      }
    }
    withPairs.push(task);
  }

  const pairs = new Map<string, string>();
  const result = withPairs.map((task) => {
    if (isVerificationTask(task.id)) return task;

    const pairId = pairedVerificationId(task.id);
    if (!existing.has(pairId)) return task;

    pairs.set(task.id, pairId);
    pairs.set(pairId, task.id);
    return task.dependencies.includes(pairId)
      ? task
      : withDependencies(task, [...task.dependencies, pairId]);
  });

  return { tasks: result, pairs };
}
