/**
 * Resource Assigner
 *
 * Assigns each task to a simulated resource profile. A task's own profile
 * hint wins when it names a known profile; otherwise every profile is scored
 * against the task and the running workload, and the best score wins (ties
 * keep the earlier profile).
 */

import type {
  AssignmentWeights,
  PriorityWeights,
  ResourceAssignment,
  ResourceProfile,
  ScoringWeights,
  Task,
} from '../types/index.js';
import { isVerificationTask } from '../types/index.js';
import { ConfigurationError } from '../utils/errors.js';

const DEFAULT_EFFORT = '1 day';
const MIN_PRIORITY = 1;
const MAX_PRIORITY = 10;

/**
 * @example
 * normalizeProfileName('Backend-Developer') // => 'backend_developer'
 */
export function normalizeProfileName(name: string): string {
  return name.toLowerCase().replace(/[ -]/g, '_');
}

/**
 * Score of one profile for one task, given the tasks it already holds.
 */
export function scoreProfile(
  task: Task,
  profile: ResourceProfile,
  assigned: readonly string[],
  counterpart: string | undefined,
  weights: AssignmentWeights
): number {
  let score = 0;

  const haystacks = [task.name.toLowerCase(), task.description.toLowerCase(), task.phaseId.toLowerCase()];
  const matches = profile.specializations.some((specialization) => {
    const needle = specialization.toLowerCase();
    return haystacks.some((haystack) => haystack.includes(needle));
  });
  if (matches) score += weights.specializationMatch;

  const complexity = task.complexityScore ?? weights.defaultComplexity;
  const [low, high] = profile.complexityRange;
  if (complexity < low) {
    score += weights.complexityOverqualified;
  } else if (complexity > high) {
    score += weights.complexityUnderqualified;
  } else {
    score += weights.complexityFit;
  }

  if (isVerificationTask(task.id) && profile.verificationExpertise) {
    score += weights.verificationExpertise;
  }

  if (assigned.length < profile.maxConcurrentTasks) {
    score += (profile.maxConcurrentTasks - assigned.length) * weights.workloadSlotWeight;
  } else {
    score += weights.overCapacityPenalty;
  }

  if (counterpart !== undefined && assigned.includes(counterpart)) {
    score += weights.pairingContinuity;
  }

  return score;
}

/**
 * Priority 1-10 from the task's own characteristics
 */
export function calculatePriority(task: Task, weights: PriorityWeights): number {
  let priority = weights.base;

  if (isVerificationTask(task.id)) priority += weights.verificationTask;

  if (task.complexityScore !== undefined) {
    if (task.complexityScore >= 4) {
      priority += weights.highComplexity;
    } else if (task.complexityScore >= 3) {
      priority += weights.mediumComplexity;
    }
  }

  if (task.humanCheckpoint) priority += weights.humanCheckpoint;
  if (task.dependencies.length === 0) priority += weights.rootTask;

  return Math.min(MAX_PRIORITY, Math.max(MIN_PRIORITY, Math.round(priority)));
}

export function selectProfile(
  task: Task,
  profiles: readonly ResourceProfile[],
  workload: ReadonlyMap<string, readonly string[]>,
  counterpart: string | undefined,
  weights: AssignmentWeights
): ResourceProfile {
  if (task.resourceProfile) {
    const hinted = normalizeProfileName(task.resourceProfile);
    const known = profiles.find((profile) => profile.name === hinted);
    if (known) return known;
  }

  let best: ResourceProfile | undefined;
  let bestScore = Number.NEGATIVE_INFINITY;
  for (const profile of profiles) {
    const score = scoreProfile(task, profile, workload.get(profile.name) ?? [], counterpart, weights);
    if (score > bestScore) {
      bestScore = score;
      best = profile;
    }
  }

  if (!best) {
    throw new ConfigurationError('No resource profiles configured');
  }
  return best;
}

/**
 * One assignment per task, in task order. `parallelGroup` is left unset;
 * the schedule labels it afterwards.
 *
 * @param pairs - task id -> counterpart id, from verification injection
 */
export function assignResources(
  tasks: readonly Task[],
  profiles: readonly ResourceProfile[],
  weights: Pick<ScoringWeights, 'assignment' | 'priority'>,
  pairs: ReadonlyMap<string, string> = new Map()
): ResourceAssignment[] {
  if (profiles.length === 0) {
    throw new ConfigurationError('No resource profiles configured');
  }

  const workload = new Map<string, string[]>(profiles.map((profile) => [profile.name, []]));

  return tasks.map((task) => {
    const profile = selectProfile(task, profiles, workload, pairs.get(task.id), weights.assignment);
    workload.get(profile.name)?.push(task.id);

    return {
      taskId: task.id,
      resourceProfile: profile.name,
      estimatedEffort: task.estimatedEffort ?? DEFAULT_EFFORT,
      priority: calculatePriority(task, weights.priority),
    };
  });
}
