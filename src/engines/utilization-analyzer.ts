/**
 * Utilization Analyzer
 *
 * Aggregates labelled assignments per resource profile: load against
 * capacity, verification compliance, workload balance and over-capacity
 * conflicts inside parallel groups.
 */

import type {
  EfficiencyLabel,
  ResourceAssignment,
  ResourceConflict,
  ResourceProfile,
  ResourceUtilization,
  WorkloadBalance,
} from '../types/index.js';
import { isVerificationTask } from '../types/index.js';
import { formatEffortTotal, parseEffortDays } from './duration.js';

/**
 * Ids containing these are excluded from the implementation count
 */
const NON_IMPLEMENTATION_ID_KEYWORDS = ['validate', 'deploy'] as const;

const DEFAULT_CAPACITY = 3;

export interface UtilizationReport {
  resourceUtilization: Record<string, ResourceUtilization>;
  utilizationSummary: Record<string, string>;
  verificationCompliance: number;
  workloadBalance: Record<string, WorkloadBalance>;
  conflicts: ResourceConflict[];
}

export function efficiencyLabel(utilizationPercent: number): EfficiencyLabel {
  if (utilizationPercent < 60) return 'under-utilized';
  if (utilizationPercent > 90) return 'over-utilized';
  if (utilizationPercent >= 70 && utilizationPercent <= 85) return 'optimal';
  return 'good';
}

/**
 * Verification tasks per implementation task, capped at 1. Only verification
 * work counts as 1; neither kind counts as 0.5.
 */
export function verificationCompliance(taskIds: readonly string[]): number {
  const verification = taskIds.filter(isVerificationTask).length;
  const implementation = taskIds.filter(
    (id) => !isVerificationTask(id) && !NON_IMPLEMENTATION_ID_KEYWORDS.some((keyword) => id.includes(keyword))
  ).length;

  if (implementation === 0) {
    return verification > 0 ? 1 : 0.5;
  }
  return Math.min(1, verification / implementation);
}

export function sumEffortDays(assignments: readonly ResourceAssignment[]): number {
  return assignments.reduce((total, assignment) => total + parseEffortDays(assignment.estimatedEffort), 0);
}

/**
 * Total effort of a plan, "0 days" when there is nothing to do
 */
export function totalEffortEstimate(assignments: readonly ResourceAssignment[]): string {
  return assignments.length === 0 ? '0 days' : formatEffortTotal(sumEffortDays(assignments));
}

function groupBy<K>(assignments: readonly ResourceAssignment[], key: (a: ResourceAssignment) => K | undefined): Map<K, ResourceAssignment[]> {
  const groups = new Map<K, ResourceAssignment[]>();
  for (const assignment of assignments) {
    const value = key(assignment);
    if (value === undefined) continue;
    const group = groups.get(value);
    if (group) {
      group.push(assignment);
    } else {
      groups.set(value, [assignment]);
    }
  }
  return groups;
}

/**
 * Largest number of the profile's tasks inside one parallel group, 1 when
 * none of them is grouped
 */
function peakParallelLoad(assignments: readonly ResourceAssignment[]): number {
  const perGroup = groupBy(assignments, (a) => a.parallelGroup);
  let peak = 0;
  for (const members of perGroup.values()) {
    peak = Math.max(peak, members.length);
  }
  return peak === 0 ? 1 : peak;
}

export function detectConflicts(
  assignments: readonly ResourceAssignment[],
  capacityOf: (profile: string) => number
): ResourceConflict[] {
  const conflicts: ResourceConflict[] = [];

  for (const [parallelGroup, members] of groupBy(assignments, (a) => a.parallelGroup)) {
    for (const [resourceProfile, held] of groupBy(members, (a) => a.resourceProfile)) {
      const maxCapacity = capacityOf(resourceProfile);
      if (held.length > maxCapacity) {
        conflicts.push({
          type: 'overallocation',
          parallelGroup,
          resourceProfile,
          assignedTasks: held.length,
          maxCapacity,
          description: `Profile ${resourceProfile} holds ${held.length} tasks in parallel group ${parallelGroup}, exceeding its capacity of ${maxCapacity}`,
        });
      }
    }
  }
  return conflicts;
}

function summarize(utilization: ResourceUtilization): string {
  return (
    `${utilization.utilizationPercent.toFixed(1)}% utilization ` +
    `(${utilization.taskCount} tasks, ${utilization.effortDays.toFixed(1)} days, ` +
    `${utilization.efficiency}, verification: ${Math.round(utilization.verificationCompliance * 100)}%)`
  );
}

/**
 * Per-profile report over labelled assignments. Profiles without any
 * assignment are left out.
 */
export function analyzeUtilization(
  assignments: readonly ResourceAssignment[],
  profiles: readonly ResourceProfile[]
): UtilizationReport {
  const capacities = new Map(profiles.map((profile) => [profile.name, profile.maxConcurrentTasks]));
  const capacityOf = (profile: string): number => capacities.get(profile) ?? DEFAULT_CAPACITY;

  const resourceUtilization: Record<string, ResourceUtilization> = {};
  const utilizationSummary: Record<string, string> = {};
  const workloadBalance: Record<string, WorkloadBalance> = {};

  for (const [profile, held] of groupBy(assignments, (a) => a.resourceProfile)) {
    const capacity = capacityOf(profile);
    const peak = peakParallelLoad(held);
    const utilizationPercent = Math.round(Math.min(100, (peak / capacity) * 100) * 10) / 10;
    const effortDays = sumEffortDays(held);

    const utilization: ResourceUtilization = {
      taskCount: held.length,
      effortDays,
      peakParallelLoad: peak,
      capacity,
      utilizationPercent,
      efficiency: efficiencyLabel(utilizationPercent),
      verificationCompliance: verificationCompliance(held.map((a) => a.taskId)),
    };
    resourceUtilization[profile] = utilization;
    utilizationSummary[profile] = summarize(utilization);

    const averagePriority = held.reduce((total, a) => total + a.priority, 0) / held.length;
    workloadBalance[profile] = {
      effortDays,
      taskCount: held.length,
      averagePriority,
      workloadScore: effortDays * (averagePriority / 10),
    };
  }

  return {
    resourceUtilization,
    utilizationSummary,
    verificationCompliance: verificationCompliance(assignments.map((a) => a.taskId)),
    workloadBalance,
    conflicts: detectConflicts(assignments, capacityOf),
  };
}
