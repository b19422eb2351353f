import { z } from 'zod';
import { TaskSchema } from './task.js';

/**
 * One task's assigned resource profile
 */
export const ResourceAssignmentSchema = z.object({
  taskId: z.string(),
  resourceProfile: z.string(),
  estimatedEffort: z.string(),
  priority: z.number().int().min(1).max(10),
  parallelGroup: z.string().optional(),
});

export type ResourceAssignment = z.infer<typeof ResourceAssignmentSchema>;

export const EfficiencyLabelSchema = z.enum(['under-utilized', 'good', 'optimal', 'over-utilized']);

export type EfficiencyLabel = z.infer<typeof EfficiencyLabelSchema>;

/**
 * Aggregated load of one resource profile
 */
export const ResourceUtilizationSchema = z.object({
  taskCount: z.number().int().min(0),
  effortDays: z.number().min(0),
  peakParallelLoad: z.number().int().min(0),
  capacity: z.number().int().min(1),
  utilizationPercent: z.number().min(0).max(100),
  efficiency: EfficiencyLabelSchema,
  verificationCompliance: z.number().min(0).max(1),
});

export type ResourceUtilization = z.infer<typeof ResourceUtilizationSchema>;

export const WorkloadBalanceSchema = z.object({
  effortDays: z.number().min(0),
  taskCount: z.number().int().min(0),
  averagePriority: z.number(),
  workloadScore: z.number(),
});

export type WorkloadBalance = z.infer<typeof WorkloadBalanceSchema>;

/**
 * A profile holds more tasks inside one parallel group than it can run at once
 */
export const ResourceConflictSchema = z.object({
  type: z.literal('overallocation'),
  parallelGroup: z.string(),
  resourceProfile: z.string(),
  assignedTasks: z.number().int(),
  maxCapacity: z.number().int(),
  description: z.string(),
});

export type ResourceConflict = z.infer<typeof ResourceConflictSchema>;

/**
 * Result of mission map creation
 */
export const MissionMapResultSchema = z.object({
  tasks: z.array(TaskSchema),
  resourceAssignments: z.array(ResourceAssignmentSchema),
  executionOrder: z.array(z.string()),
  parallelGroups: z.record(z.array(z.string())),
  totalEffortEstimate: z.string(),
  resourceUtilization: z.record(ResourceUtilizationSchema),
  utilizationSummary: z.record(z.string()),
  verificationCompliance: z.number().min(0).max(1),
  workloadBalance: z.record(WorkloadBalanceSchema),
  conflicts: z.array(ResourceConflictSchema),
});

export type MissionMapResult = z.infer<typeof MissionMapResultSchema>;
