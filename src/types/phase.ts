import { z } from 'zod';

/**
 * A coarse project stage with an estimated duration and dependencies on other phases
 */
export const PhaseSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string(),
  estimatedDuration: z.string().optional(),
  dependencies: z.array(z.string()).default([]),
  deliverables: z.array(z.string()).default([]),
});

export type Phase = z.infer<typeof PhaseSchema>;

/**
 * Result of phase decomposition
 */
export const DecompositionResultSchema = z.object({
  template: z.string(),
  phases: z.array(PhaseSchema),
  totalEstimatedDuration: z.string(),
  criticalPath: z.array(z.string()),
  parallelOpportunities: z.array(z.array(z.string())),
  priorityPhases: z.array(z.string()).default([]),
});

export type DecompositionResult = z.infer<typeof DecompositionResultSchema>;
