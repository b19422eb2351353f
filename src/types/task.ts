import { z } from 'zod';

/**
 * Reserved id prefix of verification tasks
 */
export const VERIFICATION_PREFIX = 'test_';

/**
 * Id prefix stripped from implementation tasks when deriving their verification pair
 */
export const IMPLEMENTATION_PREFIX = 'impl_';

/**
 * A fine-grained unit of work belonging to a phase
 */
export const TaskSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string(),
  phaseId: z.string().min(1),
  dependencies: z.array(z.string()).default([]),
  estimatedEffort: z.string().optional(),
  complexityScore: z.number().int().min(1).max(10).optional(),
  resourceProfile: z.string().optional(),
  outputs: z.array(z.string()).default([]),
  validationCriteria: z.array(z.string()).default([]),
  humanCheckpoint: z.boolean().default(false),
});

export type Task = z.infer<typeof TaskSchema>;

/**
 * Result of task graph generation
 */
export const TaskGraphResultSchema = z.object({
  tasks: z.array(TaskSchema),
  taskCount: z.number().int().min(0),
  dependencyMatrix: z.record(z.array(z.string())),
  criticalPath: z.array(z.string()),
  bottlenecks: z.array(z.string()),
  parallelTasks: z.array(z.array(z.string())),
});

export type TaskGraphResult = z.infer<typeof TaskGraphResultSchema>;

export function isVerificationTask(taskId: string): boolean {
  return taskId.startsWith(VERIFICATION_PREFIX);
}

/**
 * Id of the verification task paired with an implementation task.
 *
 * @example
 * pairedVerificationId('impl_user_model') // => 'test_user_model'
 * pairedVerificationId('backend_api')     // => 'test_backend_api'
 */
export function pairedVerificationId(taskId: string): string {
  if (taskId.startsWith(IMPLEMENTATION_PREFIX)) {
    return VERIFICATION_PREFIX + taskId.slice(IMPLEMENTATION_PREFIX.length);
  }
  return VERIFICATION_PREFIX + taskId;
}

/**
 * Copy of `task` with a replaced dependency list. Tasks are never mutated.
 */
export function withDependencies(task: Task, dependencies: readonly string[]): Task {
  return { ...task, dependencies: [...dependencies] };
}
