import { z } from 'zod';
import { ComplexityLevelSchema } from './analysis.js';

/**
 * Multiplier per complexity label. Labels left out count as 1.0.
 */
export const ComplexityMultipliersSchema = z.record(ComplexityLevelSchema, z.number().positive());

export type ComplexityMultipliers = z.infer<typeof ComplexityMultipliersSchema>;

// ----------------------------------------------------------------------------
// Phase templates (config/phases/*.yaml)
// ----------------------------------------------------------------------------

export const PhaseTemplateEntrySchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string().default(''),
  estimatedDuration: z.string().optional(),
  dependencies: z.array(z.string()).default([]),
  artifacts: z.array(z.string()).default([]),
});

export type PhaseTemplateEntry = z.infer<typeof PhaseTemplateEntrySchema>;

export const PhaseTemplateSchema = z.object({
  name: z.string().regex(/^[a-z0-9_]+$/, 'Template name must be lower snake_case'),
  description: z.string().default(''),
  // Domain labels (case-insensitive) that select this template
  domains: z.array(z.string()).default([]),
  // Duration used by phases that declare none
  baseDuration: z.string().default('1 day'),
  complexityAdjustments: ComplexityMultipliersSchema.default({}),
  // Phase ids to put first when the domain is known to stress them
  domainPriorities: z.array(z.string()).default([]),
  phases: z.array(PhaseTemplateEntrySchema),
});

export type PhaseTemplate = z.infer<typeof PhaseTemplateSchema>;

// ----------------------------------------------------------------------------
// Task templates per phase type (config/tasks/*.yaml)
// ----------------------------------------------------------------------------

export const TaskTemplateEntrySchema = z.object({
  idSuffix: z.string().regex(/^_[a-z0-9_]+$/, 'idSuffix must start with "_" and be lower snake_case'),
  name: z.string().min(1),
  description: z.string(),
  estimatedEffort: z.string().optional(),
  complexityScore: z.number().int().min(1).max(10).optional(),
  resourceProfile: z.string().optional(),
  internalDependencies: z.array(z.string()).default([]),
  outputs: z.array(z.string()).default([]),
  validationCriteria: z.array(z.string()).default([]),
  humanCheckpoint: z.boolean().default(false),
});

export type TaskTemplateEntry = z.infer<typeof TaskTemplateEntrySchema>;

export const PhaseTypeTemplateSchema = z.object({
  phaseType: z.string().regex(/^[a-z0-9_]+$/, 'phaseType must be lower snake_case'),
  // Exact phase display names (matched lower-cased)
  aliases: z.array(z.string()).default([]),
  // Substrings tried when no alias matches, in registry order
  keywords: z.array(z.string()).default([]),
  tasks: z.array(TaskTemplateEntrySchema),
});

export type PhaseTypeTemplate = z.infer<typeof PhaseTypeTemplateSchema>;

// ----------------------------------------------------------------------------
// Resource profiles (config/profiles.yaml)
// ----------------------------------------------------------------------------

export const ResourceProfileSchema = z.object({
  name: z.string().regex(/^[a-z0-9_]+$/, 'Profile name must be lower snake_case'),
  specializations: z.array(z.string()).default([]),
  complexityRange: z
    .tuple([z.number().int().min(1).max(10), z.number().int().min(1).max(10)])
    .refine(([low, high]) => low <= high, 'complexityRange must be [low, high] with low <= high'),
  maxConcurrentTasks: z.number().int().min(1),
  verificationExpertise: z.boolean().default(false),
});

export type ResourceProfile = z.infer<typeof ResourceProfileSchema>;

export const ProfileRegistryFileSchema = z.object({
  profiles: z.array(ResourceProfileSchema).min(1, 'At least one resource profile is required'),
});

// ----------------------------------------------------------------------------
// Scoring weights (config/scoring.yaml)
// ----------------------------------------------------------------------------

export const AssignmentWeightsSchema = z.object({
  specializationMatch: z.number().default(10),
  complexityFit: z.number().default(8),
  complexityOverqualified: z.number().default(4),
  complexityUnderqualified: z.number().default(-5),
  verificationExpertise: z.number().default(9),
  workloadSlotWeight: z.number().default(2),
  overCapacityPenalty: z.number().default(-10),
  pairingContinuity: z.number().default(15),
  defaultComplexity: z.number().int().min(1).max(10).default(3),
});

export type AssignmentWeights = z.infer<typeof AssignmentWeightsSchema>;

export const PriorityWeightsSchema = z.object({
  base: z.number().default(5),
  verificationTask: z.number().default(2),
  highComplexity: z.number().default(2),
  mediumComplexity: z.number().default(1),
  humanCheckpoint: z.number().default(1),
  rootTask: z.number().default(1),
});

export type PriorityWeights = z.infer<typeof PriorityWeightsSchema>;

export const ScoringWeightsSchema = z.object({
  assignment: AssignmentWeightsSchema.default({}),
  priority: PriorityWeightsSchema.default({}),
  // Task-count multiplier applied to every phase's template list
  taskMultipliers: ComplexityMultipliersSchema.default({}),
  parallelGroupSize: z.number().int().min(1).default(3),
});

export type ScoringWeights = z.infer<typeof ScoringWeightsSchema>;

// ----------------------------------------------------------------------------
// Analyzer keyword tables (config/analysis.yaml)
// ----------------------------------------------------------------------------

export const AnalysisKeywordsSchema = z.object({
  // Domain -> keywords, in tie-break order
  domains: z.record(z.array(z.string())),
  // Pattern name -> regular expression (matched case-insensitively)
  patterns: z.record(z.string()),
  // Technology -> keywords that indicate it
  technologies: z.record(z.array(z.string())),
  // Technologies suggested for a domain when no keyword names one
  domainTechnologies: z.record(z.array(z.string())).default({}),
  requirements: z
    .object({
      patterns: z.record(z.string()).default({}),
      domains: z.record(z.string()).default({}),
      // Added for descriptions longer than generalMinLength
      general: z.array(z.string()).default([]),
      generalMinLength: z.number().int().min(0).default(100),
    })
    .default({}),
  complexity: z
    .object({
      // Description length steps: below the first scores 1, below the second 2, else 3
      lengthThresholds: z.tuple([z.number().int(), z.number().int()]).default([50, 150]),
      // More keywords than the first adds 1, more than the second adds 2
      keywordThresholds: z.tuple([z.number().int(), z.number().int()]).default([6, 12]),
      // More patterns than this adds 1
      patternThreshold: z.number().int().default(4),
    })
    .default({}),
});

export type AnalysisKeywords = z.infer<typeof AnalysisKeywordsSchema>;

// ----------------------------------------------------------------------------
// Loaded registries
// ----------------------------------------------------------------------------

/**
 * Every registry the pipeline reads, loaded once at the call boundary.
 */
export interface Registries {
  readonly phaseTemplates: Readonly<Record<string, PhaseTemplate>>;
  // Lower-cased domain label -> template name
  readonly domainIndex: Readonly<Record<string, string>>;
  readonly phaseTypes: readonly PhaseTypeTemplate[];
  readonly profiles: readonly ResourceProfile[];
  readonly weights: ScoringWeights;
  readonly analysis: AnalysisKeywords;
}
