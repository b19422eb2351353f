import { z } from 'zod';

/**
 * Project complexity labels, lowest first
 */
export const ComplexityLevelSchema = z.enum(['low', 'medium', 'high', 'very_high']);

export type ComplexityLevel = z.infer<typeof ComplexityLevelSchema>;

/**
 * Classified project analysis - the input record of the planning pipeline.
 *
 * Produced by the structural analyzer or supplied (possibly revised) by the
 * calling agent.
 */
export const AnalysisResultSchema = z.object({
  domain: z.string().min(1).optional(),
  complexity: ComplexityLevelSchema,
  keywords: z.array(z.string()).default([]),
  technologyStack: z.array(z.string()).default([]),
  patterns: z.array(z.string()).default([]),
  implicitRequirements: z.array(z.string()).default([]),

  // Confidence per candidate domain (0-1), highest first
  domainScores: z.record(z.number().min(0).max(1)).optional(),
});

export type AnalysisResult = z.infer<typeof AnalysisResultSchema>;

/**
 * Input for the structural analyzer
 */
export const AnalyzeInputSchema = z.object({
  description: z.string().trim().min(10, 'Project description must be at least 10 characters'),
});

export type AnalyzeInput = z.infer<typeof AnalyzeInputSchema>;
