/**
 * Phase Decomposer
 *
 * Instantiates the phase DAG of a project from the template registered for
 * its domain, scales durations by complexity, and derives the phase-level
 * critical path and parallel opportunities.
 */

import type {
  AnalysisResult,
  DecompositionResult,
  Phase,
  PhaseTemplate,
  Registries,
} from '../types/index.js';
import { ConfigurationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { DEFAULT_TEMPLATE } from '../registry/index.js';
import { assertValidGraph, computeDependents, toDependencyMatrix } from './graph.js';
import { formatDays, parseDurationDays, scaleDuration } from './duration.js';

/**
 * Template for a domain label. Unknown or absent domains use `default`.
 */
export function selectTemplate(
  domain: string | undefined,
  registries: Pick<Registries, 'phaseTemplates' | 'domainIndex'>
): PhaseTemplate {
  const name = domain ? registries.domainIndex[domain.trim().toLowerCase()] : undefined;
  const template = registries.phaseTemplates[name ?? DEFAULT_TEMPLATE];
  if (template) return template;

  const fallback = registries.phaseTemplates[DEFAULT_TEMPLATE];
  if (!fallback) {
    throw new ConfigurationError(`Phase template registry has no '${DEFAULT_TEMPLATE}' template`);
  }
  return fallback;
}

/**
 * Phases of a template with durations scaled to the project complexity.
 */
export function instantiatePhases(template: PhaseTemplate, complexity: AnalysisResult['complexity']): Phase[] {
  const multiplier = template.complexityAdjustments[complexity] ?? 1;
  return template.phases.map((entry) => ({
    id: entry.id,
    name: entry.name,
    description: entry.description,
    estimatedDuration: scaleDuration(entry.estimatedDuration ?? template.baseDuration, multiplier),
    dependencies: [...entry.dependencies],
    deliverables: [...entry.artifacts],
  }));
}

function phaseDays(phase: Phase): number {
  return parseDurationDays(phase.estimatedDuration ?? '1 day');
}

/**
 * Longest cumulative-duration path from a root through its dependents.
 * Ties keep the path found first.
 */
export function findPhaseCriticalPath(phases: readonly Phase[]): string[] {
  if (phases.length === 0) return [];

  const dependents = computeDependents(toDependencyMatrix(phases));
  const days = new Map(phases.map((phase) => [phase.id, phaseDays(phase)]));
  const memo = new Map<string, { path: string[]; total: number }>();
  const inProgress = new Set<string>();

  const longestFrom = (id: string): { path: string[]; total: number } => {
    const own = days.get(id) ?? 0;
    if (inProgress.has(id)) return { path: [id], total: own };
    const known = memo.get(id);
    if (known) return known;

    inProgress.add(id);
    let best = { path: [id], total: own };
    for (const next of dependents.get(id) ?? []) {
      const tail = longestFrom(next);
      if (own + tail.total > best.total) {
        best = { path: [id, ...tail.path], total: own + tail.total };
      }
    }
    inProgress.delete(id);
    memo.set(id, best);
    return best;
  };

  const roots = phases.filter((phase) => phase.dependencies.length === 0);
  if (roots.length === 0) {
    const first = phases[0];
    return first ? [first.id] : [];
  }

  let critical: { path: string[]; total: number } = { path: [], total: 0 };
  for (const root of roots) {
    const candidate = longestFrom(root.id);
    if (candidate.total > critical.total) {
      critical = candidate;
    }
  }
  return critical.path;
}

/**
 * Groups of phases sharing an identical dependency set whose members do not
 * depend on one another.
 */
export function findParallelOpportunities(phases: readonly Phase[]): string[][] {
  if (phases.length < 2) return [];

  const groups = new Map<string, Phase[]>();
  for (const phase of phases) {
    const key = JSON.stringify([...phase.dependencies].sort());
    const group = groups.get(key);
    if (group) {
      group.push(phase);
    } else {
      groups.set(key, [phase]);
    }
  }

  const opportunities: string[][] = [];
  for (const group of groups.values()) {
    if (group.length < 2) continue;
    const ids = new Set(group.map((phase) => phase.id));
    const independent = group
      .filter((phase) => !phase.dependencies.some((dep) => dep !== phase.id && ids.has(dep)))
      .map((phase) => phase.id);
    if (independent.length >= 2) {
      opportunities.push(independent);
    }
  }
  return opportunities;
}

/**
 * Sum of the critical path's phase durations, formatted.
 */
export function estimateTotalDuration(phases: readonly Phase[], criticalPath: readonly string[]): string {
  const byId = new Map(phases.map((phase) => [phase.id, phase]));
  let total = 0;
  for (const id of criticalPath) {
    const phase = byId.get(id);
    if (phase) total += phaseDays(phase);
  }
  return formatDays(total);
}

/**
 * Validate a phase DAG and derive its critical path, total duration and
 * parallel opportunities. Priority phases naming no phase are dropped.
 *
 * @throws DependencyError when a phase depends on an unknown phase
 * @throws CycleError when the phase graph is cyclic
 */
export function analyzeDecomposition(
  decomposition: Pick<DecompositionResult, 'template' | 'phases' | 'priorityPhases'>
): DecompositionResult {
  const { phases } = decomposition;
  assertValidGraph('phase', phases);

  const criticalPath = findPhaseCriticalPath(phases);
  const phaseIds = new Set(phases.map((phase) => phase.id));

  return {
    template: decomposition.template,
    phases: [...phases],
    totalEstimatedDuration: estimateTotalDuration(phases, criticalPath),
    criticalPath,
    parallelOpportunities: findParallelOpportunities(phases),
    priorityPhases: decomposition.priorityPhases.filter((id) => phaseIds.has(id)),
  };
}

/**
 * Decompose an analyzed project into its phase DAG.
 *
 * @throws DependencyError when a template phase depends on an unknown phase
 * @throws CycleError when the template's phase graph is cyclic
 */
export function decomposePhases(
  analysis: AnalysisResult,
  registries: Pick<Registries, 'phaseTemplates' | 'domainIndex'>
): DecompositionResult {
  const template = selectTemplate(analysis.domain, registries);
  const result = analyzeDecomposition({
    template: template.name,
    phases: instantiatePhases(template, analysis.complexity),
    priorityPhases: template.domainPriorities,
  });

  logger.debug('Phases decomposed', undefined, {
    template: result.template,
    phaseCount: result.phases.length,
    totalEstimatedDuration: result.totalEstimatedDuration,
  });

  return result;
}
