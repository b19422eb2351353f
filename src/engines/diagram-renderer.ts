/**
 * Diagram Renderer
 *
 * Mermaid renderings of a plan (phase hierarchy, task graph, Gantt
 * timeline) and a plain-text dependency matrix. Output is a pure function
 * of the plan.
 */

import type {
  DecompositionResult,
  MissionMapResult,
  PlanDiagrams,
  Task,
  TaskGraphResult,
} from '../types/index.js';
import { parseDurationDays } from './duration.js';
import type { DependencyMatrix } from './graph.js';

/**
 * First day of rendered timelines unless a start date is given
 */
export const DEFAULT_TIMELINE_START = '2025-01-01';

export interface DiagramOptions {
  /** ISO date (YYYY-MM-DD) the timeline starts on */
  startDate?: string | undefined;
}

export function toNodeId(id: string): string {
  return id.replace(/[^A-Za-z0-9_]/g, '_');
}

/**
 * Node id lookup for one diagram. Distinct ids always get distinct nodes:
 * an id whose sanitized form is taken gets the first free numeric suffix.
 *
 * @example
 * const nodeId = createNodeIds();
 * nodeId('a-b') // => 'a_b'
 * nodeId('a_b') // => 'a_b_2'
 */
export function createNodeIds(): (id: string) => string {
  const assigned = new Map<string, string>();
  const taken = new Set<string>();

  return (id) => {
    const known = assigned.get(id);
    if (known !== undefined) return known;

    const base = toNodeId(id);
    let candidate = base;
    for (let suffix = 2; taken.has(candidate); suffix++) {
      candidate = `${base}_${suffix}`;
    }
    assigned.set(id, candidate);
    taken.add(candidate);
    return candidate;
  };
}

function label(text: string): string {
  return `"${text.replace(/"/g, '#quot;')}"`;
}

export function renderPhaseHierarchy(decomposition: Pick<DecompositionResult, 'phases' | 'criticalPath'>): string {
  const nodeId = createNodeIds();
  const lines = ['graph TD'];
  for (const phase of decomposition.phases) {
    const duration = phase.estimatedDuration ? ` (${phase.estimatedDuration})` : '';
    lines.push(`  ${nodeId(phase.id)}[${label(phase.name + duration)}]`);
  }
  for (const phase of decomposition.phases) {
    for (const dep of phase.dependencies) {
      lines.push(`  ${nodeId(dep)} --> ${nodeId(phase.id)}`);
    }
  }
  if (decomposition.criticalPath.length > 0) {
    lines.push('  classDef critical stroke-width:3px');
    lines.push(`  class ${decomposition.criticalPath.map(nodeId).join(',')} critical`);
  }
  return lines.join('\n');
}

/**
 * Tasks grouped in one subgraph per phase, edges from dependency to dependent
 */
export function renderTaskGraph(tasks: readonly Task[], criticalPath: readonly string[] = []): string {
  const nodeId = createNodeIds();
  const subgraphId = createNodeIds();
  const lines = ['flowchart LR'];

  const phases = new Map<string, Task[]>();
  for (const task of tasks) {
    const members = phases.get(task.phaseId);
    if (members) {
      members.push(task);
    } else {
      phases.set(task.phaseId, [task]);
    }
  }

  for (const [phaseId, members] of phases) {
    lines.push(`  subgraph phase_${subgraphId(phaseId)}[${label(phaseId)}]`);
    for (const task of members) {
      lines.push(`    ${nodeId(task.id)}[${label(task.name)}]`);
    }
    lines.push('  end');
  }
  for (const task of tasks) {
    for (const dep of task.dependencies) {
      lines.push(`  ${nodeId(dep)} --> ${nodeId(task.id)}`);
    }
  }
  if (criticalPath.length > 0) {
    lines.push('  classDef critical stroke-width:3px');
    lines.push(`  class ${criticalPath.map(nodeId).join(',')} critical`);
  }
  return lines.join('\n');
}

/**
 * Gantt chart of the phases, each starting after all of its dependencies
 */
export function renderTimeline(
  decomposition: Pick<DecompositionResult, 'phases' | 'criticalPath'>,
  options: DiagramOptions = {}
): string {
  const startDate = options.startDate ?? DEFAULT_TIMELINE_START;
  const critical = new Set(decomposition.criticalPath);
  const nodeId = createNodeIds();
  const lines = ['gantt', '  title Project timeline', '  dateFormat YYYY-MM-DD', '  section Phases'];

  for (const phase of decomposition.phases) {
    const days = parseDurationDays(phase.estimatedDuration ?? '1 day');
    const tags = [critical.has(phase.id) ? 'crit' : undefined, nodeId(phase.id)].filter(
      (tag): tag is string => tag !== undefined
    );
    const start = phase.dependencies.length > 0 ? `after ${phase.dependencies.map(nodeId).join(' ')}` : startDate;
    lines.push(`  ${phase.name.replace(/[:#;]/g, ' ')} :${tags.join(', ')}, ${start}, ${days}d`);
  }
  return lines.join('\n');
}

/**
 * Text matrix with an X where the row task depends on the column task
 *
 * @example
 * #  task  1 2
 * 1  a     . .
 * 2  b     X .
 */
export function renderDependencyMatrix(matrix: DependencyMatrix): string {
  const ids = Object.keys(matrix);
  if (ids.length === 0) return '(no tasks)';

  const indexWidth = Math.max(1, String(ids.length).length);
  const nameWidth = Math.max('task'.length, ...ids.map((id) => id.length));
  const cellWidth = String(ids.length).length;
  const columns = ids.map((_, index) => String(index + 1).padStart(cellWidth));

  const lines = [`${'#'.padEnd(indexWidth)}  ${'task'.padEnd(nameWidth)}  ${columns.join(' ')}`];
  ids.forEach((id, row) => {
    const deps = new Set(matrix[id] ?? []);
    const cells = ids.map((other) => (deps.has(other) ? 'X' : '.').padStart(cellWidth));
    lines.push(`${String(row + 1).padEnd(indexWidth)}  ${id.padEnd(nameWidth)}  ${cells.join(' ')}`);
  });
  return lines.join('\n');
}

/**
 * Every diagram the available stage results allow. Task diagrams use the
 * mission map's tasks (with verification pairs) when there is one.
 */
export function renderDiagrams(
  plan: {
    decomposition?: DecompositionResult | undefined;
    taskGraph?: TaskGraphResult | undefined;
    missionMap?: MissionMapResult | undefined;
  },
  options: DiagramOptions = {}
): PlanDiagrams {
  const diagrams: PlanDiagrams = {};

  if (plan.decomposition) {
    diagrams.phaseHierarchy = renderPhaseHierarchy(plan.decomposition);
    diagrams.timeline = renderTimeline(plan.decomposition, options);
  }

  const tasks = plan.missionMap?.tasks ?? plan.taskGraph?.tasks;
  if (tasks) {
    diagrams.taskGraph = renderTaskGraph(tasks, plan.taskGraph?.criticalPath ?? []);
    diagrams.dependencyMatrix = renderDependencyMatrix(
      Object.fromEntries(tasks.map((task) => [task.id, [...task.dependencies]]))
    );
  }
  return diagrams;
}
