/**
 * Dependency-graph primitives shared by the phase, task and schedule engines.
 *
 * Graphs are given as `{ id, dependencies }` nodes in declaration order; every
 * traversal follows that order so results are deterministic.
 */

import { CycleError, DependencyError, ValidationError } from '../utils/errors.js';

export interface GraphNode {
  readonly id: string;
  readonly dependencies: readonly string[];
}

export type GraphKind = 'phase' | 'task';

/**
 * id -> dependency ids, in node order
 */
export type DependencyMatrix = Record<string, string[]>;

export function toDependencyMatrix(nodes: readonly GraphNode[]): DependencyMatrix {
  const matrix: DependencyMatrix = {};
  for (const node of nodes) {
    matrix[node.id] = [...node.dependencies];
  }
  return matrix;
}

export function assertUniqueIds(kind: GraphKind, nodes: readonly GraphNode[]): void {
  const seen = new Set<string>();
  for (const node of nodes) {
    if (seen.has(node.id)) {
      throw new ValidationError(`Duplicate ${kind} id: ${node.id}`, [{ path: node.id, message: `Duplicate ${kind} id` }]);
    }
    seen.add(node.id);
  }
}

/**
 * Reject the first node that depends on an id outside the graph.
 */
export function assertDependenciesExist(kind: GraphKind, nodes: readonly GraphNode[]): void {
  const ids = new Set(nodes.map((node) => node.id));
  for (const node of nodes) {
    const missing = node.dependencies.filter((dep) => !ids.has(dep));
    if (missing.length > 0) {
      throw new DependencyError(kind, node.id, [...new Set(missing)]);
    }
  }
}

/**
 * First cycle found by depth-first search, as a closed path
 * (`['a', 'b', 'a']`), or null for an acyclic graph.
 * Dependencies on unknown ids are ignored.
 */
export function findCycle(nodes: readonly GraphNode[]): string[] | null {
  const byId = new Map(nodes.map((node) => [node.id, node]));
  const state = new Map<string, 'visiting' | 'done'>();
  const stack: string[] = [];

  const visit = (id: string): string[] | null => {
    const current = state.get(id);
    if (current === 'done') return null;
    if (current === 'visiting') {
      return [...stack.slice(stack.indexOf(id)), id];
    }

    state.set(id, 'visiting');
    stack.push(id);
    for (const dep of byId.get(id)?.dependencies ?? []) {
      if (!byId.has(dep)) continue;
      const cycle = visit(dep);
      if (cycle) return cycle;
    }
    stack.pop();
    state.set(id, 'done');
    return null;
  };

  for (const node of nodes) {
    const cycle = visit(node.id);
    if (cycle) return cycle;
  }
  return null;
}

export function assertAcyclic(kind: GraphKind, nodes: readonly GraphNode[]): void {
  const cycle = findCycle(nodes);
  if (cycle) {
    throw new CycleError(kind, cycle);
  }
}

/**
 * All structural checks: duplicate ids, then missing ids, then cycles.
 */
export function assertValidGraph(kind: GraphKind, nodes: readonly GraphNode[]): void {
  assertUniqueIds(kind, nodes);
  assertDependenciesExist(kind, nodes);
  assertAcyclic(kind, nodes);
}

/**
 * Depth of every node: the longest path, in edges, from any root.
 *
 * Memoized per id. A node reached again while its own depth is being computed
 * counts as depth 0, so a cyclic matrix still terminates.
 */
export function computeDepths(matrix: DependencyMatrix): Map<string, number> {
  const depths = new Map<string, number>();
  const inProgress = new Set<string>();

  const depthOf = (id: string): number => {
    if (inProgress.has(id)) return 0;
    const known = depths.get(id);
    if (known !== undefined) return known;

    inProgress.add(id);
    let depth = 0;
    for (const dep of matrix[id] ?? []) {
      depth = Math.max(depth, depthOf(dep) + 1);
    }
    inProgress.delete(id);
    depths.set(id, depth);
    return depth;
  };

  for (const id of Object.keys(matrix)) {
    depthOf(id);
  }

  // Re-key in matrix order: recursion fills the map dependencies-first.
  return new Map(Object.keys(matrix).map((id) => [id, depths.get(id) ?? 0]));
}

/**
 * id -> ids of the nodes that depend on it, in node order
 */
export function computeDependents(matrix: DependencyMatrix): Map<string, string[]> {
  const dependents = new Map<string, string[]>(Object.keys(matrix).map((id) => [id, []]));
  for (const [id, deps] of Object.entries(matrix)) {
    for (const dep of new Set(deps)) {
      dependents.get(dep)?.push(id);
    }
  }
  return dependents;
}
