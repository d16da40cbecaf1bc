/**
 * Dependency graph checks for planned steps.
 */
import { InvalidPlanError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';

export interface GraphNode {
  key: string;
  dependsOn: readonly string[];
}

/**
 * Order nodes so every node follows its dependencies (Kahn's algorithm).
 * Among nodes that are free at the same time, input order is kept.
 *
 * Fails on an empty graph, duplicate keys, self-dependencies, dependencies
 * on unknown keys and cycles.
 */
export function topologicalOrder(nodes: readonly GraphNode[]): Result<string[], InvalidPlanError> {
  if (nodes.length === 0) {
    return err(new InvalidPlanError('Plan contains no subtasks'));
  }

  const position = new Map<string, number>();
  for (const [index, node] of nodes.entries()) {
    if (position.has(node.key)) {
      return err(new InvalidPlanError(`Duplicate subtask key "${node.key}"`, { key: node.key }));
    }
    position.set(node.key, index);
  }

  const indegree = new Map<string, number>();
  const dependents = new Map<string, string[]>();
  for (const node of nodes) {
    const unique = new Set(node.dependsOn);
    for (const dep of unique) {
      if (dep === node.key) {
        return err(new InvalidPlanError(`Subtask "${node.key}" depends on itself`, { key: node.key }));
      }
      if (!position.has(dep)) {
        return err(
          new InvalidPlanError(`Subtask "${node.key}" depends on unknown subtask "${dep}"`, {
            key: node.key,
            dependency: dep,
          }),
        );
      }
      dependents.set(dep, [...(dependents.get(dep) ?? []), node.key]);
    }
    indegree.set(node.key, unique.size);
  }

  const byPosition = (a: string, b: string): number => (position.get(a) ?? 0) - (position.get(b) ?? 0);
  const frontier = nodes.filter((n) => indegree.get(n.key) === 0).map((n) => n.key);
  const order: string[] = [];

  while (frontier.length > 0) {
    frontier.sort(byPosition);
    const key = frontier.shift();
    if (key === undefined) break;
    order.push(key);
    for (const dependent of dependents.get(key) ?? []) {
      const remaining = (indegree.get(dependent) ?? 0) - 1;
      indegree.set(dependent, remaining);
      if (remaining === 0) frontier.push(dependent);
    }
  }

  if (order.length !== nodes.length) {
    const cyclic = nodes.map((n) => n.key).filter((key) => !order.includes(key));
    return err(new InvalidPlanError('Plan contains a dependency cycle', { subtasks: cyclic }));
  }

  return ok(order);
}
