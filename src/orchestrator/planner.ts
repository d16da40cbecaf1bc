/**
 * Planner — turns a request into a validated workflow.
 *
 * The graph is checked before anything runs: an empty plan, unknown or
 * self-referencing dependencies and cycles are rejected. Capabilities no
 * registered agent advertises are only warned about, since agents may
 * register before execution.
 */
import { nanoid } from 'nanoid';
import type { InvalidPlanError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import type { Capability, RequestContext, SubtaskId, WorkflowId } from '@/core/types.js';
import type { Logger } from '@/observability/logger.js';
import { createRuleDecomposer } from './decomposer.js';
import { topologicalOrder } from './graph.js';
import { appendHistory } from './history.js';
import type { Decomposer, PlannedStep, Subtask, Workflow } from './types.js';

// ─── Planner Interface ───────────────────────────────────────────

export interface Planner {
  plan(request: string, context?: RequestContext): Result<Workflow, InvalidPlanError>;
}

interface PlannerDeps {
  logger: Logger;
  decomposer?: Decomposer;
  /** Whether any registered agent advertises the capability. */
  hasCapability?: (capability: Capability) => boolean;
  now?: () => Date;
}

const COMPONENT = 'planner';

// ─── Factory Function ────────────────────────────────────────────

/**
 * Create a planner backed by a decomposer (rule-based by default).
 */
export function createPlanner(deps: PlannerDeps): Planner {
  const { logger } = deps;
  const decomposer = deps.decomposer ?? createRuleDecomposer();
  const now = deps.now ?? ((): Date => new Date());

  function buildSubtasks(steps: readonly PlannedStep[], order: readonly string[]): Subtask[] {
    const ids = new Map<string, SubtaskId>(steps.map((step) => [step.key, nanoid() as SubtaskId]));
    const byKey = new Map(steps.map((step) => [step.key, step]));

    const subtasks: Subtask[] = [];
    for (const key of order) {
      const step = byKey.get(key);
      const id = ids.get(key);
      if (!step || !id) continue;
      subtasks.push({
        id,
        description: step.description,
        requiredCapability: step.capability,
        relatedCapabilities: [...(step.relatedCapabilities ?? [])],
        assignedAgentId: null,
        dependencies: [...new Set(step.dependsOn ?? [])].flatMap((dep) => {
          const depId = ids.get(dep);
          return depId ? [depId] : [];
        }),
        status: 'pending',
        result: null,
        error: null,
        attempts: 0,
        startedAt: null,
        completedAt: null,
      });
    }
    return subtasks;
  }

  return {
    plan(request, context = {}) {
      const steps = decomposer.decompose(request, context);
      const ordered = topologicalOrder(steps.map((s) => ({ key: s.key, dependsOn: s.dependsOn ?? [] })));
      if (!ordered.ok) {
        logger.warn('Plan rejected', {
          component: COMPONENT,
          error: ordered.error.message,
          ...ordered.error.context,
        });
        return err(ordered.error);
      }

      const workflow: Workflow = {
        id: nanoid() as WorkflowId,
        originalRequest: request,
        context: { ...context },
        subtasks: buildSubtasks(steps, ordered.value),
        status: 'planning',
        createdAt: now(),
        completedAt: null,
        history: [],
        cancelRequested: false,
      };
      appendHistory(workflow, 'workflow_created', workflow.createdAt, {
        detail: `${workflow.subtasks.length} subtask(s) planned`,
      });

      if (deps.hasCapability) {
        for (const subtask of workflow.subtasks) {
          if (!deps.hasCapability(subtask.requiredCapability)) {
            logger.warn('No registered agent advertises the required capability', {
              component: COMPONENT,
              workflowId: workflow.id,
              subtaskId: subtask.id,
              capability: subtask.requiredCapability,
            });
          }
        }
      }

      logger.info('Workflow planned', {
        component: COMPONENT,
        workflowId: workflow.id,
        subtasks: workflow.subtasks.length,
      });
      return ok(workflow);
    },
  };
}
