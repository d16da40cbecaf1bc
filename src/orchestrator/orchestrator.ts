/**
 * Orchestrator — plans requests into workflows, runs them and keeps their
 * history.
 */
import { ValidationError, WorkflowNotFoundError, toError } from '@/core/errors.js';
import type { InvalidPlanError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import type { RequestContext } from '@/core/types.js';
import type { Logger } from '@/observability/logger.js';
import type { CommunicationBus } from '@/bus/types.js';
import { createExecutor } from './executor.js';
import type { ExecutorSettings } from './executor.js';
import { createPlanner } from './planner.js';
import { createWorkflowStore, serializeWorkflowHistory } from './workflow-store.js';
import type { RetentionPolicy, WorkflowListOptions } from './workflow-store.js';
import type { Decomposer, Workflow, WorkflowOutcome, WorkflowSummary } from './types.js';

// ─── Orchestrator Interface ──────────────────────────────────────

export interface Orchestrator {
  /**
   * Plan a request and store the resulting workflow without running it.
   * The context is copied; values that cannot be cloned (functions, sockets)
   * are rejected with a ValidationError before anything is stored.
   */
  plan(request: string, context?: RequestContext): Result<Workflow, InvalidPlanError | ValidationError>;
  /** Run a planned workflow to a terminal status. */
  execute(workflowId: string): Promise<Result<WorkflowOutcome, WorkflowNotFoundError | ValidationError>>;
  /** Plan and execute. */
  run(
    request: string,
    context?: RequestContext,
  ): Promise<Result<WorkflowOutcome, InvalidPlanError | ValidationError>>;
  /** Request cancellation. `false` when the workflow had already finished. */
  cancelWorkflow(workflowId: string): Result<boolean, WorkflowNotFoundError>;
  getWorkflow(workflowId: string): Workflow | null;
  listWorkflows(options?: WorkflowListOptions): WorkflowSummary[];
  countWorkflows(status?: Workflow['status']): number;
  /** Serialized subtasks and history, or null for an unknown workflow. */
  getWorkflowHistory(workflowId: string): string | null;
}

interface OrchestratorDeps {
  bus: CommunicationBus;
  logger: Logger;
  decomposer?: Decomposer;
  executor?: Partial<ExecutorSettings>;
  retention?: Partial<RetentionPolicy>;
  now?: () => Date;
}

const COMPONENT = 'orchestrator';

/** Stored workflows are deep-copied on read, so their context must be cloneable. */
function copyContext(context: RequestContext): Result<RequestContext, ValidationError> {
  try {
    return ok(structuredClone(context));
  } catch (error) {
    return err(
      new ValidationError('Request context contains values that cannot be copied', {
        keys: Object.keys(context),
        error: toError(error).message,
      }),
    );
  }
}

// ─── Factory Function ────────────────────────────────────────────

/**
 * Create an orchestrator over an explicit bus instance.
 */
export function createOrchestrator(deps: OrchestratorDeps): Orchestrator {
  const { bus, logger } = deps;
  const now = deps.now ?? ((): Date => new Date());
  const planner = createPlanner({
    logger,
    decomposer: deps.decomposer,
    hasCapability: (capability) => bus.findByCapability(capability).length > 0,
    now,
  });
  const executor = createExecutor({ bus, logger, settings: deps.executor, now });
  const store = createWorkflowStore({ logger, retention: deps.retention, now });
  const running = new Map<string, AbortController>();

  async function executeLive(workflow: Workflow): Promise<WorkflowOutcome> {
    const controller = new AbortController();
    running.set(workflow.id, controller);
    try {
      return await executor.execute(workflow, { signal: controller.signal });
    } finally {
      running.delete(workflow.id);
      store.evict();
    }
  }

  function planAndStore(
    request: string,
    context: RequestContext,
  ): Result<Workflow, InvalidPlanError | ValidationError> {
    const copied = copyContext(context);
    if (!copied.ok) {
      logger.warn('Request context rejected', { component: COMPONENT, ...copied.error.context });
      return copied;
    }
    const planned = planner.plan(request, copied.value);
    if (!planned.ok) return planned;
    store.save(planned.value);
    return planned;
  }

  const orchestrator: Orchestrator = {
    plan(request, context = {}) {
      const planned = planAndStore(request, context);
      return planned.ok ? ok(structuredClone(planned.value)) : planned;
    },

    async execute(workflowId) {
      const workflow = store.getLive(workflowId);
      if (!workflow) return err(new WorkflowNotFoundError(workflowId));
      if (workflow.status !== 'planning') {
        return err(
          new ValidationError(`Workflow "${workflowId}" has already been executed`, {
            workflowId,
            status: workflow.status,
          }),
        );
      }
      return ok(await executeLive(workflow));
    },

    async run(request, context = {}) {
      const planned = planAndStore(request, context);
      if (!planned.ok) return planned;
      return ok(await executeLive(planned.value));
    },

    cancelWorkflow(workflowId) {
      const workflow = store.getLive(workflowId);
      if (!workflow) return err(new WorkflowNotFoundError(workflowId));
      if (!executor.cancel(workflow)) return ok(false);
      running.get(workflow.id)?.abort();
      return ok(true);
    },

    getWorkflow: (workflowId) => store.get(workflowId),

    listWorkflows: (options) => store.list(options),

    countWorkflows: (status) => store.count(status),

    getWorkflowHistory(workflowId) {
      const workflow = store.getLive(workflowId);
      return workflow ? serializeWorkflowHistory(workflow) : null;
    },
  };

  return orchestrator;
}
