/**
 * Workflow executor.
 *
 * Runs a planned workflow in waves: every pending subtask whose dependencies
 * have all completed is promoted to `ready`, up to `maxConcurrency` of them
 * are dispatched through the bus together, and the wave is allowed to settle
 * before the next one starts. History entries are appended in dispatch
 * order, so two runs with the same agent behavior produce the same history.
 *
 * A terminal subtask failure skips every transitive dependent; independent
 * branches keep running.
 */
import { RequestCancelledError, isRetryableError, toError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import type { AgentId } from '@/core/types.js';
import type { Logger } from '@/observability/logger.js';
import type { AgentRecord } from '@/agents/types.js';
import { createRequest } from '@/bus/message.js';
import type { CommunicationBus } from '@/bus/types.js';
import { DEFAULT_SELECTION_WEIGHTS, selectAgent } from './agent-selector.js';
import type { SelectionWeights } from './agent-selector.js';
import { appendHistory } from './history.js';
import type {
  Subtask,
  SubtaskFailure,
  SubtaskResult,
  Workflow,
  WorkflowOutcome,
  WorkflowStatus,
} from './types.js';
import { TERMINAL_WORKFLOW_STATUSES } from './types.js';

// ─── Settings ────────────────────────────────────────────────────

export interface ExecutorSettings {
  maxConcurrency: number;
  /** How many other agents a subtask may move to after a transport failure. */
  maxReassignments: number;
  fallbackAgentId: string | null;
  weights: SelectionWeights;
  /** Per-subtask request timeout; `null` defers to the bus. */
  subtaskTimeoutMs: number | null;
}

export const DEFAULT_EXECUTOR_SETTINGS: ExecutorSettings = {
  maxConcurrency: 4,
  maxReassignments: 1,
  fallbackAgentId: null,
  weights: DEFAULT_SELECTION_WEIGHTS,
  subtaskTimeoutMs: null,
};

/** Sender id the executor uses for subtask requests. */
export const ORCHESTRATOR_AGENT_ID = 'orchestrator';

export const CANCELLED_REASON = 'cancelled';

// ─── Executor Interface ──────────────────────────────────────────

export interface ExecuteOptions {
  /** Aborting stops waiting on in-flight subtasks and prevents further waves. */
  signal?: AbortSignal;
}

export interface Executor {
  execute(workflow: Workflow, options?: ExecuteOptions): Promise<WorkflowOutcome>;
  /**
   * Mark a workflow cancelled; it stops before its next wave, or before its
   * first if it has not started. False when it already finished or was cancelled.
   */
  cancel(workflow: Workflow): boolean;
}

interface ExecutorDeps {
  bus: CommunicationBus;
  logger: Logger;
  settings?: Partial<ExecutorSettings>;
  now?: () => Date;
}

interface Reassignment {
  from: AgentId;
  to: AgentId;
  reason: string;
}

interface SubtaskRun {
  subtask: Subtask;
  agentId: AgentId | null;
  result: Result<string, Error>;
  reassignments: Reassignment[];
}

const COMPONENT = 'executor';

// ─── Outcome ─────────────────────────────────────────────────────

/** Final status from subtask statuses: all completed, none completed, or some. */
export function deriveWorkflowStatus(subtasks: readonly Subtask[]): WorkflowStatus {
  const completed = subtasks.filter((s) => s.status === 'completed').length;
  if (completed === subtasks.length) return 'completed';
  if (completed === 0) return 'failed';
  return 'partial';
}

/** Summarize a workflow's results and failures for the caller. */
export function buildOutcome(workflow: Workflow): WorkflowOutcome {
  const results: SubtaskResult[] = [];
  const failures: SubtaskFailure[] = [];

  for (const subtask of workflow.subtasks) {
    if (subtask.status === 'completed') {
      results.push({
        subtaskId: subtask.id,
        description: subtask.description,
        agentId: subtask.assignedAgentId,
        content: subtask.result ?? '',
      });
    } else if (subtask.status === 'failed' || subtask.status === 'skipped') {
      failures.push({
        subtaskId: subtask.id,
        description: subtask.description,
        status: subtask.status,
        reason: subtask.error ?? 'unknown',
      });
    }
  }

  const lines = [
    `Workflow ${workflow.status}: ${results.length} of ${workflow.subtasks.length} subtasks completed.`,
    ...results.map((r) => `[${r.description}] ${r.content}`),
    ...failures.map((f) => `[${f.description}] ${f.status}: ${f.reason}`),
  ];

  return {
    workflowId: workflow.id,
    status: workflow.status,
    results,
    failures,
    summary: lines.join('\n'),
  };
}

// ─── Factory Function ────────────────────────────────────────────

/**
 * Create an executor dispatching subtasks through the bus.
 */
export function createExecutor(deps: ExecutorDeps): Executor {
  const { bus, logger } = deps;
  const now = deps.now ?? ((): Date => new Date());
  const settings: ExecutorSettings = { ...DEFAULT_EXECUTOR_SETTINGS, ...deps.settings };
  const maxConcurrency = Math.max(1, Math.floor(settings.maxConcurrency));

  function select(subtask: Subtask, exclude?: ReadonlySet<string>): ReturnType<typeof selectAgent> {
    return selectAgent(subtask, bus.listAgents(), {
      weights: settings.weights,
      fallbackAgentId: settings.fallbackAgentId,
      exclude,
      now: now(),
    });
  }

  function buildQuery(workflow: Workflow, subtask: Subtask): string {
    const upstream = workflow.subtasks.filter(
      (s) => subtask.dependencies.includes(s.id) && s.status === 'completed',
    );
    if (upstream.length === 0) return subtask.description;
    const results = upstream.map((s) => `- ${s.description}: ${s.result ?? ''}`);
    return `${subtask.description}\n\nResults from previous steps:\n${results.join('\n')}`;
  }

  /** Send a subtask to `first`, moving to other agents on transport failures. Never rejects. */
  async function runSubtask(
    workflow: Workflow,
    subtask: Subtask,
    first: AgentRecord,
    signal: AbortSignal | undefined,
  ): Promise<SubtaskRun> {
    const query = buildQuery(workflow, subtask);
    const tried = new Set<string>();
    const reassignments: Reassignment[] = [];
    let agent = first;

    for (;;) {
      tried.add(agent.agentId);
      subtask.attempts += 1;
      subtask.assignedAgentId = agent.agentId;

      const request = createRequest(ORCHESTRATOR_AGENT_ID, agent.agentId, query, {
        context: { ...workflow.context, workflowId: workflow.id, subtaskId: subtask.id },
        ...(settings.subtaskTimeoutMs !== null && { timeoutMs: settings.subtaskTimeoutMs }),
      });

      try {
        const reply = await bus.sendAndAwait(request, { signal });
        return { subtask, agentId: agent.agentId, result: ok(reply.content), reassignments };
      } catch (error) {
        const failure = toError(error);
        const canReassign =
          isRetryableError(failure) &&
          reassignments.length < settings.maxReassignments &&
          signal?.aborted !== true;
        const next = canReassign ? select(subtask, tried) : undefined;
        if (next === undefined || !next.ok) {
          return { subtask, agentId: agent.agentId, result: err(failure), reassignments };
        }

        logger.info('Reassigning subtask to another agent', {
          component: COMPONENT,
          workflowId: workflow.id,
          subtaskId: subtask.id,
          from: agent.agentId,
          to: next.value.agentId,
          reason: failure.message,
        });
        reassignments.push({ from: agent.agentId, to: next.value.agentId, reason: failure.message });
        agent = next.value;
      }
    }
  }

  function skip(workflow: Workflow, subtask: Subtask, reason: string): void {
    subtask.status = 'skipped';
    subtask.error = reason;
    subtask.completedAt = now();
    appendHistory(workflow, 'subtask_skipped', subtask.completedAt, {
      subtaskId: subtask.id,
      detail: reason,
    });
  }

  function promoteReady(workflow: Workflow): void {
    const completed = new Set(
      workflow.subtasks.filter((s) => s.status === 'completed').map((s) => s.id),
    );
    for (const subtask of workflow.subtasks) {
      if (subtask.status === 'pending' && subtask.dependencies.every((d) => completed.has(d))) {
        subtask.status = 'ready';
        appendHistory(workflow, 'subtask_ready', now(), { subtaskId: subtask.id });
      }
    }
  }

  /** Skip every waiting subtask downstream of a failed or skipped one. Subtasks are in topological order. */
  function propagateFailures(workflow: Workflow): void {
    const byId = new Map(workflow.subtasks.map((s) => [s.id, s]));
    for (const subtask of workflow.subtasks) {
      if (subtask.status !== 'pending' && subtask.status !== 'ready') continue;
      const blocker = subtask.dependencies
        .map((id) => byId.get(id))
        .find((dep) => dep?.status === 'failed' || dep?.status === 'skipped');
      if (blocker) {
        skip(workflow, subtask, `Dependency ${blocker.id} ${blocker.status}`);
      }
    }
  }

  function skipRemaining(workflow: Workflow, reason: string): void {
    for (const subtask of workflow.subtasks) {
      if (subtask.status === 'pending' || subtask.status === 'ready') {
        skip(workflow, subtask, reason);
      }
    }
  }

  function applyRun(workflow: Workflow, run: SubtaskRun): void {
    const { subtask, result } = run;
    for (const r of run.reassignments) {
      appendHistory(workflow, 'subtask_reassigned', now(), {
        subtaskId: subtask.id,
        agentId: r.to,
        detail: `from ${r.from}: ${r.reason}`,
      });
    }

    if (result.ok) {
      subtask.status = 'completed';
      subtask.result = result.value;
      subtask.completedAt = now();
      appendHistory(workflow, 'subtask_completed', subtask.completedAt, {
        subtaskId: subtask.id,
        agentId: run.agentId,
      });
      logger.debug('Subtask completed', {
        component: COMPONENT,
        workflowId: workflow.id,
        subtaskId: subtask.id,
        agentId: run.agentId ?? undefined,
      });
      return;
    }

    if (result.error instanceof RequestCancelledError) {
      skip(workflow, subtask, CANCELLED_REASON);
      return;
    }

    subtask.status = 'failed';
    subtask.error = result.error.message;
    subtask.completedAt = now();
    appendHistory(workflow, 'subtask_failed', subtask.completedAt, {
      subtaskId: subtask.id,
      agentId: run.agentId,
      detail: result.error.message,
    });
    logger.warn('Subtask failed', {
      component: COMPONENT,
      workflowId: workflow.id,
      subtaskId: subtask.id,
      agentId: run.agentId ?? undefined,
      error: result.error.message,
    });
  }

  /** Start one subtask of the wave: select an agent, record the start, send. */
  function launch(workflow: Workflow, subtask: Subtask, signal: AbortSignal | undefined): Promise<SubtaskRun> {
    const selection = select(subtask);
    if (!selection.ok) {
      return Promise.resolve({ subtask, agentId: null, result: err(selection.error), reassignments: [] });
    }

    const agent = selection.value;
    subtask.status = 'running';
    subtask.assignedAgentId = agent.agentId;
    subtask.startedAt = now();
    appendHistory(workflow, 'subtask_started', subtask.startedAt, {
      subtaskId: subtask.id,
      agentId: agent.agentId,
    });
    return runSubtask(workflow, subtask, agent, signal);
  }

  function cancel(workflow: Workflow): boolean {
    if (TERMINAL_WORKFLOW_STATUSES.has(workflow.status) || workflow.cancelRequested) return false;

    workflow.cancelRequested = true;
    appendHistory(workflow, 'workflow_cancel_requested', now());
    logger.info('Workflow cancellation requested', { component: COMPONENT, workflowId: workflow.id });
    return true;
  }

  return {
    cancel,

    async execute(workflow, options = {}) {
      const { signal } = options;
      const cancelled = (): boolean => workflow.cancelRequested || signal?.aborted === true;
      const onAbort = (): void => {
        cancel(workflow);
      };

      workflow.status = 'running';
      appendHistory(workflow, 'workflow_started', now());
      logger.info('Workflow execution started', {
        component: COMPONENT,
        workflowId: workflow.id,
        subtasks: workflow.subtasks.length,
      });

      if (signal?.aborted) onAbort();
      signal?.addEventListener('abort', onAbort, { once: true });
      try {
        for (;;) {
          if (cancelled()) {
            skipRemaining(workflow, CANCELLED_REASON);
            break;
          }

          promoteReady(workflow);
          const wave = workflow.subtasks.filter((s) => s.status === 'ready').slice(0, maxConcurrency);
          if (wave.length === 0) {
            skipRemaining(workflow, 'Dependencies can never complete');
            break;
          }

          const runs = await Promise.all(wave.map((subtask) => launch(workflow, subtask, signal)));
          for (const run of runs) {
            applyRun(workflow, run);
          }
          // Cancellation wins over dependency failures as the skip reason.
          if (!cancelled()) propagateFailures(workflow);
        }
      } finally {
        signal?.removeEventListener('abort', onAbort);
      }

      workflow.status = deriveWorkflowStatus(workflow.subtasks);
      workflow.completedAt = now();
      appendHistory(workflow, 'workflow_finished', workflow.completedAt, { detail: workflow.status });

      logger.info('Workflow execution finished', {
        component: COMPONENT,
        workflowId: workflow.id,
        status: workflow.status,
      });
      return buildOutcome(workflow);
    },
  };
}
