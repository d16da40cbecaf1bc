/**
 * Workflow store — in-memory workflow history with a retention policy.
 *
 * The orchestrator keeps the live workflow object; readers always get a deep
 * copy, so repeated reads of a settled workflow return identical data.
 * Only terminal workflows are evicted: when older than `ttlMs`, and oldest
 * first once the store holds more than `maxWorkflows`.
 */
import { z } from 'zod';
import { ValidationError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import type { AgentId, SubtaskId, WorkflowId } from '@/core/types.js';
import type { Logger } from '@/observability/logger.js';
import { HISTORY_EVENT_TYPES, TERMINAL_WORKFLOW_STATUSES } from './types.js';
import type { HistoryEntry, Subtask, Workflow, WorkflowStatus, WorkflowSummary } from './types.js';

// ─── Store Interface ─────────────────────────────────────────────

export interface WorkflowListOptions {
  status?: WorkflowStatus;
  limit?: number;
  offset?: number;
}

export interface WorkflowStore {
  save(workflow: Workflow): void;
  /** Deep copy of the workflow, or null when unknown or evicted. */
  get(workflowId: string): Workflow | null;
  /** Live object, for the orchestrator only. */
  getLive(workflowId: string): Workflow | undefined;
  /** Summaries, most recent first. */
  list(options?: WorkflowListOptions): WorkflowSummary[];
  count(status?: WorkflowStatus): number;
  /** Apply the retention policy. Returns how many workflows were removed. */
  evict(): number;
}

export interface RetentionPolicy {
  maxWorkflows: number;
  ttlMs: number;
}

export const DEFAULT_RETENTION: RetentionPolicy = {
  maxWorkflows: 1000,
  ttlMs: 24 * 60 * 60_000,
};

interface WorkflowStoreDeps {
  logger: Logger;
  retention?: Partial<RetentionPolicy>;
  now?: () => Date;
}

// ─── Helpers ─────────────────────────────────────────────────────

function summarize(workflow: Workflow): WorkflowSummary {
  return {
    id: workflow.id,
    originalRequest: workflow.originalRequest,
    status: workflow.status,
    subtaskCount: workflow.subtasks.length,
    completedCount: workflow.subtasks.filter((s) => s.status === 'completed').length,
    createdAt: new Date(workflow.createdAt),
    completedAt: workflow.completedAt ? new Date(workflow.completedAt) : null,
  };
}

// ─── Factory Function ────────────────────────────────────────────

/**
 * Create an in-memory workflow store.
 */
export function createWorkflowStore(deps: WorkflowStoreDeps): WorkflowStore {
  const { logger } = deps;
  const now = deps.now ?? ((): Date => new Date());
  const retention: RetentionPolicy = { ...DEFAULT_RETENTION, ...deps.retention };
  // Insertion order doubles as the tie-breaker for equal creation times.
  const workflows = new Map<WorkflowId, Workflow>();

  const store: WorkflowStore = {
    save(workflow) {
      workflows.set(workflow.id, workflow);
      store.evict();
    },

    get(workflowId) {
      const workflow = workflows.get(workflowId as WorkflowId);
      return workflow ? structuredClone(workflow) : null;
    },

    getLive(workflowId) {
      return workflows.get(workflowId as WorkflowId);
    },

    list(options = {}) {
      const offset = Math.max(0, options.offset ?? 0);
      const matching = [...workflows.values()]
        .reverse()
        .filter((w) => options.status === undefined || w.status === options.status)
        .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
      const page = options.limit === undefined ? matching.slice(offset) : matching.slice(offset, offset + options.limit);
      return page.map(summarize);
    },

    count(status) {
      if (status === undefined) return workflows.size;
      return [...workflows.values()].filter((w) => w.status === status).length;
    },

    evict() {
      const cutoff = now().getTime() - retention.ttlMs;
      let removed = 0;

      for (const [id, workflow] of workflows) {
        if (
          TERMINAL_WORKFLOW_STATUSES.has(workflow.status) &&
          workflow.completedAt !== null &&
          workflow.completedAt.getTime() < cutoff
        ) {
          workflows.delete(id);
          removed++;
        }
      }

      if (workflows.size > retention.maxWorkflows) {
        const oldestFirst = [...workflows.values()]
          .filter((w) => TERMINAL_WORKFLOW_STATUSES.has(w.status))
          .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
        for (const workflow of oldestFirst) {
          if (workflows.size <= retention.maxWorkflows) break;
          workflows.delete(workflow.id);
          removed++;
        }
      }

      if (removed > 0) {
        logger.debug('Evicted workflows', { component: 'workflow-store', removed, remaining: workflows.size });
      }
      return removed;
    },
  };

  return store;
}

// ─── History Serialization ──────────────────────────────────────

export interface WorkflowHistorySnapshot {
  workflowId: WorkflowId;
  status: WorkflowStatus;
  subtasks: Subtask[];
  history: HistoryEntry[];
}

const subtaskSchema = z.object({
  id: z.string().min(1),
  description: z.string(),
  requiredCapability: z.string().min(1),
  relatedCapabilities: z.array(z.string()),
  assignedAgentId: z.string().nullable(),
  dependencies: z.array(z.string()),
  status: z.enum(['pending', 'ready', 'running', 'completed', 'failed', 'skipped']),
  result: z.string().nullable(),
  error: z.string().nullable(),
  attempts: z.number().int().nonnegative(),
  startedAt: z.coerce.date().nullable(),
  completedAt: z.coerce.date().nullable(),
});

const historyEntrySchema = z.object({
  sequence: z.number().int().positive(),
  type: z.enum(HISTORY_EVENT_TYPES),
  at: z.coerce.date(),
  subtaskId: z.string().nullable(),
  agentId: z.string().nullable(),
  detail: z.string().nullable(),
});

const historySnapshotSchema = z
  .object({
    workflowId: z.string().min(1),
    status: z.enum(['planning', 'running', 'completed', 'failed', 'partial']),
    subtasks: z.array(subtaskSchema),
    history: z.array(historyEntrySchema),
  })
  .refine((s) => s.history.every((entry, i) => i === 0 || entry.sequence > (s.history[i - 1]?.sequence ?? 0)), {
    message: 'History sequence numbers must be strictly increasing',
    path: ['history'],
  });

/** Serialize a workflow's subtasks and history to JSON. */
export function serializeWorkflowHistory(workflow: Workflow): string {
  const snapshot: WorkflowHistorySnapshot = {
    workflowId: workflow.id,
    status: workflow.status,
    subtasks: workflow.subtasks,
    history: workflow.history,
  };
  return JSON.stringify(snapshot);
}

/** Parse and validate serialized workflow history. */
export function deserializeWorkflowHistory(json: string): Result<WorkflowHistorySnapshot, ValidationError> {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch {
    return err(new ValidationError('Invalid JSON in serialized workflow history'));
  }

  const parsed = historySnapshotSchema.safeParse(raw);
  if (!parsed.success) {
    return err(
      new ValidationError('Serialized workflow history failed validation', {
        issues: parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
      }),
    );
  }

  const data = parsed.data;
  return ok({
    workflowId: data.workflowId as WorkflowId,
    status: data.status,
    subtasks: data.subtasks.map((s) => ({
      ...s,
      id: s.id as SubtaskId,
      assignedAgentId: s.assignedAgentId === null ? null : (s.assignedAgentId as AgentId),
      dependencies: s.dependencies.map((d) => d as SubtaskId),
    })),
    history: data.history.map((entry) => ({
      ...entry,
      subtaskId: entry.subtaskId === null ? null : (entry.subtaskId as SubtaskId),
      agentId: entry.agentId === null ? null : (entry.agentId as AgentId),
    })),
  });
}
