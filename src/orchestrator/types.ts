/**
 * Orchestrator types — workflows, subtasks and their lifecycle history.
 */
import type { AgentId, Capability, RequestContext, SubtaskId, WorkflowId } from '@/core/types.js';

// ─── Subtask ─────────────────────────────────────────────────────

export type SubtaskStatus = 'pending' | 'ready' | 'running' | 'completed' | 'failed' | 'skipped';

export interface Subtask {
  id: SubtaskId;
  description: string;
  requiredCapability: Capability;
  /** Tags accepted when the selection pool has to be widened. */
  relatedCapabilities: Capability[];
  assignedAgentId: AgentId | null;
  dependencies: SubtaskId[];
  status: SubtaskStatus;
  result: string | null;
  error: string | null;
  /** Messages sent for this subtask, reassignments included. */
  attempts: number;
  startedAt: Date | null;
  completedAt: Date | null;
}

// ─── History ─────────────────────────────────────────────────────

export const HISTORY_EVENT_TYPES = [
  'workflow_created',
  'workflow_started',
  'subtask_ready',
  'subtask_started',
  'subtask_reassigned',
  'subtask_completed',
  'subtask_failed',
  'subtask_skipped',
  'workflow_cancel_requested',
  'workflow_finished',
] as const;

export type HistoryEventType = (typeof HISTORY_EVENT_TYPES)[number];

export interface HistoryEntry {
  /** Strictly increasing within a workflow, starting at 1. */
  sequence: number;
  type: HistoryEventType;
  at: Date;
  subtaskId: SubtaskId | null;
  agentId: AgentId | null;
  detail: string | null;
}

// ─── Workflow ────────────────────────────────────────────────────

export type WorkflowStatus = 'planning' | 'running' | 'completed' | 'failed' | 'partial';

export const TERMINAL_WORKFLOW_STATUSES: ReadonlySet<WorkflowStatus> = new Set([
  'completed',
  'failed',
  'partial',
]);

export interface Workflow {
  id: WorkflowId;
  originalRequest: string;
  context: RequestContext;
  /** Stored in topological order. */
  subtasks: Subtask[];
  status: WorkflowStatus;
  createdAt: Date;
  completedAt: Date | null;
  history: HistoryEntry[];
  cancelRequested: boolean;
}

export interface WorkflowSummary {
  id: WorkflowId;
  originalRequest: string;
  status: WorkflowStatus;
  subtaskCount: number;
  completedCount: number;
  createdAt: Date;
  completedAt: Date | null;
}

// ─── Outcome ─────────────────────────────────────────────────────

export interface SubtaskResult {
  subtaskId: SubtaskId;
  description: string;
  agentId: AgentId | null;
  content: string;
}

export interface SubtaskFailure {
  subtaskId: SubtaskId;
  description: string;
  status: 'failed' | 'skipped';
  reason: string;
}

/** What a workflow run hands back to its caller. Never an exception. */
export interface WorkflowOutcome {
  workflowId: WorkflowId;
  status: WorkflowStatus;
  results: SubtaskResult[];
  failures: SubtaskFailure[];
  summary: string;
}

// ─── Planning ────────────────────────────────────────────────────

/** A step proposed by a decomposer, before ids are assigned. */
export interface PlannedStep {
  /** Unique within one plan; `dependsOn` refers to these keys. */
  key: string;
  description: string;
  capability: Capability;
  relatedCapabilities?: Capability[];
  dependsOn?: string[];
}

/** Splits a request into planned steps. Must be deterministic. */
export interface Decomposer {
  decompose(request: string, context: RequestContext): PlannedStep[];
}
