import type { AgentId, SubtaskId } from '@/core/types.js';
import type { HistoryEntry, HistoryEventType, Workflow } from './types.js';

/** Append a lifecycle event to the workflow's history with the next sequence number. */
export function appendHistory(
  workflow: Workflow,
  type: HistoryEventType,
  at: Date,
  fields: { subtaskId?: SubtaskId; agentId?: AgentId | null; detail?: string } = {},
): HistoryEntry {
  const last = workflow.history[workflow.history.length - 1];
  const entry: HistoryEntry = {
    sequence: (last?.sequence ?? 0) + 1,
    type,
    at,
    subtaskId: fields.subtaskId ?? null,
    agentId: fields.agentId ?? null,
    detail: fields.detail ?? null,
  };
  workflow.history.push(entry);
  return entry;
}
