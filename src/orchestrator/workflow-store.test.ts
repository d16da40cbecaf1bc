import { describe, it, expect, beforeEach } from 'vitest';
import type { SubtaskId, WorkflowId } from '@/core/types.js';
import { createMockLogger } from '@/testing/fixtures/logger.js';
import { appendHistory } from './history.js';
import type { Workflow, WorkflowStatus } from './types.js';
import {
  createWorkflowStore,
  deserializeWorkflowHistory,
  serializeWorkflowHistory,
} from './workflow-store.js';

const T0 = new Date('2026-05-01T08:00:00Z');

function makeWorkflow(id: string, status: WorkflowStatus, createdAt: Date, completedAt: Date | null = null): Workflow {
  return {
    id: id as WorkflowId,
    originalRequest: `request ${id}`,
    context: {},
    subtasks: [],
    status,
    createdAt,
    completedAt,
    history: [],
    cancelRequested: false,
  };
}

function minutesAfter(base: Date, minutes: number): Date {
  return new Date(base.getTime() + minutes * 60_000);
}

function finishedWorkflow(): Workflow {
  const workflow = makeWorkflow('wf-1', 'partial', T0, minutesAfter(T0, 2));
  const a = 'st-a' as SubtaskId;
  const b = 'st-b' as SubtaskId;
  workflow.subtasks = [
    {
      id: a,
      description: 'A',
      requiredCapability: 'a',
      relatedCapabilities: ['alpha'],
      assignedAgentId: null,
      dependencies: [],
      status: 'completed',
      result: 'done',
      error: null,
      attempts: 1,
      startedAt: minutesAfter(T0, 1),
      completedAt: minutesAfter(T0, 2),
    },
    {
      id: b,
      description: 'B',
      requiredCapability: 'b',
      relatedCapabilities: [],
      assignedAgentId: null,
      dependencies: [a],
      status: 'failed',
      result: null,
      error: 'boom',
      attempts: 2,
      startedAt: null,
      completedAt: minutesAfter(T0, 2),
    },
  ];
  appendHistory(workflow, 'workflow_created', T0);
  appendHistory(workflow, 'subtask_completed', minutesAfter(T0, 2), { subtaskId: a });
  appendHistory(workflow, 'subtask_failed', minutesAfter(T0, 2), { subtaskId: b, detail: 'boom' });
  appendHistory(workflow, 'workflow_finished', minutesAfter(T0, 2), { detail: 'partial' });
  return workflow;
}

describe('createWorkflowStore', () => {
  let clock: Date;
  const logger = createMockLogger();

  beforeEach(() => {
    clock = T0;
  });

  function store(retention?: { maxWorkflows?: number; ttlMs?: number }): ReturnType<typeof createWorkflowStore> {
    return createWorkflowStore({ logger, retention, now: () => clock });
  }

  it('returns identical deep copies on repeated reads', () => {
    const s = store();
    s.save(finishedWorkflow());

    const first = s.get('wf-1');
    const second = s.get('wf-1');

    expect(first).toEqual(second);
    expect(first).not.toBe(second);
    first?.subtasks.pop();
    expect(s.get('wf-1')?.subtasks).toHaveLength(2);
  });

  it('returns null for an unknown id', () => {
    expect(store().get('nope')).toBeNull();
  });

  it('lists summaries most recent first with status filter and paging', () => {
    const s = store();
    s.save(makeWorkflow('old', 'completed', T0, T0));
    s.save(makeWorkflow('mid', 'failed', minutesAfter(T0, 1), minutesAfter(T0, 1)));
    s.save(makeWorkflow('new', 'completed', minutesAfter(T0, 2), minutesAfter(T0, 2)));

    expect(s.list().map((w) => w.id)).toEqual(['new', 'mid', 'old']);
    expect(s.list({ status: 'completed' }).map((w) => w.id)).toEqual(['new', 'old']);
    expect(s.list({ limit: 1, offset: 1 }).map((w) => w.id)).toEqual(['mid']);
    expect(s.count('completed')).toBe(2);
  });

  it('evicts the oldest terminal workflows beyond capacity, never running ones', () => {
    const s = store({ maxWorkflows: 2 });
    s.save(makeWorkflow('running', 'running', T0));
    s.save(makeWorkflow('done-1', 'completed', minutesAfter(T0, 1), minutesAfter(T0, 1)));
    s.save(makeWorkflow('done-2', 'completed', minutesAfter(T0, 2), minutesAfter(T0, 2)));

    expect(s.list().map((w) => w.id)).toEqual(['done-2', 'running']);
  });

  it('evicts terminal workflows older than the ttl', () => {
    const s = store({ ttlMs: 10 * 60_000 });
    s.save(makeWorkflow('done', 'completed', T0, T0));
    s.save(makeWorkflow('planned', 'planning', T0));

    clock = minutesAfter(T0, 11);

    expect(s.evict()).toBe(1);
    expect(s.get('done')).toBeNull();
    expect(s.get('planned')).not.toBeNull();
  });
});

describe('workflow history serialization', () => {
  it('restores subtasks and history with order and terminal statuses intact', () => {
    const workflow = finishedWorkflow();

    const result = deserializeWorkflowHistory(serializeWorkflowHistory(workflow));

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toEqual({
      workflowId: workflow.id,
      status: 'partial',
      subtasks: workflow.subtasks,
      history: workflow.history,
    });
    expect(result.value.history.map((e) => e.sequence)).toEqual([1, 2, 3, 4]);
  });

  it('rejects history whose sequence numbers go backwards', () => {
    const workflow = finishedWorkflow();
    const [first, second] = workflow.history;
    if (!first || !second) throw new Error('fixture has history');
    workflow.history = [second, first];

    const result = deserializeWorkflowHistory(serializeWorkflowHistory(workflow));

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('Serialized workflow history failed validation');
  });

  it('rejects malformed JSON', () => {
    const result = deserializeWorkflowHistory('[');
    expect(result.ok).toBe(false);
  });
});
