/**
 * Executor Tests
 *
 * Runs planned workflows against a real bus populated with scripted agents.
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { unwrap } from '@/core/result.js';
import { createAgent } from '@/agents/agent.js';
import { createCommunicationBus } from '@/bus/communication-bus.js';
import type { CommunicationBus } from '@/bus/types.js';
import { createMockLogger } from '@/testing/fixtures/logger.js';
import type { MockLogger } from '@/testing/fixtures/logger.js';
import {
  createDeferred,
  createFailingAgent,
  createReplyingAgent,
  createSilentAgent,
} from '@/testing/fixtures/agents.js';
import { createExecutor } from './executor.js';
import { createPlanner } from './planner.js';
import type { PlannedStep, Subtask, Workflow } from './types.js';

const FAN_OUT: PlannedStep[] = [
  { key: 'a', description: 'A', capability: 'a' },
  { key: 'b', description: 'B', capability: 'b', dependsOn: ['a'] },
  { key: 'c', description: 'C', capability: 'c', dependsOn: ['a'] },
];

describe('createExecutor', () => {
  let logger: MockLogger;
  let bus: CommunicationBus;

  beforeEach(() => {
    logger = createMockLogger();
    bus = createCommunicationBus({ logger });
  });

  function planWorkflow(steps: PlannedStep[]): Workflow {
    const planner = createPlanner({ logger, decomposer: { decompose: () => steps } });
    return unwrap(planner.plan('request'));
  }

  function byDescription(workflow: Workflow, description: string): Subtask {
    const subtask = workflow.subtasks.find((s) => s.description === description);
    if (!subtask) throw new Error(`No subtask "${description}"`);
    return subtask;
  }

  function eventTypes(workflow: Workflow): string[] {
    return workflow.history.map((entry) => {
      const subtask = workflow.subtasks.find((s) => s.id === entry.subtaskId);
      return subtask ? `${entry.type}:${subtask.description}` : entry.type;
    });
  }

  it('skips every dependent of a failed subtask and reports failure', async () => {
    bus.register(createFailingAgent('agent-a', ['a'], 'upstream exploded'));
    bus.register(createReplyingAgent('agent-b', ['b']));
    bus.register(createReplyingAgent('agent-c', ['c']));
    const workflow = planWorkflow(FAN_OUT);
    const a = byDescription(workflow, 'A');

    const outcome = await createExecutor({ bus, logger }).execute(workflow);

    expect(workflow.status).toBe('failed');
    expect(workflow.subtasks.map((s) => s.status)).toEqual(['failed', 'skipped', 'skipped']);
    expect(outcome.status).toBe('failed');
    expect(outcome.results).toEqual([]);
    expect(outcome.failures).toEqual([
      { subtaskId: a.id, description: 'A', status: 'failed', reason: 'upstream exploded' },
      { subtaskId: byDescription(workflow, 'B').id, description: 'B', status: 'skipped', reason: `Dependency ${a.id} failed` },
      { subtaskId: byDescription(workflow, 'C').id, description: 'C', status: 'skipped', reason: `Dependency ${a.id} failed` },
    ]);
    expect(bus.getAgent('agent-b')?.totalRequests).toBe(0);
  });

  it('keeps running independent branches and reports partial', async () => {
    bus.register(createFailingAgent('agent-a', ['a']));
    bus.register(createReplyingAgent('agent-d', ['d']));
    const workflow = planWorkflow([
      { key: 'a', description: 'A', capability: 'a' },
      { key: 'b', description: 'B', capability: 'a', dependsOn: ['a'] },
      { key: 'd', description: 'D', capability: 'd' },
    ]);

    const outcome = await createExecutor({ bus, logger }).execute(workflow);

    expect(outcome.status).toBe('partial');
    expect(outcome.results).toEqual([
      { subtaskId: byDescription(workflow, 'D').id, description: 'D', agentId: 'agent-d', content: 'agent-d: D' },
    ]);
    expect(outcome.summary.split('\n')).toEqual([
      'Workflow partial: 1 of 3 subtasks completed.',
      '[D] agent-d: D',
      '[A] failed: agent failed',
      `[B] skipped: Dependency ${byDescription(workflow, 'A').id} failed`,
    ]);
  });

  it('passes dependency results along with the subtask description', async () => {
    bus.register(createReplyingAgent('agent-a', ['a']));
    bus.register(createReplyingAgent('agent-b', ['b']));
    const workflow = planWorkflow([
      { key: 'a', description: 'A', capability: 'a' },
      { key: 'b', description: 'B', capability: 'b', dependsOn: ['a'] },
    ]);

    const outcome = await createExecutor({ bus, logger }).execute(workflow);

    expect(outcome.status).toBe('completed');
    expect(byDescription(workflow, 'B').result).toBe(
      'agent-b: B\n\nResults from previous steps:\n- A: agent-a: A',
    );
  });

  it('appends history in a deterministic order', async () => {
    bus.register(createReplyingAgent('agent-a', ['a']));
    bus.register(createReplyingAgent('agent-b', ['b']));
    bus.register(createReplyingAgent('agent-c', ['c']));
    const workflow = planWorkflow(FAN_OUT);

    await createExecutor({ bus, logger }).execute(workflow);

    expect(eventTypes(workflow)).toEqual([
      'workflow_created',
      'workflow_started',
      'subtask_ready:A',
      'subtask_started:A',
      'subtask_completed:A',
      'subtask_ready:B',
      'subtask_ready:C',
      'subtask_started:B',
      'subtask_started:C',
      'subtask_completed:B',
      'subtask_completed:C',
      'workflow_finished',
    ]);
    expect(workflow.history.map((e) => e.sequence)).toEqual(workflow.history.map((_, i) => i + 1));
    expect(workflow.completedAt).toBeInstanceOf(Date);
  });

  it('promotes a subtask to ready only once every dependency has completed', async () => {
    bus.register(createReplyingAgent('agent-ok', ['ok']));
    bus.register(createFailingAgent('agent-bad', ['bad']));
    const workflow = planWorkflow([
      { key: 'root', description: 'root', capability: 'ok' },
      { key: 'left', description: 'left', capability: 'ok', dependsOn: ['root'] },
      { key: 'right', description: 'right', capability: 'bad', dependsOn: ['root'] },
      { key: 'join', description: 'join', capability: 'ok', dependsOn: ['left', 'right'] },
      { key: 'tail', description: 'tail', capability: 'ok', dependsOn: ['left'] },
    ]);

    await createExecutor({ bus, logger }).execute(workflow);

    const completedAt = new Map<string, number>();
    for (const entry of workflow.history) {
      if (entry.type === 'subtask_completed' && entry.subtaskId) completedAt.set(entry.subtaskId, entry.sequence);
      if (entry.type === 'subtask_ready') {
        const subtask = workflow.subtasks.find((s) => s.id === entry.subtaskId);
        for (const dep of subtask?.dependencies ?? []) {
          expect(completedAt.get(dep)).toBeLessThan(entry.sequence);
        }
      }
    }
    expect(workflow.subtasks.map((s) => `${s.description}:${s.status}`)).toEqual([
      'root:completed',
      'left:completed',
      'right:failed',
      'join:skipped',
      'tail:completed',
    ]);
    expect(workflow.history.some((e) => e.type === 'subtask_ready' && e.subtaskId === byDescription(workflow, 'join').id)).toBe(false);
  });

  it('dispatches at most maxConcurrency subtasks per wave', async () => {
    bus.register(createReplyingAgent('agent-a', ['a']));
    bus.register(createReplyingAgent('agent-b', ['b']));
    bus.register(createReplyingAgent('agent-c', ['c']));
    const workflow = planWorkflow(FAN_OUT);

    await createExecutor({ bus, logger, settings: { maxConcurrency: 1 } }).execute(workflow);

    expect(eventTypes(workflow).slice(5, 11)).toEqual([
      'subtask_ready:B',
      'subtask_ready:C',
      'subtask_started:B',
      'subtask_completed:B',
      'subtask_started:C',
      'subtask_completed:C',
    ]);
  });

  it('reassigns a timed-out subtask to another capable agent', async () => {
    bus = createCommunicationBus({ logger, settings: { defaultTimeoutMs: 20, retry: { attempts: 1, backoffMultiplier: 1 } } });
    bus.register(createSilentAgent('a-silent', ['x']));
    bus.register(createReplyingAgent('b-ok', ['x']));
    const workflow = planWorkflow([{ key: 'only', description: 'work', capability: 'x' }]);

    const outcome = await createExecutor({ bus, logger }).execute(workflow);

    const subtask = byDescription(workflow, 'work');
    expect(outcome.status).toBe('completed');
    expect(subtask).toMatchObject({ status: 'completed', assignedAgentId: 'b-ok', attempts: 2, result: 'b-ok: work' });
    expect(workflow.history.find((e) => e.type === 'subtask_reassigned')).toMatchObject({
      agentId: 'b-ok',
      detail: 'from a-silent: Agent "a-silent" did not respond within 20ms',
    });
  });

  it('fails the subtask once reassignments are exhausted', async () => {
    bus = createCommunicationBus({ logger, settings: { defaultTimeoutMs: 20, retry: { attempts: 1, backoffMultiplier: 1 } } });
    bus.register(createSilentAgent('a-silent', ['x']));
    bus.register(createReplyingAgent('b-ok', ['x']));
    const workflow = planWorkflow([{ key: 'only', description: 'work', capability: 'x' }]);

    const outcome = await createExecutor({ bus, logger, settings: { maxReassignments: 0 } }).execute(workflow);

    expect(outcome.status).toBe('failed');
    expect(outcome.failures[0]?.reason).toBe('Agent "a-silent" did not respond within 20ms');
  });

  it('fails a subtask no agent can take without starting it', async () => {
    const workflow = planWorkflow([{ key: 'only', description: 'translate', capability: 'translation' }]);

    const outcome = await createExecutor({ bus, logger }).execute(workflow);

    expect(outcome.failures).toEqual([
      {
        subtaskId: byDescription(workflow, 'translate').id,
        description: 'translate',
        status: 'failed',
        reason: 'No agent available for capability "translation"',
      },
    ]);
    expect(workflow.history.some((e) => e.type === 'subtask_started')).toBe(false);
  });

  it('uses the fallback agent when no agent matches', async () => {
    bus.register(createReplyingAgent('assistant', ['chat']));
    const workflow = planWorkflow([{ key: 'only', description: 'translate', capability: 'translation' }]);

    const outcome = await createExecutor({ bus, logger, settings: { fallbackAgentId: 'assistant' } }).execute(workflow);

    expect(outcome.results[0]).toMatchObject({ agentId: 'assistant', content: 'assistant: translate' });
  });

  it('skips in-flight and remaining subtasks when the signal aborts', async () => {
    const gate = createDeferred<void>();
    bus.register(
      createAgent({
        id: 'agent-a',
        kind: 'custom',
        capabilities: ['a'],
        handler: async () => {
          await gate.promise;
          return { content: 'late', metadata: {} };
        },
      }),
    );
    bus.register(createReplyingAgent('agent-b', ['b']));
    bus.register(createReplyingAgent('agent-c', ['c']));
    const workflow = planWorkflow(FAN_OUT);
    const controller = new AbortController();

    const running = createExecutor({ bus, logger }).execute(workflow, { signal: controller.signal });
    controller.abort();
    const outcome = await running;
    gate.resolve();

    expect(outcome.status).toBe('failed');
    expect(workflow.subtasks.map((s) => [s.status, s.error])).toEqual([
      ['skipped', 'cancelled'],
      ['skipped', 'cancelled'],
      ['skipped', 'cancelled'],
    ]);
    expect(workflow.history.filter((e) => e.type === 'workflow_cancel_requested')).toHaveLength(1);
  });

  describe('cancel', () => {
    it('marks a planned workflow cancelled once', () => {
      const workflow = planWorkflow(FAN_OUT);
      const executor = createExecutor({ bus, logger });

      expect(executor.cancel(workflow)).toBe(true);
      expect(executor.cancel(workflow)).toBe(false);
      expect(workflow.cancelRequested).toBe(true);
      expect(workflow.history.map((e) => e.type)).toEqual([
        'workflow_created',
        'workflow_cancel_requested',
      ]);
    });

    it('skips every subtask when a cancelled workflow is executed', async () => {
      bus.register(createReplyingAgent('agent-a', ['a']));
      const workflow = planWorkflow(FAN_OUT);
      const executor = createExecutor({ bus, logger });
      executor.cancel(workflow);

      const outcome = await executor.execute(workflow);

      expect(outcome.status).toBe('failed');
      expect(workflow.subtasks.map((s) => [s.status, s.error])).toEqual([
        ['skipped', 'cancelled'],
        ['skipped', 'cancelled'],
        ['skipped', 'cancelled'],
      ]);
      expect(bus.getAgent('agent-a')?.totalRequests).toBe(0);
    });

    it('refuses a workflow that already finished', async () => {
      bus.register(createReplyingAgent('agent-a', ['a']));
      bus.register(createReplyingAgent('agent-b', ['b']));
      bus.register(createReplyingAgent('agent-c', ['c']));
      const workflow = planWorkflow(FAN_OUT);
      const executor = createExecutor({ bus, logger });
      await executor.execute(workflow);

      expect(workflow.status).toBe('completed');
      expect(executor.cancel(workflow)).toBe(false);
      expect(workflow.history.some((e) => e.type === 'workflow_cancel_requested')).toBe(false);
    });
  });
});
