import { describe, it, expect } from 'vitest';
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import type { Agent } from '@/agents/types.js';
import { registerErrorHandler } from '../error-handler.js';
import { workflowRoutes } from './workflows.js';
import { createTestDeps } from '@/testing/fixtures/routes.js';
import type { TestRouteDependencies } from '@/testing/fixtures/routes.js';
import { createReplyingAgent } from '@/testing/fixtures/agents.js';

function createApp(agents: Agent[] = []): { app: FastifyInstance; deps: TestRouteDependencies } {
  const deps = createTestDeps(agents);
  const app = Fastify();
  registerErrorHandler(app, deps.logger);
  workflowRoutes(app, deps);
  return { app, deps };
}

const researchAgents = (): Agent[] => [
  createReplyingAgent('searcher', ['search']),
  createReplyingAgent('writer', ['summarization']),
];

interface OutcomeBody {
  success: boolean;
  data: {
    workflowId: string;
    status: string;
    results: { subtaskId: string; agentId: string; content: string }[];
    failures: unknown[];
    summary: string;
  };
}

interface ErrorBody {
  success: false;
  error: { code: string; message: string };
}

describe('workflowRoutes', () => {
  describe('POST /workflows', () => {
    it('runs the workflow and returns its outcome', async () => {
      const { app } = createApp(researchAgents());

      const response = await app.inject({
        method: 'POST',
        url: '/workflows',
        payload: { request: 'research tidal energy' },
      });

      expect(response.statusCode).toBe(201);
      const body = response.json<OutcomeBody>();
      expect(body.success).toBe(true);
      expect(body.data.status).toBe('completed');
      expect(body.data.results.map((r) => r.agentId)).toEqual(['searcher', 'writer']);
      expect(body.data.failures).toEqual([]);
    });

    it('reports a failed workflow when no agent can serve it', async () => {
      const { app } = createApp();

      const response = await app.inject({
        method: 'POST',
        url: '/workflows',
        payload: { request: 'hello' },
      });

      expect(response.statusCode).toBe(201);
      expect(response.json<OutcomeBody>().data.status).toBe('failed');
    });

    it('rejects an empty request', async () => {
      const { app } = createApp();

      const response = await app.inject({ method: 'POST', url: '/workflows', payload: { request: '' } });

      expect(response.statusCode).toBe(400);
      expect(response.json<ErrorBody>().error.code).toBe('VALIDATION_ERROR');
    });
  });

  describe('GET /workflows', () => {
    it('lists workflows with a total', async () => {
      const { app, deps } = createApp(researchAgents());
      const run = await deps.orchestrator.run('research tidal energy');
      if (!run.ok) throw run.error;

      const response = await app.inject({ method: 'GET', url: '/workflows' });

      const body = response.json<{
        success: boolean;
        data: { items: { id: string; status: string; subtaskCount: number }[]; total: number };
      }>();
      expect(body.data.total).toBe(1);
      expect(body.data.items).toEqual([
        expect.objectContaining({ id: run.value.workflowId, status: 'completed', subtaskCount: 2 }),
      ]);
    });

    it('filters by status', async () => {
      const { app, deps } = createApp(researchAgents());
      await deps.orchestrator.run('research tidal energy');

      const response = await app.inject({ method: 'GET', url: '/workflows?status=running' });

      const body = response.json<{ data: { items: unknown[]; total: number } }>();
      expect(body.data).toEqual({ items: [], total: 0, limit: 20, offset: 0, nextOffset: null });
    });

    it('rejects an unknown status', async () => {
      const { app } = createApp();

      const response = await app.inject({ method: 'GET', url: '/workflows?status=paused' });

      expect(response.statusCode).toBe(400);
    });
  });

  describe('GET /workflows/:id', () => {
    it('returns the workflow', async () => {
      const { app, deps } = createApp(researchAgents());
      const run = await deps.orchestrator.run('research tidal energy');
      if (!run.ok) throw run.error;

      const response = await app.inject({ method: 'GET', url: `/workflows/${run.value.workflowId}` });

      expect(response.statusCode).toBe(200);
      const body = response.json<{ data: { id: string; originalRequest: string; subtasks: unknown[] } }>();
      expect(body.data.id).toBe(run.value.workflowId);
      expect(body.data.originalRequest).toBe('research tidal energy');
      expect(body.data.subtasks).toHaveLength(2);
    });

    it('returns 404 for an unknown workflow', async () => {
      const { app } = createApp();

      const response = await app.inject({ method: 'GET', url: '/workflows/nope' });

      expect(response.statusCode).toBe(404);
      expect(response.json<ErrorBody>().error.message).toBe('Workflow "nope" not found');
    });
  });

  describe('GET /workflows/:id/history', () => {
    it('returns the serialized subtasks and history', async () => {
      const { app, deps } = createApp(researchAgents());
      const run = await deps.orchestrator.run('research tidal energy');
      if (!run.ok) throw run.error;

      const response = await app.inject({
        method: 'GET',
        url: `/workflows/${run.value.workflowId}/history`,
      });

      const body = response.json<{
        data: { workflowId: string; status: string; history: { sequence: number; type: string }[] };
      }>();
      expect(body.data.workflowId).toBe(run.value.workflowId);
      expect(body.data.status).toBe('completed');
      expect(body.data.history[0]).toMatchObject({ sequence: 1, type: 'workflow_created' });
    });

    it('returns 404 for an unknown workflow', async () => {
      const { app } = createApp();

      const response = await app.inject({ method: 'GET', url: '/workflows/nope/history' });

      expect(response.statusCode).toBe(404);
    });
  });

  describe('POST /workflows/:id/cancel', () => {
    it('cancels a workflow that has not finished', async () => {
      const { app, deps } = createApp(researchAgents());
      const planned = deps.orchestrator.plan('research tidal energy');
      if (!planned.ok) throw planned.error;

      const response = await app.inject({ method: 'POST', url: `/workflows/${planned.value.id}/cancel` });

      expect(response.statusCode).toBe(200);
      expect(response.json<{ data: unknown }>().data).toEqual({ workflowId: planned.value.id, cancelled: true });
    });

    it('reports false for a finished workflow', async () => {
      const { app, deps } = createApp(researchAgents());
      const run = await deps.orchestrator.run('research tidal energy');
      if (!run.ok) throw run.error;

      const response = await app.inject({ method: 'POST', url: `/workflows/${run.value.workflowId}/cancel` });

      expect(response.json<{ data: { cancelled: boolean } }>().data.cancelled).toBe(false);
    });

    it('maps an unknown workflow to WORKFLOW_NOT_FOUND', async () => {
      const { app } = createApp();

      const response = await app.inject({ method: 'POST', url: '/workflows/nope/cancel' });

      expect(response.statusCode).toBe(404);
      expect(response.json<ErrorBody>().error.code).toBe('WORKFLOW_NOT_FOUND');
    });
  });
});
