/**
 * Workflow routes — run, inspect and cancel orchestrated workflows.
 */
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { RouteDependencies } from '../types.js';
import { sendSuccess, sendNotFound } from '../error-handler.js';
import { pageQuerySchema, toPage } from '../pagination.js';

// ─── Schemas ────────────────────────────────────────────────────

const createWorkflowSchema = z.object({
  request: z.string().min(1).max(100_000),
  context: z.record(z.unknown()).optional(),
});

const workflowListQuerySchema = pageQuerySchema.extend({
  status: z.enum(['planning', 'running', 'completed', 'failed', 'partial']).optional(),
});

// ─── Route Plugin ───────────────────────────────────────────────

/** Register workflow routes. */
export function workflowRoutes(
  fastify: FastifyInstance,
  deps: RouteDependencies,
): void {
  const { orchestrator } = deps;

  // POST /workflows: plan and execute, responding once the workflow finishes
  fastify.post('/workflows', async (request, reply) => {
    const { request: text, context } = createWorkflowSchema.parse(request.body);

    const result = await orchestrator.run(text, context);
    if (!result.ok) throw result.error;

    return sendSuccess(reply, result.value, 201);
  });

  // GET /workflows
  fastify.get('/workflows', async (request, reply) => {
    const { status, ...page } = workflowListQuerySchema.parse(request.query);
    const items = orchestrator.listWorkflows({ status, ...page });
    return sendSuccess(reply, toPage(items, orchestrator.countWorkflows(status), page));
  });

  // GET /workflows/:id
  fastify.get<{ Params: { id: string } }>('/workflows/:id', async (request, reply) => {
    const workflow = orchestrator.getWorkflow(request.params.id);
    if (!workflow) return sendNotFound(reply, 'Workflow', request.params.id);
    return sendSuccess(reply, workflow);
  });

  // GET /workflows/:id/history
  fastify.get<{ Params: { id: string } }>('/workflows/:id/history', async (request, reply) => {
    const serialized = orchestrator.getWorkflowHistory(request.params.id);
    if (serialized === null) return sendNotFound(reply, 'Workflow', request.params.id);
    const history: unknown = JSON.parse(serialized);
    return sendSuccess(reply, history);
  });

  // POST /workflows/:id/cancel
  fastify.post<{ Params: { id: string } }>('/workflows/:id/cancel', async (request, reply) => {
    const result = orchestrator.cancelWorkflow(request.params.id);
    if (!result.ok) throw result.error;
    return sendSuccess(reply, { workflowId: request.params.id, cancelled: result.value });
  });
}
