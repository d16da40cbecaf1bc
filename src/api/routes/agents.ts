/**
 * Agent routes — read-only view of the bus registry.
 */
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { RouteDependencies } from '../types.js';
import { sendSuccess, sendNotFound } from '../error-handler.js';
import { pageQuerySchema, slicePage } from '../pagination.js';

// ─── Schemas ────────────────────────────────────────────────────

const agentListQuerySchema = pageQuerySchema.extend({
  capability: z.string().min(1).optional(),
});

// ─── Route Plugin ───────────────────────────────────────────────

/** Register agent registry routes. */
export function agentRoutes(
  fastify: FastifyInstance,
  deps: RouteDependencies,
): void {
  const { bus } = deps;

  // GET /agents
  fastify.get('/agents', async (request, reply) => {
    const { capability, ...page } = agentListQuerySchema.parse(request.query);
    const records = capability === undefined ? bus.listAgents() : bus.findByCapability(capability);
    return sendSuccess(reply, slicePage(records, page));
  });

  // GET /agents/:id
  fastify.get<{ Params: { id: string } }>('/agents/:id', async (request, reply) => {
    const record = bus.getAgent(request.params.id);
    if (!record) return sendNotFound(reply, 'Agent', request.params.id);
    return sendSuccess(reply, record);
  });
}
