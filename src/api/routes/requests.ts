/**
 * Request routes — hand a user query to the dispatcher.
 */
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { RouteDependencies } from '../types.js';
import { sendSuccess } from '../error-handler.js';

// ─── Schemas ────────────────────────────────────────────────────

const requestBodySchema = z.object({
  query: z.string().min(1).max(100_000),
  context: z.record(z.unknown()).optional(),
});

// ─── Route Plugin ───────────────────────────────────────────────

/** Register the dispatcher entry point. */
export function requestRoutes(
  fastify: FastifyInstance,
  deps: RouteDependencies,
): void {
  const { dispatcher, logger } = deps;

  // POST /requests
  fastify.post('/requests', async (request, reply) => {
    const { query, context } = requestBodySchema.parse(request.body);

    logger.info('Dispatching request', {
      component: 'requests-route',
      queryLength: query.length,
    });

    // The dispatcher reports failures inside the response rather than throwing.
    const response = await dispatcher.process(query, context);
    return sendSuccess(reply, response);
  });
}
