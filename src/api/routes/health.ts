/**
 * Health route — liveness plus a glance at the registry and workflow load.
 */
import type { FastifyInstance } from 'fastify';
import type { RouteDependencies } from '../types.js';

/** Register the health check. */
export function healthRoutes(
  fastify: FastifyInstance,
  deps: RouteDependencies,
): void {
  const { bus, orchestrator } = deps;

  fastify.get('/health', () => ({
    status: 'ok',
    timestamp: new Date().toISOString(),
    agents: bus.listAgents().length,
    runningWorkflows: orchestrator.countWorkflows('running'),
  }));
}
