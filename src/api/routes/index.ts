/**
 * Route registration — attaches every API route to the Fastify instance.
 */
import type { FastifyInstance } from 'fastify';
import type { RouteDependencies } from '../types.js';
import { healthRoutes } from './health.js';
import { agentRoutes } from './agents.js';
import { requestRoutes } from './requests.js';
import { workflowRoutes } from './workflows.js';

/** Register all API routes on the Fastify instance. */
export function registerRoutes(
  fastify: FastifyInstance,
  deps: RouteDependencies,
): void {
  healthRoutes(fastify, deps);
  agentRoutes(fastify, deps);
  requestRoutes(fastify, deps);
  workflowRoutes(fastify, deps);
}
