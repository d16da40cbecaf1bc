import { describe, it, expect } from 'vitest';
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import { createEchoAgent } from '@/agents/echo-agent.js';
import type { Agent } from '@/agents/types.js';
import { registerErrorHandler } from '../error-handler.js';
import { requestRoutes } from './requests.js';
import { createTestDeps } from '@/testing/fixtures/routes.js';
import type { TestRouteDependencies } from '@/testing/fixtures/routes.js';
import { createFailingAgent } from '@/testing/fixtures/agents.js';

function createApp(agents: Agent[] = []): { app: FastifyInstance; deps: TestRouteDependencies } {
  const deps = createTestDeps(agents);
  const app = Fastify();
  registerErrorHandler(app, deps.logger);
  requestRoutes(app, deps);
  return { app, deps };
}

interface DispatchBody {
  success: boolean;
  data: { content: string; metadata: Record<string, unknown>; error?: string };
}

describe('requestRoutes', () => {
  describe('POST /requests', () => {
    it('answers a greeting directly', async () => {
      const { app } = createApp();

      const response = await app.inject({ method: 'POST', url: '/requests', payload: { query: 'hello' } });

      expect(response.statusCode).toBe(200);
      expect(response.json<DispatchBody>()).toEqual({
        success: true,
        data: {
          content: "Hello, I'm Switchboard. How can I help you today?",
          metadata: { intent: 'greeting', route: 'direct' },
        },
      });
    });

    it('routes an echo request to the echo agent', async () => {
      const { app, deps } = createApp([createEchoAgent({ id: 'echo-agent' })]);

      const response = await app.inject({
        method: 'POST',
        url: '/requests',
        payload: { query: 'echo ping' },
      });

      const body = response.json<DispatchBody>();
      expect(body.data.content).toBe('Echo: echo ping');
      expect(body.data.metadata).toMatchObject({ route: 'agent', agentId: 'echo-agent' });
      expect(deps.logger.info).toHaveBeenCalledWith('Dispatching request', {
        component: 'requests-route',
        queryLength: 9,
      });
    });

    it('honours an explicit target agent in the context', async () => {
      const { app } = createApp([createFailingAgent('strict', ['x'], 'bad input')]);

      const response = await app.inject({
        method: 'POST',
        url: '/requests',
        payload: { query: 'do it', context: { targetAgentId: 'strict' } },
      });

      expect(response.statusCode).toBe(200);
      const body = response.json<DispatchBody>();
      expect(body.data.error).toBe('bad input');
      expect(body.data.metadata).toEqual({ route: 'agent', agentId: 'strict' });
    });

    it('rejects a missing query', async () => {
      const { app } = createApp();

      const response = await app.inject({ method: 'POST', url: '/requests', payload: {} });

      expect(response.statusCode).toBe(400);
      const body = response.json<{ success: boolean; error: { code: string } }>();
      expect(body.success).toBe(false);
      expect(body.error.code).toBe('VALIDATION_ERROR');
    });
  });
});
