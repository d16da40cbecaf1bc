/**
 * Wiring: builds the bus, orchestrator and dispatcher from a parsed
 * configuration, and the Fastify server around them.
 */
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import type { Logger } from '@/observability/logger.js';
import type { CoreConfig } from '@/config/types.js';
import { createEchoAgent } from '@/agents/echo-agent.js';
import { createCommunicationBus } from '@/bus/communication-bus.js';
import { createOrchestrator } from '@/orchestrator/orchestrator.js';
import { createRuleDecomposer } from '@/orchestrator/decomposer.js';
import { createKeywordClassifier } from '@/dispatcher/classifier.js';
import { createDispatcher } from '@/dispatcher/dispatcher.js';
import { registerErrorHandler } from '@/api/error-handler.js';
import { registerRoutes } from '@/api/routes/index.js';
import type { RouteDependencies } from '@/api/types.js';

/** Build the agent system described by the configuration. */
export function createSwitchboard(config: CoreConfig, logger: Logger): RouteDependencies {
  const bus = createCommunicationBus({ logger, settings: config.bus });

  for (const definition of config.agents) {
    bus.register(createEchoAgent({ id: definition.id, capabilities: definition.capabilities }));
  }

  const { selection, retention, decompositionRules, ...execution } = config.orchestrator;
  const orchestrator = createOrchestrator({
    bus,
    logger,
    decomposer: createRuleDecomposer(decompositionRules),
    executor: {
      ...execution,
      weights: {
        idle: selection.idleWeight,
        successRate: selection.successWeight,
        failurePenalty: selection.failurePenaltyWeight,
        failureWindowMs: selection.failureWindowMs,
      },
    },
    retention,
  });

  const { rules, ...dispatcherSettings } = config.dispatcher;
  const dispatcher = createDispatcher({
    bus,
    orchestrator,
    logger,
    classifier: createKeywordClassifier(rules),
    settings: dispatcherSettings,
  });

  logger.info('Switchboard assembled', {
    component: 'app',
    agents: config.agents.map((a) => a.id),
  });

  return { bus, orchestrator, dispatcher, logger };
}

/** Create the HTTP server with every route registered. */
export async function createServer(deps: RouteDependencies, config: CoreConfig): Promise<FastifyInstance> {
  const server = Fastify({ logger: false });

  await server.register(cors, { origin: config.server.corsOrigins.includes('*') ? true : config.server.corsOrigins });
  registerErrorHandler(server, deps.logger);
  registerRoutes(server, deps);

  return server;
}
