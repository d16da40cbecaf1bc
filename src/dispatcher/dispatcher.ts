/**
 * Dispatcher — the entry point for user requests.
 *
 * Classifies each request and answers it directly, delegates it to one agent
 * over the bus, or hands it to the orchestrator. It never throws: failures
 * come back as a response with `error` set.
 */
import { AgentUnavailableError, toError } from '@/core/errors.js';
import type { RequestContext } from '@/core/types.js';
import type { Logger } from '@/observability/logger.js';
import type { AgentResponse } from '@/agents/types.js';
import { createRequest } from '@/bus/message.js';
import type { CommunicationBus } from '@/bus/types.js';
import type { Orchestrator } from '@/orchestrator/orchestrator.js';
import type { WorkflowOutcome } from '@/orchestrator/types.js';
import { createKeywordClassifier } from './classifier.js';
import type { Classification, Classifier } from './classifier.js';
import { createDirectResponder } from './direct-responder.js';
import type { DirectResponder } from './direct-responder.js';

// ─── Types ───────────────────────────────────────────────────────

export type DispatchRoute = 'direct' | 'agent' | 'orchestrator' | 'direct_fallback';

export interface ConversationEntry {
  role: 'user' | 'assistant';
  content: string;
  at: Date;
  route: DispatchRoute | null;
}

export interface DispatcherSettings {
  name: string;
  /** Below this classification confidence, requests go to the orchestrator. */
  confidenceThreshold: number;
  /** Conversation entries kept; oldest are dropped first. */
  historyLimit: number;
}

export const DEFAULT_DISPATCHER_SETTINGS: DispatcherSettings = {
  name: 'Switchboard',
  confidenceThreshold: 0.5,
  historyLimit: 50,
};

/** Sender id the dispatcher uses on the bus. */
export const DISPATCHER_AGENT_ID = 'dispatcher';

export interface Dispatcher {
  process(query: string, context?: RequestContext): Promise<AgentResponse>;
  classify(query: string, context?: RequestContext): Classification;
  getHistory(): ConversationEntry[];
}

interface DispatcherDeps {
  bus: CommunicationBus;
  orchestrator: Orchestrator;
  logger: Logger;
  classifier?: Classifier;
  directResponder?: DirectResponder;
  settings?: Partial<DispatcherSettings>;
  now?: () => Date;
}

const COMPONENT = 'dispatcher';

// ─── Helpers ─────────────────────────────────────────────────────

function formatOutcome(outcome: WorkflowOutcome): AgentResponse {
  const [only] = outcome.results;
  const content =
    outcome.status === 'completed' && outcome.results.length === 1 && only ? only.content : outcome.summary;
  return {
    content,
    metadata: {
      workflowId: outcome.workflowId,
      workflowStatus: outcome.status,
      failures: outcome.failures.length,
    },
    ...(outcome.status === 'failed' && { error: `Workflow ${outcome.workflowId} failed` }),
  };
}

function errorResponse(message: string, metadata: Record<string, unknown>): AgentResponse {
  return {
    content: `Sorry, the request could not be processed: ${message}`,
    metadata,
    error: message,
  };
}

// ─── Factory Function ────────────────────────────────────────────

/**
 * Create a dispatcher over an explicit bus and orchestrator.
 */
export function createDispatcher(deps: DispatcherDeps): Dispatcher {
  const { bus, orchestrator, logger } = deps;
  const now = deps.now ?? ((): Date => new Date());
  const settings: DispatcherSettings = { ...DEFAULT_DISPATCHER_SETTINGS, ...deps.settings };
  const classifier = deps.classifier ?? createKeywordClassifier();
  const directResponder =
    deps.directResponder ??
    createDirectResponder({
      name: settings.name,
      listCapabilities: () => bus.listAgents().flatMap((agent) => agent.capabilities),
    });
  const history: ConversationEntry[] = [];

  function remember(entry: ConversationEntry): void {
    history.push(entry);
    if (history.length > settings.historyLimit) {
      history.splice(0, history.length - settings.historyLimit);
    }
  }

  async function answerDirectly(
    query: string,
    context: RequestContext,
    route: 'direct' | 'direct_fallback',
  ): Promise<AgentResponse> {
    try {
      const response = await directResponder.respond(query, context);
      return { ...response, metadata: { ...response.metadata, route } };
    } catch (error) {
      const message = toError(error).message;
      logger.error('Direct response failed', { component: COMPONENT, error: message });
      return errorResponse(message, { route });
    }
  }

  async function delegate(
    query: string,
    context: RequestContext,
    classification: Classification,
    targetAgentId: string,
  ): Promise<AgentResponse> {
    try {
      const reply = await bus.sendAndAwait(createRequest(DISPATCHER_AGENT_ID, targetAgentId, query, { context }));
      return {
        content: reply.content,
        metadata: { ...reply.context, route: 'agent', agentId: targetAgentId, confidence: classification.confidence },
      };
    } catch (error) {
      if (error instanceof AgentUnavailableError) {
        logger.warn('Target agent unavailable, answering directly', {
          component: COMPONENT,
          agentId: targetAgentId,
        });
        return answerDirectly(query, context, 'direct_fallback');
      }
      const message = toError(error).message;
      logger.warn('Delegated request failed', { component: COMPONENT, agentId: targetAgentId, error: message });
      return errorResponse(message, { route: 'agent', agentId: targetAgentId });
    }
  }

  async function runWorkflow(query: string, context: RequestContext): Promise<AgentResponse> {
    try {
      const result = await orchestrator.run(query, context);
      if (!result.ok) {
        return errorResponse(result.error.message, { route: 'orchestrator' });
      }
      const response = formatOutcome(result.value);
      return { ...response, metadata: { ...response.metadata, route: 'orchestrator' } };
    } catch (error) {
      const message = toError(error).message;
      logger.error('Workflow run failed', { component: COMPONENT, error: message });
      return errorResponse(message, { route: 'orchestrator' });
    }
  }

  function route(classification: Classification): DispatchRoute {
    if (
      classification.category === 'multi_step' ||
      classification.confidence < settings.confidenceThreshold
    ) {
      return 'orchestrator';
    }
    if (classification.category === 'single_agent' && classification.targetAgentId !== null) {
      return 'agent';
    }
    return 'direct';
  }

  const dispatcher: Dispatcher = {
    classify: (query, context = {}) => classifier.classify(query, context),

    async process(query, context = {}) {
      remember({ role: 'user', content: query, at: now(), route: null });

      const classification = dispatcher.classify(query, context);
      const chosen = route(classification);
      logger.info('Request classified', {
        component: COMPONENT,
        category: classification.category,
        confidence: classification.confidence,
        rule: classification.rule,
        route: chosen,
      });

      let response: AgentResponse;
      if (chosen === 'orchestrator') {
        response = await runWorkflow(query, context);
      } else if (chosen === 'agent' && classification.targetAgentId !== null) {
        response = await delegate(query, context, classification, classification.targetAgentId);
      } else {
        response = await answerDirectly(query, context, 'direct');
      }

      const taken = response.metadata['route'];
      remember({
        role: 'assistant',
        content: response.content,
        at: now(),
        route: typeof taken === 'string' && isRoute(taken) ? taken : chosen,
      });
      return response;
    },

    getHistory: () => history.map((entry) => ({ ...entry })),
  };

  return dispatcher;
}

const ROUTES: readonly DispatchRoute[] = ['direct', 'agent', 'orchestrator', 'direct_fallback'];

function isRoute(value: string): value is DispatchRoute {
  return ROUTES.some((r) => r === value);
}
