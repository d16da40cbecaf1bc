/**
 * Communication Bus — registry and router for inter-agent messages.
 *
 * Requests are queued on the receiver's serial queue and answered through a
 * pending-reply table keyed by request id. A reply is only delivered if its
 * correlation id still matches a pending entry; anything arriving after a
 * timeout or cancellation is dropped. Agents are never preempted.
 */
import {
  AgentTimeoutError,
  AgentUnavailableError,
  ApplicationError,
  RequestCancelledError,
  ValidationError,
  isRetryableError,
  toError,
} from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import type { AgentId, MessageId } from '@/core/types.js';
import type { Logger } from '@/observability/logger.js';
import type { Agent, AgentResponse, AgentState } from '@/agents/types.js';
import { createAgentRegistry } from './agent-registry.js';
import type { RegistryEntry } from './agent-registry.js';
import { createResponse, withFreshId } from './message.js';
import type { Message } from './message.js';
import type { BusSettings, CommunicationBus, RetryPolicy } from './types.js';

// ─── Defaults ────────────────────────────────────────────────────

export const DEFAULT_BUS_SETTINGS: BusSettings = {
  defaultTimeoutMs: 30_000,
  timeoutOverrides: {},
  retry: { attempts: 2, backoffMultiplier: 1.5 },
};

// ─── Pending Reply Tracking ──────────────────────────────────────

interface PendingReply {
  readonly agentId: AgentId;
  resolve: (response: Message) => void;
  reject: (error: Error) => void;
  timeoutId: NodeJS.Timeout;
  /** Remove the abort listener, if any. */
  detach: () => void;
}

// ─── Bus Dependencies ────────────────────────────────────────────

interface BusDeps {
  logger: Logger;
  settings?: Partial<BusSettings>;
  /** Clock, injectable for tests. */
  now?: () => Date;
}

const COMPONENT = 'communication-bus';

// ─── Factory Function ────────────────────────────────────────────

/**
 * Create a communication bus.
 */
export function createCommunicationBus(deps: BusDeps): CommunicationBus {
  const { logger } = deps;
  const now = deps.now ?? ((): Date => new Date());
  const settings: BusSettings = {
    ...DEFAULT_BUS_SETTINGS,
    ...deps.settings,
    retry: { ...DEFAULT_BUS_SETTINGS.retry, ...deps.settings?.retry },
  };
  const registry = createAgentRegistry({ logger, now });
  const pending = new Map<MessageId, PendingReply>();

  function transition(agent: Agent, next: AgentState): void {
    const result = agent.setState(next);
    if (!result.ok) {
      logger.warn('Agent state transition rejected', {
        component: COMPONENT,
        agentId: agent.id,
        error: result.error.message,
      });
    }
  }

  /** Run one message through an agent, driving its state machine. */
  async function runOnAgent(
    agent: Agent,
    query: string,
    context: Record<string, unknown>,
  ): Promise<Result<AgentResponse, ApplicationError>> {
    if (agent.getState() === 'error') {
      transition(agent, 'idle');
    }
    transition(agent, 'processing');

    try {
      const response = await agent.process(query, context);
      if (response.error !== undefined) {
        transition(agent, 'error');
        return err(new ApplicationError(agent.id, response.error));
      }
      transition(agent, 'idle');
      return ok(response);
    } catch (error) {
      const cause = toError(error);
      transition(agent, 'error');
      return err(new ApplicationError(agent.id, cause.message, cause));
    }
  }

  /** Resolve or reject the caller waiting on `requestId`. False when nobody is waiting. */
  function settle(requestId: MessageId, outcome: Result<Message, Error>): boolean {
    const waiter = pending.get(requestId);
    if (!waiter) return false;

    pending.delete(requestId);
    clearTimeout(waiter.timeoutId);
    waiter.detach();
    if (outcome.ok) {
      waiter.resolve(outcome.value);
    } else {
      waiter.reject(outcome.error);
    }
    return true;
  }

  async function deliver(entry: RegistryEntry, request: Message): Promise<void> {
    const { agent } = entry;

    if (!pending.has(request.id)) {
      logger.debug('Skipping request abandoned while queued', {
        component: COMPONENT,
        messageId: request.id,
        agentId: agent.id,
      });
      return;
    }

    if (registry.entry(agent.id) !== entry) {
      settle(request.id, err(new AgentUnavailableError(agent.id)));
      return;
    }

    const outcome = await runOnAgent(agent, request.content, { ...request.context });
    const reply = outcome.ok
      ? createResponse(request, { content: outcome.value.content, context: outcome.value.metadata })
      : createResponse(request, { content: outcome.error.message }, 'error');

    const delivered =
      reply.correlationId !== null &&
      settle(reply.correlationId, outcome.ok ? ok(reply) : err(outcome.error));

    if (!delivered) {
      logger.debug('Discarding late reply; no pending request matches its correlation id', {
        component: COMPONENT,
        agentId: agent.id,
        correlationId: reply.correlationId,
      });
      return;
    }

    registry.recordOutcome(agent.id, outcome.ok);
    logger.debug('Agent replied', {
      component: COMPONENT,
      agentId: agent.id,
      originalMessageId: request.id,
      replyMessageId: reply.id,
      success: outcome.ok,
    });
  }

  const bus: CommunicationBus = {
    register(agent) {
      const { outcome } = registry.upsert(agent);
      if (outcome === 'unchanged') {
        logger.debug('Agent already registered', { component: COMPONENT, agentId: agent.id });
      } else if (outcome === 'replaced') {
        logger.warn('Agent re-registered, previous record replaced', {
          component: COMPONENT,
          agentId: agent.id,
        });
      } else {
        logger.info('Agent registered', {
          component: COMPONENT,
          agentId: agent.id,
          kind: agent.kind,
          capabilities: [...agent.getCapabilities()],
        });
      }
    },

    deregister(agentId) {
      const removed = registry.remove(agentId);
      logger.info(removed ? 'Agent deregistered' : 'Deregistration ignored for unknown agent', {
        component: COMPONENT,
        agentId,
      });
      return removed;
    },

    send(message, options = {}) {
      if (message.type !== 'request') {
        return Promise.reject(
          new ValidationError(`Only request messages can be sent, got "${message.type}"`, {
            messageId: message.id,
          }),
        );
      }

      const { receiverId } = message;
      const entry = receiverId === null ? undefined : registry.entry(receiverId);
      if (!entry) {
        logger.warn('Message receiver is not registered', {
          component: COMPONENT,
          messageId: message.id,
          from: message.senderId,
          to: receiverId,
        });
        return Promise.reject(new AgentUnavailableError(receiverId ?? '(none)'));
      }

      if (pending.has(message.id)) {
        return Promise.reject(
          new ValidationError(`Request ${message.id} is already awaiting a reply`, {
            messageId: message.id,
          }),
        );
      }

      const { signal } = options;
      if (signal?.aborted) {
        return Promise.reject(new RequestCancelledError(message.id));
      }

      const agentId = entry.agent.id;
      const timeoutMs = options.timeoutMs ?? message.timeoutMs ?? bus.resolveTimeout(agentId);

      logger.info('Agent message sent', {
        component: COMPONENT,
        messageId: message.id,
        from: message.senderId,
        to: agentId,
        timeoutMs,
      });

      const reply = new Promise<Message>((resolve, reject) => {
        const onAbort = (): void => {
          if (settle(message.id, err(new RequestCancelledError(message.id)))) {
            logger.info('Caller stopped waiting for reply', {
              component: COMPONENT,
              messageId: message.id,
              agentId,
            });
          }
        };

        const timeoutId = setTimeout(() => {
          if (!pending.has(message.id)) return;
          registry.recordOutcome(agentId, false, now());
          logger.warn('Agent message timed out waiting for reply', {
            component: COMPONENT,
            messageId: message.id,
            agentId,
            timeoutMs,
          });
          settle(message.id, err(new AgentTimeoutError(agentId, message.id, timeoutMs)));
        }, timeoutMs);

        signal?.addEventListener('abort', onAbort, { once: true });
        pending.set(message.id, {
          agentId,
          resolve,
          reject,
          timeoutId,
          detach: () => signal?.removeEventListener('abort', onAbort),
        });
      });

      entry.queue.add(() => deliver(entry, message)).catch((error: unknown) => {
        logger.error('Message delivery failed unexpectedly', {
          component: COMPONENT,
          messageId: message.id,
          agentId,
          error: toError(error).message,
        });
      });

      return reply;
    },

    async sendAndAwait(message, options = {}) {
      const policy: RetryPolicy = { ...settings.retry, ...options.retry };
      const attempts = Math.max(1, Math.floor(policy.attempts));
      const baseTimeoutMs =
        options.timeoutMs ??
        message.timeoutMs ??
        (message.receiverId === null ? settings.defaultTimeoutMs : bus.resolveTimeout(message.receiverId));

      let request = message;
      for (let attempt = 1; ; attempt++) {
        const timeoutMs = Math.round(baseTimeoutMs * policy.backoffMultiplier ** (attempt - 1));
        try {
          return await bus.send(request, { timeoutMs, signal: options.signal });
        } catch (error) {
          if (!isRetryableError(error) || attempt >= attempts) {
            throw error;
          }
          logger.info('Retrying request', {
            component: COMPONENT,
            messageId: request.id,
            attempt,
            reason: error.code,
          });
          request = withFreshId(request);
        }
      }
    },

    broadcast(message) {
      const targets = registry.entries().filter((entry) => entry.agent.id !== message.senderId);

      logger.info('Broadcasting message', {
        component: COMPONENT,
        messageId: message.id,
        from: message.senderId,
        targets: targets.length,
      });

      for (const entry of targets) {
        const context = { ...message.context, messageType: message.type, senderId: message.senderId };
        entry.queue
          .add(async () => {
            const outcome = await runOnAgent(entry.agent, message.content, context);
            if (!outcome.ok) {
              logger.warn('Broadcast delivery failed', {
                component: COMPONENT,
                messageId: message.id,
                agentId: entry.agent.id,
                error: outcome.error.message,
              });
            }
          })
          .catch((error: unknown) => {
            logger.error('Broadcast delivery failed unexpectedly', {
              component: COMPONENT,
              messageId: message.id,
              agentId: entry.agent.id,
              error: toError(error).message,
            });
          });
      }

      return targets.length;
    },

    hasAgent: (agentId) => registry.entry(agentId) !== undefined,

    getAgent: (agentId) => registry.snapshot(agentId),

    listAgents: () => registry.snapshots(),

    findByCapability: (capability) =>
      registry.snapshots().filter((record) => record.capabilities.includes(capability)),

    getCapabilities: (agentId) => [...(registry.snapshot(agentId)?.capabilities ?? [])],

    resolveTimeout(agentId) {
      const entry = registry.entry(agentId);
      if (!entry) return settings.defaultTimeoutMs;
      return settings.timeoutOverrides[entry.agent.kind] ?? settings.defaultTimeoutMs;
    },
  };

  return bus;
}
