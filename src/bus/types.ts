/**
 * Communication Bus Types
 */
import type { Capability } from '@/core/types.js';
import type { Agent, AgentKind, AgentRecord } from '@/agents/types.js';
import type { Message } from './message.js';

// ─── Retry Policy ────────────────────────────────────────────────

/**
 * Retry policy applied by `sendAndAwait`.
 *
 * Attempt n waits `timeout * backoffMultiplier^(n-1)` before giving up.
 */
export interface RetryPolicy {
  attempts: number;
  backoffMultiplier: number;
}

// ─── Send Options ────────────────────────────────────────────────

export interface SendOptions {
  /** Overrides the message's and the agent kind's timeout. */
  timeoutMs?: number;
  /** Stops the caller from waiting; never interrupts the agent. */
  signal?: AbortSignal;
}

export interface SendAndAwaitOptions extends SendOptions {
  retry?: Partial<RetryPolicy>;
}

// ─── Bus Configuration ───────────────────────────────────────────

export interface BusSettings {
  /** Default per-call timeout. Default: 30000. */
  defaultTimeoutMs: number;
  /** Per agent kind timeout overrides. */
  timeoutOverrides: Partial<Record<AgentKind, number>>;
  retry: RetryPolicy;
}

// ─── Bus Interface ───────────────────────────────────────────────

/** Registry and router for inter-agent messages. */
export interface CommunicationBus {
  /** Register an agent; an existing id is replaced. */
  register(agent: Agent): void;
  /** Remove an agent. Returns false when the id was unknown. */
  deregister(agentId: string): boolean;
  /**
   * Deliver a request and resolve with the correlated response.
   * Rejects with AgentUnavailableError, AgentTimeoutError, ApplicationError
   * or RequestCancelledError. Never retries.
   */
  send(message: Message, options?: SendOptions): Promise<Message>;
  /** `send` wrapped in the retry policy; retries timeouts and unavailable receivers only. */
  sendAndAwait(message: Message, options?: SendAndAwaitOptions): Promise<Message>;
  /** Best-effort notification to every agent except the sender. Returns the number targeted. */
  broadcast(message: Message): number;
  hasAgent(agentId: string): boolean;
  getAgent(agentId: string): AgentRecord | null;
  /** All registered agents, sorted by id. */
  listAgents(): AgentRecord[];
  /** Agents advertising exactly `capability`. */
  findByCapability(capability: Capability): AgentRecord[];
  /** Capabilities of an agent, empty when unknown. */
  getCapabilities(agentId: string): Capability[];
  /** Timeout the bus would apply to a request for this agent. */
  resolveTimeout(agentId: string): number;
}
