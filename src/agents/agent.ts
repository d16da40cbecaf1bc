/**
 * Agent factory — wraps an opaque handler in the agent contract.
 *
 * Whatever an agent actually computes (model inference, system calls,
 * memory search) lives inside its handler; the rest of the system only sees
 * capabilities, state and `process`.
 */
import type { AgentId, Capability } from '@/core/types.js';
import { createAgentStateMachine } from './state-machine.js';
import type { Agent, AgentHandler, AgentInfo, AgentKind } from './types.js';

// ─── Options ─────────────────────────────────────────────────────

export interface CreateAgentOptions {
  id: string;
  kind: AgentKind;
  capabilities: Iterable<Capability>;
  handler: AgentHandler;
  /** Clock for `lastFailureAt`, injectable for tests. */
  now?: () => Date;
}

// ─── Factory Function ────────────────────────────────────────────

/** Create an agent around a handler. */
export function createAgent(options: CreateAgentOptions): Agent {
  const id = options.id as AgentId;
  const capabilities: ReadonlySet<Capability> = new Set(options.capabilities);
  const machine = createAgentStateMachine({ agentId: id, now: options.now });

  return {
    id,
    kind: options.kind,
    process: (query, context) => options.handler(query, context),
    getCapabilities: () => capabilities,
    getState: () => machine.current(),
    setState: (next) => machine.transition(next),
    getLastFailureAt: () => machine.lastFailureAt(),
  };
}

/** Serializable description of an agent. */
export function describeAgent(agent: Agent): AgentInfo {
  return {
    id: agent.id,
    kind: agent.kind,
    capabilities: [...agent.getCapabilities()].sort(),
    state: agent.getState(),
  };
}
