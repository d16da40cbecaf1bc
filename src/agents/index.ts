/**
 * Agent contract
 *
 * Agent types, the three-state machine, and agent factories.
 */

// ─── Types ───────────────────────────────────────────────────────

export type {
  Agent,
  AgentHandler,
  AgentInfo,
  AgentKind,
  AgentRecord,
  AgentResponse,
  AgentState,
} from './types.js';

// ─── State Machine ───────────────────────────────────────────────

export type { AgentStateMachine, StateMachineOptions } from './state-machine.js';
export { ALLOWED_TRANSITIONS, canTransition, createAgentStateMachine } from './state-machine.js';

// ─── Factory Functions ───────────────────────────────────────────

export type { CreateAgentOptions } from './agent.js';
export { createAgent, describeAgent } from './agent.js';
export type { EchoAgentOptions } from './echo-agent.js';
export { createEchoAgent } from './echo-agent.js';
