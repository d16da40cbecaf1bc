/**
 * Agent State Machine — the three-state guard every agent carries.
 *
 *   idle ──▶ processing ──▶ idle
 *                 │
 *                 ▼
 *               error ──▶ idle
 */
import { InvalidTransitionError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import type { AgentState } from './types.js';

// ─── Transition Table ────────────────────────────────────────────

export const ALLOWED_TRANSITIONS: Readonly<Record<AgentState, readonly AgentState[]>> = {
  idle: ['processing'],
  processing: ['idle', 'error'],
  error: ['idle'],
};

/** Whether `from → to` is in the transition table. */
export function canTransition(from: AgentState, to: AgentState): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

// ─── State Machine ───────────────────────────────────────────────

export interface AgentStateMachine {
  current(): AgentState;
  lastFailureAt(): Date | null;
  transition(next: AgentState): Result<AgentState, InvalidTransitionError>;
}

export interface StateMachineOptions {
  /** Included in the error context. */
  agentId?: string;
  initial?: AgentState;
  /** Clock, injectable for tests. */
  now?: () => Date;
}

/** Create a state machine starting in `idle` (or `options.initial`). */
export function createAgentStateMachine(options: StateMachineOptions = {}): AgentStateMachine {
  const now = options.now ?? ((): Date => new Date());
  let state: AgentState = options.initial ?? 'idle';
  let lastFailure: Date | null = null;

  return {
    current: () => state,
    lastFailureAt: () => lastFailure,

    transition(next) {
      if (!canTransition(state, next)) {
        return err(new InvalidTransitionError(state, next, options.agentId));
      }
      if (next === 'error') {
        lastFailure = now();
      }
      state = next;
      return ok(state);
    },
  };
}
