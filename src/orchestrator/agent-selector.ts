/**
 * Agent selection: capability match, availability, recent reliability,
 * then a fallback agent.
 */
import { NoAgentAvailableError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import type { Capability } from '@/core/types.js';
import type { AgentRecord } from '@/agents/types.js';
import type { Subtask } from './types.js';

// ─── Weights ─────────────────────────────────────────────────────

export interface SelectionWeights {
  idle: number;
  successRate: number;
  failurePenalty: number;
  /** A failure older than this no longer counts against an agent. */
  failureWindowMs: number;
}

export const DEFAULT_SELECTION_WEIGHTS: SelectionWeights = {
  idle: 1,
  successRate: 1,
  failurePenalty: 0.5,
  failureWindowMs: 5 * 60_000,
};

export interface SelectionOptions {
  weights?: SelectionWeights;
  fallbackAgentId?: string | null;
  /** Agents never to pick, e.g. ones that already failed this subtask. */
  exclude?: ReadonlySet<string>;
  now?: Date;
}

export type SelectableSubtask = Pick<Subtask, 'id' | 'requiredCapability' | 'relatedCapabilities'>;

// ─── Matching ────────────────────────────────────────────────────

/** True when `advertised` is `required` or a broader namespace of it (`code` covers `code:typescript`). */
export function coversCapability(advertised: Capability, required: Capability): boolean {
  return advertised === required || required.startsWith(`${advertised}:`);
}

/** Recency of the agent's last failure in [0, 1]: 1 just now, 0 outside the window. */
export function failureRecency(record: AgentRecord, now: Date, windowMs: number): number {
  if (record.lastFailureAt === null || windowMs <= 0) return 0;
  const age = Math.max(0, now.getTime() - record.lastFailureAt.getTime());
  return Math.max(0, 1 - age / windowMs);
}

export function scoreAgent(record: AgentRecord, weights: SelectionWeights, now: Date): number {
  const idle = record.state === 'idle' ? 1 : 0;
  return (
    weights.idle * idle +
    weights.successRate * record.successRate -
    weights.failurePenalty * failureRecency(record, now, weights.failureWindowMs)
  );
}

function pickBest(pool: readonly AgentRecord[], weights: SelectionWeights, now: Date): AgentRecord | undefined {
  let best: { record: AgentRecord; score: number } | undefined;
  for (const record of pool) {
    const score = scoreAgent(record, weights, now);
    if (
      !best ||
      score > best.score ||
      (score === best.score && record.agentId < best.record.agentId)
    ) {
      best = { record, score };
    }
  }
  return best?.record;
}

// ─── Selection ───────────────────────────────────────────────────

/**
 * Choose an agent for a subtask.
 *
 * 1. Idle agents advertising the exact capability.
 * 2. Otherwise any agent advertising it, a broader namespace of it, or one
 *    of the subtask's related capabilities, whatever its state.
 * 3. Otherwise the fallback agent, when registered.
 */
export function selectAgent(
  subtask: SelectableSubtask,
  agents: readonly AgentRecord[],
  options: SelectionOptions = {},
): Result<AgentRecord, NoAgentAvailableError> {
  const weights = options.weights ?? DEFAULT_SELECTION_WEIGHTS;
  const now = options.now ?? new Date();
  const candidates = agents.filter((a) => !options.exclude?.has(a.agentId));
  const required = subtask.requiredCapability;

  const exact = candidates.filter((a) => a.state === 'idle' && a.capabilities.includes(required));
  const fromExact = pickBest(exact, weights, now);
  if (fromExact) return ok(fromExact);

  const related = new Set(subtask.relatedCapabilities);
  const widened = candidates.filter((a) =>
    a.capabilities.some((cap) => coversCapability(cap, required) || related.has(cap)),
  );
  const fromWidened = pickBest(widened, weights, now);
  if (fromWidened) return ok(fromWidened);

  const fallback = options.fallbackAgentId
    ? candidates.find((a) => a.agentId === options.fallbackAgentId)
    : undefined;
  if (fallback) return ok(fallback);

  return err(new NoAgentAvailableError(required, subtask.id));
}
