/**
 * Agent contract types
 *
 * Every agent, whatever it computes, is consumed by the bus and the
 * orchestrator through the same capability-set interface.
 */
import type { AgentId, Capability, RequestContext } from '@/core/types.js';
import type { Result } from '@/core/result.js';
import type { InvalidTransitionError } from '@/core/errors.js';

// ─── Agent State ─────────────────────────────────────────────────

export type AgentState = 'idle' | 'processing' | 'error';

// ─── Agent Kind ──────────────────────────────────────────────────

/** Tagged variant of a concrete agent. The bus never branches on it, config may. */
export type AgentKind = 'echo' | 'code' | 'system' | 'memory' | 'orchestrated' | 'custom';

// ─── Agent Response ──────────────────────────────────────────────

/** What an agent's `process` resolves with. A set `error` is a business failure. */
export interface AgentResponse {
  content: string;
  metadata: Record<string, unknown>;
  error?: string;
}

// ─── Agent Contract ──────────────────────────────────────────────

/**
 * The contract the bus dispatches through.
 *
 * The bus drives state transitions around `process`; implementations only
 * compute the response.
 */
export interface Agent {
  readonly id: AgentId;
  readonly kind: AgentKind;
  /** Handle one request. May suspend on external I/O; must eventually settle. */
  process(query: string, context: RequestContext): Promise<AgentResponse>;
  getCapabilities(): ReadonlySet<Capability>;
  getState(): AgentState;
  /** Move to `next`, or fail when the transition is not allowed. */
  setState(next: AgentState): Result<AgentState, InvalidTransitionError>;
  /** Last time the agent entered `error`, if ever. */
  getLastFailureAt(): Date | null;
}

/** Handler wrapped by `createAgent`. */
export type AgentHandler = (query: string, context: RequestContext) => Promise<AgentResponse>;

// ─── Agent Info ──────────────────────────────────────────────────

/** Plain, serializable description of an agent. */
export interface AgentInfo {
  id: AgentId;
  kind: AgentKind;
  capabilities: Capability[];
  state: AgentState;
}

// ─── Agent Record ────────────────────────────────────────────────

/** Registry view of an agent, owned by the bus. Snapshots are frozen. */
export interface AgentRecord {
  readonly agentId: AgentId;
  readonly kind: AgentKind;
  /** Sorted, de-duplicated capability tags. */
  readonly capabilities: readonly Capability[];
  readonly state: AgentState;
  /** Share of finished requests that succeeded; 1 with no history. */
  readonly successRate: number;
  readonly lastFailureAt: Date | null;
  readonly totalRequests: number;
  readonly failedRequests: number;
  readonly registeredAt: Date;
}
