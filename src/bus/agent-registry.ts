/**
 * Agent Registry — the bus's record of every registered agent.
 *
 * Each entry owns a serial queue so that one agent handles at most one
 * message at a time. All mutations are synchronous, and readers only ever
 * receive frozen snapshots.
 */
import PQueue from 'p-queue';
import type { AgentId, Capability } from '@/core/types.js';
import type { Logger } from '@/observability/logger.js';
import type { Agent, AgentRecord } from '@/agents/types.js';

// ─── Registry Entry ──────────────────────────────────────────────

interface RequestStats {
  readonly total: number;
  readonly failed: number;
  readonly lastFailureAt: Date | null;
}

export interface RegistryEntry {
  readonly agent: Agent;
  /** Serial queue (concurrency 1) for this agent's messages. */
  readonly queue: PQueue;
  readonly registeredAt: Date;
  stats: RequestStats;
}

// ─── Registry Interface ──────────────────────────────────────────

export type UpsertOutcome = 'added' | 'replaced' | 'unchanged';

export interface AgentRegistry {
  /**
   * Add or replace an agent. Registering the instance already held is
   * `unchanged` and keeps its entry, queue and stats.
   */
  upsert(agent: Agent): { entry: RegistryEntry; outcome: UpsertOutcome };
  /** Remove an agent. Returns false when the id was unknown. */
  remove(agentId: string): boolean;
  /** Live entry, for the bus only. */
  entry(agentId: string): RegistryEntry | undefined;
  /** Live entries sorted by agent id. */
  entries(): RegistryEntry[];
  snapshot(agentId: string): AgentRecord | null;
  /** All records, sorted by agent id. */
  snapshots(): AgentRecord[];
  /** Count a finished request against the agent's success rate. */
  recordOutcome(agentId: string, success: boolean, at?: Date): void;
}

// ─── Registry Dependencies ───────────────────────────────────────

interface RegistryDeps {
  logger: Logger;
  /** Clock, injectable for tests. */
  now?: () => Date;
}

// ─── Helpers ─────────────────────────────────────────────────────

function latest(a: Date | null, b: Date | null): Date | null {
  if (a === null) return b;
  if (b === null) return a;
  return a.getTime() >= b.getTime() ? a : b;
}

function toRecord(entry: RegistryEntry): AgentRecord {
  const { agent, stats } = entry;
  const capabilities: readonly Capability[] = Object.freeze([...agent.getCapabilities()].sort());
  return Object.freeze({
    agentId: agent.id,
    kind: agent.kind,
    capabilities,
    state: agent.getState(),
    successRate: stats.total === 0 ? 1 : 1 - stats.failed / stats.total,
    lastFailureAt: latest(agent.getLastFailureAt(), stats.lastFailureAt),
    totalRequests: stats.total,
    failedRequests: stats.failed,
    registeredAt: entry.registeredAt,
  });
}

// ─── Factory Function ────────────────────────────────────────────

/**
 * Create an in-process agent registry.
 */
export function createAgentRegistry(deps: RegistryDeps): AgentRegistry {
  const now = deps.now ?? ((): Date => new Date());
  const entries = new Map<AgentId, RegistryEntry>();

  const registry: AgentRegistry = {
    upsert(agent) {
      const existing = entries.get(agent.id);
      // Same instance: keep its queue so the agent still handles one message at a time.
      if (existing?.agent === agent) {
        return { entry: existing, outcome: 'unchanged' };
      }

      const replaced = existing !== undefined;
      const entry: RegistryEntry = {
        agent,
        queue: new PQueue({ concurrency: 1 }),
        registeredAt: now(),
        stats: { total: 0, failed: 0, lastFailureAt: null },
      };
      entries.set(agent.id, entry);

      deps.logger.debug('Agent registry updated', {
        component: 'agent-registry',
        agentId: agent.id,
        replaced,
        size: entries.size,
      });
      return { entry, outcome: replaced ? 'replaced' : 'added' };
    },

    remove(agentId) {
      return entries.delete(agentId as AgentId);
    },

    entry(agentId) {
      return entries.get(agentId as AgentId);
    },

    entries() {
      return [...entries.values()].sort((a, b) => (a.agent.id < b.agent.id ? -1 : a.agent.id > b.agent.id ? 1 : 0));
    },

    snapshot(agentId) {
      const entry = entries.get(agentId as AgentId);
      return entry ? toRecord(entry) : null;
    },

    snapshots() {
      return registry.entries().map(toRecord);
    },

    recordOutcome(agentId, success, at) {
      const entry = entries.get(agentId as AgentId);
      if (!entry) return;
      const { stats } = entry;
      entry.stats = {
        total: stats.total + 1,
        failed: success ? stats.failed : stats.failed + 1,
        lastFailureAt: success ? stats.lastFailureAt : (at ?? now()),
      };
    },
  };

  return registry;
}
