/**
 * Echo Agent — replies with its input. Used to exercise the bus and the
 * orchestrator without any external collaborator.
 */
import type { Capability } from '@/core/types.js';
import { createAgent } from './agent.js';
import type { Agent } from './types.js';

export interface EchoAgentOptions {
  id: string;
  /** Defaults to `['echo']`. */
  capabilities?: Iterable<Capability>;
}

/** Create an echo agent. */
export function createEchoAgent(options: EchoAgentOptions): Agent {
  return createAgent({
    id: options.id,
    kind: 'echo',
    capabilities: options.capabilities ?? ['echo'],
    handler: (query, context) =>
      Promise.resolve({
        content: `Echo: ${query}`,
        metadata: {
          agentId: options.id,
          queryLength: query.length,
          context,
        },
      }),
  });
}
