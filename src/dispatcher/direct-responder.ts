import { containsKeyword } from '@/core/text.js';
import type { Capability, RequestContext } from '@/core/types.js';
import type { AgentResponse } from '@/agents/types.js';

/** Answers simple requests without involving any agent. */
export interface DirectResponder {
  respond(query: string, context: RequestContext): Promise<AgentResponse>;
}

interface DirectResponderDeps {
  /** Name the assistant introduces itself with. */
  name: string;
  /** Capabilities currently offered by registered agents. */
  listCapabilities: () => Capability[];
}

const GREETINGS = ['hello', 'hi', 'hey', 'good morning', 'good afternoon', 'good evening'];
const HELP = ['help', 'what can you do'];
const IDENTITY = ['who are you', 'your name'];

const mentionsAny = (query: string, phrases: readonly string[]): boolean =>
  phrases.some((phrase) => containsKeyword(query, phrase));

export function createDirectResponder(deps: DirectResponderDeps): DirectResponder {
  const { name } = deps;

  return {
    respond(query) {
      let content: string;
      let intent: string;

      if (mentionsAny(query, HELP)) {
        const capabilities = [...new Set(deps.listCapabilities())].sort();
        intent = 'help';
        content =
          capabilities.length > 0
            ? `I'm ${name}. Registered agents can handle: ${capabilities.join(', ')}.`
            : `I'm ${name}. No specialized agents are registered yet.`;
      } else if (mentionsAny(query, IDENTITY)) {
        intent = 'identity';
        content = `I'm ${name}, an assistant that coordinates specialized agents.`;
      } else if (mentionsAny(query, GREETINGS)) {
        intent = 'greeting';
        content = `Hello, I'm ${name}. How can I help you today?`;
      } else {
        intent = 'acknowledgement';
        content = `Understood: ${query}`;
      }

      return Promise.resolve({ content, metadata: { intent } });
    },
  };
}
