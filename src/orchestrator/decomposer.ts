/**
 * Rule-based decomposer.
 *
 * The first rule with a keyword in the request decides the steps; each step
 * depends on the one before it. Requests no rule matches become a single
 * `general` step.
 */
import { matchingKeywords } from '@/core/text.js';
import type { Capability } from '@/core/types.js';
import type { Decomposer, PlannedStep } from './types.js';

// ─── Rules ───────────────────────────────────────────────────────

export interface StepTemplate {
  key: string;
  /** `{request}` is replaced with the original request. */
  description: string;
  capability: Capability;
  relatedCapabilities?: Capability[];
}

export interface DecompositionRule {
  name: string;
  keywords: string[];
  steps: StepTemplate[];
}

export const DEFAULT_DECOMPOSITION_RULES: readonly DecompositionRule[] = [
  {
    name: 'code',
    keywords: ['code', 'implement', 'function', 'bug', 'refactor', 'script', 'program'],
    steps: [
      {
        key: 'analysis',
        description: 'Analyze the requirements: {request}',
        capability: 'code:analysis',
        relatedCapabilities: ['analysis'],
      },
      {
        key: 'implementation',
        description: 'Implement the solution: {request}',
        capability: 'code:implementation',
        relatedCapabilities: ['code'],
      },
      {
        key: 'testing',
        description: 'Write and run tests for: {request}',
        capability: 'code:testing',
        relatedCapabilities: ['testing'],
      },
    ],
  },
  {
    name: 'research',
    keywords: ['research', 'search', 'find', 'investigate', 'look up'],
    steps: [
      {
        key: 'search',
        description: 'Search for information: {request}',
        capability: 'search',
        relatedCapabilities: ['research'],
      },
      {
        key: 'summarization',
        description: 'Summarize the findings for: {request}',
        capability: 'summarization',
        relatedCapabilities: ['research'],
      },
    ],
  },
  {
    name: 'system',
    keywords: ['system', 'cpu', 'disk', 'process', 'uptime'],
    steps: [
      {
        key: 'system',
        description: 'Handle the system request: {request}',
        capability: 'system',
      },
    ],
  },
];

export const GENERAL_STEP: StepTemplate = {
  key: 'general',
  description: '{request}',
  capability: 'general',
};

// ─── Factory Function ────────────────────────────────────────────

function instantiate(templates: readonly StepTemplate[], request: string): PlannedStep[] {
  return templates.map((template, index) => {
    const previous = templates[index - 1];
    return {
      key: template.key,
      description: template.description.split('{request}').join(request),
      capability: template.capability,
      relatedCapabilities: [...(template.relatedCapabilities ?? [])],
      dependsOn: previous ? [previous.key] : [],
    };
  });
}

/**
 * Create a decomposer from keyword rules, checked in order.
 */
export function createRuleDecomposer(
  rules: readonly DecompositionRule[] = DEFAULT_DECOMPOSITION_RULES,
): Decomposer {
  return {
    decompose(request) {
      const rule = rules.find((r) => matchingKeywords(request, r.keywords).length > 0);
      return instantiate(rule && rule.steps.length > 0 ? rule.steps : [GENERAL_STEP], request);
    },
  };
}
