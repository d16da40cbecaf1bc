/**
 * Request classification for the dispatcher.
 *
 * Classification is deterministic: an explicit `context.targetAgentId`
 * wins, then the first keyword rule that matches, then a low-confidence
 * `direct` answer.
 */
import { matchingKeywords } from '@/core/text.js';
import type { AgentId, RequestContext } from '@/core/types.js';

// ─── Types ───────────────────────────────────────────────────────

export type RequestCategory = 'direct' | 'single_agent' | 'multi_step';

export interface Classification {
  category: RequestCategory;
  targetAgentId: AgentId | null;
  /** In [0, 1]. */
  confidence: number;
  /** Name of the rule that matched, if any. */
  rule: string | null;
}

export interface Classifier {
  classify(query: string, context: RequestContext): Classification;
}

export interface ClassificationRule {
  name: string;
  category: RequestCategory;
  keywords: string[];
  targetAgentId?: string;
  confidence?: number;
}

// ─── Defaults ────────────────────────────────────────────────────

export const DEFAULT_RULE_CONFIDENCE = 0.8;

/** Confidence of the `direct` classification when no rule matches. */
export const UNMATCHED_CONFIDENCE = 0.6;

export const DEFAULT_CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  {
    name: 'multi_step',
    category: 'multi_step',
    keywords: ['and then', 'step by step', 'research', 'plan'],
    confidence: 0.9,
  },
  {
    name: 'echo',
    category: 'single_agent',
    keywords: ['echo', 'repeat'],
    targetAgentId: 'echo-agent',
  },
];

// ─── Factory Function ────────────────────────────────────────────

function explicitTarget(context: RequestContext): string | null {
  const target = context['targetAgentId'];
  return typeof target === 'string' && target.trim() !== '' ? target.trim() : null;
}

/**
 * Create a classifier from keyword rules, checked in order.
 */
export function createKeywordClassifier(
  rules: readonly ClassificationRule[] = DEFAULT_CLASSIFICATION_RULES,
): Classifier {
  return {
    classify(query, context) {
      const target = explicitTarget(context);
      if (target !== null) {
        return { category: 'single_agent', targetAgentId: target as AgentId, confidence: 1, rule: null };
      }

      for (const rule of rules) {
        if (matchingKeywords(query, rule.keywords).length === 0) continue;
        return {
          category: rule.category,
          targetAgentId: rule.targetAgentId ? (rule.targetAgentId as AgentId) : null,
          confidence: rule.confidence ?? DEFAULT_RULE_CONFIDENCE,
          rule: rule.name,
        };
      }

      return { category: 'direct', targetAgentId: null, confidence: UNMATCHED_CONFIDENCE, rule: null };
    },
  };
}
