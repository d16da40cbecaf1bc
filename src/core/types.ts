// ─── Branded ID Types ────────────────────────────────────────────
// Branded types prevent accidentally passing a SubtaskId where a WorkflowId is expected.

declare const __brand: unique symbol;
type Brand<T, B> = T & { readonly [__brand]: B };

export type AgentId = Brand<string, 'AgentId'>;
export type MessageId = Brand<string, 'MessageId'>;
export type WorkflowId = Brand<string, 'WorkflowId'>;
export type SubtaskId = Brand<string, 'SubtaskId'>;

// ─── Capabilities ───────────────────────────────────────────────

/**
 * A tag describing what kind of subtask an agent can satisfy.
 * Tags may be namespaced with `:` (e.g. `code:typescript`); a broader tag
 * (`code`) covers every narrower one.
 */
export type Capability = string;

/** Free-form, string-keyed context travelling with requests. */
export type RequestContext = Record<string, unknown>;
