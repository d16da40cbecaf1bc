/**
 * Zod schemas for the core configuration file.
 * Every field has a default, so an empty object is a valid configuration.
 */
import { z } from 'zod';

// ─── Shared ─────────────────────────────────────────────────────

export const agentKindSchema = z.enum(['echo', 'code', 'system', 'memory', 'orchestrated', 'custom']);

const positiveInt = z.number().int().positive();

// ─── Bus Config ─────────────────────────────────────────────────

/**
 * Schema for request timeouts and the retry policy of the communication bus.
 */
export const busConfigSchema = z.object({
  defaultTimeoutMs: positiveInt.default(30_000),
  timeoutOverrides: z.record(agentKindSchema, positiveInt).default({}),
  retry: z
    .object({
      attempts: z.number().int().min(1).max(10, 'Retry attempts cannot exceed 10').default(2),
      backoffMultiplier: z.number().min(1, 'Backoff multiplier must be at least 1').default(1.5),
    })
    .default({}),
});

// ─── Orchestrator Config ────────────────────────────────────────

export const selectionConfigSchema = z.object({
  idleWeight: z.number().nonnegative().default(1),
  successWeight: z.number().nonnegative().default(1),
  failurePenaltyWeight: z.number().nonnegative().default(0.5),
  failureWindowMs: positiveInt.default(300_000),
});

export const stepTemplateSchema = z.object({
  key: z.string().min(1),
  description: z.string().min(1),
  capability: z.string().min(1),
  relatedCapabilities: z.array(z.string().min(1)).optional(),
});

export const decompositionRuleSchema = z.object({
  name: z.string().min(1),
  keywords: z.array(z.string().min(1)).min(1),
  steps: z.array(stepTemplateSchema).min(1),
});

/**
 * Schema for workflow execution, agent selection and workflow retention.
 */
export const orchestratorConfigSchema = z.object({
  maxConcurrency: positiveInt.default(4),
  maxReassignments: z.number().int().min(0).default(1),
  fallbackAgentId: z.string().min(1).nullable().default(null),
  subtaskTimeoutMs: positiveInt.nullable().default(null),
  selection: selectionConfigSchema.default({}),
  retention: z
    .object({
      maxWorkflows: positiveInt.default(1000),
      ttlMs: positiveInt.default(86_400_000),
    })
    .default({}),
  /** Replaces the built-in decomposition rules when present. */
  decompositionRules: z.array(decompositionRuleSchema).optional(),
});

// ─── Dispatcher Config ──────────────────────────────────────────

export const classificationRuleSchema = z.object({
  name: z.string().min(1),
  category: z.enum(['direct', 'single_agent', 'multi_step']),
  keywords: z.array(z.string().min(1)).min(1),
  targetAgentId: z.string().min(1).optional(),
  confidence: z.number().min(0).max(1).optional(),
});

export const dispatcherConfigSchema = z.object({
  name: z.string().min(1).default('Switchboard'),
  confidenceThreshold: z.number().min(0).max(1).default(0.5),
  historyLimit: positiveInt.default(50),
  /** Replaces the built-in classification rules when present. */
  rules: z.array(classificationRuleSchema).optional(),
});

// ─── Agents ─────────────────────────────────────────────────────

/**
 * Agents registered at startup. Only the echo kind is built in.
 */
export const agentDefinitionSchema = z.object({
  id: z.string().min(1),
  kind: z.literal('echo'),
  capabilities: z.array(z.string().min(1)).optional(),
});

// ─── Server ─────────────────────────────────────────────────────

export const serverConfigSchema = z.object({
  host: z.string().min(1).default('0.0.0.0'),
  port: z.number().int().min(0).max(65_535).default(3000),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  corsOrigins: z.array(z.string().min(1)).default(['*']),
});

// ─── Core Config ────────────────────────────────────────────────

export const coreConfigSchema = z
  .object({
    bus: busConfigSchema.default({}),
    orchestrator: orchestratorConfigSchema.default({}),
    dispatcher: dispatcherConfigSchema.default({}),
    agents: z.array(agentDefinitionSchema).default([]),
    server: serverConfigSchema.default({}),
  })
  .refine(
    (config) => new Set(config.agents.map((a) => a.id)).size === config.agents.length,
    { message: 'Agent ids must be unique', path: ['agents'] },
  );
