// ─── Types ──────────────────────────────────────────────────────
export type { CoreConfig, CoreConfigInput, ServerConfig } from './types.js';

// ─── Schemas ────────────────────────────────────────────────────
export {
  agentDefinitionSchema,
  agentKindSchema,
  busConfigSchema,
  classificationRuleSchema,
  coreConfigSchema,
  decompositionRuleSchema,
  dispatcherConfigSchema,
  orchestratorConfigSchema,
  selectionConfigSchema,
  serverConfigSchema,
} from './schema.js';

// ─── Loader ─────────────────────────────────────────────────────
export {
  ConfigError,
  applyEnvOverrides,
  loadCoreConfig,
  parseCoreConfig,
  resolveEnvVars,
} from './loader.js';
