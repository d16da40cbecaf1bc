import type { z } from 'zod';
import type { coreConfigSchema, serverConfigSchema } from './schema.js';

// ─── Core Configuration ─────────────────────────────────────────

/** Validated configuration, every default applied. */
export type CoreConfig = z.infer<typeof coreConfigSchema>;

/** Configuration as written in the file, before defaults. */
export type CoreConfigInput = z.input<typeof coreConfigSchema>;

export type ServerConfig = z.infer<typeof serverConfigSchema>;
