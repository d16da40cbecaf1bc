/**
 * Configuration loader — reads the JSON config file, resolves environment
 * variable placeholders and validates with Zod.
 */
import { readFile } from 'node:fs/promises';

import { SwitchboardError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';

import { coreConfigSchema } from './schema.js';
import type { CoreConfig } from './types.js';

// ─── Errors ─────────────────────────────────────────────────────

/**
 * Error raised when configuration loading or validation fails.
 */
export class ConfigError extends SwitchboardError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'CONFIG_ERROR',
      statusCode: 400,
      context,
    });
    this.name = 'ConfigError';
  }
}

// ─── Environment Variable Resolution ────────────────────────────

const ENV_VAR_PATTERN = /^\$\{([A-Z_][A-Z0-9_]*)\}$/;

/**
 * Recursively replace strings of the form `${VAR_NAME}` with the value of
 * that environment variable.
 *
 * @throws ConfigError if a referenced environment variable is not defined
 */
export function resolveEnvVars(obj: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof obj === 'string') {
    const varName = ENV_VAR_PATTERN.exec(obj)?.[1];
    if (varName !== undefined) {
      const value = env[varName];
      if (value === undefined) {
        throw new ConfigError(`Environment variable "${varName}" is not defined`, {
          variableName: varName,
          pattern: obj,
        });
      }
      return coerceScalar(value);
    }
    return obj;
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => resolveEnvVars(item, env));
  }

  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = resolveEnvVars(value, env);
    }
    return result;
  }

  return obj;
}

/** Numeric and boolean env values become numbers and booleans so numeric fields can use placeholders. */
function coerceScalar(value: string): string | number | boolean {
  if (value === 'true') return true;
  if (value === 'false') return false;
  if (value.trim() !== '' && Number.isFinite(Number(value))) return Number(value);
  return value;
}

// ─── Validation ─────────────────────────────────────────────────

/**
 * Validate an already-parsed configuration object, applying defaults.
 */
export function parseCoreConfig(raw: unknown, source = 'inline'): Result<CoreConfig, ConfigError> {
  const validation = coreConfigSchema.safeParse(raw);
  if (!validation.success) {
    const issues = validation.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    return err(new ConfigError('Configuration validation failed', { source, issues }));
  }
  return ok(validation.data);
}

/**
 * `PORT`, `HOST` and `LOG_LEVEL` override the server section.
 */
export function applyEnvOverrides(
  config: CoreConfig,
  env: NodeJS.ProcessEnv = process.env,
): Result<CoreConfig, ConfigError> {
  return parseCoreConfig(
    {
      ...config,
      server: {
        ...config.server,
        ...(env['PORT'] !== undefined && { port: Number(env['PORT']) }),
        ...(env['HOST'] !== undefined && { host: env['HOST'] }),
        ...(env['LOG_LEVEL'] !== undefined && { logLevel: env['LOG_LEVEL'] }),
      },
    },
    'environment',
  );
}

// ─── Configuration Loader ───────────────────────────────────────

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Loads and validates the core configuration file.
 *
 * 1. Reads the JSON file from disk
 * 2. Parses the JSON content
 * 3. Resolves environment variable placeholders
 * 4. Validates against the Zod schema
 */
export async function loadCoreConfig(
  filePath: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<Result<CoreConfig, ConfigError>> {
  // 1. Read the file
  let fileContent: string;
  try {
    fileContent = await readFile(filePath, 'utf-8');
  } catch (error) {
    const code = errorCode(error);
    if (code === 'ENOENT') {
      return err(
        new ConfigError(`Configuration file not found: ${filePath}`, {
          filePath,
          errorCode: 'ENOENT',
        }),
      );
    }
    return err(
      new ConfigError(`Failed to read configuration file: ${filePath}`, {
        filePath,
        errorCode: code,
        errorMessage: error instanceof Error ? error.message : String(error),
      }),
    );
  }

  // 2. Parse JSON
  let parsed: unknown;
  try {
    parsed = JSON.parse(fileContent);
  } catch {
    return err(new ConfigError('Invalid JSON in configuration file', { filePath }));
  }

  // 3. Resolve environment variables
  let resolved: unknown;
  try {
    resolved = resolveEnvVars(parsed, env);
  } catch (error) {
    if (error instanceof ConfigError) {
      return err(error);
    }
    return err(
      new ConfigError('Failed to resolve environment variables', {
        filePath,
        errorMessage: error instanceof Error ? error.message : String(error),
      }),
    );
  }

  // 4. Validate with Zod
  return parseCoreConfig(resolved, filePath);
}
