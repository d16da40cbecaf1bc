import { readFile } from 'node:fs/promises';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { ConfigError, applyEnvOverrides, loadCoreConfig, parseCoreConfig, resolveEnvVars } from './loader.js';

// Mock node:fs/promises
vi.mock('node:fs/promises', () => ({
  readFile: vi.fn(),
}));

const mockedReadFile = vi.mocked(readFile);

// ─── Test Fixtures ──────────────────────────────────────────────

const validConfigJson = {
  bus: {
    defaultTimeoutMs: 10_000,
    timeoutOverrides: { code: 60_000 },
    retry: { attempts: 3, backoffMultiplier: 2 },
  },
  orchestrator: {
    fallbackAgentId: 'echo-agent',
  },
  agents: [{ id: 'echo-agent', kind: 'echo', capabilities: ['echo', 'general'] }],
};

function enoent(): Error {
  return Object.assign(new Error('ENOENT: no such file or directory'), { code: 'ENOENT' });
}

// ─── resolveEnvVars ─────────────────────────────────────────────

describe('resolveEnvVars', () => {
  it('replaces placeholders recursively', () => {
    const env = { FALLBACK_AGENT: 'assistant', WORKERS: '8' };

    expect(
      resolveEnvVars({ orchestrator: { fallbackAgentId: '${FALLBACK_AGENT}', maxConcurrency: '${WORKERS}' }, tags: ['${FALLBACK_AGENT}'] }, env),
    ).toEqual({ orchestrator: { fallbackAgentId: 'assistant', maxConcurrency: 8 }, tags: ['assistant'] });
  });

  it('leaves strings that only contain a placeholder fragment untouched', () => {
    expect(resolveEnvVars('prefix-${HOME}', {})).toBe('prefix-${HOME}');
  });

  it('throws ConfigError for an undefined variable', () => {
    expect(() => resolveEnvVars('${MISSING_VAR}', {})).toThrow(ConfigError);
    expect(() => resolveEnvVars('${MISSING_VAR}', {})).toThrow('Environment variable "MISSING_VAR" is not defined');
  });

  it('returns numbers, booleans and null as-is', () => {
    expect(resolveEnvVars({ a: 1, b: true, c: null }, {})).toEqual({ a: 1, b: true, c: null });
  });
});

// ─── loadCoreConfig ─────────────────────────────────────────────

describe('loadCoreConfig', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterEach(() => {
    vi.resetAllMocks();
  });

  it('loads a valid file and fills in defaults', async () => {
    mockedReadFile.mockResolvedValue(JSON.stringify(validConfigJson));

    const result = await loadCoreConfig('/config/switchboard.json', {});

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.bus).toEqual({
      defaultTimeoutMs: 10_000,
      timeoutOverrides: { code: 60_000 },
      retry: { attempts: 3, backoffMultiplier: 2 },
    });
    expect(result.value.orchestrator.fallbackAgentId).toBe('echo-agent');
    expect(result.value.orchestrator.maxConcurrency).toBe(4);
    expect(result.value.dispatcher.confidenceThreshold).toBe(0.5);
    expect(result.value.server).toEqual({ host: '0.0.0.0', port: 3000, logLevel: 'info', corsOrigins: ['*'] });
    expect(mockedReadFile).toHaveBeenCalledWith('/config/switchboard.json', 'utf-8');
  });

  it('returns an error when the file is missing', async () => {
    mockedReadFile.mockRejectedValue(enoent());

    const result = await loadCoreConfig('/nope.json', {});

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('Configuration file not found: /nope.json');
    expect(result.error.context).toEqual({ filePath: '/nope.json', errorCode: 'ENOENT' });
  });

  it('returns an error for invalid JSON', async () => {
    mockedReadFile.mockResolvedValue('{ "bus": ');

    const result = await loadCoreConfig('/config/switchboard.json', {});

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('Invalid JSON in configuration file');
  });

  it('returns the ConfigError for an undefined placeholder', async () => {
    mockedReadFile.mockResolvedValue(JSON.stringify({ orchestrator: { fallbackAgentId: '${NOT_SET}' } }));

    const result = await loadCoreConfig('/config/switchboard.json', {});

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ConfigError);
    expect(result.error.context).toEqual({ variableName: 'NOT_SET', pattern: '${NOT_SET}' });
  });

  it('reports validation issues with their paths', async () => {
    mockedReadFile.mockResolvedValue(JSON.stringify({ bus: { retry: { attempts: 0 } } }));

    const result = await loadCoreConfig('/config/switchboard.json', {});

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('Configuration validation failed');
    expect(result.error.context?.['issues']).toEqual([
      { path: 'bus.retry.attempts', message: 'Number must be greater than or equal to 1' },
    ]);
  });
});

// ─── parseCoreConfig / applyEnvOverrides ────────────────────────

describe('parseCoreConfig', () => {
  it('accepts an empty object', () => {
    const result = parseCoreConfig({});
    expect(result.ok && result.value.bus.defaultTimeoutMs).toBe(30_000);
    expect(result.ok && result.value.bus.retry).toEqual({ attempts: 2, backoffMultiplier: 1.5 });
  });

  it('rejects duplicate agent ids', () => {
    const result = parseCoreConfig({
      agents: [
        { id: 'echo', kind: 'echo' },
        { id: 'echo', kind: 'echo' },
      ],
    });
    expect(result.ok).toBe(false);
  });
});

describe('applyEnvOverrides', () => {
  it('overrides the server section from PORT, HOST and LOG_LEVEL', () => {
    const base = parseCoreConfig({});
    if (!base.ok) throw base.error;

    const result = applyEnvOverrides(base.value, { PORT: '8080', HOST: '127.0.0.1', LOG_LEVEL: 'debug' });

    expect(result.ok && result.value.server).toEqual({
      host: '127.0.0.1',
      port: 8080,
      logLevel: 'debug',
      corsOrigins: ['*'],
    });
  });

  it('rejects an invalid port', () => {
    const base = parseCoreConfig({});
    if (!base.ok) throw base.error;

    expect(applyEnvOverrides(base.value, { PORT: 'abc' }).ok).toBe(false);
  });
});
