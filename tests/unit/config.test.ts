import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { DEFAULT_RESOLVER_CONFIG, getConfig, loadConfig, resetConfig } from '@/core/config';
import { DEFAULT_SEC_USER_AGENT, loadEnvConfig } from '@/core/env';
import { ConfigError } from '@/core/errors';

let originalCwd: string;
let tempDir: string;
const ENV_KEYS = ['ENABLE_LLM', 'OPENAI_API_KEY', 'SEC_USER_AGENT', 'LOG_LEVEL', 'LLM_MODEL'];
const originalEnv: Record<string, string | undefined> = {};

function writeConfig(file: string, content: unknown) {
  const configDir = join(tempDir, 'config');
  mkdirSync(configDir, { recursive: true });
  writeFileSync(
    join(configDir, file),
    typeof content === 'string' ? content : JSON.stringify(content)
  );
}

describe('config loader', () => {
  beforeEach(() => {
    originalCwd = process.cwd();
    tempDir = mkdtempSync(join(tmpdir(), 'config-test-'));
    process.chdir(tempDir);
  });

  afterEach(() => {
    resetConfig();
    process.chdir(originalCwd);
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('uses defaults when no config files exist', () => {
    const config = loadConfig();

    expect(config.resolver).toEqual(DEFAULT_RESOLVER_CONFIG);
    expect(config.cacheTtl.ticker_directory_ttl_hours).toBe(24);
  });

  it('overrides individual keys and keeps the rest', () => {
    writeConfig('resolver.json', {
      thresholds: { direct: 0.9 },
      limits: { max_traversal_depth: 3 },
      sources: { wikidata_language: 'de' },
    });
    writeConfig('cache_ttl.json', { ticker_directory_ttl_hours: 6 });

    const config = getConfig();

    expect(config.resolver.thresholds).toEqual({ direct: 0.9, graph: 0.7 });
    expect(config.resolver.limits.maxTraversalDepth).toBe(3);
    expect(config.resolver.limits.direct).toBe(5);
    expect(config.resolver.sources.wikidataLanguage).toBe('de');
    expect(config.cacheTtl.ticker_directory_ttl_hours).toBe(6);
  });

  it('caches until reset', () => {
    writeConfig('resolver.json', { thresholds: { graph: 0.6 } });
    expect(getConfig().resolver.thresholds.graph).toBe(0.6);

    writeConfig('resolver.json', { thresholds: { graph: 0.5 } });
    expect(getConfig().resolver.thresholds.graph).toBe(0.6);

    resetConfig();
    expect(getConfig().resolver.thresholds.graph).toBe(0.5);
  });

  it('rejects malformed JSON', () => {
    writeConfig('resolver.json', '{ "thresholds": ');

    expect(() => loadConfig()).toThrow(ConfigError);
  });

  it('rejects thresholds outside 0..1', () => {
    writeConfig('resolver.json', { thresholds: { direct: 1.5 } });

    expect(() => loadConfig()).toThrow('direct must be between 0 and 1, got 1.5');
  });

  it('rejects non-positive limits', () => {
    writeConfig('resolver.json', { limits: { max_search: 0 } });

    expect(() => loadConfig()).toThrow('max_search must be a positive integer, got 0');
  });
});

describe('environment config', () => {
  beforeEach(() => {
    ENV_KEYS.forEach((key) => {
      originalEnv[key] = process.env[key];
      delete process.env[key];
    });
  });

  afterEach(() => {
    ENV_KEYS.forEach((key) => {
      if (originalEnv[key] === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = originalEnv[key];
      }
    });
  });

  it('defaults to a disabled model and the stock user agent', () => {
    const env = loadEnvConfig();

    expect(env.enableLlm).toBe(false);
    expect(env.openaiApiKey).toBeNull();
    expect(env.secUserAgent).toBe(DEFAULT_SEC_USER_AGENT);
  });

  it('requires an API key when the model is enabled', () => {
    process.env.ENABLE_LLM = 'true';

    expect(() => loadEnvConfig()).toThrow('Missing required environment variable: OPENAI_API_KEY');

    process.env.OPENAI_API_KEY = 'test-secret';
    const env = loadEnvConfig();
    expect(env.enableLlm).toBe(true);
    expect(env.openaiApiKey).toBe('test-secret');
  });

  it('ignores an unknown log level', () => {
    process.env.LOG_LEVEL = 'chatty';

    expect(loadEnvConfig().logLevel).toBe('info');
  });
});
