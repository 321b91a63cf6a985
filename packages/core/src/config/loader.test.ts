import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { loadConfig, loadConfigWithMeta, ConfigError } from './loader.js';

const ENV_KEYS = [
  'ANTHROPIC_API_KEY',
  'OPENAI_API_KEY',
  'GEMINI_API_KEY',
  'GOOGLE_API_KEY',
  'SERPER_API_KEY',
  'BRAVE_API_KEY',
  'SEARXNG_URL',
];

describe('config loader', () => {
  let dir: string;
  let configPath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'claimcheck-config-'));
    configPath = join(dir, 'config.yaml');
    for (const key of ENV_KEYS) vi.stubEnv(key, '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    rmSync(dir, { recursive: true, force: true });
  });

  it('returns defaults when no config file exists', () => {
    const { config, configFileExists, envKeysUsed } = loadConfigWithMeta({ configPath });

    expect(configFileExists).toBe(false);
    expect(envKeysUsed).toEqual([]);
    expect(config.defaults).toEqual({ provider: 'anthropic', model: 'claude-sonnet-4-20250514' });
    expect(config.search.serper.monthly_limit).toBe(2500);
    expect(config.search.searxng).toEqual({ instances: [], daily_limit: 100 });
    expect(config.verification).toEqual({ max_concurrent_claims: 4, claim_timeout_ms: 45000, reformulate: true });
    expect(config.fast_mode).toEqual({ max_claims: 3, max_providers: 2, max_text_length: 500 });
    expect(config.history).toEqual({ dir: '~/.claimcheck/history', cache_ttl_hours: 24 });
  });

  it('merges file values over defaults', () => {
    writeFileSync(configPath, `
search:
  brave:
    daily_limit: 10
  max_results: 5
verification:
  claim_timeout_ms: 30000
history:
  cache_ttl_hours: 0
`);

    const config = loadConfig({ configPath });

    expect(config.search.brave.daily_limit).toBe(10);
    expect(config.search.max_results).toBe(5);
    expect(config.search.serper.monthly_limit).toBe(2500);
    expect(config.verification.claim_timeout_ms).toBe(30000);
    expect(config.verification.max_concurrent_claims).toBe(4);
    expect(config.history).toEqual({ dir: '~/.claimcheck/history', cache_ttl_hours: 0 });
  });

  it('treats an empty file as defaults', () => {
    writeFileSync(configPath, '');
    expect(loadConfigWithMeta({ configPath }).configFileExists).toBe(true);
    expect(loadConfig({ configPath }).search.max_results).toBe(8);
  });

  it('resolves env:, $ and ${} references', () => {
    writeFileSync(configPath, `
providers:
  anthropic:
    api_key: env:TEST_ANTHROPIC
search:
  serper:
    api_key: $TEST_SERPER
  brave:
    api_key: \${TEST_BRAVE}
`);
    vi.stubEnv('TEST_ANTHROPIC', 'test-anthropic');
    vi.stubEnv('TEST_SERPER', 'test-serper');
    vi.stubEnv('TEST_BRAVE', 'test-brave');

    const config = loadConfig({ configPath });

    expect(config.providers.anthropic.api_key).toBe('test-anthropic');
    expect(config.search.serper.api_key).toBe('test-serper');
    expect(config.search.brave.api_key).toBe('test-brave');
  });

  it('clears unresolved references and falls back to the standard variable', () => {
    writeFileSync(configPath, `
search:
  serper:
    api_key: env:MISSING_SERPER_KEY
`);
    vi.stubEnv('SERPER_API_KEY', 'test-serper-env');

    const { config, envKeysUsed } = loadConfigWithMeta({ configPath });

    expect(config.search.serper.api_key).toBe('test-serper-env');
    expect(envKeysUsed).toEqual(['SERPER_API_KEY']);
  });

  it('leaves an unresolved reference empty when no fallback exists', () => {
    writeFileSync(configPath, `
providers:
  openai:
    api_key: env:MISSING_OPENAI_KEY
`);

    expect(loadConfig({ configPath }).providers.openai.api_key).toBeUndefined();
  });

  it('reads provider keys and search settings from the environment', () => {
    vi.stubEnv('OPENAI_API_KEY', 'test-openai');
    vi.stubEnv('GOOGLE_API_KEY', 'test-google');
    vi.stubEnv('BRAVE_API_KEY', 'test-brave');
    vi.stubEnv('SEARXNG_URL', 'http://a.local, http://b.local');

    const { config, envKeysUsed } = loadConfigWithMeta({ configPath });

    expect(config.providers.google.api_key).toBe('test-google');
    expect(config.search.brave.api_key).toBe('test-brave');
    expect(config.search.searxng.instances).toEqual(['http://a.local', 'http://b.local']);
    expect(envKeysUsed).toEqual(['OPENAI_API_KEY', 'GOOGLE_API_KEY', 'BRAVE_API_KEY', 'SEARXNG_URL']);
  });

  it('prefers GEMINI_API_KEY over GOOGLE_API_KEY', () => {
    vi.stubEnv('GEMINI_API_KEY', 'test-gemini');
    vi.stubEnv('GOOGLE_API_KEY', 'test-google');

    const { config, envKeysUsed } = loadConfigWithMeta({ configPath });

    expect(config.providers.google.api_key).toBe('test-gemini');
    expect(envKeysUsed).toEqual(['GEMINI_API_KEY']);
  });

  it('switches the default provider to one that has a key', () => {
    vi.stubEnv('OPENAI_API_KEY', 'test-openai');

    const config = loadConfig({ configPath });

    expect(config.defaults).toEqual({ provider: 'openai', model: 'gpt-4o-mini' });
  });

  it('rejects unknown keys', () => {
    writeFileSync(configPath, `
search:
  bing:
    api_key: test-key
`);
    expect(() => loadConfig({ configPath })).toThrow(ConfigError);
  });

  it('rejects out-of-range values with the offending path', () => {
    writeFileSync(configPath, `
reliability:
  high_verified_ratio: 1.5
`);
    expect(() => loadConfig({ configPath })).toThrow(/reliability\.high_verified_ratio/);
  });

  it('reports YAML syntax errors', () => {
    writeFileSync(configPath, 'search: [unclosed');
    expect(() => loadConfig({ configPath })).toThrow(`Failed to parse config file: ${configPath}`);
  });
});
