import { readFileSync, existsSync } from 'node:fs';
import { homedir } from 'node:os';
import { resolve } from 'node:path';
import { parse } from 'yaml';
import { ConfigSchema, ConfigDefaults, type Config } from './schema.js';
import type { ProviderId } from '../llm/providers.js';

const DEFAULT_CONFIG_PATH = '.claimcheck/config.yaml';

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export interface LoadConfigOptions {
  configPath?: string;
}

export interface LoadConfigResult {
  config: Config;
  configFileExists: boolean;
  /** Environment variables that supplied a value the file did not. */
  envKeysUsed: string[];
}

export function getConfigPath(configPath?: string): string {
  if (configPath) {
    return expandTilde(configPath);
  }
  return resolve(homedir(), DEFAULT_CONFIG_PATH);
}

export function expandTilde(path: string): string {
  if (path.startsWith('~/') || path === '~') {
    return resolve(homedir(), path.slice(2));
  }
  return path;
}

/** Name of the variable an `env:NAME`, `${NAME}` or `$NAME` value refers to. */
function envRefName(value: string): string | null {
  if (value.startsWith('env:')) return value.slice(4);
  if (value.startsWith('${') && value.endsWith('}')) return value.slice(2, -1);
  if (/^\$[A-Za-z_][A-Za-z0-9_]*$/.test(value)) return value.slice(1);
  return null;
}

/** Env references resolve to the variable's value; unset ones are dropped. */
function resolveEnvVarsInObject(value: unknown): unknown {
  if (typeof value === 'string') {
    const name = envRefName(value);
    if (name === null) return value;
    return process.env[name] || undefined;
  }
  if (Array.isArray(value)) {
    return value.map(resolveEnvVarsInObject).filter(item => item !== undefined);
  }
  if (value !== null && typeof value === 'object') {
    const resolved: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      const next = resolveEnvVarsInObject(entry);
      if (next !== undefined) resolved[key] = next;
    }
    return resolved;
  }
  // YAML `key:` with no value parses to null
  return value === null ? undefined : value;
}

function readConfigFile(configPath: string): unknown {
  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Failed to read config file: ${configPath}`, { cause: error });
  }

  try {
    return parse(fileContent);
  } catch (error) {
    throw new ConfigError(`Failed to parse config file: ${configPath}`, { cause: error });
  }
}

function mergeFile(result: Config, rawConfig: unknown): void {
  const validated = ConfigSchema.safeParse(resolveEnvVarsInObject(rawConfig));
  if (!validated.success) {
    const issues = validated.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ');
    throw new ConfigError(`Invalid config: ${issues}`);
  }
  const data = validated.data;

  if (data.providers) {
    result.providers = {
      anthropic: { ...result.providers.anthropic, ...data.providers.anthropic },
      openai: { ...result.providers.openai, ...data.providers.openai },
      google: { ...result.providers.google, ...data.providers.google },
    };
  }
  if (data.defaults) {
    result.defaults = { ...result.defaults, ...data.defaults };
  }
  if (data.search) {
    const { serper, searxng, brave, scraper, ...rest } = data.search;
    result.search = {
      ...result.search,
      ...rest,
      serper: { ...result.search.serper, ...serper },
      searxng: { ...result.search.searxng, ...searxng },
      brave: { ...result.search.brave, ...brave },
      scraper: { ...result.search.scraper, ...scraper },
    };
  }
  if (data.verification) {
    result.verification = { ...result.verification, ...data.verification };
  }
  if (data.scoring) {
    result.scoring = { ...result.scoring, ...data.scoring };
  }
  if (data.reliability) {
    result.reliability = { ...result.reliability, ...data.reliability };
  }
  if (data.fast_mode) {
    result.fast_mode = { ...result.fast_mode, ...data.fast_mode };
  }
  if (data.history) {
    result.history = { ...result.history, ...data.history };
  }
}

/**
 * Fill credentials the file left empty from the standard environment
 * variables. Returns the variables used.
 */
function applyEnvVarFallbacks(config: Config): string[] {
  const used: string[] = [];
  const fromEnv = (...names: string[]): string | undefined => {
    for (const name of names) {
      const value = process.env[name];
      if (value) {
        used.push(name);
        return value;
      }
    }
    return undefined;
  };

  if (!config.providers.anthropic.api_key) {
    config.providers.anthropic.api_key = fromEnv('ANTHROPIC_API_KEY');
  }
  if (!config.providers.openai.api_key) {
    config.providers.openai.api_key = fromEnv('OPENAI_API_KEY');
  }
  if (!config.providers.google.api_key) {
    config.providers.google.api_key = fromEnv('GEMINI_API_KEY', 'GOOGLE_API_KEY');
  }
  if (!config.search.serper.api_key) {
    config.search.serper.api_key = fromEnv('SERPER_API_KEY');
  }
  if (!config.search.brave.api_key) {
    config.search.brave.api_key = fromEnv('BRAVE_API_KEY');
  }
  if (config.search.searxng.instances.length === 0) {
    const urls = fromEnv('SEARXNG_URL');
    if (urls) {
      config.search.searxng.instances = urls.split(',').map(u => u.trim()).filter(Boolean);
    }
  }

  return used;
}

export function loadConfig(options: LoadConfigOptions = {}): Config {
  return loadConfigWithMeta(options).config;
}

export function loadConfigWithMeta(options: LoadConfigOptions = {}): LoadConfigResult {
  const configPath = getConfigPath(options.configPath);
  const configFileExists = existsSync(configPath);
  const result = structuredClone(ConfigDefaults);

  if (configFileExists) {
    const rawConfig = readConfigFile(configPath);
    if (rawConfig !== null && rawConfig !== undefined) {
      mergeFile(result, rawConfig);
    }
  }

  const envKeysUsed = applyEnvVarFallbacks(result);

  // Auto-select a provider if the default one has no API key
  if (!result.providers[result.defaults.provider].api_key) {
    const providerPriority: ProviderId[] = ['anthropic', 'openai', 'google'];
    const available = providerPriority.find(p => result.providers[p].api_key);
    if (available) {
      result.defaults.provider = available;
      result.defaults.model = result.providers[available].default_model;
    }
  }

  return { config: result, configFileExists, envKeysUsed };
}
