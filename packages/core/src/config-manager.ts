import { readFile } from 'node:fs/promises';
import { resolve, dirname } from 'node:path';
import { existsSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import {
  type CairnConfig,
  type ConfigPresetName,
  CONFIG_PRESETS,
  DEFAULT_CONFIG,
  cairnConfigSchema,
  ConfigError,
  errorMessage,
} from '@cairn/shared';

export const CONFIG_FILE_NAMES = ['cairn.config.yaml', 'cairn.config.yml', 'cairn.config.json'];

export interface ConfigLoadOptions {
  configPath?: string;
  /** Directory the file search starts from */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  preset?: ConfigPresetName;
}

type ConfigRecord = Record<string, unknown>;

export class ConfigManager {
  private config: CairnConfig = DEFAULT_CONFIG;
  private source: string | null = null;

  /** Defaults, then preset, then config file, then CAIRN_* environment variables. */
  async load(options: ConfigLoadOptions = {}): Promise<CairnConfig> {
    const env = options.env ?? process.env;

    // 1. Start with defaults
    let merged = toRecord(structuredClone(DEFAULT_CONFIG));

    // 2. Load config file (its `preset` key is applied beneath it)
    const fileConfig = await this.loadConfigFile(options.configPath, options.cwd);
    const fileValues: ConfigRecord = { ...fileConfig };
    const filePreset = fileValues.preset;
    delete fileValues.preset;

    // 3. Preset
    const presetName = options.preset ?? env.CAIRN_PRESET ?? filePreset;
    if (presetName !== undefined) {
      merged = deepMerge(merged, toRecord(structuredClone(resolvePreset(presetName))));
    }

    if (fileConfig) {
      merged = deepMerge(merged, fileValues);
    }

    // 4. Environment variables
    merged = deepMerge(merged, this.loadEnvVars(env));

    // 5. Validate
    this.config = validate(merged);
    return this.config;
  }

  get<K extends keyof CairnConfig>(key: K): CairnConfig[K] {
    return this.config[key];
  }

  getAll(): CairnConfig {
    return this.config;
  }

  /** Path of the file the last load read, if any. */
  getSource(): string | null {
    return this.source;
  }

  set(overrides: Partial<CairnConfig>): void {
    this.config = validate(deepMerge(toRecord(structuredClone(this.config)), toRecord(overrides)));
  }

  private async loadConfigFile(configPath?: string, cwd?: string): Promise<ConfigRecord | null> {
    if (configPath) {
      if (existsSync(configPath)) {
        return this.parseConfigFile(configPath);
      }
      throw new ConfigError(`Config file not found: ${configPath}`);
    }

    // Search cwd and parent directories
    let dir = resolve(cwd ?? process.cwd());

    for (let depth = 0; depth < 10; depth++) {
      for (const name of CONFIG_FILE_NAMES) {
        const p = resolve(dir, name);
        if (existsSync(p)) {
          return this.parseConfigFile(p);
        }
      }
      const parent = dirname(dir);
      if (parent === dir) break; // reached filesystem root
      dir = parent;
    }

    return null;
  }

  private async parseConfigFile(p: string): Promise<ConfigRecord> {
    const content = await readFile(p, 'utf-8');
    let parsed: unknown;
    try {
      parsed = p.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
    } catch (err) {
      throw new ConfigError(`Cannot parse ${p}: ${errorMessage(err)}`);
    }
    if (parsed === null || parsed === undefined) {
      parsed = {};
    }
    if (!isRecord(parsed)) {
      throw new ConfigError(`${p} must contain a mapping at the top level`);
    }
    this.source = p;
    return parsed;
  }

  private loadEnvVars(env: NodeJS.ProcessEnv): ConfigRecord {
    const config: ConfigRecord = {};
    const providers: ConfigRecord = {};

    if (env.CAIRN_ANTHROPIC_API_KEY) {
      providers.anthropic = {
        apiKey: env.CAIRN_ANTHROPIC_API_KEY,
        enabled: true,
        models: { slm: 'claude-haiku-4-5-20251001', llm: 'claude-sonnet-4-20250514' },
      };
    }

    if (env.CAIRN_OPENAI_API_KEY) {
      providers.openai = {
        apiKey: env.CAIRN_OPENAI_API_KEY,
        enabled: true,
        models: { slm: 'gpt-4o-mini', llm: 'gpt-4o' },
      };
    }

    if (env.CAIRN_OLLAMA_URL) {
      providers.ollama = { baseUrl: env.CAIRN_OLLAMA_URL };
    }

    if (Object.keys(providers).length > 0) {
      config.providers = providers;
    }

    if (env.CAIRN_BUDGET) {
      config.budget = { initialBalance: parseNumber('CAIRN_BUDGET', env.CAIRN_BUDGET) };
    }

    if (env.CAIRN_STRATEGY) {
      config.selection = { strategy: env.CAIRN_STRATEGY };
    }

    const store: ConfigRecord = {};
    if (env.CAIRN_STORE_BACKEND) store.backend = env.CAIRN_STORE_BACKEND;
    if (env.CAIRN_DB_PATH) store.dbPath = env.CAIRN_DB_PATH;
    if (Object.keys(store).length > 0) config.store = store;

    if (env.CAIRN_SEMANTIC_MATCHING) {
      config.matching = { semanticEnabled: env.CAIRN_SEMANTIC_MATCHING === 'true' };
    }

    if (env.CAIRN_LOG_LEVEL) {
      config.logging = { level: env.CAIRN_LOG_LEVEL };
    }

    return config;
  }
}

function resolvePreset(name: unknown): Partial<CairnConfig> {
  if (name === 'development' || name === 'production' || name === 'testing') {
    return CONFIG_PRESETS[name];
  }
  throw new ConfigError(`Unknown preset "${String(name)}" (expected development, production or testing)`);
}

function validate(merged: ConfigRecord): CairnConfig {
  const result = cairnConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(
      `Invalid configuration: ${result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ')}`,
    );
  }
  return result.data;
}

function parseNumber(name: string, raw: string): number {
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toRecord(value: object): ConfigRecord {
  return Object.fromEntries(Object.entries(value));
}

function deepMerge(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const incoming = source[key];
    const existing = target[key];
    if (incoming === undefined) continue;
    if (isRecord(incoming) && isRecord(existing)) {
      result[key] = deepMerge(existing, incoming);
    } else {
      result[key] = incoming;
    }
  }
  return result;
}
