// ═══════════════════════════════════════════════════════════
// TERMSAGE — Configuration
// config.yaml ⇄ TermsageConfig, with a fixed key set
// ═══════════════════════════════════════════════════════════

import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { CONFIG_KEYS, SAFETY_LEVELS } from './types.js';
import type { ConfigKey, TermsageConfig } from './types.js';

/** Conservative defaults */
export const DEFAULT_CONFIG: TermsageConfig = {
  model: 'llama2',
  backendUrl: 'http://localhost:11434',
  temperature: 0.7,
  safetyLevel: 'medium',
  autoConfirm: false,
  historyEnabled: true,
  maxHistory: 100,
  verbose: false,
};

const FIELD_BY_KEY = {
  model: 'model',
  backend_url: 'backendUrl',
  temperature: 'temperature',
  safety_level: 'safetyLevel',
  auto_confirm: 'autoConfirm',
  history_enabled: 'historyEnabled',
  max_history: 'maxHistory',
  verbose: 'verbose',
} as const satisfies Record<ConfigKey, keyof TermsageConfig>;

/** Older spellings still accepted by `get` / `set` */
const KEY_ALIASES: Record<string, ConfigKey> = {
  default_model: 'model',
  ollama_api_url: 'backend_url',
};

const booleanValue = z.union([
  z.boolean(),
  z.enum(['true', 'false']).transform(v => v === 'true'),
]);

/** A number, or a non-blank string that reads as one */
const numberValue = z.union([
  z.number(),
  z.string().trim().min(1, 'must not be blank').pipe(z.coerce.number()),
]);

const VALUE_SCHEMAS = {
  model: z.string().trim().min(1, 'model must not be empty'),
  backend_url: z.string().trim().url('backend_url must be a URL'),
  temperature: numberValue.pipe(z.number().min(0).max(2)),
  safety_level: z.enum(SAFETY_LEVELS),
  auto_confirm: booleanValue,
  history_enabled: booleanValue,
  max_history: numberValue.pipe(z.number().int().min(1)),
  verbose: booleanValue,
} satisfies Record<ConfigKey, z.ZodTypeAny>;

/** Shape of config.yaml; every key optional, unknown keys rejected */
const fileSchema = z.object({
  model: VALUE_SCHEMAS.model.optional(),
  backend_url: VALUE_SCHEMAS.backend_url.optional(),
  temperature: VALUE_SCHEMAS.temperature.optional(),
  safety_level: VALUE_SCHEMAS.safety_level.optional(),
  auto_confirm: VALUE_SCHEMAS.auto_confirm.optional(),
  history_enabled: VALUE_SCHEMAS.history_enabled.optional(),
  max_history: VALUE_SCHEMAS.max_history.optional(),
  verbose: VALUE_SCHEMAS.verbose.optional(),
}).strict();

/** Where termsage keeps config.yaml and history.txt */
export function resolveDataDir(env: NodeJS.ProcessEnv = process.env): string {
  if (env.TERMSAGE_HOME) return env.TERMSAGE_HOME;
  const base = env.XDG_CONFIG_HOME || join(homedir(), '.config');
  return join(base, 'termsage');
}

/** Map user input (any case, legacy aliases) onto a known key */
export function normalizeKey(input: string): ConfigKey {
  const lowered = input.trim().toLowerCase();
  const key = KEY_ALIASES[lowered] ?? lowered;
  const known = CONFIG_KEYS.find(k => k === key);
  if (!known) {
    throw new ConfigError(
      `Unknown configuration key '${input}'. Valid keys: ${CONFIG_KEYS.join(', ')}`,
    );
  }
  return known;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') + ': ' : ''}${issue.message}`)
    .join('; ');
}

export interface ConfigStoreOptions {
  dataDir: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Loads and persists config.yaml.
 *
 * A missing file means defaults; the file is created on the first `set`.
 * `TERMSAGE_MODEL` and `TERMSAGE_BACKEND_URL` override the file for the
 * current process only.
 */
export class ConfigStore {
  readonly dataDir: string;
  readonly configPath: string;
  private readonly env: NodeJS.ProcessEnv;
  private fileValues: z.infer<typeof fileSchema> = {};
  private loaded = false;

  constructor(options: ConfigStoreOptions) {
    this.dataDir = options.dataDir;
    this.configPath = join(options.dataDir, 'config.yaml');
    this.env = options.env ?? process.env;
  }

  async load(): Promise<TermsageConfig> {
    if (existsSync(this.configPath)) {
      const content = await readFile(this.configPath, 'utf-8');
      const raw: unknown = YAML.parse(content) ?? {};
      const parsed = fileSchema.safeParse(raw);
      if (!parsed.success) {
        throw new ConfigError(`Invalid ${this.configPath}: ${formatIssues(parsed.error)}`);
      }
      this.fileValues = parsed.data;
    } else {
      this.fileValues = {};
    }
    this.loaded = true;
    return this.snapshot();
  }

  /** Effective configuration: defaults ← file ← environment */
  snapshot(): TermsageConfig {
    const file = this.fileValues;
    const config: TermsageConfig = {
      model: file.model ?? DEFAULT_CONFIG.model,
      backendUrl: file.backend_url ?? DEFAULT_CONFIG.backendUrl,
      temperature: file.temperature ?? DEFAULT_CONFIG.temperature,
      safetyLevel: file.safety_level ?? DEFAULT_CONFIG.safetyLevel,
      autoConfirm: file.auto_confirm ?? DEFAULT_CONFIG.autoConfirm,
      historyEnabled: file.history_enabled ?? DEFAULT_CONFIG.historyEnabled,
      maxHistory: file.max_history ?? DEFAULT_CONFIG.maxHistory,
      verbose: file.verbose ?? DEFAULT_CONFIG.verbose,
    };

    if (this.env.TERMSAGE_MODEL) config.model = this.env.TERMSAGE_MODEL;
    if (this.env.TERMSAGE_BACKEND_URL) config.backendUrl = this.env.TERMSAGE_BACKEND_URL;
    return config;
  }

  /** Effective value of a key, as a string */
  get(key: string): string {
    const normalized = normalizeKey(key);
    return String(this.snapshot()[FIELD_BY_KEY[normalized]]);
  }

  /** Validate, apply and persist one value */
  async set(key: string, value: string): Promise<TermsageConfig> {
    const normalized = normalizeKey(key);
    if (!this.loaded) await this.load();

    const parsed = fileSchema.safeParse({ ...this.fileValues, [normalized]: value });
    if (!parsed.success) {
      throw new ConfigError(`Invalid value: ${formatIssues(parsed.error)}`);
    }
    this.fileValues = parsed.data;
    await this.save();
    return this.snapshot();
  }

  private async save(): Promise<void> {
    await mkdir(this.dataDir, { recursive: true });
    const header = '# termsage configuration\n';
    await writeFile(this.configPath, header + YAML.stringify(this.fileValues), 'utf-8');
  }
}
