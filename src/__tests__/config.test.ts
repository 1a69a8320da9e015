import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigStore, DEFAULT_CONFIG, normalizeKey, resolveDataDir } from '../core/config.js';
import { ConfigError } from '../core/errors.js';

describe('resolveDataDir', () => {
  it('should prefer TERMSAGE_HOME, then XDG_CONFIG_HOME', () => {
    expect(resolveDataDir({ TERMSAGE_HOME: '/opt/ts', XDG_CONFIG_HOME: '/xdg' })).toBe('/opt/ts');
    expect(resolveDataDir({ XDG_CONFIG_HOME: '/xdg' })).toBe('/xdg/termsage');
  });
});

describe('normalizeKey', () => {
  it('should accept any case and the legacy aliases', () => {
    expect(normalizeKey('SAFETY_LEVEL')).toBe('safety_level');
    expect(normalizeKey('default_model')).toBe('model');
    expect(normalizeKey('OLLAMA_API_URL')).toBe('backend_url');
  });

  it('should reject unknown keys', () => {
    expect(() => normalizeKey('colour')).toThrow(ConfigError);
    expect(() => normalizeKey('colour')).toThrow("Unknown configuration key 'colour'");
  });
});

describe('ConfigStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'termsage-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should fall back to defaults without a file', async () => {
    const store = new ConfigStore({ dataDir: dir, env: {} });
    expect(await store.load()).toEqual(DEFAULT_CONFIG);
    expect(store.get('max_history')).toBe('100');
    expect(store.get('auto_confirm')).toBe('false');
  });

  it('should persist and reload a value', async () => {
    const store = new ConfigStore({ dataDir: dir, env: {} });
    await store.load();
    const updated = await store.set('Safety_Level', 'high');
    expect(updated.safetyLevel).toBe('high');

    const content = await readFile(join(dir, 'config.yaml'), 'utf-8');
    expect(content).toBe('# termsage configuration\nsafety_level: high\n');

    const reloaded = await new ConfigStore({ dataDir: dir, env: {} }).load();
    expect(reloaded.safetyLevel).toBe('high');
  });

  it('should coerce typed values', async () => {
    const store = new ConfigStore({ dataDir: dir, env: {} });
    await store.set('auto_confirm', 'true');
    await store.set('temperature', '0.2');
    await store.set('max_history', '25');
    expect(store.snapshot()).toMatchObject({ autoConfirm: true, temperature: 0.2, maxHistory: 25 });
  });

  it('should reject invalid values and leave the file alone', async () => {
    const store = new ConfigStore({ dataDir: dir, env: {} });
    await expect(store.set('safety_level', 'extreme')).rejects.toBeInstanceOf(ConfigError);
    await expect(store.set('max_history', '0')).rejects.toThrow(/^Invalid value: max_history/);
    await expect(store.set('temperature', '3')).rejects.toBeInstanceOf(ConfigError);
    await expect(store.set('temperature', '')).rejects.toBeInstanceOf(ConfigError);
    await expect(store.set('max_history', '  ')).rejects.toBeInstanceOf(ConfigError);
    await expect(store.set('temperature', 'warm')).rejects.toBeInstanceOf(ConfigError);
    await expect(store.set('auto_confirm', 'maybe')).rejects.toBeInstanceOf(ConfigError);
    await expect(store.set('backend_url', 'not a url')).rejects.toBeInstanceOf(ConfigError);
    await expect(readFile(join(dir, 'config.yaml'), 'utf-8')).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('should reject a config file with unknown keys', async () => {
    await writeFile(join(dir, 'config.yaml'), 'model: mistral\ncolour: blue\n');
    const store = new ConfigStore({ dataDir: dir, env: {} });
    await expect(store.load()).rejects.toThrow(/^Invalid .*config\.yaml/);
  });

  it('should let the environment override the file', async () => {
    await writeFile(join(dir, 'config.yaml'), 'model: mistral\nbackend_url: http://gpu-box:11434\n');
    const store = new ConfigStore({
      dataDir: dir,
      env: { TERMSAGE_MODEL: 'codellama' },
    });
    const config = await store.load();
    expect(config.model).toBe('codellama');
    expect(config.backendUrl).toBe('http://gpu-box:11434');
    expect(store.get('default_model')).toBe('codellama');
  });
});
