import { describe, it, expect, afterEach, vi } from 'vitest';
import fs from 'fs';
import path from 'path';
import { ConfigManager, DEFAULT_FEATURES, DEFAULT_PORT } from '../configManager.js';
import { makeTempDir, writeConfig } from './fixtures/engine.js';

describe('ConfigManager', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('writes a starter config when none exists', () => {
    const configPath = path.join(makeTempDir(), 'nested', 'config.json');

    const manager = new ConfigManager(configPath);

    expect(fs.existsSync(configPath)).toBe(true);
    expect(manager.getProfile()).toMatchObject({ type: 'openai', apiKeyEnv: 'OPENAI_API_KEY' });
    expect(manager.getFeatures()).toEqual(DEFAULT_FEATURES);
  });

  it('rejects a config without a usable default profile', () => {
    const dir = makeTempDir();
    const missingDefault = path.join(dir, 'missing.json');
    fs.writeFileSync(missingDefault, JSON.stringify({ profiles: {} }));
    const unknownDefault = writeConfig(makeTempDir(), { defaultProfile: 'absent' });

    expect(() => new ConfigManager(missingDefault)).toThrow('must define "defaultProfile" and "profiles"');
    expect(() => new ConfigManager(unknownDefault)).toThrow('Default profile absent is not defined');
  });

  it('looks up profiles and agent settings', () => {
    const manager = new ConfigManager(writeConfig(makeTempDir(), { agents: { character: { format: 'json' } } }));

    expect(manager.getProfile('test').model).toBe('test-model');
    expect(manager.getAgentConfig('character')).toEqual({ format: 'json' });
    expect(manager.getAgentConfig('narrator')).toBeUndefined();
    expect(() => manager.getProfile('nope')).toThrow('Profile nope not found');
  });

  it('fills feature settings from defaults', () => {
    const manager = new ConfigManager(writeConfig(makeTempDir(), { features: { persistenceBackoffMs: 0, locationDetector: 'classifier' } }));

    expect(manager.getFeatures()).toEqual({ ...DEFAULT_FEATURES, persistenceBackoffMs: 0, locationDetector: 'classifier' });
  });

  it('resolves the database path', () => {
    expect(new ConfigManager(writeConfig(makeTempDir())).getDatabasePath()).toBe(path.join(process.cwd(), 'data', 'interrogation.db'));
    expect(new ConfigManager(writeConfig(makeTempDir(), { database: { path: ':memory:' } })).getDatabasePath()).toBe(':memory:');
    expect(new ConfigManager(writeConfig(makeTempDir(), { database: { path: 'db/test.db' } })).getDatabasePath()).toBe(
      path.resolve('db/test.db')
    );
  });

  it('takes the port from PORT, then config, then the default', () => {
    const configured = new ConfigManager(writeConfig(makeTempDir(), { server: { port: 9100 } }));
    const unconfigured = new ConfigManager(writeConfig(makeTempDir()));

    vi.stubEnv('PORT', '');
    expect(configured.getPort()).toBe(9100);
    expect(unconfigured.getPort()).toBe(DEFAULT_PORT);

    vi.stubEnv('PORT', '9200');
    expect(configured.getPort()).toBe(9200);
  });

  it('picks up changes on reload', () => {
    const dir = makeTempDir();
    const manager = new ConfigManager(writeConfig(dir));

    writeConfig(dir, { server: { port: 9300 } });
    manager.reload();

    expect(manager.getConfig().server).toEqual({ port: 9300 });
  });
});
