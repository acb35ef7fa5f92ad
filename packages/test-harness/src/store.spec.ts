import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigError, DEFAULT_CONFIG } from '@voicebox/core';
import { applyEnvironment, createAppStore, resolveConfigDir } from '../../../apps/voicebox/src/main/store';

const readJson = (path: string): unknown => JSON.parse(readFileSync(path, 'utf-8'));

describe('config directory', () => {
  it.each([
    [{ VOICEBOX_CONFIG_DIR: '/custom' }, 'linux', '/custom'],
    [{}, 'darwin', join('/home/u', 'Library', 'Application Support', 'VoiceBox')],
    [{ APPDATA: '/appdata' }, 'win32', join('/appdata', 'VoiceBox')],
    [{ XDG_CONFIG_HOME: '/xdg' }, 'linux', join('/xdg', 'VoiceBox')],
    [{}, 'linux', join('/home/u', '.config', 'VoiceBox')],
  ] as const)('resolves %j on %s', (env, platform, expected) => {
    expect(resolveConfigDir(env, platform, '/home/u')).toBe(expected);
  });
});

describe('environment keys', () => {
  it('fills missing keys only', () => {
    const env = { OPENAI_API_KEY: 'env-openai', OPENROUTER_API_KEY: 'env-router' };
    expect(
      applyEnvironment({ transcription: { kind: 'remote', apiKey: '' }, commands: {} }, env)
    ).toEqual({
      transcription: { kind: 'remote', apiKey: 'env-openai' },
      commands: { openRouterApiKey: 'env-router' },
    });
    expect(
      applyEnvironment(
        { transcription: { kind: 'remote', apiKey: 'test-secret' }, commands: { openRouterApiKey: 'test-secret' } },
        env
      )
    ).toEqual({
      transcription: { kind: 'remote', apiKey: 'test-secret' },
      commands: { openRouterApiKey: 'test-secret' },
    });
  });

  it('leaves the local backend without a key', () => {
    const input = { transcription: { kind: 'local' } };
    expect(applyEnvironment(input, { OPENAI_API_KEY: 'env-openai' })).toEqual(input);
  });
});

describe('app store', () => {
  let configDir = '';

  beforeEach(() => {
    configDir = join(mkdtempSync(join(tmpdir(), 'voicebox-store-')), 'VoiceBox');
  });

  afterEach(() => {
    rmSync(join(configDir, '..'), { recursive: true, force: true });
  });

  it('writes defaults on first load', () => {
    const store = createAppStore({ configDir, env: {} });
    expect(store.loadConfig()).toEqual(DEFAULT_CONFIG);
    expect(readJson(store.paths.config)).toEqual({ version: 1, payload: DEFAULT_CONFIG });
  });

  it('applies environment keys without persisting them', () => {
    const store = createAppStore({ configDir, env: { OPENROUTER_API_KEY: 'env-router' } });
    expect(store.loadConfig().commands.openRouterApiKey).toBe('env-router');

    const updated = store.updateConfig({ hotkey: 'ctrl+alt+v' });
    expect(updated.hotkey).toBe('ctrl+alt+v');
    expect(updated.commands.openRouterApiKey).toBe('env-router');
    expect(readJson(store.paths.config)).toMatchObject({ version: 1, payload: { hotkey: 'ctrl+alt+v' } });
    expect(readFileSync(store.paths.config, 'utf-8')).not.toContain('env-router');
  });

  it('migrates a flat legacy file', () => {
    const store = createAppStore({ configDir, env: {} });
    mkdirSync(configDir, { recursive: true });
    writeFileSync(store.paths.config, JSON.stringify({ transcription_mode: 'local', hotkey: 'f9', local_model_size: 'tiny' }));

    const config = store.loadConfig();
    expect(config.hotkey).toBe('f9');
    expect(config.transcription).toEqual({
      kind: 'local',
      modelSize: 'tiny',
      language: 'auto',
      endpoint: 'http://127.0.0.1:8000',
    });
  });

  it('rejects malformed JSON', () => {
    const store = createAppStore({ configDir, env: {} });
    mkdirSync(configDir, { recursive: true });
    writeFileSync(store.paths.config, '{ not json');
    expect(() => store.loadConfig()).toThrow(ConfigError);
    expect(() => store.loadConfig()).toThrow(/^Configuration file is not valid JSON: /);
  });

  it('keeps the file untouched when an update is invalid', () => {
    const store = createAppStore({ configDir, env: {} });
    store.loadConfig();
    const before = readFileSync(store.paths.config, 'utf-8');
    expect(() => store.updateConfig({ hotkey: 'ctrl+' })).toThrow('Invalid hotkey format: ctrl+');
    expect(readFileSync(store.paths.config, 'utf-8')).toBe(before);
  });

  it('persists substitutions', () => {
    const store = createAppStore({ configDir, env: {} });
    expect(store.loadSubstitutions()).toBeUndefined();
    store.saveSubstitutions({ 'foo bar': 'FooBar', _deleted: ['get push'] });
    expect(store.loadSubstitutions()).toEqual({ 'foo bar': 'FooBar', _deleted: ['get push'] });

    writeFileSync(store.paths.substitutions, '[broken');
    expect(store.loadSubstitutions()).toBeUndefined();
  });

  it('reads and writes substitution files outside the config dir', () => {
    const store = createAppStore({ configDir, env: {} });
    const filePath = join(configDir, '..', 'shared.json');
    store.writeSubstitutionFile(filePath, { 'k eight s': 'k8s' });
    expect(store.readSubstitutionFile(filePath)).toEqual({ 'k eight s': 'k8s' });

    writeFileSync(filePath, JSON.stringify({ phrase: 5 }));
    expect(() => store.readSubstitutionFile(filePath)).toThrow(ConfigError);
    expect(() => store.readSubstitutionFile(filePath)).toThrow(`Invalid substitutions file ${filePath}`);
  });

  it('caches the model list', () => {
    const store = createAppStore({ configDir, env: {} });
    expect(store.modelCache.load()).toBeNull();
    store.modelCache.save({ fetchedAt: 5, models: [{ id: 'a/b' }] });
    expect(store.modelCache.load()).toEqual({ fetchedAt: 5, models: [{ id: 'a/b' }] });

    writeFileSync(store.paths.modelCache, JSON.stringify({ models: 'nope' }));
    expect(store.modelCache.load()).toBeNull();
    expect(existsSync(store.paths.modelCache)).toBe(true);
  });
});
