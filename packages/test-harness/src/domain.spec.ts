import { describe, expect, it } from 'vitest';
import {
  AppConfigSchema,
  ConfigError,
  DEFAULT_COMMAND_MODEL,
  DEFAULT_CONFIG,
  DomainEnvelopeSchema,
  SCHEMA_VERSION,
  backendsEqual,
  mergeConfig,
  migrateToCurrent,
  parseConfig,
} from '@voicebox/core';

const captureConfigError = (run: () => unknown) => {
  try {
    run();
  } catch (error) {
    if (error instanceof ConfigError) return error;
    throw error;
  }
  throw new Error('expected a ConfigError');
};

describe('domain schemas', () => {
  it('wraps versioned envelope', () => {
    const envelope = DomainEnvelopeSchema.parse({ version: SCHEMA_VERSION, payload: {} });
    expect(envelope.version).toBe(1);
  });

  it('parses config defaults', () => {
    expect(AppConfigSchema.parse({})).toEqual({
      hotkey: 'ctrl+space',
      transcription: { kind: 'local', modelSize: 'base', language: 'auto', endpoint: 'http://127.0.0.1:8000' },
      audio: { sampleRate: 16000, channels: 1 },
      insertionMethod: 'auto',
      keepRecordings: false,
      commands: {
        enabled: true,
        triggers: ['voicebox', 'assistant', 'computer'],
        model: DEFAULT_COMMAND_MODEL,
        responseMethod: 'notification',
      },
      debug: false,
      firstRun: true,
    });
  });

  it('rejects unknown model sizes', () => {
    const result = AppConfigSchema.safeParse({ transcription: { kind: 'local', modelSize: 'huge' } });
    expect(result.success).toBe(false);
  });
});

describe('config merging', () => {
  it('keeps sibling fields of a partial section', () => {
    const merged = parseConfig(mergeConfig(DEFAULT_CONFIG, { audio: { channels: 2 } }));
    expect(merged.audio).toEqual({ sampleRate: 16000, channels: 2 });
    expect(merged.commands.triggers).toEqual(['voicebox', 'assistant', 'computer']);
  });

  it('merges a transcription patch of the same kind', () => {
    const merged = parseConfig(mergeConfig(DEFAULT_CONFIG, { transcription: { modelSize: 'small' } }));
    expect(merged.transcription).toEqual({
      kind: 'local',
      modelSize: 'small',
      language: 'auto',
      endpoint: 'http://127.0.0.1:8000',
    });
  });

  it('replaces the transcription section when the kind changes', () => {
    const merged = mergeConfig(DEFAULT_CONFIG, { transcription: { kind: 'remote', apiKey: 'test-secret' } });
    expect(merged.transcription).toEqual({ kind: 'remote', apiKey: 'test-secret' });
  });

  it('ignores non-object patches', () => {
    expect(mergeConfig(DEFAULT_CONFIG, 'nope')).toBe(DEFAULT_CONFIG);
  });
});

describe('config validation', () => {
  it('requires an API key for remote transcription', () => {
    const error = captureConfigError(() => parseConfig({ transcription: { kind: 'remote' } }));
    expect(error.code).toBe('missing_api_key');
    expect(error.issues).toEqual(['transcription.apiKey: API key required for remote transcription']);
  });

  it('rejects malformed hotkeys', () => {
    const error = captureConfigError(() => parseConfig({ hotkey: 'ctrl+' }));
    expect(error.code).toBe('invalid_hotkey');
    expect(error.message).toBe('Invalid configuration: hotkey: Invalid hotkey format: ctrl+');
  });

  it('reports schema issues with their path', () => {
    const error = captureConfigError(() => parseConfig({ audio: { sampleRate: 4000 } }));
    expect(error.code).toBe('invalid_config');
    expect(error.issues).toHaveLength(1);
    expect(error.issues[0]).toMatch(/^audio\.sampleRate: /);
  });

  it('compares transcription backends field by field', () => {
    const local = DEFAULT_CONFIG.transcription;
    expect(backendsEqual(local, { ...local })).toBe(true);
    expect(backendsEqual(local, { kind: 'local', modelSize: 'tiny', language: 'auto', endpoint: 'http://127.0.0.1:8000' })).toBe(false);
    expect(backendsEqual(local, { kind: 'remote', apiKey: 'test-secret', language: 'auto', model: 'whisper-1' })).toBe(false);
  });
});

describe('config migrations', () => {
  const parser = (payload: unknown) => parseConfig(mergeConfig(DEFAULT_CONFIG, payload));

  it('upgrades the flat legacy layout', () => {
    const config = migrateToCurrent(
      {
        payload: {
          transcription_mode: 'api',
          api_key: 'test-secret',
          hotkey: 'ctrl+shift+v',
          text_insertion_method: 'clipboard',
          auto_cleanup_temp_files: false,
          audio_sample_rate: 44100,
          first_run: false,
        },
      },
      parser
    );
    expect(config.transcription).toEqual({
      kind: 'remote',
      apiKey: 'test-secret',
      language: 'auto',
      model: 'whisper-1',
    });
    expect(config.hotkey).toBe('ctrl+shift+v');
    expect(config.insertionMethod).toBe('clipboard');
    expect(config.keepRecordings).toBe(true);
    expect(config.audio).toEqual({ sampleRate: 44100, channels: 1 });
    expect(config.firstRun).toBe(false);
  });

  it('maps legacy local mode to the local backend', () => {
    const config = migrateToCurrent(
      { payload: { transcription_mode: 'local', local_model_size: 'medium' } },
      parser
    );
    expect(config.transcription).toMatchObject({ kind: 'local', modelSize: 'medium' });
  });

  it('leaves current payloads untouched', () => {
    const payload = { hotkey: 'f9' };
    expect(migrateToCurrent({ version: SCHEMA_VERSION, payload }, (value) => value)).toBe(payload);
  });

  it('rejects versions from the future', () => {
    expect(() => migrateToCurrent({ version: 2, payload: {} }, (value) => value)).toThrow(
      'Unsupported schema version: 2'
    );
  });
});
