import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigError } from '@voicebox/core';
import { createVoiceBoxApp } from '../../../apps/voicebox/src/main/app';
import { createDiagnostics } from '../../../apps/voicebox/src/main/diagnostics';
import { resolvePlatformAdapter } from '../../../apps/voicebox/src/main/platform';
import { createAppStore } from '../../../apps/voicebox/src/main/store';
import { createFakePlatform, createRoutedFetcher } from './mock/fakePlatform';

const MODELS = {
  data: [
    { id: 'vendor/vision-pro', name: 'Vision Pro', pricing: { prompt: '0.000001' }, architecture: { modality: 'text+image->text' } },
    { id: 'vendor/free-text', name: 'Free Text', pricing: { prompt: '0' } },
  ],
};

describe('voicebox app', () => {
  let workDir = '';

  beforeEach(() => {
    workDir = mkdtempSync(join(tmpdir(), 'voicebox-app-'));
  });

  afterEach(() => {
    rmSync(workDir, { recursive: true, force: true });
  });

  const setup = (options: { transcript?: string; env?: Record<string, string> } = {}) => {
    const store = createAppStore({ configDir: join(workDir, 'config'), env: {} });
    const diagnostics = createDiagnostics({ store, now: () => 7 });
    const fake = createFakePlatform();
    const printed: string[] = [];
    const { fetcher, urls } = createRoutedFetcher({
      '/audio/transcriptions': () => {
        if (options.transcript === undefined) throw new TypeError('fetch failed');
        return new Response(options.transcript);
      },
      '/models': () => new Response(JSON.stringify(MODELS)),
    });
    const app = createVoiceBoxApp({
      store,
      platform: fake.platform,
      diagnostics,
      env: options.env ?? {},
      fetcher,
      print: (text) => printed.push(text),
      recordingsDir: workDir,
    });
    return { app, store, diagnostics, fake, printed, urls };
  };

  const speak = async (app: ReturnType<typeof setup>['app']) => {
    await app.coordinator.handleHotkey();
    await app.coordinator.handleHotkey();
    await app.coordinator.whenIdle();
  };

  it('binds the configured hotkey on start', async () => {
    const { app, fake } = setup();
    await app.start();
    expect(fake.registerHotkey).toHaveBeenCalledWith('ctrl+space', expect.any(Function));
    expect(app.status()).toMatchObject({ running: true, hotkey: 'ctrl+space', backend: 'local' });
    await app.stop();
    expect(fake.unregister).toHaveBeenCalledTimes(1);
  });

  it('skips hotkey binding when disabled by the environment', async () => {
    const { app, fake } = setup({ env: { VOICEBOX_DISABLE_HOTKEYS: '1' } });
    await app.start();
    expect(fake.registerHotkey).not.toHaveBeenCalled();
    await app.stop();
  });

  it('types corrected dictation into the focused app', async () => {
    const { app, fake, printed, urls } = setup({ transcript: 'Hello get push' });
    await speak(app);

    expect(fake.typed).toEqual(['Hello git push']);
    expect(printed).toEqual(['Recording... press the hotkey again to stop']);
    expect(urls).toEqual(['http://127.0.0.1:8000/v1/audio/transcriptions']);
  });

  it('records and prints failures', async () => {
    const { app, printed, diagnostics } = setup();
    await speak(app);

    const message = 'Transcription service unreachable at http://127.0.0.1:8000/v1/audio/transcriptions: fetch failed';
    expect(printed).toContain(`Error: ${message}\nSuggestion: Make sure the transcription server is running and reachable`);
    expect(diagnostics.loadRecentErrors()).toEqual([
      { timestamp: 7, message: `[transcription:unreachable] ${message}` },
    ]);
  });

  it('reports silence', async () => {
    const { app, printed, fake } = setup({ transcript: '  ' });
    await speak(app);
    expect(printed).toContain('No speech detected');
    expect(fake.typed).toEqual([]);
  });

  it('changes and persists the hotkey', async () => {
    const { app, store, fake } = setup();
    await app.start();

    await expect(app.changeHotkey('Ctrl+Alt+V')).resolves.toEqual({ previous: 'ctrl+space', current: 'ctrl+alt+v' });
    expect(fake.registerHotkey).toHaveBeenLastCalledWith('ctrl+alt+v', expect.any(Function));
    expect([...fake.hotkeys.keys()]).toEqual(['ctrl+alt+v']);
    expect(store.loadConfig().hotkey).toBe('ctrl+alt+v');

    await expect(app.changeHotkey('ctrl+')).rejects.toBeInstanceOf(ConfigError);
    expect(app.config().hotkey).toBe('ctrl+alt+v');
    await app.stop();
  });

  it('saves arrow key hotkeys under the typed name', async () => {
    const { app, store } = setup();
    await expect(app.changeHotkey('Ctrl+Up')).resolves.toEqual({ previous: 'ctrl+space', current: 'ctrl+up' });
    expect(store.loadConfig().hotkey).toBe('ctrl+up');
  });

  it('saves substitution edits immediately', () => {
    const { app, store } = setup();
    app.addSubstitution('Foo Bar', 'FooBar');
    expect(JSON.parse(readFileSync(store.paths.substitutions, 'utf-8'))).toEqual({ 'foo bar': 'FooBar' });

    expect(app.removeSubstitution('get push')).toBe(true);
    expect(app.removeSubstitution('never added')).toBe(false);
    expect(JSON.parse(readFileSync(store.paths.substitutions, 'utf-8'))).toEqual({
      'foo bar': 'FooBar',
      _deleted: ['get push'],
    });
    expect(app.substitutions()).toContainEqual(['foo bar', 'FooBar']);
    expect(app.substitutions().some(([phrase]) => phrase === 'get push')).toBe(false);
  });

  it('reloads configuration and substitutions from disk', async () => {
    const { app, store, fake } = setup({ transcript: 'hello there' });
    store.loadConfig();
    writeFileSync(store.paths.substitutions, JSON.stringify({ hello: 'Howdy' }));
    writeFileSync(
      store.paths.config,
      JSON.stringify({ version: 1, payload: { insertionMethod: 'typing', commands: { enabled: false } } })
    );

    const config = await app.reload();
    expect(config.insertionMethod).toBe('typing');
    expect(app.status().commandsEnabled).toBe(false);

    await speak(app);
    expect(fake.typed).toEqual(['Howdy there']);
  });

  it('lists and searches models', async () => {
    const { app } = setup();
    const listed = await app.models();
    expect(listed.map((model) => [model.id, model.displayName, model.vision])).toEqual([
      ['vendor/free-text', 'Free Text (Free)', false],
      ['vendor/vision-pro', 'Vision Pro ($1.00/M) [vision]', true],
    ]);
    const found = await app.models('vision');
    expect(found.map((model) => model.id)).toEqual(['vendor/vision-pro']);
  });
});

describe('platform resolution', () => {
  it('picks the adapter for the running OS', () => {
    expect(resolvePlatformAdapter('linux').name).toBe('linux');
    expect(resolvePlatformAdapter('darwin').name).toBe('macos');
  });

  it('rejects other platforms', () => {
    expect(() => resolvePlatformAdapter('win32')).toThrow('Unsupported platform: win32');
  });
});
