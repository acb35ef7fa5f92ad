import {
  createAppCoordinator,
  createCommandDetector,
  createCommandResponder,
  createCommandRouter,
  createInsertionGateway,
  createModelCatalog,
  createRecordingGateway,
  createSubstitutionEngine,
  createTranscriptionClient,
  DELETED_KEY,
  describeImage,
  noopLogger,
  parseHotkey,
  type AppConfig,
  type AppCoordinator,
  type CoordinatorEvent,
  type CoordinatorStatus,
  type HotkeyBinder,
  type Logger,
  type ModelCatalog,
  type ModelListing,
  type TranscriptionBackend,
} from '@voicebox/core';
import type { HotkeyAdapter, PlatformAdapter } from '@voicebox/platform';
import type { Diagnostics } from './diagnostics';
import type { AppStore } from './store';

export interface VoiceBoxAppOptions {
  store: AppStore;
  platform: PlatformAdapter;
  diagnostics?: Diagnostics;
  env?: Record<string, string | undefined>;
  fetcher?: typeof fetch;
  print?: (text: string) => void;
  logger?: (scope: string) => Logger;
  recordingsDir?: string;
}

export interface VoiceBoxApp {
  readonly coordinator: AppCoordinator;
  config(): AppConfig;
  start(): Promise<void>;
  stop(): Promise<void>;
  status(): CoordinatorStatus;
  changeHotkey(hotkey: string): Promise<{ previous: string; current: string }>;
  reload(): Promise<AppConfig>;
  substitutions(): Array<[string, string]>;
  addSubstitution(phrase: string, replacement: string): void;
  removeSubstitution(phrase: string): boolean;
  importSubstitutions(filePath: string): number;
  exportSubstitutions(filePath: string): void;
  models(query?: string): Promise<ModelListing[]>;
}

export const toHotkeyBinder = (adapter: HotkeyAdapter): HotkeyBinder => ({
  async bind(hotkey, onPress) {
    const handle = await adapter.registerHotkey(hotkey, onPress);
    return { unbind: () => handle.unregister() };
  },
});

export const createVoiceBoxApp = (options: VoiceBoxAppOptions): VoiceBoxApp => {
  const { store, platform } = options;
  const env = options.env ?? process.env;
  const print = options.print ?? ((text: string) => console.log(text));
  const scoped = options.logger ?? (() => noopLogger);
  const logger = scoped('app');

  let config = store.loadConfig();

  const createTranscription = (backend: TranscriptionBackend) =>
    createTranscriptionClient({ backend, fetcher: options.fetcher, logger: scoped('transcription') });

  const createCatalog = (current: AppConfig): ModelCatalog =>
    createModelCatalog({
      apiKey: current.commands.openRouterApiKey,
      fetcher: options.fetcher,
      store: store.modelCache,
      logger: scoped('models'),
    });

  let substitutions = createSubstitutionEngine({ persisted: store.loadSubstitutions() });
  const responder = createCommandResponder(
    {
      notify: (title, message) => platform.notifier.notify(title, message),
      copy: (text) => platform.clipboard.writeText(text),
      print,
    },
    config.commands.responseMethod,
    scoped('responder')
  );

  const coordinator = createAppCoordinator({
    config,
    recording: createRecordingGateway({
      capture: platform.audioCapture,
      audio: config.audio,
      directory: options.recordingsDir,
      logger: scoped('recording'),
    }),
    transcription: createTranscription(config.transcription),
    createTranscription,
    insertion: createInsertionGateway({
      clipboard: platform.clipboard,
      keystrokes: platform.keystrokes,
      describeImage,
      logger: scoped('insertion'),
    }),
    substitutions,
    detector: createCommandDetector(config.commands.triggers),
    router: createCommandRouter({
      apiKey: config.commands.openRouterApiKey,
      localEndpoint: config.commands.localEndpoint,
      model: config.commands.model,
      fetcher: options.fetcher,
      logger: scoped('commands'),
    }),
    responder,
    hotkeys: env.VOICEBOX_DISABLE_HOTKEYS === '1' ? undefined : toHotkeyBinder(platform.hotkey),
    logger: scoped('coordinator'),
  });

  let catalog = createCatalog(config);

  coordinator.onEvent((event: CoordinatorEvent) => {
    switch (event.type) {
      case 'error':
        options.diagnostics?.recordError(`[${event.category}:${event.code}] ${event.message}`);
        print(`Error: ${event.message}\nSuggestion: ${event.suggestion}`);
        break;
      case 'transcribed':
        logger.info(`Transcribed ${event.raw.length} chars`);
        break;
      case 'noSpeech':
        print('No speech detected');
        break;
      case 'commandResponse':
        logger.info(`Command handled by ${event.source}`);
        break;
      case 'inserted':
        if (!event.success) print('Text could not be inserted');
        break;
      case 'stateChanged':
        if (event.to === 'recording') print('Recording... press the hotkey again to stop');
        break;
    }
  });

  const start = async () => {
    await coordinator.start();
    logger.info(`VoiceBox started on ${platform.name} with ${config.transcription.kind} transcription`);
  };

  const stop = () => coordinator.stop();

  const changeHotkey = async (hotkey: string) => {
    const parsed = parseHotkey(hotkey);
    const previous = config.hotkey;
    config = store.updateConfig({ hotkey: parsed.label });
    await coordinator.reload(config);
    return { previous, current: config.hotkey };
  };

  const reload = async () => {
    config = store.loadConfig();
    substitutions = createSubstitutionEngine({ persisted: store.loadSubstitutions() });
    await coordinator.reload(config, { substitutions });
    catalog = createCatalog(config);
    return config;
  };

  const addSubstitution = (phrase: string, replacement: string) => {
    substitutions.add(phrase, replacement);
    store.saveSubstitutions(substitutions.toPersisted());
  };

  const removeSubstitution = (phrase: string) => {
    const removed = substitutions.remove(phrase);
    if (removed) store.saveSubstitutions(substitutions.toPersisted());
    return removed;
  };

  // Merges an exported table into the current one; returns the number of entries read.
  const importSubstitutions = (filePath: string) => {
    const data = store.readSubstitutionFile(filePath);
    substitutions.importTable(data);
    store.saveSubstitutions(substitutions.toPersisted());
    logger.info('Imported substitutions', filePath);
    return Object.keys(data).filter((key) => key !== DELETED_KEY).length;
  };

  const exportSubstitutions = (filePath: string) => {
    store.writeSubstitutionFile(filePath, substitutions.toPersisted());
  };

  const models = async (query?: string) => (query ? catalog.search(query) : catalog.list());

  return {
    coordinator,
    config: () => config,
    start,
    stop,
    status: () => coordinator.getStatus(),
    changeHotkey,
    reload,
    substitutions: () => substitutions.entries(),
    addSubstitution,
    removeSubstitution,
    importSubstitutions,
    exportSubstitutions,
    models,
  };
};
