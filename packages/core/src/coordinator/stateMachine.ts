import { createCommandDetector } from '../commands/detector';
import { createCommandRouter } from '../commands/router';
import type { CommandClassification, CommandResult } from '../commands/types';
import { backendsEqual } from '../config/config';
import type { AppConfig } from '../domain/schemas';
import { describeError, type ErrorCategory } from '../errors/errors';
import { getSuggestion } from '../errors/suggestions';
import { noopLogger } from '../logging';
import { runPipeline } from '../pipeline/pipeline';
import type {
  AppCoordinator,
  AppState,
  CoordinatorDependencies,
  CoordinatorEvent,
  HotkeyBinding,
  ReloadOptions,
} from './types';

export const DEFAULT_ERROR_COOLDOWN_MS = 2000;

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const audioChanged = (previous: AppConfig, next: AppConfig) =>
  previous.audio.sampleRate !== next.audio.sampleRate ||
  previous.audio.channels !== next.audio.channels;

export const createAppCoordinator = (deps: CoordinatorDependencies): AppCoordinator => {
  const logger = deps.logger ?? noopLogger;
  const sleep = deps.sleep ?? delay;
  const errorCooldownMs = deps.errorCooldownMs ?? DEFAULT_ERROR_COOLDOWN_MS;
  let config = deps.config;
  let transcription = deps.transcription;
  let substitutions = deps.substitutions;
  const detector = deps.detector ?? createCommandDetector(config.commands.triggers);
  const router =
    deps.router ??
    createCommandRouter({
      apiKey: config.commands.openRouterApiKey,
      localEndpoint: config.commands.localEndpoint,
      model: config.commands.model,
      logger,
    });
  const responder = deps.responder;

  let state: AppState = 'idle';
  let running = false;
  let binding: HotkeyBinding | null = null;
  let activeTask: Promise<void> | null = null;
  const listeners = new Set<(event: CoordinatorEvent) => void>();

  const emit = (event: CoordinatorEvent) => {
    listeners.forEach((listener) => {
      try {
        listener(event);
      } catch (error) {
        logger.error('Event listener failed', error);
      }
    });
  };

  // Every state change goes through here. It never awaits, so a check of
  // `state` followed by a call to transition cannot interleave with another handler.
  const transition = (next: AppState) => {
    if (state === next) return;
    const from = state;
    state = next;
    logger.debug(`State ${from} -> ${next}`);
    emit({ type: 'stateChanged', from, to: next });
  };

  const report = (fallback: ErrorCategory | 'unexpected', error: unknown) => {
    const described = describeError(error);
    const category = described.category === 'unexpected' ? fallback : described.category;
    const suggestion = getSuggestion(error);
    logger.error(`[${category}] ${described.message}`);
    emit({
      type: 'error',
      category,
      code: described.code,
      message: described.message,
      suggestion,
    });
  };

  // Single slot: at most one background run (pipeline or error cooldown) at a time.
  const spawn = (task: () => Promise<void>) => {
    const run: Promise<void> = task()
      .catch((error: unknown) => report('unexpected', error))
      .finally(() => {
        if (activeTask === run) activeTask = null;
      });
    activeTask = run;
  };

  const enterError = (category: ErrorCategory, error: unknown) => {
    report(category, error);
    transition('error');
    spawn(async () => {
      await sleep(errorCooldownMs);
      if (state === 'error') transition('idle');
    });
  };

  const insertText = async (text: string) => {
    transition('inserting');
    const method = config.insertionMethod;
    const success = await deps.insertion.insert(text, method);
    emit({ type: 'inserted', text, method, success });
    if (!success) logger.warn('Nothing was inserted');
  };

  const runCommand = async (classification: Exclude<CommandClassification, { kind: 'notACommand' }>) => {
    transition('processingCommand');
    const { request } = classification;
    logger.info('Command detected', {
      trigger: request.trigger,
      kind: classification.kind,
      clipboard: request.useClipboard,
    });
    let result: CommandResult;
    if (request.useClipboard) {
      const clipboard = await deps.insertion.readClipboard();
      result = await router.processWithClipboard(request.body, clipboard);
    } else {
      result = await router.process(request.body);
    }
    if (!result.success) {
      report('command', result.error);
      if (responder) await responder.display(result);
      return;
    }
    emit({
      type: 'commandResponse',
      trigger: request.trigger,
      command: request.body,
      response: result.response,
      source: result.source,
    });
    if (!result.response.trim()) return;
    await insertText(result.response);
  };

  const processRecording = async (path: string) => {
    const gateway = transcription;
    try {
      const outcome = await gateway.transcribe(path);
      if (outcome.kind === 'noSpeech') {
        logger.info('No speech detected');
        emit({ type: 'noSpeech' });
        return;
      }
      const processed = runPipeline(outcome.text, { substitutions }, deps.pipelineStages);
      emit({ type: 'transcribed', raw: outcome.text, processed });
      if (!processed) return;

      const classification: CommandClassification = config.commands.enabled
        ? detector.classify(processed)
        : { kind: 'notACommand', text: processed };
      if (classification.kind === 'notACommand') {
        await insertText(processed);
      } else {
        await runCommand(classification);
      }
    } catch (error) {
      const stage: ErrorCategory =
        state === 'inserting' ? 'insertion' : state === 'processingCommand' ? 'command' : 'transcription';
      report(stage, error);
    } finally {
      if (!config.keepRecordings) {
        try {
          await deps.recording.cleanup(path);
        } catch (error) {
          logger.warn('Failed to remove recording', path, error);
        }
      }
      transition('idle');
    }
  };

  const handleHotkey = async () => {
    if (state === 'idle') {
      transition('recording');
      try {
        await deps.recording.start();
        logger.info('Recording started');
      } catch (error) {
        enterError('recording', error);
      }
      return;
    }
    if (state === 'recording') {
      transition('transcribing');
      let path: string;
      try {
        path = await deps.recording.stop();
      } catch (error) {
        enterError('recording', error);
        return;
      }
      logger.info('Recording stopped', path);
      spawn(() => processRecording(path));
      return;
    }
    logger.info(`Hotkey ignored while ${state}`);
  };

  const onPress = () => {
    handleHotkey().catch((error: unknown) => report('unexpected', error));
  };

  const bindHotkey = async () => {
    if (!deps.hotkeys) return;
    binding = await deps.hotkeys.bind(config.hotkey, onPress);
    logger.info(`Hotkey bound: ${config.hotkey}`);
  };

  const whenIdle = async () => {
    while (activeTask) {
      await activeTask;
    }
  };

  const start = async () => {
    if (running) return;
    await bindHotkey();
    running = true;
  };

  const stop = async () => {
    if (binding) {
      await binding.unbind();
      binding = null;
    }
    if (state === 'recording' && deps.recording.isRecording()) {
      try {
        await deps.recording.cancel();
      } catch (error) {
        logger.warn('Failed to cancel recording', error);
      }
      transition('idle');
    }
    await whenIdle();
    running = false;
  };

  const reload = async (next: AppConfig, options: ReloadOptions = {}) => {
    const previous = config;
    config = next;
    if (previous.hotkey !== next.hotkey && binding) {
      await binding.unbind();
      binding = null;
      await bindHotkey();
    }
    if (!backendsEqual(previous.transcription, next.transcription)) {
      if (deps.createTranscription) {
        transcription = deps.createTranscription(next.transcription);
        logger.info(`Transcription backend switched to ${next.transcription.kind}`);
      } else {
        logger.warn('Transcription backend changed but no factory was provided');
      }
    }
    if (options.substitutions) substitutions = options.substitutions;
    detector.setTriggers(next.commands.triggers);
    router.configure({
      apiKey: next.commands.openRouterApiKey,
      localEndpoint: next.commands.localEndpoint,
      model: next.commands.model,
    });
    responder?.setMethod(next.commands.responseMethod);
    if (audioChanged(previous, next)) {
      logger.warn('Audio settings changed; they apply to the next application start');
    }
  };

  return {
    handleHotkey,
    start,
    stop,
    reload,
    getState: () => state,
    getStatus: () => ({
      state,
      running,
      recording: deps.recording.isRecording(),
      backend: transcription.backend,
      hotkey: config.hotkey,
      commandsEnabled: config.commands.enabled,
    }),
    whenIdle,
    onEvent: (listener) => {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
  };
};
