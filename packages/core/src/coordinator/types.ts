import type { CommandDetector } from '../commands/detector';
import type { CommandResponder } from '../commands/responder';
import type { CommandRouter } from '../commands/router';
import type { CommandSource } from '../commands/types';
import type { AppConfig, InsertionMethod, TranscriptionBackend } from '../domain/schemas';
import type { ErrorCategory } from '../errors/errors';
import type {
  InsertionGateway,
  RecordingGateway,
  TranscriptionGateway,
} from '../gateways/types';
import type { Logger } from '../logging';
import type { PipelineStage } from '../pipeline/types';
import type { SubstitutionEngine } from '../substitutions/engine';

export type AppState =
  | 'idle'
  | 'recording'
  | 'transcribing'
  | 'processingCommand'
  | 'inserting'
  | 'error';

export type CoordinatorEvent =
  | { type: 'stateChanged'; from: AppState; to: AppState }
  | { type: 'transcribed'; raw: string; processed: string }
  | { type: 'noSpeech' }
  | {
      type: 'commandResponse';
      trigger: string;
      command: string;
      response: string;
      source: CommandSource;
    }
  | { type: 'inserted'; text: string; method: InsertionMethod; success: boolean }
  | {
      type: 'error';
      category: ErrorCategory | 'unexpected';
      code: string;
      message: string;
      suggestion: string;
    };

export interface HotkeyBinding {
  unbind(): Promise<void>;
}

export interface HotkeyBinder {
  bind(hotkey: string, onPress: () => void): Promise<HotkeyBinding>;
}

export interface CoordinatorDependencies {
  config: AppConfig;
  recording: RecordingGateway;
  transcription: TranscriptionGateway;
  insertion: InsertionGateway;
  substitutions: SubstitutionEngine;
  detector?: CommandDetector;
  router?: CommandRouter;
  responder?: CommandResponder;
  createTranscription?: (backend: TranscriptionBackend) => TranscriptionGateway;
  hotkeys?: HotkeyBinder;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  errorCooldownMs?: number;
  pipelineStages?: PipelineStage[];
}

export interface CoordinatorStatus {
  state: AppState;
  running: boolean;
  recording: boolean;
  backend: TranscriptionBackend['kind'];
  hotkey: string;
  commandsEnabled: boolean;
}

export interface ReloadOptions {
  substitutions?: SubstitutionEngine;
}

export interface AppCoordinator {
  handleHotkey(): Promise<void>;
  start(): Promise<void>;
  stop(): Promise<void>;
  reload(config: AppConfig, options?: ReloadOptions): Promise<void>;
  getState(): AppState;
  getStatus(): CoordinatorStatus;
  whenIdle(): Promise<void>;
  onEvent(listener: (event: CoordinatorEvent) => void): () => void;
}
