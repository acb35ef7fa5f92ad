export * from './audio/wav';
export * from './commands/builtins';
export * from './commands/capabilities';
export * from './commands/catalog';
export * from './commands/detector';
export * from './commands/image';
export * from './commands/prompts';
export * from './commands/responder';
export * from './commands/router';
export * from './commands/types';
export * from './config/config';
export * from './coordinator/stateMachine';
export * from './coordinator/types';
export * from './domain/migrations';
export * from './domain/schemas';
export * from './errors/errors';
export * from './errors/suggestions';
export * from './gateways/types';
export * from './hotkeys/parse';
export * from './insertion/gateway';
export * from './logging';
export * from './pipeline/pipeline';
export * from './pipeline/stages';
export * from './pipeline/types';
export * from './recording/gateway';
export * from './security/settings';
export * from './substitutions/engine';
export * from './transcription/client';
export * from './transcription/types';
