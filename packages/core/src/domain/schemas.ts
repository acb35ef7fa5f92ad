import { z } from 'zod';

export const SCHEMA_VERSION = 1;

export const LocalBackendSchema = z.object({
  kind: z.literal('local'),
  modelSize: z.enum(['tiny', 'base', 'small', 'medium', 'large-v2', 'large-v3']).default('base'),
  language: z.string().min(1).default('auto'),
  endpoint: z.string().url().default('http://127.0.0.1:8000'),
});
export type LocalBackend = z.infer<typeof LocalBackendSchema>;

export const RemoteBackendSchema = z.object({
  kind: z.literal('remote'),
  apiKey: z.string().default(''),
  language: z.string().min(1).default('auto'),
  model: z.string().min(1).default('whisper-1'),
});
export type RemoteBackend = z.infer<typeof RemoteBackendSchema>;

export const TranscriptionBackendSchema = z.discriminatedUnion('kind', [
  LocalBackendSchema,
  RemoteBackendSchema,
]);
export type TranscriptionBackend = z.infer<typeof TranscriptionBackendSchema>;

export const AudioSettingsSchema = z.object({
  sampleRate: z.number().int().min(8000).max(48000).default(16000),
  channels: z.number().int().min(1).max(2).default(1),
});
export type AudioSettings = z.infer<typeof AudioSettingsSchema>;

export const InsertionMethodSchema = z.enum(['auto', 'clipboard', 'typing']);
export type InsertionMethod = z.infer<typeof InsertionMethodSchema>;

export const ResponseMethodSchema = z.enum(['notification', 'clipboard', 'console']);
export type ResponseMethod = z.infer<typeof ResponseMethodSchema>;

export const DEFAULT_TRIGGERS = ['voicebox', 'assistant', 'computer'];
export const DEFAULT_COMMAND_MODEL = 'meta-llama/llama-3.2-3b-instruct:free';

export const CommandSettingsSchema = z.object({
  enabled: z.boolean().default(true),
  triggers: z.array(z.string().min(1)).default(DEFAULT_TRIGGERS),
  openRouterApiKey: z.string().optional(),
  model: z.string().min(1).default(DEFAULT_COMMAND_MODEL),
  localEndpoint: z.string().url().optional(),
  responseMethod: ResponseMethodSchema.default('notification'),
});
export type CommandSettings = z.infer<typeof CommandSettingsSchema>;

export const AppConfigSchema = z.object({
  hotkey: z.string().min(1).default('ctrl+space'),
  transcription: TranscriptionBackendSchema.default({ kind: 'local' }),
  audio: AudioSettingsSchema.default({}),
  insertionMethod: InsertionMethodSchema.default('auto'),
  keepRecordings: z.boolean().default(false),
  commands: CommandSettingsSchema.default({}),
  debug: z.boolean().default(false),
  firstRun: z.boolean().default(true),
});
export type AppConfig = z.infer<typeof AppConfigSchema>;
export type AppConfigInput = z.input<typeof AppConfigSchema>;

// Stored substitutions: phrase -> replacement, plus the deleted default phrases.
export const PersistedSubstitutionsSchema = z.record(
  z.string(),
  z.union([z.string(), z.array(z.string())])
);
export type PersistedSubstitutions = z.infer<typeof PersistedSubstitutionsSchema>;

export const DomainEnvelopeSchema = z.object({
  version: z.number().int().optional(),
  payload: z.unknown(),
});
export type DomainEnvelope = z.infer<typeof DomainEnvelopeSchema>;
