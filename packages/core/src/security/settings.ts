import { AppConfigSchema, type AppConfig } from '../domain/schemas';

export const REDACTED_MARKER = 'REDACTED';

export const maskSecret = (value: string | undefined, marker = REDACTED_MARKER) =>
  value ? marker : value;

export const redactConfig = (config: AppConfig, marker = REDACTED_MARKER): AppConfig =>
  AppConfigSchema.parse({
    ...config,
    transcription:
      config.transcription.kind === 'remote'
        ? { ...config.transcription, apiKey: maskSecret(config.transcription.apiKey, marker) }
        : config.transcription,
    commands: {
      ...config.commands,
      openRouterApiKey: maskSecret(config.commands.openRouterApiKey, marker),
    },
  });

export const redactSecrets = (value: string) =>
  value
    .replace(/sk-[A-Za-z0-9_-]{20,}/g, 'sk-REDACTED')
    .replace(/\bBearer\s+[A-Za-z0-9._-]+/gi, 'Bearer REDACTED');
