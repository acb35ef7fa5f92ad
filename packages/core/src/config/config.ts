import { ConfigError } from '../errors/errors';
import { parseHotkey } from '../hotkeys/parse';
import {
  AppConfigSchema,
  type AppConfig,
  type TranscriptionBackend,
} from '../domain/schemas';

export const DEFAULT_CONFIG: AppConfig = AppConfigSchema.parse({});

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const SECTIONS = ['audio', 'commands'] as const;

/**
 * Deep-merges section objects so a partial `{ audio: { channels: 2 } }` keeps
 * the other audio fields. The transcription section is replaced whole unless
 * the backend kind stays the same.
 */
export const mergeConfig = (base: AppConfig, partial: unknown): Record<string, unknown> => {
  if (!isRecord(partial)) return base;
  const merged: Record<string, unknown> = { ...base, ...partial };
  SECTIONS.forEach((section) => {
    const next = partial[section];
    if (isRecord(next)) {
      merged[section] = { ...base[section], ...next };
    }
  });
  const transcription = partial.transcription;
  if (isRecord(transcription)) {
    const sameKind = transcription.kind === undefined || transcription.kind === base.transcription.kind;
    merged.transcription = sameKind ? { ...base.transcription, ...transcription } : transcription;
  }
  return merged;
};

export const validateConfig = (config: AppConfig): string[] => {
  const issues: string[] = [];
  if (config.transcription.kind === 'remote' && !config.transcription.apiKey) {
    issues.push('transcription.apiKey: API key required for remote transcription');
  }
  try {
    parseHotkey(config.hotkey);
  } catch (error) {
    issues.push(`hotkey: ${error instanceof Error ? error.message : String(error)}`);
  }
  return issues;
};

export const parseConfig = (input: unknown): AppConfig => {
  const result = AppConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new ConfigError('invalid_config', `Invalid configuration: ${issues.join('; ')}`, issues);
  }
  const issues = validateConfig(result.data);
  if (issues.length) {
    const code = issues[0].startsWith('hotkey') ? 'invalid_hotkey' : 'missing_api_key';
    throw new ConfigError(code, `Invalid configuration: ${issues.join('; ')}`, issues);
  }
  return result.data;
};

export const backendsEqual = (left: TranscriptionBackend, right: TranscriptionBackend) => {
  if (left.kind === 'local' && right.kind === 'local') {
    return (
      left.modelSize === right.modelSize &&
      left.language === right.language &&
      left.endpoint === right.endpoint
    );
  }
  if (left.kind === 'remote' && right.kind === 'remote') {
    return (
      left.apiKey === right.apiKey && left.language === right.language && left.model === right.model
    );
  }
  return false;
};
