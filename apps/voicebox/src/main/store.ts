import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import {
  AppConfigSchema,
  ConfigError,
  DEFAULT_CONFIG,
  DomainEnvelopeSchema,
  ModelCacheSchema,
  PersistedSubstitutionsSchema,
  SCHEMA_VERSION,
  mergeConfig,
  migrateToCurrent,
  noopLogger,
  parseConfig,
  type AppConfig,
  type Logger,
  type ModelCacheStore,
  type PersistedSubstitutions,
} from '@voicebox/core';

type Environment = Record<string, string | undefined>;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const resolveConfigDir = (
  env: Environment = process.env,
  platform: NodeJS.Platform = process.platform,
  home = homedir()
) => {
  if (env.VOICEBOX_CONFIG_DIR) return env.VOICEBOX_CONFIG_DIR;
  if (platform === 'darwin') return join(home, 'Library', 'Application Support', 'VoiceBox');
  if (platform === 'win32') return join(env.APPDATA ?? home, 'VoiceBox');
  return join(env.XDG_CONFIG_HOME ?? join(home, '.config'), 'VoiceBox');
};

/**
 * Keys from the environment fill in missing secrets only. They are applied
 * after the file is read and never written back.
 */
export const applyEnvironment = (input: Record<string, unknown>, env: Environment) => {
  const next = { ...input };
  const transcription = input.transcription;
  if (
    env.OPENAI_API_KEY &&
    isRecord(transcription) &&
    transcription.kind === 'remote' &&
    !transcription.apiKey
  ) {
    next.transcription = { ...transcription, apiKey: env.OPENAI_API_KEY };
  }
  const commands = input.commands;
  if (env.OPENROUTER_API_KEY && isRecord(commands) && !commands.openRouterApiKey) {
    next.commands = { ...commands, openRouterApiKey: env.OPENROUTER_API_KEY };
  }
  return next;
};

export interface AppStoreOptions {
  configDir: string;
  env?: Environment;
  logger?: Logger;
}

export interface AppStore {
  paths: { configDir: string; config: string; substitutions: string; modelCache: string };
  loadConfig(): AppConfig;
  updateConfig(patch: Record<string, unknown>): AppConfig;
  loadSubstitutions(): unknown;
  saveSubstitutions(data: PersistedSubstitutions): void;
  readSubstitutionFile(filePath: string): PersistedSubstitutions;
  writeSubstitutionFile(filePath: string, data: PersistedSubstitutions): void;
  modelCache: ModelCacheStore;
}

const writeJson = (filePath: string, value: unknown) => {
  writeFileSync(filePath, JSON.stringify(value, null, 2), 'utf-8');
};

export const createAppStore = (options: AppStoreOptions): AppStore => {
  const env = options.env ?? process.env;
  const logger = options.logger ?? noopLogger;
  const configDir = options.configDir;
  const paths = {
    configDir,
    config: join(configDir, 'config.json'),
    substitutions: join(configDir, 'substitutions.json'),
    modelCache: join(configDir, 'model-cache.json'),
  };

  const ensureDir = () => {
    if (!existsSync(configDir)) mkdirSync(configDir, { recursive: true });
  };

  // Returns the stored payload migrated to the current layout, without environment keys.
  const readPayload = (): Record<string, unknown> => {
    if (!existsSync(paths.config)) return { ...DEFAULT_CONFIG };
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(paths.config, 'utf-8'));
    } catch (error) {
      throw new ConfigError(
        'invalid_config',
        `Configuration file is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
        [],
        { cause: error }
      );
    }
    const envelope = DomainEnvelopeSchema.safeParse(raw);
    // Files written before the envelope existed hold the settings at the top level.
    const input =
      envelope.success && isRecord(raw) && 'payload' in raw
        ? { version: envelope.data.version, payload: envelope.data.payload }
        : { payload: raw };
    return migrateToCurrent(input, (payload) => mergeConfig(DEFAULT_CONFIG, payload));
  };

  const writePayload = (payload: Record<string, unknown>) => {
    ensureDir();
    writeJson(paths.config, { version: SCHEMA_VERSION, payload });
  };

  const loadConfig = () => {
    const exists = existsSync(paths.config);
    const payload = readPayload();
    const config = parseConfig(applyEnvironment(payload, env));
    if (!exists) {
      writePayload(payload);
      logger.info('Created default configuration', paths.config);
    }
    return config;
  };

  // Validates the merged result before anything is written.
  const updateConfig = (patch: Record<string, unknown>) => {
    const stored = AppConfigSchema.safeParse(readPayload());
    if (!stored.success) return parseConfig(applyEnvironment(readPayload(), env));
    const payload = mergeConfig(stored.data, patch);
    const next = parseConfig(applyEnvironment(payload, env));
    writePayload(payload);
    return next;
  };

  const loadSubstitutions = (): unknown => {
    if (!existsSync(paths.substitutions)) return undefined;
    try {
      return JSON.parse(readFileSync(paths.substitutions, 'utf-8'));
    } catch (error) {
      logger.warn('Failed to read substitutions, using defaults', error instanceof Error ? error.message : error);
      return undefined;
    }
  };

  const saveSubstitutions = (data: PersistedSubstitutions) => {
    ensureDir();
    writeJson(paths.substitutions, data);
  };

  const modelCache: ModelCacheStore = {
    load() {
      if (!existsSync(paths.modelCache)) return null;
      try {
        const parsed = ModelCacheSchema.safeParse(JSON.parse(readFileSync(paths.modelCache, 'utf-8')));
        return parsed.success ? parsed.data : null;
      } catch (error) {
        logger.warn('Ignoring unreadable model cache', error instanceof Error ? error.message : error);
        return null;
      }
    },
    save(cache) {
      try {
        ensureDir();
        writeJson(paths.modelCache, cache);
      } catch (error) {
        logger.warn('Failed to save model cache', error instanceof Error ? error.message : error);
      }
    },
  };

  const readSubstitutionFile = (filePath: string) => {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(filePath, 'utf-8'));
    } catch (error) {
      throw new ConfigError(
        'invalid_config',
        `Cannot read substitutions file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
        [],
        { cause: error }
      );
    }
    const parsed = PersistedSubstitutionsSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError(
        'invalid_config',
        `Invalid substitutions file ${filePath}`,
        parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      );
    }
    return parsed.data;
  };

  const writeSubstitutionFile = (filePath: string, data: PersistedSubstitutions) => {
    writeJson(filePath, data);
  };

  return {
    paths,
    loadConfig,
    updateConfig,
    loadSubstitutions,
    saveSubstitutions,
    readSubstitutionFile,
    writeSubstitutionFile,
    modelCache,
  };
};
