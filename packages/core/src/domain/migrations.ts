import { ConfigError } from '../errors/errors';
import { SCHEMA_VERSION } from './schemas';

export type Migration<T> = (input: unknown) => T;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

// Version 0 is the flat snake_case layout written by earlier releases.
const migrateLegacyConfig = (payload: unknown): unknown => {
  if (!isRecord(payload)) return payload;
  if (!('transcription_mode' in payload) && !('text_insertion_method' in payload)) {
    return payload;
  }
  const mode = payload.transcription_mode;
  const transcription =
    mode === 'api'
      ? { kind: 'remote', apiKey: payload.api_key ?? '' }
      : mode === 'local' || mode === undefined
        ? { kind: 'local', modelSize: payload.local_model_size ?? 'base' }
        : { kind: mode };
  const audio: Record<string, unknown> = {};
  if (payload.audio_sample_rate !== undefined) audio.sampleRate = payload.audio_sample_rate;
  if (payload.audio_channels !== undefined) audio.channels = payload.audio_channels;
  const migrated: Record<string, unknown> = { transcription, audio };
  if (payload.hotkey !== undefined) migrated.hotkey = payload.hotkey;
  if (payload.text_insertion_method !== undefined) {
    migrated.insertionMethod = payload.text_insertion_method;
  }
  if (typeof payload.auto_cleanup_temp_files === 'boolean') {
    migrated.keepRecordings = !payload.auto_cleanup_temp_files;
  }
  if (payload.first_run !== undefined) migrated.firstRun = payload.first_run;
  return migrated;
};

const MIGRATIONS: Record<number, (payload: unknown) => unknown> = {
  0: migrateLegacyConfig,
};

export const migrateToCurrent = <T>(input: { version?: number; payload: unknown }, parser: Migration<T>) => {
  const version = input.version ?? 0;
  if (version > SCHEMA_VERSION) {
    throw new ConfigError('invalid_config', `Unsupported schema version: ${version}`);
  }
  let payload = input.payload;
  for (let step = version; step < SCHEMA_VERSION; step += 1) {
    payload = MIGRATIONS[step]?.(payload) ?? payload;
  }
  return parser(payload);
};
