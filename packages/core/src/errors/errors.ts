export type ErrorCategory = 'recording' | 'transcription' | 'command' | 'insertion' | 'config';

export class VoiceBoxError extends Error {
  readonly category: ErrorCategory;
  readonly code: string;

  constructor(category: ErrorCategory, code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'VoiceBoxError';
    this.category = category;
    this.code = code;
  }
}

export type RecordingErrorCode =
  | 'already_recording'
  | 'not_recording'
  | 'no_audio'
  | 'device_failed';

export class RecordingError extends VoiceBoxError {
  declare readonly code: RecordingErrorCode;

  constructor(code: RecordingErrorCode, message: string, options?: { cause?: unknown }) {
    super('recording', code, message, options);
    this.name = 'RecordingError';
  }
}

export type TranscriptionErrorCode =
  | 'unreachable'
  | 'unauthorized'
  | 'quota'
  | 'rate_limited'
  | 'artifact_missing'
  | 'failed';

export class TranscriptionError extends VoiceBoxError {
  declare readonly code: TranscriptionErrorCode;

  constructor(code: TranscriptionErrorCode, message: string, options?: { cause?: unknown }) {
    super('transcription', code, message, options);
    this.name = 'TranscriptionError';
  }
}

export type CommandRoutingErrorCode =
  | 'empty_command'
  | 'no_backend'
  | 'empty_response'
  | 'invalid_response'
  | 'image_unsupported'
  | 'image_processing'
  | 'http_error'
  | 'request_failed'
  | 'timeout'
  | 'local_failed';

export class CommandRoutingError extends VoiceBoxError {
  declare readonly code: CommandRoutingErrorCode;
  readonly status?: number;

  constructor(
    code: CommandRoutingErrorCode,
    message: string,
    options?: { cause?: unknown; status?: number }
  ) {
    super('command', code, message, options);
    this.name = 'CommandRoutingError';
    this.status = options?.status;
  }
}

export type InsertionErrorCode = 'clipboard_failed' | 'paste_failed' | 'typing_failed';

export class InsertionError extends VoiceBoxError {
  declare readonly code: InsertionErrorCode;

  constructor(code: InsertionErrorCode, message: string, options?: { cause?: unknown }) {
    super('insertion', code, message, options);
    this.name = 'InsertionError';
  }
}

export type ConfigErrorCode = 'invalid_config' | 'missing_api_key' | 'invalid_hotkey' | 'unsupported_platform';

export class ConfigError extends VoiceBoxError {
  declare readonly code: ConfigErrorCode;
  readonly issues: string[];

  constructor(code: ConfigErrorCode, message: string, issues: string[] = [], options?: { cause?: unknown }) {
    super('config', code, message, options);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export const isVoiceBoxError = (error: unknown): error is VoiceBoxError => error instanceof VoiceBoxError;

export const errorMessage = (error: unknown) =>
  error instanceof Error ? error.message : String(error);

export interface ErrorDescription {
  category: ErrorCategory | 'unexpected';
  code: string;
  message: string;
}

export const describeError = (error: unknown): ErrorDescription => {
  if (isVoiceBoxError(error)) {
    return { category: error.category, code: error.code, message: error.message };
  }
  return { category: 'unexpected', code: 'unexpected', message: errorMessage(error) };
};
