import { readFile } from 'fs/promises';
import type { TranscriptionBackend } from '../domain/schemas';
import { TranscriptionError } from '../errors/errors';
import type { TranscriptionGateway, TranscriptionOutcome } from '../gateways/types';
import { noopLogger } from '../logging';
import {
  OPENAI_BASE_URL,
  TranscriptionErrorBodySchema,
  TranscriptionJsonSchema,
  type TranscriptionClientOptions,
} from './types';

const DEFAULT_TIMEOUT_MS = 120000;

const joinUrl = (base: string, path: string) => {
  if (!base.endsWith('/') && !path.startsWith('/')) return `${base}/${path}`;
  if (base.endsWith('/') && path.startsWith('/')) return `${base}${path.slice(1)}`;
  return `${base}${path}`;
};

export const resolveTranscriptionUrl = (baseUrl: string) => {
  if (baseUrl.includes('/v1/audio')) {
    return joinUrl(baseUrl, 'transcriptions');
  }
  if (baseUrl.endsWith('/v1') || baseUrl.endsWith('/v1/') || baseUrl.includes('/v1/')) {
    return joinUrl(baseUrl, 'audio/transcriptions');
  }
  return joinUrl(baseUrl, '/v1/audio/transcriptions');
};

const isMissingFile = (error: unknown) =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

const parseErrorBody = (details: string) => {
  try {
    const parsed = TranscriptionErrorBodySchema.safeParse(JSON.parse(details));
    return parsed.success ? parsed.data.error : null;
  } catch {
    return null;
  }
};

export const classifyHttpFailure = (status: number, details: string) => {
  const body = parseErrorBody(details);
  const code = body?.code ?? body?.type ?? '';
  const message = body?.message || details;
  if (status === 401 || code === 'invalid_api_key') {
    return new TranscriptionError('unauthorized', `Transcription rejected the API key: ${message}`);
  }
  if (code === 'insufficient_quota') {
    return new TranscriptionError('quota', `Transcription quota exceeded: ${message}`);
  }
  if (status === 429) {
    return new TranscriptionError('rate_limited', `Transcription rate limit reached: ${message}`);
  }
  return new TranscriptionError('failed', `Transcription failed: ${status} ${message}`.trim());
};

const requestTarget = (backend: TranscriptionBackend, remoteBaseUrl: string) =>
  backend.kind === 'remote'
    ? { url: resolveTranscriptionUrl(remoteBaseUrl), model: backend.model }
    : { url: resolveTranscriptionUrl(backend.endpoint), model: backend.modelSize };

export const createTranscriptionClient = (options: TranscriptionClientOptions): TranscriptionGateway => {
  const { backend } = options;
  const fetcher = options.fetcher ?? fetch;
  const readAudio = options.readAudio ?? ((path: string) => readFile(path));
  const logger = options.logger ?? noopLogger;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const target = requestTarget(backend, options.remoteBaseUrl ?? OPENAI_BASE_URL);

  const transcribe = async (path: string): Promise<TranscriptionOutcome> => {
    if (backend.kind === 'remote' && !backend.apiKey) {
      throw new TranscriptionError('unauthorized', 'OpenAI API key is required for transcription.');
    }
    let audio: Uint8Array;
    try {
      audio = await readAudio(path);
    } catch (error) {
      if (isMissingFile(error)) {
        throw new TranscriptionError('artifact_missing', `Audio file not found: ${path}`, {
          cause: error,
        });
      }
      throw new TranscriptionError(
        'failed',
        `Failed to read audio file: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }

    const form = new FormData();
    form.append('file', new Blob([audio], { type: 'audio/wav' }), 'audio.wav');
    form.append('model', target.model);
    form.append('response_format', 'text');
    if (backend.language !== 'auto') form.append('language', backend.language);

    const headers: Record<string, string> = {};
    if (backend.kind === 'remote') headers.Authorization = `Bearer ${backend.apiKey}`;

    let response: Response;
    try {
      response = await fetcher(target.url, {
        method: 'POST',
        headers,
        body: form,
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (error) {
      throw new TranscriptionError(
        'unreachable',
        `Transcription service unreachable at ${target.url}: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }

    if (!response.ok) {
      const details = await response.text();
      throw classifyHttpFailure(response.status, details);
    }

    const contentType = response.headers.get('content-type') ?? '';
    let text = '';
    if (contentType.includes('application/json')) {
      text = TranscriptionJsonSchema.parse(await response.json()).text;
    } else {
      text = await response.text();
    }
    const trimmed = text.trim();
    logger.debug('Transcription finished', { backend: backend.kind, characters: trimmed.length });
    if (!trimmed) return { kind: 'noSpeech' };
    return { kind: 'speech', text: trimmed };
  };

  return {
    backend: backend.kind,
    transcribe,
  };
};
