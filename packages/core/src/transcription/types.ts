import { z } from 'zod';
import type { TranscriptionBackend } from '../domain/schemas';
import type { Logger } from '../logging';

export const OPENAI_BASE_URL = 'https://api.openai.com/v1';

export const TranscriptionJsonSchema = z.object({
  text: z.string().default(''),
});

export const TranscriptionErrorBodySchema = z.object({
  error: z.object({
    message: z.string().default(''),
    type: z.string().nullish(),
    code: z.string().nullish(),
  }),
});
export type TranscriptionErrorBody = z.infer<typeof TranscriptionErrorBodySchema>;

export interface TranscriptionClientOptions {
  backend: TranscriptionBackend;
  fetcher?: typeof fetch;
  readAudio?: (path: string) => Promise<Uint8Array>;
  remoteBaseUrl?: string;
  timeoutMs?: number;
  logger?: Logger;
}
