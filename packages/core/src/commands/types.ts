import { z } from 'zod';
import type { CommandRoutingError } from '../errors/errors';

export interface ImageInfo {
  width: number;
  height: number;
  format: string;
}

export type ClipboardPayload =
  | { kind: 'text'; content: string }
  | { kind: 'image'; content: Uint8Array; info: ImageInfo }
  | { kind: 'none' };

export interface CommandRequest {
  trigger: string;
  body: string;
  useClipboard: boolean;
  clipboard?: ClipboardPayload;
}

export type BuiltinName = 'time' | 'date' | 'help';

export type CommandClassification =
  | { kind: 'builtin'; name: BuiltinName; request: CommandRequest }
  | { kind: 'routed'; request: CommandRequest }
  | { kind: 'notACommand'; text: string };

export type CommandSource = 'builtin' | 'local' | 'remote';

export type CommandResult =
  | { success: true; response: string; source: CommandSource }
  | { success: false; error: CommandRoutingError };

export type ChatContentPart =
  | { type: 'text'; text: string }
  | { type: 'image_url'; image_url: { url: string } };

export interface ChatMessage {
  role: 'system' | 'user';
  content: string | ChatContentPart[];
}

export const ChatCompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z
          .object({
            content: z.string().nullish(),
            reasoning: z.string().nullish(),
          })
          .default({}),
      })
    )
    .default([]),
});
export type ChatCompletionResponse = z.infer<typeof ChatCompletionResponseSchema>;

export const OpenRouterErrorSchema = z.object({
  error: z.object({
    message: z.string().default(''),
    code: z.union([z.number(), z.string()]).optional(),
    metadata: z
      .object({
        raw: z.string().optional(),
      })
      .passthrough()
      .optional(),
  }),
});
export type OpenRouterError = z.infer<typeof OpenRouterErrorSchema>;

export const GenerateResponseSchema = z.object({
  response: z.string().default(''),
});
