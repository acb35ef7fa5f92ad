import { DEFAULT_COMMAND_MODEL } from '../domain/schemas';
import { CommandRoutingError, type CommandRoutingErrorCode } from '../errors/errors';
import { noopLogger, type Logger } from '../logging';
import { matchBuiltin, runBuiltin } from './builtins';
import { createModelCapabilityMemo, type ModelCapabilityMemo } from './capabilities';
import { encodeImageForPrompt, type ImageEncoder } from './image';
import { inlineInstruction, SYSTEM_INSTRUCTION, withClipboardText } from './prompts';
import {
  ChatCompletionResponseSchema,
  GenerateResponseSchema,
  OpenRouterErrorSchema,
  type ChatMessage,
  type ClipboardPayload,
  type CommandResult,
  type CommandSource,
} from './types';

export const OPENROUTER_CHAT_URL = 'https://openrouter.ai/api/v1/chat/completions';
export const DEFAULT_TIMEOUT_MS = 30000;
export const MAX_TOKENS = 200;
export const TEMPERATURE = 0.7;
export const LOCAL_CHAT_MODEL = 'default';
export const LOCAL_GENERATE_MODEL = 'llama3.2';

export interface RouterSettings {
  apiKey?: string;
  localEndpoint?: string;
  model: string;
}

export interface CommandRouterOptions extends Partial<RouterSettings> {
  fetcher?: typeof fetch;
  timeoutMs?: number;
  now?: () => Date;
  encodeImage?: ImageEncoder;
  memo?: ModelCapabilityMemo;
  logger?: Logger;
  remoteUrl?: string;
  referer?: string;
}

export interface CommandRouter {
  process(command: string): Promise<CommandResult>;
  processWithClipboard(command: string, clipboard: ClipboardPayload): Promise<CommandResult>;
  configure(settings: Partial<RouterSettings>): void;
  getSettings(): RouterSettings;
  memo: ModelCapabilityMemo;
}

type HttpReply = { status: number; ok: boolean; text: string };

type PreparedRequest = { messages: ChatMessage[]; hasSystem: boolean };

const fail = (
  code: CommandRoutingErrorCode,
  message: string,
  options?: { cause?: unknown; status?: number }
): CommandResult => ({ success: false, error: new CommandRoutingError(code, message, options) });

const succeed = (response: string, source: CommandSource): CommandResult => ({
  success: true,
  response,
  source,
});

const parseJson = (text: string): unknown => {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
};

const extractContent = (text: string) => {
  const parsed = ChatCompletionResponseSchema.safeParse(parseJson(text));
  if (!parsed.success) return null;
  const message = parsed.data.choices[0]?.message;
  const content = message?.content ?? '';
  if (content.trim()) return content;
  // Some reasoning models leave content empty and answer in `reasoning`.
  const reasoning = message?.reasoning ?? '';
  return reasoning.trim() ? reasoning : '';
};

const rejectsSystemRole = (text: string) => {
  const parsed = OpenRouterErrorSchema.safeParse(parseJson(text));
  if (!parsed.success) return false;
  const message = parsed.data.error.message.toLowerCase();
  const raw = (parsed.data.error.metadata?.raw ?? '').toLowerCase();
  return (
    message.includes('instruction') ||
    message.includes('system') ||
    raw.includes('developer instruction') ||
    raw.includes('instruction is not enabled')
  );
};

const describeHttpError = (reply: HttpReply) => {
  const parsed = OpenRouterErrorSchema.safeParse(parseJson(reply.text));
  if (parsed.success && parsed.data.error.message) return parsed.data.error.message;
  return `HTTP ${reply.status}: ${reply.text}`;
};

const trimEndpoint = (endpoint: string) => endpoint.replace(/\/+$/, '');

export const createCommandRouter = (options: CommandRouterOptions = {}): CommandRouter => {
  const fetcher = options.fetcher ?? fetch;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const now = options.now ?? (() => new Date());
  const encodeImage = options.encodeImage ?? encodeImageForPrompt;
  const memo = options.memo ?? createModelCapabilityMemo();
  const logger = options.logger ?? noopLogger;
  const remoteUrl = options.remoteUrl ?? OPENROUTER_CHAT_URL;
  let settings: RouterSettings = {
    apiKey: options.apiKey,
    localEndpoint: options.localEndpoint,
    model: options.model ?? DEFAULT_COMMAND_MODEL,
  };

  const post = async (url: string, body: unknown, headers: Record<string, string> = {}) => {
    try {
      const response = await fetcher(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', ...headers },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(timeoutMs),
      });
      const reply: HttpReply = {
        status: response.status,
        ok: response.ok,
        text: await response.text(),
      };
      return reply;
    } catch (error) {
      if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
        throw new CommandRoutingError('timeout', `Request timeout after ${timeoutMs}ms: ${url}`, {
          cause: error,
        });
      }
      throw new CommandRoutingError(
        'request_failed',
        `Request failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }
  };

  const guard = async (run: () => Promise<CommandResult>): Promise<CommandResult> => {
    try {
      return await run();
    } catch (error) {
      if (error instanceof CommandRoutingError) return { success: false, error };
      return fail('request_failed', error instanceof Error ? error.message : String(error), {
        cause: error,
      });
    }
  };

  const queryLocal = (endpoint: string, prompt: string) =>
    guard(async () => {
      const base = trimEndpoint(endpoint);
      const chat = await post(`${base}/v1/chat/completions`, {
        model: LOCAL_CHAT_MODEL,
        messages: [
          { role: 'system', content: SYSTEM_INSTRUCTION },
          { role: 'user', content: prompt },
        ],
        max_tokens: MAX_TOKENS,
        temperature: TEMPERATURE,
      });
      if (chat.ok) {
        const content = extractContent(chat.text);
        if (content === null) return fail('invalid_response', 'Invalid response from local LLM');
        if (!content) return fail('empty_response', 'Empty response from local LLM');
        return succeed(content, 'local');
      }
      logger.debug('Local chat endpoint returned', chat.status, 'trying generate API');
      const generate = await post(`${base}/api/generate`, {
        model: LOCAL_GENERATE_MODEL,
        prompt,
        stream: false,
      });
      if (generate.ok) {
        const parsed = GenerateResponseSchema.safeParse(parseJson(generate.text));
        if (!parsed.success) return fail('invalid_response', 'Invalid response from local LLM');
        if (!parsed.data.response.trim()) {
          return fail('empty_response', 'Empty response from local LLM');
        }
        return succeed(parsed.data.response, 'local');
      }
      return fail('local_failed', 'Failed to query local LLM', { status: generate.status });
    });

  const sendRemote = (messages: ChatMessage[]) =>
    post(
      remoteUrl,
      {
        model: settings.model,
        messages,
        max_tokens: MAX_TOKENS,
        temperature: TEMPERATURE,
      },
      {
        Authorization: `Bearer ${settings.apiKey ?? ''}`,
        'HTTP-Referer': options.referer ?? 'https://github.com/voicebox',
        'X-Title': 'VoiceBox',
      }
    );

  const prepareText = (prompt: string, useSystem: boolean): PreparedRequest =>
    useSystem
      ? {
          messages: [
            { role: 'system', content: SYSTEM_INSTRUCTION },
            { role: 'user', content: prompt },
          ],
          hasSystem: true,
        }
      : { messages: [{ role: 'user', content: inlineInstruction(prompt) }], hasSystem: false };

  const prepareImage = async (
    command: string,
    image: Uint8Array,
    useSystem: boolean
  ): Promise<PreparedRequest> => {
    const encoded = await encodeImage(image);
    logger.debug('Encoded clipboard image', `${encoded.width}x${encoded.height}`, encoded.bytes, 'bytes');
    return {
      messages: [
        {
          role: 'user',
          content: [
            { type: 'text', text: useSystem ? command : inlineInstruction(command) },
            { type: 'image_url', image_url: { url: encoded.dataUrl } },
          ],
        },
      ],
      hasSystem: false,
    };
  };

  const fromReply = (reply: HttpReply, emptyMessage: string): CommandResult => {
    const content = extractContent(reply.text);
    if (content === null) return fail('invalid_response', 'Invalid response from OpenRouter');
    if (!content) return fail('empty_response', emptyMessage);
    return succeed(content, 'remote');
  };

  const queryRemote = (command: string, clipboard: ClipboardPayload) =>
    guard(async () => {
      const model = settings.model;
      const useSystem = memo.supportsSystemRole(model);
      const isImage = clipboard.kind === 'image';
      const prompt = clipboard.kind === 'text' ? withClipboardText(command, clipboard.content) : command;
      const request =
        clipboard.kind === 'image'
          ? await prepareImage(command, clipboard.content, useSystem)
          : prepareText(prompt, useSystem);

      logger.info('OpenRouter request', { model, systemRole: request.hasSystem, image: isImage });
      const reply = await sendRemote(request.messages);
      if (reply.ok) return fromReply(reply, 'Empty response from OpenRouter');

      if (isImage && reply.status === 404) {
        return fail('image_unsupported', `Model ${model} does not support image input`, {
          status: reply.status,
        });
      }
      if (request.hasSystem && rejectsSystemRole(reply.text)) {
        logger.warn(`Model ${model} rejected the system message, retrying without it`);
        memo.markNoSystemRole(model);
        const retry = await sendRemote(prepareText(prompt, false).messages);
        if (retry.ok) return fromReply(retry, 'Empty response from OpenRouter (retry)');
        return fail('http_error', `OpenRouter retry failed: ${retry.status}`, {
          status: retry.status,
        });
      }
      return fail('http_error', `OpenRouter error: ${describeHttpError(reply)}`, {
        status: reply.status,
      });
    });

  const localPrompt = (command: string, clipboard: ClipboardPayload) => {
    if (clipboard.kind === 'text') return withClipboardText(command, clipboard.content);
    return command;
  };

  const dispatch = async (command: string, clipboard: ClipboardPayload): Promise<CommandResult> => {
    let localFailure: CommandResult | null = null;
    if (settings.localEndpoint) {
      const local =
        clipboard.kind === 'image'
          ? fail('image_unsupported', "Local LLM doesn't support image input")
          : await queryLocal(settings.localEndpoint, localPrompt(command, clipboard));
      if (local.success) return local;
      logger.warn('Local LLM failed', local.error.message);
      localFailure = local;
    }
    if (settings.apiKey) {
      return queryRemote(command, clipboard);
    }
    return localFailure ?? fail('no_backend', 'No OpenRouter API key configured.');
  };

  const process = async (command: string): Promise<CommandResult> => {
    const trimmed = command.trim();
    if (!trimmed) return fail('empty_command', 'No command provided');
    const builtin = matchBuiltin(trimmed);
    if (builtin) return succeed(runBuiltin(builtin, now()), 'builtin');
    return dispatch(trimmed, { kind: 'none' });
  };

  const processWithClipboard = async (
    command: string,
    clipboard: ClipboardPayload
  ): Promise<CommandResult> => {
    const trimmed = command.trim();
    if (!trimmed) return fail('empty_command', 'No command provided');
    if (clipboard.kind === 'none') return process(trimmed);
    return dispatch(trimmed, clipboard);
  };

  return {
    process,
    processWithClipboard,
    configure: (next) => {
      settings = {
        apiKey: 'apiKey' in next ? next.apiKey : settings.apiKey,
        localEndpoint: 'localEndpoint' in next ? next.localEndpoint : settings.localEndpoint,
        model: next.model ?? settings.model,
      };
    },
    getSettings: () => ({ ...settings }),
    memo,
  };
};
