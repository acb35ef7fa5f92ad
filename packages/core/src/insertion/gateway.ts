import { describeImage } from '../commands/image';
import type { ClipboardPayload, ImageInfo } from '../commands/types';
import type { InsertionMethod } from '../domain/schemas';
import { InsertionError, type InsertionErrorCode } from '../errors/errors';
import type { ClipboardAccess, InsertionGateway, KeystrokeAccess } from '../gateways/types';
import { noopLogger, type Logger } from '../logging';

export const AUTO_CLIPBOARD_THRESHOLD = 100;

export interface InsertionGatewayOptions {
  clipboard: ClipboardAccess;
  keystrokes: KeystrokeAccess;
  sleep?: (ms: number) => Promise<void>;
  describeImage?: (image: Uint8Array) => Promise<ImageInfo>;
  preparePasteMs?: number;
  settleMs?: number;
  logger?: Logger;
}

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export const resolveInsertionMethod = (text: string, method: InsertionMethod) => {
  if (method !== 'auto') return method;
  return text.length > AUTO_CLIPBOARD_THRESHOLD || text.includes('\n') ? 'clipboard' : 'typing';
};

const wrap = (code: InsertionErrorCode, message: string, error: unknown) =>
  error instanceof InsertionError
    ? error
    : new InsertionError(code, `${message}: ${error instanceof Error ? error.message : String(error)}`, {
        cause: error,
      });

export const createInsertionGateway = (options: InsertionGatewayOptions): InsertionGateway => {
  const sleep = options.sleep ?? delay;
  const inspectImage = options.describeImage ?? describeImage;
  const preparePasteMs = options.preparePasteMs ?? 100;
  const settleMs = options.settleMs ?? 200;
  const logger = options.logger ?? noopLogger;

  const insertViaClipboard = async (text: string) => {
    let previous: string | null = null;
    try {
      previous = await options.clipboard.readText();
    } catch (error) {
      logger.warn('Could not save clipboard before paste', error);
    }
    try {
      try {
        await options.clipboard.writeText(text);
      } catch (error) {
        throw wrap('clipboard_failed', 'Failed to write clipboard', error);
      }
      await sleep(preparePasteMs);
      try {
        await options.keystrokes.paste();
      } catch (error) {
        throw wrap('paste_failed', 'Failed to send paste keystroke', error);
      }
      // The target app reads the clipboard asynchronously after the keystroke.
      await sleep(settleMs);
    } finally {
      if (previous !== null) {
        try {
          await options.clipboard.writeText(previous);
        } catch (error) {
          logger.warn('Could not restore clipboard', error);
        }
      }
    }
  };

  const insertViaTyping = async (text: string) => {
    try {
      await options.keystrokes.type(text);
    } catch (error) {
      throw wrap('typing_failed', 'Failed to type text', error);
    }
  };

  const insert = async (text: string, method: InsertionMethod) => {
    if (!text) return false;
    const resolved = resolveInsertionMethod(text, method);
    logger.debug('Inserting text', { method: resolved, characters: text.length });
    if (resolved === 'clipboard') {
      await insertViaClipboard(text);
    } else {
      await insertViaTyping(text);
    }
    return true;
  };

  const readImagePayload = async (): Promise<ClipboardPayload | null> => {
    try {
      const image = await options.clipboard.readImage();
      if (!image || !image.data.length) return null;
      const info = await inspectImage(image.data);
      return { kind: 'image', content: image.data, info };
    } catch (error) {
      logger.warn('Failed to read clipboard image, trying text', error);
      return null;
    }
  };

  const readClipboard = async (): Promise<ClipboardPayload> => {
    const image = await readImagePayload();
    if (image) return image;
    try {
      const text = await options.clipboard.readText();
      if (text && text.trim()) return { kind: 'text', content: text };
    } catch (error) {
      logger.warn('Failed to read clipboard', error);
    }
    return { kind: 'none' };
  };

  return { insert, readClipboard };
};
