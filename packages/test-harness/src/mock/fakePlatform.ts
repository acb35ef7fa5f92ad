import { vi } from 'vitest';
import type { HotkeyListener, PlatformAdapter } from '@voicebox/platform';

/**
 * In-memory platform: a clipboard string, recorded keystrokes and hotkeys,
 * and a microphone that always captures a few bytes of PCM.
 */
export const createFakePlatform = () => {
  const hotkeys = new Map<string, HotkeyListener>();
  const typed: string[] = [];
  const notifications: Array<{ title: string; message: string }> = [];
  let clipboardText: string | null = null;

  const unregister = vi.fn(async () => undefined);
  const registerHotkey = vi.fn(async (hotkey: string, listener: HotkeyListener) => {
    hotkeys.set(hotkey, listener);
    return {
      unregister: async () => {
        hotkeys.delete(hotkey);
        await unregister();
      },
    };
  });
  const paste = vi.fn(async () => undefined);

  const platform: PlatformAdapter = {
    name: 'linux',
    hotkey: { registerHotkey },
    audioCapture: {
      start: async () => undefined,
      stop: async () => ({ data: new Uint8Array([0, 1, 0, 1]), durationMs: 1 }),
      cancel: async () => undefined,
    },
    clipboard: {
      readText: async () => clipboardText,
      writeText: async (text) => {
        clipboardText = text;
      },
      readImage: async () => null,
    },
    keystrokes: {
      paste,
      type: async (text) => {
        typed.push(text);
      },
    },
    notifier: {
      notify: async (title, message) => {
        notifications.push({ title, message });
      },
    },
  };

  return {
    platform,
    hotkeys,
    typed,
    notifications,
    registerHotkey,
    unregister,
    paste,
    clipboard: () => clipboardText,
  };
};

type FetchRoute = (url: string, init?: RequestInit) => Response | Promise<Response>;

/** Routes requests by URL substring; unmatched URLs fail like an offline host. */
export const createRoutedFetcher = (routes: Record<string, FetchRoute>) => {
  const urls: string[] = [];
  const fetcher: typeof fetch = async (input, init) => {
    const url = String(input);
    urls.push(url);
    const match = Object.keys(routes).find((fragment) => url.includes(fragment));
    if (!match) throw new TypeError('fetch failed');
    return routes[match](url, init);
  };
  return { fetcher, urls };
};
