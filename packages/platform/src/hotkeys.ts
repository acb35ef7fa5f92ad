import { createRequire } from 'module';
import { noopLogger, parseHotkey, type Logger, type ParsedHotkey } from '@voicebox/core';
import type { HotkeyAdapter, HotkeyListener } from './index';

export type HookEvent = {
  keycode?: number;
  button?: unknown;
  shiftKey: boolean;
  ctrlKey: boolean;
  altKey: boolean;
  metaKey: boolean;
};

export type HookEventName = 'keydown' | 'keyup' | 'mousedown';

export type IOHook = {
  on(event: HookEventName, callback: (event: HookEvent) => void): void;
  start(): void;
  stop(): void;
};

export type HookModule = {
  uIOhook: IOHook;
  UiohookKey: Record<string, number>;
};

const require = createRequire(import.meta.url);

export const loadUiohook = (): HookModule => {
  try {
    const loaded: HookModule = require('uiohook-napi');
    return loaded;
  } catch (error) {
    const details = error instanceof Error ? error.message : String(error);
    throw new Error(
      `uiohook-napi failed to load. Reinstall it for this Node.js version (npm rebuild uiohook-napi). ${details}`
    );
  }
};

type Registration =
  | {
      kind: 'keyboard';
      keycode: number;
      modifiers: { shift: boolean; ctrl: boolean; alt: boolean; meta: boolean };
      listener: HotkeyListener;
      held: boolean;
    }
  | { kind: 'mouse'; button: number; listener: HotkeyListener };

const matchesKey = (event: HookEvent, registration: Extract<Registration, { kind: 'keyboard' }>) =>
  event.keycode === registration.keycode &&
  event.shiftKey === registration.modifiers.shift &&
  event.ctrlKey === registration.modifiers.ctrl &&
  event.altKey === registration.modifiers.alt &&
  event.metaKey === registration.modifiers.meta;

export interface GlobalHotkeyOptions {
  loadHook?: () => HookModule;
  logger?: Logger;
}

/**
 * Global hotkeys over one shared uiohook instance. Listeners fire once per
 * key press; auto-repeat keydowns are ignored until the matching keyup.
 */
export const createGlobalHotkeyAdapter = (options: GlobalHotkeyOptions = {}): HotkeyAdapter => {
  const loadHook = options.loadHook ?? loadUiohook;
  const logger = options.logger ?? noopLogger;
  const registrations = new Set<Registration>();
  let hook: HookModule | null = null;
  let started = false;

  const ensureHook = () => {
    if (hook) return hook;
    const loaded = loadHook();
    loaded.uIOhook.on('keydown', (event) => {
      registrations.forEach((registration) => {
        if (registration.kind !== 'keyboard' || !matchesKey(event, registration)) return;
        if (registration.held) return;
        registration.held = true;
        registration.listener();
      });
    });
    loaded.uIOhook.on('keyup', (event) => {
      registrations.forEach((registration) => {
        if (registration.kind === 'keyboard' && event.keycode === registration.keycode) {
          registration.held = false;
        }
      });
    });
    loaded.uIOhook.on('mousedown', (event) => {
      registrations.forEach((registration) => {
        if (registration.kind === 'mouse' && event.button === registration.button) {
          registration.listener();
        }
      });
    });
    hook = loaded;
    return loaded;
  };

  const toRegistration = (parsed: ParsedHotkey, hookModule: HookModule, listener: HotkeyListener): Registration => {
    if (parsed.kind === 'mouse') {
      return { kind: 'mouse', button: parsed.button, listener };
    }
    const keycode = hookModule.UiohookKey[parsed.key];
    if (keycode === undefined) {
      throw new Error(`Unsupported hotkey: ${parsed.label}`);
    }
    return {
      kind: 'keyboard',
      keycode,
      modifiers: {
        shift: parsed.modifiers.includes('shift'),
        ctrl: parsed.modifiers.includes('ctrl'),
        alt: parsed.modifiers.includes('alt'),
        meta: parsed.modifiers.includes('meta'),
      },
      listener,
      held: false,
    };
  };

  return {
    async registerHotkey(hotkey, listener) {
      const parsed = parseHotkey(hotkey);
      const hookModule = ensureHook();
      const registration = toRegistration(parsed, hookModule, listener);
      registrations.add(registration);
      if (!started) {
        hookModule.uIOhook.start();
        started = true;
      }
      logger.debug('Registered hotkey', parsed.label);
      return {
        async unregister() {
          registrations.delete(registration);
          if (registrations.size === 0 && started) {
            hookModule.uIOhook.stop();
            started = false;
          }
        },
      };
    },
  };
};
