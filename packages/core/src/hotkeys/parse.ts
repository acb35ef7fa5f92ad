import { ConfigError } from '../errors/errors';

export type HotkeyModifier = 'ctrl' | 'shift' | 'alt' | 'meta';

export type ParsedHotkey =
  | { kind: 'keyboard'; key: string; modifiers: HotkeyModifier[]; label: string }
  | { kind: 'mouse'; button: number; label: string };

const MODIFIER_ALIASES = new Map<string, HotkeyModifier>(Object.entries({
  ctrl: 'ctrl',
  control: 'ctrl',
  shift: 'shift',
  alt: 'alt',
  option: 'alt',
  cmd: 'meta',
  command: 'meta',
  meta: 'meta',
  win: 'meta',
  super: 'meta',
} satisfies Record<string, HotkeyModifier>));

const MODIFIER_ORDER: HotkeyModifier[] = ['ctrl', 'shift', 'alt', 'meta'];

// Values are key names as exposed by uiohook-napi's UiohookKey table.
const NAMED_KEYS = new Map(Object.entries({
  space: 'Space',
  enter: 'Enter',
  return: 'Enter',
  tab: 'Tab',
  esc: 'Escape',
  escape: 'Escape',
  backspace: 'Backspace',
  delete: 'Delete',
  del: 'Delete',
  insert: 'Insert',
  home: 'Home',
  end: 'End',
  pageup: 'PageUp',
  pagedown: 'PageDown',
  up: 'ArrowUp',
  down: 'ArrowDown',
  left: 'ArrowLeft',
  right: 'ArrowRight',
  arrowup: 'ArrowUp',
  arrowdown: 'ArrowDown',
  arrowleft: 'ArrowLeft',
  arrowright: 'ArrowRight',
}));

// X11 reports the side buttons as 8/9; the global hook numbers them 4/5.
const MOUSE_BUTTONS = new Map(Object.entries({
  button3: 3,
  button4: 4,
  button5: 5,
  button8: 4,
  button9: 5,
}));

const resolveMainKey = (token: string): string | null => {
  if (/^[a-z]$/.test(token)) return token.toUpperCase();
  if (/^[0-9]$/.test(token)) return token;
  const fnMatch = token.match(/^f([1-9]|1[0-9]|2[0-4])$/);
  if (fnMatch) return `F${fnMatch[1]}`;
  return NAMED_KEYS.get(token) ?? null;
};

export const parseHotkey = (input: string): ParsedHotkey => {
  const normalized = input.trim().toLowerCase();
  if (!normalized) {
    throw new ConfigError('invalid_hotkey', 'Hotkey cannot be empty');
  }
  const tokens = normalized.split('+').map((token) => token.trim());
  if (tokens.some((token) => !token)) {
    throw new ConfigError('invalid_hotkey', `Invalid hotkey format: ${input}`);
  }

  const modifiers = new Set<HotkeyModifier>();
  const mainKeys: Array<{ key: string; token: string }> = [];
  const buttons: number[] = [];

  tokens.forEach((token) => {
    const modifier = MODIFIER_ALIASES.get(token);
    if (modifier) {
      modifiers.add(modifier);
      return;
    }
    const button = MOUSE_BUTTONS.get(token);
    if (button !== undefined) {
      buttons.push(button);
      return;
    }
    const key = resolveMainKey(token);
    if (!key) {
      throw new ConfigError('invalid_hotkey', `Unknown key in hotkey: ${token}`);
    }
    mainKeys.push({ key, token });
  });

  if (buttons.length) {
    if (buttons.length > 1 || mainKeys.length || modifiers.size) {
      throw new ConfigError(
        'invalid_hotkey',
        `Mouse buttons cannot be combined with other keys: ${input}`
      );
    }
    return { kind: 'mouse', button: buttons[0], label: normalized };
  }
  if (mainKeys.length > 1) {
    throw new ConfigError('invalid_hotkey', `Hotkey can only have one non-modifier key: ${input}`);
  }
  if (!mainKeys.length) {
    throw new ConfigError('invalid_hotkey', `Hotkey needs a non-modifier key: ${input}`);
  }
  const ordered = MODIFIER_ORDER.filter((modifier) => modifiers.has(modifier));
  return {
    kind: 'keyboard',
    key: mainKeys[0].key,
    modifiers: ordered,
    label: [...ordered, mainKeys[0].token].join('+'),
  };
};

export const isValidHotkey = (input: string) => {
  try {
    parseHotkey(input);
    return true;
  } catch {
    return false;
  }
};
