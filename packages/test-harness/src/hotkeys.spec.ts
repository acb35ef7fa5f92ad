import { describe, expect, it } from 'vitest';
import { isValidHotkey, parseHotkey } from '@voicebox/core';

describe('hotkey parsing', () => {
  it('normalizes keyboard combinations', () => {
    expect(parseHotkey('Ctrl+Shift+V')).toEqual({
      kind: 'keyboard',
      key: 'V',
      modifiers: ['ctrl', 'shift'],
      label: 'ctrl+shift+v',
    });
  });

  it('maps modifier aliases and orders them', () => {
    expect(parseHotkey('cmd+option+space')).toEqual({
      kind: 'keyboard',
      key: 'Space',
      modifiers: ['alt', 'meta'],
      label: 'alt+meta+space',
    });
  });

  it('accepts function keys on their own', () => {
    expect(parseHotkey(' F12 ')).toEqual({ kind: 'keyboard', key: 'F12', modifiers: [], label: 'f12' });
  });

  it('keeps the typed key name in the label', () => {
    expect(parseHotkey('Ctrl+Up')).toEqual({
      kind: 'keyboard',
      key: 'ArrowUp',
      modifiers: ['ctrl'],
      label: 'ctrl+up',
    });
    expect(parseHotkey('alt+ArrowLeft').key).toBe('ArrowLeft');
  });

  it.each([
    'space', 'enter', 'return', 'tab', 'esc', 'escape', 'backspace', 'delete', 'del', 'insert',
    'home', 'end', 'pageup', 'pagedown', 'up', 'down', 'left', 'right',
    'arrowup', 'arrowdown', 'arrowleft', 'arrowright', 'q', '7', 'f1', 'f24',
  ])('parses the label of ctrl+shift+%s back to the same hotkey', (key) => {
    const parsed = parseHotkey(`ctrl+shift+${key}`);
    expect(parseHotkey(parsed.label)).toEqual(parsed);
  });

  it('maps X11 side buttons to hook buttons', () => {
    expect(parseHotkey('button9')).toEqual({ kind: 'mouse', button: 5, label: 'button9' });
    expect(parseHotkey('button4')).toEqual({ kind: 'mouse', button: 4, label: 'button4' });
  });

  it.each([
    ['', 'Hotkey cannot be empty'],
    ['ctrl+shift', 'Hotkey needs a non-modifier key: ctrl+shift'],
    ['a+b', 'Hotkey can only have one non-modifier key: a+b'],
    ['ctrl+button4', 'Mouse buttons cannot be combined with other keys: ctrl+button4'],
    ['ctrl+banana', 'Unknown key in hotkey: banana'],
    ['ctrl++a', 'Invalid hotkey format: ctrl++a'],
  ])('rejects %j', (input, message) => {
    expect(() => parseHotkey(input)).toThrow(message);
  });

  it('reports validity without throwing', () => {
    expect(isValidHotkey('alt+f9')).toBe(true);
    expect(isValidHotkey('hyper+x')).toBe(false);
  });
});
