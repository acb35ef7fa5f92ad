import type { AudioCapture, ClipboardAccess, KeystrokeAccess } from '@voicebox/core';

export interface HotkeyHandle {
  unregister(): Promise<void>;
}

export type HotkeyListener = () => void;

export interface HotkeyAdapter {
  registerHotkey(hotkey: string, listener: HotkeyListener): Promise<HotkeyHandle>;
}

export type AudioCaptureAdapter = AudioCapture;

export type ClipboardAdapter = ClipboardAccess;

export type KeystrokeAdapter = KeystrokeAccess;

export interface NotificationAdapter {
  notify(title: string, message: string): Promise<void>;
}

export interface PlatformAdapter {
  name: 'macos' | 'linux';
  hotkey: HotkeyAdapter;
  audioCapture: AudioCaptureAdapter;
  clipboard: ClipboardAdapter;
  keystrokes: KeystrokeAdapter;
  notifier: NotificationAdapter;
}

export * from './capture';
export * from './exec';
export * from './hotkeys';
