import {
  createGlobalHotkeyAdapter,
  createMicrophoneCapture,
  runCommand,
  runText,
  type CommandRunner,
  type HotkeyAdapter,
  type PlatformAdapter,
} from '@voicebox/platform';

const CLIPBOARD = ['-selection', 'clipboard'];

export interface LinuxAdapterOptions {
  run?: CommandRunner;
  hotkey?: HotkeyAdapter;
}

export const createLinuxAdapter = (options: LinuxAdapterOptions = {}): PlatformAdapter => {
  const run = options.run ?? runCommand;

  return {
    name: 'linux',
    hotkey: options.hotkey ?? createGlobalHotkeyAdapter(),
    audioCapture: createMicrophoneCapture({ recorder: 'arecord' }),
    clipboard: {
      async readText() {
        return runText(run, 'xclip', [...CLIPBOARD, '-o']);
      },
      async writeText(text) {
        await run('xclip', [...CLIPBOARD], { input: text, output: 'ignore' });
      },
      async readImage() {
        const targets = await runText(run, 'xclip', [...CLIPBOARD, '-t', 'TARGETS', '-o']);
        if (!targets.split('\n').some((target) => target.trim() === 'image/png')) return null;
        const data = await run('xclip', [...CLIPBOARD, '-t', 'image/png', '-o']);
        return { data: new Uint8Array(data), format: 'png' };
      },
    },
    keystrokes: {
      // ctrl+shift+v pastes in terminals as well as most GUI apps.
      async paste() {
        await run('xdotool', ['key', '--clearmodifiers', 'ctrl+shift+v']);
      },
      async type(text) {
        await run('xdotool', ['type', '--clearmodifiers', '--', text]);
      },
    },
    notifier: {
      async notify(title, message) {
        await run('notify-send', [title, message]);
      },
    },
  };
};
