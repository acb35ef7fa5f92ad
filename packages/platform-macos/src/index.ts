import { readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  createGlobalHotkeyAdapter,
  createMicrophoneCapture,
  runCommand,
  runText,
  type CommandRunner,
  type HotkeyAdapter,
  type PlatformAdapter,
} from '@voicebox/platform';

const OSASCRIPT = '/usr/bin/osascript';

// Scripts take user text through argv so it never has to be escaped into AppleScript.
const withArgv = (...lines: string[]) => ['-e', 'on run argv', ...lines.flatMap((line) => ['-e', line]), '-e', 'end run'];

export interface MacosAdapterOptions {
  run?: CommandRunner;
  hotkey?: HotkeyAdapter;
  tempDir?: string;
  now?: () => number;
}

export const createMacosAdapter = (options: MacosAdapterOptions = {}): PlatformAdapter => {
  const run = options.run ?? runCommand;
  const tempDir = options.tempDir ?? tmpdir();
  const now = options.now ?? Date.now;

  const osascript = (args: string[]) => runText(run, OSASCRIPT, args);

  return {
    name: 'macos',
    hotkey: options.hotkey ?? createGlobalHotkeyAdapter(),
    audioCapture: createMicrophoneCapture({ recorder: 'sox' }),
    clipboard: {
      async readText() {
        return runText(run, 'pbpaste', []);
      },
      async writeText(text) {
        await run('pbcopy', [], { input: text });
      },
      async readImage() {
        const info = await osascript(['-e', 'clipboard info']);
        if (!info.includes('PNGf')) return null;
        const target = join(tempDir, `voicebox-clipboard-${now()}.png`);
        try {
          await osascript(
            withArgv(
              'set png to (the clipboard as «class PNGf»)',
              'set target to open for access POSIX file (item 1 of argv) with write permission',
              'write png to target',
              'close access target'
            ).concat(target)
          );
          const data = await readFile(target);
          return { data: new Uint8Array(data), format: 'png' };
        } finally {
          await rm(target, { force: true });
        }
      },
    },
    keystrokes: {
      async paste() {
        await osascript(['-e', 'tell application "System Events" to keystroke "v" using {command down}']);
      },
      async type(text) {
        await osascript(
          withArgv('tell application "System Events" to keystroke (item 1 of argv)').concat(text)
        );
      },
    },
    notifier: {
      async notify(title, message) {
        await osascript(
          withArgv('display notification (item 2 of argv) with title (item 1 of argv)').concat(
            title,
            message
          )
        );
      },
    },
  };
};
