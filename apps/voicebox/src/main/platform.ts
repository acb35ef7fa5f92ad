import { ConfigError, type Logger } from '@voicebox/core';
import { createGlobalHotkeyAdapter, type PlatformAdapter } from '@voicebox/platform';
import { createLinuxAdapter } from '@voicebox/platform-linux';
import { createMacosAdapter } from '@voicebox/platform-macos';

export const resolvePlatformAdapter = (
  platform: NodeJS.Platform = process.platform,
  logger?: Logger
): PlatformAdapter => {
  const hotkey = createGlobalHotkeyAdapter({ logger });
  if (platform === 'darwin') return createMacosAdapter({ hotkey });
  if (platform === 'linux') return createLinuxAdapter({ hotkey });
  throw new ConfigError('unsupported_platform', `Unsupported platform: ${platform}`);
};
