import { join } from 'path';
import log from 'electron-log/node';
import type { Logger } from '@voicebox/core';

const LOG_MAX_BYTES = 5 * 1024 * 1024;

export const logFilePath = (configDir: string) => join(configDir, 'logs', 'voicebox.log');

export const configureLogging = (configDir: string, debug = false) => {
  log.transports.file.resolvePathFn = () => logFilePath(configDir);
  log.transports.file.maxSize = LOG_MAX_BYTES;
  log.transports.file.level = debug ? 'debug' : 'info';
  log.transports.console.level = debug ? 'debug' : 'error';
  return log;
};

export const scopedLogger = (name: string): Logger => log.scope(name);
