import { join } from 'path';
import { describe, expect, it } from 'vitest';
import { configureLogging, logFilePath, scopedLogger } from '../../../apps/voicebox/src/main/logger';

describe('logging setup', () => {
  it('keeps the log file beside the configuration', () => {
    expect(logFilePath('/cfg')).toBe(join('/cfg', 'logs', 'voicebox.log'));
  });

  it('raises verbosity in debug mode', () => {
    const log = configureLogging('/cfg', true);
    expect(log.transports.file.level).toBe('debug');
    expect(log.transports.console.level).toBe('debug');
    expect(log.transports.file.maxSize).toBe(5 * 1024 * 1024);

    configureLogging('/cfg');
    expect(log.transports.file.level).toBe('info');
    expect(log.transports.console.level).toBe('error');
  });

  it('hands out scoped loggers', () => {
    const logger = scopedLogger('coordinator');
    expect(typeof logger.info).toBe('function');
    expect(typeof logger.debug).toBe('function');
  });
});
