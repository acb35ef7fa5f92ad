import type { ResponseMethod } from '../domain/schemas';
import { noopLogger, type Logger } from '../logging';
import type { CommandResult } from './types';

export const NOTIFICATION_TITLE = 'VoiceBox Command';
export const NOTIFICATION_LIMIT = 200;

export interface ResponderSinks {
  notify(title: string, message: string): Promise<void>;
  copy(text: string): Promise<void>;
  print(text: string): void;
}

export interface CommandResponder {
  display(result: CommandResult): Promise<void>;
  setMethod(method: ResponseMethod): void;
  getMethod(): ResponseMethod;
}

export const truncateForNotification = (message: string) =>
  message.length > NOTIFICATION_LIMIT ? `${message.slice(0, NOTIFICATION_LIMIT - 3)}...` : message;

export const formatConsoleBlock = (message: string) =>
  ['', '='.repeat(50), 'Command Response:', '-'.repeat(50), message, '='.repeat(50), ''].join('\n');

export const createCommandResponder = (
  sinks: ResponderSinks,
  initial: ResponseMethod = 'notification',
  logger: Logger = noopLogger
): CommandResponder => {
  let method = initial;

  const toConsole = (message: string) => sinks.print(formatConsoleBlock(message));

  const display = async (result: CommandResult) => {
    const message = result.success ? result.response : `Command failed: ${result.error.message}`;
    if (method === 'console') {
      toConsole(message);
      return;
    }
    if (method === 'clipboard') {
      try {
        await sinks.copy(message);
        sinks.print('Response copied to clipboard');
      } catch (error) {
        logger.error('Failed to copy response to clipboard', error);
        toConsole(message);
      }
      return;
    }
    try {
      await sinks.notify(NOTIFICATION_TITLE, truncateForNotification(message));
    } catch (error) {
      logger.error('Notification failed', error);
      toConsole(message);
    }
  };

  return {
    display,
    setMethod: (next) => {
      method = next;
    },
    getMethod: () => method,
  };
};
