import { createWriteStream, existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import archiver from 'archiver';
import { z } from 'zod';
import { noopLogger, redactConfig, redactSecrets, type Logger } from '@voicebox/core';
import type { AppStore } from './store';

export const MAX_RECENT_ERRORS = 50;

const RecentErrorSchema = z.object({
  timestamp: z.number(),
  message: z.string(),
});
export type RecentError = z.infer<typeof RecentErrorSchema>;

export interface DiagnosticsOptions {
  store: AppStore;
  logFile?: string;
  now?: () => number;
  logger?: Logger;
}

export const createDiagnostics = (options: DiagnosticsOptions) => {
  const { store } = options;
  const now = options.now ?? Date.now;
  const logger = options.logger ?? noopLogger;
  const errorsFile = join(store.paths.configDir, 'recent-errors.json');
  const diagnosticsDir = join(store.paths.configDir, 'diagnostics');

  const loadRecentErrors = (): RecentError[] => {
    try {
      if (!existsSync(errorsFile)) return [];
      const parsed = z.array(RecentErrorSchema).safeParse(JSON.parse(readFileSync(errorsFile, 'utf-8')));
      return parsed.success ? parsed.data : [];
    } catch (error) {
      logger.error('Failed to read recent errors', error);
      return [];
    }
  };

  const recordError = (error: unknown) => {
    const entry = {
      timestamp: now(),
      message: redactSecrets(error instanceof Error ? error.message : String(error)),
    };
    try {
      const existing = loadRecentErrors();
      existing.unshift(entry);
      if (!existsSync(store.paths.configDir)) mkdirSync(store.paths.configDir, { recursive: true });
      writeFileSync(errorsFile, JSON.stringify(existing.slice(0, MAX_RECENT_ERRORS), null, 2), 'utf-8');
    } catch (writeError) {
      logger.error('Failed to write recent errors', writeError);
    }
  };

  const exportDiagnostics = async () => {
    if (!existsSync(diagnosticsDir)) {
      mkdirSync(diagnosticsDir, { recursive: true });
    }
    const filePath = join(diagnosticsDir, `voicebox-diagnostics-${now()}.zip`);
    const archive = archiver('zip', { zlib: { level: 9 } });
    const stream = createWriteStream(filePath);

    const config = (() => {
      try {
        return JSON.stringify(redactConfig(store.loadConfig()), null, 2);
      } catch (error) {
        return redactSecrets(`Configuration unavailable: ${error instanceof Error ? error.message : String(error)}`);
      }
    })();

    return new Promise<{ filePath: string }>((resolve, reject) => {
      stream.on('close', () => resolve({ filePath }));
      archive.on('error', (err: Error) => reject(err));

      archive.pipe(stream);

      archive.append(config, { name: 'config.json' });
      archive.append(JSON.stringify(store.loadSubstitutions() ?? {}, null, 2), { name: 'substitutions.json' });
      archive.append(JSON.stringify(loadRecentErrors(), null, 2), { name: 'recent-errors.json' });

      if (options.logFile && existsSync(options.logFile)) {
        archive.append(redactSecrets(readFileSync(options.logFile, 'utf-8')), { name: 'logs/voicebox.log' });
      }

      archive.finalize().catch(reject);
    });
  };

  return { recordError, loadRecentErrors, exportDiagnostics };
};

export type Diagnostics = ReturnType<typeof createDiagnostics>;
