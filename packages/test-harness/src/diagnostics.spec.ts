import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { MAX_RECENT_ERRORS, createDiagnostics } from '../../../apps/voicebox/src/main/diagnostics';
import { logFilePath } from '../../../apps/voicebox/src/main/logger';
import { createAppStore } from '../../../apps/voicebox/src/main/store';

describe('diagnostics', () => {
  let configDir = '';

  beforeEach(() => {
    configDir = mkdtempSync(join(tmpdir(), 'voicebox-diagnostics-'));
  });

  afterEach(() => {
    rmSync(configDir, { recursive: true, force: true });
  });

  it('keeps the newest errors first with secrets removed', () => {
    let clock = 0;
    const store = createAppStore({ configDir, env: {} });
    const diagnostics = createDiagnostics({ store, now: () => ++clock });

    for (let index = 0; index < MAX_RECENT_ERRORS + 2; index += 1) {
      diagnostics.recordError(new Error(`failure ${index}`));
    }
    diagnostics.recordError('Request sent with Bearer test-secret');

    const recent = diagnostics.loadRecentErrors();
    expect(recent).toHaveLength(MAX_RECENT_ERRORS);
    expect(recent[0]).toEqual({ timestamp: 53, message: 'Request sent with Bearer REDACTED' });
    expect(recent[1]).toEqual({ timestamp: 52, message: 'failure 51' });
    expect(recent[MAX_RECENT_ERRORS - 1].message).toBe('failure 3');
  });

  it('ignores an unreadable error log', () => {
    const store = createAppStore({ configDir, env: {} });
    writeFileSync(join(configDir, 'recent-errors.json'), '{"not": "a list"}');
    expect(createDiagnostics({ store }).loadRecentErrors()).toEqual([]);
  });

  it('exports an archive with config, substitutions, errors and logs', async () => {
    const store = createAppStore({ configDir, env: {} });
    store.loadConfig();
    const logFile = logFilePath(configDir);
    mkdirSync(join(configDir, 'logs'), { recursive: true });
    writeFileSync(logFile, 'started\n');
    const diagnostics = createDiagnostics({ store, logFile, now: () => 1234 });
    diagnostics.recordError(new Error('boom'));

    const { filePath } = await diagnostics.exportDiagnostics();
    expect(filePath).toBe(join(configDir, 'diagnostics', 'voicebox-diagnostics-1234.zip'));
    expect(existsSync(filePath)).toBe(true);

    const archive = readFileSync(filePath);
    expect(archive.subarray(0, 2).toString('latin1')).toBe('PK');
    const text = archive.toString('latin1');
    ['config.json', 'substitutions.json', 'recent-errors.json', 'logs/voicebox.log'].forEach((name) => {
      expect(text).toContain(name);
    });
  });
});
