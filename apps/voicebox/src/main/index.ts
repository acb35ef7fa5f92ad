import { createInterface } from 'readline';
import { createVoiceBoxApp, type VoiceBoxApp } from './app';
import { createDiagnostics } from './diagnostics';
import { configureLogging, logFilePath, scopedLogger } from './logger';
import { resolvePlatformAdapter } from './platform';
import { createAppStore, resolveConfigDir } from './store';
import { USAGE, formatStatus, handleTerminalCommand, printFailure } from './terminal';

const BANNER = ['VoiceBox - Voice-to-Text Transcription Tool', '-'.repeat(40)].join('\n');

const print = (text: string) => console.log(text);

const bootstrap = () => {
  const configDir = resolveConfigDir();
  const log = configureLogging(configDir);
  const store = createAppStore({ configDir, logger: scopedLogger('store') });
  const diagnostics = createDiagnostics({
    store,
    logFile: logFilePath(configDir),
    logger: scopedLogger('diagnostics'),
  });
  return { configDir, log, store, diagnostics };
};

const runInteractive = async (app: VoiceBoxApp) => {
  await app.start();
  print(`Hotkey: ${app.config().hotkey} (press to start and stop recording)`);
  print("Type 'help' for commands. Press Ctrl+C to exit\n");

  const terminal = createInterface({ input: process.stdin, terminal: false });
  let closing: Promise<void> | null = null;

  const shutdown = () => {
    if (!closing) {
      closing = app.stop().finally(() => terminal.close());
    }
    return closing;
  };

  process.on('SIGINT', () => {
    print('\nExiting...');
    shutdown().catch((error: unknown) => printFailure(print, 'Shutdown failed', error));
  });

  for await (const line of terminal) {
    const keepRunning = await handleTerminalCommand(app, line, print);
    if (!keepRunning) break;
  }
  await shutdown();
};

export const main = async (argv: string[]) => {
  const [flag] = argv;
  if (flag === '--help') {
    print(USAGE);
    return 0;
  }
  if (flag !== undefined && !['--test', '--config', '--export-diagnostics'].includes(flag)) {
    print(`Unknown option: ${flag}`);
    print(USAGE);
    return 1;
  }

  const { store, diagnostics, log, configDir } = bootstrap();
  if (flag === '--config') {
    print(`Configuration file: ${store.paths.config}`);
    return 0;
  }
  if (flag === '--export-diagnostics') {
    const { filePath } = await diagnostics.exportDiagnostics();
    print(`Diagnostics written to ${filePath}`);
    return 0;
  }

  print(BANNER);
  try {
    const app = createVoiceBoxApp({
      store,
      platform: resolvePlatformAdapter(process.platform, scopedLogger('hotkeys')),
      diagnostics,
      print,
      logger: scopedLogger,
    });
    configureLogging(configDir, app.config().debug);
    if (flag === '--test') {
      print('Running in test mode...');
      await app.start();
      print(formatStatus(app));
      await app.stop();
      print('Test completed, exiting...');
      return 0;
    }
    await runInteractive(app);
    return 0;
  } catch (error) {
    diagnostics.recordError(error);
    log.error('Startup failed', error);
    printFailure(print, 'Failed to start VoiceBox', error);
    return 1;
  }
};

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
