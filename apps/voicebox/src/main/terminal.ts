import { errorMessage, getSuggestion } from '@voicebox/core';
import type { VoiceBoxApp } from './app';

export const USAGE = [
  'Usage: voicebox [--test|--config|--export-diagnostics|--help]',
  '  --test               : Test initialization and exit',
  '  --config             : Show configuration file path',
  '  --export-diagnostics : Write a redacted diagnostics archive',
  '  --help               : Show this help',
].join('\n');

export const TERMINAL_HELP = [
  'Commands:',
  '  status                       Show application status',
  '  hotkey <combination>         Change the recording hotkey (e.g. ctrl+alt+v, f12)',
  '  reload                       Reload configuration and substitutions',
  '  models [query]               List or search OpenRouter models',
  '  subs                         List substitutions',
  '  sub <phrase> = <replacement> Add or change a substitution',
  '  unsub <phrase>               Remove a substitution',
  '  import <file>                Merge substitutions from a JSON file',
  '  export <file>                Write changed substitutions to a JSON file',
  '  help                         Show this help',
  '  quit | exit                  Exit VoiceBox',
].join('\n');

export const printFailure = (print: (text: string) => void, prefix: string, error: unknown) => {
  print(`${prefix}: ${errorMessage(error)}`);
  print(`Suggestion: ${getSuggestion(error)}`);
};

export const formatStatus = (app: VoiceBoxApp) => {
  const status = app.status();
  return [
    `State: ${status.state}`,
    `Running: ${status.running ? 'yes' : 'no'}`,
    `Recording: ${status.recording ? 'yes' : 'no'}`,
    `Transcription: ${status.backend}`,
    `Hotkey: ${status.hotkey}`,
    `Commands: ${status.commandsEnabled ? 'enabled' : 'disabled'}`,
  ].join('\n');
};

/**
 * Runs one terminal command. Returns false when the session should end.
 */
export const handleTerminalCommand = async (
  app: VoiceBoxApp,
  line: string,
  print: (text: string) => void = (text) => console.log(text)
): Promise<boolean> => {
  const input = line.trim();
  if (!input) return true;
  const [head, ...rest] = input.split(' ');
  const command = head.toLowerCase();
  const argument = rest.join(' ').trim();

  switch (command) {
    case 'quit':
    case 'exit':
      print('Exiting VoiceBox...');
      return false;
    case 'status':
      print(formatStatus(app));
      return true;
    case 'hotkey': {
      if (!argument) {
        print('Usage: hotkey <combination>');
        print('Examples: hotkey ctrl+alt+v, hotkey f12');
        print(`Current: ${app.config().hotkey}`);
        return true;
      }
      try {
        const { previous, current } = await app.changeHotkey(argument);
        print(`Hotkey changed from '${previous}' to '${current}'`);
      } catch (error) {
        printFailure(print, 'Failed to change hotkey', error);
      }
      return true;
    }
    case 'reload':
      try {
        await app.reload();
        print('Configuration reloaded');
      } catch (error) {
        printFailure(print, 'Failed to reload configuration', error);
      }
      return true;
    case 'models': {
      const models = await app.models(argument || undefined);
      if (!models.length) {
        print('No models available');
        return true;
      }
      models.forEach((model) => print(`${model.id}  ${model.displayName}`));
      return true;
    }
    case 'subs':
      app.substitutions().forEach(([phrase, replacement]) => print(`${phrase} -> ${replacement}`));
      return true;
    case 'sub': {
      const separator = argument.indexOf('=');
      const phrase = separator > 0 ? argument.slice(0, separator).trim() : '';
      const replacement = separator > 0 ? argument.slice(separator + 1).trim() : '';
      if (!phrase || !replacement) {
        print('Usage: sub <phrase> = <replacement>');
        return true;
      }
      app.addSubstitution(phrase, replacement);
      print(`Added substitution: ${phrase.toLowerCase()} -> ${replacement}`);
      return true;
    }
    case 'unsub':
      print(app.removeSubstitution(argument) ? `Removed substitution: ${argument}` : `No substitution for: ${argument}`);
      return true;
    case 'import':
    case 'export': {
      if (!argument) {
        print(`Usage: ${command} <file>`);
        return true;
      }
      try {
        if (command === 'import') {
          const count = app.importSubstitutions(argument);
          print(`Imported ${count} substitution(s) from ${argument}`);
        } else {
          app.exportSubstitutions(argument);
          print(`Exported substitutions to ${argument}`);
        }
      } catch (error) {
        printFailure(print, `Failed to ${command} substitutions`, error);
      }
      return true;
    }
    case 'help':
      print(TERMINAL_HELP);
      return true;
    default:
      print(`Unknown command: ${command}. Type 'help' for available commands.`);
      return true;
  }
};

