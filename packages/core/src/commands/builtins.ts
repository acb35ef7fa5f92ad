import { format } from 'date-fns';
import { HELP_TEXT } from './prompts';
import type { BuiltinName } from './types';

const PHRASES: Array<{ name: BuiltinName; pattern: RegExp }> = [
  { name: 'time', pattern: /^what time is it\b/ },
  { name: 'time', pattern: /^what(?:['’]s| is) the (?:current )?time\b/ },
  { name: 'date', pattern: /^what(?:['’]s| is) (?:the |today['’]s )?(?:current )?date\b/ },
  { name: 'date', pattern: /^what day is (?:it|today)\b/ },
];

const PREFIXES: BuiltinName[] = ['time', 'date', 'help'];

export const matchBuiltin = (command: string): BuiltinName | null => {
  const lowered = command.trim().toLowerCase();
  if (!lowered) return null;
  const prefix = PREFIXES.find((name) => lowered.startsWith(name));
  if (prefix) return prefix;
  return PHRASES.find((phrase) => phrase.pattern.test(lowered))?.name ?? null;
};

export const runBuiltin = (name: BuiltinName, now: Date) => {
  switch (name) {
    case 'time':
      return `The current time is ${format(now, 'hh:mm a')}`;
    case 'date':
      return `Today is ${format(now, 'MMMM dd, yyyy')}`;
    case 'help':
      return HELP_TEXT;
  }
};
