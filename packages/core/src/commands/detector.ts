import { DEFAULT_TRIGGERS } from '../domain/schemas';
import { matchBuiltin } from './builtins';
import type { CommandClassification } from './types';

export interface ExtractedCommand {
  trigger: string;
  body: string;
}

export interface ExtractedClipboardCommand extends ExtractedCommand {
  useClipboard: boolean;
}

export interface CommandDetector {
  isCommand(text: string): boolean;
  extract(text: string): ExtractedCommand | null;
  extractWithClipboardFlag(text: string): ExtractedClipboardCommand | null;
  classify(text: string): CommandClassification;
  addTrigger(trigger: string): void;
  removeTrigger(trigger: string): void;
  setTriggers(triggers: string[]): void;
  getTriggers(): string[];
}

const escapeRegExp = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

// Applied in order; the later, broader patterns mop up what the earlier ones leave.
const CLIPBOARD_PATTERNS = [
  /\bthe\s+clipboard(\s+here)?\b/gi,
  /\bthis\s+clipboard\b/gi,
  /\bclipboard\s+here\b/gi,
  /\bin\s+the\s+clipboard\b/gi,
  /\bfrom\s+clipboard\b/gi,
  /\bclipboard\b/gi,
];

export const stripClipboardPhrases = (body: string) => {
  const stripped = CLIPBOARD_PATTERNS.reduce((acc, pattern) => acc.replace(pattern, ''), body);
  return stripped
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/^(that's|that\s+is)\s+/i, '')
    .trim();
};

const compileTriggers = (triggers: string[]) => {
  if (!triggers.length) return null;
  const alternatives = triggers.map(escapeRegExp).join('|');
  return new RegExp(`^(${alternatives})\\s*[,:]?\\s*(.+)`, 'i');
};

export const createCommandDetector = (initial: string[] = DEFAULT_TRIGGERS): CommandDetector => {
  let triggers: string[] = [];
  let pattern: RegExp | null = null;

  const recompile = () => {
    pattern = compileTriggers(triggers);
  };

  const extract = (text: string): ExtractedCommand | null => {
    if (!text || !pattern) return null;
    const match = pattern.exec(text.trim());
    if (!match) return null;
    return { trigger: match[1].toLowerCase(), body: match[2].trim() };
  };

  const extractWithClipboardFlag = (text: string): ExtractedClipboardCommand | null => {
    const extracted = extract(text);
    if (!extracted || !extracted.body) return null;
    if (!extracted.body.toLowerCase().includes('clipboard')) {
      return { ...extracted, useClipboard: false };
    }
    return { trigger: extracted.trigger, body: stripClipboardPhrases(extracted.body), useClipboard: true };
  };

  const classify = (text: string): CommandClassification => {
    const extracted = extractWithClipboardFlag(text);
    if (!extracted) return { kind: 'notACommand', text };
    const builtin = extracted.useClipboard ? null : matchBuiltin(extracted.body);
    if (builtin) {
      return { kind: 'builtin', name: builtin, request: extracted };
    }
    return { kind: 'routed', request: extracted };
  };

  const addTrigger = (trigger: string) => {
    const normalized = trigger.trim().toLowerCase();
    if (!normalized || triggers.some((entry) => entry.toLowerCase() === normalized)) return;
    triggers.push(normalized);
    recompile();
  };

  const removeTrigger = (trigger: string) => {
    const normalized = trigger.trim().toLowerCase();
    triggers = triggers.filter((entry) => entry.toLowerCase() !== normalized);
    recompile();
  };

  const setTriggers = (next: string[]) => {
    triggers = [];
    next.forEach(addTrigger);
    recompile();
  };

  setTriggers(initial);

  return {
    isCommand: (text) => extract(text) !== null,
    extract,
    extractWithClipboardFlag,
    classify,
    addTrigger,
    removeTrigger,
    setTriggers,
    getTriggers: () => [...triggers],
  };
};
