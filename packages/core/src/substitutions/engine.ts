import { z } from 'zod';
import { PersistedSubstitutionsSchema, type PersistedSubstitutions } from '../domain/schemas';
import defaultTable from './defaults.json';

export const DELETED_KEY = '_deleted';

export const DEFAULT_SUBSTITUTIONS: ReadonlyMap<string, string> = new Map(
  Object.entries(z.record(z.string(), z.string()).parse(defaultTable))
);

export interface SubstitutionEngine {
  apply(text: string): string;
  add(phrase: string, replacement: string): void;
  remove(phrase: string): boolean;
  reset(): void;
  entries(): Array<[string, string]>;
  deletedDefaults(): string[];
  toPersisted(): PersistedSubstitutions;
  loadPersisted(data: unknown): void;
  importTable(data: unknown): void;
}

export interface SubstitutionEngineOptions {
  defaults?: ReadonlyMap<string, string>;
  persisted?: unknown;
}

type Span = { start: number; end: number };

const escapeRegExp = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

const overlaps = (start: number, end: number, spans: Span[]) =>
  spans.some((span) => start < span.end && span.start < end);

/**
 * Replaces whole-word matches of one phrase, skipping any match that touches a
 * span produced by an earlier replacement. Returns the new text and the
 * remapped protected spans.
 */
const replaceUnlocked = (text: string, locked: Span[], phrase: string, replacement: string) => {
  const regex = new RegExp(`\\b${escapeRegExp(phrase)}\\b`, 'gi');
  let output = '';
  let cursor = 0;
  const copies: Array<{ from: number; to: number; offset: number }> = [];
  const produced: Span[] = [];

  for (const match of text.matchAll(regex)) {
    const start = match.index ?? 0;
    const end = start + match[0].length;
    if (!match[0].length || overlaps(start, end, locked)) continue;
    copies.push({ from: cursor, to: start, offset: output.length - cursor });
    output += text.slice(cursor, start);
    produced.push({ start: output.length, end: output.length + replacement.length });
    output += replacement;
    cursor = end;
  }
  if (!produced.length) return { text, locked };

  copies.push({ from: cursor, to: text.length, offset: output.length - cursor });
  output += text.slice(cursor);

  const remapped = locked.map((span) => {
    const copy = copies.find((candidate) => span.start >= candidate.from && span.end <= candidate.to);
    const offset = copy?.offset ?? 0;
    return { start: span.start + offset, end: span.end + offset };
  });
  return {
    text: output,
    locked: [...remapped, ...produced].sort((left, right) => left.start - right.start),
  };
};

const parsePersisted = (data: unknown) => {
  const parsed = PersistedSubstitutionsSchema.parse(data);
  const table = new Map<string, string>();
  let deleted: string[] = [];
  Object.entries(parsed).forEach(([key, value]) => {
    if (key === DELETED_KEY) {
      deleted = Array.isArray(value) ? value.map((phrase) => phrase.toLowerCase()) : [];
      return;
    }
    if (typeof value === 'string') {
      table.set(key.toLowerCase(), value);
    }
  });
  return { table, deleted };
};

export const createSubstitutionEngine = (
  options: SubstitutionEngineOptions = {}
): SubstitutionEngine => {
  const defaults = options.defaults ?? DEFAULT_SUBSTITUTIONS;
  let table = new Map(defaults);
  let deleted: string[] = [];

  const sortedEntries = () =>
    // Array.prototype.sort is stable, so equal lengths keep insertion order.
    [...table.entries()].sort((left, right) => right[0].length - left[0].length);

  const apply = (text: string) => {
    if (!text) return text;
    let state: { text: string; locked: Span[] } = { text, locked: [] };
    sortedEntries().forEach(([phrase, replacement]) => {
      if (!phrase) return;
      state = replaceUnlocked(state.text, state.locked, phrase, replacement);
    });
    return state.text;
  };

  const add = (phrase: string, replacement: string) => {
    const key = phrase.trim().toLowerCase();
    if (!key) return;
    table.set(key, replacement);
    deleted = deleted.filter((entry) => entry !== key);
  };

  const remove = (phrase: string) => {
    const key = phrase.trim().toLowerCase();
    if (!table.has(key)) return false;
    table.delete(key);
    if (defaults.has(key)) {
      if (!deleted.includes(key)) deleted.push(key);
    } else {
      deleted = deleted.filter((entry) => entry !== key);
    }
    return true;
  };

  const reset = () => {
    table = new Map(defaults);
    deleted = [];
  };

  const toPersisted = (): PersistedSubstitutions => {
    const data: PersistedSubstitutions = {};
    table.forEach((replacement, phrase) => {
      if (defaults.get(phrase) !== replacement) data[phrase] = replacement;
    });
    if (deleted.length) data[DELETED_KEY] = [...deleted];
    return data;
  };

  const loadPersisted = (data: unknown) => {
    const parsed = parsePersisted(data);
    table = new Map(defaults);
    deleted = parsed.deleted;
    deleted.forEach((phrase) => table.delete(phrase));
    parsed.table.forEach((replacement, phrase) => table.set(phrase, replacement));
  };

  const importTable = (data: unknown) => {
    const parsed = parsePersisted(data);
    parsed.deleted.forEach((phrase) => {
      if (!deleted.includes(phrase)) deleted.push(phrase);
    });
    parsed.table.forEach((replacement, phrase) => table.set(phrase, replacement));
    deleted.forEach((phrase) => table.delete(phrase));
  };

  if (options.persisted !== undefined) {
    loadPersisted(options.persisted);
  }

  return {
    apply,
    add,
    remove,
    reset,
    entries: () => [...table.entries()],
    deletedDefaults: () => [...deleted],
    toPersisted,
    loadPersisted,
    importTable,
  };
};
