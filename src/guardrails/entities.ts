import { isPlainObject } from '../shared/json.js';
import { outputRecord, outputText } from './types.js';
import type { TaskOutput } from './types.js';

const COLLECTION_KEYS = ['companies', 'results', 'items', 'entities', 'data'];
const NAME_KEYS = ['name', 'company_name', 'legal_name', 'title'];

const LIST_ITEM = /^\s*(?:\d+[.)]|[-*•])\s+(.+?)\s*$/;
const NAME_END = /\s[-–]\s|:|\s\(|,/;
const QUOTES = /^["'“”]+|["'“”]+$/g;
const COMPANY_SUFFIX =
  /\b([A-Z][\w&'.-]*(?:\s+[A-Z0-9][\w&'.-]*){0,5}\s+(?:AG|GmbH|SA|Sàrl|SARL|Inc|Corp|Ltd|LLC|PLC|Group|Holding|Holdings))\b/g;

function normalize(name: string): string {
  return name.replace(/\s+/g, ' ').trim().toLowerCase();
}

function listItemName(item: string): string {
  let name = item.replace(/\*\*/g, '').trim();
  const end = name.search(NAME_END);
  if (end >= 0) name = name.slice(0, end);
  return name.trim().replace(QUOTES, '').trim();
}

function entryName(entry: unknown): string | undefined {
  if (typeof entry === 'string') return entry.trim();
  if (isPlainObject(entry)) {
    for (const key of NAME_KEYS) {
      const v = entry[key];
      if (typeof v === 'string' && v.trim().length > 0) return v.trim();
    }
  }
  return undefined;
}

function collection(output: TaskOutput): unknown[] | undefined {
  if (output.kind === 'structured' && Array.isArray(output.data)) return output.data;
  const record = outputRecord(output);
  if (!record) return undefined;
  for (const key of COLLECTION_KEYS) {
    const v = record[key];
    if (Array.isArray(v)) return v;
  }
  return undefined;
}

/** Distinct entity names in free text: list-item heads plus names ending in a company suffix. */
export function extractNamesFromText(text: string): string[] {
  const found = new Map<string, string>();
  const add = (name: string): void => {
    if (name.length < 2 || !/[A-Za-z0-9]/.test(name)) return;
    const key = normalize(name);
    if (!found.has(key)) found.set(key, name);
  };

  for (const line of text.split(/\r?\n/)) {
    const item = LIST_ITEM.exec(line);
    if (item?.[1]) {
      add(listItemName(item[1]));
      continue;
    }
    for (const match of line.matchAll(COMPANY_SUFFIX)) {
      if (match[1]) add(match[1].trim());
    }
  }
  return [...found.values()];
}

/**
 * Distinct entity names in an output. Structured outputs are read from their
 * entity collection; anything else goes through the text view.
 */
export function extractEntityNames(output: TaskOutput): string[] {
  const entries = collection(output);
  if (entries) {
    const found = new Map<string, string>();
    for (const entry of entries) {
      const name = entryName(entry);
      if (name && !found.has(normalize(name))) found.set(normalize(name), name);
    }
    return [...found.values()];
  }
  return extractNamesFromText(outputText(output));
}
