import { readFile } from 'node:fs/promises';
import { promisify } from 'node:util';
import { gunzip } from 'node:zlib';
import { z } from 'zod';
import { createLogger, type Logger } from '../logger';

const gunzipAsync = promisify(gunzip);

export const DEFAULT_MIN_LENGTH = 2;

export const dictionaryEntrySchema = z.object({
  word: z.string(),
  pos: z.array(z.string()).optional(),
  plural: z.string().optional(),
  base: z.string().optional(),
  forms: z.array(z.string()).optional()
});
export type DictionaryEntry = z.infer<typeof dictionaryEntrySchema>;

export interface LexiconOptions {
  /** Shorter words are never valid (inclusive bound). */
  minLength?: number;
}

export function normalize(word: string): string {
  return word.trim().toUpperCase();
}

/**
 * Pulls the word out of a line. Frequency lists look like `word 12345`;
 * only Latin and Cyrillic letters are kept.
 */
export function extractWord(line: string): string | null {
  const raw = line.trim().split(/\s+/)[0];
  if (!raw) return null;
  const cleaned = raw.replace(/[^A-Za-zА-Яа-яЁё]/g, '');
  if (!cleaned) return null;
  return cleaned.toUpperCase();
}

/** Normalised, read-only word set. */
export class Lexicon {
  readonly minLength: number;
  private readonly words: Set<string>;

  private constructor(words: Set<string>, minLength: number) {
    this.words = words;
    this.minLength = Math.max(1, Math.floor(minLength));
  }

  static fromWords(words: Iterable<string>, options: LexiconOptions = {}): Lexicon {
    const set = new Set<string>();
    for (const word of words) {
      const norm = normalize(word);
      if (norm) set.add(norm);
    }
    return new Lexicon(set, options.minLength ?? DEFAULT_MIN_LENGTH);
  }

  /** One word per line. */
  static fromText(text: string, options: LexiconOptions = {}): Lexicon {
    const set = new Set<string>();
    text.split('\n').forEach((line) => {
      const word = extractWord(line);
      if (word) set.add(word);
    });
    return new Lexicon(set, options.minLength ?? DEFAULT_MIN_LENGTH);
  }

  /** Structured entries; plural, base and other forms are valid words too. */
  static fromEntries(entries: readonly DictionaryEntry[], options: LexiconOptions = {}): Lexicon {
    const forms: string[] = [];
    entries.forEach((entry) => {
      forms.push(entry.word);
      if (entry.plural) forms.push(entry.plural);
      if (entry.base) forms.push(entry.base);
      if (entry.forms) forms.push(...entry.forms);
    });
    return Lexicon.fromWords(forms, options);
  }

  get size(): number {
    return this.words.size;
  }

  has(word: string): boolean {
    const norm = normalize(word);
    if (norm.length < this.minLength) return false;
    return this.words.has(norm);
  }
}

/** JSON entry array when the text parses as one, a word list otherwise. */
export function parseLexicon(text: string, options: LexiconOptions = {}): Lexicon {
  const trimmed = text.trimStart();
  if (trimmed.startsWith('[')) {
    const entries = z.array(z.union([z.string(), dictionaryEntrySchema])).safeParse(JSON.parse(trimmed));
    if (entries.success) {
      const normalized = entries.data.map((entry) => (typeof entry === 'string' ? { word: entry } : entry));
      return Lexicon.fromEntries(normalized, options);
    }
  }
  return Lexicon.fromText(text, options);
}

/** Reads a word list, JSON entry array, or either gzipped (`.gz`). */
export async function loadLexiconFile(path: string, options: LexiconOptions = {}): Promise<Lexicon> {
  const raw = await readFile(path);
  const bytes = path.endsWith('.gz') ? await gunzipAsync(raw) : raw;
  return parseLexicon(bytes.toString('utf8'), options);
}

const memoryCache = new Map<string, Promise<Lexicon>>();

/** Loads each path once per process; a failed load is not cached. */
export function cachedLexicon(
  path: string,
  options: LexiconOptions = {},
  logger: Logger = createLogger('dictionary')
): Promise<Lexicon> {
  const key = `${path}#${options.minLength ?? DEFAULT_MIN_LENGTH}`;
  const cached = memoryCache.get(key);
  if (cached) return cached;

  const pending = loadLexiconFile(path, options).then(
    (lexicon) => {
      logger.info(`Loaded ${lexicon.size} words from ${path}`);
      return lexicon;
    },
    (error: unknown) => {
      memoryCache.delete(key);
      logger.warn(`Failed to load ${path}:`, error);
      throw error;
    }
  );
  memoryCache.set(key, pending);
  return pending;
}

export function clearMemoryCache(): void {
  memoryCache.clear();
}
