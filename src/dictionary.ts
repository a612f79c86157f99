import { readFile } from "node:fs/promises";
import type { DictionaryLookup, DigitString } from "./types.ts";
import { MAX_DICTIONARY_SIZE, MAX_DICTIONARY_WORD_LENGTH } from "./config.ts";
import { wordToDigits } from "./digit-mapping.ts";

/**
 * The characters a dictionary word may be made of.
 */
const VALID_WORD_PATTERN = /^[A-Za-z"-]+$/;

/**
 * A class representing a word in the dictionary.
 */
export class Word {
  /**
   * The word as it appears in the user's dictionary, with its original casing and punctuation.
   * This is what ends up in an encoding.
   */
  public canonicalString: string;

  /**
   * The digits the word's letters encode to.
   */
  public digits: DigitString;

  constructor(canonicalString: string, digits: DigitString) {
    this.canonicalString = canonicalString;
    this.digits = digits;
  }
}

/**
 * An error that occurs while loading a dictionary.
 */
export class DictionaryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DictionaryError";
  }
}

/**
 * Configuration for a dictionary source that is loaded from an in-memory array.
 */
export interface DictionarySourceConfigMemory {
  type: "memory";
  id: string;
  enabled: boolean;
  words: string[];
}

/**
 * Configuration for a dictionary source that is loaded from a file.
 */
export interface DictionarySourceConfigFile {
  type: "file";
  id: string;
  enabled: boolean;
  path: string;
}

/**
 * Configuration for a dictionary source that is loaded from a string.
 */
export interface DictionarySourceConfigFileContents {
  type: "fileContents";
  id: string;
  enabled: boolean;
  contents: string;
}

/**
 * Configuration describing a source of dictionary entries.
 */
export type DictionarySourceConfig =
  | DictionarySourceConfigMemory
  | DictionarySourceConfigFile
  | DictionarySourceConfigFileContents;

/**
 * A single dictionary entry, before it's been added to a `Dictionary`.
 */
export interface RawDictionaryEntry {
  canonical: string;
  digits: DigitString;
}

/**
 * The currently-loaded dictionary, indexed by the digits each word encodes to.
 */
export class Dictionary implements DictionaryLookup {
  /**
   * Every loaded word, in load order.
   */
  public words: Word[] = [];

  /**
   * Loaded words bucketed by the digit string they encode to.
   */
  public wordsByDigits: Map<DigitString, Word[]> = new Map();

  /**
   * The most recently-received dictionary sources, as an ordered list.
   */
  public sourceConfigs: DictionarySourceConfig[] = [];

  /**
   * The maximum number of words to load across all sources.
   */
  public maxSize: number;

  constructor(sourceConfigs: DictionarySourceConfig[], maxSize?: number) {
    this.sourceConfigs = sourceConfigs;
    this.maxSize = maxSize ?? MAX_DICTIONARY_SIZE;
  }

  /**
   * Drop everything currently loaded and load `sourceConfigs` in order. Problems with individual
   * sources or lines are returned rather than thrown.
   */
  public async replaceList(sourceConfigs: DictionarySourceConfig[]): Promise<DictionaryError[]> {
    this.sourceConfigs = sourceConfigs;
    this.words = [];
    this.wordsByDigits = new Map();

    const errors: DictionaryError[] = [];

    // A set to prevent loading duplicate words from different sources
    const seenWords = new Set<string>();

    for (const source of this.sourceConfigs) {
      if (!source.enabled) {
        continue;
      }

      const loaded = await this.loadWordsFromSource(source);
      errors.push(...loaded.errors);

      for (const rawEntry of loaded.entries) {
        if (seenWords.has(rawEntry.canonical)) {
          continue;
        }
        if (this.words.length >= this.maxSize) {
          errors.push(
            new DictionaryError(`Dictionary is full (${this.maxSize} words), skipping the rest`),
          );
          return errors;
        }
        seenWords.add(rawEntry.canonical);
        this.addWord(rawEntry);
      }
    }

    return errors;
  }

  public wordsFor(digits: DigitString): readonly string[] {
    return (this.wordsByDigits.get(digits) ?? []).map((word) => word.canonicalString);
  }

  private addWord(rawEntry: RawDictionaryEntry) {
    const word = new Word(rawEntry.canonical, rawEntry.digits);
    this.words.push(word);

    const bucket = this.wordsByDigits.get(word.digits);
    if (bucket) {
      bucket.push(word);
    } else {
      this.wordsByDigits.set(word.digits, [word]);
    }
  }

  private parseEntry(
    sourceId: string,
    line: string,
    errors: DictionaryError[],
  ): RawDictionaryEntry | undefined {
    const canonical = line.trim();
    if (canonical.length === 0) {
      return undefined;
    }

    if (!VALID_WORD_PATTERN.test(canonical)) {
      errors.push(new DictionaryError(`Invalid word in "${sourceId}": ${canonical}`));
      return undefined;
    }

    const digits = wordToDigits(canonical);
    if (digits.length === 0) {
      return undefined;
    }
    if (digits.length > MAX_DICTIONARY_WORD_LENGTH) {
      errors.push(new DictionaryError(`Word too long in "${sourceId}": ${canonical}`));
      return undefined;
    }

    return { canonical, digits };
  }

  private parseDictionaryFileContents(
    sourceId: string,
    fileContents: string,
    errors: DictionaryError[],
  ): RawDictionaryEntry[] {
    const entries: RawDictionaryEntry[] = [];

    for (const line of fileContents.split(/\r?\n/)) {
      if (errors.length > 100) {
        break;
      }

      const entry = this.parseEntry(sourceId, line, errors);
      if (entry) {
        entries.push(entry);
      }
    }

    return entries;
  }

  private async loadWordsFromSource(
    source: DictionarySourceConfig,
  ): Promise<{ entries: RawDictionaryEntry[]; errors: DictionaryError[] }> {
    const errors: DictionaryError[] = [];
    let entries: RawDictionaryEntry[] = [];

    switch (source.type) {
      case "memory": {
        for (const word of source.words) {
          const entry = this.parseEntry(source.id, word, errors);
          if (entry) {
            entries.push(entry);
          }
        }
        break;
      }
      case "file": {
        let contents: string;
        try {
          contents = await readFile(source.path, "utf8");
        } catch (e) {
          const reason = e instanceof Error ? e.message : String(e);
          errors.push(new DictionaryError(`Can't read file for "${source.id}": "${source.path}" (${reason})`));
          break;
        }
        entries = this.parseDictionaryFileContents(source.id, contents, errors);
        break;
      }
      case "fileContents": {
        entries = this.parseDictionaryFileContents(source.id, source.contents, errors);
        break;
      }
    }

    return { entries, errors };
  }
}
