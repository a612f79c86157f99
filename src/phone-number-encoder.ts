import type { DictionaryLookup, DigitString } from "./types.ts";
import { EncodedNumber } from "./encoded-number.ts";

/**
 * Thrown when `encode` is handed something that isn't a phone number string at all.
 */
export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}

/**
 * Drop everything but the ASCII digits from a phone number.
 */
export function extractDigits(number: string): DigitString {
  return number.replace(/[^0-9]+/g, "");
}

/**
 * How many phone number digits an encoding accounts for: its ASCII letters and digits, ignoring
 * spaces, dashes and quotes.
 */
export function countEncodedDigits(encoding: string): number {
  return encoding.replace(/[^a-zA-Z0-9]+/g, "").length;
}

/**
 * The state of a single partition search over one phone number's digits.
 *
 * Results for a given `(start, previousWasFreeDigit)` pair don't depend on how we got there, so
 * each one is computed once and reused by every branch (and by the lookahead) that needs it.
 */
class PartitionSearch {
  private dictionary: DictionaryLookup;
  private digits: DigitString;
  private lastIndex: number;
  private solved: Map<string, string[]> = new Map();

  constructor(dictionary: DictionaryLookup, digits: DigitString) {
    this.dictionary = dictionary;
    this.digits = digits;
    this.lastIndex = digits.length - 1;
  }

  /**
   * Every encoding of `digits[start..]`, given whether the unit just before `start` was a free
   * digit.
   */
  public solve(start: number, previousWasFreeDigit: boolean): string[] {
    const key = `${start}:${previousWasFreeDigit}`;
    let encodings = this.solved.get(key);
    if (encodings === undefined) {
      encodings = Array.from(this.partition(start, previousWasFreeDigit));
      this.solved.set(key, encodings);
    }
    return encodings;
  }

  private *partition(start: number, previousWasFreeDigit: boolean): Generator<string> {
    const expectedLength = this.digits.length - start;

    for (let end = start; end <= this.lastIndex; end++) {
      const segment = this.digits.slice(start, end + 1);
      const words = this.dictionary.wordsFor(segment);
      const isSingleDigit = end === start;

      if (end === this.lastIndex) {
        if (words.length > 0) {
          yield* words;
        } else if (isSingleDigit && !previousWasFreeDigit) {
          yield segment;
        }
        continue;
      }

      let candidates: Iterable<string> = [];
      if (words.length > 0) {
        const suffixes = this.solve(end + 1, false);
        candidates = prefixEach(words, suffixes);
      } else if (isSingleDigit && !previousWasFreeDigit && !this.existsWordPath(start)) {
        candidates = prefixEach([segment], this.solve(end + 1, true));
      }

      for (const candidate of candidates) {
        if (countEncodedDigits(candidate) === expectedLength) {
          yield candidate;
        }
      }
    }
  }

  /**
   * Can some dictionary word be placed at `start` such that the rest of the number can still be
   * encoded? Longer words are tried first.
   */
  private existsWordPath(start: number): boolean {
    for (let end = this.lastIndex; end >= start; end--) {
      if (this.dictionary.wordsFor(this.digits.slice(start, end + 1)).length === 0) {
        continue;
      }
      if (end === this.lastIndex || this.solve(end + 1, false).length > 0) {
        return true;
      }
    }
    return false;
  }
}

function* prefixEach(heads: readonly string[], suffixes: readonly string[]): Generator<string> {
  for (const head of heads) {
    for (const suffix of suffixes) {
      yield `${head} ${suffix}`;
    }
  }
}

/**
 * Encodes phone numbers as sequences of dictionary words and free digits.
 *
 * Encodings are built word by word from left to right. A digit may be copied into the encoding
 * by itself only if the previous unit wasn't also a free digit, and no dictionary word placed at
 * that position leaves a number that can still be fully encoded.
 */
export class PhoneNumberEncoder {
  public dictionary: DictionaryLookup;

  constructor(dictionary: DictionaryLookup) {
    this.dictionary = dictionary;
  }

  /**
   * Every encoding of `number`. Anything other than a digit in `number` is ignored, and a number
   * with no digits has no encodings.
   */
  public encode(number: string): EncodedNumber[] {
    if (typeof number !== "string") {
      throw new InvalidArgumentError(`Expected a phone number string, got ${String(number)}`);
    }

    const digits = extractDigits(number);
    if (digits.length === 0) {
      return [];
    }

    const search = new PartitionSearch(this.dictionary, digits);
    return search.solve(0, false).map((encoding) => new EncodedNumber(number, encoding));
  }

  public encodeAll(numbers: Iterable<string>): EncodedNumber[] {
    const encodedNumbers: EncodedNumber[] = [];
    for (const number of numbers) {
      encodedNumbers.push(...this.encode(number));
    }
    return encodedNumbers;
  }
}
