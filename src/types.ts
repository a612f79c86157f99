/**
 * A single decimal digit, as it appears in a phone number.
 */
export type Digit = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

/**
 * A string made up only of the characters `0` through `9`.
 */
export type DigitString = string;

/**
 * Anything that can answer "which dictionary words encode to exactly these digits?".
 */
export interface DictionaryLookup {
  /**
   * The literal dictionary words (original casing and punctuation) whose letters translate to
   * `digits`. Empty when nothing matches.
   */
  wordsFor(digits: DigitString): readonly string[];
}
