import type { Digit, DigitString } from "./types.ts";

/**
 * The fixed letter groups for each digit, indexed by digit:
 *
 * ```
 * a v | f m x | b l t | d k u | c j w | e n | g o r | h p | i q | s y z
 *  0  |   1   |   2   |   3   |   4   |  5  |   6   |  7  |  8  |   9
 * ```
 */
const LETTER_GROUPS = [
  "AV",
  "FMX",
  "BLT",
  "DKU",
  "CJW",
  "EN",
  "GOR",
  "HP",
  "IQ",
  "SYZ",
] as const;

const DIGITS: readonly Digit[] = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9];

const LETTERS_BY_DIGIT: readonly ReadonlySet<string>[] = DIGITS.map(
  (digit) => new Set(LETTER_GROUPS[digit]),
);

const DIGIT_BY_LETTER: ReadonlyMap<string, Digit> = new Map(
  DIGITS.flatMap((digit) => [...LETTER_GROUPS[digit]].map((letter): [string, Digit] => [letter, digit])),
);

/**
 * The uppercase letters that encode to `digit`.
 */
export function lettersFor(digit: Digit): ReadonlySet<string> {
  return LETTERS_BY_DIGIT[digit];
}

/**
 * The digit a letter encodes to, ignoring case. Anything that isn't an ASCII letter has no
 * digit.
 */
export function digitFor(char: string): Digit | undefined {
  return DIGIT_BY_LETTER.get(char.toUpperCase());
}

/**
 * Translate a dictionary word into the digits its letters encode to. Dashes, quotes and other
 * non-letters don't contribute a digit.
 */
export function wordToDigits(word: string): DigitString {
  let digits = "";
  for (const char of word) {
    const digit = digitFor(char);
    if (digit !== undefined) {
      digits += digit;
    }
  }
  return digits;
}
