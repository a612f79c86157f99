/**
 * The most words we'll load into a single dictionary.
 */
export const MAX_DICTIONARY_SIZE = 75000;

/**
 * The longest word (counted in letters) we'll accept from a dictionary source.
 */
export const MAX_DICTIONARY_WORD_LENGTH = 50;

/**
 * The longest phone number (counted in characters, separators included) we'll accept from a
 * phone number source.
 */
export const MAX_PHONE_NUMBER_LENGTH = 50;

/**
 * Where the CLI looks for a dictionary when `--dictionary` isn't given.
 */
export const DEFAULT_DICTIONARY_PATH = "resources/dictionary.txt";
