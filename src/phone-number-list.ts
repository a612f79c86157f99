import { readFile } from "node:fs/promises";
import { MAX_PHONE_NUMBER_LENGTH } from "./config.ts";

/**
 * Phone numbers are digits, optionally broken up with dashes and slashes.
 */
const VALID_PHONE_NUMBER_PATTERN = /^[0-9/-]+$/;

/**
 * An error that occurs while loading a list of phone numbers.
 */
export class PhoneNumberListError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PhoneNumberListError";
  }
}

export type PhoneNumberSourceConfig =
  | { type: "memory"; numbers: string[] }
  | { type: "file"; path: string }
  | { type: "fileContents"; contents: string };

export interface LoadedPhoneNumbers {
  numbers: string[];
  errors: PhoneNumberListError[];
}

function parsePhoneNumbers(lines: Iterable<string>): LoadedPhoneNumbers {
  const numbers: string[] = [];
  const errors: PhoneNumberListError[] = [];

  for (const line of lines) {
    const number = line.trim();
    if (number.length === 0) {
      continue;
    }
    if (number.length > MAX_PHONE_NUMBER_LENGTH) {
      errors.push(new PhoneNumberListError(`Phone number too long: ${number}`));
      continue;
    }
    if (!VALID_PHONE_NUMBER_PATTERN.test(number)) {
      errors.push(new PhoneNumberListError(`Invalid phone number: ${number}`));
      continue;
    }
    numbers.push(number);
  }

  return { numbers, errors };
}

/**
 * Load phone numbers, one per line, skipping (and reporting) anything that isn't one.
 */
export async function loadPhoneNumbers(source: PhoneNumberSourceConfig): Promise<LoadedPhoneNumbers> {
  switch (source.type) {
    case "memory":
      return parsePhoneNumbers(source.numbers);
    case "file": {
      let contents: string;
      try {
        contents = await readFile(source.path, "utf8");
      } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        return {
          numbers: [],
          errors: [new PhoneNumberListError(`Can't read file: "${source.path}" (${reason})`)],
        };
      }
      return parsePhoneNumbers(contents.split(/\r?\n/));
    }
    case "fileContents":
      return parsePhoneNumbers(source.contents.split(/\r?\n/));
  }
}
