import minimist from "minimist";
import { pathToFileURL } from "node:url";
import { DEFAULT_DICTIONARY_PATH } from "./config.ts";
import { Dictionary } from "./dictionary.ts";
import { renderEncodedNumbers } from "./encoded-number.ts";
import { loadPhoneNumbers } from "./phone-number-list.ts";
import { PhoneNumberEncoder } from "./phone-number-encoder.ts";

const USAGE = "Usage: phone-encoder <PHONE_NUMBERS_PATH> [--dictionary <DICTIONARY_PATH>]";

export type RunResult =
  | { type: "Success"; encodingCount: number }
  | { type: "Help" }
  | { type: "MissingPhoneNumbers" };

export async function run(args: string[]): Promise<RunResult> {
  const flags = minimist(args, {
    string: ["dictionary", "_"],
    boolean: ["help"],
    alias: { h: "help", d: "dictionary" },
  });

  if (flags.help) {
    console.log(USAGE);
    return { type: "Help" };
  }

  const phoneNumbersPath = flags._[0];
  if (typeof phoneNumbersPath !== "string") {
    console.error("Error: Missing PHONE_NUMBERS_PATH");
    console.error(USAGE);
    return { type: "MissingPhoneNumbers" };
  }

  const dictionaryPath: unknown = flags.dictionary;
  const dictionary = new Dictionary([]);
  const dictionaryErrors = await dictionary.replaceList([
    {
      type: "file",
      id: "dictionary",
      enabled: true,
      path: typeof dictionaryPath === "string" ? dictionaryPath : DEFAULT_DICTIONARY_PATH,
    },
  ]);
  for (const error of dictionaryErrors) {
    console.error(`Warning: ${error.message}`);
  }

  const { numbers, errors } = await loadPhoneNumbers({ type: "file", path: phoneNumbersPath });
  for (const error of errors) {
    console.error(`Warning: ${error.message}`);
  }

  const encoder = new PhoneNumberEncoder(dictionary);
  const encodedNumbers = encoder.encodeAll(numbers);
  if (encodedNumbers.length > 0) {
    console.log(renderEncodedNumbers(encodedNumbers));
  }

  return { type: "Success", encodingCount: encodedNumbers.length };
}

if (process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href) {
  run(process.argv.slice(2))
    .then((result) => {
      if (result.type === "MissingPhoneNumbers") {
        process.exitCode = 1;
      }
    })
    .catch((error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    });
}
