import { expect, test } from "vitest";
import { Dictionary, DictionaryError, type DictionarySourceConfigMemory } from "./dictionary.ts";

function memorySource(id: string, words: string[], enabled = true): DictionarySourceConfigMemory {
  return { type: "memory", id, enabled, words };
}

test("Dictionary loads from memory source", async () => {
  const dictionary = new Dictionary([]);
  const errors = await dictionary.replaceList([memorySource("test", ["duo", 'd"ug', "Any"])]);

  expect(errors).toEqual([]);
  expect(dictionary.words.length).toBe(3);
  expect(dictionary.wordsFor("336")).toEqual(["duo", 'd"ug']);
  expect(dictionary.wordsFor("059")).toEqual(["Any"]);
  expect(dictionary.wordsFor("33")).toEqual([]);

  const word = dictionary.words[1];
  expect(word.canonicalString).toBe('d"ug');
  expect(word.digits).toBe("336");
});

test("Dictionary skips duplicates and disabled sources", async () => {
  const dictionary = new Dictionary([]);
  await dictionary.replaceList([
    memorySource("first", ["ed", "duo"]),
    memorySource("disabled", ["mild"], false),
    memorySource("second", ["duo", "w"]),
  ]);

  expect(dictionary.words.map((word) => word.canonicalString)).toEqual(["ed", "duo", "w"]);
  expect(dictionary.wordsFor("1823")).toEqual([]);
});

test("Dictionary replaceList drops previously loaded words", async () => {
  const dictionary = new Dictionary([]);
  await dictionary.replaceList([memorySource("old", ["ed"])]);
  await dictionary.replaceList([memorySource("new", ["w"])]);

  expect(dictionary.wordsFor("53")).toEqual([]);
  expect(dictionary.wordsFor("4")).toEqual(["w"]);
});

test("Dictionary reports invalid and overlong words", async () => {
  const dictionary = new Dictionary([]);
  const errors = await dictionary.replaceList([
    memorySource("test", ["b@d", "a".repeat(51), "a".repeat(50), "-", "  ilk  "]),
  ]);

  expect(errors.map((error) => error.message)).toEqual([
    'Invalid word in "test": b@d',
    `Word too long in "test": ${"a".repeat(51)}`,
  ]);
  expect(errors[0]).toBeInstanceOf(DictionaryError);
  expect(dictionary.words.map((word) => word.canonicalString)).toEqual(["a".repeat(50), "ilk"]);
});

test("Dictionary errors name the source they came from", async () => {
  const dictionary = new Dictionary([]);
  const errors = await dictionary.replaceList([
    memorySource("first", ["b@d"]),
    memorySource("second", ["w", "x!"]),
  ]);

  expect(errors.map((error) => error.message)).toEqual([
    'Invalid word in "first": b@d',
    'Invalid word in "second": x!',
  ]);
  expect(dictionary.wordsFor("4")).toEqual(["w"]);
});

test("Dictionary stops at its maximum size", async () => {
  const dictionary = new Dictionary([], 2);
  const errors = await dictionary.replaceList([memorySource("test", ["ed", "w", "duo"])]);

  expect(dictionary.words.length).toBe(2);
  expect(errors.map((error) => error.message)).toEqual([
    "Dictionary is full (2 words), skipping the rest",
  ]);
});

test("Dictionary loads from file contents source", async () => {
  const dictionary = new Dictionary([]);
  const errors = await dictionary.replaceList([
    { type: "fileContents", id: "test", enabled: true, contents: "fib\r\nf\"it\n\nmild\n" },
  ]);

  expect(errors).toEqual([]);
  expect(dictionary.wordsFor("182")).toEqual(["fib", 'f"it']);
  expect(dictionary.wordsFor("1823")).toEqual(["mild"]);
});

test("Dictionary loads from file source", async () => {
  const dictionary = new Dictionary([]);
  const errors = await dictionary.replaceList([
    { type: "file", id: "test-file", enabled: true, path: "test/fixtures/dictionary.txt" },
  ]);

  expect(errors.map((error) => error.message)).toEqual(['Invalid word in "test-file": b@d']);
  expect(dictionary.words.length).toBe(12);
  expect(dictionary.wordsFor("663545899")).toEqual(['Gr"un-weiss']);
});

test("Dictionary reports unreadable files", async () => {
  const dictionary = new Dictionary([]);
  const errors = await dictionary.replaceList([
    { type: "file", id: "missing", enabled: true, path: "test/fixtures/does-not-exist.txt" },
  ]);

  expect(errors.length).toBe(1);
  expect(errors[0].message.startsWith('Can\'t read file for "missing": "test/fixtures/does-not-exist.txt"')).toBe(true);
  expect(dictionary.words).toEqual([]);
});
