import assert from "node:assert/strict";
import test from "node:test";

import { isTypolensError } from "../errors/index.js";
import type { LanguageType } from "../grammar/languages.js";
import type { GrammarLookup, LoadedGrammar } from "../grammar/types.js";
import { DEFAULT_SKIP_PATTERNS } from "../text/skip-ranges.js";
import { findLocations } from "./index.js";

const never = () => false;

function lookupWith(grammar: LoadedGrammar): GrammarLookup & { asked: LanguageType[] } {
  const asked: LanguageType[] = [];
  return {
    asked,
    get(language) {
      asked.push(language);
      return language === grammar.language ? grammar : undefined;
    },
    disable: () => undefined,
  };
}

const onlyIdentifier: LoadedGrammar = {
  language: "python",
  parser: {
    parse: () => ({ rootNode: { type: "module", startIndex: 0, endIndex: 0 }, delete: () => undefined }),
  },
  // Captures "wrld" in "# helo\nwrld = 1"
  queries: [{ captures: () => [{ name: "identifier", node: { type: "identifier", startIndex: 7, endIndex: 11 } }] }],
};

test("text mode never consults the grammar lookup", () => {
  const lookup = lookupWith(onlyIdentifier);
  const found = findLocations("# helo\nwrld = 1", "text", never, DEFAULT_SKIP_PATTERNS, lookup);
  assert.deepEqual(
    found.map((entry) => entry.word),
    ["helo", "wrld"],
  );
  assert.deepEqual(lookup.asked, []);
});

test("a loaded grammar restricts checking to captured nodes", () => {
  const lookup = lookupWith(onlyIdentifier);
  const found = findLocations("# helo\nwrld = 1", "python", never, DEFAULT_SKIP_PATTERNS, lookup);
  assert.deepEqual(found, [{ word: "wrld", locations: [{ startByte: 7, endByte: 11 }] }]);
  assert.deepEqual(lookup.asked, ["python"]);
});

test("a language without a loaded grammar falls back to text mode", () => {
  const found = findLocations("# helo\nwrld = 1", "ruby", never, DEFAULT_SKIP_PATTERNS, lookupWith(onlyIdentifier));
  assert.deepEqual(
    found.map((entry) => entry.word),
    ["helo", "wrld"],
  );
  assert.deepEqual(
    findLocations("calc_wrld", "go", never, DEFAULT_SKIP_PATTERNS).map((entry) => entry.word),
    ["calc", "wrld"],
  );
});

test("a grammar that throws while parsing is disabled once and the text is checked as plain text", () => {
  let parses = 0;
  const crashing: LoadedGrammar = {
    language: "python",
    parser: {
      parse: () => {
        parses += 1;
        throw new TypeError("Cannot read properties of undefined (reading 'apply')");
      },
    },
    queries: [],
  };
  let available: LoadedGrammar | undefined = crashing;
  const disabled: string[] = [];
  const lookup: GrammarLookup = {
    get: (language) => (language === "python" ? available : undefined),
    disable(language, error) {
      disabled.push(`${language}:${isTypolensError(error) ? error.code : "?"}`);
      available = undefined;
    },
  };

  const expected = [
    { word: "helo", locations: [{ startByte: 2, endByte: 6 }] },
    { word: "wrld", locations: [{ startByte: 7, endByte: 11 }] },
  ];
  assert.deepEqual(findLocations("# helo\nwrld = 1", "python", never, DEFAULT_SKIP_PATTERNS, lookup), expected);
  assert.deepEqual(findLocations("# helo\nwrld = 1", "python", never, DEFAULT_SKIP_PATTERNS, lookup), expected);
  assert.deepEqual(disabled, ["python:GRAMMAR_PARSE"]);
  assert.equal(parses, 1);
});

test("errors from the known-word predicate propagate and leave the grammar enabled", () => {
  const disabled: LanguageType[] = [];
  const lookup: GrammarLookup = {
    get: (language) => (language === "python" ? onlyIdentifier : undefined),
    disable: (language) => {
      disabled.push(language);
    },
  };
  const failing = (): boolean => {
    throw new Error("dictionary gone");
  };
  assert.throws(() => findLocations("# helo\nwrld = 1", "python", failing, DEFAULT_SKIP_PATTERNS, lookup), {
    message: "dictionary gone",
  });
  assert.deepEqual(disabled, []);
});
