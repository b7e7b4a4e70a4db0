import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import test from "node:test";

import { MemoryConfig } from "../config/index.js";
import type { Dictionary } from "../dictionaries/types.js";
import { isTypolensError } from "../errors/index.js";
import type { LanguageType } from "../grammar/languages.js";
import { GrammarRegistry } from "../grammar/registry.js";
import { setLogLevel } from "../logging/index.js";
import { SpellCheckService, type DictionaryProvider, type GrammarProvider } from "./service.js";

setLogLevel("silent");

function wordSet(id: string, words: string[], suggestions: string[] = []): Dictionary {
  const known = new Set(words);
  return {
    id,
    check: (word) => known.has(word.toLowerCase()),
    suggest: () => [...suggestions],
  };
}

function provider(dictionaries: Record<string, Dictionary | Error>): DictionaryProvider & { requested: string[] } {
  const requested: string[] = [];
  return {
    requested,
    async getDictionary(id) {
      requested.push(id);
      const entry = dictionaries[id];
      if (entry instanceof Error) throw entry;
      return entry ?? null;
    },
  };
}

function noGrammars(): GrammarProvider & { loaded: LanguageType[] } {
  const loaded: LanguageType[] = [];
  return {
    loaded,
    async load(language) {
      loaded.push(language);
      return null;
    },
    get: () => undefined,
    disable: () => undefined,
  };
}

test("flagged words are reported even when a dictionary accepts them", async () => {
  const service = new SpellCheckService({
    config: new MemoryConfig({ words: ["testword"], flagWords: ["todo"] }),
    dictionaries: provider({ en_us: wordSet("en_us", ["todo"]) }),
    grammars: noGrammars(),
  });
  assert.deepEqual(await service.spellCheck("testword todo", "text"), [
    { word: "todo", locations: [{ startByte: 9, endByte: 13 }] },
  ]);
});

test("words shorter than minWordLength are never reported", async () => {
  const dictionaries = provider({});
  const short = new SpellCheckService({ config: new MemoryConfig(), dictionaries, grammars: noGrammars() });
  assert.deepEqual(await short.spellCheck("ab abc", "text"), [{ word: "abc", locations: [{ startByte: 3, endByte: 6 }] }]);

  const longer = new SpellCheckService({
    config: new MemoryConfig({ minWordLength: 4 }),
    dictionaries,
    grammars: noGrammars(),
  });
  assert.deepEqual(await longer.spellCheck("ab abc", "text"), []);
});

test("an ignored path short-circuits before any dictionary loads", async () => {
  const dictionaries = provider({});
  const service = new SpellCheckService({
    config: new MemoryConfig({ ignorePaths: ["generated/"] }, "/proj"),
    dictionaries,
    grammars: noGrammars(),
  });
  assert.deepEqual(await service.spellCheck("wrld", null, "/proj/generated/a.txt"), []);
  assert.deepEqual(dictionaries.requested, []);
});

test("dictionary ids are requested once each, in configured, language, built-in order", async () => {
  const dictionaries = provider({});
  const grammars = noGrammars();
  const service = new SpellCheckService({
    config: new MemoryConfig({ dictionaries: ["en_us", "go"] }),
    dictionaries,
    grammars,
  });

  const found = await service.spellCheck("calc_wrld", "golang");
  assert.deepEqual(dictionaries.requested, ["en_us", "go", "typolens", "software_terms", "computing_acronyms"]);
  assert.deepEqual(grammars.loaded, ["go"]);
  assert.deepEqual(
    found.map((entry) => entry.word),
    ["calc", "wrld"],
  );
});

test("a dictionary that fails to load is left out", async () => {
  const service = new SpellCheckService({
    config: new MemoryConfig(),
    dictionaries: provider({ en_us: new Error("corrupt"), typolens: wordSet("typolens", ["helo"]) }),
    grammars: noGrammars(),
  });
  assert.deepEqual(await service.spellCheck("helo wrld", "text"), [{ word: "wrld", locations: [{ startByte: 5, endByte: 9 }] }]);
});

test("per-path overrides and configured ignore patterns apply", async () => {
  const service = new SpellCheckService({
    config: new MemoryConfig(
      { ignorePatterns: ["^#.*$"], overrides: [{ paths: ["legacy/**"], extraWords: ["wrld"] }] },
      "/proj",
    ),
    dictionaries: provider({}),
    grammars: noGrammars(),
  });

  assert.deepEqual(await service.spellCheck("# helo\nwrld", "text", "/proj/src/a.txt"), [
    { word: "wrld", locations: [{ startByte: 7, endByte: 11 }] },
  ]);
  assert.deepEqual(await service.spellCheck("# helo\nwrld", "text", "/proj/legacy/a.txt"), []);
});

test("getSuggestions merges suggestions from rejecting dictionaries, capped at five", async () => {
  const service = new SpellCheckService({
    config: new MemoryConfig(),
    dictionaries: provider({
      en_us: wordSet("en_us", ["world"], ["world", "weld"]),
      typolens: wordSet("typolens", [], ["world", "wild", "word", "ward", "wold"]),
    }),
    grammars: noGrammars(),
  });

  assert.deepEqual(await service.getSuggestions("wrld"), ["world", "weld", "wild", "word", "ward"]);
  assert.equal(await service.getSuggestions("world"), null);
});

test("spellCheckFile reads the file and picks the language from its name", async () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "typolens-service-"));
  try {
    const filePath = path.join(dir, "notes.txt");
    fs.writeFileSync(filePath, "helo wrld", "utf8");
    const grammars = noGrammars();
    const service = new SpellCheckService({
      config: new MemoryConfig({}, dir),
      dictionaries: provider({ en_us: wordSet("en_us", ["helo"]) }),
      grammars,
    });

    assert.deepEqual(await service.spellCheckFile(filePath), [{ word: "wrld", locations: [{ startByte: 5, endByte: 9 }] }]);
    assert.deepEqual(grammars.loaded, []);

    await assert.rejects(
      service.spellCheckFile(path.join(dir, "missing.txt")),
      (error) => isTypolensError(error) && error.code === "FILE_READ",
    );
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

test("ruby files and bash heredocs are checked as plain text", async () => {
  const grammars = new GrammarRegistry();
  const service = new SpellCheckService({
    config: new MemoryConfig(),
    dictionaries: provider({ en_us: wordSet("en_us", ["greeter", "def", "greet", "nam", "puts", "end", "cat", "eof"]) }),
    grammars,
  });

  const ruby = '# Greeter clas\ndef greet(nam)\n  puts "helo #{nam}"\nend\n';
  assert.deepEqual(await service.spellCheck(ruby, "ruby"), [
    { word: "clas", locations: [{ startByte: 10, endByte: 14 }] },
    { word: "helo", locations: [{ startByte: 38, endByte: 42 }] },
  ]);

  const heredoc = "cat <<EOF\nhelo wrld\nEOF\n";
  assert.deepEqual(await service.spellCheck(heredoc, "shellscript"), [
    { word: "helo", locations: [{ startByte: 10, endByte: 14 }] },
    { word: "wrld", locations: [{ startByte: 15, endByte: 19 }] },
  ]);
  assert.equal(grammars.get("ruby"), undefined);
  assert.equal(grammars.get("bash"), undefined);
});
