/**
 * service.ts
 *
 * Composes configuration, dictionaries and grammars around findLocations.
 *
 * A word is known when, in order:
 *   1. it is on the flag list          -> never known, whatever the dictionaries say
 *   2. it is shorter than minWordLength -> known
 *   3. it is on the allow list          -> known
 *   4. any active dictionary accepts it -> known
 */

import { readFile } from "node:fs/promises";

import type { SpellConfig } from "../config/types.js";
import { BUILTIN_DICTIONARY_IDS, DictionaryManager } from "../dictionaries/manager.js";
import type { CustomDictionaryEntry, Dictionary } from "../dictionaries/types.js";
import { TypolensError, describeError } from "../errors/index.js";
import { languageDictionaryIds, resolveLanguage, type LanguageType } from "../grammar/languages.js";
import { GrammarRegistry } from "../grammar/registry.js";
import type { GrammarLookup, LoadedGrammar } from "../grammar/types.js";
import { findLocations } from "../locate/index.js";
import { createLogger } from "../logging/index.js";
import { DEFAULT_SKIP_PATTERNS } from "../text/skip-ranges.js";
import type { KnownWordPredicate, WordLocation } from "../text/types.js";

const log = createLogger("checker");

const MAX_SUGGESTIONS = 5;

export interface DictionaryProvider {
  getDictionary(id: string, customDictionaries?: readonly CustomDictionaryEntry[]): Promise<Dictionary | null>;
}

export interface GrammarProvider extends GrammarLookup {
  load(language: LanguageType): Promise<LoadedGrammar | null>;
}

export interface SpellCheckServiceOptions {
  config: SpellConfig;
  dictionaries?: DictionaryProvider;
  grammars?: GrammarProvider;
}

function codePointLength(word: string): number {
  let count = 0;
  for (const _ of word) count += 1;
  return count;
}

export class SpellCheckService {
  private readonly config: SpellConfig;
  private readonly dictionaries: DictionaryProvider;
  private readonly grammars: GrammarProvider;

  constructor(options: SpellCheckServiceOptions) {
    this.config = options.config;
    this.dictionaries = options.dictionaries ?? new DictionaryManager();
    this.grammars = options.grammars ?? new GrammarRegistry();
  }

  /**
   * Unknown words in `text` with every location. `languageHint` accepts
   * language ids and editor aliases; without one the path's extension
   * decides, and plain text is the last resort.
   */
  public async spellCheck(text: string, languageHint?: string | null, filePathHint?: string | null): Promise<WordLocation[]> {
    if (filePathHint && this.config.shouldIgnorePath(filePathHint)) {
      log.debug(`Skipping ignored path ${filePathHint}`);
      return [];
    }

    const language = resolveLanguage(languageHint, filePathHint);
    const view = filePathHint ? this.config.forPath(filePathHint) : this.config;
    const dictionaries = await this.activeDictionaries(view, language);
    const isKnown = this.knownWordPredicate(view, dictionaries);

    if (language !== "text") await this.grammars.load(language);

    return findLocations(text, language, isKnown, [...DEFAULT_SKIP_PATTERNS, ...view.ignorePatterns()], this.grammars);
  }

  public async spellCheckFile(filePath: string, languageHint?: string | null): Promise<WordLocation[]> {
    let text: string;
    try {
      text = await readFile(filePath, "utf8");
    } catch (error) {
      throw new TypolensError({
        code: "FILE_READ",
        message: `Failed to read ${filePath}: ${describeError(error)}`,
        path: filePath,
        cause: error,
      });
    }
    return this.spellCheck(text, languageHint, filePath);
  }

  /**
   * Up to five suggestions from the configured dictionaries, or null when
   * one of them already accepts the word.
   */
  public async getSuggestions(word: string): Promise<string[] | null> {
    const dictionaries = await this.activeDictionaries(this.config, "text");
    if (dictionaries.some((dictionary) => dictionary.check(word))) return null;

    const suggestions = new Set<string>();
    for (const dictionary of dictionaries) {
      for (const suggestion of dictionary.suggest(word)) {
        suggestions.add(suggestion);
        if (suggestions.size >= MAX_SUGGESTIONS) return [...suggestions];
      }
    }
    return [...suggestions];
  }

  /** Configured ids, then the language's lists, then the built-ins; each id once. */
  public dictionaryIdsFor(view: SpellConfig, language: LanguageType): string[] {
    return [...new Set([...view.dictionaryIds(), ...languageDictionaryIds(language), ...BUILTIN_DICTIONARY_IDS])];
  }

  private async activeDictionaries(view: SpellConfig, language: LanguageType): Promise<Dictionary[]> {
    const custom = view.customDictionaries();
    const loaded = await Promise.all(
      this.dictionaryIdsFor(view, language).map((id) =>
        this.dictionaries.getDictionary(id, custom).catch((error: unknown) => {
          log.error(`Dictionary ${id} failed to load`, { error: describeError(error) });
          return null;
        }),
      ),
    );
    return loaded.filter((dictionary): dictionary is Dictionary => dictionary !== null);
  }

  private knownWordPredicate(view: SpellConfig, dictionaries: readonly Dictionary[]): KnownWordPredicate {
    const minLength = view.minWordLength();
    return (word) => {
      if (view.shouldFlagWord(word)) return false;
      if (codePointLength(word) < minLength) return true;
      if (view.isAllowedWord(word)) return true;
      return dictionaries.some((dictionary) => dictionary.check(word));
    };
  }
}
