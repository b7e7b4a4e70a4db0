import type { CustomDictionaryEntry } from "../dictionaries/types.js";

/** One `overrides` entry. Replace fields apply first, then the `extra*` fields append. */
export interface OverrideBlock {
  /** Globs matched against the path relative to the project root. */
  paths: string[];
  dictionaries?: string[];
  words?: string[];
  flagWords?: string[];
  ignorePatterns?: string[];
  extraDictionaries?: string[];
  extraWords?: string[];
  extraFlagWords?: string[];
  extraIgnorePatterns?: string[];
}

export interface ConfigSettings {
  dictionaries: string[];
  words: string[];
  flagWords: string[];
  ignorePaths: string[];
  ignorePatterns: string[];
  useGlobal: boolean;
  minWordLength: number;
  customDictionaries: CustomDictionaryEntry[];
  overrides: OverrideBlock[];
}

/** What the checker needs to know from configuration. Word arguments are case-insensitive. */
export interface SpellConfig {
  dictionaryIds(): string[];
  isAllowedWord(word: string): boolean;
  shouldFlagWord(word: string): boolean;
  minWordLength(): number;
  ignorePatterns(): RegExp[];
  shouldIgnorePath(filePath: string): boolean;
  customDictionaries(): CustomDictionaryEntry[];
  /** The same view with the overrides matching `filePath` applied. */
  forPath(filePath: string): SpellConfig;
}
