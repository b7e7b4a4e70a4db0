export { SpellCheckService } from "./checker/service.js";
export type { DictionaryProvider, GrammarProvider, SpellCheckServiceOptions } from "./checker/service.js";

export { FileConfig, MemoryConfig, SettingsView, loadConfig, parseSettings, parseSettingsJson, serializeSettings } from "./config/index.js";
export type { ConfigSettings, FileConfigOptions, OverrideBlock, SpellConfig } from "./config/index.js";

export { BUILTIN_DICTIONARY_IDS, DictionaryManager } from "./dictionaries/manager.js";
export { HunspellDictionary, loadEnglishDictionary } from "./dictionaries/hunspell.js";
export { TextDictionary, parseWordList } from "./dictionaries/text.js";
export type { CustomDictionaryEntry, Dictionary } from "./dictionaries/types.js";

export { TypolensError, asTypolensError, isTypolensError } from "./errors/index.js";
export type { TypolensErrorCode } from "./errors/index.js";

export { LANGUAGE_TYPES, grammarLanguages, languageFromFilename, languageFromId, resolveLanguage } from "./grammar/languages.js";
export type { LanguageType } from "./grammar/languages.js";
export { GrammarRegistry } from "./grammar/registry.js";

export { findLocations } from "./locate/index.js";

export { createLogger, setLogLevel } from "./logging/index.js";
export type { LogLevel, Logger } from "./logging/index.js";

export { byteRangeToPosition } from "./text/offsets.js";
export { DEFAULT_SKIP_PATTERNS, buildSkipRanges } from "./text/skip-ranges.js";
export { split } from "./text/splitter.js";
export { TextTokenizer } from "./text/tokenizer.js";
export type { KnownWordPredicate, SkipRange, SplitRef, TextRange, WordLocation } from "./text/types.js";
