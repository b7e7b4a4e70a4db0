/**
 * settings.ts
 *
 * The settings document (`typolens.json`): schema, merge rules, per-path
 * overrides, and a read-only view that answers checker questions.
 *
 * Word lists (dictionaries, words, flagWords and their override variants)
 * are lowercased on load. Paths and regex sources are kept as written.
 */

import path from "node:path";
import micromatch from "micromatch";
import { z } from "zod";

import type { CustomDictionaryEntry } from "../dictionaries/types.js";
import { TypolensError } from "../errors/index.js";
import { createLogger } from "../logging/index.js";
import { compileSkipPatterns } from "../text/skip-ranges.js";
import type { ConfigSettings, OverrideBlock, SpellConfig } from "./types.js";

const log = createLogger("config");

export const DEFAULT_MIN_WORD_LENGTH = 3;
export const DEFAULT_DICTIONARY_ID = "en_us";

const lowercase = (values: string[]) => values.map((value) => value.toLowerCase());

const wordList = z.array(z.string()).default([]).transform(lowercase);
const optionalWordList = z
  .array(z.string())
  .optional()
  .transform((values) => (values ? lowercase(values) : undefined));

export const overrideBlockSchema = z.object({
  paths: z.array(z.string()).default([]),
  dictionaries: optionalWordList,
  words: optionalWordList,
  flagWords: optionalWordList,
  ignorePatterns: z.array(z.string()).optional(),
  extraDictionaries: optionalWordList,
  extraWords: optionalWordList,
  extraFlagWords: optionalWordList,
  extraIgnorePatterns: z.array(z.string()).optional(),
});

export const customDictionarySchema = z.object({
  name: z.string().min(1),
  path: z.string().min(1),
});

export const configSettingsSchema = z.object({
  dictionaries: wordList,
  words: wordList,
  flagWords: wordList,
  ignorePaths: z.array(z.string()).default([]),
  ignorePatterns: z.array(z.string()).default([]),
  useGlobal: z.boolean().default(true),
  minWordLength: z.number().int().min(1).default(DEFAULT_MIN_WORD_LENGTH),
  customDictionaries: z.array(customDictionarySchema).default([]),
  overrides: z.array(overrideBlockSchema).default([]).transform(keepUsableOverrides),
});

function hasEffect(block: OverrideBlock): boolean {
  return (
    block.dictionaries !== undefined ||
    block.words !== undefined ||
    block.flagWords !== undefined ||
    block.ignorePatterns !== undefined ||
    block.extraDictionaries !== undefined ||
    block.extraWords !== undefined ||
    block.extraFlagWords !== undefined ||
    block.extraIgnorePatterns !== undefined
  );
}

function keepUsableOverrides(blocks: OverrideBlock[]): OverrideBlock[] {
  return blocks.filter((block) => {
    if (!block.paths.some((glob) => glob.trim().length > 0)) {
      log.warn("Skipping override block without paths");
      return false;
    }
    if (!hasEffect(block)) {
      log.warn("Skipping override block that changes nothing", { paths: block.paths });
      return false;
    }
    return true;
  });
}

export function defaultSettings(): ConfigSettings {
  return {
    dictionaries: [],
    words: [],
    flagWords: [],
    ignorePaths: [],
    ignorePatterns: [],
    useGlobal: true,
    minWordLength: DEFAULT_MIN_WORD_LENGTH,
    customDictionaries: [],
    overrides: [],
  };
}

/** Validate a parsed JSON value. Unknown keys are ignored. */
export function parseSettings(raw: unknown, source = "<inline>"): ConfigSettings {
  const result = configSettingsSchema.safeParse(raw ?? {});
  if (!result.success) {
    const detail = result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
    throw new TypolensError({
      code: "CONFIG_PARSE",
      message: `Invalid settings in ${source}: ${detail}`,
      path: source,
      cause: result.error,
    });
  }
  return result.data;
}

export function parseSettingsJson(text: string, source = "<inline>"): ConfigSettings {
  let raw: unknown;
  try {
    raw = text.trim() ? JSON.parse(text) : {};
  } catch (error) {
    throw new TypolensError({
      code: "CONFIG_PARSE",
      message: `Failed to parse ${source}: ${error instanceof Error ? error.message : String(error)}`,
      path: source,
      cause: error,
    });
  }
  return parseSettings(raw, source);
}

/** Only non-default fields are written, so files stay short. */
export function serializeSettings(settings: ConfigSettings): string {
  const out: Partial<ConfigSettings> = {};
  if (settings.dictionaries.length > 0) out.dictionaries = settings.dictionaries;
  if (settings.words.length > 0) out.words = settings.words;
  if (settings.flagWords.length > 0) out.flagWords = settings.flagWords;
  if (settings.ignorePaths.length > 0) out.ignorePaths = settings.ignorePaths;
  if (settings.ignorePatterns.length > 0) out.ignorePatterns = settings.ignorePatterns;
  if (!settings.useGlobal) out.useGlobal = false;
  if (settings.minWordLength !== DEFAULT_MIN_WORD_LENGTH) out.minWordLength = settings.minWordLength;
  if (settings.customDictionaries.length > 0) out.customDictionaries = settings.customDictionaries;
  if (settings.overrides.length > 0) out.overrides = settings.overrides;
  return `${JSON.stringify(out, null, 2)}\n`;
}

function sortedUnique(values: readonly string[]): string[] {
  return [...new Set(values)].sort();
}

export function cloneSettings(settings: ConfigSettings): ConfigSettings {
  return {
    ...settings,
    dictionaries: [...settings.dictionaries],
    words: [...settings.words],
    flagWords: [...settings.flagWords],
    ignorePaths: [...settings.ignorePaths],
    ignorePatterns: [...settings.ignorePatterns],
    customDictionaries: settings.customDictionaries.map((entry) => ({ ...entry })),
    overrides: settings.overrides.map((block) => ({ ...block })),
  };
}

/**
 * Layer `other` (the project) over `base` (the global file). Lists are
 * unioned, sorted and deduplicated; overrides keep their order, base first.
 * A non-default `minWordLength` in `other` wins. `useGlobal` is per file and
 * not merged.
 */
export function mergeSettings(base: ConfigSettings, other: ConfigSettings): ConfigSettings {
  const customByName = new Map<string, CustomDictionaryEntry>();
  for (const entry of [...base.customDictionaries, ...other.customDictionaries]) customByName.set(entry.name, entry);

  return {
    dictionaries: sortedUnique([...base.dictionaries, ...other.dictionaries]),
    words: sortedUnique([...base.words, ...other.words]),
    flagWords: sortedUnique([...base.flagWords, ...other.flagWords]),
    ignorePaths: sortedUnique([...base.ignorePaths, ...other.ignorePaths]),
    ignorePatterns: sortedUnique([...base.ignorePatterns, ...other.ignorePatterns]),
    useGlobal: base.useGlobal,
    minWordLength: other.minWordLength !== DEFAULT_MIN_WORD_LENGTH ? other.minWordLength : base.minWordLength,
    customDictionaries: [...customByName.values()],
    overrides: [...base.overrides, ...other.overrides],
  };
}

export function applyOverride(settings: ConfigSettings, block: OverrideBlock): ConfigSettings {
  const next = cloneSettings(settings);
  if (block.dictionaries) next.dictionaries = [...block.dictionaries];
  if (block.words) next.words = [...block.words];
  if (block.flagWords) next.flagWords = [...block.flagWords];
  if (block.ignorePatterns) next.ignorePatterns = [...block.ignorePatterns];

  if (block.extraDictionaries) next.dictionaries.push(...block.extraDictionaries);
  if (block.extraWords) next.words.push(...block.extraWords);
  if (block.extraFlagWords) next.flagWords.push(...block.extraFlagWords);
  if (block.extraIgnorePatterns) next.ignorePatterns.push(...block.extraIgnorePatterns);
  return next;
}

/** Path globs ending in `/` name a directory and match everything below it. */
function expandGlobs(globs: readonly string[]): string[] {
  return globs.filter((glob) => glob.trim()).map((glob) => (glob.endsWith("/") ? `${glob}**` : glob));
}

export function matchesAnyGlob(candidate: string, globs: readonly string[]): boolean {
  const patterns = expandGlobs(globs);
  return patterns.length > 0 && micromatch.isMatch(candidate, patterns, { dot: true });
}

/** Overrides whose globs match `relativePath` applied in order; the result has none left. */
export function resolveForPath(settings: ConfigSettings, relativePath: string): ConfigSettings {
  let resolved: ConfigSettings = { ...cloneSettings(settings), overrides: [] };
  for (const block of settings.overrides) {
    if (matchesAnyGlob(relativePath, block.paths)) resolved = applyOverride(resolved, block);
  }
  return resolved;
}

export function dictionaryIds(settings: ConfigSettings): string[] {
  return settings.dictionaries.length > 0 ? [...settings.dictionaries] : [DEFAULT_DICTIONARY_ID];
}

/** Returns false when the word was already allowed. */
export function insertWord(settings: ConfigSettings, word: string): boolean {
  const normalized = word.toLowerCase();
  if (settings.words.includes(normalized)) return false;
  settings.words = sortedUnique([...settings.words, normalized]);
  return true;
}

/** Returns false when the glob was already ignored. */
export function insertIgnore(settings: ConfigSettings, glob: string): boolean {
  if (settings.ignorePaths.includes(glob)) return false;
  settings.ignorePaths = sortedUnique([...settings.ignorePaths, glob]);
  return true;
}

export function toPosixRelative(root: string, filePath: string): string {
  const relative = path.isAbsolute(filePath) ? path.relative(root, filePath) : filePath;
  return relative.split(path.sep).join("/");
}

/** Immutable SpellConfig over one resolved settings document. */
export class SettingsView implements SpellConfig {
  private readonly allowed: ReadonlySet<string>;
  private readonly flagged: ReadonlySet<string>;
  private compiledPatterns: RegExp[] | null = null;

  constructor(
    public readonly settings: ConfigSettings,
    public readonly projectRoot: string,
  ) {
    this.allowed = new Set(lowercase(settings.words));
    this.flagged = new Set(lowercase(settings.flagWords));
  }

  public dictionaryIds(): string[] {
    return dictionaryIds(this.settings);
  }

  public isAllowedWord(word: string): boolean {
    return this.allowed.has(word.toLowerCase());
  }

  public shouldFlagWord(word: string): boolean {
    return this.flagged.has(word.toLowerCase());
  }

  public minWordLength(): number {
    return this.settings.minWordLength;
  }

  public ignorePatterns(): RegExp[] {
    if (!this.compiledPatterns) this.compiledPatterns = compileSkipPatterns(this.settings.ignorePatterns);
    return [...this.compiledPatterns];
  }

  public shouldIgnorePath(filePath: string): boolean {
    const relative = toPosixRelative(this.projectRoot, filePath);
    const raw = filePath.split(path.sep).join("/");
    return matchesAnyGlob(relative, this.settings.ignorePaths) || matchesAnyGlob(raw, this.settings.ignorePaths);
  }

  public customDictionaries(): CustomDictionaryEntry[] {
    return this.settings.customDictionaries.map((entry) => ({
      name: entry.name,
      path: path.resolve(this.projectRoot, entry.path),
    }));
  }

  public forPath(filePath: string): SpellConfig {
    if (this.settings.overrides.length === 0) return this;
    return new SettingsView(resolveForPath(this.settings, toPosixRelative(this.projectRoot, filePath)), this.projectRoot);
  }
}
