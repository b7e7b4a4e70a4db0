/**
 * manager.ts
 *
 * Resolves dictionary ids to loaded dictionaries and caches them.
 *
 *   en_us / en / en_gb ...    -> Hunspell (nspell + dictionary-en)
 *   typolens, software_terms,
 *   computing_acronyms        -> wordlists/<id>.txt
 *   language ids (go, c, ...) -> wordlists/languages/<id>.txt
 *   custom names              -> the configured file
 *
 * At most one load runs per id. `load` raises DICTIONARY_LOAD on failure;
 * `getDictionary` logs it, resolves to null and does not cache, so the next
 * request tries again.
 */

import { access } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { asTypolensError } from "../errors/index.js";
import { createLogger } from "../logging/index.js";
import { loadEnglishDictionary } from "./hunspell.js";
import { TextDictionary } from "./text.js";
import type { CustomDictionaryEntry, Dictionary } from "./types.js";

const log = createLogger("dictionaries");

export const BUILTIN_DICTIONARY_IDS = ["typolens", "software_terms", "computing_acronyms"] as const;
export const DEFAULT_WORDLIST_DIR = fileURLToPath(new URL("../../wordlists/", import.meta.url));

const HUNSPELL_IDS = new Set(["en_us", "en", "en-us", "en_gb", "en-gb", "en_ca", "en-ca", "en_au", "en-au"]);

export interface DictionaryManagerOptions {
  wordlistDir?: string;
  loadHunspell?: (id: string) => Promise<Dictionary>;
}

export class DictionaryManager {
  private readonly cache = new Map<string, Dictionary>();
  private readonly inFlight = new Map<string, Promise<Dictionary | null>>();
  private readonly wordlistDir: string;
  private readonly loadHunspell: (id: string) => Promise<Dictionary>;

  constructor(options: DictionaryManagerOptions = {}) {
    this.wordlistDir = options.wordlistDir ?? DEFAULT_WORDLIST_DIR;
    this.loadHunspell = options.loadHunspell ?? loadEnglishDictionary;
  }

  public async getDictionary(
    id: string,
    customDictionaries: readonly CustomDictionaryEntry[] = [],
  ): Promise<Dictionary | null> {
    const cached = this.cache.get(id);
    if (cached) return cached;

    const pending = this.inFlight.get(id);
    if (pending) return pending;

    const promise = this.load(id, customDictionaries)
      .then((dictionary) => {
        if (dictionary) this.cache.set(id, dictionary);
        return dictionary;
      })
      .catch((error: unknown) => {
        const failure = asTypolensError(error, { code: "DICTIONARY_LOAD" });
        log.error(failure.message, { code: failure.code, path: failure.path });
        return null;
      })
      .finally(() => {
        this.inFlight.delete(id);
      });

    this.inFlight.set(id, promise);
    return promise;
  }

  /** Load several ids at once; failures are omitted and duplicates load once. */
  public async getDictionaries(
    ids: readonly string[],
    customDictionaries: readonly CustomDictionaryEntry[] = [],
  ): Promise<Dictionary[]> {
    const unique = [...new Set(ids)];
    const loaded = await Promise.all(unique.map((id) => this.getDictionary(id, customDictionaries)));
    return loaded.filter((dictionary): dictionary is Dictionary => dictionary !== null);
  }

  public invalidate(id: string): void {
    this.cache.delete(id);
  }

  /** Uncached load; null when nothing is registered under `id`. */
  public async load(id: string, customDictionaries: readonly CustomDictionaryEntry[] = []): Promise<Dictionary | null> {
    try {
      return await this.resolve(id, customDictionaries);
    } catch (error) {
      const custom = customDictionaries.find((entry) => entry.name === id);
      throw asTypolensError(error, {
        code: "DICTIONARY_LOAD",
        message: `Failed to load dictionary ${id}`,
        path: custom?.path,
      });
    }
  }

  private async resolve(id: string, customDictionaries: readonly CustomDictionaryEntry[]): Promise<Dictionary | null> {
    const custom = customDictionaries.find((entry) => entry.name === id);
    if (custom) return TextDictionary.fromFile(id, custom.path);

    if (HUNSPELL_IDS.has(id.toLowerCase())) return this.loadHunspell(id);

    const candidates = [path.join(this.wordlistDir, `${id}.txt`), path.join(this.wordlistDir, "languages", `${id}.txt`)];
    for (const candidate of candidates) {
      if (await exists(candidate)) return TextDictionary.fromFile(id, candidate);
    }

    log.debug(`No dictionary registered for id ${id}, skipping`);
    return null;
  }
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}
