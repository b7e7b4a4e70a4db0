/**
 * hunspell.ts
 *
 * English Hunspell dictionary: nspell over the dictionary-en affix and word
 * files. Loading parses ~50k stems, so the instance is built once per
 * process and shared; concurrent first calls wait on the same promise.
 */

import type nspell from "nspell";

import type { Dictionary } from "./types.js";

type NSpell = ReturnType<typeof nspell>;

let spell: NSpell | null = null;
let spellLoading: Promise<NSpell> | null = null;

async function loadSpell(): Promise<NSpell> {
  if (spell) return spell;
  if (spellLoading) return spellLoading;

  spellLoading = (async () => {
    const [{ default: createSpell }, { default: dictionary }] = await Promise.all([
      import("nspell"),
      import("dictionary-en"),
    ]);
    spell = createSpell(Buffer.from(dictionary.aff), Buffer.from(dictionary.dic));
    return spell;
  })();

  try {
    return await spellLoading;
  } catch (error) {
    spellLoading = null;
    throw error;
  }
}

export class HunspellDictionary implements Dictionary {
  constructor(
    public readonly id: string,
    private readonly spell: NSpell,
  ) {}

  /** Tries the word as written, then lowercased (`Hello` at a sentence start). */
  public check(word: string): boolean {
    if (this.spell.correct(word)) return true;
    const lower = word.toLowerCase();
    return lower !== word && this.spell.correct(lower);
  }

  public suggest(word: string): string[] {
    return this.spell.suggest(word);
  }
}

export async function loadEnglishDictionary(id = "en_us"): Promise<HunspellDictionary> {
  return new HunspellDictionary(id, await loadSpell());
}
