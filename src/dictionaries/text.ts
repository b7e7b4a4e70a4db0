import { readFile } from "node:fs/promises";

import type { Dictionary } from "./types.js";

/** One word per line; blank lines and `#` comments are ignored. Words are lowercased. */
export function parseWordList(source: string): Set<string> {
  const words = new Set<string>();
  for (const raw of source.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line || line.startsWith("#")) continue;
    words.add(line.toLowerCase());
  }
  return words;
}

/** Flat word list. Lookups are case-insensitive; there are no suggestions. */
export class TextDictionary implements Dictionary {
  private readonly words: Set<string>;

  constructor(
    public readonly id: string,
    source: string,
  ) {
    this.words = parseWordList(source);
  }

  public static async fromFile(id: string, filePath: string): Promise<TextDictionary> {
    return new TextDictionary(id, await readFile(filePath, "utf8"));
  }

  public get size(): number {
    return this.words.size;
  }

  public check(word: string): boolean {
    return this.words.has(word.toLowerCase());
  }

  public suggest(): string[] {
    return [];
  }
}
