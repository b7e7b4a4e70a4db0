/** A source of known words. A word is known when any active dictionary accepts it. */
export interface Dictionary {
  readonly id: string;
  check(word: string): boolean;
  suggest(word: string): string[];
}

/** A word list on disk registered under a dictionary id. */
export interface CustomDictionaryEntry {
  name: string;
  path: string;
}
