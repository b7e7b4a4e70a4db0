/** Half-open UTF-8 byte interval into the original source buffer. */
export interface TextRange {
  startByte: number;
  endByte: number;
}

/** One distinct (case-sensitive) word and every place it occurs. */
export interface WordLocation {
  word: string;
  locations: TextRange[];
}

/** Byte interval excluded from tokenization. Sorted and non-overlapping once built. */
export interface SkipRange {
  startByte: number;
  endByte: number;
}

/** A sub-word of a token; `startByte` is relative to the token, not the document. */
export interface SplitRef {
  word: string;
  startByte: number;
}

/** Returns true when a word should NOT be reported. */
export type KnownWordPredicate = (word: string) => boolean;

export function rangeKey(range: TextRange): string {
  return `${range.startByte}:${range.endByte}`;
}

/**
 * Word -> ranges multimap that refuses duplicate ranges for the same word.
 * `add` returns false when the range was already recorded.
 */
export class LocationCollector {
  private readonly words = new Map<string, Map<string, TextRange>>();

  public add(word: string, range: TextRange): boolean {
    let ranges = this.words.get(word);
    if (!ranges) {
      ranges = new Map();
      this.words.set(word, ranges);
    }
    const key = rangeKey(range);
    if (ranges.has(key)) return false;
    ranges.set(key, range);
    return true;
  }

  public get size(): number {
    return this.words.size;
  }

  public wordTexts(): string[] {
    return [...this.words.keys()];
  }

  public rangesFor(word: string): TextRange[] {
    const ranges = this.words.get(word);
    return ranges ? [...ranges.values()] : [];
  }

  /** Apply `isKnown` once per distinct word; keep the unknown ones. */
  public toLocations(isKnown: KnownWordPredicate): WordLocation[] {
    const out: WordLocation[] = [];
    for (const [word, ranges] of this.words) {
      if (isKnown(word)) continue;
      out.push({ word, locations: [...ranges.values()] });
    }
    return out;
  }
}
