/**
 * tokenizer.ts
 *
 * Language-agnostic tokenizer. Text is segmented on Unicode word boundaries
 * (UAX #29 via Intl.Segmenter, so `don't` stays one token), skip ranges are
 * applied, and every surviving token goes through the compound splitter.
 * Results are keyed by exact word text; the known-word predicate runs once
 * per distinct word.
 */

import { Utf8OffsetMap } from "./offsets.js";
import { buildSkipRanges, isSkipped } from "./skip-ranges.js";
import { split } from "./splitter.js";
import { LocationCollector, type KnownWordPredicate, type TextRange, type WordLocation } from "./types.js";

const segmenter = new Intl.Segmenter("en", { granularity: "word" });
const ALPHABETIC = /\p{Alphabetic}/u;

export interface LocatedWord {
  word: string;
  range: TextRange;
}

export class TextTokenizer {
  private readonly offsets: Utf8OffsetMap;
  private collected: LocationCollector | null = null;

  constructor(
    private readonly text: string,
    private readonly skipPatterns: readonly RegExp[],
  ) {
    this.offsets = new Utf8OffsetMap(text);
  }

  /**
   * Every split word with its byte range, in document order. `baseByte` is
   * added to each range so callers tokenizing a slice get absolute offsets.
   */
  public *words(baseByte = 0): Generator<LocatedWord> {
    if (!this.text) return;
    const skipRanges = buildSkipRanges(this.text, this.skipPatterns, this.offsets);

    for (const { segment, index } of segmenter.segment(this.text)) {
      if (!ALPHABETIC.test(segment)) continue;
      const tokenStart = this.offsets.toByte(index);
      const tokenEnd = this.offsets.toByte(index + segment.length);
      if (isSkipped(skipRanges, tokenStart, tokenEnd)) continue;

      for (const ref of split(segment)) {
        const startByte = baseByte + tokenStart + ref.startByte;
        yield {
          word: ref.word,
          range: { startByte, endByte: startByte + Buffer.byteLength(ref.word, "utf8") },
        };
      }
    }
  }

  public collectWords(): LocationCollector {
    if (this.collected) return this.collected;
    const collector = new LocationCollector();
    for (const { word, range } of this.words()) collector.add(word, range);
    this.collected = collector;
    return collector;
  }

  public processWordsWithCheck(isKnown: KnownWordPredicate): WordLocation[] {
    return this.collectWords().toLocations(isKnown);
  }

  /** Every word in the text, known or not. */
  public extractWords(): WordLocation[] {
    return this.processWordsWithCheck(() => false);
  }
}
