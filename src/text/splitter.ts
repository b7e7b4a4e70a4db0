/**
 * splitter.ts
 *
 * Splits one compound token (`calculateUserAge`, `user_age`, `std::vector`,
 * `XMLHttpRequest`, `user10`) into dictionary-checkable sub-words.
 *
 * Boundaries, by character class transition:
 *   - lower -> upper                         fooBar   -> foo | Bar
 *   - upper -> upper, next is a-z            XMLHttp  -> XML | Http
 *   - digit <-> non-digit                    user10x  -> user | 10 | x
 *   - `_`, `.` and `:` always separate and never appear in output
 *
 * Only ASCII letters and digits drive a split; every other character counts
 * as lowercase, so multi-byte words stay whole. Sub-words made only of digits
 * are dropped. Offsets are UTF-8 bytes relative to the token start.
 */

import type { SplitRef } from "./types.js";
import { utf8Length } from "./offsets.js";

type CharClass = "lower" | "upper" | "digit" | "underscore" | "period" | "colon";

function classify(ch: string): CharClass {
  if (ch >= "A" && ch <= "Z") return "upper";
  if (ch >= "0" && ch <= "9") return "digit";
  if (ch === "_") return "underscore";
  if (ch === ".") return "period";
  if (ch === ":") return "colon";
  return "lower";
}

function isSeparator(cls: CharClass): boolean {
  return cls === "underscore" || cls === "period" || cls === "colon";
}

function isAsciiLower(ch: string | undefined): boolean {
  return ch !== undefined && ch >= "a" && ch <= "z";
}

function isAllDigits(word: string): boolean {
  return /^[0-9]+$/.test(word);
}

function shouldSplit(prev: CharClass | null, current: CharClass, next: string | undefined): boolean {
  if (prev === "lower" && current === "upper") return true;
  if (prev === "upper" && current === "upper") return isAsciiLower(next);
  if (prev !== null && (prev === "digit") !== (current === "digit")) return true;
  return isSeparator(current);
}

export function split(token: string): SplitRef[] {
  if (!token) return [];

  const chars = [...token];
  const out: SplitRef[] = [];

  let byte = 0;
  let unit = 0;
  let wordStartByte = 0;
  let wordStartUnit = 0;
  let prev: CharClass | null = null;

  const emit = (endUnit: number) => {
    const word = token.slice(wordStartUnit, endUnit);
    if (word && !isAllDigits(word)) out.push({ word, startByte: wordStartByte });
  };

  for (let i = 0; i < chars.length; i++) {
    const ch = chars[i];
    const cls = classify(ch);

    if (shouldSplit(prev, cls, chars[i + 1]) && unit > wordStartUnit) {
      emit(unit);
      wordStartByte = byte;
      wordStartUnit = unit;
    }

    byte += utf8Length(ch.codePointAt(0) ?? 0);
    unit += ch.length;

    // Separators are elided: the next word starts after them.
    if (isSeparator(cls)) {
      wordStartByte = byte;
      wordStartUnit = unit;
    }
    prev = cls;
  }

  if (wordStartUnit < token.length) emit(token.length);
  return out;
}
