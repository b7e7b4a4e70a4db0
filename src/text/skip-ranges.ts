/**
 * skip-ranges.ts
 *
 * Byte ranges of text that must never be treated as words: URLs, colours,
 * emails, paths, ids and hashes. Ranges from every pattern are collected,
 * sorted and merged so downstream code only sees disjoint intervals.
 */

import { TypolensError, describeError, isTypolensError } from "../errors/index.js";
import { createLogger } from "../logging/index.js";
import { Utf8OffsetMap } from "./offsets.js";
import type { SkipRange } from "./types.js";

const log = createLogger("skip");

interface SkipRule {
  pattern: RegExp;
  reason: string;
}

const DEFAULT_SKIP_RULES: readonly SkipRule[] = Object.freeze([
  // URLs (http / https)
  { pattern: /https?:\/\/[^\s]+/g, reason: "url" },
  // Hex colours (#fff, #123456, #deadbeef)
  { pattern: /#[0-9a-fA-F]{3,8}/g, reason: "hex_color" },
  { pattern: /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g, reason: "email" },
  // Unix paths (anything from a slash up to whitespace)
  { pattern: /\/[^\s]*/g, reason: "unix_path" },
  // Windows paths with a drive letter
  { pattern: /[A-Za-z]:\\[^\s]*/g, reason: "windows_path" },
  { pattern: /[0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{12}/g, reason: "uuid" },
  // Base64 needs its padding, otherwise long identifiers would match
  { pattern: /[A-Za-z0-9+/]{20,}={1,2}/g, reason: "base64" },
  // Commit-ish hashes
  { pattern: /\b[0-9a-fA-F]{7,40}\b/g, reason: "hex_hash" },
  // Markdown links; the target must not contain spaces
  { pattern: /\[([^\]]+)\]\([^\s)]+\)/g, reason: "markdown_link" },
]);

/** Process-wide, read-only default pattern table. */
export const DEFAULT_SKIP_PATTERNS: readonly RegExp[] = Object.freeze(DEFAULT_SKIP_RULES.map((rule) => rule.pattern));

const DEFAULT_PATTERN_SET: ReadonlySet<RegExp> = new Set(DEFAULT_SKIP_PATTERNS);

export function isDefaultSkipPattern(pattern: RegExp): boolean {
  return DEFAULT_PATTERN_SET.has(pattern);
}

/**
 * Compile user-supplied patterns. Invalid sources are logged and dropped.
 * `gm` lets `^`/`$` address single lines, which is how ignore rules are
 * usually written.
 */
/** Compiles one user pattern with the `gm` flags; a bad source raises INVALID_PATTERN. */
export function compileSkipPattern(source: string): RegExp {
  try {
    return new RegExp(source, "gm");
  } catch (error) {
    throw new TypolensError({
      code: "INVALID_PATTERN",
      message: `Invalid regex pattern '${source}': ${describeError(error)}`,
      cause: error,
    });
  }
}

export function compileSkipPatterns(sources: readonly string[]): RegExp[] {
  const out: RegExp[] = [];
  for (const source of sources) {
    try {
      out.push(compileSkipPattern(source));
    } catch (error) {
      if (!isTypolensError(error)) throw error;
      log.warn(`Ignoring pattern: ${error.message}`, { code: error.code });
    }
  }
  return out;
}

function withGlobalFlag(pattern: RegExp): RegExp {
  return pattern.global ? pattern : new RegExp(pattern.source, `${pattern.flags}g`);
}

export function mergeRanges(ranges: SkipRange[]): SkipRange[] {
  if (ranges.length === 0) return [];
  const sorted = [...ranges].sort((a, b) => a.startByte - b.startByte || a.endByte - b.endByte);
  const merged: SkipRange[] = [];
  let current = { ...sorted[0] };
  for (let i = 1; i < sorted.length; i++) {
    const range = sorted[i];
    if (range.startByte <= current.endByte) {
      current.endByte = Math.max(current.endByte, range.endByte);
    } else {
      merged.push(current);
      current = { ...range };
    }
  }
  merged.push(current);
  return merged;
}

/**
 * Collect every match of every pattern as a byte range, then sort and merge.
 * Empty matches are ignored.
 */
export function buildSkipRanges(
  text: string,
  patterns: readonly RegExp[],
  offsets: Utf8OffsetMap = new Utf8OffsetMap(text),
): SkipRange[] {
  if (!text || patterns.length === 0) return [];
  const ranges: SkipRange[] = [];
  for (const pattern of patterns) {
    for (const match of text.matchAll(withGlobalFlag(pattern))) {
      if (match[0].length === 0) continue;
      const start = match.index ?? 0;
      ranges.push({
        startByte: offsets.toByte(start),
        endByte: offsets.toByte(start + match[0].length),
      });
    }
  }
  return mergeRanges(ranges);
}

/**
 * True when the span [startByte, endByte) starts inside a range, ends inside
 * one, or fully contains one.
 */
export function isSkipped(ranges: readonly SkipRange[], startByte: number, endByte: number): boolean {
  const last = endByte - 1;
  return ranges.some(
    (range) =>
      (startByte >= range.startByte && startByte < range.endByte) ||
      (last >= range.startByte && last < range.endByte) ||
      (startByte < range.startByte && endByte > range.endByte),
  );
}

/** Half-open interval intersection, used to drop whole syntax nodes. */
export function intersectsAny(ranges: readonly SkipRange[], startByte: number, endByte: number): boolean {
  return ranges.some((range) => startByte < range.endByte && endByte > range.startByte);
}
