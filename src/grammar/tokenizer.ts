/**
 * Grammar-aware tokenization: parse, run the capture queries, and feed each
 * captured node's text through the plain-text tokenizer with offsets rebased
 * onto the whole document.
 *
 * User skip patterns apply at the document level and drop whole nodes. The
 * default pattern table applies again inside each node.
 */

import { TypolensError, describeError } from "../errors/index.js";
import { createLogger } from "../logging/index.js";
import { Utf8OffsetMap } from "../text/offsets.js";
import { DEFAULT_SKIP_PATTERNS, buildSkipRanges, intersectsAny, isDefaultSkipPattern } from "../text/skip-ranges.js";
import { TextTokenizer } from "../text/tokenizer.js";
import { LocationCollector, type KnownWordPredicate, type WordLocation } from "../text/types.js";
import type { LoadedGrammar, SyntaxTreeLike } from "./types.js";

const log = createLogger("grammar");

export function findLocationsInTree(
  text: string,
  grammar: LoadedGrammar,
  isKnown: KnownWordPredicate,
  skipPatterns: readonly RegExp[],
): WordLocation[] {
  const offsets = new Utf8OffsetMap(text);
  const lineRanges = buildSkipRanges(
    text,
    skipPatterns.filter((pattern) => !isDefaultSkipPattern(pattern)),
    offsets,
  );

  const collector = new LocationCollector();
  let duplicates = 0;

  for (const span of captureSpans(text, grammar)) {
    const startByte = offsets.toByte(span.startIndex);
    const endByte = offsets.toByte(span.endIndex);
    if (startByte >= endByte) continue;
    if (intersectsAny(lineRanges, startByte, endByte)) continue;

    const nodeText = text.slice(span.startIndex, span.endIndex);
    for (const { word, range } of new TextTokenizer(nodeText, DEFAULT_SKIP_PATTERNS).words(startByte)) {
      if (!collector.add(word, range)) duplicates += 1;
    }
  }

  if (duplicates > 0) {
    // Two captures covering the same span; the query should be tightened.
    log.debug(`Dropped ${duplicates} duplicate location(s) in ${grammar.language} capture results`);
  }
  return collector.toLocations(isKnown);
}

interface NodeSpan {
  startIndex: number;
  endIndex: number;
}

/**
 * Parses and runs every query, copying node offsets out before the tree is
 * deleted. Any failure inside the grammar surfaces as GRAMMAR_PARSE.
 */
function captureSpans(text: string, grammar: LoadedGrammar): NodeSpan[] {
  let tree: SyntaxTreeLike;
  try {
    tree = grammar.parser.parse(text);
  } catch (error) {
    throw parseFailure(grammar, error);
  }

  try {
    const spans: NodeSpan[] = [];
    for (const query of grammar.queries) {
      for (const { node } of query.captures(tree.rootNode)) {
        spans.push({ startIndex: node.startIndex, endIndex: node.endIndex });
      }
    }
    return spans;
  } catch (error) {
    throw parseFailure(grammar, error);
  } finally {
    tree.delete();
  }
}

function parseFailure(grammar: LoadedGrammar, error: unknown): TypolensError {
  return new TypolensError({
    code: "GRAMMAR_PARSE",
    message: `The ${grammar.language} grammar failed on this document: ${describeError(error)}`,
    cause: error,
  });
}
