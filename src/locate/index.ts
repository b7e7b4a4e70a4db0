import { isTypolensError } from "../errors/index.js";
import { findLocationsInTree } from "../grammar/tokenizer.js";
import type { LanguageType } from "../grammar/languages.js";
import type { GrammarLookup } from "../grammar/types.js";
import { TextTokenizer } from "../text/tokenizer.js";
import type { KnownWordPredicate, WordLocation } from "../text/types.js";

/**
 * Single entry point from text to unknown-word locations. `text` goes
 * straight to the plain-text tokenizer; any other language uses its grammar
 * when `grammars` has one loaded and falls back to plain text otherwise.
 *
 * A grammar that fails on a document is disabled through `grammars` and the
 * document is checked as plain text.
 */
export function findLocations(
  text: string,
  language: LanguageType,
  isKnown: KnownWordPredicate,
  skipPatterns: readonly RegExp[],
  grammars?: GrammarLookup,
): WordLocation[] {
  const grammar = language !== "text" ? grammars?.get(language) : undefined;
  if (grammar && grammars) {
    try {
      return findLocationsInTree(text, grammar, isKnown, skipPatterns);
    } catch (error) {
      if (!isTypolensError(error) || error.code !== "GRAMMAR_PARSE") throw error;
      grammars.disable(language, error);
    }
  }
  return new TextTokenizer(text, skipPatterns).processWordsWithCheck(isKnown);
}
