import type { LanguageType } from "./languages.js";

/**
 * The slice of the web-tree-sitter surface the tokenizer needs. Indices are
 * UTF-16 code units into the parsed string.
 */
export interface SyntaxNodeLike {
  readonly type: string;
  readonly startIndex: number;
  readonly endIndex: number;
}

export interface CaptureLike {
  readonly name: string;
  readonly node: SyntaxNodeLike;
}

export interface CaptureQuery {
  captures(node: SyntaxNodeLike): CaptureLike[];
}

export interface SyntaxTreeLike {
  readonly rootNode: SyntaxNodeLike;
  delete(): void;
}

export interface SourceParser {
  parse(input: string): SyntaxTreeLike;
}

/** A parser bound to one language plus its compiled capture queries. */
export interface LoadedGrammar {
  readonly language: LanguageType;
  readonly parser: SourceParser;
  readonly queries: readonly CaptureQuery[];
}

/** Synchronous view over grammars that have already been loaded. */
export interface GrammarLookup {
  get(language: LanguageType): LoadedGrammar | undefined;
  /** Stop handing out a grammar that failed at parse time. */
  disable(language: LanguageType, error: unknown): void;
}
