/**
 * Capture-query sources and their compilation.
 *
 * Query files are written against the grammar versions tree-sitter-wasms
 * ships, but node names drift between grammar releases. When a file fails
 * to compile as a whole it is split into its top-level patterns and each is
 * compiled on its own; the ones the grammar rejects are dropped with a
 * warning, so one renamed node costs one pattern instead of the language.
 */

import { createLogger } from "../logging/index.js";

const log = createLogger("grammar");

/**
 * Split a query source into top-level patterns. A pattern is one balanced
 * `(...)`, `[...]` or string group plus whatever follows it at depth zero
 * (captures, quantifiers). `;` comments are removed.
 */
export function splitQueryPatterns(source: string): string[] {
  const patterns: string[] = [];
  let current = "";
  let depth = 0;
  let closed = false;

  const flush = () => {
    const pattern = current.trim();
    if (pattern) patterns.push(pattern);
    current = "";
    closed = false;
  };

  let i = 0;
  while (i < source.length) {
    const ch = source[i];

    if (ch === ";") {
      const newline = source.indexOf("\n", i);
      i = newline === -1 ? source.length : newline + 1;
      current += "\n";
      continue;
    }

    if (ch === '"') {
      if (depth === 0 && closed) flush();
      let j = i + 1;
      while (j < source.length && source[j] !== '"') {
        j += source[j] === "\\" ? 2 : 1;
      }
      current += source.slice(i, j + 1);
      i = j + 1;
      if (depth === 0) closed = true;
      continue;
    }

    if (ch === "(" || ch === "[") {
      if (depth === 0 && closed) flush();
      depth += 1;
    } else if (ch === ")" || ch === "]") {
      depth = Math.max(0, depth - 1);
      if (depth === 0) closed = true;
    }
    current += ch;
    i += 1;
  }

  flush();
  return patterns;
}

/**
 * Compile `source` with `compile`. Returns one query when the whole source
 * compiles, otherwise one query per surviving pattern (possibly none).
 */
export function compileCaptureQueries<Q>(compile: (source: string) => Q, source: string, label: string): Q[] {
  try {
    return [compile(source)];
  } catch (error) {
    log.debug(`Query for ${label} failed as a whole, compiling pattern by pattern`, {
      error: error instanceof Error ? error.message : String(error),
    });
  }

  const queries: Q[] = [];
  for (const pattern of splitQueryPatterns(source)) {
    try {
      queries.push(compile(pattern));
    } catch (error) {
      log.warn(`Dropping ${label} query pattern the grammar rejects`, {
        pattern,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
  return queries;
}
