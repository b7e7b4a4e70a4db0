import assert from "node:assert/strict";
import test from "node:test";

import { setLogLevel } from "../logging/index.js";
import { compileCaptureQueries, splitQueryPatterns } from "./queries.js";

setLogLevel("silent");

const SOURCE = [
  "; leading comment",
  "(comment) @comment",
  "(string_literal) @string ; trailing comment",
  "[",
  "  (identifier)",
  "  (field_identifier)",
  "] @identifier",
  '((identifier) @id (#match? @id "^[a-z;(]"))',
  "",
].join("\n");

test("splitQueryPatterns returns top-level patterns without comments", () => {
  assert.deepEqual(splitQueryPatterns(SOURCE), [
    "(comment) @comment",
    "(string_literal) @string",
    "[\n  (identifier)\n  (field_identifier)\n] @identifier",
    '((identifier) @id (#match? @id "^[a-z;(]"))',
  ]);
});

test("splitQueryPatterns handles empty and comment-only input", () => {
  assert.deepEqual(splitQueryPatterns(""), []);
  assert.deepEqual(splitQueryPatterns("; nothing here\n;; still nothing"), []);
});

test("a query that compiles as a whole is compiled once", () => {
  const seen: string[] = [];
  const queries = compileCaptureQueries(
    (source) => {
      seen.push(source);
      return source.length;
    },
    SOURCE,
    "c",
  );
  assert.deepEqual(queries, [SOURCE.length]);
  assert.deepEqual(seen, [SOURCE]);
});

test("patterns the grammar rejects are dropped and the rest survive", () => {
  const compile = (source: string) => {
    if (source.includes("field_identifier")) throw new Error(`Bad node name: field_identifier`);
    return source;
  };
  const queries = compileCaptureQueries(compile, SOURCE, "c");
  assert.deepEqual(queries, [
    "(comment) @comment",
    "(string_literal) @string",
    '((identifier) @id (#match? @id "^[a-z;(]"))',
  ]);
});
