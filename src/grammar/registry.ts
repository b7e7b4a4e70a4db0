/**
 * registry.ts
 *
 * Loads tree-sitter grammars (wasm from tree-sitter-wasms) and their capture
 * queries on first use and keeps them for the process lifetime.
 *
 * - `Parser.init()` runs once.
 * - Loads are serialized; web-tree-sitter keeps global state that breaks when
 *   several wasm modules are instantiated in parallel.
 * - Concurrent callers for one language share the in-flight promise.
 * - A language that cannot be loaded resolves to null and stays null; the
 *   caller falls back to plain-text tokenization.
 * - A grammar that throws while parsing is disabled the same way.
 */

import { readFile } from "node:fs/promises";
import { createRequire } from "node:module";
import path from "node:path";
import { fileURLToPath } from "node:url";
import Parser from "web-tree-sitter";

import { TypolensError, describeError } from "../errors/index.js";
import { createLogger } from "../logging/index.js";
import { LANGUAGE_SETTINGS, isCodeLanguage, type CodeLanguage, type LanguageType } from "./languages.js";
import { compileCaptureQueries } from "./queries.js";
import type { GrammarLookup, LoadedGrammar } from "./types.js";

const log = createLogger("grammar");
const require = createRequire(import.meta.url);

export const DEFAULT_QUERIES_DIR = fileURLToPath(new URL("../../queries/", import.meta.url));

let initPromise: Promise<void> | null = null;

function initParser(): Promise<void> {
  if (!initPromise) {
    initPromise = Parser.init().catch((error: unknown) => {
      initPromise = null;
      throw error;
    });
  }
  return initPromise;
}

function defaultWasmDir(): string {
  return path.join(path.dirname(require.resolve("tree-sitter-wasms/package.json")), "out");
}

export interface GrammarRegistryOptions {
  /** Directory holding `<language>.scm` capture queries. */
  queriesDir?: string;
  /** Directory holding `tree-sitter-<name>.wasm` files. Defaults to tree-sitter-wasms/out. */
  wasmDir?: string;
}

export class GrammarRegistry implements GrammarLookup {
  private readonly loaded = new Map<LanguageType, LoadedGrammar | null>();
  private readonly inFlight = new Map<LanguageType, Promise<LoadedGrammar | null>>();
  private queue: Promise<unknown> = Promise.resolve();
  private readonly queriesDir: string;
  private readonly wasmDir: string | undefined;

  constructor(options: GrammarRegistryOptions = {}) {
    this.queriesDir = options.queriesDir ?? DEFAULT_QUERIES_DIR;
    this.wasmDir = options.wasmDir;
  }

  public get(language: LanguageType): LoadedGrammar | undefined {
    return this.loaded.get(language) ?? undefined;
  }

  public async load(language: LanguageType): Promise<LoadedGrammar | null> {
    if (!isCodeLanguage(language)) return null;
    const cached = this.loaded.get(language);
    if (cached !== undefined) return cached;

    const wasm = LANGUAGE_SETTINGS[language].wasm;
    if (wasm === null) {
      log.debug(`No grammar for ${language}, using plain text`);
      this.loaded.set(language, null);
      return null;
    }

    const pending = this.inFlight.get(language);
    if (pending) return pending;

    const run = this.queue.then(() => this.loadUncached(language, wasm));
    this.queue = run.catch(() => undefined);
    const promise = run
      .catch((error: unknown) => {
        log.warn(`Grammar for ${language} unavailable, using plain text`, { error: describeError(error) });
        return null;
      })
      .then((grammar) => {
        this.loaded.set(language, grammar);
        this.inFlight.delete(language);
        return grammar;
      });
    this.inFlight.set(language, promise);
    return promise;
  }

  /** Called after a parse failure; later lookups for `language` miss. */
  public disable(language: LanguageType, error: unknown): void {
    if (!this.loaded.get(language)) return;
    this.loaded.set(language, null);
    log.warn(`Grammar for ${language} failed while parsing, using plain text`, { error: describeError(error) });
  }

  private async loadUncached(language: CodeLanguage, wasm: string): Promise<LoadedGrammar> {
    await initParser();

    const wasmPath = path.join(this.wasmDir ?? defaultWasmDir(), wasm);
    const grammar = await Parser.Language.load(wasmPath).catch((error: unknown) => {
      throw new TypolensError({
        code: "GRAMMAR_LOAD",
        message: `Failed to load grammar ${wasmPath}`,
        path: wasmPath,
        cause: error,
      });
    });

    const queryPath = path.join(this.queriesDir, `${language}.scm`);
    const source = await readFile(queryPath, "utf8").catch((error: unknown) => {
      throw new TypolensError({
        code: "GRAMMAR_LOAD",
        message: `Failed to read query ${queryPath}`,
        path: queryPath,
        cause: error,
      });
    });

    const queries = compileCaptureQueries((pattern) => grammar.query(pattern), source, language);
    if (queries.length === 0) {
      throw new TypolensError({
        code: "GRAMMAR_LOAD",
        message: `No usable capture patterns in ${queryPath}`,
        path: queryPath,
      });
    }

    const parser = new Parser();
    parser.setLanguage(grammar);
    log.debug(`Loaded ${language} grammar`, { queries: queries.length });
    return { language, parser, queries };
  }
}
