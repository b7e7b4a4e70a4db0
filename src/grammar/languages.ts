/**
 * Supported languages and how a file or editor hint maps onto them.
 *
 * Each entry is plain data: the grammar wasm shipped by tree-sitter-wasms
 * (with its capture-query file under `queries/`) and the extra word lists
 * that apply to code in that language.
 */

import path from "node:path";

export const LANGUAGE_TYPES = [
  "text",
  "bash",
  "c",
  "cpp",
  "csharp",
  "css",
  "go",
  "html",
  "java",
  "javascript",
  "lua",
  "php",
  "python",
  "ruby",
  "rust",
  "toml",
  "tsx",
  "typescript",
  "yaml",
] as const;

export type LanguageType = (typeof LANGUAGE_TYPES)[number];
export type CodeLanguage = Exclude<LanguageType, "text">;

export interface LanguageSetting {
  /**
   * File name inside tree-sitter-wasms/out; null checks the language as plain
   * text. Ruby and Bash are null: their external scanners import C library
   * functions (`iswupper`, `isalpha`, `strcmp`) that the web-tree-sitter
   * runtime does not export, and parsing throws once one is reached.
   */
  wasm: string | null;
  extensions: readonly string[];
  /** Editor language ids and common short names. */
  aliases: readonly string[];
  /** Word lists under wordlists/languages. */
  dictionaryIds: readonly string[];
}

export const LANGUAGE_SETTINGS: Readonly<Record<CodeLanguage, LanguageSetting>> = {
  bash: {
    wasm: null,
    extensions: ["sh", "bash", "zsh"],
    aliases: ["shellscript", "shell", "sh", "zsh"],
    dictionaryIds: ["bash"],
  },
  c: {
    wasm: "tree-sitter-c.wasm",
    extensions: ["c", "h"],
    aliases: [],
    dictionaryIds: ["c"],
  },
  cpp: {
    wasm: "tree-sitter-cpp.wasm",
    extensions: ["cpp", "cc", "cxx", "c++", "hpp", "hh", "hxx"],
    aliases: ["c++"],
    dictionaryIds: ["cpp", "c"],
  },
  csharp: {
    wasm: "tree-sitter-c_sharp.wasm",
    extensions: ["cs"],
    aliases: ["c#", "cs", "c_sharp"],
    dictionaryIds: ["csharp"],
  },
  css: {
    wasm: "tree-sitter-css.wasm",
    extensions: ["css"],
    aliases: [],
    dictionaryIds: ["css"],
  },
  go: {
    wasm: "tree-sitter-go.wasm",
    extensions: ["go"],
    aliases: ["golang"],
    dictionaryIds: ["go"],
  },
  html: {
    wasm: "tree-sitter-html.wasm",
    extensions: ["html", "htm"],
    aliases: [],
    dictionaryIds: ["html"],
  },
  java: {
    wasm: "tree-sitter-java.wasm",
    extensions: ["java"],
    aliases: [],
    dictionaryIds: ["java"],
  },
  javascript: {
    wasm: "tree-sitter-javascript.wasm",
    extensions: ["js", "mjs", "cjs", "jsx"],
    aliases: ["javascriptreact", "js", "jsx"],
    dictionaryIds: ["javascript"],
  },
  lua: {
    wasm: "tree-sitter-lua.wasm",
    extensions: ["lua"],
    aliases: [],
    dictionaryIds: ["lua"],
  },
  php: {
    wasm: "tree-sitter-php.wasm",
    extensions: ["php"],
    aliases: [],
    dictionaryIds: ["php"],
  },
  python: {
    wasm: "tree-sitter-python.wasm",
    extensions: ["py", "pyi"],
    aliases: ["py"],
    dictionaryIds: ["python"],
  },
  ruby: {
    wasm: null,
    extensions: ["rb", "rake", "gemspec"],
    aliases: ["rb"],
    dictionaryIds: ["ruby"],
  },
  rust: {
    wasm: "tree-sitter-rust.wasm",
    extensions: ["rs"],
    aliases: ["rs"],
    dictionaryIds: ["rust"],
  },
  toml: {
    wasm: "tree-sitter-toml.wasm",
    extensions: ["toml"],
    aliases: [],
    dictionaryIds: ["toml"],
  },
  tsx: {
    wasm: "tree-sitter-tsx.wasm",
    extensions: ["tsx"],
    aliases: ["typescriptreact"],
    dictionaryIds: ["typescript", "javascript"],
  },
  typescript: {
    wasm: "tree-sitter-typescript.wasm",
    extensions: ["ts", "mts", "cts"],
    aliases: ["ts"],
    dictionaryIds: ["typescript", "javascript"],
  },
  yaml: {
    wasm: "tree-sitter-yaml.wasm",
    extensions: ["yaml", "yml"],
    aliases: ["yml"],
    dictionaryIds: ["yaml"],
  },
};

const TEXT_ALIASES = new Set(["text", "plaintext", "txt", "markdown", "md"]);

const BY_EXTENSION = new Map<string, CodeLanguage>();
const BY_ID = new Map<string, LanguageType>();

for (const language of LANGUAGE_TYPES) {
  BY_ID.set(language, language);
  if (language === "text") continue;
  const setting = LANGUAGE_SETTINGS[language];
  for (const ext of setting.extensions) BY_EXTENSION.set(ext, language);
  for (const alias of setting.aliases) BY_ID.set(alias, language);
}
for (const alias of TEXT_ALIASES) BY_ID.set(alias, "text");

export function isCodeLanguage(language: LanguageType): language is CodeLanguage {
  return language !== "text";
}

/** Language for an editor id or short name; null when unknown. */
export function languageFromId(id: string): LanguageType | null {
  return BY_ID.get(id.trim().toLowerCase()) ?? null;
}

/** Language from the file extension, `text` when nothing matches. */
export function languageFromFilename(filePath: string): LanguageType {
  const ext = path.extname(filePath).slice(1).toLowerCase();
  if (!ext) return "text";
  return BY_EXTENSION.get(ext) ?? "text";
}

/** Explicit hint wins, then the path's extension, then `text`. */
export function resolveLanguage(hint?: string | null, filePath?: string | null): LanguageType {
  if (hint) {
    const fromHint = languageFromId(hint);
    if (fromHint) return fromHint;
  }
  return filePath ? languageFromFilename(filePath) : "text";
}

/** Languages checked through a tree-sitter grammar. */
export function grammarLanguages(): CodeLanguage[] {
  return LANGUAGE_TYPES.filter(isCodeLanguage).filter((language) => LANGUAGE_SETTINGS[language].wasm !== null);
}

export function languageDictionaryIds(language: LanguageType): readonly string[] {
  return isCodeLanguage(language) ? LANGUAGE_SETTINGS[language].dictionaryIds : [];
}
