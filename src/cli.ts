#!/usr/bin/env node
import fs from "node:fs";
import { readFile } from "node:fs/promises";
import { pathToFileURL } from "node:url";
import { parseArgs } from "node:util";

import { SpellCheckService } from "./checker/service.js";
import { loadConfig } from "./config/index.js";
import type { SpellConfig } from "./config/types.js";
import { asTypolensError, describeError } from "./errors/index.js";
import { setLogLevel } from "./logging/index.js";
import { byteRangeToPosition } from "./text/offsets.js";
import type { WordLocation } from "./text/types.js";

const USAGE = `Usage: typolens [options] <files...>

Options:
  --language <id>    Check every file as this language (default: by extension)
  --config-dir <dir> Start the project config search here (default: cwd)
  --json             Print findings as JSON
  --verbose          Log at debug level
  -h, --help         Show this help`;

export const EXIT_CLEAN = 0;
export const EXIT_FINDINGS = 1;
export const EXIT_ERROR = 2;

export interface CliIo {
  stdout(line: string): void;
  stderr(line: string): void;
}

export interface CliDeps {
  io?: CliIo;
  env?: NodeJS.ProcessEnv;
  createService?: (config: SpellConfig) => SpellCheckService;
}

/** One reported occurrence; line and column are 1-based, column in UTF-16 units. */
export interface Finding {
  path: string;
  word: string;
  line: number;
  column: number;
  startByte: number;
  endByte: number;
}

const consoleIo: CliIo = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
};

export function toFindings(filePath: string, text: string, results: readonly WordLocation[]): Finding[] {
  const findings: Finding[] = [];
  for (const { word, locations } of results) {
    for (const range of locations) {
      const { start } = byteRangeToPosition(text, range);
      findings.push({
        path: filePath,
        word,
        line: start.line + 1,
        column: start.character + 1,
        startByte: range.startByte,
        endByte: range.endByte,
      });
    }
  }
  return findings.sort((a, b) => a.startByte - b.startByte || a.word.localeCompare(b.word));
}

export function formatFinding(finding: Finding): string {
  return `${finding.path}:${finding.line}:${finding.column}: ${finding.word}`;
}

function parseCliArgs(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    allowPositionals: true,
    options: {
      language: { type: "string" },
      "config-dir": { type: "string" },
      json: { type: "boolean", default: false },
      verbose: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });
}

/** Returns the process exit code: 0 clean, 1 findings, 2 usage or read errors. */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const io = deps.io ?? consoleIo;

  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    io.stderr(describeError(error));
    io.stderr(USAGE);
    return EXIT_ERROR;
  }

  const { values, positionals } = parsed;
  if (values.help) {
    io.stdout(USAGE);
    return EXIT_CLEAN;
  }
  if (positionals.length === 0) {
    io.stderr(USAGE);
    return EXIT_ERROR;
  }
  if (values.verbose) setLogLevel("debug");

  const config = loadConfig({ startDir: values["config-dir"], env: deps.env });
  const service = deps.createService ? deps.createService(config) : new SpellCheckService({ config });

  const findings: Finding[] = [];
  let failed = false;
  for (const filePath of positionals) {
    try {
      const text = await readFile(filePath, "utf8").catch((error: unknown) => {
        throw asTypolensError(error, { code: "FILE_READ", message: `Failed to read ${filePath}`, path: filePath });
      });
      const results = await service.spellCheck(text, values.language, filePath);
      findings.push(...toFindings(filePath, text, results));
    } catch (error) {
      failed = true;
      io.stderr(`typolens: ${describeError(error)}`);
    }
  }

  if (values.json) io.stdout(JSON.stringify(findings, null, 2));
  else for (const finding of findings) io.stdout(formatFinding(finding));

  if (failed) return EXIT_ERROR;
  return findings.length > 0 ? EXIT_FINDINGS : EXIT_CLEAN;
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return import.meta.url === pathToFileURL(fs.realpathSync(script)).href;
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(error);
      process.exitCode = EXIT_ERROR;
    });
}
