import fs from "node:fs";
import { mkdir, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import type { CustomDictionaryEntry } from "../dictionaries/types.js";
import { TypolensError, describeError } from "../errors/index.js";
import { createLogger } from "../logging/index.js";
import {
  SettingsView,
  cloneSettings,
  defaultSettings,
  insertIgnore,
  insertWord,
  mergeSettings,
  parseSettingsJson,
  serializeSettings,
} from "./settings.js";
import type { ConfigSettings, SpellConfig } from "./types.js";

const log = createLogger("config");

export const PROJECT_CONFIG_FILES = ["typolens.json", ".typolens.json"] as const;
export const GLOBAL_CONFIG_FILE = "typolens.json";

function toIntInRange(value: string | undefined, fallback: number, minValue: number, maxValue: number): number {
  if (!value) return fallback;
  const parsed = Math.floor(Number(value));
  if (!Number.isFinite(parsed)) return fallback;
  return Math.max(minValue, Math.min(maxValue, parsed));
}

function splitCsv(value: string | undefined, fallback: string[]): string[] {
  if (!value || !value.trim()) return fallback;
  return value
    .split(",")
    .map((item) => item.trim().toLowerCase())
    .filter(Boolean);
}

/** TYPOLENS_MIN_WORD_LENGTH and TYPOLENS_DICTIONARIES win over both files. */
function applyEnvOverrides(settings: ConfigSettings, env: NodeJS.ProcessEnv): ConfigSettings {
  return {
    ...settings,
    minWordLength: toIntInRange(env.TYPOLENS_MIN_WORD_LENGTH, settings.minWordLength, 1, 1_000),
    dictionaries: splitCsv(env.TYPOLENS_DICTIONARIES, settings.dictionaries),
  };
}

export function findGlobalConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  if (env.TYPOLENS_GLOBAL_CONFIG) return path.resolve(env.TYPOLENS_GLOBAL_CONFIG);
  const base = env.XDG_CONFIG_HOME ? env.XDG_CONFIG_HOME : path.join(os.homedir(), ".config");
  return path.join(base, "typolens", GLOBAL_CONFIG_FILE);
}

/** First project config file found walking up from `startDir`, or null. */
export function findProjectConfig(startDir: string): string | null {
  let dir = path.resolve(startDir);
  for (;;) {
    for (const name of PROJECT_CONFIG_FILES) {
      const candidate = path.join(dir, name);
      if (fs.existsSync(candidate) && fs.statSync(candidate).isFile()) return candidate;
    }
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

/** Missing file -> null. Unreadable or invalid file -> logged, treated as empty. */
function readSettingsFile(filePath: string | null): ConfigSettings | null {
  if (!filePath || !fs.existsSync(filePath)) return null;
  try {
    return parseSettingsJson(fs.readFileSync(filePath, "utf8"), filePath);
  } catch (error) {
    log.warn(`Ignoring config ${filePath}`, { error: describeError(error) });
    return defaultSettings();
  }
}

async function writeSettingsFile(filePath: string, settings: ConfigSettings): Promise<void> {
  try {
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, serializeSettings(settings), "utf8");
  } catch (error) {
    throw new TypolensError({
      code: "CONFIG_WRITE",
      message: `Failed to write ${filePath}: ${describeError(error)}`,
      path: filePath,
      cause: error,
    });
  }
}

export interface FileConfigOptions {
  /** Where the upward search for a project file starts. Defaults to cwd. */
  startDir?: string;
  /** Global settings file; null disables it. Defaults to findGlobalConfigPath(). */
  globalConfigPath?: string | null;
  env?: NodeJS.ProcessEnv;
}

/**
 * Settings backed by a project file and an optional global file. When no
 * project file exists, writes create `typolens.json` in the start directory.
 */
export class FileConfig implements SpellConfig {
  public readonly projectConfigPath: string;
  public readonly globalConfigPath: string | null;
  public readonly projectRoot: string;

  private project: ConfigSettings | null = null;
  private global: ConfigSettings | null = null;
  private view: SettingsView;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: FileConfigOptions = {}) {
    const startDir = path.resolve(options.startDir ?? process.cwd());
    this.env = options.env ?? process.env;
    const found = findProjectConfig(startDir);
    this.projectConfigPath = found ?? path.join(startDir, PROJECT_CONFIG_FILES[0]);
    this.projectRoot = path.dirname(this.projectConfigPath);
    this.globalConfigPath =
      options.globalConfigPath === undefined ? findGlobalConfigPath(this.env) : options.globalConfigPath;

    if (found) log.debug(`Using project config ${found}`);
    else log.info("No project config found, using defaults");

    this.view = this.readAll();
  }

  /** Re-read both files. Returns true when the effective settings changed. */
  public reload(): boolean {
    const before = JSON.stringify(this.view.settings);
    this.view = this.readAll();
    return JSON.stringify(this.view.settings) !== before;
  }

  public get settings(): ConfigSettings {
    return cloneSettings(this.view.settings);
  }

  public async addWord(word: string): Promise<boolean> {
    const settings = cloneSettings(this.project ?? defaultSettings());
    if (!insertWord(settings, word)) return false;
    await writeSettingsFile(this.projectConfigPath, settings);
    this.project = settings;
    this.rebuild();
    return true;
  }

  public async addWordGlobal(word: string): Promise<boolean> {
    const target = this.globalConfigPath;
    if (!target) {
      throw new TypolensError({ code: "CONFIG_WRITE", message: "No global config path is configured" });
    }
    const settings = cloneSettings(this.global ?? defaultSettings());
    if (!insertWord(settings, word)) return false;
    await writeSettingsFile(target, settings);
    this.global = settings;
    this.rebuild();
    return true;
  }

  public async addIgnore(glob: string): Promise<boolean> {
    const settings = cloneSettings(this.project ?? defaultSettings());
    if (!insertIgnore(settings, glob)) return false;
    await writeSettingsFile(this.projectConfigPath, settings);
    this.project = settings;
    this.rebuild();
    return true;
  }

  public dictionaryIds(): string[] {
    return this.view.dictionaryIds();
  }

  public isAllowedWord(word: string): boolean {
    return this.view.isAllowedWord(word);
  }

  public shouldFlagWord(word: string): boolean {
    return this.view.shouldFlagWord(word);
  }

  public minWordLength(): number {
    return this.view.minWordLength();
  }

  public ignorePatterns(): RegExp[] {
    return this.view.ignorePatterns();
  }

  public shouldIgnorePath(filePath: string): boolean {
    return this.view.shouldIgnorePath(filePath);
  }

  public customDictionaries(): CustomDictionaryEntry[] {
    return this.view.customDictionaries();
  }

  public forPath(filePath: string): SpellConfig {
    return this.view.forPath(filePath);
  }

  private readAll(): SettingsView {
    this.global = readSettingsFile(this.globalConfigPath);
    this.project = readSettingsFile(this.projectConfigPath);
    return this.effectiveView();
  }

  private rebuild(): void {
    this.view = this.effectiveView();
  }

  private effectiveView(): SettingsView {
    const project = this.project ?? defaultSettings();
    const effective = project.useGlobal && this.global ? mergeSettings(this.global, project) : project;
    return new SettingsView(applyEnvOverrides(effective, this.env), this.projectRoot);
  }
}

/** In-memory settings for tests and embedders; nothing touches the disk. */
export class MemoryConfig extends SettingsView {
  constructor(settings: Partial<ConfigSettings> = {}, projectRoot: string = process.cwd()) {
    super({ ...defaultSettings(), ...settings }, projectRoot);
  }
}

export function loadConfig(options: FileConfigOptions = {}): FileConfig {
  return new FileConfig(options);
}

export type { ConfigSettings, OverrideBlock, SpellConfig } from "./types.js";
export { SettingsView, parseSettings, parseSettingsJson, serializeSettings } from "./settings.js";
