import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import test from "node:test";

import { isTypolensError } from "../errors/index.js";
import { setLogLevel } from "../logging/index.js";
import { FileConfig, MemoryConfig, findGlobalConfigPath, findProjectConfig } from "./index.js";

setLogLevel("silent");

function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "typolens-config-"));
}

function writeJson(filePath: string, value: unknown): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(value), "utf8");
}

test("the project config is found by walking up from the start directory", () => {
  const root = makeTempDir();
  try {
    writeJson(path.join(root, ".typolens.json"), { words: ["Frobnicate"] });
    const startDir = path.join(root, "a", "b");
    fs.mkdirSync(startDir, { recursive: true });

    assert.equal(findProjectConfig(startDir), path.join(root, ".typolens.json"));
    const config = new FileConfig({ startDir, globalConfigPath: null, env: {} });
    assert.equal(config.projectRoot, root);
    assert.equal(config.isAllowedWord("frobnicate"), true);
  } finally {
    fs.rmSync(root, { recursive: true, force: true });
  }
});

test("global settings are merged unless the project opts out", () => {
  const root = makeTempDir();
  try {
    const globalPath = path.join(root, "global", "typolens.json");
    const projectPath = path.join(root, "project", "typolens.json");
    writeJson(globalPath, { words: ["globalword"], flagWords: ["todo"] });
    writeJson(projectPath, { words: ["projectword"] });

    const config = new FileConfig({ startDir: path.dirname(projectPath), globalConfigPath: globalPath, env: {} });
    assert.equal(config.isAllowedWord("globalword"), true);
    assert.equal(config.isAllowedWord("projectword"), true);
    assert.equal(config.shouldFlagWord("TODO"), true);

    writeJson(projectPath, { words: ["projectword"], useGlobal: false });
    assert.equal(config.reload(), true);
    assert.equal(config.isAllowedWord("globalword"), false);
    assert.equal(config.shouldFlagWord("todo"), false);
    assert.equal(config.reload(), false);
  } finally {
    fs.rmSync(root, { recursive: true, force: true });
  }
});

test("a malformed config file degrades to defaults", () => {
  const root = makeTempDir();
  try {
    fs.writeFileSync(path.join(root, "typolens.json"), "{ nope", "utf8");
    const config = new FileConfig({ startDir: root, globalConfigPath: null, env: {} });
    assert.deepEqual(config.dictionaryIds(), ["en_us"]);
    assert.equal(config.minWordLength(), 3);
  } finally {
    fs.rmSync(root, { recursive: true, force: true });
  }
});

test("addWord creates the project file and refuses duplicates", async () => {
  const root = makeTempDir();
  try {
    const config = new FileConfig({ startDir: root, globalConfigPath: null, env: {} });
    assert.equal(await config.addWord("NewWord"), true);
    assert.equal(await config.addWord("newword"), false);
    assert.equal(config.isAllowedWord("NEWWORD"), true);
    assert.equal(
      fs.readFileSync(path.join(root, "typolens.json"), "utf8"),
      '{\n  "words": [\n    "newword"\n  ]\n}\n',
    );
  } finally {
    fs.rmSync(root, { recursive: true, force: true });
  }
});

test("addWordGlobal creates missing directories", async () => {
  const root = makeTempDir();
  try {
    const globalPath = path.join(root, "deep", "nested", "typolens.json");
    const config = new FileConfig({ startDir: root, globalConfigPath: globalPath, env: {} });
    assert.equal(await config.addWordGlobal("Shared"), true);
    assert.deepEqual(JSON.parse(fs.readFileSync(globalPath, "utf8")), { words: ["shared"] });
    assert.equal(config.isAllowedWord("shared"), true);
  } finally {
    fs.rmSync(root, { recursive: true, force: true });
  }
});

test("addWordGlobal without a global path rejects with CONFIG_WRITE", async () => {
  const config = new FileConfig({ startDir: os.tmpdir(), globalConfigPath: null, env: {} });
  await assert.rejects(config.addWordGlobal("word"), (error) => isTypolensError(error) && error.code === "CONFIG_WRITE");
});

test("addIgnore makes paths below the project root ignored", async () => {
  const root = makeTempDir();
  try {
    const config = new FileConfig({ startDir: root, globalConfigPath: null, env: {} });
    assert.equal(config.shouldIgnorePath(path.join(root, "generated", "api.ts")), false);
    assert.equal(await config.addIgnore("generated/"), true);
    assert.equal(await config.addIgnore("generated/"), false);
    assert.equal(config.shouldIgnorePath(path.join(root, "generated", "api.ts")), true);
    assert.equal(config.shouldIgnorePath(path.join(root, "src", "api.ts")), false);
  } finally {
    fs.rmSync(root, { recursive: true, force: true });
  }
});

test("reload picks up edits and deletions", () => {
  const root = makeTempDir();
  try {
    const configPath = path.join(root, "typolens.json");
    writeJson(configPath, {});
    const config = new FileConfig({ startDir: root, globalConfigPath: null, env: {} });
    assert.equal(config.isAllowedWord("testword"), false);

    writeJson(configPath, { words: ["testword"] });
    config.reload();
    assert.equal(config.isAllowedWord("testword"), true);

    fs.rmSync(configPath);
    config.reload();
    assert.equal(config.isAllowedWord("testword"), false);
  } finally {
    fs.rmSync(root, { recursive: true, force: true });
  }
});

test("environment variables override file values", () => {
  const root = makeTempDir();
  try {
    writeJson(path.join(root, "typolens.json"), { minWordLength: 2, dictionaries: ["en_gb"] });
    const config = new FileConfig({
      startDir: root,
      globalConfigPath: null,
      env: { TYPOLENS_MIN_WORD_LENGTH: "5", TYPOLENS_DICTIONARIES: "en_us, Go" },
    });
    assert.equal(config.minWordLength(), 5);
    assert.deepEqual(config.dictionaryIds(), ["en_us", "go"]);
  } finally {
    fs.rmSync(root, { recursive: true, force: true });
  }
});

test("findGlobalConfigPath honours the explicit variable, then XDG, then home", () => {
  assert.equal(findGlobalConfigPath({ TYPOLENS_GLOBAL_CONFIG: "/etc/typolens/custom.json" }), "/etc/typolens/custom.json");
  assert.equal(findGlobalConfigPath({ XDG_CONFIG_HOME: "/xdg" }), "/xdg/typolens/typolens.json");
  assert.equal(findGlobalConfigPath({}), path.join(os.homedir(), ".config", "typolens", "typolens.json"));
});

test("MemoryConfig fills in defaults", () => {
  const config = new MemoryConfig({ words: ["TestWord"] });
  assert.equal(config.isAllowedWord("testword"), true);
  assert.equal(config.minWordLength(), 3);
  assert.deepEqual(config.dictionaryIds(), ["en_us"]);
  assert.equal(config.shouldIgnorePath("src/a.ts"), false);
});
