import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  DEFAULT_TIMEOUT_SECONDS,
  createSessionFromConfig,
  loadRuleConfig,
  sessionOptionsFromConfig,
} from "../../src/expander/config-loader.js";
import { ConfigFileError } from "../../src/expander/errors.js";
import { replayInput } from "../../src/expander/replay.js";

describe("config-loader: rule files", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "snipstream-config-"));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  async function writeRules(relativePath: string, content: string): Promise<string> {
    const file = join(tempDir, relativePath);
    await mkdir(join(file, ".."), { recursive: true });
    await writeFile(file, content);
    return file;
  }

  it("returns an empty configuration when no file exists", () => {
    expect(loadRuleConfig({ cwd: tempDir, env: {} })).toEqual({
      path: null,
      engine: "automaton",
      timeoutSeconds: DEFAULT_TIMEOUT_SECONDS,
      defaults: {},
      rules: {},
    });
  });

  it("reads .snipstream/rules.yaml and maps snake_case flags", async () => {
    const file = await writeRules(
      ".snipstream/rules.yaml",
      `engine: trie
history_depth: 12
timeout_seconds: 0
end_chars: " .;"
defaults:
  match_case: false
rules:
  btw: by the way
  yd:
    output: yard
    internal: true
    wait_for_completion_key: false
    send_completion_key: false
    priority: 2
`
    );

    expect(loadRuleConfig({ cwd: tempDir, env: {} })).toEqual({
      path: file,
      engine: "trie",
      historyDepth: 12,
      timeoutSeconds: 0,
      endChars: " .;",
      defaults: { matchCase: false },
      rules: {
        btw: "by the way",
        yd: {
          output: "yard",
          internal: true,
          waitForCompletionKey: false,
          sendCompletionKey: false,
          priority: 2,
        },
      },
    });
  });

  it("prefers .snipstream/ over config/", async () => {
    await writeRules("config/snipstream.yml", "rules:\n  a: from config\n");
    const preferred = await writeRules(".snipstream/rules.yml", "rules:\n  a: from dotdir\n");

    const config = loadRuleConfig({ cwd: tempDir, env: {} });
    expect(config.path).toBe(preferred);
    expect(config.rules).toEqual({ a: "from dotdir" });
  });

  it("falls back to config/snipstream.yaml", async () => {
    const file = await writeRules("config/snipstream.yaml", "rules:\n  a: b\n");
    expect(loadRuleConfig({ cwd: tempDir, env: {} }).path).toBe(file);
  });

  it("reads an explicit path relative to cwd", async () => {
    const file = await writeRules("custom/my-rules.yaml", "rules:\n  omw: on my way\n");
    const config = loadRuleConfig({ cwd: tempDir, path: "custom/my-rules.yaml", env: {} });
    expect(config.path).toBe(file);
    expect(config.rules).toEqual({ omw: "on my way" });
  });

  it("treats an empty file as an empty configuration", async () => {
    await writeRules(".snipstream/rules.yaml", "");
    expect(loadRuleConfig({ cwd: tempDir, env: {} }).rules).toEqual({});
  });

  it("throws when an explicit path is missing", () => {
    const missing = join(tempDir, "nope.yaml");
    expect(() => loadRuleConfig({ cwd: tempDir, path: "nope.yaml", env: {} })).toThrow(
      new ConfigFileError(`Rule file not found: ${missing}`, missing)
    );
  });

  it("throws on YAML syntax errors", async () => {
    await writeRules(".snipstream/rules.yaml", "rules: [unclosed\n");
    expect(() => loadRuleConfig({ cwd: tempDir, env: {} })).toThrow(/^Failed to parse rule file /);
  });

  it("throws with the offending key on invalid values", async () => {
    const file = await writeRules(
      ".snipstream/rules.yaml",
      "engine: regex\nrules:\n  ab:\n    output: x\n    internal: maybe\n"
    );
    let caught: unknown;
    try {
      loadRuleConfig({ cwd: tempDir, env: {} });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConfigFileError);
    if (caught instanceof ConfigFileError) {
      expect(caught.path).toBe(file);
      expect(caught.message).toContain("engine: Invalid enum value");
      expect(caught.message).toContain("rules.ab");
    }
  });

  it("rejects unknown top-level keys", async () => {
    await writeRules(".snipstream/rules.yaml", "rulez:\n  a: b\n");
    expect(() => loadRuleConfig({ cwd: tempDir, env: {} })).toThrow(
      /Unrecognized key\(s\) in object: 'rulez'/
    );
  });

  describe("environment overrides", () => {
    it("overrides file values", async () => {
      await writeRules(
        ".snipstream/rules.yaml",
        "engine: trie\nhistory_depth: 12\ntimeout_seconds: 5\n"
      );
      const config = loadRuleConfig({
        cwd: tempDir,
        env: {
          SNIPSTREAM_ENGINE: "Automaton",
          SNIPSTREAM_HISTORY_DEPTH: "64",
          SNIPSTREAM_TIMEOUT_SECONDS: "0.5",
        },
      });
      expect(config).toMatchObject({ engine: "automaton", historyDepth: 64, timeoutSeconds: 0.5 });
    });

    it("ignores empty variables", () => {
      const config = loadRuleConfig({
        cwd: tempDir,
        env: { SNIPSTREAM_ENGINE: "", SNIPSTREAM_HISTORY_DEPTH: "" },
      });
      expect(config.engine).toBe("automaton");
      expect(config.historyDepth).toBeUndefined();
    });

    it.each([
      ["SNIPSTREAM_ENGINE", "fast", /Invalid SNIPSTREAM_ENGINE: "fast"/],
      ["SNIPSTREAM_HISTORY_DEPTH", "0", /Invalid SNIPSTREAM_HISTORY_DEPTH: "0"/],
      ["SNIPSTREAM_TIMEOUT_SECONDS", "later", /Invalid SNIPSTREAM_TIMEOUT_SECONDS: "later"/],
    ])("rejects %s=%s", (key, value, message) => {
      expect(() => loadRuleConfig({ cwd: tempDir, env: { [key]: value } })).toThrow(message);
      expect(() => loadRuleConfig({ cwd: tempDir, env: { [key]: value } })).toThrow(
        ConfigFileError
      );
    });
  });

  describe("sessions from configuration", () => {
    it("passes every setting to the session", async () => {
      await writeRules(
        ".snipstream/rules.yaml",
        "engine: trie\nhistory_depth: 40\ntimeout_seconds: 0\nend_chars: ';'\n"
      );
      const config = loadRuleConfig({ cwd: tempDir, env: {} });
      expect(sessionOptionsFromConfig(config, { historyDepth: 50 })).toEqual({
        engine: "trie",
        historyDepth: 50,
        endChars: ";",
        defaults: {},
        idleTimeoutSeconds: 0,
      });
    });

    it("expands with the loaded rules", async () => {
      await writeRules(
        ".snipstream/rules.yaml",
        `timeout_seconds: 0
defaults:
  internal: true
rules:
  btw: by the way
  "/yd":
    output: yard
`
      );
      const session = createSessionFromConfig(loadRuleConfig({ cwd: tempDir, env: {} }));
      expect(session.historyDepth).toBe(32);
      expect(replayInput(session, "so btw 5/yd ")).toBe("so by the way 5yard ");
      session.dispose();
    });
  });
});
