#!/usr/bin/env node
import process from "node:process";
import { pathToFileURL } from "node:url";

import packageJson from "../../package.json" with { type: "json" };
import { ENGINE_KINDS, type EngineKind } from "../engine/match-engine.js";
import { createSessionFromConfig, loadRuleConfig } from "../expander/config-loader.js";
import { ConfigFileError, RuleConfigError } from "../expander/errors.js";
import { replayInput } from "../expander/replay.js";
import type { SessionOptions } from "../expander/session.js";
import { parseCli, type CliSpec } from "../shared/cli/args.js";
import { parsePositiveInt } from "../shared/utils/validation.js";

export const CLI_SPEC: CliSpec = {
  commandName: "snipstream",
  description: "Expand abbreviations in typed text the way the live expander would",
  version: packageJson.version,
  usage: "snipstream [options] [text]",
  sections: [
    {
      title: "Rules",
      options: [
        {
          flag: "rules",
          short: "r",
          type: "string",
          description: "Rule file (YAML); defaults to .snipstream/rules.yaml",
          placeholder: "<path>",
        },
        {
          flag: "engine",
          type: "string",
          description: `Matcher to use (${ENGINE_KINDS.join(" | ")})`,
          placeholder: "<kind>",
        },
        {
          flag: "history-depth",
          type: "string",
          description: "Keystrokes that can be undone with backspace",
          placeholder: "<n>",
        },
      ],
    },
    {
      title: "Output",
      options: [
        {
          flag: "trace",
          type: "boolean",
          description: "Print every expansion to stderr",
          default: false,
        },
      ],
    },
  ],
  examples: [
    'snipstream --rules rules.yaml "btw see you "',
    "cat draft.txt | snipstream --engine trie --trace",
  ],
};

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  readStdin: () => Promise<string>;
  cwd: string;
  env: NodeJS.ProcessEnv;
}

async function readStdin(): Promise<string> {
  const chunks: string[] = [];
  process.stdin.setEncoding("utf8");
  for await (const chunk of process.stdin) {
    chunks.push(String(chunk));
  }
  return chunks.join("");
}

const processIO: CliIO = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
  readStdin,
  cwd: process.cwd(),
  env: process.env,
};

function isEngineKind(value: string): value is EngineKind {
  return ENGINE_KINDS.some((kind) => kind === value);
}

function isUsageError(error: unknown): error is Error {
  return (
    error instanceof ConfigFileError ||
    error instanceof RuleConfigError ||
    (error instanceof Error && "code" in error && String(error.code).startsWith("ERR_PARSE_ARGS"))
  );
}

async function run(argv: string[], io: CliIO): Promise<number> {
  const parsed = parseCli(CLI_SPEC, argv);
  if (parsed.kind !== "run") {
    io.stdout(`${parsed.text}\n`);
    return 0;
  }
  const { values, positionals } = parsed;

  const overrides: SessionOptions = {};
  const engine = typeof values.engine === "string" ? values.engine : undefined;
  if (engine !== undefined) {
    if (!isEngineKind(engine)) {
      throw new ConfigFileError(
        `Invalid --engine: "${engine}". Expected one of ${ENGINE_KINDS.join(", ")}.`,
        null
      );
    }
    overrides.engine = engine;
  }
  const depthFlag = values["history-depth"];
  if (typeof depthFlag === "string") {
    try {
      overrides.historyDepth = parsePositiveInt(depthFlag, undefined, "--history-depth");
    } catch (error) {
      throw new ConfigFileError(error instanceof Error ? error.message : String(error), null);
    }
  }
  // No idle resets during replay.
  overrides.idleTimeoutSeconds = 0;

  const config = loadRuleConfig({
    path: typeof values.rules === "string" ? values.rules : undefined,
    cwd: io.cwd,
    env: io.env,
  });
  const session = createSessionFromConfig(config, {
    ...overrides,
    onDiagnostic: (message) => io.stderr(`[snipstream] ${message}\n`),
  });

  try {
    const text = positionals.length > 0 ? positionals.join(" ") : await io.readStdin();
    const result = replayInput(session, text, {
      onExpansion: values.trace
        ? (expansion) => io.stderr(`${expansion.rule.abbreviation} -> ${expansion.output}\n`)
        : undefined,
    });
    io.stdout(result.endsWith("\n") ? result : `${result}\n`);
    return 0;
  } finally {
    session.dispose();
  }
}

/**
 * Runs the command and resolves to its exit code. Configuration and usage errors are reported on
 * stderr with exit code 1; anything else propagates.
 */
export async function runCli(argv: string[], io: CliIO = processIO): Promise<number> {
  try {
    return await run(argv, io);
  } catch (error) {
    if (isUsageError(error)) {
      io.stderr(`snipstream: ${error.message}\n`);
      return 1;
    }
    throw error;
  }
}

if (import.meta.url === pathToFileURL(process.argv[1] ?? "").href) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error) => {
      console.error("snipstream failed unexpectedly.");
      console.error(error);
      process.exitCode = 1;
    });
}
