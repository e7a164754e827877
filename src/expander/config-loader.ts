import fs from "node:fs";
import path from "node:path";

import { parse } from "yaml";
import { z } from "zod";

import { ENGINE_KINDS, type EngineKind } from "../engine/match-engine.js";
import type { RuleFlags } from "../engine/types.js";
import { parseFiniteNumber, parsePositiveInt } from "../shared/utils/validation.js";

import { ConfigFileError } from "./errors.js";
import type { RuleTable, RuleTableEntry } from "./rules.js";
import { ExpansionSession, type SessionOptions } from "./session.js";

const ENV_PREFIX = "SNIPSTREAM_";

export const DEFAULT_TIMEOUT_SECONDS = 3;

export const RULE_FILE_CANDIDATES = [
  ".snipstream/rules.yaml",
  ".snipstream/rules.yml",
  "config/snipstream.yaml",
  "config/snipstream.yml",
];

const FlagsFileSchema = z
  .object({
    internal: z.boolean(),
    wait_for_completion_key: z.boolean(),
    case_sensitive: z.boolean(),
    match_case: z.boolean(),
    backspace: z.boolean(),
    send_completion_key: z.boolean(),
    reset_recognizer: z.boolean(),
    priority: z.number().int("priority must be an integer"),
  })
  .partial()
  .strict();

const RuleFileEntrySchema = FlagsFileSchema.extend({ output: z.string() }).strict();

const EngineSchema = z.enum(["automaton", "trie"]);

const RuleFileSchema = z
  .object({
    engine: EngineSchema.optional(),
    history_depth: z.number().int().positive().optional(),
    timeout_seconds: z.number().finite().default(DEFAULT_TIMEOUT_SECONDS),
    end_chars: z.string().min(1, "end_chars must not be empty").optional(),
    defaults: FlagsFileSchema.default({}),
    rules: z.record(z.string(), z.union([z.string(), RuleFileEntrySchema])).default({}),
  })
  .strict();

type FileFlags = z.infer<typeof FlagsFileSchema>;

export interface LoadedRuleConfig {
  /** File the rules came from; `null` when no file was found. */
  path: string | null;
  engine: EngineKind;
  historyDepth?: number;
  timeoutSeconds: number;
  endChars?: string;
  defaults: Partial<RuleFlags>;
  rules: RuleTable;
}

export interface LoadRuleConfigOptions {
  /** Explicit rule file. Skips the candidate lookup and must exist. */
  path?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

function toFlags(flags: FileFlags): Partial<RuleFlags> {
  const mapped: { -readonly [K in keyof RuleFlags]?: RuleFlags[K] } = {};
  if (flags.internal !== undefined) mapped.internal = flags.internal;
  if (flags.wait_for_completion_key !== undefined) {
    mapped.waitForCompletionKey = flags.wait_for_completion_key;
  }
  if (flags.case_sensitive !== undefined) mapped.caseSensitive = flags.case_sensitive;
  if (flags.match_case !== undefined) mapped.matchCase = flags.match_case;
  if (flags.backspace !== undefined) mapped.backspace = flags.backspace;
  if (flags.send_completion_key !== undefined) {
    mapped.sendCompletionKey = flags.send_completion_key;
  }
  if (flags.reset_recognizer !== undefined) mapped.resetRecognizer = flags.reset_recognizer;
  if (flags.priority !== undefined) mapped.priority = flags.priority;
  return mapped;
}

function findRuleFile(options: LoadRuleConfigOptions): string | null {
  const cwd = options.cwd ?? process.cwd();
  if (options.path !== undefined) {
    const explicit = path.resolve(cwd, options.path);
    if (!fs.existsSync(explicit)) {
      throw new ConfigFileError(`Rule file not found: ${explicit}`, explicit);
    }
    return explicit;
  }
  for (const candidate of RULE_FILE_CANDIDATES) {
    const resolved = path.join(cwd, candidate);
    if (fs.existsSync(resolved)) {
      return resolved;
    }
  }
  return null;
}

function readRuleFile(file: string): z.infer<typeof RuleFileSchema> {
  let parsed: unknown;
  try {
    // An empty file parses to null; treat it as an empty config.
    parsed = parse(fs.readFileSync(file, "utf8")) ?? {};
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigFileError(`Failed to parse rule file ${file}: ${reason}`, file);
  }
  const result = RuleFileSchema.safeParse(parsed);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
      )
      .join(", ");
    throw new ConfigFileError(`Invalid rule file ${file}: ${details}`, file);
  }
  return result.data;
}

function parseEnvEngine(value: string | undefined): EngineKind | undefined {
  if (value === undefined || value === "") {
    return undefined;
  }
  const result = EngineSchema.safeParse(value.trim().toLowerCase());
  if (!result.success) {
    throw new ConfigFileError(
      `Invalid ${ENV_PREFIX}ENGINE: "${value}". Expected one of ${ENGINE_KINDS.join(", ")}.`,
      null
    );
  }
  return result.data;
}

function parseEnvNumber<T>(
  parser: (value: string | undefined, fallback: T, name: string) => number | T,
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: T
): number | T {
  const name = `${ENV_PREFIX}${key}`;
  try {
    return parser(env[name], fallback, name);
  } catch (error) {
    throw new ConfigFileError(error instanceof Error ? error.message : String(error), null);
  }
}

/**
 * Resolves the rule configuration.
 * Precedence: built-in defaults < rule file < environment
 */
export function loadRuleConfig(options: LoadRuleConfigOptions = {}): LoadedRuleConfig {
  const env = options.env ?? process.env;
  const file = findRuleFile(options);
  const data = file === null ? RuleFileSchema.parse({}) : readRuleFile(file);

  const rules: Record<string, string | RuleTableEntry> = {};
  for (const [abbreviation, entry] of Object.entries(data.rules)) {
    if (typeof entry === "string") {
      rules[abbreviation] = entry;
    } else {
      const { output, ...flags } = entry;
      rules[abbreviation] = { ...toFlags(flags), output };
    }
  }

  const config: LoadedRuleConfig = {
    path: file,
    engine: parseEnvEngine(env[`${ENV_PREFIX}ENGINE`]) ?? data.engine ?? "automaton",
    timeoutSeconds: parseEnvNumber(
      parseFiniteNumber,
      env,
      "TIMEOUT_SECONDS",
      data.timeout_seconds
    ),
    defaults: toFlags(data.defaults),
    rules,
  };
  const historyDepth = parseEnvNumber(parsePositiveInt, env, "HISTORY_DEPTH", data.history_depth);
  if (historyDepth !== undefined) {
    config.historyDepth = historyDepth;
  }
  if (data.end_chars !== undefined) {
    config.endChars = data.end_chars;
  }
  return config;
}

export function sessionOptionsFromConfig(
  config: LoadedRuleConfig,
  overrides: SessionOptions = {}
): SessionOptions {
  return {
    engine: config.engine,
    historyDepth: config.historyDepth,
    endChars: config.endChars,
    defaults: config.defaults,
    idleTimeoutSeconds: config.timeoutSeconds,
    ...overrides,
  };
}

/** Builds a session with the rules of `config`. */
export function createSessionFromConfig(
  config: LoadedRuleConfig,
  overrides: SessionOptions = {}
): ExpansionSession {
  return new ExpansionSession(sessionOptionsFromConfig(config, overrides), config.rules);
}
