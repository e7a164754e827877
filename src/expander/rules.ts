/**
 * Rule tables: the host-facing way to declare abbreviations.
 *
 * A table maps each abbreviation to either its output (a string or a callback) or a table entry
 * that overrides any of the default flags.
 */

import { z } from "zod";

import type { ExpansionRule, OutputCallback, RuleFlags, RuleOutput } from "../engine/types.js";

import { RuleConfigError } from "./errors.js";

export type RuleOutputConfig = string | OutputCallback;

export interface RuleTableEntry extends Partial<RuleFlags> {
  output: RuleOutputConfig;
}

export type RuleConfig = RuleOutputConfig | RuleTableEntry;

export type RuleTable = Readonly<Record<string, RuleConfig>>;

export const DEFAULT_RULE_FLAGS: RuleFlags = {
  backspace: true,
  caseSensitive: false,
  internal: false,
  matchCase: true,
  priority: 0,
  resetRecognizer: false,
  sendCompletionKey: true,
  waitForCompletionKey: true,
};

const OutputSchema = z.custom<RuleOutputConfig>(
  (value) => typeof value === "string" || typeof value === "function",
  { message: "output must be a string or a function" }
);

const RuleFlagsSchema = z
  .object({
    internal: z.boolean(),
    waitForCompletionKey: z.boolean(),
    caseSensitive: z.boolean(),
    matchCase: z.boolean(),
    backspace: z.boolean(),
    sendCompletionKey: z.boolean(),
    resetRecognizer: z.boolean(),
    priority: z.number().int("priority must be an integer"),
  })
  .partial()
  .strict();

const RuleEntrySchema = RuleFlagsSchema.extend({ output: OutputSchema }).strict();

type ParsedFlags = z.infer<typeof RuleFlagsSchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
    )
    .join(", ");
}

function mergeFlags(defaults: RuleFlags, overrides: ParsedFlags): RuleFlags {
  return {
    backspace: overrides.backspace ?? defaults.backspace,
    caseSensitive: overrides.caseSensitive ?? defaults.caseSensitive,
    internal: overrides.internal ?? defaults.internal,
    matchCase: overrides.matchCase ?? defaults.matchCase,
    priority: overrides.priority ?? defaults.priority,
    resetRecognizer: overrides.resetRecognizer ?? defaults.resetRecognizer,
    sendCompletionKey: overrides.sendCompletionKey ?? defaults.sendCompletionKey,
    waitForCompletionKey: overrides.waitForCompletionKey ?? defaults.waitForCompletionKey,
  };
}

function toOutput(value: RuleOutputConfig): RuleOutput {
  return typeof value === "string"
    ? { kind: "static", text: value }
    : { kind: "lazy", produce: value };
}

/** Applies `overrides` on top of the built-in defaults, validating them. */
export function resolveDefaultFlags(overrides: Partial<RuleFlags> = {}): RuleFlags {
  const result = RuleFlagsSchema.safeParse(overrides);
  if (!result.success) {
    throw new RuleConfigError(`Invalid default rule flags: ${describeIssues(result.error)}`);
  }
  return mergeFlags(DEFAULT_RULE_FLAGS, result.data);
}

/**
 * Validates a whole rule table and turns it into rules. Values are checked at run time, so tables
 * from untyped sources are accepted too. Throws `RuleConfigError` on the first invalid entry.
 */
export function normalizeRuleTable(
  table: RuleTable | Readonly<Record<string, unknown>>,
  defaults: RuleFlags = DEFAULT_RULE_FLAGS
): ExpansionRule[] {
  const rules: ExpansionRule[] = [];
  for (const [abbreviation, config] of Object.entries(table)) {
    if (abbreviation.length === 0) {
      throw new RuleConfigError("Abbreviation must not be empty", abbreviation);
    }
    const id = rules.length;
    const bare = OutputSchema.safeParse(config);
    if (bare.success) {
      rules.push({ ...defaults, id, abbreviation, output: toOutput(bare.data) });
      continue;
    }
    if (typeof config !== "object" || config === null) {
      throw new RuleConfigError(
        `Expansion for "${abbreviation}" must be a string, a function or a table`,
        abbreviation
      );
    }
    const parsed = RuleEntrySchema.safeParse(config);
    if (!parsed.success) {
      throw new RuleConfigError(
        `Invalid expansion for "${abbreviation}": ${describeIssues(parsed.error)}`,
        abbreviation
      );
    }
    const { output, ...flags } = parsed.data;
    rules.push({ ...mergeFlags(defaults, flags), id, abbreviation, output: toOutput(output) });
  }
  return rules;
}
