/**
 * Shared CLI Argument Parsing Utilities
 *
 * Provides consistent --help and --version handling. Rendering returns text instead of writing
 * it, so commands decide where output goes.
 */

import { parseArgs } from "util";

/**
 * CLI option specification
 */
export interface CliOption {
  /** Option flag name (without --) */
  flag: string;
  /** Short flag (single character, optional) */
  short?: string;
  type: "string" | "boolean";
  default?: string | boolean;
  /** Description for help text */
  description: string;
  /** Placeholder for help text (e.g., "<path>", "<n>") */
  placeholder?: string;
}

/**
 * Help section for grouping related options
 */
export interface HelpSection {
  title: string;
  options: CliOption[];
}

/**
 * Complete CLI specification
 */
export interface CliSpec {
  /** Command name (e.g., "snipstream") */
  commandName: string;
  description: string;
  version: string;
  /** Usage line (e.g., "snipstream [options] [text]") */
  usage: string;
  sections: HelpSection[];
  examples?: string[];
}

export type CliValues = Record<string, string | boolean | undefined>;

/**
 * Outcome of parsing: either a request for help/version text, or values to run with.
 */
export type ParsedCli =
  | { kind: "help"; text: string }
  | { kind: "version"; text: string }
  | { kind: "run"; values: CliValues; positionals: string[] };

/**
 * Render the help message
 */
export function renderHelp(spec: CliSpec): string {
  const lines: string[] = [`${spec.description}`, "", `Usage: ${spec.usage}`, ""];

  for (const section of spec.sections) {
    lines.push(`${section.title}:`);
    for (const opt of section.options) {
      const shortFlag = opt.short ? `-${opt.short}, ` : "    ";
      const longFlag = `--${opt.flag}`;
      const placeholder = opt.placeholder || "";
      const flagDisplay = `${shortFlag}${longFlag}${placeholder ? " " + placeholder : ""}`;

      // Pad to 40 characters for alignment
      const padding = " ".repeat(Math.max(1, 40 - flagDisplay.length));
      const defaultInfo = opt.default !== undefined ? ` (default: ${opt.default})` : "";

      lines.push(`  ${flagDisplay}${padding}${opt.description}${defaultInfo}`);
    }
    lines.push("");
  }

  lines.push("Common:");
  lines.push("  -h, --help                              Show this help message");
  lines.push("  -v, --version                           Show version information");
  lines.push("");

  if (spec.examples && spec.examples.length > 0) {
    lines.push("Examples:");
    for (const example of spec.examples) {
      lines.push(`  ${example}`);
    }
    lines.push("");
  }

  return lines.join("\n");
}

export function renderVersion(commandName: string, version: string): string {
  return `${commandName} v${version}`;
}

/**
 * Parse `argv` against the spec with automatic --help and --version handling
 *
 * @throws TypeError from `parseArgs` on unknown options or missing option values
 */
export function parseCli(spec: CliSpec, argv: string[]): ParsedCli {
  const options: Record<
    string,
    { type: "string" | "boolean"; short?: string; default?: string | boolean }
  > = {};

  for (const section of spec.sections) {
    for (const opt of section.options) {
      options[opt.flag] = {
        type: opt.type,
        ...(opt.short && { short: opt.short }),
        ...(opt.default !== undefined && { default: opt.default }),
      };
    }
  }

  options.help = { type: "boolean", short: "h" };
  options.version = { type: "boolean", short: "v" };

  const { values, positionals } = parseArgs({ args: argv, options, allowPositionals: true });

  if (values.help) {
    return { kind: "help", text: renderHelp(spec) };
  }
  if (values.version) {
    return { kind: "version", text: renderVersion(spec.commandName, spec.version) };
  }
  return { kind: "run", values, positionals };
}
