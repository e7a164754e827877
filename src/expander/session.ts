/**
 * The host-facing expander: feeds keystrokes to the recognizer, keeps the recent input for
 * resolving triggers, and turns a fired rule into the keystrokes the host must type.
 */

import { codePointLength, fromCodePoints } from "../engine/code-points.js";
import { endCharsFrom, isDefaultEndChar } from "../engine/end-chars.js";
import type { EngineKind } from "../engine/match-engine.js";
import { DEFAULT_HISTORY_DEPTH, StateManager } from "../engine/state-manager.js";
import type { EndCharPredicate, ExpansionRule, RuleFlags } from "../engine/types.js";
import { consoleReporter, type DiagnosticReporter } from "../shared/diagnostics.js";
import { RingBuffer } from "../shared/ring-buffer.js";

import { matchCase } from "./case-format.js";
import { IdleResetTimer } from "./idle-timer.js";
import { planKeystrokes, type KeystrokePlan } from "./keystrokes.js";
import { normalizeRuleTable, resolveDefaultFlags, type RuleTable } from "./rules.js";

export interface SessionOptions {
  engine?: EngineKind;
  /** Characters that end a word, or a predicate over code points. */
  endChars?: string | EndCharPredicate;
  /** Minimum undo depth. Raised to one more than the longest abbreviation when needed. */
  historyDepth?: number;
  /** Overrides for the flags of rules that do not set them. */
  defaults?: Partial<RuleFlags>;
  /** Forget partial input after this many seconds without keystrokes. `0` disables it. */
  idleTimeoutSeconds?: number;
  onDiagnostic?: DiagnosticReporter;
}

export interface ResolvedExpansion extends KeystrokePlan {
  readonly rule: ExpansionRule;
  /** The typed characters that triggered the rule, completion key included. */
  readonly trigger: string;
  /** The typed abbreviation, in the case it was typed. */
  readonly typed: string;
  /** The key that fired the rule: the completion key, or the last character of the abbreviation. */
  readonly completionKey: string;
  /** Output after case matching. */
  readonly output: string;
}

const MAX_CODE_POINT = 0x10ffff;

function isCodePoint(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= MAX_CODE_POINT;
}

export class ExpansionSession {
  private readonly engine: EngineKind;
  private readonly isEndChar: EndCharPredicate;
  private readonly defaults: RuleFlags;
  private readonly report: DiagnosticReporter;
  private readonly idleTimer: IdleResetTimer;

  private ruleList: readonly ExpansionRule[] = [];
  private stateManager: StateManager;
  private input: RingBuffer<number>;

  constructor(
    private readonly options: SessionOptions = {},
    table: RuleTable = {}
  ) {
    this.engine = options.engine ?? "automaton";
    this.isEndChar =
      typeof options.endChars === "string"
        ? endCharsFrom(options.endChars)
        : (options.endChars ?? isDefaultEndChar);
    this.defaults = resolveDefaultFlags(options.defaults);
    this.report = options.onDiagnostic ?? consoleReporter;
    this.idleTimer = new IdleResetTimer(options.idleTimeoutSeconds ?? 0, () => this.clear());

    const depth = this.historyDepthFor([]);
    this.stateManager = this.createStateManager([], depth);
    this.input = new RingBuffer<number>(depth);
    this.setRules(table);
  }

  get rules(): readonly ExpansionRule[] {
    return this.ruleList;
  }

  get historyDepth(): number {
    return this.input.capacity;
  }

  /**
   * Replaces the rule table. The new table is validated and compiled before anything is swapped,
   * so a rejected table leaves the previous one live.
   */
  setRules(table: RuleTable): void {
    const rules = normalizeRuleTable(table, this.defaults);
    const depth = this.historyDepthFor(rules);
    const stateManager = this.createStateManager(rules, depth);
    this.ruleList = rules;
    this.stateManager = stateManager;
    this.input = new RingBuffer<number>(depth);
    this.idleTimer.cancel();
  }

  /**
   * Handles one typed character. Returns what to type when a rule fires, otherwise `null`.
   * Numbers that are not Unicode code points are ignored.
   */
  handleCharacter(char: string | number): ResolvedExpansion | null {
    const codePoint = typeof char === "number" ? char : char.codePointAt(0);
    if (codePoint === undefined || !isCodePoint(codePoint)) {
      return null;
    }
    this.idleTimer.touch();
    this.input.push(codePoint);
    const rule = this.stateManager.followEdge(codePoint);
    if (rule === null) {
      return null;
    }
    const expansion = this.resolve(rule);
    if (expansion !== null && rule.resetRecognizer) {
      this.clear();
    }
    return expansion;
  }

  /** Undoes the most recent character, e.g. after a backspace. */
  handleDelete(): void {
    this.idleTimer.touch();
    this.input.pop();
    this.stateManager.rewind();
  }

  /** Forgets all input, e.g. after a click or focus change. */
  handleReset(): void {
    this.idleTimer.cancel();
    this.clear();
  }

  dispose(): void {
    this.idleTimer.cancel();
  }

  private clear(): void {
    this.input.clear();
    this.stateManager.reset();
  }

  private historyDepthFor(rules: readonly ExpansionRule[]): number {
    const longest = rules.reduce(
      (max, rule) => Math.max(max, codePointLength(rule.abbreviation)),
      0
    );
    return Math.max(this.options.historyDepth ?? DEFAULT_HISTORY_DEPTH, longest + 1);
  }

  private createStateManager(rules: readonly ExpansionRule[], historyDepth: number): StateManager {
    return new StateManager(rules, {
      engine: this.engine,
      isEndChar: this.isEndChar,
      historyDepth,
      onDiagnostic: this.report,
    });
  }

  private produce(rule: ExpansionRule): string | null {
    if (rule.output.kind === "static") {
      return rule.output.text;
    }
    try {
      const value = rule.output.produce();
      return value === null || value === undefined ? "" : String(value);
    } catch (error) {
      this.report(`Expansion for "${rule.abbreviation}" failed; leaving it as typed`, error);
      return null;
    }
  }

  private resolve(rule: ExpansionRule): ResolvedExpansion | null {
    const produced = this.produce(rule);
    if (produced === null) {
      return null;
    }
    const triggerPoints = this.input.ending(
      codePointLength(rule.abbreviation) + (rule.waitForCompletionKey ? 1 : 0)
    );
    const typedPoints = rule.waitForCompletionKey ? triggerPoints.slice(0, -1) : triggerPoints;
    const typed = fromCodePoints(typedPoints);
    const completionKey = fromCodePoints(triggerPoints.slice(-1));
    const output = rule.matchCase && !rule.caseSensitive ? matchCase(typed, produced) : produced;
    return {
      rule,
      trigger: fromCodePoints(triggerPoints),
      typed,
      completionKey,
      output,
      ...planKeystrokes(rule, triggerPoints.length, output, completionKey),
    };
  }
}
