import { INTERNAL_STATE, WORD_BOUNDARY_STATE, type Automaton } from "./automaton.js";
import { HistoryWalker, type Step, type WalkerOptions } from "./match-engine.js";
import { COMPLETION, type ExpansionRule } from "./types.js";

/**
 * Walks a precompiled automaton; every lookup is a single table probe.
 */
export class AutomatonWalker extends HistoryWalker {
  readonly kind = "automaton" as const;

  constructor(
    private readonly automaton: Automaton,
    options: WalkerOptions
  ) {
    super(options, WORD_BOUNDARY_STATE);
  }

  protected advance(state: number, codePoint: number, isEndChar: boolean): Step {
    const current = this.automaton.state(state);
    const next =
      current.transitions.get(codePoint) ??
      this.automaton.state(INTERNAL_STATE).transitions.get(codePoint);
    if (next !== undefined) {
      return { state: next, completed: false };
    }
    if (isEndChar) {
      const completion = current.transitions.get(COMPLETION);
      if (completion !== undefined) {
        return { state: completion, completed: true };
      }
    }
    return { state: isEndChar ? WORD_BOUNDARY_STATE : INTERNAL_STATE, completed: false };
  }

  protected expansionAt(state: number): ExpansionRule | null {
    return this.automaton.state(state).expansion;
  }
}
