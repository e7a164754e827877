import { RingBuffer } from "../shared/ring-buffer.js";

import { foldCodePoint } from "./code-points.js";
import type { EndCharPredicate, ExpansionRule } from "./types.js";

export type EngineKind = "automaton" | "trie";

export const ENGINE_KINDS: readonly EngineKind[] = ["automaton", "trie"];

/**
 * Stateful cursor over a compiled rule set, advanced one character at a time.
 *
 * Implementations differ only in how a transition is found; observable behaviour is identical.
 */
export interface MatchEngine {
  readonly kind: EngineKind;
  /** Advances by one character and returns the rule that fires at the new state, if any. */
  followEdge(codePoint: number): ExpansionRule | null;
  /** Undoes the most recent `followEdge`. No-op on empty history. */
  rewind(): void;
  reset(): void;
  snapshot(): WalkerSnapshot;
}

export interface HistoryEntry {
  readonly state: number;
  /** Reached through a completion; the next character restarts at the word boundary. */
  readonly completed: boolean;
}

export interface WalkerSnapshot {
  readonly state: number;
  readonly pendingCompletion: boolean;
  readonly history: readonly HistoryEntry[];
}

export interface WalkerOptions {
  foldCase: boolean;
  isEndChar: EndCharPredicate;
  historyDepth: number;
}

export type Step = HistoryEntry;

/**
 * History, completion and case-folding bookkeeping shared by both walkers.
 */
export abstract class HistoryWalker implements MatchEngine {
  abstract readonly kind: EngineKind;

  private current: number;
  private pendingCompletion = false;
  private readonly history: RingBuffer<HistoryEntry>;

  protected constructor(
    private readonly options: WalkerOptions,
    private readonly start: number
  ) {
    this.current = start;
    this.history = new RingBuffer<HistoryEntry>(options.historyDepth);
  }

  /** Next state from `state` on `codePoint`, already case-folded. */
  protected abstract advance(state: number, codePoint: number, isEndChar: boolean): Step;

  protected abstract expansionAt(state: number): ExpansionRule | null;

  followEdge(codePoint: number): ExpansionRule | null {
    if (this.pendingCompletion) {
      this.current = this.start;
      this.pendingCompletion = false;
    }
    const folded = this.options.foldCase ? foldCodePoint(codePoint) : codePoint;
    const step = this.advance(this.current, folded, this.options.isEndChar(folded));
    this.current = step.state;
    this.pendingCompletion = step.completed;
    this.history.push(step);
    return this.expansionAt(step.state);
  }

  rewind(): void {
    if (this.history.size === 0) {
      return;
    }
    this.history.pop();
    const top = this.history.peek();
    this.current = top?.state ?? this.start;
    this.pendingCompletion = top?.completed ?? false;
  }

  reset(): void {
    this.history.clear();
    this.current = this.start;
    this.pendingCompletion = false;
  }

  snapshot(): WalkerSnapshot {
    return {
      state: this.current,
      pendingCompletion: this.pendingCompletion,
      history: this.history.toArray(),
    };
  }
}
