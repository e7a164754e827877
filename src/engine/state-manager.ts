/**
 * Runs one match engine per case-sensitivity partition in lock-step and merges their candidates.
 */

import { consoleReporter, type DiagnosticReporter } from "../shared/diagnostics.js";

import { compileAutomaton } from "./automaton.js";
import { AutomatonWalker } from "./automaton-walker.js";
import { isDefaultEndChar } from "./end-chars.js";
import type { EngineKind, MatchEngine, WalkerSnapshot } from "./match-engine.js";
import { dedupeTies, pickHighest, type TieReporter } from "./priority.js";
import { buildTrieSet, decorateTrieSet } from "./trie.js";
import { TrieWalker } from "./trie-walker.js";
import type { EndCharPredicate, ExpansionRule } from "./types.js";

export const DEFAULT_HISTORY_DEPTH = 32;

export interface StateManagerOptions {
  engine?: EngineKind;
  isEndChar?: EndCharPredicate;
  historyDepth?: number;
  onDiagnostic?: DiagnosticReporter;
}

export interface Partition {
  readonly caseSensitive: boolean;
  readonly rules: readonly ExpansionRule[];
  readonly engine: MatchEngine;
}

export interface CreateEngineOptions {
  kind: EngineKind;
  foldCase: boolean;
  isEndChar: EndCharPredicate;
  historyDepth: number;
  onTie?: TieReporter;
}

/** Builds the trie (and, for the automaton engine, the compiled table) for one partition. */
export function createMatchEngine(
  rules: readonly ExpansionRule[],
  options: CreateEngineOptions
): MatchEngine {
  const trie = buildTrieSet(rules, { foldCase: options.foldCase });
  const walkerOptions = {
    foldCase: options.foldCase,
    isEndChar: options.isEndChar,
    historyDepth: options.historyDepth,
  };
  if (options.kind === "trie") {
    return new TrieWalker(decorateTrieSet(trie, options.isEndChar, options.onTie), walkerOptions);
  }
  return new AutomatonWalker(
    compileAutomaton(trie, options.isEndChar, options.onTie),
    walkerOptions
  );
}

export function tieMessage(winner: ExpansionRule, loser: ExpansionRule): string {
  return (
    `Ambiguous expansions for "${winner.abbreviation}" and "${loser.abbreviation}": ` +
    `same priority, length and flags; using "${winner.abbreviation}" (rule #${winner.id})`
  );
}

export class StateManager {
  readonly partitions: readonly Partition[];
  private readonly onTie: TieReporter;

  constructor(rules: readonly ExpansionRule[], options: StateManagerOptions = {}) {
    const report = options.onDiagnostic ?? consoleReporter;
    this.onTie = dedupeTies((winner, loser) => report(tieMessage(winner, loser)));
    const historyDepth = options.historyDepth ?? DEFAULT_HISTORY_DEPTH;
    const isEndChar = options.isEndChar ?? isDefaultEndChar;
    const kind = options.engine ?? "automaton";

    const partitions: Partition[] = [];
    for (const caseSensitive of [true, false]) {
      const members = rules.filter((rule) => rule.caseSensitive === caseSensitive);
      if (members.length === 0) {
        continue;
      }
      partitions.push({
        caseSensitive,
        rules: members,
        engine: createMatchEngine(members, {
          kind,
          foldCase: !caseSensitive,
          isEndChar,
          historyDepth,
          onTie: this.onTie,
        }),
      });
    }
    this.partitions = partitions;
  }

  /** Advances every partition and returns the best candidate among them. */
  followEdge(codePoint: number): ExpansionRule | null {
    const candidates: ExpansionRule[] = [];
    for (const partition of this.partitions) {
      const candidate = partition.engine.followEdge(codePoint);
      if (candidate !== null) {
        candidates.push(candidate);
      }
    }
    return pickHighest(candidates, this.onTie);
  }

  rewind(): void {
    for (const partition of this.partitions) {
      partition.engine.rewind();
    }
  }

  reset(): void {
    for (const partition of this.partitions) {
      partition.engine.reset();
    }
  }

  snapshot(): WalkerSnapshot[] {
    return this.partitions.map((partition) => partition.engine.snapshot());
  }
}
