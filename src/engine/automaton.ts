/**
 * Subset construction over a trie set.
 *
 * The trie pair is treated as an NFA in which the internal root is always active. Each automaton
 * state stands for the set of trie nodes active at once; states are discovered breadth-first and
 * deduplicated by their sorted node ids.
 */

import { createCounter } from "../shared/counter.js";

import { AutomatonInvariantError } from "./errors.js";
import { pickHighest, type TieReporter } from "./priority.js";
import { INTERNAL_ROOT, WORD_BOUNDARY_ROOT, trieNode, type TrieSet } from "./trie.js";
import { WORD_BOUNDARY, type EdgeLabel, type EndCharPredicate, type ExpansionRule } from "./types.js";

/** Start state, and the state after any end character that continues nothing. */
export const WORD_BOUNDARY_STATE = 1;
/** Root for mid-word matching; consulted whenever a state has no explicit transition. */
export const INTERNAL_STATE = 2;

export interface AutomatonState {
  readonly id: number;
  /** Trie node ids this state stands for, ascending. */
  readonly nodes: readonly number[];
  readonly transitions: ReadonlyMap<EdgeLabel, number>;
  readonly expansion: ExpansionRule | null;
}

export class Automaton {
  constructor(private readonly states: ReadonlyMap<number, AutomatonState>) {}

  get size(): number {
    return this.states.size;
  }

  state(id: number): AutomatonState {
    const state = this.states.get(id);
    if (state === undefined) {
      throw new AutomatonInvariantError(`Unknown automaton state ${id}`);
    }
    return state;
  }

  /** States in id order. */
  allStates(): AutomatonState[] {
    return [...this.states.values()].sort((a, b) => a.id - b.id);
  }
}

function setKey(nodes: readonly number[]): string {
  return nodes.join(",");
}

export function compileAutomaton(
  trie: TrieSet,
  isEndChar: EndCharPredicate,
  onTie?: TieReporter
): Automaton {
  const internals = trieNode(trie, INTERNAL_ROOT);
  const nextStateId = createCounter(1);
  const stateIds = new Map<string, number>();
  const pending: number[][] = [];
  const states = new Map<number, AutomatonState>();

  const intern = (members: Iterable<number>): number => {
    const nodes = [...new Set(members)].sort((a, b) => a - b);
    const key = setKey(nodes);
    const known = stateIds.get(key);
    if (known !== undefined) {
      return known;
    }
    const id = nextStateId();
    stateIds.set(key, id);
    pending.push(nodes);
    return id;
  };

  const boundaryId = intern([WORD_BOUNDARY_ROOT]);
  const internalId = intern([INTERNAL_ROOT]);
  if (boundaryId !== WORD_BOUNDARY_STATE || internalId !== INTERNAL_STATE) {
    throw new AutomatonInvariantError(
      `Seed states must be ${WORD_BOUNDARY_STATE} and ${INTERNAL_STATE}; got ${boundaryId} and ${internalId}`
    );
  }

  for (let index = 0; index < pending.length; index++) {
    const nodes = pending[index];
    const id = intern(nodes);
    const expansions: ExpansionRule[] = [];
    const targets = new Map<EdgeLabel, Set<number>>();

    for (const nodeId of nodes) {
      const node = trieNode(trie, nodeId);
      expansions.push(...node.expansions);
      for (const [label, child] of node.transitions) {
        if (label === WORD_BOUNDARY) {
          continue;
        }
        let target = targets.get(label);
        if (target === undefined) {
          target = new Set<number>();
          // internal abbreviations may start on any character
          const start = internals.transitions.get(label);
          if (start !== undefined) {
            target.add(start);
          }
          targets.set(label, target);
        }
        target.add(child);
        if (isEndChar(label)) {
          target.add(WORD_BOUNDARY_ROOT);
        }
      }
    }

    const transitions = new Map<EdgeLabel, number>();
    for (const [label, target] of targets) {
      transitions.set(label, intern(target));
    }
    states.set(id, { id, nodes, transitions, expansion: pickHighest(expansions, onTie) });
  }

  return new Automaton(states);
}
