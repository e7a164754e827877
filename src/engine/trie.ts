/**
 * Abbreviation tries.
 *
 * One arena holds two tries: rules that may only start after a word boundary hang off the
 * word-boundary root, internal rules hang off the internal root. Nodes refer to each other by
 * arena index, so suffix links never form owning cycles.
 *
 * `decorateTrieSet` adds Aho-Corasick suffix links for direct trie walking; the automaton compiler
 * only needs the undecorated tree.
 */

import { createCounter } from "../shared/counter.js";

import { toCodePoints, foldText } from "./code-points.js";
import { AutomatonInvariantError } from "./errors.js";
import { pickHighest, type TieReporter } from "./priority.js";
import {
  COMPLETION,
  WORD_BOUNDARY,
  type EdgeLabel,
  type EndCharPredicate,
  type ExpansionRule,
} from "./types.js";

export const WORD_BOUNDARY_ROOT = 0;
export const INTERNAL_ROOT = 1;

export interface TrieNode {
  readonly id: number;
  /** Number of edges from the root of the node's own trie. */
  readonly depth: number;
  /** True for nodes of the internal trie. */
  readonly internal: boolean;
  readonly transitions: Map<EdgeLabel, number>;
  /** Rules whose abbreviation ends exactly here. */
  readonly expansions: ExpansionRule[];
  /** Longest proper suffix present in the arena (set by decoration). */
  suffix: number | null;
  /** Nearest node on the suffix chain that resolves to an expansion (set by decoration). */
  nextExpansion: number | null;
  /** Best rule among this node's own and its suffix chain's (set by decoration). */
  expansion: ExpansionRule | null;
}

export interface TrieSet {
  readonly nodes: readonly TrieNode[];
  readonly decorated: boolean;
}

export interface BuildTrieOptions {
  /** Lower-case abbreviations before insertion (case-insensitive partition). */
  foldCase: boolean;
}

export function trieNode(trie: TrieSet, id: number): TrieNode {
  const node = trie.nodes[id];
  if (node === undefined) {
    throw new AutomatonInvariantError(`Unknown trie node ${id}`);
  }
  return node;
}

/** Edge labels spelling out a rule inside its trie. */
export function abbreviationKeys(rule: ExpansionRule, foldCase: boolean): EdgeLabel[] {
  const text = foldCase ? foldText(rule.abbreviation) : rule.abbreviation;
  const keys: EdgeLabel[] = toCodePoints(text);
  if (rule.waitForCompletionKey) {
    keys.push(COMPLETION);
  }
  return keys;
}

export function buildTrieSet(rules: readonly ExpansionRule[], options: BuildTrieOptions): TrieSet {
  const nextId = createCounter(0);
  const nodes: TrieNode[] = [];
  const createNode = (depth: number, internal: boolean): TrieNode => {
    const node: TrieNode = {
      id: nextId(),
      depth,
      internal,
      transitions: new Map(),
      expansions: [],
      suffix: null,
      nextExpansion: null,
      expansion: null,
    };
    nodes.push(node);
    return node;
  };

  const wordBoundary = createNode(0, false);
  const internals = createNode(0, true);
  if (wordBoundary.id !== WORD_BOUNDARY_ROOT || internals.id !== INTERNAL_ROOT) {
    throw new AutomatonInvariantError(
      `Trie roots must be ${WORD_BOUNDARY_ROOT} and ${INTERNAL_ROOT}; got ${wordBoundary.id} and ${internals.id}`
    );
  }
  internals.transitions.set(WORD_BOUNDARY, wordBoundary.id);

  for (const rule of rules) {
    let current = rule.internal ? internals : wordBoundary;
    for (const key of abbreviationKeys(rule, options.foldCase)) {
      const existing = current.transitions.get(key);
      if (existing === undefined) {
        const child = createNode(current.depth + 1, current.internal);
        current.transitions.set(key, child.id);
        current = child;
      } else {
        current = nodes[existing];
      }
    }
    current.expansions.push(rule);
  }

  return { nodes, decorated: false };
}

/**
 * Adds suffix links and resolves each node's effective expansion.
 *
 * Suffix links are assigned breadth-first from the internal root, so a parent's link is always
 * known before its children's. A node entered through an end character that has no suffix match
 * links to the word-boundary root: after a boundary, a fresh word can start.
 */
export function decorateTrieSet(
  trie: TrieSet,
  isEndChar: EndCharPredicate,
  onTie?: TieReporter
): TrieSet {
  const node = (id: number): TrieNode => trieNode(trie, id);

  const findSuffix = (parent: TrieNode, label: EdgeLabel, child: TrieNode): number => {
    if (label === WORD_BOUNDARY) {
      return INTERNAL_ROOT;
    }
    let candidate = parent.suffix;
    while (candidate !== null) {
      const match = node(candidate).transitions.get(label);
      if (match !== undefined && match !== child.id) {
        return match;
      }
      candidate = node(candidate).suffix;
    }
    return isEndChar(label) ? WORD_BOUNDARY_ROOT : INTERNAL_ROOT;
  };

  const root = node(INTERNAL_ROOT);
  root.suffix = null;
  const queue: TrieNode[] = [root];
  for (let index = 0; index < queue.length; index++) {
    const parent = queue[index];
    for (const [label, childId] of parent.transitions) {
      const child = node(childId);
      child.suffix = findSuffix(parent, label, child);
      queue.push(child);
    }
  }

  // A suffix is never deeper than its node; at equal depth it is an internal node.
  const order = [...trie.nodes].sort(
    (a, b) => a.depth - b.depth || Number(b.internal) - Number(a.internal) || a.id - b.id
  );
  for (const current of order) {
    let next = current.suffix;
    while (next !== null && node(next).expansion === null) {
      next = node(next).suffix;
    }
    current.nextExpansion = next;
    const inherited = next === null ? null : node(next).expansion;
    current.expansion = pickHighest(
      inherited === null ? current.expansions : [...current.expansions, inherited],
      onTie
    );
  }

  return { nodes: trie.nodes, decorated: true };
}
