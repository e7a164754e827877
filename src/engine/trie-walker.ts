import { AutomatonInvariantError } from "./errors.js";
import { HistoryWalker, type Step, type WalkerOptions } from "./match-engine.js";
import { INTERNAL_ROOT, WORD_BOUNDARY_ROOT, trieNode, type TrieNode, type TrieSet } from "./trie.js";
import { COMPLETION, type ExpansionRule } from "./types.js";

/**
 * Walks a decorated trie directly, following suffix links at match time.
 */
export class TrieWalker extends HistoryWalker {
  readonly kind = "trie" as const;

  constructor(
    private readonly trie: TrieSet,
    options: WalkerOptions
  ) {
    super(options, WORD_BOUNDARY_ROOT);
    if (!trie.decorated) {
      throw new AutomatonInvariantError("TrieWalker needs a trie decorated with suffix links");
    }
  }

  private node(id: number): TrieNode {
    return trieNode(this.trie, id);
  }

  protected advance(state: number, codePoint: number, isEndChar: boolean): Step {
    for (let id: number | null = state; id !== null; id = this.node(id).suffix) {
      const next = this.node(id).transitions.get(codePoint);
      if (next !== undefined) {
        return { state: next, completed: false };
      }
    }
    if (isEndChar) {
      for (let id: number | null = state; id !== null; id = this.node(id).suffix) {
        const completion = this.node(id).transitions.get(COMPLETION);
        if (completion !== undefined) {
          return { state: completion, completed: true };
        }
      }
    }
    return { state: isEndChar ? WORD_BOUNDARY_ROOT : INTERNAL_ROOT, completed: false };
  }

  protected expansionAt(state: number): ExpansionRule | null {
    return this.node(state).expansion;
  }
}
