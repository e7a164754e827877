/**
 * Raised when trie or automaton construction breaks one of its own invariants. Indicates a bug,
 * never bad user input.
 */
export class AutomatonInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AutomatonInvariantError";
  }
}
