/**
 * Dense id source shared by one trie generation or one automaton build.
 */
export type Counter = () => number;

/**
 * Returns a closure that yields `start`, `start + 1`, `start + 2`, ...
 */
export function createCounter(start = 1): Counter {
  let next = start;
  return () => next++;
}
