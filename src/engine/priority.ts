import { codePointLength } from "./code-points.js";
import type { ExpansionRule } from "./types.js";

/** Called when two rules cannot be ordered by any configured criterion. */
export type TieReporter = (winner: ExpansionRule, loser: ExpansionRule) => void;

/**
 * Orders two candidate rules. Positive when `a` outranks `b`, negative when `b` outranks `a`,
 * zero when they are indistinguishable:
 *
 * 1. higher `priority`
 * 2. longer abbreviation
 * 3. word-boundary rule over internal rule
 * 4. case-sensitive rule over case-insensitive rule
 */
export function compareRules(a: ExpansionRule, b: ExpansionRule): number {
  if (a.priority !== b.priority) {
    return a.priority - b.priority;
  }
  const lengthDelta = codePointLength(a.abbreviation) - codePointLength(b.abbreviation);
  if (lengthDelta !== 0) {
    return lengthDelta;
  }
  if (a.internal !== b.internal) {
    return a.internal ? -1 : 1;
  }
  if (a.caseSensitive !== b.caseSensitive) {
    return a.caseSensitive ? 1 : -1;
  }
  return 0;
}

// Lexically smaller abbreviation first, then the rule defined first.
function fallbackOrder(a: ExpansionRule, b: ExpansionRule): number {
  if (a.abbreviation !== b.abbreviation) {
    return a.abbreviation < b.abbreviation ? 1 : -1;
  }
  return b.id - a.id;
}

export function takesPriorityOver(
  a: ExpansionRule,
  b: ExpansionRule,
  onTie?: TieReporter
): boolean {
  if (a === b) {
    return false;
  }
  const order = compareRules(a, b);
  if (order !== 0) {
    return order > 0;
  }
  const wins = fallbackOrder(a, b) > 0;
  onTie?.(wins ? a : b, wins ? b : a);
  return wins;
}

/** Highest-priority rule of `candidates`, or `null` when there are none. */
export function pickHighest(
  candidates: readonly ExpansionRule[],
  onTie?: TieReporter
): ExpansionRule | null {
  let best: ExpansionRule | null = null;
  for (const candidate of candidates) {
    if (best === null || takesPriorityOver(candidate, best, onTie)) {
      best = candidate;
    }
  }
  return best;
}

/**
 * Wraps a reporter so each unordered pair of rules is reported once.
 */
export function dedupeTies(report: TieReporter): TieReporter {
  const seen = new Set<string>();
  return (winner, loser) => {
    const key = winner.id < loser.id ? `${winner.id}:${loser.id}` : `${loser.id}:${winner.id}`;
    if (seen.has(key)) {
      return;
    }
    seen.add(key);
    report(winner, loser);
  };
}
