import { toCodePoints } from "./code-points.js";
import { isSentinel, type EndCharPredicate } from "./types.js";

const DEFAULT_END_CHAR = /^[\s\p{P}\p{S}]$/u;

/** Whitespace, punctuation and symbols end a word. */
export const isDefaultEndChar: EndCharPredicate = (codePoint) => {
  if (isSentinel(codePoint)) {
    return false;
  }
  return DEFAULT_END_CHAR.test(String.fromCodePoint(codePoint));
};

/**
 * Builds a predicate from an explicit set of characters, e.g. `" \t\n.,;/'"`.
 */
export function endCharsFrom(characters: string): EndCharPredicate {
  const set = new Set(toCodePoints(characters));
  return (codePoint) => !isSentinel(codePoint) && set.has(codePoint);
}
