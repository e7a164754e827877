/**
 * Rule model shared by the trie builder, the automaton compiler and the walkers.
 */

/** Value a lazy output callback may produce. `null`/`undefined` mean "insert nothing". */
export type OutputValue = string | number | null | undefined;

export type OutputCallback = () => OutputValue;

/** Expansion output: static text, or a callback evaluated each time the rule fires. */
export type RuleOutput =
  | { readonly kind: "static"; readonly text: string }
  | { readonly kind: "lazy"; readonly produce: OutputCallback };

/** Behaviour flags of one rule. */
export interface RuleFlags {
  /** May match in the middle of a word, not only after a word boundary. */
  readonly internal: boolean;
  /** Fire only once a terminating end character is typed. */
  readonly waitForCompletionKey: boolean;
  readonly caseSensitive: boolean;
  /** Mirror the casing of the typed abbreviation onto the output. */
  readonly matchCase: boolean;
  /** Erase the typed abbreviation before inserting the output. */
  readonly backspace: boolean;
  /** Re-emit the key that completed the abbreviation. */
  readonly sendCompletionKey: boolean;
  /** Reset the recognizer after firing. */
  readonly resetRecognizer: boolean;
  /** Explicit tie-break; higher wins. */
  readonly priority: number;
}

export interface ExpansionRule extends RuleFlags {
  /** Position in the rule table; the last-resort tie-break. */
  readonly id: number;
  readonly abbreviation: string;
  readonly output: RuleOutput;
}

/**
 * Edge label inside a trie or automaton: a Unicode code point, or one of the negative sentinels.
 */
export type EdgeLabel = number;

/** Edge taken when an end character completes a `waitForCompletionKey` abbreviation. */
export const COMPLETION: EdgeLabel = -1;

/** Edge from the internal root to the word-boundary root. Never followed by input. */
export const WORD_BOUNDARY: EdgeLabel = -2;

export function isSentinel(label: EdgeLabel): boolean {
  return label < 0;
}

export type EndCharPredicate = (codePoint: number) => boolean;
