/**
 * Replays typed text through a session against a simulated screen, the way a host would apply
 * each expansion. Used by the CLI and in tests.
 */

import { fromCodePoints, toCodePoints } from "../engine/code-points.js";

import type { ExpansionSession, ResolvedExpansion } from "./session.js";

/** Backspace and DEL erase the previous character. */
export const DELETE_KEYS: ReadonlySet<number> = new Set([0x08, 0x7f]);

/** Escape resets the recognizer, as a click or focus change would. */
export const RESET_KEYS: ReadonlySet<number> = new Set([0x1b]);

export interface ReplayOptions {
  onExpansion?: (expansion: ResolvedExpansion) => void;
}

/**
 * Applies one typed key and its expansion (if any) to `screen`.
 */
export function applyKeystroke(
  screen: number[],
  key: number,
  expansion: ResolvedExpansion | null
): void {
  if (expansion === null || expansion.deferred) {
    screen.push(key);
  }
  if (expansion === null) {
    return;
  }
  screen.splice(Math.max(0, screen.length - expansion.backspaces));
  screen.push(...toCodePoints(expansion.text));
}

export function replayInput(
  session: ExpansionSession,
  input: string,
  options: ReplayOptions = {}
): string {
  const screen: number[] = [];
  for (const key of toCodePoints(input)) {
    if (DELETE_KEYS.has(key)) {
      screen.pop();
      session.handleDelete();
      continue;
    }
    if (RESET_KEYS.has(key)) {
      session.handleReset();
      continue;
    }
    const expansion = session.handleCharacter(key);
    if (expansion !== null) {
      options.onExpansion?.(expansion);
    }
    applyKeystroke(screen, key, expansion);
  }
  return fromCodePoints(screen);
}
