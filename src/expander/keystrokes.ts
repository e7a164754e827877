import type { RuleFlags } from "../engine/types.js";

/** What the host has to type once a rule fires. */
export interface KeystrokePlan {
  /** Characters to erase before typing `text`. */
  readonly backspaces: number;
  readonly text: string;
  /**
   * Let the triggering key through to the application first and inject afterwards. When false,
   * the host swallows the key.
   */
  readonly deferred: boolean;
}

/**
 * @param triggerLength characters in the trigger, including the key just typed
 * @param completionKey the key just typed
 */
export function planKeystrokes(
  flags: Pick<RuleFlags, "backspace" | "sendCompletionKey" | "waitForCompletionKey">,
  triggerLength: number,
  output: string,
  completionKey: string
): KeystrokePlan {
  // An immediate rule that keeps its abbreviation just appends after the key.
  if (!flags.waitForCompletionKey && flags.sendCompletionKey && !flags.backspace) {
    return { backspaces: 0, text: output, deferred: true };
  }
  const backspaces = flags.backspace ? Math.max(0, triggerLength - 1) : 0;
  const resend = flags.sendCompletionKey && (flags.waitForCompletionKey || flags.backspace);
  return {
    backspaces,
    text: resend ? output + completionKey : output,
    deferred: false,
  };
}
