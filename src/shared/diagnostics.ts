/**
 * Sink for non-fatal problems: ambiguous rule ties, failing output callbacks, config fallbacks.
 */
export type DiagnosticReporter = (message: string, error?: unknown) => void;

export const consoleReporter: DiagnosticReporter = (message, error) => {
  if (error === undefined) {
    console.warn(`[snipstream] ${message}`);
  } else {
    console.warn(`[snipstream] ${message}`, error);
  }
};
