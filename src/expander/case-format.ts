function isCaseable(char: string): boolean {
  return char.toLowerCase() !== char.toUpperCase();
}

function isUpper(char: string): boolean {
  return char === char.toUpperCase();
}

/**
 * Mirrors the casing of a typed abbreviation onto its output.
 *
 * Only caseable characters of `typed` count. If there are none, or the first is lower-case, the
 * output is returned as is. Two or more that are all upper-case upper-case the whole output; any
 * other capitalised trigger capitalises the first character of the output.
 */
export function matchCase(typed: string, output: string): string {
  const caseable = Array.from(typed).filter(isCaseable);
  if (caseable.length === 0 || !isUpper(caseable[0])) {
    return output;
  }
  if (caseable.length > 1 && caseable.every(isUpper)) {
    return output.toUpperCase();
  }
  const [first = "", ...rest] = Array.from(output);
  return first.toUpperCase() + rest.join("");
}
