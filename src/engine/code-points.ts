export function toCodePoints(text: string): number[] {
  const codePoints: number[] = [];
  for (const char of text) {
    const codePoint = char.codePointAt(0);
    if (codePoint !== undefined) {
      codePoints.push(codePoint);
    }
  }
  return codePoints;
}

export function fromCodePoints(codePoints: readonly number[]): string {
  return String.fromCodePoint(...codePoints);
}

export function codePointLength(text: string): number {
  return Array.from(text).length;
}

/**
 * Lower-cases a single code point. Characters whose lower-case form spans several code points
 * (e.g. U+0130) are left as they are, so folding never changes the length of the stream.
 */
export function foldCodePoint(codePoint: number): number {
  const lowered = toCodePoints(String.fromCodePoint(codePoint).toLowerCase());
  return lowered.length === 1 ? lowered[0] : codePoint;
}

export function foldText(text: string): string {
  return fromCodePoints(toCodePoints(text).map(foldCodePoint));
}
