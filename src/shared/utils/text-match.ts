export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Matches `term` as a standalone token: not glued to letters or digits on either side,
 * so "c++" and "node.js" work while "go" does not match inside "django".
 */
export function buildTermPattern(term: string, flags = "i"): RegExp {
  const body = escapeRegExp(term.trim().toLowerCase()).replace(/\s+/g, "\\s+");
  return new RegExp(`(?<![a-z0-9])${body}(?![a-z0-9])`, flags);
}

export function containsTerm(text: string, term: string): boolean {
  if (!term.trim()) {
    return false;
  }
  return buildTermPattern(term).test(text.toLowerCase());
}

export function countTermOccurrences(text: string, term: string): number {
  if (!term.trim()) {
    return 0;
  }
  const matches = text.toLowerCase().match(buildTermPattern(term, "gi"));
  return matches ? matches.length : 0;
}

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function clamp(value: number, min: number, max: number): number {
  if (value < min) {
    return min;
  }
  if (value > max) {
    return max;
  }
  return value;
}
