/**
 * Numeric guards for values read out of media containers, where NaN and
 * Infinity show up in practice (broken headers, zero timescales).
 */

export interface Size {
  width: number;
  height: number;
}

/** The value itself when finite, otherwise 0 */
export function finiteOrZero(value: number): number {
  return Number.isFinite(value) ? value : 0;
}

export function safeDiv(numerator: number, denominator: number, fallback = 0): number {
  if (!Number.isFinite(numerator) || !Number.isFinite(denominator) || denominator === 0) {
    return fallback;
  }
  const value = numerator / denominator;
  return Number.isFinite(value) ? value : fallback;
}

/**
 * Size from possibly-degenerate sides. Returns `fallback` unless both sides
 * are finite and strictly positive.
 */
export function safeSize(width: number, height: number, fallback: Size = { width: 0, height: 0 }): Size {
  const w = finiteOrZero(width);
  const h = finiteOrZero(height);
  return w > 0 && h > 0 ? { width: w, height: h } : { ...fallback };
}

export function clampPositive(value: number, min = 0.001): number {
  const v = finiteOrZero(value);
  return v > min ? v : min;
}
