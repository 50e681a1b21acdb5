import type { ResultPoint } from '../extractor/extractor.js';

const BARE_INTEGER = /^-?\d+$/;

/**
 * Number literal for a measured time, readable by the plotting script's
 * `eval`. Whole values keep a ".0" so every time reads back as a float;
 * non-finite values are spelled as `float(...)` calls.
 */
export function formatTime(time: number): string {
  if (Number.isNaN(time)) return "float('nan')";
  if (time === Infinity) return "float('inf')";
  if (time === -Infinity) return "float('-inf')";
  if (Object.is(time, -0)) return '-0.0';

  const text = String(time);
  return BARE_INTEGER.test(text) ? `${text}.0` : text;
}

export function formatResultSet(points: readonly ResultPoint[]): string {
  return `[${points.map(({ index, time }) => `(${index}, ${formatTime(time)})`).join(', ')}]`;
}
