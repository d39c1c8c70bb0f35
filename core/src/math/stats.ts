/**
 * Small numeric helpers shared by the scorers and fusion.
 */

export function mean(arr: number[]): number {
  const len = arr.length;
  if (len === 0) return 0;
  let sum = 0;
  for (let i = 0; i < len; i++) sum += arr[i];
  return sum / len;
}

export function variance(arr: number[]): number {
  const len = arr.length;
  if (len === 0) return 0;
  const m = mean(arr);
  let sum = 0;
  for (let i = 0; i < len; i++) {
    const d = arr[i] - m;
    sum += d * d;
  }
  return sum / len;
}

export function std(arr: number[]): number {
  return Math.sqrt(variance(arr));
}

export function clamp(val: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, val));
}

export function clampUnit(val: number): number {
  return clamp(val, 0, 1);
}

export function roundTo(val: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(val * factor) / factor;
}

/** Display percentage of a [0, 1] score, rounded to one decimal. */
export function toPercent(score: number): number {
  return roundTo(score * 100, 1);
}
