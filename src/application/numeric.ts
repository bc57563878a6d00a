/**
 * Rounds to `dp` decimals by the exact value of `n`, with exact ties going
 * to the even neighbour: 4.625 -> 4.62, while 2.675 -> 2.67 because it is
 * stored just below the tie. Never returns -0.
 */
export function round(n: number, dp: number): number {
  const abs = Math.abs(n);
  if (!Number.isFinite(n) || abs >= 1e21) return n;

  // toFixed works on the exact binary value, up to 100 digits
  const exact = abs.toFixed(100);
  const cut = exact.indexOf('.') + 1 + dp;
  let r: number;
  if (/^50*$/.test(exact.slice(cut))) {
    const m = Math.pow(10, dp);
    const k = Math.round(Number(exact.slice(0, cut)) * m);
    r = (k % 2 === 0 ? k : k + 1) / m;
  } else {
    r = Number(abs.toFixed(dp));
  }
  return n < 0 && r !== 0 ? -r : r;
}

// Scaled values are first snapped to 6 decimals so 0.1 * 100 counts as 10.
export function ceilTo(n: number, dp: number): number {
  const m = Math.pow(10, dp);
  return Math.ceil(round(n * m, 6)) / m + 0;
}

export function floorTo(n: number, dp: number): number {
  const m = Math.pow(10, dp);
  return Math.floor(round(n * m, 6)) / m + 0;
}

export function clamp(n: number, lo: number, hi: number): number {
  return Math.min(hi, Math.max(lo, n));
}

export function sum(values: Iterable<number>): number {
  let total = 0;
  for (const v of values) total += v;
  return total;
}
