import { SPLITTER } from './constants';

/** Unevaluated sum `hi + lo`; `|lo|` is at most half an ulp of `hi`. */
export type DoubleDouble = readonly [hi: number, lo: number];

/** Knuth's TwoSum: `a + b === hi + lo` exactly. */
export function twoSum(a: number, b: number): DoubleDouble {
  const s = a + b;
  const bb = s - a;
  return [s, (a - (s - bb)) + (b - bb)];
}

function split(a: number): DoubleDouble {
  const c = SPLITTER * a;
  const hi = c - (c - a);
  return [hi, a - hi];
}

/** Dekker's product: `a * b === hi + lo` exactly (barring overflow/underflow). */
export function twoProd(a: number, b: number): DoubleDouble {
  const p = a * b;
  const [ah, al] = split(a);
  const [bh, bl] = split(b);
  return [p, ((ah * bh - p) + ah * bl + al * bh) + al * bl];
}
