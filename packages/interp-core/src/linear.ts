import { BoundsError, SampleError } from './errors';

export type ExtrapolationPolicy = 'throw' | 'flat' | 'linear';
export type Extrapolation = number | ExtrapolationPolicy;

export type LinearInterpolant = (xq: number) => number;

const POLICIES: readonly ExtrapolationPolicy[] = ['throw', 'flat', 'linear'];

export function isExtrapolationPolicy(v: unknown): v is ExtrapolationPolicy {
  return POLICIES.some(p => p === v);
}

/**
 * Index of the first element of sorted `xs` strictly greater than `xq`.
 */
export function bisectRight(xs: readonly number[], xq: number): number {
  let lo = 0;
  let hi = xs.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (xq < xs[mid]) hi = mid;
    else lo = mid + 1;
  }
  return lo;
}

function lerp(x0: number, x1: number, y0: number, y1: number, xq: number): number {
  if (xq === x0) return y0;
  if (xq === x1) return y1;
  const t = (xq - x0) / (x1 - x0);
  // weighted form keeps a -Infinity endpoint at -Infinity instead of NaN
  return (1 - t) * y0 + t * y1;
}

function validateSamples(xs: readonly number[], ys: readonly number[]): void {
  if (xs.length !== ys.length) {
    throw new SampleError(`Sample length mismatch: ${xs.length} abscissae, ${ys.length} ordinates`);
  }
  if (xs.length < 2) {
    throw new SampleError(`Need at least 2 samples, got ${xs.length}`);
  }
  for (let i = 0; i < xs.length; i++) {
    if (!Number.isFinite(xs[i])) {
      throw new SampleError(`Non-finite abscissa at index ${i}: ${xs[i]}`);
    }
    if (i > 0 && !(xs[i] > xs[i - 1])) {
      throw new SampleError(`Abscissae must be strictly increasing (index ${i}: ${xs[i - 1]} -> ${xs[i]})`);
    }
  }
}

/**
 * Piecewise-linear interpolant through `(xs[i], ys[i])`.
 *
 * Ordinates may be infinite: a node hit returns the stored sample, and a
 * segment touching `-Infinity` evaluates to `-Infinity`.
 *
 * Outside `[xs[0], xs[n-1]]` the `extrapolation` decides: a number is returned
 * as is, `'flat'` repeats the end sample, `'linear'` extends the end segment
 * and `'throw'` raises {@link BoundsError}.
 */
export function buildLinearInterpolant(
  xs: readonly number[],
  ys: readonly number[],
  extrapolation: Extrapolation = 'throw'
): LinearInterpolant {
  validateSamples(xs, ys);
  const x = xs.slice();
  const y = ys.slice();
  const last = x.length - 1;

  const outside = (xq: number, below: boolean): number => {
    if (typeof extrapolation === 'number') return extrapolation;
    switch (extrapolation) {
      case 'throw':
        throw new BoundsError(xq, x[0], x[last]);
      case 'flat':
        return below ? y[0] : y[last];
      case 'linear':
        return below
          ? lerp(x[0], x[1], y[0], y[1], xq)
          : lerp(x[last - 1], x[last], y[last - 1], y[last], xq);
    }
  };

  return (xq: number): number => {
    if (Number.isNaN(xq)) return NaN;
    if (xq < x[0]) return outside(xq, true);
    if (xq > x[last]) return outside(xq, false);
    const i = Math.min(bisectRight(x, xq), last) - 1;
    return lerp(x[i], x[i + 1], y[i], y[i + 1], xq);
  };
}
