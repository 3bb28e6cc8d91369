import type { Arithmetic } from './arithmetic';
import { EPS, SQRTM1_TAYLOR_THRESHOLD } from './constants';
import { twoProd, twoSum } from './eft';
import { DomainError } from './errors';

/**
 * `sqrt(a^2 + x) - a` for `|a|` of order one, carried in double-double so the
 * result is within an ulp even when `x` is tiny next to `a^2`.
 * NaN when the radicand is negative.
 */
function compensated(x: number, a: number): number {
  const [ph, pl] = twoProd(a, a);
  const [sh, s0] = twoSum(ph, x);
  const sl = s0 + pl;
  if (sh < 0 || (sh === 0 && sl < 0)) return NaN;

  const s = Math.sqrt(sh);
  let sLo = 0;
  if (s > 0) {
    const [p, pe] = twoProd(s, s);
    sLo = (((sh - p) - pe) + sl) / (2 * s);
  }

  if (a < 0) {
    const [dh, dl] = twoSum(s, -a);
    return dh + (dl + sLo);
  }

  // x / (sqrt(a^2 + x) + a), quotient corrected by its exact residual
  const [dh, d0] = twoSum(s, a);
  const dl = d0 + sLo;
  const q = x / dh;
  const [qh, ql] = twoProd(q, dh);
  return q + (((x - qh) - ql) - q * dl) / dh;
}

/**
 * `sqrt(1 + x) - 1` without the cancellation the direct formula suffers for small `|x|`.
 *
 * @example sqrtm1(1e-16) // 5e-17, where Math.sqrt(1 + 1e-16) - 1 gives 0
 */
export function sqrtm1(x: number): number;
/**
 * `sqrt(a^2 + x) - a`, accurate when `x` is small next to `a^2`.
 * `sqrtm1(x, 0)` is `Math.sqrt(x)`.
 */
export function sqrtm1(x: number, a: number): number;
export function sqrtm1(x: number, a?: number): number {
  if (a === undefined) {
    if (x < -1) throw new DomainError(`${x} < -1`, x);
    if (Math.abs(x) < SQRTM1_TAYLOR_THRESHOLD) return x / 2;
    if (!Number.isFinite(x)) return x;
    return compensated(x, 1);
  }

  if (!Number.isFinite(x) || !Number.isFinite(a)) return Math.sqrt(a * a + x) - a;
  if (a === 0) {
    if (x < 0) throw new DomainError(`${x} < 0`, x);
    return Math.sqrt(x);
  }

  // exact power-of-two rescale: a/s has magnitude in [1, 2)
  const s = 2 ** Math.min(Math.floor(Math.log2(Math.abs(a))), 1023);
  const xs = x / s / s;
  if (!Number.isFinite(xs)) return Math.sqrt(a * a + x) - a;
  if (a > 0 && Math.abs(xs) < EPS * EPS) return x / a / 2;

  const r = s * compensated(xs, a / s);
  if (Number.isNaN(r)) throw new DomainError(`${a}^2 + ${x} < 0`, x);
  return r;
}

/**
 * Generic `sqrt(a^2 + x) - a` for unit-carrying values; `x` must be commensurate
 * with `a^2`. For positive `a` this is `a * sqrtm1(x / a^2)` with the ratio
 * taken as a plain number.
 */
export function sqrtm1Of<T>(ops: Arithmetic<T>, x: T, a: T): T {
  const a2 = ops.mul(a, a);
  if (ops.sign(a) > 0) {
    return ops.mulScalar(a, sqrtm1(ops.toNumber(ops.div(x, a2))));
  }
  const radicand = ops.add(a2, x);
  if (ops.sign(radicand) < 0) {
    throw new DomainError('a^2 + x < 0');
  }
  return ops.sub(ops.sqrt(radicand), a);
}
