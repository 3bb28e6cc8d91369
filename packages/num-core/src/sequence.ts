import { float64, type Arithmetic } from './arithmetic';
import { DEFAULT_NUM } from './constants';
import { InvalidArgumentError } from './errors';

function intervals(num: number, endpoint: boolean): number {
  if (!Number.isInteger(num)) {
    throw new InvalidArgumentError(`num must be an integer, got ${num}`);
  }
  if (num <= 1) throw new InvalidArgumentError('num <= 1');
  return endpoint ? num - 1 : num;
}

/**
 * Geometric sequence `v[i] = start * (stop/start)^(i/n)`, `i = 0..num-1`, with
 * `n = num - 1` when `endpoint` is set (so `stop` is the last sample) and
 * `n = num` otherwise.
 *
 * Samples are accumulated as `v[i] = v[i-1] * q`; `v[0]` is `start` unchanged.
 *
 * @example geomspace(1, 1e4, 5) // [1, 10, 100, 1000, 10000]
 */
export function geomspaceOf<T>(
  ops: Arithmetic<T>,
  start: T,
  stop: T,
  num: number = DEFAULT_NUM,
  endpoint = true
): T[] {
  const n = intervals(num, endpoint);
  const q = ops.pow(ops.div(stop, start), 1 / n);
  const out: T[] = new Array<T>(num);
  out[0] = start;
  for (let i = 1; i < num; i++) {
    out[i] = ops.mul(out[i - 1], q);
  }
  return out;
}

/**
 * Arithmetic sequence `v[i] = start + i * (stop - start) / n`, same `n` as
 * {@link geomspaceOf}. Samples are accumulated as `v[i] = v[i-1] + d`.
 *
 * @example linspace(1, 5, 5) // [1, 2, 3, 4, 5]
 */
export function linspaceOf<T>(
  ops: Arithmetic<T>,
  start: T,
  stop: T,
  num: number = DEFAULT_NUM,
  endpoint = true
): T[] {
  const n = intervals(num, endpoint);
  const d = ops.divScalar(ops.sub(stop, start), n);
  const out: T[] = new Array<T>(num);
  out[0] = start;
  for (let i = 1; i < num; i++) {
    out[i] = ops.add(out[i - 1], d);
  }
  return out;
}

export function geomspace(start: number, stop: number, num: number = DEFAULT_NUM, endpoint = true): number[] {
  return geomspaceOf(float64, start, stop, num, endpoint);
}

export function linspace(start: number, stop: number, num: number = DEFAULT_NUM, endpoint = true): number[] {
  return linspaceOf(float64, start, stop, num, endpoint);
}
