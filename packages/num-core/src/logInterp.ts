import {
  BoundsError,
  buildLinearInterpolant,
  isExtrapolationPolicy,
  type Extrapolation,
  type ExtrapolationPolicy,
  type LinearInterpolant,
} from '@interp-core';
import { identityScale, type UnitScale } from './arithmetic';
import { InvalidArgumentError } from './errors';
import { createConsoleLogger, type Logger } from './logger';

export const LOG_INTERP_METHODS = ['loglog', 'xlog', 'ylog'] as const;
export type LogInterpMethod = (typeof LOG_INTERP_METHODS)[number];

export function parseLogInterpMethod(method: string): LogInterpMethod {
  const found = LOG_INTERP_METHODS.find(m => m === method);
  if (found === undefined) throw new InvalidArgumentError(`Unknown method: ${method}`);
  return found;
}

export interface LogInterpOptions<Y = number> {
  /** "loglog" (default), "xlog" or "ylog". */
  method?: string;
  /**
   * Out-of-domain behaviour. A value is divided by the output unit and handed
   * to the backend as is, so in the log-y modes it is a log-space level
   * (`-Infinity` gives 0). The string policies pass through unchanged.
   */
  extrapolation?: Y | ExtrapolationPolicy;
  /** Receives the warning for non-positive queries in log-x modes. */
  logger?: Logger;
}

export interface ScaledLogInterpOptions<X, Y> extends LogInterpOptions<Y> {
  xScale: UnitScale<X>;
  yScale: UnitScale<Y>;
}

export interface Interpolant<X = number, Y = number> {
  (x: X): Y;
  readonly method: LogInterpMethod;
}

const defaultLogger = createConsoleLogger('warn', console, 'loginterpolator');

// log with negative samples clamped to zero, i.e. to -Infinity
function clampedLog(v: number): number {
  return v < 0 ? -Infinity : Math.log(v);
}

function orZero(v: number): number {
  return Number.isNaN(v) ? 0 : v;
}

/**
 * Piecewise-linear interpolant over log-transformed samples, for values that
 * carry units through `xScale`/`yScale`. See {@link loginterpolator}.
 */
export function logInterpolatorOf<X, Y>(
  x: readonly X[],
  y: readonly Y[],
  options: ScaledLogInterpOptions<X, Y>
): Interpolant<X, Y> {
  const method = parseLogInterpMethod(options.method ?? 'loglog');
  const { xScale, yScale } = options;
  const logger = options.logger ?? defaultLogger;

  if (x.length !== y.length) {
    throw new InvalidArgumentError(`x and y must have equal length (got ${x.length} and ${y.length})`);
  }
  const xn = x.map(v => xScale.toNumber(v));
  const yn = y.map(v => yScale.toNumber(v));

  const logX = method !== 'ylog';
  const logY = method !== 'xlog';

  if (logX) {
    const bad = xn.findIndex(v => !(v > 0));
    if (bad >= 0) {
      throw new InvalidArgumentError(`x samples must be positive for ${method}, got ${xn[bad]} at index ${bad}`);
    }
  }

  const ext = options.extrapolation;
  let bc: Extrapolation;
  if (ext === undefined) bc = logY ? -Infinity : 0;
  else if (isExtrapolationPolicy(ext)) bc = ext;
  else bc = yScale.toNumber(ext);

  const backend: LinearInterpolant = buildLinearInterpolant(
    logX ? xn.map(Math.log) : xn,
    logY ? yn.map(clampedLog) : yn,
    bc
  );
  const lower = xn[0];
  const upper = xn[xn.length - 1];

  const evaluate = (xq: number): number => {
    if (!logX) return backend(xq);
    try {
      return backend(Math.log(xq));
    } catch (err) {
      // report the domain in caller coordinates, not log space
      if (err instanceof BoundsError) throw new BoundsError(xq, lower, upper);
      throw err;
    }
  };

  const interpolant = (q: X): Y => {
    const xq = xScale.toNumber(q);
    if (logX && xq <= 0) {
      logger.warn(`x = ${xq} is not positive; ${method} interpolant returns 0`, { method, x: xq });
      return yScale.fromNumber(0);
    }
    const v = evaluate(xq);
    return yScale.fromNumber(logY ? orZero(Math.exp(v)) : v);
  };

  return Object.assign(interpolant, { method });
}

/**
 * Interpolant that is piecewise linear in log-log (`"loglog"`), log-x
 * (`"xlog"`) or log-y (`"ylog"`) coordinates.
 *
 * In the log-y modes negative samples count as 0, results that come out NaN
 * (from `log 0 = -Infinity` segments) are 0, and out-of-range queries return 0
 * unless `extrapolation` says otherwise; a numeric level there is in log space,
 * so `extrapolation: 1` answers `e`. In `"xlog"` the default level is 0.
 * Log-x interpolants answer 0, with a warning, for queries `<= 0`.
 *
 * @example
 * const f = loginterpolator([1, 10, 100], [1, 100, 10000]);
 * f(31.6) // ~1000
 */
export function loginterpolator(
  x: readonly number[],
  y: readonly number[],
  options: LogInterpOptions = {}
): Interpolant {
  return logInterpolatorOf(x, y, { ...options, xScale: identityScale, yScale: identityScale });
}
