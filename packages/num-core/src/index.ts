export { float64, identityScale } from './arithmetic';
export type { Arithmetic, UnitScale } from './arithmetic';
export { DEFAULT_NUM, EPS, SQRTM1_TAYLOR_THRESHOLD } from './constants';
export { BoundsError, DomainError, InvalidArgumentError, SampleError } from './errors';
export { createConsoleLogger, silentLogger } from './logger';
export type { ConsoleSink, Logger, LogLevel, LogMeta } from './logger';
export {
  LOG_INTERP_METHODS,
  loginterpolator,
  logInterpolatorOf,
  parseLogInterpMethod,
} from './logInterp';
export type {
  Interpolant,
  LogInterpMethod,
  LogInterpOptions,
  ScaledLogInterpOptions,
} from './logInterp';
export { Quantity, formatDimensions, quantityArithmetic, unitScale } from './quantity';
export type { Dimensions } from './quantity';
export { geomspace, geomspaceOf, linspace, linspaceOf } from './sequence';
export { sqrtm1, sqrtm1Of } from './sqrtm1';
export { isExtrapolationPolicy } from '@interp-core';
export type { Extrapolation, ExtrapolationPolicy } from '@interp-core';
