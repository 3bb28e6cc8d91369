/** Machine epsilon of IEEE-754 binary64. */
export const EPS = Number.EPSILON;

// below this |x|, sqrt(1+x)-1 is x/2 to within rounding
export const SQRTM1_TAYLOR_THRESHOLD = 2 * EPS;

export const DEFAULT_NUM = 50;

// Veltkamp splitter for binary64: 2^27 + 1
export const SPLITTER = 134217729;
