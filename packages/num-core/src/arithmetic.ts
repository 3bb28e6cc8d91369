/**
 * Minimal arithmetic a value type must offer to flow through the sequence
 * generators and `sqrtm1Of`. Plain numbers use {@link float64}; unit-carrying
 * values (see `Quantity`) supply their own instance.
 */
export interface Arithmetic<T> {
  readonly add: (a: T, b: T) => T;
  readonly sub: (a: T, b: T) => T;
  readonly mul: (a: T, b: T) => T;
  readonly div: (a: T, b: T) => T;
  /** Multiply by a plain real. */
  readonly mulScalar: (a: T, k: number) => T;
  /** Divide by a plain real. */
  readonly divScalar: (a: T, k: number) => T;
  readonly pow: (a: T, p: number) => T;
  readonly sqrt: (a: T) => T;
  /** -1, 0 or 1 (NaN when unordered). */
  readonly sign: (a: T) => number;
  /** Plain value of a dimensionless element. */
  readonly toNumber: (a: T) => number;
}

export const float64: Arithmetic<number> = {
  add: (a, b) => a + b,
  sub: (a, b) => a - b,
  mul: (a, b) => a * b,
  div: (a, b) => a / b,
  mulScalar: (a, k) => a * k,
  divScalar: (a, k) => a / k,
  pow: (a, p) => a ** p,
  sqrt: a => Math.sqrt(a),
  sign: a => Math.sign(a),
  toNumber: a => a,
};

/**
 * Conversion between a value type and plain numbers expressed in a fixed unit:
 * `toNumber` divides by the unit, `fromNumber` multiplies back.
 */
export interface UnitScale<T> {
  readonly toNumber: (v: T) => number;
  readonly fromNumber: (n: number) => T;
}

export const identityScale: UnitScale<number> = {
  toNumber: v => v,
  fromNumber: n => n,
};
