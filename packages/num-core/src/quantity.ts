import type { Arithmetic, UnitScale } from './arithmetic';
import { InvalidArgumentError } from './errors';

export type Dimensions = Readonly<Record<string, number>>;

function combine(a: Dimensions, b: Dimensions, sign: 1 | -1): Dimensions {
  const out: Record<string, number> = { ...a };
  for (const [unit, exp] of Object.entries(b)) {
    const e = (out[unit] ?? 0) + sign * exp;
    if (e === 0) delete out[unit];
    else out[unit] = e;
  }
  return out;
}

function sameDimensions(a: Dimensions, b: Dimensions): boolean {
  const ka = Object.keys(a);
  if (ka.length !== Object.keys(b).length) return false;
  return ka.every(k => a[k] === b[k]);
}

export function formatDimensions(d: Dimensions): string {
  const parts = Object.keys(d)
    .sort()
    .map(k => (d[k] === 1 ? k : `${k}^${d[k]}`));
  return parts.length ? parts.join(' ') : '1';
}

/**
 * A real value tagged with unit exponents, e.g. `Quantity.of(9.81, { m: 1, s: -2 })`.
 * Immutable; every operation returns a new instance.
 */
export class Quantity {
  private constructor(
    readonly value: number,
    readonly dims: Dimensions
  ) {}

  static of(value: number, dims: Dimensions = {}): Quantity {
    const clean: Record<string, number> = {};
    for (const [unit, exp] of Object.entries(dims)) {
      if (exp !== 0) clean[unit] = exp;
    }
    return new Quantity(value, Object.freeze(clean));
  }

  get isDimensionless(): boolean {
    return Object.keys(this.dims).length === 0;
  }

  private assertSameDims(other: Quantity, op: string): void {
    if (!sameDimensions(this.dims, other.dims)) {
      throw new InvalidArgumentError(
        `Dimension mismatch in ${op}: ${formatDimensions(this.dims)} vs ${formatDimensions(other.dims)}`
      );
    }
  }

  add(other: Quantity): Quantity {
    this.assertSameDims(other, 'add');
    return new Quantity(this.value + other.value, this.dims);
  }

  sub(other: Quantity): Quantity {
    this.assertSameDims(other, 'sub');
    return new Quantity(this.value - other.value, this.dims);
  }

  mul(other: Quantity): Quantity {
    return new Quantity(this.value * other.value, combine(this.dims, other.dims, 1));
  }

  div(other: Quantity): Quantity {
    return new Quantity(this.value / other.value, combine(this.dims, other.dims, -1));
  }

  scale(k: number): Quantity {
    return new Quantity(this.value * k, this.dims);
  }

  divScalar(k: number): Quantity {
    return new Quantity(this.value / k, this.dims);
  }

  pow(p: number): Quantity {
    const dims: Record<string, number> = {};
    for (const [unit, exp] of Object.entries(this.dims)) dims[unit] = exp * p;
    return Quantity.of(this.value ** p, dims);
  }

  sqrt(): Quantity {
    const dims: Record<string, number> = {};
    for (const [unit, exp] of Object.entries(this.dims)) dims[unit] = exp / 2;
    return Quantity.of(Math.sqrt(this.value), dims);
  }

  sign(): number {
    return Math.sign(this.value);
  }

  toNumber(): number {
    if (!this.isDimensionless) {
      throw new InvalidArgumentError(`Expected a dimensionless quantity, got ${this.toString()}`);
    }
    return this.value;
  }

  /** Plain value of this quantity measured in `unit`. */
  in(unit: Quantity): number {
    this.assertSameDims(unit, 'unit conversion');
    return this.value / unit.value;
  }

  toString(): string {
    return this.isDimensionless ? `${this.value}` : `${this.value} ${formatDimensions(this.dims)}`;
  }
}

export const quantityArithmetic: Arithmetic<Quantity> = {
  add: (a, b) => a.add(b),
  sub: (a, b) => a.sub(b),
  mul: (a, b) => a.mul(b),
  div: (a, b) => a.div(b),
  mulScalar: (a, k) => a.scale(k),
  divScalar: (a, k) => a.divScalar(k),
  pow: (a, p) => a.pow(p),
  sqrt: a => a.sqrt(),
  sign: a => a.sign(),
  toNumber: a => a.toNumber(),
};

export function unitScale(unit: Quantity): UnitScale<Quantity> {
  return {
    toNumber: v => v.in(unit),
    fromNumber: n => unit.scale(n),
  };
}
