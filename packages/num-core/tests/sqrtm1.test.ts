import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { EPS } from '../src/constants';
import { DomainError, InvalidArgumentError } from '../src/errors';
import { Quantity, formatDimensions, quantityArithmetic } from '../src/quantity';
import { geomspace } from '../src/sequence';
import { sqrtm1, sqrtm1Of } from '../src/sqrtm1';
import { expectRelClose, referenceSqrtm1 } from './helpers/expectClose';

const positive = geomspace(1e-30, 1e30);
const negative = geomspace(-1e-30, -1);

describe('sqrtm1(x)', () => {
  it('keeps digits where the direct formula cancels', () => {
    expect(Math.sqrt(1 + 1e-16) - 1).toBe(0);
    expect(sqrtm1(1e-16)).toBe(5e-17);
  });

  it('handles the boundary values exactly', () => {
    expect(sqrtm1(-1)).toBe(-1);
    expect(sqrtm1(0)).toBe(0);
    expect(sqrtm1(3)).toBe(1);
    expect(sqrtm1(Infinity)).toBe(Infinity);
    expect(sqrtm1(NaN)).toBeNaN();
  });

  it('raises a DomainError below -1', () => {
    expect(() => sqrtm1(-2.0)).toThrow(DomainError);
    expect(() => sqrtm1(-2.0)).toThrow('-2 < -1');
    expect(() => sqrtm1(-1 - EPS)).toThrow(DomainError);
  });

  it('matches a high-precision reference on 1e-30 .. 1e30', () => {
    for (const x of positive) {
      expectRelClose(sqrtm1(x), referenceSqrtm1(x), EPS, `x=${x}: `);
    }
  });

  it('matches a high-precision reference on -1e-30 .. -1', () => {
    for (const x of negative) {
      expectRelClose(sqrtm1(x), referenceSqrtm1(x), EPS, `x=${x}: `);
    }
  });

  it('satisfies (sqrtm1(x) + 1)^2 = 1 + x (property)', () => {
    fc.assert(fc.property(fc.double({ min: -1, max: 1e6, noNaN: true }), x => {
      const r = sqrtm1(x);
      return Math.abs((r + 1) * (r + 1) - (1 + x)) <= 4 * EPS * (1 + Math.abs(x));
    }), { numRuns: 500 });
  });
});

describe('sqrtm1(x, a)', () => {
  for (const a of [1, -1, 1e40]) {
    it(`matches a high-precision reference for a = ${a}`, () => {
      for (const x of [...positive, ...negative]) {
        expectRelClose(sqrtm1(x, a), referenceSqrtm1(x, a), EPS, `x=${x}, a=${a}: `);
      }
    });
  }

  it('reduces to Math.sqrt for a = 0', () => {
    for (const x of positive) {
      expect(sqrtm1(x, 0)).toBe(Math.sqrt(x));
      expectRelClose(sqrtm1(x, 0), referenceSqrtm1(x, 0), EPS, `x=${x}: `);
    }
  });

  it('agrees with the one-argument form for a = 1', () => {
    expect(sqrtm1(3, 1)).toBe(1);
    expect(sqrtm1(-1, 1)).toBe(-1);
    expect(sqrtm1(1e-16, 1)).toBe(5e-17);
  });

  it('evaluates exact cases', () => {
    expect(sqrtm1(16, 3)).toBe(2);
    expect(sqrtm1(16, -3)).toBe(8);
    expect(sqrtm1(0, -1)).toBe(2);
    expect(sqrtm1(-4, 2)).toBe(-2);
  });

  it('stays accurate when x underflows next to a^2', () => {
    expect(sqrtm1(1e-30, 1e200)).toBe(referenceSqrtm1(1e-30, 1e200));
  });

  it('keeps subnormal x in the small-ratio branch', () => {
    expect(sqrtm1(-5e-324, 7.145e-52)).toBeLessThan(0);
    expect(sqrtm1(-5e-324, 7.145e-52)).toBe(referenceSqrtm1(-5e-324, 7.145e-52));
  });

  it('handles |a| next to Number.MAX_VALUE', () => {
    expect(sqrtm1(0, -Number.MAX_VALUE)).toBe(Infinity);
    expect(sqrtm1(0, Number.MAX_VALUE)).toBe(0);
    expect(sqrtm1(-1, Number.MAX_VALUE)).toBeLessThan(0);
  });

  it('raises a DomainError when a^2 + x < 0', () => {
    expect(() => sqrtm1(-5, 2)).toThrow(DomainError);
    expect(() => sqrtm1(-5, -2)).toThrow(DomainError);
    expect(() => sqrtm1(-1, 0)).toThrow(DomainError);
  });
});

describe('sqrtm1Of', () => {
  const m = (v: number) => Quantity.of(v, { m: 1 });
  const m2 = (v: number) => Quantity.of(v, { m: 2 });

  it('rescales by a positive a and keeps its unit', () => {
    const r = sqrtm1Of(quantityArithmetic, m2(1e-20), m(1));
    expect(r.value).toBe(5e-21);
    expect(formatDimensions(r.dims)).toBe('m');
  });

  it('evaluates directly for non-positive a', () => {
    expect(sqrtm1Of(quantityArithmetic, m2(5), m(-2)).value).toBe(5);
    expect(sqrtm1Of(quantityArithmetic, m2(9), m(0)).value).toBe(3);
  });

  it('raises a DomainError for a negative radicand', () => {
    expect(() => sqrtm1Of(quantityArithmetic, m2(-2), m(-1))).toThrow(DomainError);
    expect(() => sqrtm1Of(quantityArithmetic, m2(-2), m(1))).toThrow(DomainError);
  });

  it('rejects x that is not commensurate with a^2', () => {
    const s = Quantity.of(1, { s: 1 });
    expect(() => sqrtm1Of(quantityArithmetic, s, m(1))).toThrow(InvalidArgumentError);
  });
});
