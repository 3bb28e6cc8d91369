import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { EPS } from '../src/constants';
import { InvalidArgumentError } from '../src/errors';
import { Quantity, formatDimensions, quantityArithmetic } from '../src/quantity';
import { geomspace, geomspaceOf, linspace, linspaceOf } from '../src/sequence';
import { expectAbsClose, expectRelClose } from './helpers/expectClose';

describe('geomspace', () => {
  it('rejects num <= 1', () => {
    expect(() => geomspace(1, 2, 1)).toThrow(InvalidArgumentError);
    expect(() => geomspace(1.0, 2.0, -2)).toThrow('num <= 1');
    expect(() => geomspace(1, 2, 2.5)).toThrow('num must be an integer, got 2.5');
  });

  it('defaults to 50 samples', () => {
    expect(geomspace(1, 2)).toHaveLength(50);
  });

  it('spans decades with the endpoint', () => {
    const v = geomspace(1e-20, 1e20, 41);
    expect(v).toHaveLength(41);
    v.forEach((vi, i) => expectRelClose(vi, 1e-20 * 10 ** i, 1e-12, `i=${i}: `));
  });

  it('stops one step short without the endpoint', () => {
    const v = geomspace(1e-20, 1e20, 40, false);
    expect(v).toHaveLength(40);
    v.forEach((vi, i) => expectRelClose(vi, 1e-20 * 10 ** i, 1e-12, `i=${i}: `));
  });

  it('keeps start bit-for-bit and ends at stop', () => {
    const v = geomspace(0.1, 10, 7);
    expect(Object.is(v[0], 0.1)).toBe(true);
    expectRelClose(v[6], 10, 8 * EPS);
  });

  it('follows the geometric law for a descending range', () => {
    const v = geomspace(8, 1, 4);
    const q = (1 / 8) ** (1 / 3);
    expect(q).toBeLessThan(1);
    v.forEach((vi, i) => expectRelClose(vi, 8 * q ** i, 8 * EPS, `i=${i}: `));
    expectRelClose(v[3], 1, 8 * EPS);
  });

  it('preserves sign for a negative range', () => {
    const v = geomspace(-1, -1000, 4);
    expect(v.every(vi => vi < 0)).toBe(true);
    [1, 10, 100, 1000].forEach((mag, i) => expectRelClose(-v[i], mag, 1e-14, `i=${i}: `));
  });

  it('has num samples starting at start (property)', () => {
    const arb = fc.record({
      start: fc.double({ min: 1e-3, max: 1e3, noNaN: true }),
      stop: fc.double({ min: 1e-3, max: 1e3, noNaN: true }),
      num: fc.integer({ min: 2, max: 200 }),
    });
    fc.assert(fc.property(arb, ({ start, stop, num }) => {
      const v = geomspace(start, stop, num);
      return v.length === num
        && v[0] === start
        && Math.abs(v[num - 1] - stop) <= 4 * num * EPS * stop;
    }), { numRuns: 200 });
  });
});

describe('linspace', () => {
  it('rejects num <= 1', () => {
    expect(() => linspace(1, 2, 1)).toThrow(InvalidArgumentError);
    expect(() => linspace(1.0, 2.0, -2)).toThrow('num <= 1');
  });

  it('defaults to 50 samples', () => {
    expect(linspace(1, 2)).toHaveLength(50);
  });

  it('matches a + i * (b - a) / n with the endpoint', () => {
    const v = linspace(-1, 1.0, 11);
    expect(v).toHaveLength(11);
    v.forEach((vi, i) => expectAbsClose(vi, -1 + i * 0.2, EPS, `i=${i}: `));
  });

  it('matches a + i * (b - a) / num without the endpoint', () => {
    const v = linspace(-1.0, 1, 10, false);
    expect(v).toHaveLength(10);
    v.forEach((vi, i) => expectAbsClose(vi, -1 + i * 0.2, EPS, `i=${i}: `));
  });

  it('produces exact grids for representable steps', () => {
    expect(linspace(1.0, 5.0, 5)).toEqual([1, 2, 3, 4, 5]);
    expect(linspace(0, 10, 5, false)).toEqual([0, 2, 4, 6, 8]);
    expect(linspace(2, -2, 5)).toEqual([2, 1, 0, -1, -2]);
  });

  it('has num samples ending near stop (property)', () => {
    const arb = fc.record({
      start: fc.double({ min: -1e6, max: 1e6, noNaN: true }),
      stop: fc.double({ min: -1e6, max: 1e6, noNaN: true }),
      num: fc.integer({ min: 2, max: 200 }),
    });
    fc.assert(fc.property(arb, ({ start, stop, num }) => {
      const v = linspace(start, stop, num);
      const tol = (num + 2) * EPS * Math.max(Math.abs(start), Math.abs(stop)) + num * Number.MIN_VALUE;
      return v.length === num
        && Object.is(v[0], start)
        && Math.abs(v[num - 1] - stop) <= tol;
    }), { numRuns: 200 });
  });
});

describe('generic sequences', () => {
  const hz = (v: number) => Quantity.of(v, { Hz: 1 });
  const m = (v: number) => Quantity.of(v, { m: 1 });

  it('carries units through linspaceOf', () => {
    const v = linspaceOf(quantityArithmetic, m(0), m(1), 5);
    expect(v.map(q => q.value)).toEqual([0, 0.25, 0.5, 0.75, 1]);
    expect(v.every(q => formatDimensions(q.dims) === 'm')).toBe(true);
  });

  it('carries units through geomspaceOf', () => {
    const v = geomspaceOf(quantityArithmetic, hz(1), hz(1000), 4);
    [1, 10, 100, 1000].forEach((f, i) => expectRelClose(v[i].value, f, 1e-14, `i=${i}: `));
    expect(v.every(q => formatDimensions(q.dims) === 'Hz')).toBe(true);
  });

  it('rejects mismatched units', () => {
    expect(() => linspaceOf(quantityArithmetic, m(0), hz(1), 5)).toThrow(InvalidArgumentError);
  });
});
