/** Query fell outside the sample domain under the "throw" extrapolation policy. */
export class BoundsError extends RangeError {
  override readonly name = 'BoundsError';

  constructor(
    readonly query: number,
    readonly lower: number,
    readonly upper: number,
  ) {
    super(`Query ${query} is outside the interpolation domain [${lower}, ${upper}]`);
  }
}

export class SampleError extends Error {
  override readonly name = 'SampleError';
}
