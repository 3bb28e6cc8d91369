export { BoundsError, SampleError } from '@interp-core';

/** Malformed call argument (bad sample count, unknown method, mismatched units). */
export class InvalidArgumentError extends Error {
  override readonly name = 'InvalidArgumentError';
}

/** Argument outside the real domain of the function. */
export class DomainError extends Error {
  override readonly name = 'DomainError';

  constructor(message: string, readonly value?: number) {
    super(message);
  }
}
