export { BoundsError, SampleError } from './errors';
export {
  bisectRight,
  buildLinearInterpolant,
  isExtrapolationPolicy,
} from './linear';
export type { Extrapolation, ExtrapolationPolicy, LinearInterpolant } from './linear';
