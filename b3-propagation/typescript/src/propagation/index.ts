/**
 * Propagation module exports
 */

// Carrier interface and implementation
export type { Carrier } from './header-carrier';
export { HeaderCarrier, toCarrier } from './header-carrier';

// B3 multi-header
export {
  X_B3_TRACE_ID,
  X_B3_SPAN_ID,
  X_B3_PARENT_SPAN_ID,
  X_B3_SAMPLED,
  X_B3_FLAGS,
  injectB3MultiContext,
  extractB3MultiContext,
} from './b3-multi';
export type { B3Fields } from './b3-multi';

// B3 single header
export {
  B3_SINGLE,
  formatB3Single,
  parseB3Single,
  injectB3SingleContext,
  extractB3SingleContext,
} from './b3-single';
export type { B3SamplingOnly } from './b3-single';

// Baggage
export {
  BAGGAGE_HEADER_PREFIX,
  DEFAULT_BAGGAGE_LIMITS,
  applyBaggageLimits,
  injectBaggage,
  extractBaggage,
} from './baggage';
export type { BaggageLimits, LimitedBaggage } from './baggage';

// Propagator
export { B3Propagator } from './propagator';
export type { B3Format, B3PropagatorOptions } from './propagator';
