export {
  ConstSampler,
  ProbabilisticSampler,
  RateLimitingSampler,
} from './sampler';
export type { Sampler, RootSamplingDecision } from './sampler';
