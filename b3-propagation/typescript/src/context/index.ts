export { SpanContext, isValidBaggageKey } from './span-context';
export type { SpanContextInit } from './span-context';
