export {
  generateTraceId,
  generateSpanId,
  parseTraceId,
  parseSpanId,
  isValidTraceId,
  isValidSpanId,
  formatId,
  lowerTraceIdBits,
  SPAN_ID_LENGTH,
  TRACE_ID_LENGTHS,
} from './identifiers';
export type { TraceId, SpanId } from './identifiers';
