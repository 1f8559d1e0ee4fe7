export { toZipkinSpan, formatAnnotation } from './model';
export type { ZipkinSpan, ZipkinEndpoint, ZipkinAnnotation, ZipkinKind } from './model';
export { ZipkinHttpSender, DEFAULT_ZIPKIN_ENDPOINT } from './http-sender';
export type { ZipkinHttpSenderOptions } from './http-sender';
