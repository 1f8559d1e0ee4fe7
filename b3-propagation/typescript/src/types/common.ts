/**
 * Common types shared by spans, propagation and reporting.
 */

/**
 * Tag value can be a string, number, or boolean
 */
export type TagValue = string | number | boolean;

/**
 * Tags are key-value pairs attached to a span
 */
export type Tags = Record<string, TagValue>;

/**
 * Structured fields of a single span log entry
 */
export type LogFields = Record<string, TagValue>;

/**
 * Plain header record as produced by Node's http module
 */
export type HeaderRecord = Record<string, string | string[] | undefined>;
