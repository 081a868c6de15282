/**
 * JSON encoding for Dockerfile values.
 *
 * Exec-form instructions and quoted values must be JSON literals (double
 * quotes only). Output matches an ASCII-only JSON encoder: DEL and non-ASCII
 * code units become lowercase \uXXXX escapes and array items are separated
 * by ", ".
 */

const NON_PRINTABLE_ASCII_PATTERN = /[\u007f-\uffff]/g;

/** Encode a string as a JSON string literal. */
export function quote(value: string): string {
  return JSON.stringify(value).replace(
    NON_PRINTABLE_ASCII_PATTERN,
    (ch) => `\\u${ch.charCodeAt(0).toString(16).padStart(4, "0")}`
  );
}

/** Encode strings as a JSON array literal, e.g. `["sh", "-c"]`. */
export function quoteList(values: readonly string[]): string {
  return `[${values.map(quote).join(", ")}]`;
}
