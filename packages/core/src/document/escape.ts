const ESCAPE_SEQUENCE_PATTERN = /&[\w#]+;/g;

/**
 * Stand-in for the `&` that opens a character reference while a document is parsed.
 * Unlikely to appear in real resource files.
 */
export const ESCAPE_SEQUENCE_START_MARKER = 'RESTIDY_ESCAPE_SEQUENCE_START_MARKER';

/**
 * XML treats `&apos;` and `'` as the same character, and a parser is free to
 * hand back either. Hiding the `&` of every reference keeps the original
 * spelling intact (and keeps entities such as `&nbsp;` from failing the parse).
 */
export function protectEscapeSequences(text: string): string {
  return text.replace(ESCAPE_SEQUENCE_PATTERN, (sequence) => `${ESCAPE_SEQUENCE_START_MARKER}${sequence.slice(1)}`);
}

/**
 * Inverse of {@link protectEscapeSequences}
 */
export function restoreEscapeSequences(text: string): string {
  return text.split(ESCAPE_SEQUENCE_START_MARKER).join('&');
}
