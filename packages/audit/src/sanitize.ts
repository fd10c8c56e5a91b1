/**
 * Free-text sanitization for pipe-delimited audit entries.
 */

export const FIELD_SEPARATOR = "|";
export const SEPARATOR_REPLACEMENT = ";";
export const MAX_FIELD_LENGTH = 500;

/**
 * Replace the field separator, collapse line breaks to spaces and truncate
 * to MAX_FIELD_LENGTH characters, the last three being `...`.
 */
export function sanitizeForLog(input: string | null | undefined): string {
  if (input === null || input === undefined || input.length === 0) {
    return "";
  }

  const sanitized = input
    .split(FIELD_SEPARATOR)
    .join(SEPARATOR_REPLACEMENT)
    .replace(/\r\n|\r|\n/g, " ");

  if (sanitized.length > MAX_FIELD_LENGTH) {
    return `${sanitized.slice(0, MAX_FIELD_LENGTH - 3)}...`;
  }
  return sanitized;
}
