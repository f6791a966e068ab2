/**
 * Validation utilities shared by the engine and the HTTP layer
 */

export const MAX_FREE_TEXT_LENGTH = 2000;

/**
 * Validate UUID format
 */
export function isValidUUID(value: string): boolean {
  const uuidRegex = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
  return uuidRegex.test(value);
}

/**
 * Sanitize user input for safe storage
 * - Trim whitespace
 * - Turn tabs into spaces
 * - Remove control characters
 * - Limit length
 */
export function sanitizeInput(input: string, maxLength: number = MAX_FREE_TEXT_LENGTH): string {
  return input
    .trim()
    // Tabs separate words like spaces do
    .replace(/\t/g, ' ')
    // Remove control characters except newlines
    .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, '')
    .substring(0, maxLength);
}

/**
 * Lowercase and collapse whitespace. Punctuation is left alone.
 */
export function normalizeText(text: string): string {
  return text.toLowerCase().trim().split(/\s+/).filter(Boolean).join(' ');
}

export function isNoneLike(text: string): boolean {
  return ['none', 'no', 'nothing', 'n/a', 'na', 'nil'].includes(normalizeText(text));
}
