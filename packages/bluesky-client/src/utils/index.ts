/**
 * Text helpers
 */

/**
 * Count Unicode code points. String#length counts UTF-16 units,
 * so an emoji outside the BMP would count twice.
 */
export function countCharacters(text: string): number {
  let count = 0;
  for (const _ of text) count++;
  return count;
}

/**
 * Trim a user-typed handle and drop one leading '@'.
 */
export function normalizeIdentifier(raw: string): string {
  const trimmed = raw.trim();
  return trimmed.startsWith('@') ? trimmed.slice(1) : trimmed;
}

export function formatHandle(handle: string): string {
  return handle.startsWith('@') ? handle : `@${handle}`;
}

export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return text.slice(0, maxLength - 3) + '...';
}
