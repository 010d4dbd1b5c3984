/**
 * Text clean-up shared by the plain-text column and decoded blobs.
 */

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;

/** Replace unpaired UTF-16 surrogates with U+FFFD. */
export function repairSurrogates(text: string): string {
  return text.replace(LONE_SURROGATE, '\uFFFD');
}

/** Strip NUL and SOH and repair surrogates. Null stays null. */
export function sanitizeText(text: string | null | undefined): string | null {
  if (text === null || text === undefined) {
    return null;
  }
  return repairSurrogates(text.replace(/[\u0000\u0001]/g, ''));
}

/**
 * Clean recovered blob text: also drops the object-replacement character
 * (inline attachment placeholder) and trims. Empty results become null.
 */
export function cleanExtractedText(text: string): string | null {
  const cleaned = repairSurrogates(text.replace(/[\uFFFC\u0000\u0001]/g, '')).trim();
  return cleaned.length > 0 ? cleaned : null;
}

/** Truncate to at most `max` code points without splitting a pair. */
export function truncateCodePoints(text: string, max: number): string {
  const codePoints = Array.from(text);
  return codePoints.length <= max ? text : codePoints.slice(0, max).join('');
}
