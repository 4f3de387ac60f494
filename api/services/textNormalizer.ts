/**
 * Canonical form used for every keyword and substring comparison:
 * NFKD-decomposed, stripped to ASCII, lower-cased. "Café" -> "cafe".
 */
export function normalizeText(text = ''): string {
  return text.normalize('NFKD').replace(/[^\x00-\x7F]/g, '').toLowerCase();
}

export function containsAny(normalized: string, phrases: readonly string[]): boolean {
  return phrases.some(p => normalized.includes(p));
}

export default { normalizeText, containsAny };
