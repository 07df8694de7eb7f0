/**
 * backend/src/shared/text/slug.ts
 *
 * URL-friendly slugs:
 * - lowercase
 * - whitespace runs become "-"
 * - anything other than letters, digits, "_" and "-" is dropped
 * - repeated "-" collapse; leading/trailing "-" are trimmed
 *
 * Letters are Unicode-aware ("Café Über" -> "café-über").
 */

export function generateSlug(text: string): string {
  return text
    .toLowerCase()
    .replace(/\s+/g, '-')
    .replace(/[^\p{L}\p{N}_-]/gu, '')
    .replace(/-+/g, '-')
    .replace(/^-+|-+$/g, '');
}
