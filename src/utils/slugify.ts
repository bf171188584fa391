/**
 * Convert a string to a URL slug
 * e.g., "Travel Notes" -> "travel-notes", "Écrire en français" -> "ecrire-en-francais"
 *
 * Letters and digits of any script are kept, accents are dropped.
 */
export function slugify(text: string): string {
  return text
    .normalize('NFKD')
    .replace(/\p{M}/gu, '') // Drop combining marks left by NFKD
    .trim()
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s-]/gu, '') // Remove special characters
    .replace(/\s+/g, '-') // Replace spaces with hyphens
    .replace(/-+/g, '-') // Collapse hyphens
    .replace(/^-+|-+$/g, ''); // Remove leading/trailing hyphens
}
