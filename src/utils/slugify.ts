/**
 * Convert a name to a URL-safe slug the way Mealie derives organizer and recipe slugs
 * Accents are folded to ASCII; anything that isn't a word character is dropped
 *
 * @example
 * slugify("Crème Brûlée") // "creme-brulee"
 * slugify("Mac & Cheese (2)") // "mac-cheese-2"
 * slugify("  want_to cook ") // "want-to-cook"
 */
export function slugify(text: string): string {
  return text
    .normalize("NFKD")
    .replace(/[^\x00-\x7F]/g, "")
    .toLowerCase()
    .trim()
    .replace(/[^\w\s-]/g, "")
    .replace(/[\s_]+/g, "-")
    .replace(/-+/g, "-")
    .replace(/^-|-$/g, "");
}
