/**
 * Identifier normalization shared by documents and tags.
 */

/**
 * Reduce text to a URL-safe identifier.
 *
 * Lowercases, drops every character outside `[a-z0-9\s-]`, turns
 * whitespace runs into single hyphens, collapses repeated hyphens and
 * trims hyphens from both ends. The result matches `^[a-z0-9-]*$` and
 * never starts or ends with a hyphen; it may be empty.
 */
export function slugify(text: string): string {
  return text
    .toLowerCase()
    .trim()
    .replace(/[^a-z0-9\s-]/g, "")
    .replace(/\s+/g, "-")
    .replace(/-+/g, "-")
    .replace(/^-+|-+$/g, "");
}

/**
 * Human-readable label for a tag slug: separators become spaces and each
 * word is title-cased ("home-lab" → "Home Lab").
 */
export function labelFromSlug(slug: string): string {
  return slug
    .split("-")
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}

/**
 * Normalize a raw tag list: slugify each entry, drop empty results and
 * keep only the first occurrence of each slug.
 */
export function normalizeTags(rawTags: readonly string[]): string[] {
  const seen = new Set<string>();
  const tags: string[] = [];
  for (const raw of rawTags) {
    const slug = slugify(raw);
    if (slug === "" || seen.has(slug)) continue;
    seen.add(slug);
    tags.push(slug);
  }
  return tags;
}
