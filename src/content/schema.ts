/**
 * Document schemas.
 *
 * Front matter is untrusted input: every field is optional and coerced
 * leniently, so a header with odd values still yields a usable record.
 * The Document type is the fully-defaulted result of normalization and
 * the only shape the rest of the pipeline reads.
 */

import { z } from "zod";

/**
 * Scalar front-matter value rendered as trimmed text. Lists, maps and
 * null read as absent.
 */
const TextField = z.preprocess((value) => {
  if (typeof value === "string") return value.trim();
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return undefined;
}, z.string().optional());

/**
 * Tags given as a YAML list or as a comma-separated string.
 */
const TagsField = z.preprocess((value) => {
  if (Array.isArray(value)) {
    return value
      .filter((tag) => tag !== null && tag !== undefined)
      .map((tag) => String(tag).trim());
  }
  if (typeof value === "string") {
    return value.split(",").map((tag) => tag.trim());
  }
  return [];
}, z.array(z.string()));

/**
 * Publish date as the header gave it. Headers read from files keep dates
 * as text; a Date only arrives from callers building metadata directly.
 * Validity is checked during normalization.
 */
const DateField = z.preprocess(
  (value) => (value === null ? undefined : value),
  z.union([z.date(), z.string(), z.number()]).optional()
);

export const FrontMatterSchema = z
  .object({
    title: TextField,
    slug: TextField,
    tags: TagsField,
    excerpt: TextField,
    cover_image: TextField,
    coverImage: TextField,
    author: TextField,
    date: DateField,
  })
  .passthrough();

export type FrontMatter = z.infer<typeof FrontMatterSchema>;

/**
 * One content item, fully defaulted. Never mutated after loading.
 */
export interface Document {
  /** Non-empty title */
  readonly title: string;
  /** URL-safe identifier, `[a-z0-9-]+`, keys the detail page */
  readonly slug: string;
  /** Publish timestamp */
  readonly date: Date;
  /** Publish date as YYYY-MM-DD (UTC) */
  readonly dateString: string;
  /** Summary: explicit excerpt or the first words of the body */
  readonly excerpt: string;
  /** Site-root-relative cover image path */
  readonly coverImage: string;
  readonly author: string;
  /** Normalized, de-duplicated tag slugs in authored order */
  readonly tags: readonly string[];
  /** Body rendered to HTML */
  readonly contentHtml: string;
  /** Estimated reading time in minutes (at least 3) */
  readonly readTime: number;
  /** Path of the source file */
  readonly sourcePath: string;
  /** Position of the source file in discovery order */
  readonly discoveryIndex: number;
}
