/**
 * Exported data file schemas.
 *
 * `data/posts.json` and `data/tags.json` are machine-readable mirrors of
 * the document and tag indexes. Each carries a format version so readers
 * can detect an incompatible layout.
 */

import { z } from "zod";

export const POSTS_INDEX_VERSION = 2;
export const TAGS_INDEX_VERSION = 1;

const Slug = z.string().regex(/^[a-z0-9]+(?:-[a-z0-9]+)*$/, "must be a URL-safe slug");
const IsoDay = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "must be YYYY-MM-DD");

export const PostEntrySchema = z
  .object({
    title: z.string().min(1),
    summary: z.string(),
    date: IsoDay,
    read_minutes: z.number().int().min(1),
    author: z.string(),
    tags: z.array(Slug),
    image: z.string(),
    /** Site-root-relative detail page */
    path: z.string().min(1),
    slug: Slug,
  })
  .strict();

export type PostEntry = z.infer<typeof PostEntrySchema>;

export const PostsIndexSchema = z
  .object({
    version: z.literal(POSTS_INDEX_VERSION),
    posts: z.array(PostEntrySchema),
  })
  .strict();

export type PostsIndex = z.infer<typeof PostsIndexSchema>;

export const TagEntrySchema = z
  .object({
    tag: Slug,
    label: z.string().min(1),
    count: z.number().int().min(1),
    /** Site-root-relative tag page */
    path: z.string().min(1),
  })
  .strict();

export type TagEntry = z.infer<typeof TagEntrySchema>;

export const TagsIndexSchema = z
  .object({
    version: z.literal(TAGS_INDEX_VERSION),
    tags: z.array(TagEntrySchema),
  })
  .strict();

export type TagsIndex = z.infer<typeof TagsIndexSchema>;
