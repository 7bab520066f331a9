/**
 * Document and tag index export.
 *
 * The indexes are pure serializations of what the loader and the
 * aggregator already computed: documents in canonical order, tags in
 * ranked order, paths identical to the planned pages.
 */

import type { Document } from "../content/schema.js";
import type { TagIndex } from "../taxonomy/aggregator.js";
import { articlePath, tagPath } from "../site/routes.js";
import {
  POSTS_INDEX_VERSION,
  PostsIndexSchema,
  TAGS_INDEX_VERSION,
  TagsIndexSchema,
  type PostsIndex,
  type TagsIndex,
} from "./schema.js";

export class DataExportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DataExportError";
  }
}

export function buildPostsIndex(documents: readonly Document[]): PostsIndex {
  return {
    version: POSTS_INDEX_VERSION,
    posts: documents.map((document) => ({
      title: document.title,
      summary: document.excerpt,
      date: document.dateString,
      read_minutes: document.readTime,
      author: document.author,
      tags: [...document.tags],
      image: document.coverImage,
      path: articlePath(document.slug),
      slug: document.slug,
    })),
  };
}

export function buildTagsIndex(tags: TagIndex): TagsIndex {
  return {
    version: TAGS_INDEX_VERSION,
    tags: tags.ranked.map((tag) => ({
      tag: tag.slug,
      label: tag.label,
      count: tag.count,
      path: tagPath(tag.slug),
    })),
  };
}

function describeIssues(issues: { path: (string | number)[]; message: string }[]): string {
  return issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
}

/**
 * Validate and serialize an index with two-space indentation. Non-ASCII
 * characters are written as is.
 *
 * @throws DataExportError if the index does not match its schema
 */
export function serializePostsIndex(index: PostsIndex): string {
  const result = PostsIndexSchema.safeParse(index);
  if (!result.success) {
    throw new DataExportError(`Invalid posts index: ${describeIssues(result.error.issues)}`);
  }
  return JSON.stringify(result.data, null, 2);
}

export function serializeTagsIndex(index: TagsIndex): string {
  const result = TagsIndexSchema.safeParse(index);
  if (!result.success) {
    throw new DataExportError(`Invalid tags index: ${describeIssues(result.error.issues)}`);
  }
  return JSON.stringify(result.data, null, 2);
}

function parseJson(json: string, what: string): unknown {
  try {
    return JSON.parse(json);
  } catch (err) {
    throw new DataExportError(
      `Failed to parse ${what} JSON: ${err instanceof Error ? err.message : String(err)}`
    );
  }
}

/**
 * Read back an exported posts index.
 *
 * @throws DataExportError on malformed JSON, a schema mismatch or another version
 */
export function parsePostsIndex(json: string): PostsIndex {
  const result = PostsIndexSchema.safeParse(parseJson(json, "posts index"));
  if (!result.success) {
    throw new DataExportError(`Invalid posts index: ${describeIssues(result.error.issues)}`);
  }
  return result.data;
}

export function parseTagsIndex(json: string): TagsIndex {
  const result = TagsIndexSchema.safeParse(parseJson(json, "tags index"));
  if (!result.success) {
    throw new DataExportError(`Invalid tags index: ${describeIssues(result.error.issues)}`);
  }
  return result.data;
}
