/**
 * Data, sitemap and robots exports.
 */

export {
  POSTS_INDEX_VERSION,
  TAGS_INDEX_VERSION,
  PostEntrySchema,
  PostsIndexSchema,
  TagEntrySchema,
  TagsIndexSchema,
  type PostEntry,
  type PostsIndex,
  type TagEntry,
  type TagsIndex,
} from "./schema.js";

export {
  DataExportError,
  buildPostsIndex,
  buildTagsIndex,
  serializePostsIndex,
  serializeTagsIndex,
  parsePostsIndex,
  parseTagsIndex,
} from "./data-index.js";

export { generateSitemap, sitemapLocations, escapeXml } from "./sitemap.js";
export { generateRobotsTxt } from "./robots.js";
export { emitExports, renderExports, type EmitExportsInput, type ExportFile } from "./emitter.js";
