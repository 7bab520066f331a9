/**
 * Document loading module.
 *
 * Source files flow through four steps:
 *
 * 1. DISCOVERY: `*.md` files in the content directory, by file name.
 * 2. SPLIT: metadata header and body are separated (frontmatter.ts).
 * 3. NORMALIZATION: every field is defaulted in one place
 *    (normalize.ts); untitled documents are skipped.
 * 4. ORDERING: newest first, ties in discovery order (ordering.ts).
 *
 *   const { documents } = loadDocuments({ contentDir: "content/posts", site });
 */

export type { Document, FrontMatter } from "./schema.js";
export { FrontMatterSchema } from "./schema.js";

export { slugify, labelFromSlug, normalizeTags } from "./slug.js";

export {
  renderMarkdown,
  stripHtml,
  countWords,
  estimateReadTime,
  roundHalfEven,
  summarizeHtml,
  MarkupRenderError,
  WORDS_PER_MINUTE,
  MIN_READ_MINUTES,
  SUMMARY_WORDS,
  type MarkupRenderer,
} from "./markup.js";

export { splitFrontMatter, HEADER_DELIMITER, type SplitDocument } from "./frontmatter.js";

export {
  normalizeDocument,
  parsePublishDate,
  formatDate,
  resolveSlug,
  DocumentDateError,
  type NormalizeResult,
  type NormalizeInput,
  type NormalizeContext,
  type SkipReason,
} from "./normalize.js";

export { compareDocuments, sortDocuments } from "./ordering.js";

export {
  loadDocuments,
  discoverSources,
  findSlugCollisions,
  DuplicateSlugError,
  type LoadDocumentsOptions,
  type LoadDocumentsResult,
  type SkippedDocument,
  type SlugCollision,
} from "./loader.js";
