/**
 * Document loader.
 *
 * Responsible for:
 * - Discovering markdown sources in the content directory
 * - Splitting metadata headers from bodies
 * - Normalizing each file into a Document (see normalize.ts)
 * - Detecting identifier collisions
 * - Returning documents in canonical order
 *
 * Recoverable problems (unreadable header, missing title) never stop the
 * load; they are logged and counted. An unparseable publish date or an
 * identifier collision is fatal.
 */

import { existsSync, readdirSync, readFileSync, statSync } from "node:fs";
import { extname, join, resolve } from "node:path";

import type { SiteConfig } from "../config/site/schema.js";
import { createSilentLogger, type Logger } from "../logging/index.js";
import type { Document } from "./schema.js";
import { splitFrontMatter } from "./frontmatter.js";
import { normalizeDocument, type SkipReason } from "./normalize.js";
import { renderMarkdown, type MarkupRenderer } from "./markup.js";
import { sortDocuments } from "./ordering.js";

/** File extensions recognized as source documents. */
const SOURCE_EXTENSIONS = new Set([".md", ".markdown"]);

/**
 * Two or more documents resolve to the same identifier and would
 * overwrite each other's detail page.
 */
export class DuplicateSlugError extends Error {
  constructor(public readonly collisions: SlugCollision[]) {
    super(
      `Duplicate document identifier(s): ${collisions
        .map((c) => `"${c.slug}" (${c.sourcePaths.join(", ")})`)
        .join("; ")}`
    );
    this.name = "DuplicateSlugError";
  }
}

export interface SlugCollision {
  slug: string;
  /** Sources sharing the slug, in discovery order */
  sourcePaths: string[];
}

export interface SkippedDocument {
  sourcePath: string;
  reason: SkipReason;
}

export interface LoadDocumentsOptions {
  /** Directory holding the source files (not traversed recursively) */
  contentDir: string;
  site: Pick<SiteConfig, "author" | "defaultImage">;
  /** Publish date for documents without one; defaults to the current time */
  now?: Date;
  /** Markup collaborator; defaults to the markdown renderer */
  renderMarkup?: MarkupRenderer;
  /**
   * Keep colliding identifiers (later detail pages overwrite earlier ones)
   * instead of failing. Default: false.
   */
  allowDuplicateSlugs?: boolean;
  logger?: Logger;
}

export interface LoadDocumentsResult {
  /** Documents in canonical order (newest first) */
  documents: Document[];
  skipped: SkippedDocument[];
  /** Files whose metadata header was discarded */
  unreadableHeaders: string[];
  collisions: SlugCollision[];
}

/**
 * List source files in a directory, sorted by file name. A missing
 * directory yields no files.
 */
export function discoverSources(contentDir: string): string[] {
  const dir = resolve(contentDir);
  if (!existsSync(dir)) return [];

  return readdirSync(dir)
    .filter((entry) => SOURCE_EXTENSIONS.has(extname(entry).toLowerCase()))
    .filter((entry) => statSync(join(dir, entry)).isFile())
    .sort()
    .map((entry) => join(dir, entry));
}

/**
 * Group documents that share an identifier.
 */
export function findSlugCollisions(documents: readonly Document[]): SlugCollision[] {
  const bySlug = new Map<string, Document[]>();
  for (const document of documents) {
    const group = bySlug.get(document.slug);
    if (group) {
      group.push(document);
    } else {
      bySlug.set(document.slug, [document]);
    }
  }

  const collisions: SlugCollision[] = [];
  for (const [slug, group] of bySlug) {
    if (group.length < 2) continue;
    collisions.push({
      slug,
      sourcePaths: [...group]
        .sort((a, b) => a.discoveryIndex - b.discoveryIndex)
        .map((d) => d.sourcePath),
    });
  }
  return collisions;
}

/**
 * Load every document in the content directory.
 *
 * @throws DocumentDateError  if a publish date cannot be parsed
 * @throws DuplicateSlugError if identifiers collide and duplicates are not allowed
 */
export function loadDocuments(options: LoadDocumentsOptions): LoadDocumentsResult {
  const logger = options.logger ?? createSilentLogger();
  const now = options.now ?? new Date();
  const renderMarkup = options.renderMarkup ?? renderMarkdown;

  if (!existsSync(resolve(options.contentDir))) {
    logger.warn("Content directory does not exist", { contentDir: options.contentDir });
  }

  const sources = discoverSources(options.contentDir);
  const loaded: Document[] = [];
  const skipped: SkippedDocument[] = [];
  const unreadableHeaders: string[] = [];

  sources.forEach((sourcePath, discoveryIndex) => {
    const split = splitFrontMatter(readFileSync(sourcePath, "utf-8"));
    if (split.headerError !== undefined) {
      unreadableHeaders.push(sourcePath);
      logger.warn("Ignoring unreadable metadata header", {
        sourcePath,
        error: split.headerError,
      });
    }

    const result = normalizeDocument(
      { metadata: split.metadata, body: split.body, sourcePath, discoveryIndex },
      { site: options.site, now, renderMarkup }
    );

    if (result.kind === "skipped") {
      skipped.push({ sourcePath, reason: result.reason });
      logger.info("Skipping document", { sourcePath, reason: result.reason });
      return;
    }

    loaded.push(result.document);
  });

  const collisions = findSlugCollisions(loaded);
  if (collisions.length > 0) {
    if (!options.allowDuplicateSlugs) {
      throw new DuplicateSlugError(collisions);
    }
    for (const collision of collisions) {
      logger.warn("Duplicate document identifier; later pages overwrite earlier ones", {
        slug: collision.slug,
        sourcePaths: collision.sourcePaths,
      });
    }
  }

  const documents = sortDocuments(loaded);
  logger.info("Documents loaded", {
    sources: sources.length,
    documents: documents.length,
    skipped: skipped.length,
  });

  return { documents, skipped, unreadableHeaders, collisions };
}
