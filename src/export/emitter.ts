/**
 * Writes the machine-readable exports next to the rendered pages:
 * the document index, the tag index, sitemap.xml and robots.txt.
 */

import type { Document } from "../content/schema.js";
import type { TagIndex } from "../taxonomy/aggregator.js";
import type { SitemapEntry } from "../site/planner.js";
import {
  POSTS_DATA_PATH,
  ROBOTS_PATH,
  SITEMAP_PATH,
  TAGS_DATA_PATH,
} from "../site/routes.js";
import { writeOutputFile } from "../output/files.js";
import { createSilentLogger, type Logger } from "../logging/index.js";
import {
  buildPostsIndex,
  buildTagsIndex,
  serializePostsIndex,
  serializeTagsIndex,
} from "./data-index.js";
import { generateSitemap } from "./sitemap.js";
import { generateRobotsTxt } from "./robots.js";

export interface EmitExportsInput {
  outputDir: string;
  baseUrl: string;
  documents: readonly Document[];
  tags: TagIndex;
  sitemap: readonly SitemapEntry[];
  logger?: Logger;
}

export interface ExportFile {
  outputPath: string;
  content: string;
}

/**
 * Produce every export file's content without writing anything.
 */
export function renderExports(input: Omit<EmitExportsInput, "outputDir" | "logger">): ExportFile[] {
  return [
    { outputPath: POSTS_DATA_PATH, content: serializePostsIndex(buildPostsIndex(input.documents)) },
    { outputPath: TAGS_DATA_PATH, content: serializeTagsIndex(buildTagsIndex(input.tags)) },
    { outputPath: SITEMAP_PATH, content: generateSitemap(input.sitemap) },
    { outputPath: ROBOTS_PATH, content: generateRobotsTxt(input.baseUrl) },
  ];
}

/**
 * Write every export file.
 *
 * @returns Site-root-relative paths of the written files
 */
export function emitExports(input: EmitExportsInput): string[] {
  const logger = input.logger ?? createSilentLogger();
  const written: string[] = [];

  for (const file of renderExports(input)) {
    writeOutputFile(input.outputDir, file.outputPath, file.content);
    logger.debug("Export written", { outputPath: file.outputPath });
    written.push(file.outputPath);
  }

  logger.info("Exports written", {
    posts: input.documents.length,
    tags: input.tags.ranked.length,
    sitemapEntries: input.sitemap.length,
  });
  return written;
}
