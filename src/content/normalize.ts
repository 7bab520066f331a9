/**
 * Document normalization.
 *
 * Every default and fallback for a document field lives here. The output
 * is either a complete, frozen Document or a skip reason; downstream code
 * never re-applies defaults.
 */

import { basename, extname } from "node:path";
import type { SiteConfig } from "../config/site/schema.js";
import type { Document, FrontMatter } from "./schema.js";
import { normalizeTags, slugify } from "./slug.js";
import { estimateReadTime, summarizeHtml, type MarkupRenderer } from "./markup.js";

/**
 * A publish date that cannot be interpreted. Fatal: the date decides the
 * document's position in every listing.
 */
export class DocumentDateError extends Error {
  constructor(
    public readonly sourcePath: string,
    public readonly rawValue: unknown,
    message?: string
  ) {
    super(
      message ??
        `Unparseable publish date ${JSON.stringify(String(rawValue))} in ${sourcePath}`
    );
    this.name = "DocumentDateError";
  }
}

export type SkipReason = "missing_title" | "missing_identifier";

export type NormalizeResult =
  | { kind: "document"; document: Document }
  | { kind: "skipped"; reason: SkipReason };

export interface NormalizeInput {
  metadata: FrontMatter;
  body: string;
  sourcePath: string;
  discoveryIndex: number;
}

export interface NormalizeContext {
  site: Pick<SiteConfig, "author" | "defaultImage">;
  /** Stands in for a missing publish date */
  now: Date;
  renderMarkup: MarkupRenderer;
}

/**
 * ISO 8601 date with optional time and zone:
 *   2024-01-03, 2024-01-03T10:00, 2024-01-03 10:00:00.5+02:00
 */
const ISO_DATE_RE =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?(Z|[+-]\d{2}:\d{2})?)?$/;

function isValidCalendarDate(year: number, month: number, day: number): boolean {
  const probe = new Date(Date.UTC(year, month - 1, day));
  return (
    probe.getUTCFullYear() === year &&
    probe.getUTCMonth() === month - 1 &&
    probe.getUTCDate() === day
  );
}

/**
 * Interpret a front-matter date. Values without a zone are read as UTC.
 *
 * @throws DocumentDateError for anything that is not a real ISO date
 */
export function parsePublishDate(value: unknown, sourcePath: string): Date {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new DocumentDateError(sourcePath, value);
    }
    return value;
  }

  const text = String(value).trim();
  const match = ISO_DATE_RE.exec(text);
  if (!match) {
    throw new DocumentDateError(sourcePath, value);
  }

  const [, year, month, day, hour, minute, , zone] = match;
  if (!isValidCalendarDate(Number(year), Number(month), Number(day))) {
    throw new DocumentDateError(sourcePath, value);
  }
  if (hour !== undefined && (Number(hour) > 23 || Number(minute) > 59)) {
    throw new DocumentDateError(sourcePath, value);
  }

  let iso = text.replace(" ", "T");
  if (hour === undefined) {
    iso += "T00:00:00Z";
  } else if (zone === undefined) {
    iso += "Z";
  }

  const parsed = new Date(iso);
  if (Number.isNaN(parsed.getTime())) {
    throw new DocumentDateError(sourcePath, value);
  }
  return parsed;
}

/**
 * YYYY-MM-DD in UTC.
 */
export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Identifier: explicit slug, else the title, else the file name stem,
 * each passed through the slugifier. Empty when none yields anything.
 */
export function resolveSlug(
  explicit: string | undefined,
  title: string,
  sourcePath: string
): string {
  const stem = basename(sourcePath, extname(sourcePath));
  for (const candidate of [explicit, title, stem]) {
    if (candidate === undefined) continue;
    const slug = slugify(candidate);
    if (slug !== "") return slug;
  }
  return "";
}

/**
 * Build the fully-defaulted Document for one source file.
 */
export function normalizeDocument(
  input: NormalizeInput,
  context: NormalizeContext
): NormalizeResult {
  const { metadata, body, sourcePath, discoveryIndex } = input;

  const title = metadata.title ?? "";
  if (title === "") {
    return { kind: "skipped", reason: "missing_title" };
  }

  const slug = resolveSlug(metadata.slug, title, sourcePath);
  if (slug === "") {
    return { kind: "skipped", reason: "missing_identifier" };
  }

  const date =
    metadata.date === undefined
      ? context.now
      : parsePublishDate(metadata.date, sourcePath);

  const contentHtml = context.renderMarkup(body);
  const excerpt = metadata.excerpt || summarizeHtml(contentHtml);

  const document: Document = {
    title,
    slug,
    date,
    dateString: formatDate(date),
    excerpt,
    coverImage: metadata.cover_image || metadata.coverImage || context.site.defaultImage,
    author: metadata.author || context.site.author,
    tags: Object.freeze(normalizeTags(metadata.tags)),
    contentHtml,
    readTime: estimateReadTime(body),
    sourcePath,
    discoveryIndex,
  };

  return { kind: "document", document: Object.freeze(document) };
}
