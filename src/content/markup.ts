/**
 * Markup collaborator: markdown body to HTML, plus the plain-text
 * helpers used for summaries and reading time.
 */

import { Marked } from "marked";

/**
 * Converts a raw document body to HTML. The loader only hands the body
 * over and stores what comes back.
 */
export type MarkupRenderer = (body: string) => string;

export class MarkupRenderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MarkupRenderError";
  }
}

/** Words read per minute when estimating reading time. */
export const WORDS_PER_MINUTE = 200;

/** Reading time never drops below this many minutes. */
export const MIN_READ_MINUTES = 3;

/** Words kept in a derived summary. */
export const SUMMARY_WORDS = 32;

// GFM covers tables and fenced code blocks.
const markdown = new Marked({ gfm: true });

/**
 * Render markdown with GitHub-flavoured extensions.
 */
export const renderMarkdown: MarkupRenderer = (body) => {
  const html = markdown.parse(body, { async: false });
  if (typeof html !== "string") {
    throw new MarkupRenderError("Markdown renderer returned a pending result");
  }
  return html;
};

/**
 * Replace every tag with a space. Entities are left as they are.
 */
export function stripHtml(html: string): string {
  return html.replace(/<[^>]+>/g, " ");
}

/**
 * Count the words of a text: runs of letters, digits and underscores.
 */
export function countWords(text: string): number {
  return text.match(/[\p{L}\p{N}_]+/gu)?.length ?? 0;
}

/**
 * Round to the nearest integer; exact halves go to the even neighbour
 * (4.5 → 4, 5.5 → 6).
 */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff < 0.5) return floor;
  if (diff > 0.5) return floor + 1;
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * Estimated minutes to read a body: words / 200, rounded half to even,
 * at least 3.
 */
export function estimateReadTime(body: string): number {
  return Math.max(MIN_READ_MINUTES, roundHalfEven(countWords(body) / WORDS_PER_MINUTE));
}

/**
 * First words of the visible text of an HTML fragment.
 */
export function summarizeHtml(html: string, maxWords: number = SUMMARY_WORDS): string {
  return stripHtml(html)
    .split(/\s+/)
    .filter((word) => word.length > 0)
    .slice(0, maxWords)
    .join(" ");
}
