/**
 * Site-root-relative output locations and canonical URL paths of every
 * page kind. Output paths address files; canonical paths are what the
 * site publishes (directory URLs for `index.html` pages).
 */

export const HOME_PATH = "index.html";
export const CATEGORIES_PATH = "categories/index.html";
export const ABOUT_PATH = "about.html";
export const ASSETS_DIR = "assets";
export const DATA_DIR = "data";
export const POSTS_DATA_PATH = `${DATA_DIR}/posts.json`;
export const TAGS_DATA_PATH = `${DATA_DIR}/tags.json`;
export const ROBOTS_PATH = "robots.txt";
export const SITEMAP_PATH = "sitemap.xml";

/**
 * Listing page `page` (1-based). Page 1 is the listing root.
 */
export function listingPath(page: number): string {
  return page === 1 ? "articles/index.html" : `articles/page/${page}/index.html`;
}

export function tagPath(slug: string): string {
  return `tag/${slug}/index.html`;
}

export function articlePath(slug: string): string {
  return `article/${slug}/index.html`;
}

/**
 * Canonical URL path of an output path: a trailing `index.html` is
 * dropped, everything is rooted at "/".
 *
 *   "index.html"               → "/"
 *   "articles/page/2/index.html" → "/articles/page/2/"
 *   "about.html"               → "/about.html"
 */
export function canonicalPath(outputPath: string): string {
  if (outputPath === "index.html") return "/";
  if (outputPath.endsWith("/index.html")) {
    return `/${outputPath.slice(0, -"index.html".length)}`;
  }
  return `/${outputPath}`;
}

/**
 * Absolute URL for a canonical path under the site base URL.
 */
export function absoluteUrl(baseUrl: string, path: string): string {
  return `${baseUrl}${path.startsWith("/") ? path : `/${path}`}`;
}
