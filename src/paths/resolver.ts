/**
 * Relative addressing between output pages.
 *
 * A page `depth` directories below the site root reaches a site-root path
 * through `depth` parent segments. Links built this way keep the produced
 * site working from any base path, a sub-directory, or the file system.
 */

/**
 * Number of directories between the site root and a page, computed from
 * the page's own site-root-relative output path.
 *
 *   "index.html"               → 0
 *   "articles/page/2/index.html" → 3
 */
export function pageDepth(outputPath: string): number {
  const segments = outputPath
    .split("/")
    .filter((segment) => segment !== "" && segment !== ".");
  return Math.max(0, segments.length - 1);
}

/**
 * Base path from a page back to the site root: "." at depth 0,
 * otherwise "../" repeated `depth` times without the trailing slash.
 */
export function relativeRoot(depth: number): string {
  if (!Number.isInteger(depth) || depth < 0) {
    throw new RangeError(`Page depth must be a non-negative integer, got ${depth}`);
  }
  if (depth === 0) return ".";
  return Array.from({ length: depth }, () => "..").join("/");
}

/**
 * Resolve a site-root-relative target against a page's relative root.
 * At the root the target is returned unchanged.
 */
export function resolveFromRoot(target: string, root: string): string {
  if (root === ".") return target;
  return `${root}/${target}`;
}

/**
 * Resolver bound to one output page.
 */
export interface PathResolver {
  readonly depth: number;
  /** "." or "../.." style base */
  readonly root: string;
  /** Relative link from this page to a site-root-relative target */
  to(target: string): string;
}

export function createPathResolver(outputPath: string): PathResolver {
  const depth = pageDepth(outputPath);
  const root = relativeRoot(depth);
  return {
    depth,
    root,
    to: (target) => resolveFromRoot(target, root),
  };
}
