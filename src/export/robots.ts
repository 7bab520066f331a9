import { SITEMAP_PATH } from "../site/routes.js";

/**
 * Generate robots.txt content: all crawlers allowed, sitemap advertised
 */
export function generateRobotsTxt(baseUrl: string): string {
  return `User-agent: *
Allow: /
Sitemap: ${baseUrl}/${SITEMAP_PATH}
`;
}
