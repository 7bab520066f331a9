/**
 * Site configuration module.
 *
 * Usage:
 *   import { loadSiteConfig, DEFAULT_SITE_CONFIG } from "./config/site/index.js";
 *
 *   const site = loadSiteConfig({ ...DEFAULT_SITE_CONFIG, pageSize: 10 });
 */

export type { SiteConfig, AboutPage, CollectionCopy } from "./schema.js";

export {
  SiteConfigSchema,
  AboutPageSchema,
  CollectionCopySchema,
} from "./schema.js";

export {
  loadSiteConfig,
  loadSiteConfigFile,
  mergeSiteConfig,
  SiteConfigError,
  type SiteConfigOverrides,
  type ConfigValidationIssue,
} from "./loader.js";

export { DEFAULT_SITE_CONFIG } from "./defaults.js";
