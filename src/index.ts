/**
 * Static blog site builder.
 *
 *   import { buildSite, loadSiteConfigFile } from "quire-site";
 *
 *   const site = loadSiteConfigFile("config/site.json");
 *   const report = buildSite({
 *     contentDir: "content/posts",
 *     templatesDir: "templates",
 *     assetsDir: "assets",
 *     outputDir: "public",
 *     site,
 *   });
 */

export * from "./config/index.js";
export * from "./logging/index.js";
export * from "./content/index.js";
export * from "./taxonomy/index.js";
export * from "./paths/index.js";
export * from "./render/index.js";
export * from "./site/index.js";
export * from "./output/index.js";
export * from "./export/index.js";
export * from "./build/index.js";
