/**
 * Site build orchestrator.
 *
 * Runs one complete build:
 *
 *   load documents → aggregate tags → plan pages → check templates →
 *   write pages → copy assets → write exports
 *
 * Everything up to the plan is computed in memory before the first file
 * is written, so a bad date, a duplicate identifier or a broken template
 * stops the build with the output directory untouched.
 */

import type { SiteConfig } from "../config/site/schema.js";
import { loadDocuments, type SkippedDocument } from "../content/loader.js";
import type { MarkupRenderer } from "../content/markup.js";
import { aggregateTags } from "../taxonomy/aggregator.js";
import { countPagesByKind, planSite, type PageKind } from "../site/planner.js";
import { ASSETS_DIR, DATA_DIR } from "../site/routes.js";
import { TemplateLoader } from "../render/loader.js";
import { PageRenderer } from "../render/page-renderer.js";
import { copyStaticDir, ensureOutputDirs } from "../output/files.js";
import { emitExports } from "../export/emitter.js";
import { createSilentLogger, initRunId, type Logger } from "../logging/index.js";

/** Top-level output directories created before any page is written. */
const OUTPUT_DIRECTORIES = ["articles", "categories", "tag", "article", DATA_DIR] as const;

export type BuildPhase = "load" | "plan" | "templates" | "write" | "assets" | "export";

export class BuildError extends Error {
  constructor(
    public readonly phase: BuildPhase,
    public readonly failure: unknown
  ) {
    super(
      `Build failed during ${phase}: ${failure instanceof Error ? failure.message : String(failure)}`
    );
    this.name = "BuildError";
  }
}

export interface BuildOptions {
  contentDir: string;
  templatesDir: string;
  assetsDir: string;
  outputDir: string;
  site: SiteConfig;
  /** Build time; defaults to now */
  now?: Date;
  /** Run ID stamped on log lines; generated when absent */
  runId?: string;
  allowDuplicateSlugs?: boolean;
  /** Plan and validate without writing anything */
  dryRun?: boolean;
  renderMarkup?: MarkupRenderer;
  logger?: Logger;
}

export interface BuildReport {
  runId: string;
  dryRun: boolean;
  outputDir: string;
  documents: number;
  skipped: SkippedDocument[];
  unreadableHeaders: string[];
  tags: number;
  pagesByKind: Record<PageKind, number>;
  pages: number;
  sitemapEntries: number;
  assetsCopied: boolean;
  /** Site-root-relative paths, pages first then exports */
  filesWritten: string[];
  durationMs: number;
}

function runPhase<T>(phase: BuildPhase, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    throw new BuildError(phase, err);
  }
}

/**
 * Build the site.
 *
 * @throws BuildError naming the failed phase; the original error is kept as `failure`
 */
export function buildSite(options: BuildOptions): BuildReport {
  const startedAt = Date.now();
  const runId = initRunId(options.runId);
  const logger = (options.logger ?? createSilentLogger()).child("build");
  const now = options.now ?? new Date();
  const dryRun = options.dryRun ?? false;

  logger.info("Build started", {
    contentDir: options.contentDir,
    outputDir: options.outputDir,
    dryRun,
  });

  const loaded = runPhase("load", () =>
    loadDocuments({
      contentDir: options.contentDir,
      site: options.site,
      now,
      ...(options.renderMarkup ? { renderMarkup: options.renderMarkup } : {}),
      allowDuplicateSlugs: options.allowDuplicateSlugs ?? false,
      logger: logger.child("content"),
    })
  );

  const tags = aggregateTags(loaded.documents);
  const plan = runPhase("plan", () =>
    planSite({ documents: loaded.documents, tags, site: options.site, buildDate: now })
  );
  const pagesByKind = countPagesByKind(plan.pages);
  logger.info("Site planned", { pages: plan.pages.length, tags: tags.ranked.length, ...pagesByKind });

  const templates = runPhase("templates", () => {
    const loader = new TemplateLoader(options.templatesDir);
    loader.loadAll();
    // Every template the plan renders must exist before the first write.
    for (const template of new Set(plan.pages.map((page) => page.template))) {
      loader.load(template);
    }
    return loader;
  });

  const filesWritten: string[] = [];
  let assetsCopied = false;

  if (dryRun) {
    logger.info("Dry run: nothing written");
  } else {
    runPhase("write", () => {
      ensureOutputDirs(options.outputDir, OUTPUT_DIRECTORIES);
      const renderer = new PageRenderer(templates, options.outputDir, logger.child("render"));
      for (const page of renderer.writeAll(plan.pages)) {
        filesWritten.push(page.outputPath);
      }
    });

    assetsCopied = runPhase("assets", () =>
      copyStaticDir(options.assetsDir, options.outputDir, ASSETS_DIR)
    );
    if (!assetsCopied) {
      logger.warn("Assets directory not found; no assets copied", { assetsDir: options.assetsDir });
    }

    const exported = runPhase("export", () =>
      emitExports({
        outputDir: options.outputDir,
        baseUrl: options.site.baseUrl,
        documents: loaded.documents,
        tags,
        sitemap: plan.sitemap,
        logger: logger.child("export"),
      })
    );
    filesWritten.push(...exported);
  }

  const report: BuildReport = {
    runId,
    dryRun,
    outputDir: options.outputDir,
    documents: loaded.documents.length,
    skipped: loaded.skipped,
    unreadableHeaders: loaded.unreadableHeaders,
    tags: tags.ranked.length,
    pagesByKind,
    pages: plan.pages.length,
    sitemapEntries: plan.sitemap.length,
    assetsCopied,
    filesWritten,
    durationMs: Date.now() - startedAt,
  };

  logger.info("Build finished", {
    documents: report.documents,
    pages: report.pages,
    files: filesWritten.length,
    durationMs: report.durationMs,
  });
  return report;
}
