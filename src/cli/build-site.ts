#!/usr/bin/env node
/**
 * CLI command to build the static site.
 *
 * Loads every markdown document from the content directory, plans the
 * home, listing, category, about, tag and article pages, renders them
 * through the HTML templates and writes the data exports, sitemap.xml and
 * robots.txt.
 *
 * Usage:
 *   npx tsx src/cli/build-site.ts [options]
 *   npm run build-site
 *
 * Options:
 *   --content <dir>           Markdown sources (default: $CONTENT_DIR or content/posts)
 *   --templates <dir>         HTML templates (default: $TEMPLATES_DIR or templates)
 *   --assets <dir>            Static assets (default: $ASSETS_DIR or assets)
 *   --out <dir>               Output root (default: $OUTPUT_DIR or public)
 *   --config <path>           Site configuration JSON (default: $SITE_CONFIG)
 *   --base-url <url>          Absolute base URL of the published site
 *   --page-size <n>           Documents per listing page
 *   --allow-duplicate-slugs   Warn instead of failing on colliding identifiers
 *   --dry-run                 Plan and validate, write nothing
 *   --json                    Print the build report as JSON
 *   --verbose                 Debug logging
 *   -h, --help                Show help
 *
 * Exit codes:
 *   0 - Site built
 *   1 - Configuration or build failure
 */

import { parseArgs } from "node:util";

import {
  ConfigError,
  SiteConfigError,
  loadConfig,
  loadSiteConfigFile,
  normalizeBaseUrl,
  validateConfig,
  type AppConfig,
  type SiteConfigOverrides,
} from "../config/index.js";
import { BuildError, buildSite, type BuildReport } from "../build/index.js";
import { createLogger, isLogLevel, type LogLevel } from "../logging/index.js";

// ============================================================
// Types
// ============================================================

export interface BuildCommandArgs {
  content?: string | undefined;
  templates?: string | undefined;
  assets?: string | undefined;
  out?: string | undefined;
  config?: string | undefined;
  baseUrl?: string | undefined;
  pageSize?: number | undefined;
  allowDuplicateSlugs: boolean;
  dryRun: boolean;
  json: boolean;
  verbose: boolean;
  help: boolean;
}

/** Where the command writes: report on stdout, log lines on stderr. */
export interface CommandIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  colors: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

// ============================================================
// CLI Parsing
// ============================================================

export const HELP_TEXT = `
Usage: build-site [options]

Options:
  --content <dir>           Markdown sources (default: $CONTENT_DIR or content/posts)
  --templates <dir>         HTML templates (default: $TEMPLATES_DIR or templates)
  --assets <dir>            Static assets (default: $ASSETS_DIR or assets)
  --out <dir>               Output root (default: $OUTPUT_DIR or public)
  --config <path>           Site configuration JSON (default: $SITE_CONFIG)
  --base-url <url>          Absolute base URL of the published site
  --page-size <n>           Documents per listing page
  --allow-duplicate-slugs   Warn instead of failing on colliding identifiers
  --dry-run                 Plan and validate, write nothing
  --json                    Print the build report as JSON
  --verbose                 Debug logging
  -h, --help                Show this help message
`;

function readOptions(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      content: { type: "string" },
      templates: { type: "string" },
      assets: { type: "string" },
      out: { type: "string" },
      config: { type: "string" },
      "base-url": { type: "string" },
      "page-size": { type: "string" },
      "allow-duplicate-slugs": { type: "boolean", default: false },
      "dry-run": { type: "boolean", default: false },
      json: { type: "boolean", default: false },
      verbose: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  }).values;
}

/**
 * Parse command-line arguments.
 *
 * @throws UsageError on unknown options or a malformed page size
 */
export function parseBuildArgs(argv: string[]): BuildCommandArgs {
  let values: ReturnType<typeof readOptions>;
  try {
    values = readOptions(argv);
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }

  let pageSize: number | undefined;
  const rawPageSize = values["page-size"];
  if (rawPageSize !== undefined) {
    if (!/^\d+$/.test(rawPageSize) || parseInt(rawPageSize, 10) < 1) {
      throw new UsageError(`--page-size must be a positive integer, got: ${rawPageSize}`);
    }
    pageSize = parseInt(rawPageSize, 10);
  }

  return {
    content: values.content,
    templates: values.templates,
    assets: values.assets,
    out: values.out,
    config: values.config,
    baseUrl: values["base-url"],
    pageSize,
    allowDuplicateSlugs: values["allow-duplicate-slugs"] ?? false,
    dryRun: values["dry-run"] ?? false,
    json: values.json ?? false,
    verbose: values.verbose ?? false,
    help: values.help ?? false,
  };
}

/**
 * Site values from the command line win over the environment, which wins
 * over the configuration file.
 */
export function resolveOverrides(args: BuildCommandArgs, config: AppConfig): SiteConfigOverrides {
  const overrides: SiteConfigOverrides = {};
  const baseUrl = args.baseUrl !== undefined ? normalizeBaseUrl(args.baseUrl) : config.siteBaseUrl;
  if (baseUrl !== null) overrides.baseUrl = baseUrl;
  const pageSize = args.pageSize ?? config.pageSize;
  if (pageSize !== null) overrides.pageSize = pageSize;
  return overrides;
}

// ============================================================
// Output Formatting
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
};

function colorizer(enabled: boolean) {
  return (color: keyof typeof COLORS, text: string): string =>
    enabled ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

export function formatReport(report: BuildReport, colors: boolean): string[] {
  const c = colorizer(colors);
  const lines: string[] = [];

  lines.push("");
  lines.push(c("bold", "═".repeat(60)));
  lines.push(c("bold", report.dryRun ? " Site Plan (dry run)" : " Site Build"));
  lines.push(c("bold", "═".repeat(60)));
  lines.push("");
  lines.push(`  Run ID:          ${c("cyan", report.runId)}`);
  lines.push(`  Documents:       ${report.documents}`);
  lines.push(`  Skipped:         ${report.skipped.length}`);
  for (const skipped of report.skipped) {
    lines.push(c("dim", `    - ${skipped.sourcePath} (${skipped.reason})`));
  }
  if (report.unreadableHeaders.length > 0) {
    lines.push(c("yellow", `  Unreadable headers: ${report.unreadableHeaders.length}`));
  }
  lines.push(`  Tags:            ${report.tags}`);
  lines.push(`  Pages:           ${report.pages}`);
  for (const [kind, count] of Object.entries(report.pagesByKind)) {
    lines.push(c("dim", `    ${kind.padEnd(10)} ${count}`));
  }
  lines.push(`  Sitemap entries: ${report.sitemapEntries}`);

  if (report.dryRun) {
    lines.push("");
    lines.push(c("yellow", "  Dry run: nothing written."));
  } else {
    lines.push(`  Files written:   ${report.filesWritten.length}`);
    if (!report.assetsCopied) {
      lines.push(c("yellow", "  Assets:          not found, skipped"));
    }
    lines.push("");
    lines.push(`${c("green", "✓")} Site written to ${c("bold", report.outputDir)} in ${report.durationMs}ms`);
  }
  lines.push("");
  return lines;
}

export function formatFailure(err: unknown): string {
  const failure = err instanceof BuildError ? err.failure : err;
  if (failure instanceof SiteConfigError) {
    return failure.format();
  }
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}

// ============================================================
// Command
// ============================================================

/**
 * Run the build command and return its exit code.
 */
export function runBuildCommand(argv: string[], io: CommandIO): number {
  const c = colorizer(io.colors);

  let args: BuildCommandArgs;
  try {
    args = parseBuildArgs(argv);
  } catch (err) {
    io.stderr(c("red", `Error: ${formatFailure(err)}`));
    io.stderr(HELP_TEXT);
    return 1;
  }

  if (args.help) {
    io.stdout(HELP_TEXT);
    return 0;
  }

  try {
    const config = loadConfig();
    validateConfig(config);

    const site = loadSiteConfigFile(args.config ?? config.siteConfigPath, resolveOverrides(args, config));

    const level: LogLevel = args.verbose ? "debug" : isLogLevel(config.logLevel) ? config.logLevel : "info";
    const logger = createLogger({
      level,
      scope: config.appName,
      console: false,
      file: config.logToFile,
      sink: (line) => io.stderr(line),
    });

    const report = buildSite({
      contentDir: args.content ?? config.contentDir,
      templatesDir: args.templates ?? config.templatesDir,
      assetsDir: args.assets ?? config.assetsDir,
      outputDir: args.out ?? config.outputDir,
      site,
      allowDuplicateSlugs: args.allowDuplicateSlugs,
      dryRun: args.dryRun,
      logger,
    });

    if (args.json) {
      io.stdout(JSON.stringify(report, null, 2));
    } else {
      for (const line of formatReport(report, io.colors)) {
        io.stdout(line);
      }
    }
    return 0;
  } catch (err) {
    if (args.json) {
      io.stdout(JSON.stringify({ success: false, error: formatFailure(err) }, null, 2));
    } else {
      const label = err instanceof ConfigError ? "Configuration error" : "Error";
      io.stderr(c("red", `${label}: ${formatFailure(err)}`));
    }
    return 1;
  }
}

// ============================================================
// Main
// ============================================================

const isDirectExecution = process.argv[1] &&
  (process.argv[1].endsWith("build-site.ts") ||
   process.argv[1].endsWith("build-site.js") ||
   process.argv[1].endsWith("quire-site"));

if (isDirectExecution) {
  process.exitCode = runBuildCommand(process.argv.slice(2), {
    stdout: (line) => console.log(line),
    stderr: (line) => console.error(line),
    colors: Boolean(process.stdout.isTTY) && !process.env.NO_COLOR,
  });
}
