/**
 * Build Command Tests
 *
 * Run with: node --import tsx src/cli/build-site.test.ts
 *
 * Tests cover:
 *   1. Argument parsing
 *   2. Site value precedence (flags, environment, file)
 *   3. Report formatting
 *   4. Full command runs with captured output
 */

import { strict as assert } from "node:assert";
import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";

import type { AppConfig } from "../config/index.js";
import type { BuildReport } from "../build/index.js";
import {
  HELP_TEXT,
  UsageError,
  formatReport,
  parseBuildArgs,
  resolveOverrides,
  runBuildCommand,
  type CommandIO,
} from "./build-site.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

interface CapturedIO extends CommandIO {
  out: string[];
  err: string[];
}

function captureIO(): CapturedIO {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: (line) => out.push(line),
    stderr: (line) => err.push(line),
    colors: false,
  };
}

function field(value: unknown, key: string): unknown {
  if (typeof value !== "object" || value === null) {
    throw new Error(`expected an object holding "${key}"`);
  }
  const result: unknown = Reflect.get(value, key);
  return result;
}

for (const key of ["SITE_BASE_URL", "PAGE_SIZE", "SITE_CONFIG", "LOG_TO_FILE"]) {
  delete process.env[key];
}
process.env["NODE_ENV"] = "test";
process.env["LOG_LEVEL"] = "info";

const TEMPLATES_DIR = fileURLToPath(new URL("../../templates", import.meta.url));

const APP_CONFIG: AppConfig = {
  env: "test",
  logLevel: "info",
  logToFile: false,
  appName: "quire-site",
  siteBaseUrl: null,
  pageSize: null,
  contentDir: "content/posts",
  templatesDir: "templates",
  assetsDir: "assets",
  outputDir: "public",
  siteConfigPath: null,
};

function sampleReport(overrides: Partial<BuildReport> = {}): BuildReport {
  return {
    runId: "run-1",
    dryRun: false,
    outputDir: "public",
    documents: 2,
    skipped: [{ sourcePath: "posts/draft.md", reason: "missing_title" }],
    unreadableHeaders: [],
    tags: 1,
    pagesByKind: { home: 1, listing: 1, taxonomy: 1, info: 1, tag: 1, detail: 2 },
    pages: 7,
    sitemapEntries: 7,
    assetsCopied: true,
    filesWritten: [],
    durationMs: 12,
    ...overrides,
  };
}

function withSite(fn: (root: string) => void, extraPosts: Record<string, string> = {}): void {
  const root = mkdtempSync(join(tmpdir(), "build-cli-"));
  try {
    const posts = join(root, "posts");
    mkdirSync(posts);
    writeFileSync(join(posts, "one.md"), "---\ntitle: First Post\ndate: 2024-02-01\ntags: [Linux]\n---\nOne.");
    writeFileSync(join(posts, "two.md"), "---\ntitle: Second Post\ndate: 2024-02-02\ntags: [Linux]\n---\nTwo.");
    for (const [name, text] of Object.entries(extraPosts)) {
      writeFileSync(join(posts, name), text);
    }
    mkdirSync(join(root, "assets"));
    fn(root);
  } finally {
    rmSync(root, { recursive: true, force: true });
  }
}

function siteArgs(root: string): string[] {
  return [
    "--content", join(root, "posts"),
    "--templates", TEMPLATES_DIR,
    "--assets", join(root, "assets"),
    "--out", join(root, "public"),
  ];
}

// ═══════════════════════════════════════════════════════════════════════════
// ARGUMENT PARSING
// ═══════════════════════════════════════════════════════════════════════════

section("Argument parsing");

test("defaults with no arguments", () => {
  const args = parseBuildArgs([]);
  assert.equal(args.content, undefined);
  assert.equal(args.pageSize, undefined);
  assert.equal(args.dryRun, false);
  assert.equal(args.allowDuplicateSlugs, false);
  assert.equal(args.help, false);
});

test("reads every option", () => {
  const args = parseBuildArgs([
    "--content", "posts",
    "--out", "site",
    "--base-url", "https://blog.example.org",
    "--page-size", "5",
    "--allow-duplicate-slugs",
    "--dry-run",
    "--json",
    "-h",
  ]);
  assert.equal(args.content, "posts");
  assert.equal(args.out, "site");
  assert.equal(args.baseUrl, "https://blog.example.org");
  assert.equal(args.pageSize, 5);
  assert.equal(args.allowDuplicateSlugs, true);
  assert.equal(args.dryRun, true);
  assert.equal(args.json, true);
  assert.equal(args.help, true);
});

test("page size must be a positive integer", () => {
  for (const value of ["0", "-2", "1.5", "ten"]) {
    assert.throws(() => parseBuildArgs(["--page-size", value]), UsageError, value);
  }
});

test("unknown options are usage errors", () => {
  assert.throws(() => parseBuildArgs(["--bogus"]), UsageError);
});

// ═══════════════════════════════════════════════════════════════════════════
// PRECEDENCE
// ═══════════════════════════════════════════════════════════════════════════

section("Site value precedence");

test("nothing set leaves the file values alone", () => {
  assert.deepEqual(resolveOverrides(parseBuildArgs([]), APP_CONFIG), {});
});

test("environment values apply when no flag is given", () => {
  const config = { ...APP_CONFIG, siteBaseUrl: "https://env.example.com", pageSize: 4 };
  assert.deepEqual(resolveOverrides(parseBuildArgs([]), config), {
    baseUrl: "https://env.example.com",
    pageSize: 4,
  });
});

test("flags win over the environment", () => {
  const config = { ...APP_CONFIG, siteBaseUrl: "https://env.example.com", pageSize: 4 };
  const args = parseBuildArgs(["--base-url", "https://cli.example.com/", "--page-size", "2"]);
  assert.deepEqual(resolveOverrides(args, config), { baseUrl: "https://cli.example.com", pageSize: 2 });
});

// ═══════════════════════════════════════════════════════════════════════════
// REPORT FORMATTING
// ═══════════════════════════════════════════════════════════════════════════

section("Report formatting");

test("build report lists counts and the output location", () => {
  const lines = formatReport(sampleReport(), false);
  assert.equal(lines[2], " Site Build");
  assert.ok(lines.includes("  Documents:       2"));
  assert.ok(lines.includes("    - posts/draft.md (missing_title)"));
  assert.ok(lines.includes("    detail     2"));
  assert.ok(lines.includes("  Files written:   0"));
  assert.equal(lines[lines.length - 2], "✓ Site written to public in 12ms");
});

test("dry run report says nothing was written", () => {
  const lines = formatReport(sampleReport({ dryRun: true }), false);
  assert.equal(lines[2], " Site Plan (dry run)");
  assert.equal(lines[lines.length - 2], "  Dry run: nothing written.");
  assert.ok(!lines.some((line) => line.startsWith("  Files written:")));
});

test("missing assets are flagged", () => {
  const lines = formatReport(sampleReport({ assetsCopied: false }), false);
  assert.ok(lines.includes("  Assets:          not found, skipped"));
});

// ═══════════════════════════════════════════════════════════════════════════
// COMMAND RUNS
// ═══════════════════════════════════════════════════════════════════════════

section("Command runs");

test("--help prints usage and succeeds", () => {
  const io = captureIO();
  assert.equal(runBuildCommand(["--help"], io), 0);
  assert.deepEqual(io.out, [HELP_TEXT]);
});

test("bad arguments print the error and usage", () => {
  const io = captureIO();
  assert.equal(runBuildCommand(["--page-size", "0"], io), 1);
  assert.equal(io.err[0], "Error: --page-size must be a positive integer, got: 0");
  assert.equal(io.err[1], HELP_TEXT);
  assert.deepEqual(io.out, []);
});

test("--json build prints only the report on stdout", () => {
  withSite((root) => {
    const io = captureIO();
    const code = runBuildCommand(
      [...siteArgs(root), "--base-url", "https://blog.example.org/", "--page-size", "1", "--json"],
      io
    );
    assert.equal(code, 0);
    assert.equal(io.out.length, 1);

    const report: unknown = JSON.parse(io.out[0] ?? "");
    assert.equal(field(report, "documents"), 2);
    assert.equal(field(report, "pages"), 8);
    assert.equal(field(field(report, "pagesByKind"), "listing"), 2);
    assert.ok(io.err.length > 0);

    assert.equal(
      readFileSync(join(root, "public", "robots.txt"), "utf-8"),
      "User-agent: *\nAllow: /\nSitemap: https://blog.example.org/sitemap.xml\n"
    );
  });
});

test("site configuration file supplies values the flags leave unset", () => {
  withSite((root) => {
    const configPath = join(root, "site.json");
    writeFileSync(configPath, JSON.stringify({ name: "Lab Notes", baseUrl: "https://notes.example.net" }));
    const io = captureIO();
    assert.equal(runBuildCommand([...siteArgs(root), "--config", configPath], io), 0);
    assert.ok(readFileSync(join(root, "public", "sitemap.xml"), "utf-8").includes(
      "<loc>https://notes.example.net/</loc>"
    ));
    assert.ok(readFileSync(join(root, "public", "index.html"), "utf-8").includes("Lab Notes"));
  });
});

test("failed build exits 1 with a JSON error", () => {
  withSite(
    (root) => {
      const io = captureIO();
      assert.equal(runBuildCommand([...siteArgs(root), "--json"], io), 1);
      const result: unknown = JSON.parse(io.out[0] ?? "");
      assert.equal(field(result, "success"), false);
      const error = field(result, "error");
      assert.ok(typeof error === "string" && error.startsWith("Build failed during load: Unparseable publish date"));
    },
    { "bad.md": "---\ntitle: Bad\ndate: soon\n---\nText" }
  );
});

test("missing site configuration file is reported", () => {
  withSite((root) => {
    const io = captureIO();
    const missing = join(root, "missing.json");
    assert.equal(runBuildCommand([...siteArgs(root), "--config", missing], io), 1);
    assert.equal(
      io.err[0],
      `Error: Site configuration validation failed:\n  - (root): file not found: ${missing}`
    );
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// Summary
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n${"═".repeat(60)}`);
console.log(`  ${passed} passed, ${failed} failed, ${passed + failed} total`);
console.log(`${"═".repeat(60)}\n`);

if (failed > 0) {
  process.exit(1);
}
