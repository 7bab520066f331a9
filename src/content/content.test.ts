/**
 * Document Loading Tests
 *
 * Run with: node --import tsx src/content/content.test.ts
 *
 * These tests verify:
 *   1. Identifier and tag normalization
 *   2. Markup helpers (summary, reading time)
 *   3. Metadata header splitting, including unreadable headers
 *   4. Publish date parsing
 *   5. Normalization defaults and skip reasons
 *   6. Canonical ordering
 *   7. Loading a directory end to end
 */

import { strict as assert } from "node:assert";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import {
  DocumentDateError,
  DuplicateSlugError,
  FrontMatterSchema,
  countWords,
  discoverSources,
  estimateReadTime,
  labelFromSlug,
  loadDocuments,
  normalizeDocument,
  normalizeTags,
  parsePublishDate,
  renderMarkdown,
  resolveSlug,
  slugify,
  sortDocuments,
  splitFrontMatter,
  summarizeHtml,
  type Document,
  type MarkupRenderer,
} from "./index.js";

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

const SITE = { author: "Site Author", defaultImage: "assets/images/default.svg" };
const NOW = new Date("2024-06-01T12:00:00Z");
const passthrough: MarkupRenderer = (body) => body;

function normalizeOrFail(
  metadata: Record<string, unknown>,
  body: string,
  sourcePath = "/posts/sample.md",
  discoveryIndex = 0
): Document {
  const result = normalizeDocument(
    { metadata: FrontMatterSchema.parse(metadata), body, sourcePath, discoveryIndex },
    { site: SITE, now: NOW, renderMarkup: passthrough }
  );
  if (result.kind !== "document") {
    throw new Error(`expected a document, got skip reason ${result.reason}`);
  }
  return result.document;
}

function makeScratch(): string {
  return mkdtempSync(join(tmpdir(), "content-"));
}

function writePost(dir: string, name: string, content: string): string {
  const path = join(dir, name);
  writeFileSync(path, content, "utf-8");
  return path;
}

// ═══════════════════════════════════════════════════════════════════════════
// IDENTIFIERS AND TAGS
// ═══════════════════════════════════════════════════════════════════════════

section("Identifiers and tags");

test("slugify lowercases and hyphenates", () => {
  assert.equal(slugify("  Hello, World! "), "hello-world");
});

test("slugify collapses hyphen runs left by removed characters", () => {
  assert.equal(slugify("C++ & Rust -- Tips"), "c-rust-tips");
});

test("slugify may return empty", () => {
  assert.equal(slugify("!!!"), "");
});

test("tags are normalized and de-duplicated", () => {
  assert.deepEqual(normalizeTags(["Linux", "linux", ""]), ["linux"]);
});

test("tag order follows first occurrence", () => {
  assert.deepEqual(normalizeTags(["Home Lab", "Security", "home-lab"]), ["home-lab", "security"]);
});

test("labels are title-cased words", () => {
  assert.equal(labelFromSlug("home-lab"), "Home Lab");
});

// ═══════════════════════════════════════════════════════════════════════════
// MARKUP HELPERS
// ═══════════════════════════════════════════════════════════════════════════

section("Markup helpers");

test("summary is the visible text of the HTML", () => {
  assert.equal(summarizeHtml("<p>Hello world foo bar</p>"), "Hello world foo bar");
});

test("summary keeps at most 32 words", () => {
  const html = `<p>${Array.from({ length: 40 }, (_, i) => `w${i}`).join(" ")}</p>`;
  const summary = summarizeHtml(html);
  assert.equal(summary.split(" ").length, 32);
  assert.ok(summary.endsWith("w31"));
});

test("reading time has a floor of three minutes", () => {
  assert.equal(estimateReadTime(""), 3);
  assert.equal(estimateReadTime("just a few words"), 3);
});

test("reading time rounds words per minute", () => {
  assert.equal(estimateReadTime("word ".repeat(1000)), 5);
  assert.equal(estimateReadTime("word ".repeat(1300)), 6);
});

test("reading time rounds halves to the even minute", () => {
  assert.equal(estimateReadTime("word ".repeat(900)), 4);
  assert.equal(estimateReadTime("word ".repeat(1100)), 6);
});

test("word count ignores punctuation", () => {
  assert.equal(countWords("Hello, world - again!"), 3);
});

test("markdown renders to HTML", () => {
  const html = renderMarkdown("# Title\n\nSome *text*.");
  assert.ok(html.includes("<h1>Title</h1>"));
  assert.ok(html.includes("<p>Some <em>text</em>.</p>"));
});

// ═══════════════════════════════════════════════════════════════════════════
// HEADER SPLITTING
// ═══════════════════════════════════════════════════════════════════════════

section("Header splitting");

test("file without a header is all body", () => {
  const split = splitFrontMatter("Just a body\n");
  assert.equal(split.body, "Just a body\n");
  assert.equal(split.metadata.title, undefined);
  assert.deepEqual(split.metadata.tags, []);
  assert.equal(split.headerError, undefined);
});

test("header fields are parsed and the body trimmed", () => {
  const split = splitFrontMatter("---\ntitle: Hello\ntags: a, b\n---\n\nBody");
  assert.equal(split.metadata.title, "Hello");
  assert.deepEqual(split.metadata.tags, ["a", "b"]);
  assert.equal(split.body, "Body");
});

test("unreadable header is reported and dropped", () => {
  const split = splitFrontMatter("---\ntitle: [oops\n---\nBody text");
  assert.equal(typeof split.headerError, "string");
  assert.equal(split.metadata.title, undefined);
  assert.equal(split.body, "Body text");
});

test("scalar values are read as text", () => {
  const split = splitFrontMatter("---\ntitle: 2024\ntags: [Linux, 42]\n---\nx");
  assert.equal(split.metadata.title, "2024");
  assert.deepEqual(split.metadata.tags, ["Linux", "42"]);
});

// ═══════════════════════════════════════════════════════════════════════════
// PUBLISH DATES
// ═══════════════════════════════════════════════════════════════════════════

section("Publish dates");

test("date-only values are midnight UTC", () => {
  assert.equal(parsePublishDate("2024-01-03", "x.md").toISOString(), "2024-01-03T00:00:00.000Z");
});

test("time without zone is read as UTC", () => {
  assert.equal(
    parsePublishDate("2024-01-03 10:15", "x.md").toISOString(),
    "2024-01-03T10:15:00.000Z"
  );
});

test("explicit offsets are honored", () => {
  assert.equal(
    parsePublishDate("2024-01-03T10:00:00+02:00", "x.md").toISOString(),
    "2024-01-03T08:00:00.000Z"
  );
});

test("Date values pass through", () => {
  const date = new Date("2024-05-05T00:00:00Z");
  assert.equal(parsePublishDate(date, "x.md"), date);
});

test("impossible and malformed dates are fatal", () => {
  assert.throws(() => parsePublishDate("2024-02-30", "x.md"), DocumentDateError);
  assert.throws(() => parsePublishDate("yesterday", "x.md"), DocumentDateError);
  assert.throws(() => parsePublishDate("2024-01-03T25:00", "x.md"), DocumentDateError);
  assert.throws(() => parsePublishDate(20240103, "x.md"), DocumentDateError);

  const unquoted = splitFrontMatter("---\ntitle: Leap\ndate: 2024-02-30\n---\nx");
  assert.equal(unquoted.metadata.date, "2024-02-30");
  assert.throws(() => parsePublishDate(unquoted.metadata.date, "x.md"), DocumentDateError);
});

test("unquoted header dates are kept as text", () => {
  const split = splitFrontMatter("---\ntitle: Dated\ndate: 2024-01-02\n---\nx");
  assert.equal(split.metadata.date, "2024-01-02");
  assert.equal(parsePublishDate(split.metadata.date, "x.md").toISOString(), "2024-01-02T00:00:00.000Z");
});

// ═══════════════════════════════════════════════════════════════════════════
// NORMALIZATION
// ═══════════════════════════════════════════════════════════════════════════

section("Normalization");

test("identifier falls back from slug to title to file name", () => {
  assert.equal(resolveSlug("Custom Slug", "Title", "/p/file.md"), "custom-slug");
  assert.equal(resolveSlug(undefined, "Hello World", "/p/file.md"), "hello-world");
  assert.equal(resolveSlug("!!!", "???", "/p/my-post.md"), "my-post");
});

test("defaults are applied in one place", () => {
  const doc = normalizeOrFail({ title: "Hello" }, "<p>Hello world foo bar</p>");
  assert.equal(doc.slug, "hello");
  assert.equal(doc.excerpt, "Hello world foo bar");
  assert.equal(doc.author, "Site Author");
  assert.equal(doc.coverImage, "assets/images/default.svg");
  assert.equal(doc.date, NOW);
  assert.equal(doc.dateString, "2024-06-01");
  assert.equal(doc.readTime, 3);
  assert.deepEqual(doc.tags, []);
});

test("explicit fields win over defaults", () => {
  const doc = normalizeOrFail(
    {
      title: "Hello",
      excerpt: "Short summary",
      cover_image: "assets/a.png",
      coverImage: "assets/b.png",
      author: "Guest Writer",
      date: "2024-01-02",
      tags: ["Linux", "linux", ""],
    },
    "<p>Body</p>"
  );
  assert.equal(doc.excerpt, "Short summary");
  assert.equal(doc.coverImage, "assets/a.png");
  assert.equal(doc.author, "Guest Writer");
  assert.equal(doc.dateString, "2024-01-02");
  assert.deepEqual(doc.tags, ["linux"]);
});

test("documents are frozen", () => {
  const doc = normalizeOrFail({ title: "Hello", tags: ["a"] }, "x");
  assert.equal(Object.isFrozen(doc), true);
  assert.equal(Object.isFrozen(doc.tags), true);
});

test("missing or blank title is skipped", () => {
  for (const metadata of [{}, { title: "   " }]) {
    const result = normalizeDocument(
      { metadata: FrontMatterSchema.parse(metadata), body: "x", sourcePath: "/p/a.md", discoveryIndex: 0 },
      { site: SITE, now: NOW, renderMarkup: passthrough }
    );
    assert.deepEqual(result, { kind: "skipped", reason: "missing_title" });
  }
});

test("title without any usable identifier is skipped", () => {
  const result = normalizeDocument(
    { metadata: FrontMatterSchema.parse({ title: "!!!" }), body: "x", sourcePath: "/p/???.md", discoveryIndex: 0 },
    { site: SITE, now: NOW, renderMarkup: passthrough }
  );
  assert.deepEqual(result, { kind: "skipped", reason: "missing_identifier" });
});

// ═══════════════════════════════════════════════════════════════════════════
// ORDERING
// ═══════════════════════════════════════════════════════════════════════════

section("Ordering");

test("newest first, ties in discovery order", () => {
  const a = normalizeOrFail({ title: "A", date: "2024-01-01" }, "x", "/p/a.md", 0);
  const b = normalizeOrFail({ title: "B", date: "2024-01-03" }, "x", "/p/b.md", 1);
  const c = normalizeOrFail({ title: "C", date: "2024-01-03" }, "x", "/p/c.md", 2);
  assert.deepEqual(sortDocuments([a, c, b]).map((d) => d.title), ["B", "C", "A"]);
});

test("sorting is idempotent and leaves the input alone", () => {
  const a = normalizeOrFail({ title: "A", date: "2024-01-01" }, "x", "/p/a.md", 0);
  const b = normalizeOrFail({ title: "B", date: "2024-01-02" }, "x", "/p/b.md", 1);
  const input = [a, b];
  const once = sortDocuments(input);
  assert.deepEqual(sortDocuments(once), once);
  assert.deepEqual(input.map((d) => d.title), ["A", "B"]);
});

// ═══════════════════════════════════════════════════════════════════════════
// DIRECTORY LOADING
// ═══════════════════════════════════════════════════════════════════════════

section("Directory loading");

test("loads, skips and orders a directory", () => {
  const dir = makeScratch();
  try {
    writePost(dir, "a.md", "---\ntitle: A\ndate: 2024-01-01\n---\nFirst");
    writePost(dir, "b.md", "---\ntitle: B\ndate: 2024-01-03\n---\nSecond");
    writePost(dir, "c.markdown", "---\ntitle: C\ndate: 2024-01-02\n---\nThird");
    const untitled = writePost(dir, "d.md", "No header at all");
    const broken = writePost(dir, "f.md", "---\ntitle: [oops\n---\nBody");
    writePost(dir, "notes.txt", "---\ntitle: Ignored\n---\n");
    mkdirSync(join(dir, "drafts.md"));

    const result = loadDocuments({ contentDir: dir, site: SITE, now: NOW });
    assert.deepEqual(result.documents.map((d) => d.title), ["B", "C", "A"]);
    assert.deepEqual(result.skipped, [
      { sourcePath: untitled, reason: "missing_title" },
      { sourcePath: broken, reason: "missing_title" },
    ]);
    assert.deepEqual(result.unreadableHeaders, [broken]);
    assert.deepEqual(result.collisions, []);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

test("discovery is by file name", () => {
  const dir = makeScratch();
  try {
    writePost(dir, "b.md", "x");
    writePost(dir, "a.md", "x");
    assert.deepEqual(discoverSources(dir), [join(dir, "a.md"), join(dir, "b.md")]);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

test("equal dates keep discovery order", () => {
  const dir = makeScratch();
  try {
    writePost(dir, "1-first.md", "---\ntitle: First\ndate: 2024-01-01\n---\nx");
    writePost(dir, "2-second.md", "---\ntitle: Second\ndate: 2024-01-01\n---\nx");
    const result = loadDocuments({ contentDir: dir, site: SITE, now: NOW });
    assert.deepEqual(result.documents.map((d) => d.title), ["First", "Second"]);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

test("missing directory yields no documents", () => {
  const result = loadDocuments({ contentDir: join(tmpdir(), "does-not-exist-content"), site: SITE });
  assert.deepEqual(result.documents, []);
});

test("unparseable date aborts the load", () => {
  const dir = makeScratch();
  try {
    writePost(dir, "a.md", "---\ntitle: A\ndate: not-a-date\n---\nx");
    assert.throws(() => loadDocuments({ contentDir: dir, site: SITE }), DocumentDateError);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

test("colliding identifiers fail by default", () => {
  const dir = makeScratch();
  try {
    const first = writePost(dir, "a.md", "---\ntitle: Same\n---\nx");
    const second = writePost(dir, "b.md", "---\ntitle: Same\n---\ny");
    assert.throws(
      () => loadDocuments({ contentDir: dir, site: SITE, now: NOW }),
      (err: unknown) => {
        if (!(err instanceof DuplicateSlugError)) return false;
        assert.deepEqual(err.collisions, [{ slug: "same", sourcePaths: [first, second] }]);
        return true;
      }
    );
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

test("colliding identifiers are kept when allowed", () => {
  const dir = makeScratch();
  try {
    writePost(dir, "a.md", "---\ntitle: Same\n---\nx");
    writePost(dir, "b.md", "---\ntitle: Same\n---\ny");
    const result = loadDocuments({ contentDir: dir, site: SITE, now: NOW, allowDuplicateSlugs: true });
    assert.equal(result.documents.length, 2);
    assert.equal(result.collisions.length, 1);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
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
