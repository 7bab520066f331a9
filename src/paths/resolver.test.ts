/**
 * Path Resolution Tests
 *
 * Run with: node --import tsx src/paths/resolver.test.ts
 */

import { strict as assert } from "node:assert";

import { createPathResolver, pageDepth, relativeRoot, resolveFromRoot } from "./index.js";

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

// ═══════════════════════════════════════════════════════════════════════════
// DEPTH
// ═══════════════════════════════════════════════════════════════════════════

section("Page depth");

test("depth counts directories above the file", () => {
  assert.equal(pageDepth("index.html"), 0);
  assert.equal(pageDepth("about.html"), 0);
  assert.equal(pageDepth("articles/index.html"), 1);
  assert.equal(pageDepth("tag/linux/index.html"), 2);
  assert.equal(pageDepth("articles/page/2/index.html"), 3);
});

test("leading ./ and empty segments are ignored", () => {
  assert.equal(pageDepth("./articles//index.html"), 1);
});

// ═══════════════════════════════════════════════════════════════════════════
// RELATIVE ROOT
// ═══════════════════════════════════════════════════════════════════════════

section("Relative root");

test("root of a top-level page is '.'", () => {
  assert.equal(relativeRoot(0), ".");
});

test("one parent segment per level", () => {
  assert.equal(relativeRoot(1), "..");
  assert.equal(relativeRoot(3), "../../..");
});

test("negative or fractional depth is rejected", () => {
  assert.throws(() => relativeRoot(-1), RangeError);
  assert.throws(() => relativeRoot(1.5), RangeError);
});

// ═══════════════════════════════════════════════════════════════════════════
// RESOLUTION
// ═══════════════════════════════════════════════════════════════════════════

section("Resolution");

test("depth 2 reaches assets through two parents", () => {
  assert.equal(resolveFromRoot("assets", relativeRoot(2)), "../../assets");
});

test("depth 0 returns the target unchanged", () => {
  assert.equal(resolveFromRoot("assets", relativeRoot(0)), "assets");
});

test("resolver bound to a page", () => {
  const paths = createPathResolver("article/hello/index.html");
  assert.equal(paths.depth, 2);
  assert.equal(paths.root, "../..");
  assert.equal(paths.to("tag/linux/index.html"), "../../tag/linux/index.html");
});

test("every page reaches the same root file", () => {
  for (const page of ["index.html", "articles/index.html", "articles/page/4/index.html"]) {
    const paths = createPathResolver(page);
    const link = paths.to("index.html");
    const upward = link.split("/").filter((s) => s === "..").length;
    assert.equal(upward, paths.depth);
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
