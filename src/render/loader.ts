/**
 * HTML template loader.
 *
 * Loads templates from disk, parses them once and caches the result.
 * Partials referenced as `{{> name}}` live in `partials/name.html` below
 * the same base directory.
 *
 * USAGE:
 *
 *   const templates = new TemplateLoader("templates/");
 *
 *   // Render a page template with its partials
 *   const html = templates.render("article.html", data);
 *
 *   // Parse everything up front so a broken template fails before any
 *   // page is written
 *   templates.loadAll();
 */

import { existsSync, readFileSync, readdirSync, statSync } from "node:fs";
import { join, extname, resolve } from "node:path";

import { parseTemplate, type ParsedTemplate } from "./template.js";
import { renderTemplate, type TemplateData } from "./renderer.js";

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class TemplateLoadError extends Error {
  constructor(
    public readonly filePath: string,
    message?: string
  ) {
    super(message ?? `Failed to load template: ${filePath}`);
    this.name = "TemplateLoadError";
  }
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** File extensions recognized as templates. */
const TEMPLATE_EXTENSIONS = new Set([".html"]);

/** Sub-directory holding partials. */
export const PARTIALS_DIR = "partials";

// ---------------------------------------------------------------------------
// Loader
// ---------------------------------------------------------------------------

export class TemplateLoader {
  readonly baseDir: string;
  private readonly cache = new Map<string, ParsedTemplate>();

  /**
   * @param baseDir - Directory containing page templates and partials/
   */
  constructor(baseDir: string) {
    this.baseDir = resolve(baseDir);

    if (!existsSync(this.baseDir)) {
      throw new TemplateLoadError(
        this.baseDir,
        `Template directory does not exist: ${this.baseDir}`
      );
    }
  }

  /**
   * Load and parse a template file.
   *
   * @param filename - Path relative to baseDir (e.g. "article.html")
   * @throws TemplateLoadError  if the file is missing or not a template
   * @throws TemplateParseError if the template is malformed
   */
  load(filename: string): ParsedTemplate {
    const cached = this.cache.get(filename);
    if (cached) return cached;

    const filePath = join(this.baseDir, filename);

    const ext = extname(filename).toLowerCase();
    if (!TEMPLATE_EXTENSIONS.has(ext)) {
      throw new TemplateLoadError(
        filePath,
        `Unsupported template extension "${ext}". Use: ${[...TEMPLATE_EXTENSIONS].join(", ")}`
      );
    }

    if (!existsSync(filePath)) {
      throw new TemplateLoadError(filePath, `Template file not found: ${filePath}`);
    }

    const parsed = parseTemplate(readFileSync(filePath, "utf-8"), filename);
    this.cache.set(filename, parsed);
    return parsed;
  }

  /**
   * Load a partial by the name used in `{{> name}}`.
   */
  loadPartial(name: string): ParsedTemplate {
    return this.load(`${PARTIALS_DIR}/${name}.html`);
  }

  /**
   * Load every page template in the base directory and every partial
   * they reference, transitively.
   *
   * @returns Map of filename → ParsedTemplate for page templates
   */
  loadAll(): Map<string, ParsedTemplate> {
    const result = new Map<string, ParsedTemplate>();
    for (const entry of TemplateLoader.listTemplates(this.baseDir)) {
      const template = this.load(entry);
      result.set(entry, template);
      this.loadPartialsOf(template, new Set());
    }
    return result;
  }

  private loadPartialsOf(template: ParsedTemplate, seen: Set<string>): void {
    for (const name of template.partials) {
      if (seen.has(name)) continue;
      seen.add(name);
      this.loadPartialsOf(this.loadPartial(name), seen);
    }
  }

  /**
   * Render a template with its partials.
   */
  render(filename: string, data: TemplateData): string {
    return renderTemplate(this.load(filename), data, {
      resolvePartial: (name) => this.loadPartial(name),
    });
  }

  /**
   * Clear the internal template cache.
   */
  clearCache(): void {
    this.cache.clear();
  }

  /**
   * List page template filenames in a directory without loading them.
   */
  static listTemplates(dir: string): string[] {
    const resolved = resolve(dir);
    if (!existsSync(resolved)) return [];

    return readdirSync(resolved)
      .filter((entry) => {
        const full = join(resolved, entry);
        if (!statSync(full).isFile()) return false;
        return TEMPLATE_EXTENSIONS.has(extname(entry).toLowerCase());
      })
      .sort();
  }
}
