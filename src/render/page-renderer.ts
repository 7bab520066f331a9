/**
 * Page renderer.
 *
 * Binds a planned page's context to its template and writes the result to
 * the page's output path. One write per page; a failure on any page is
 * raised as PageRenderError and stops the build.
 */

import type { Logger } from "../logging/index.js";
import type { PagePlanEntry } from "../site/planner.js";
import { writeOutputFile } from "../output/files.js";
import type { TemplateLoader } from "./loader.js";
import { toTemplateData } from "./adapter.js";

export class PageRenderError extends Error {
  constructor(
    public readonly outputPath: string,
    public readonly template: string,
    public readonly failure: unknown
  ) {
    super(
      `Failed to build page ${outputPath} from template "${template}": ${
        failure instanceof Error ? failure.message : String(failure)
      }`
    );
    this.name = "PageRenderError";
  }
}

export interface RenderedPage {
  outputPath: string;
  /** Absolute path of the written file */
  filePath: string;
  bytes: number;
}

export class PageRenderer {
  constructor(
    private readonly templates: TemplateLoader,
    private readonly outputDir: string,
    private readonly logger: Logger
  ) {}

  /**
   * Produce the page's HTML without writing it.
   *
   * @throws PageRenderError wrapping the template or data failure
   */
  renderToString(page: PagePlanEntry): string {
    try {
      return this.templates.render(page.template, toTemplateData(page.context));
    } catch (err) {
      throw new PageRenderError(page.outputPath, page.template, err);
    }
  }

  /**
   * Render a page and write it below the output directory.
   *
   * @throws PageRenderError on rendering or write failure
   */
  write(page: PagePlanEntry): RenderedPage {
    const html = this.renderToString(page);
    let filePath: string;
    try {
      filePath = writeOutputFile(this.outputDir, page.outputPath, html);
    } catch (err) {
      throw new PageRenderError(page.outputPath, page.template, err);
    }
    this.logger.debug("Page written", { kind: page.kind, outputPath: page.outputPath });
    return { outputPath: page.outputPath, filePath, bytes: Buffer.byteLength(html, "utf-8") };
  }

  /**
   * Render every page in plan order.
   */
  writeAll(pages: readonly PagePlanEntry[]): RenderedPage[] {
    return pages.map((page) => this.write(page));
  }
}
