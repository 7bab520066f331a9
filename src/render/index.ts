/**
 * HTML template module.
 *
 *   parseTemplate()   text → node tree (template.ts)
 *   renderTemplate()  node tree + data → HTML (renderer.ts)
 *   TemplateLoader    disk loading, caching, partials (loader.ts)
 *   toTemplateData()  typed page context → template data (adapter.ts)
 */

export {
  parseTemplate,
  isValidPath,
  TemplateParseError,
  type ParsedTemplate,
  type TemplateNode,
  type Condition,
  type ConditionOperator,
} from "./template.js";

export {
  renderTemplate,
  TemplateRenderError,
  type RenderOptions,
  type TemplateData,
  type TemplateValue,
  type TemplateScalar,
} from "./renderer.js";

export { TemplateLoader, TemplateLoadError, PARTIALS_DIR } from "./loader.js";

export { toTemplateData, TemplateDataError } from "./adapter.js";

export { escapeHtml } from "./escape.js";

export { PageRenderer, PageRenderError, type RenderedPage } from "./page-renderer.js";
