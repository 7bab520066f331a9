/**
 * Template renderer.
 *
 * Walks a ParsedTemplate against template data. Rendering is strict:
 *
 *   1. Every referenced path must exist in the scope chain. Absent
 *      optional values are modelled as null, never left out.
 *   2. Substitutions take scalars only (string, number, boolean, null).
 *   3. `{{#each}}` takes a list or null.
 *   4. `{{ … }}` output is HTML-escaped; `{{{ … }}}` is written as is.
 *
 * Any violation raises TemplateRenderError naming the template, the line
 * and the path, and the page is not produced.
 */

import type { ParsedTemplate, TemplateNode, Condition } from "./template.js";
import { escapeHtml } from "./escape.js";

// ---------------------------------------------------------------------------
// Data model
// ---------------------------------------------------------------------------

export type TemplateScalar = string | number | boolean | null;

export type TemplateValue =
  | TemplateScalar
  | readonly TemplateValue[]
  | { readonly [key: string]: TemplateValue };

export type TemplateData = { readonly [key: string]: TemplateValue };

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class TemplateRenderError extends Error {
  constructor(
    public readonly templateName: string,
    public readonly path: string,
    public readonly line: number,
    reason: string
  ) {
    super(`Cannot render template "${templateName}" (line ${line}): ${reason}`);
    this.name = "TemplateRenderError";
  }
}

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface RenderOptions {
  /**
   * Supplies parsed partials by name. Required when the template (or any
   * partial it pulls in) contains `{{> name}}`.
   */
  resolvePartial?: (name: string) => ParsedTemplate;

  /** Maximum partial nesting before rendering is aborted. Default: 16. */
  maxPartialDepth?: number;
}

// ---------------------------------------------------------------------------
// Scope chain
// ---------------------------------------------------------------------------

interface Frame {
  value: TemplateValue;
  /** Position within the enclosing {{#each}}, when the frame is an item */
  index?: number;
}

const MISSING = Symbol("missing");

function isRecord(value: TemplateValue): value is { readonly [key: string]: TemplateValue } {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isList(value: TemplateValue): value is readonly TemplateValue[] {
  return Array.isArray(value);
}

function walk(start: TemplateValue, segments: readonly string[]): TemplateValue | typeof MISSING {
  let current: TemplateValue = start;
  for (const segment of segments) {
    if (!isRecord(current) || !Object.prototype.hasOwnProperty.call(current, segment)) {
      return MISSING;
    }
    const next = current[segment];
    if (next === undefined) return MISSING;
    current = next;
  }
  return current;
}

function lookup(frames: readonly Frame[], path: string): TemplateValue | typeof MISSING {
  const innermost = frames[frames.length - 1];
  if (!innermost) return MISSING;

  if (path === "@index" || path === "@number") {
    for (let i = frames.length - 1; i >= 0; i--) {
      const index = frames[i]?.index;
      if (index !== undefined) return path === "@index" ? index : index + 1;
    }
    return MISSING;
  }

  const segments = path.split(".");
  if (segments[0] === "this") {
    return walk(innermost.value, segments.slice(1));
  }

  for (let i = frames.length - 1; i >= 0; i--) {
    const frame = frames[i];
    if (!frame) continue;
    const found = walk(frame.value, segments);
    if (found !== MISSING) return found;
  }
  return MISSING;
}

function isTruthy(value: TemplateValue): boolean {
  if (isList(value)) return value.length > 0;
  if (isRecord(value)) return true;
  return value !== null && value !== false && value !== "" && value !== 0;
}

// ---------------------------------------------------------------------------
// Renderer
// ---------------------------------------------------------------------------

/**
 * Render a parsed template against template data.
 *
 * @throws TemplateRenderError on a missing path, a wrong value kind, an
 *         unresolvable partial, or partial nesting beyond the limit
 */
export function renderTemplate(
  template: ParsedTemplate,
  data: TemplateData,
  options: RenderOptions = {}
): string {
  const maxDepth = options.maxPartialDepth ?? 16;

  function fail(node: { line: number }, path: string, reason: string, name: string): never {
    throw new TemplateRenderError(name, path, node.line, reason);
  }

  function resolve(
    frames: readonly Frame[],
    path: string,
    node: { line: number },
    name: string
  ): TemplateValue {
    const value = lookup(frames, path);
    if (value === MISSING) {
      return fail(node, path, `"${path}" is not defined`, name);
    }
    return value;
  }

  function test(condition: Condition, frames: readonly Frame[], node: { line: number }, name: string): boolean {
    const value = resolve(frames, condition.path, node, name);
    if (condition.operator === "truthy") return isTruthy(value);

    if (isList(value) || isRecord(value)) {
      return fail(node, condition.path, `"${condition.path}" cannot be compared to a literal`, name);
    }
    const equal = value !== null && String(value) === condition.value;
    return condition.operator === "==" ? equal : !equal;
  }

  function renderNodes(
    nodes: readonly TemplateNode[],
    frames: readonly Frame[],
    name: string,
    depth: number
  ): string {
    let out = "";

    for (const node of nodes) {
      switch (node.type) {
        case "text":
          out += node.value;
          break;

        case "variable": {
          const value = resolve(frames, node.path, node, name);
          if (isList(value) || isRecord(value)) {
            fail(node, node.path, `"${node.path}" is not a scalar value`, name);
          }
          const text = value === null ? "" : String(value);
          out += node.raw ? text : escapeHtml(text);
          break;
        }

        case "if":
          out += renderNodes(
            test(node.condition, frames, node, name) ? node.then : node.otherwise,
            frames,
            name,
            depth
          );
          break;

        case "each": {
          const value = resolve(frames, node.path, node, name);
          if (value === null) {
            out += renderNodes(node.otherwise, frames, name, depth);
            break;
          }
          if (!isList(value)) {
            fail(node, node.path, `"${node.path}" is not a list`, name);
          }
          if (value.length === 0) {
            out += renderNodes(node.otherwise, frames, name, depth);
            break;
          }
          value.forEach((item, index) => {
            out += renderNodes(node.body, [...frames, { value: item, index }], name, depth);
          });
          break;
        }

        case "partial": {
          if (!options.resolvePartial) {
            fail(node, node.name, `no partial resolver for "${node.name}"`, name);
          }
          if (depth >= maxDepth) {
            fail(node, node.name, `partials nested deeper than ${maxDepth}`, name);
          }
          const partial = options.resolvePartial(node.name);
          out += renderNodes(partial.nodes, frames, partial.name, depth + 1);
          break;
        }
      }
    }

    return out;
  }

  return renderNodes(template.nodes, [{ value: data }], template.name, 0);
}
