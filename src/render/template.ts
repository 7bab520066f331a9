/**
 * HTML template parsing.
 *
 * A template is HTML text with `{{…}}` tags. Parsing turns it into a node
 * tree once; rendering walks the tree against a data scope (renderer.ts).
 *
 * TEMPLATE FORMAT:
 *
 *   SUBSTITUTION:
 *     {{ post.title }}             HTML-escaped value
 *     {{{ post.contentHtml }}}     raw value (already HTML)
 *
 *   CONDITIONALS (nestable, optional else):
 *     {{#if pagination}} … {{else}} … {{/if}}
 *     {{#if navActive == "home"}} … {{/if}}
 *     {{#if navActive != "home"}} … {{/if}}
 *
 *   ITERATION (optional else for empty or null lists):
 *     {{#each posts}}
 *       <a href="{{ url }}">{{ @number }}. {{ title }}</a>
 *     {{else}}
 *       Nothing yet.
 *     {{/each}}
 *
 *     Inside the block `this` is the current item, `@index` is zero-based
 *     and `@number` one-based; other names are looked up on the item first,
 *     then on enclosing scopes.
 *
 *   PARTIALS:
 *     {{> head}}                   renders partials/head.html in place
 *
 *   COMMENTS:
 *     {{! not rendered }}
 *
 * Rules:
 *   - Paths are dotted identifiers, `this`, `this.field`, `@index`, `@number`
 *   - Whitespace inside braces is trimmed
 *   - Every block must be closed by its own closing tag
 *   - `{{else}}` may appear once per block
 */

// ---------------------------------------------------------------------------
// Node tree
// ---------------------------------------------------------------------------

export type ConditionOperator = "==" | "!=" | "truthy";

export interface Condition {
  path: string;
  operator: ConditionOperator;
  /** Literal for == / != comparisons */
  value?: string;
}

export type TemplateNode =
  | { type: "text"; value: string }
  | { type: "variable"; path: string; raw: boolean; line: number }
  | { type: "if"; condition: Condition; then: TemplateNode[]; otherwise: TemplateNode[]; line: number }
  | { type: "each"; path: string; body: TemplateNode[]; otherwise: TemplateNode[]; line: number }
  | { type: "partial"; name: string; line: number };

/**
 * A parsed template.
 */
export interface ParsedTemplate {
  /** Template name used in error messages */
  name: string;
  /** The raw template source */
  source: string;
  nodes: TemplateNode[];
  /** Distinct data paths referenced, sorted */
  variables: string[];
  /** Distinct partial names referenced, sorted */
  partials: string[];
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class TemplateParseError extends Error {
  constructor(
    public readonly templateName: string,
    public readonly issues: string[],
    message?: string
  ) {
    super(
      message ??
        `Template "${templateName}" could not be parsed:\n  - ${issues.join("\n  - ")}`
    );
    this.name = "TemplateParseError";
  }
}

// ---------------------------------------------------------------------------
// Grammar
// ---------------------------------------------------------------------------

/**
 * Matches `{{{ raw }}}` (group 1) or `{{ tag }}` (group 2).
 */
const TAG_RE = /\{\{\{\s*([\s\S]*?)\s*\}\}\}|\{\{\s*([\s\S]*?)\s*\}\}/g;

const PATH_RE =
  /^(?:@index|@number|this(?:\.[A-Za-z_][A-Za-z0-9_]*)*|[A-Za-z_][A-Za-z0-9_]*(?:\.[A-Za-z_][A-Za-z0-9_]*)*)$/;

const IF_RE = /^#if\s+(\S+?)\s*(?:(==|!=)\s*"([^"]*)")?$/;
const EACH_RE = /^#each\s+(\S+)$/;
const PARTIAL_RE = /^>\s*([A-Za-z0-9_-]+(?:\/[A-Za-z0-9_-]+)*)$/;

export function isValidPath(path: string): boolean {
  return PATH_RE.test(path);
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

interface OpenBlock {
  kind: "if" | "each";
  line: number;
  node: Extract<TemplateNode, { type: "if" | "each" }>;
  /** Set once {{else}} has been seen */
  inElse: boolean;
}

function lineAt(source: string, offset: number): number {
  let line = 1;
  for (let i = 0; i < offset; i++) {
    if (source.charCodeAt(i) === 10) line++;
  }
  return line;
}

/**
 * Parse a template string into a node tree.
 *
 * @param source - The raw template text
 * @param name   - Template name for error messages
 * @throws TemplateParseError listing every malformed or unbalanced tag
 */
export function parseTemplate(source: string, name = "(anonymous)"): ParsedTemplate {
  const root: TemplateNode[] = [];
  const stack: OpenBlock[] = [];
  const issues: string[] = [];
  const variables = new Set<string>();
  const partials = new Set<string>();

  const target = (): TemplateNode[] => {
    const top = stack[stack.length - 1];
    if (!top) return root;
    if (top.node.type === "if") {
      return top.inElse ? top.node.otherwise : top.node.then;
    }
    return top.inElse ? top.node.otherwise : top.node.body;
  };

  let cursor = 0;
  TAG_RE.lastIndex = 0;
  let match: RegExpExecArray | null;

  while ((match = TAG_RE.exec(source)) !== null) {
    if (match.index > cursor) {
      target().push({ type: "text", value: source.slice(cursor, match.index) });
    }
    cursor = match.index + match[0].length;

    const line = lineAt(source, match.index);
    const rawTag = match[1];
    const tag = match[2] ?? "";

    // --- {{{ raw }}} ---
    if (rawTag !== undefined) {
      if (!isValidPath(rawTag)) {
        issues.push(`line ${line}: invalid path "${rawTag}" in raw substitution`);
        continue;
      }
      variables.add(rawTag);
      target().push({ type: "variable", path: rawTag, raw: true, line });
      continue;
    }

    // --- {{! comment }} ---
    if (tag.startsWith("!")) continue;

    // --- {{#if …}} ---
    if (tag.startsWith("#if")) {
      const ifMatch = IF_RE.exec(tag);
      if (!ifMatch || !isValidPath(ifMatch[1] ?? "")) {
        issues.push(`line ${line}: malformed conditional "{{${tag}}}"`);
        continue;
      }
      const [, path = "", operator, value] = ifMatch;
      variables.add(path);
      const node: Extract<TemplateNode, { type: "if" }> = {
        type: "if",
        condition:
          operator === "==" || operator === "!="
            ? { path, operator, value }
            : { path, operator: "truthy" },
        then: [],
        otherwise: [],
        line,
      };
      target().push(node);
      stack.push({ kind: "if", line, node, inElse: false });
      continue;
    }

    // --- {{#each …}} ---
    if (tag.startsWith("#each")) {
      const eachMatch = EACH_RE.exec(tag);
      const path = eachMatch?.[1];
      if (path === undefined || !isValidPath(path)) {
        issues.push(`line ${line}: malformed iteration "{{${tag}}}"`);
        continue;
      }
      variables.add(path);
      const node: Extract<TemplateNode, { type: "each" }> = {
        type: "each",
        path,
        body: [],
        otherwise: [],
        line,
      };
      target().push(node);
      stack.push({ kind: "each", line, node, inElse: false });
      continue;
    }

    // --- {{else}} ---
    if (tag === "else") {
      const top = stack[stack.length - 1];
      if (!top) {
        issues.push(`line ${line}: {{else}} outside of a block`);
      } else if (top.inElse) {
        issues.push(`line ${line}: second {{else}} in {{#${top.kind}}} opened on line ${top.line}`);
      } else {
        top.inElse = true;
      }
      continue;
    }

    // --- {{/if}} / {{/each}} ---
    if (tag === "/if" || tag === "/each") {
      const kind = tag.slice(1);
      const top = stack[stack.length - 1];
      if (!top) {
        issues.push(`line ${line}: {{${tag}}} without an opening block`);
      } else if (top.kind !== kind) {
        issues.push(
          `line ${line}: {{${tag}}} closes {{#${top.kind}}} opened on line ${top.line}`
        );
        stack.pop();
      } else {
        stack.pop();
      }
      continue;
    }

    // --- {{> partial}} ---
    if (tag.startsWith(">")) {
      const partialMatch = PARTIAL_RE.exec(tag);
      const partialName = partialMatch?.[1];
      if (partialName === undefined) {
        issues.push(`line ${line}: malformed partial "{{${tag}}}"`);
        continue;
      }
      partials.add(partialName);
      target().push({ type: "partial", name: partialName, line });
      continue;
    }

    // --- {{ path }} ---
    if (!isValidPath(tag)) {
      issues.push(`line ${line}: invalid path "${tag}"`);
      continue;
    }
    variables.add(tag);
    target().push({ type: "variable", path: tag, raw: false, line });
  }

  if (cursor < source.length) {
    target().push({ type: "text", value: source.slice(cursor) });
  }

  for (const open of stack) {
    issues.push(`line ${open.line}: {{#${open.kind}}} is never closed`);
  }

  if (issues.length > 0) {
    throw new TemplateParseError(name, issues);
  }

  return {
    name,
    source,
    nodes: root,
    variables: [...variables].sort(),
    partials: [...partials].sort(),
  };
}
