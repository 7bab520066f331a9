/**
 * Converts typed page contexts into template data.
 *
 * Page contexts are ordinary TypeScript interfaces; the renderer takes a
 * JSON-like tree. Conversion checks every value on the way so a context
 * carrying `undefined`, a Date or a function fails before rendering.
 */

import type { TemplateData, TemplateValue } from "./renderer.js";

export class TemplateDataError extends Error {
  constructor(
    public readonly path: string,
    message: string
  ) {
    super(`Invalid template data at "${path}": ${message}`);
    this.name = "TemplateDataError";
  }
}

function convert(value: unknown, path: string): TemplateValue {
  if (value === null) return null;

  switch (typeof value) {
    case "string":
    case "boolean":
      return value;
    case "number":
      if (!Number.isFinite(value)) {
        throw new TemplateDataError(path, `non-finite number ${value}`);
      }
      return value;
    case "undefined":
      throw new TemplateDataError(path, "value is undefined (use null for absent values)");
    case "object":
      break;
    default:
      throw new TemplateDataError(path, `unsupported ${typeof value} value`);
  }

  if (Array.isArray(value)) {
    return value.map((item: unknown, index) => convert(item, `${path}[${index}]`));
  }

  const proto: unknown = Object.getPrototypeOf(value);
  if (proto !== Object.prototype && proto !== null) {
    throw new TemplateDataError(path, "only plain objects can be rendered");
  }

  const record: Record<string, TemplateValue> = {};
  for (const [key, entry] of Object.entries(value)) {
    record[key] = convert(entry, path === "" ? key : `${path}.${key}`);
  }
  return record;
}

function isTemplateData(value: TemplateValue): value is TemplateData {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Convert a typed context object into template data.
 *
 * @throws TemplateDataError when a value cannot be represented
 */
export function toTemplateData(context: object): TemplateData {
  const converted = convert(context, "");
  if (!isTemplateData(converted)) {
    throw new TemplateDataError("", "context must be an object");
  }
  return converted;
}
