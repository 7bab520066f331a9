/**
 * Site configuration loader and validator.
 *
 * Responsible for:
 * - Merging overrides from a JSON file over the defaults
 * - Validating against the schema with fail-fast behavior
 * - Producing structured error messages
 * - Freezing configuration to enforce immutability
 */

import { existsSync, readFileSync } from "node:fs";
import type { ZodIssue } from "zod";
import { SiteConfigSchema, type SiteConfig } from "./schema.js";
import { DEFAULT_SITE_CONFIG } from "./defaults.js";

/**
 * Structured validation error for site configuration.
 */
export class SiteConfigError extends Error {
  public readonly issues: ConfigValidationIssue[];

  constructor(message: string, issues: ConfigValidationIssue[]) {
    super(message);
    this.name = "SiteConfigError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Site configuration validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Individual validation issue.
 */
export interface ConfigValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code, or "io" / "json" for file problems */
  code: string;
}

function formatZodIssues(zodIssues: ZodIssue[]): ConfigValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Deep freeze an object to enforce runtime immutability.
 */
function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const name of Reflect.ownKeys(obj)) {
    const value: unknown = Reflect.get(obj, name);
    if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Validate and load site configuration.
 *
 * @param input - Raw configuration object to validate
 * @returns Validated and frozen SiteConfig
 * @throws SiteConfigError if validation fails
 */
export function loadSiteConfig(input: unknown): Readonly<SiteConfig> {
  const result = SiteConfigSchema.safeParse(input);

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new SiteConfigError(
      `Invalid site configuration: ${issues.length} validation error(s)`,
      issues
    );
  }

  return deepFreeze(result.data);
}

/**
 * Apply overrides on top of the default configuration.
 *
 * Nested `about` and `copy` objects are merged field by field so an
 * override file may change a single line of copy.
 */
export function mergeSiteConfig(overrides: Record<string, unknown>): unknown {
  const merged: Record<string, unknown> = { ...DEFAULT_SITE_CONFIG, ...overrides };
  for (const key of ["about", "copy"] as const) {
    const override = overrides[key];
    if (isPlainObject(override)) {
      merged[key] = { ...DEFAULT_SITE_CONFIG[key], ...override };
    }
  }
  return merged;
}

/** Values that take precedence over both the defaults and the file. */
export type SiteConfigOverrides = Partial<Pick<SiteConfig, "baseUrl" | "pageSize">>;

function definedOverrides(overrides: SiteConfigOverrides): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  if (overrides.baseUrl !== undefined) result["baseUrl"] = overrides.baseUrl;
  if (overrides.pageSize !== undefined) result["pageSize"] = overrides.pageSize;
  return result;
}

/**
 * Read an optional JSON override file, merge it over the defaults, apply
 * the explicit overrides and validate.
 *
 * @param filePath  - JSON file, or null to start from the defaults alone
 * @param overrides - Values from the environment or the command line
 * @throws SiteConfigError if the file is missing, not JSON, or invalid
 */
export function loadSiteConfigFile(
  filePath: string | null,
  overrides: SiteConfigOverrides = {}
): Readonly<SiteConfig> {
  if (filePath === null) {
    return loadSiteConfig(mergeSiteConfig(definedOverrides(overrides)));
  }

  if (!existsSync(filePath)) {
    throw new SiteConfigError(`Site configuration file not found: ${filePath}`, [
      { path: [], message: `file not found: ${filePath}`, code: "io" },
    ]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new SiteConfigError(`Site configuration is not valid JSON: ${filePath}`, [
      { path: [], message, code: "json" },
    ]);
  }

  if (!isPlainObject(parsed)) {
    throw new SiteConfigError(`Site configuration must be a JSON object: ${filePath}`, [
      { path: [], message: "expected an object", code: "json" },
    ]);
  }

  return loadSiteConfig(mergeSiteConfig({ ...parsed, ...definedOverrides(overrides) }));
}
