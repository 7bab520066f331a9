/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import {
  ConfigError,
  optionalEnv,
  optionalEnvInt,
  optionalEnvBool,
  optionalEnvUrl,
} from "./env.js";

export { ConfigError, normalizeBaseUrl } from "./env.js";

// Re-export site configuration module
export * from "./site/index.js";

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Log level */
  readonly logLevel: string;
  /** Also append log lines to output/logs/ */
  readonly logToFile: boolean;
  /** Application name */
  readonly appName: string;
  /** Base URL override for the published site, without trailing slash */
  readonly siteBaseUrl: string | null;
  /** Listing page size override */
  readonly pageSize: number | null;
  /** Directory holding the source markdown documents */
  readonly contentDir: string;
  /** Directory holding the HTML templates */
  readonly templatesDir: string;
  /** Directory of static assets copied into the site */
  readonly assetsDir: string;
  /** Site output root */
  readonly outputDir: string;
  /** Optional JSON file overriding the default site configuration */
  readonly siteConfigPath: string | null;
}

function isSet(key: string): boolean {
  const value = process.env[key];
  return value !== undefined && value !== "";
}

/**
 * Load application configuration from the environment.
 * Site values left unset here fall through to the site configuration
 * file and its defaults.
 * Fails fast on malformed values.
 */
export function loadConfig(): AppConfig {
  const siteConfigPath = optionalEnv("SITE_CONFIG", "");
  return {
    env: optionalEnv("NODE_ENV", "development"),
    logLevel: optionalEnv("LOG_LEVEL", "info"),
    logToFile: optionalEnvBool("LOG_TO_FILE", false),
    appName: optionalEnv("APP_NAME", "quire-site"),
    siteBaseUrl: isSet("SITE_BASE_URL") ? optionalEnvUrl("SITE_BASE_URL", "") : null,
    pageSize: isSet("PAGE_SIZE") ? optionalEnvInt("PAGE_SIZE", 1) : null,
    contentDir: optionalEnv("CONTENT_DIR", "content/posts"),
    templatesDir: optionalEnv("TEMPLATES_DIR", "templates"),
    assetsDir: optionalEnv("ASSETS_DIR", "assets"),
    outputDir: optionalEnv("OUTPUT_DIR", "public"),
    siteConfigPath: siteConfigPath === "" ? null : siteConfigPath,
  };
}

/**
 * Validate enumerated configuration values.
 * Call this at application startup to fail fast.
 */
export function validateConfig(config: AppConfig): void {
  if (!["development", "production", "test"].includes(config.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${config.env}. Must be development, production, or test.`
    );
  }

  if (!["debug", "info", "warn", "error"].includes(config.logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${config.logLevel}. Must be debug, info, warn, or error.`
    );
  }
}
