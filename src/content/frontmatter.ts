/**
 * Metadata header splitting.
 *
 * A source file may open with a `---` delimited YAML block. Without the
 * marker the whole file is body. A header that fails to parse, or that
 * is not a key/value map, is reported and treated as empty metadata.
 */

import matter from "gray-matter";
import * as yaml from "js-yaml";
import { FrontMatterSchema, type FrontMatter } from "./schema.js";

/** Marker that opens and closes the metadata header. */
export const HEADER_DELIMITER = "---";

export interface SplitDocument {
  /** Parsed and coerced metadata (empty when absent or unreadable) */
  metadata: FrontMatter;
  /** Raw body text with leading whitespace removed */
  body: string;
  /** Why the header was discarded, when it was */
  headerError?: string;
}

const EMPTY_METADATA: FrontMatter = FrontMatterSchema.parse({});

/**
 * YAML engine for the header. The JSON schema leaves timestamps as text,
 * so every publish date is checked by parsePublishDate.
 */
function parseHeaderYaml(input: string): object {
  const loaded: unknown = yaml.load(input, { schema: yaml.JSON_SCHEMA });
  if (loaded === null || loaded === undefined) return {};
  if (typeof loaded !== "object") {
    throw new Error("metadata header is not a key/value map");
  }
  return loaded;
}

/**
 * Remove a leading header block without interpreting it, so a file whose
 * header is unreadable still yields its body.
 */
function dropHeader(raw: string): string {
  if (!raw.startsWith(HEADER_DELIMITER)) return raw;
  const close = raw.indexOf(`\n${HEADER_DELIMITER}`, HEADER_DELIMITER.length);
  if (close === -1) return raw;
  return raw.slice(close + HEADER_DELIMITER.length + 1);
}

/**
 * Split raw file text into metadata and body.
 */
export function splitFrontMatter(raw: string): SplitDocument {
  if (!raw.startsWith(HEADER_DELIMITER)) {
    return { metadata: EMPTY_METADATA, body: raw.trimStart() };
  }

  let data: unknown;
  let content: string;
  try {
    // Options object disables gray-matter's per-input cache.
    const parsed = matter(raw, {
      delimiters: HEADER_DELIMITER,
      engines: { yaml: parseHeaderYaml },
    });
    data = parsed.data;
    content = parsed.content;
  } catch (err) {
    return {
      metadata: EMPTY_METADATA,
      body: dropHeader(raw).trimStart(),
      headerError: err instanceof Error ? err.message : String(err),
    };
  }

  const result = FrontMatterSchema.safeParse(data ?? {});
  if (!result.success) {
    return {
      metadata: EMPTY_METADATA,
      body: content.trimStart(),
      headerError: "metadata header is not a key/value map",
    };
  }

  return { metadata: result.data, body: content.trimStart() };
}
