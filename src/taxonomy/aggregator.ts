/**
 * Taxonomy aggregation.
 *
 * One pass over the canonically ordered documents builds a bucket per tag
 * slug. Each bucket remembers when it was first seen (document order, then
 * tag order within a document); that position breaks ranking ties. A
 * bucket exists only once a document carries its tag.
 */

import type { Document } from "../content/schema.js";
import { labelFromSlug } from "../content/slug.js";

export interface TagBucket {
  readonly slug: string;
  readonly label: string;
  readonly count: number;
  /** Member documents in document order (references, not copies) */
  readonly documents: readonly Document[];
  /** Position at which the tag was first encountered */
  readonly firstSeen: number;
}

/** A ranked tag without its member list. */
export interface TagSummary {
  readonly slug: string;
  readonly label: string;
  readonly count: number;
}

export interface TagIndex {
  /** Buckets keyed by slug, in first-seen order */
  readonly buckets: ReadonlyMap<string, TagBucket>;
  /** Tags by count descending; equal counts keep first-seen order */
  readonly ranked: readonly TagSummary[];
}

interface MutableBucket {
  slug: string;
  count: number;
  documents: Document[];
  firstSeen: number;
}

/**
 * Order for ranking: higher count first, then earlier first sighting.
 */
export function compareTagRank(
  a: { count: number; firstSeen: number },
  b: { count: number; firstSeen: number }
): number {
  return b.count - a.count || a.firstSeen - b.firstSeen;
}

/**
 * Group documents by tag and rank the tags.
 */
export function aggregateTags(documents: readonly Document[]): TagIndex {
  const working = new Map<string, MutableBucket>();

  for (const document of documents) {
    for (const slug of document.tags) {
      let bucket = working.get(slug);
      if (!bucket) {
        bucket = { slug, count: 0, documents: [], firstSeen: working.size };
        working.set(slug, bucket);
      }
      bucket.count += 1;
      bucket.documents.push(document);
    }
  }

  const buckets = new Map<string, TagBucket>();
  for (const [slug, bucket] of working) {
    buckets.set(
      slug,
      Object.freeze({
        slug,
        label: labelFromSlug(slug),
        count: bucket.count,
        documents: Object.freeze([...bucket.documents]),
        firstSeen: bucket.firstSeen,
      })
    );
  }

  const ranked = [...buckets.values()]
    .sort(compareTagRank)
    .map((bucket) =>
      Object.freeze({ slug: bucket.slug, label: bucket.label, count: bucket.count })
    );

  return { buckets, ranked: Object.freeze(ranked) };
}
